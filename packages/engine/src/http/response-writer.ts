import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import {
  DEFAULT_HTTP_VERSION,
  type HttpHeaders,
  type HttpRequest,
  type HttpResponse,
  statusMessage,
} from "./types.js";

const CRLF = "\r\n";

/**
 * Serialize a response: status line, headers sorted by name, blank line,
 * body. `Content-Length` is filled in from the body when the handler did not
 * set it, so every response is length-framed.
 */
export function serializeResponse(response: HttpResponse): Uint8Array {
  const headers = toHeaderMap(response.headers);
  const body = response.body ?? new Uint8Array(0);

  if (!hasHeader(headers, "Content-Length")) {
    headers.set("Content-Length", String(body.length));
  }

  const version = response.version ?? DEFAULT_HTTP_VERSION;
  const lines = [
    `${version} ${response.status} ${statusMessage(response.status)}`,
  ];
  const names = [...headers.keys()].sort();
  for (const name of names) {
    lines.push(`${name}: ${headers.get(name)}`);
  }
  lines.push("", "");

  return concat([fromString(lines.join(CRLF)), body]);
}

/**
 * Write a complete response (headers + body) to a socket, waiting for the
 * write to drain when the socket supports it.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const data = serializeResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(data);
    return;
  }
  socket.send(data);
}

/**
 * Serialize a request the way a client would put it on the wire. Headers keep
 * map order; `Content-Length` is added for a non-empty body when missing.
 */
export function serializeRequest(request: HttpRequest): Uint8Array {
  const headers = new Map(request.headers);
  if (request.body.length > 0 && !hasHeader(headers, "Content-Length")) {
    headers.set("Content-Length", String(request.body.length));
  }

  const lines = [`${request.method} ${request.path} ${request.version}`];
  for (const [name, value] of headers) {
    lines.push(`${name}: ${value}`);
  }
  lines.push("", "");

  return concat([fromString(lines.join(CRLF)), request.body]);
}

function hasHeader(headers: Map<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  for (const key of headers.keys()) {
    if (key.toLowerCase() === wanted) return true;
  }
  return false;
}

function toHeaderMap(headers?: HttpHeaders): Map<string, string> {
  if (!headers) return new Map();
  if (headers instanceof Map) return new Map(headers);
  return new Map(Object.entries(headers));
}
