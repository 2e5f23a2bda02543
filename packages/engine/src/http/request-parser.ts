import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, indexOfByte } from "../utils/buffer.js";
import { getHeader, type HttpRequest } from "./types.js";

const LF = 10;
const HEADER_SEPARATOR = ": ";

export interface HttpRequestHead {
  method: string;
  path: string;
  version: string;
  headers: Map<string, string>;
  contentLength: number;
}

export type HttpRequestParseErrorCode =
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_HEADER"
  | "TRUNCATED_BODY"
  | "IO_ERROR";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "HttpRequestParseError";
  }
}

/**
 * `Content-Length` as a non-negative integer. Missing or unparsable values
 * frame an empty body rather than failing the request.
 */
export function parseContentLength(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    return 0;
  }
  const length = Number(value);
  return Number.isSafeInteger(length) ? length : 0;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Line-oriented HTTP/1.1 request reader over a push-fed byte buffer.
 *
 * Bytes arrive through `push`; `end` and `fail` mark the end of the stream.
 * Reads suspend until enough data is buffered or the stream is over.
 */
export class HttpRequestStreamParser {
  private buffer: Uint8Array = new Uint8Array(0);
  private ended = false;
  private streamError: Error | null = null;
  private waiters: Array<() => void> = [];

  push(data: Uint8Array): void {
    if (this.ended) return;
    this.buffer = concat([this.buffer, data]);
    this.notifyWaiters();
  }

  end(): void {
    this.ended = true;
    this.notifyWaiters();
  }

  fail(err: Error): void {
    this.streamError = err;
    this.ended = true;
    this.notifyWaiters();
  }

  /** Bytes received but not consumed yet. */
  get bufferedLength(): number {
    return this.buffer.length;
  }

  async readRequest(): Promise<HttpRequest> {
    const head = await this.readRequestHead();
    const body = await this.readBody(head.contentLength);

    return {
      method: head.method,
      path: head.path,
      version: head.version,
      headers: head.headers,
      body,
    };
  }

  async readRequestHead(): Promise<HttpRequestHead> {
    let requestLine = await this.readLine();
    while (requestLine !== null && requestLine.trim() === "") {
      requestLine = await this.readLine();
    }
    if (requestLine === null) {
      throw new HttpRequestParseError(
        "CONNECTION_CLOSED",
        "Connection closed before a request was received",
      );
    }

    const parts = requestLine.trim().split(/\s+/);
    if (parts.length < 3) {
      throw new HttpRequestParseError(
        "MALFORMED_REQUEST_LINE",
        `Malformed request line: ${JSON.stringify(requestLine)}`,
      );
    }
    const [method, path, version] = parts;

    const headers = new Map<string, string>();
    while (true) {
      const line = await this.readLine();
      if (line === null) {
        throw new HttpRequestParseError(
          "CONNECTION_CLOSED_INCOMPLETE",
          "Connection closed before the request headers were complete",
        );
      }
      if (line === "") break;

      const separatorIdx = line.indexOf(HEADER_SEPARATOR);
      if (separatorIdx === -1) {
        throw new HttpRequestParseError(
          "MALFORMED_HEADER",
          `Malformed header line: ${JSON.stringify(line)}`,
        );
      }

      const name = line.slice(0, separatorIdx).trim();
      const value = line.slice(separatorIdx + HEADER_SEPARATOR.length).trim();
      // Blank names and values are dropped, not rejected.
      if (name && value) {
        headers.set(name, value);
      }
    }

    return {
      method,
      path,
      version,
      headers,
      contentLength: parseContentLength(getHeader(headers, "Content-Length")),
    };
  }

  /**
   * Next line with its LF terminator and one trailing CR removed. At end of
   * stream an unterminated remainder is returned once, then `null`.
   */
  async readLine(): Promise<string | null> {
    while (true) {
      const lfIdx = indexOfByte(this.buffer, LF);
      if (lfIdx !== -1) {
        const line = decodeToString(this.buffer.subarray(0, lfIdx));
        this.buffer = this.buffer.slice(lfIdx + 1);
        return stripCarriageReturn(line);
      }

      this.throwIfFailed();

      if (this.ended) {
        if (this.buffer.length === 0) return null;
        const rest = decodeToString(this.buffer);
        this.buffer = new Uint8Array(0);
        return stripCarriageReturn(rest);
      }

      await this.waitForActivity();
    }
  }

  async readBody(contentLength: number): Promise<Uint8Array> {
    while (this.buffer.length < contentLength) {
      this.throwIfFailed();

      if (this.ended) {
        throw new HttpRequestParseError(
          "TRUNCATED_BODY",
          `Expected a ${contentLength} byte body, received ${this.buffer.length}`,
        );
      }

      await this.waitForActivity();
    }

    const body = this.buffer.slice(0, contentLength);
    this.buffer = this.buffer.slice(contentLength);
    return body;
  }

  private throwIfFailed(): void {
    if (this.streamError) {
      throw new HttpRequestParseError("IO_ERROR", this.streamError.message, {
        cause: this.streamError,
      });
    }
  }

  private waitForActivity(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

export function createHttpRequestParser(
  socket: ITcpSocket,
): HttpRequestStreamParser {
  const parser = new HttpRequestStreamParser();
  socket.onData((data) => parser.push(data));
  socket.onClose(() => parser.end());
  socket.onError((err) => parser.fail(err));
  return parser;
}

/**
 * Parse a single HTTP/1.1 request from a TCP socket stream.
 * Returns a promise that resolves with the parsed request.
 */
export function parseHttpRequest(socket: ITcpSocket): Promise<HttpRequest> {
  return createHttpRequestParser(socket).readRequest();
}

/** Parse a request that is already fully in memory. */
export function parseRequestBytes(data: Uint8Array): Promise<HttpRequest> {
  const parser = new HttpRequestStreamParser();
  parser.push(data);
  parser.end();
  return parser.readRequest();
}
