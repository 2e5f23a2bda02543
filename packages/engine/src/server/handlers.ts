import {
  getHeader,
  type HttpRequest,
  type HttpResponse,
} from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";
import { ECHO_PREFIX, FILES_PREFIX, type RouteKind } from "./router.js";

export interface HandlerContext {
  /** Directory backing `/files/{name}`; shared read-only by every connection. */
  directory?: string;
  fileSystem: IFileSystem;
  logger: Logger;
}

export type RouteHandler = (
  request: HttpRequest,
  context: HandlerContext,
) => Promise<HttpResponse>;

function textResponse(text: string): HttpResponse {
  const body = fromString(text);
  return {
    status: 200,
    headers: {
      "Content-Type": "text/plain",
      "Content-Length": String(body.length),
    },
    body,
  };
}

function emptyResponse(status: number): HttpResponse {
  return { status };
}

/**
 * No canonicalization: `..` segments in the name are passed through to the
 * filesystem as-is.
 */
export function resolveFilePath(directory: string, name: string): string {
  return `${directory.replace(/\/+$/, "")}/${name}`;
}

async function readWholeFile(
  fileSystem: IFileSystem,
  filePath: string,
): Promise<Uint8Array> {
  const stat = await fileSystem.stat(filePath);
  if (!stat.isFile) {
    throw new Error(`Not a regular file: ${filePath}`);
  }

  const handle = await fileSystem.open(filePath, "r");
  try {
    const data = new Uint8Array(stat.size);
    let position = 0;
    while (position < data.length) {
      const { bytesRead } = await handle.read(
        data,
        position,
        data.length - position,
        position,
      );
      if (bytesRead === 0) break;
      position += bytesRead;
    }
    return data.subarray(0, position);
  } finally {
    await handle.close();
  }
}

async function writeWholeFile(
  fileSystem: IFileSystem,
  filePath: string,
  data: Uint8Array,
): Promise<void> {
  const handle = await fileSystem.open(filePath, "w");
  try {
    let position = 0;
    while (position < data.length) {
      const { bytesWritten } = await handle.write(
        data,
        position,
        data.length - position,
        position,
      );
      if (bytesWritten === 0) {
        throw new Error(`Short write to ${filePath}`);
      }
      position += bytesWritten;
    }
  } finally {
    await handle.close();
  }
}

export const handleEcho: RouteHandler = async (request) =>
  textResponse(request.path.slice(ECHO_PREFIX.length));

export const handleUserAgent: RouteHandler = async (request) =>
  textResponse(getHeader(request.headers, "User-Agent") ?? "Unknown");

export const handleFileGet: RouteHandler = async (request, context) => {
  if (context.directory === undefined) {
    return emptyResponse(404);
  }

  const filePath = resolveFilePath(
    context.directory,
    request.path.slice(FILES_PREFIX.length),
  );
  try {
    const body = await readWholeFile(context.fileSystem, filePath);
    return {
      status: 200,
      headers: {
        "Content-Type": "application/octet-stream",
        "Content-Length": String(body.length),
      },
      body,
    };
  } catch (err) {
    context.logger.debug(`Read of ${filePath} failed:`, err);
    return emptyResponse(404);
  }
};

// Concurrent writes to one name are not serialized; the last writer wins.
export const handleFilePost: RouteHandler = async (request, context) => {
  if (context.directory === undefined) {
    return emptyResponse(500);
  }

  const filePath = resolveFilePath(
    context.directory,
    request.path.slice(FILES_PREFIX.length),
  );
  try {
    await writeWholeFile(context.fileSystem, filePath, request.body);
    return emptyResponse(201);
  } catch (err) {
    context.logger.debug(`Write of ${filePath} failed:`, err);
    return emptyResponse(500);
  }
};

export const handleSuccess: RouteHandler = async () => ({
  status: 200,
  headers: { "Content-Type": "text/plain" },
});

export const handleNotFound: RouteHandler = async () => emptyResponse(404);

export const ROUTE_HANDLERS: Readonly<Record<RouteKind, RouteHandler>> = {
  echo: handleEcho,
  "user-agent": handleUserAgent,
  "file-get": handleFileGet,
  "file-post": handleFilePost,
  success: handleSuccess,
  "not-found": handleNotFound,
};
