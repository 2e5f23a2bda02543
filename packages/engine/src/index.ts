// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  defaultConfig,
} from "./config/server-config.js";
// HTTP
export type {
  HttpRequestHead,
  HttpRequestParseErrorCode,
} from "./http/request-parser.js";
export {
  createHttpRequestParser,
  HttpRequestParseError,
  HttpRequestStreamParser,
  parseContentLength,
  parseHttpRequest,
  parseRequestBytes,
} from "./http/request-parser.js";
export {
  sendResponse,
  serializeRequest,
  serializeResponse,
} from "./http/response-writer.js";
export type { HttpHeaders, HttpRequest, HttpResponse } from "./http/types.js";
export {
  DEFAULT_HTTP_VERSION,
  getHeader,
  STATUS_TEXT,
  statusMessage,
} from "./http/types.js";
// Interfaces
export type {
  FileOpenMode,
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { LogEntry, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LogStore,
  memoryLogger,
  prefixedLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type { HandlerContext, RouteHandler } from "./server/handlers.js";
export { ROUTE_HANDLERS } from "./server/handlers.js";
export type { RouteKind } from "./server/router.js";
export { routeRequest } from "./server/router.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
