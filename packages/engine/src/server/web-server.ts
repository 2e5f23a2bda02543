import type { ServerConfig } from "../config/server-config.js";
import {
  createHttpRequestParser,
  HttpRequestParseError,
} from "../http/request-parser.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger, filteredLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { type HandlerContext, ROUTE_HANDLERS } from "./handlers.js";
import { routeRequest } from "./router.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
}

export type WebServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
  /** A request was answered. */
  request: [request: HttpRequest, status: number];
  /** A connection was dropped before a response could be written. */
  "connection-error": [err: Error];
};

export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private handlerContext: Readonly<HandlerContext>;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger =
      options.logger ?? filteredLogger(this.config.logLevel, basicLogger());
    this.handlerContext = Object.freeze({
      directory: this.config.directory,
      fileSystem: options.fileSystem,
      logger: this.logger,
    });
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      // Hand off immediately: each connection runs as its own task.
      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Rejected connection:", err);
          return;
        }
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Unhandled connection failure:", err);
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  /**
   * One exchange per connection: parse, route, handle, write, close. A parse
   * or transport failure closes the connection without a response.
   */
  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const peer = socket.remoteAddress ?? "?";
    const parser = createHttpRequestParser(socket);

    try {
      let request: HttpRequest;
      try {
        request = await parser.readRequest();
      } catch (err) {
        this.reportDroppedConnection(err, peer);
        return;
      }

      const response = await this.dispatch(request);

      try {
        await sendResponse(socket, response);
      } catch (err) {
        this.reportDroppedConnection(err, peer);
        return;
      }

      if (!this.config.quiet) {
        this.logger.info(
          `${request.method} ${request.path} ${response.status} - ${peer}`,
        );
      }
      this.emit("request", request, response.status);
    } finally {
      socket.close();
      this.activeConnections.delete(socket);
    }
  }

  private async dispatch(request: HttpRequest): Promise<HttpResponse> {
    const route = routeRequest(request.method, request.path);
    try {
      return await ROUTE_HANDLERS[route](request, this.handlerContext);
    } catch (err) {
      this.logger.error(
        `Handler "${route}" failed for ${request.method} ${request.path}:`,
        err,
      );
      return { status: 500 };
    }
  }

  private reportDroppedConnection(err: unknown, peer: string): void {
    if (
      err instanceof HttpRequestParseError &&
      err.code === "CONNECTION_CLOSED"
    ) {
      this.logger.debug(`Connection from ${peer} closed without a request`);
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    this.logger.warn(`Dropped connection from ${peer}: ${error.message}`);
    this.emit("connection-error", error);
  }
}
