import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";

export class InMemoryTcpSocket implements ITcpSocket {
  remoteAddress?: string;
  remotePort?: number;

  private peer: InMemoryTcpSocket | null = null;
  private closed = false;
  private dataCallbacks: Array<(data: Uint8Array) => void> = [];
  private closeCallbacks: Array<(hadError: boolean) => void> = [];
  private errorCallbacks: Array<(err: Error) => void> = [];

  static createPair(): [InMemoryTcpSocket, InMemoryTcpSocket] {
    const a = new InMemoryTcpSocket();
    const b = new InMemoryTcpSocket();
    a.peer = b;
    b.peer = a;
    a.remoteAddress = "in-memory";
    b.remoteAddress = "in-memory";
    a.remotePort = 1;
    b.remotePort = 2;
    return [a, b];
  }

  send(data: Uint8Array): void {
    if (this.closed || !this.peer || this.peer.closed) {
      return;
    }

    const copy = data.slice();
    queueMicrotask(() => {
      this.peer?.emitData(copy);
    });
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error("Socket is not writable"));
    }
    this.send(data);
    return Promise.resolve();
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.dataCallbacks.push(cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.closeCallbacks.push(cb);
  }

  onError(cb: (err: Error) => void): void {
    this.errorCallbacks.push(cb);
  }

  close(): void {
    this.closeInternal(false);
  }

  private emitData(data: Uint8Array): void {
    if (this.closed) return;
    for (const cb of this.dataCallbacks) {
      cb(data);
    }
  }

  private closeInternal(fromPeer: boolean): void {
    if (this.closed) return;
    this.closed = true;

    for (const cb of this.closeCallbacks) {
      cb(false);
    }

    const peer = this.peer;
    if (!fromPeer && peer) {
      // Queued behind any data already sent, like a FIN on a real socket.
      queueMicrotask(() => peer.closeInternal(true));
    }
  }
}

class InMemoryTcpServer implements ITcpServer {
  private listening = false;
  private port: number | null = null;
  private connectionCallbacks: Array<(socket: unknown) => void> = [];

  constructor(private readonly allocatePort: () => number) {}

  listen(port: number, _host?: string, callback?: () => void): void {
    this.port = port === 0 ? this.allocatePort() : port;
    this.listening = true;
    queueMicrotask(() => callback?.());
  }

  address(): { port: number } | null {
    if (!this.listening || this.port === null) {
      return null;
    }
    return { port: this.port };
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    if (event === "connection") {
      this.connectionCallbacks.push(cb as (socket: unknown) => void);
    }
    // Errors are never raised by the in-memory listener.
  }

  close(callback?: () => void): void {
    this.listening = false;
    this.port = null;
    queueMicrotask(() => callback?.());
  }

  isListening(): boolean {
    return this.listening;
  }

  accept(socket: InMemoryTcpSocket): void {
    if (!this.listening) {
      throw new Error("In-memory server is not listening");
    }
    for (const cb of this.connectionCallbacks) {
      cb(socket);
    }
  }
}

export interface InMemoryConnection {
  /** Client end of the connection. */
  socket: InMemoryTcpSocket;
  /** Resolves with every byte the server sent once the connection closes. */
  response: Promise<Uint8Array>;
}

export interface InMemoryRequestOptions {
  /** Close the client end right after the payload is sent. */
  closeAfterSend?: boolean;
}

export class InMemorySocketFactory implements ISocketFactory {
  private nextPort = 41000;
  private server: InMemoryTcpServer | null = null;

  createTcpServer(): ITcpServer {
    const server = new InMemoryTcpServer(() => this.nextPort++);
    this.server = server;
    return server;
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof InMemoryTcpSocket)) {
      throw new Error("Expected an InMemoryTcpSocket instance");
    }
    return socket;
  }

  /** Open a connection whose client end the caller drives by hand. */
  connect(timeoutMs = 1000): InMemoryConnection {
    const server = this.server;
    if (!server || !server.isListening()) {
      throw new Error("In-memory server is not listening");
    }

    const [clientSocket, serverSocket] = InMemoryTcpSocket.createPair();

    const response = new Promise<Uint8Array>((resolve, reject) => {
      const chunks: Uint8Array[] = [];
      let done = false;

      const timeout = setTimeout(() => {
        if (done) return;
        done = true;
        reject(new Error("Timed out waiting for in-memory response"));
      }, timeoutMs);

      clientSocket.onData((data) => {
        chunks.push(data.slice());
      });
      clientSocket.onClose(() => {
        if (done) return;
        done = true;
        clearTimeout(timeout);
        resolve(concat(chunks));
      });
      clientSocket.onError((err) => {
        if (done) return;
        done = true;
        clearTimeout(timeout);
        reject(err);
      });
    });

    server.accept(serverSocket);
    return { socket: clientSocket, response };
  }

  /** Send a raw request on a fresh connection and collect the reply. */
  async request(
    rawHttp: string | Uint8Array,
    options?: InMemoryRequestOptions,
  ): Promise<Uint8Array> {
    const payload = typeof rawHttp === "string" ? fromString(rawHttp) : rawHttp;
    const { socket, response } = this.connect();

    queueMicrotask(() => {
      socket.send(payload);
      if (options?.closeAfterSend) {
        socket.close();
      }
    });

    return response;
  }
}
