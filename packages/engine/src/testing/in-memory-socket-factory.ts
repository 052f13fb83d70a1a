import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";

export class InMemoryTcpSocket implements ITcpSocket {
  remoteAddress?: string;
  remotePort?: number;
  closeCount = 0;

  private peer: InMemoryTcpSocket | null = null;
  private closed = false;
  private ended = false;
  private dataCallbacks: Array<(data: Uint8Array) => void> = [];
  private endCallbacks: Array<() => void> = [];
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

  get isClosed(): boolean {
    return this.closed;
  }

  send(data: Uint8Array): void {
    if (this.closed || this.ended || !this.peer || this.peer.closed) {
      return;
    }

    const copy = data.slice();
    queueMicrotask(() => {
      this.peer?.emitData(copy);
    });
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    this.send(data);
    return Promise.resolve();
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.dataCallbacks.push(cb);
  }

  onEnd(cb: () => void): void {
    this.endCallbacks.push(cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.closeCallbacks.push(cb);
  }

  /**
   * Half-close: stop sending but keep receiving, like `socket.end()` on an
   * `allowHalfOpen` connection.
   */
  end(): void {
    if (this.closed || this.ended) return;
    this.ended = true;
    queueMicrotask(() => this.peer?.emitEnd());
  }

  onError(cb: (err: Error) => void): void {
    this.errorCallbacks.push(cb);
  }

  close(): void {
    this.closeCount++;
    // Let data already queued for the peer arrive before the close does.
    queueMicrotask(() => this.closeInternal(false));
  }

  /** Simulate a transport failure on this end of the pair. */
  fail(err: Error): void {
    for (const cb of this.errorCallbacks) {
      cb(err);
    }
    this.closeInternal(false);
  }

  private emitData(data: Uint8Array): void {
    if (this.closed) return;
    for (const cb of this.dataCallbacks) {
      cb(data);
    }
  }

  private emitEnd(): void {
    if (this.closed) return;
    for (const cb of this.endCallbacks) {
      cb();
    }
  }

  private closeInternal(fromPeer: boolean): void {
    if (this.closed) return;
    this.closed = true;

    for (const cb of this.closeCallbacks) {
      cb(false);
    }

    if (!fromPeer && this.peer) {
      this.peer.closeInternal(true);
    }
  }
}

export class InMemoryTcpServer implements ITcpServer {
  private listening = false;
  private port: number | null = null;
  private connectionCallbacks: Array<(socket: unknown) => void> = [];
  private errorCallbacks: Array<(err: Error) => void> = [];

  constructor(
    private readonly allocatePort: () => number,
    private readonly listenError: Error | null = null,
  ) {}

  listen(port: number, _host?: string, callback?: () => void): void {
    if (this.listenError) {
      const err = this.listenError;
      queueMicrotask(() => this.emitError(err));
      return;
    }
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
      return;
    }
    this.errorCallbacks.push(cb as (err: Error) => void);
  }

  close(callback?: () => void): void {
    this.listening = false;
    this.port = null;
    queueMicrotask(() => callback?.());
  }

  isListening(): boolean {
    return this.listening;
  }

  /** Fault injection: report an error the way a failed accept would. */
  emitError(err: Error): void {
    for (const cb of this.errorCallbacks) {
      cb(err);
    }
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

/** Client end of an in-memory connection, for step-by-step scenarios. */
export interface InMemoryClient {
  socket: InMemoryTcpSocket;
  /** The server-side socket handed to the listener. */
  serverSocket: InMemoryTcpSocket;
  /** Resolves with every byte the server wrote, once the connection closes. */
  response: Promise<Uint8Array>;
}

export class InMemorySocketFactory implements ISocketFactory {
  private nextPort = 41000;
  private server: InMemoryTcpServer | null = null;
  private listenError: Error | null = null;

  /** Make the next server's `listen` fail, like a port already in use. */
  failNextListen(err: Error): void {
    this.listenError = err;
  }

  createTcpServer(): ITcpServer {
    const server = new InMemoryTcpServer(
      () => this.nextPort++,
      this.listenError,
    );
    this.listenError = null;
    this.server = server;
    return server;
  }

  get currentServer(): InMemoryTcpServer | null {
    return this.server;
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof InMemoryTcpSocket)) {
      throw new Error("Expected an InMemoryTcpSocket instance");
    }
    return socket;
  }

  /** Open a connection without sending anything yet. */
  connect(timeoutMs = 1000): InMemoryClient {
    if (!this.server || !this.server.isListening()) {
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
    });

    this.server.accept(serverSocket);
    return { socket: clientSocket, serverSocket, response };
  }

  /**
   * Send one raw request and collect everything written back. With
   * `halfClose` the client ends its side right after sending.
   */
  async request(
    rawHttp: string | Uint8Array,
    options: { halfClose?: boolean } = {},
  ): Promise<Uint8Array> {
    const payload = typeof rawHttp === "string" ? fromString(rawHttp) : rawHttp;
    const client = this.connect();
    queueMicrotask(() => {
      client.socket.send(payload);
      if (options.halfClose) {
        client.socket.end();
      }
    });
    return client.response;
  }
}
