import type { ServerConfig } from "../config/server-config.js";
import { ResponseBuilder } from "../http/response-builder.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import {
  type ConnectionContext,
  ConnectionHandler,
  type ConnectionOutcome,
} from "./connection-handler.js";
import { MimeRegistry } from "./mime-registry.js";
import { PathResolver } from "./path-resolver.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
}

export interface ServerState {
  port: number;
  rootDirectory: string;
  running: boolean;
}

export type WebServerEvents = {
  listening: [port: number];
  connection: [outcome: ConnectionOutcome];
  close: [];
  error: [err: Error];
};

type Lifecycle = "idle" | "starting" | "running" | "stopped";

export class WebServer extends EventEmitter<WebServerEvents> {
  private readonly socketFactory: ISocketFactory;
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly context: ConnectionContext;
  private tcpServer: ITcpServer | null = null;
  private lifecycle: Lifecycle = "idle";
  private boundPort: number;
  private inFlight: Set<Promise<void>> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
    this.boundPort = this.config.port;

    const mimeRegistry = new MimeRegistry(this.config.mimeTypes);
    this.context = {
      resolver: new PathResolver({
        root: this.config.root,
        mimeRegistry,
        fs: options.fileSystem,
        caseInsensitive: this.config.caseInsensitivePaths,
      }),
      responses: new ResponseBuilder({
        fs: options.fileSystem,
        signature: this.config.serverSignature,
        logger: this.logger,
      }),
      logger: this.logger,
      maxRequestBytes: this.config.maxRequestBytes,
      serverSignature: this.config.serverSignature,
      quiet: this.config.quiet,
    };
  }

  get state(): ServerState {
    return {
      port: this.boundPort,
      rootDirectory: this.context.resolver.root,
      running: this.lifecycle === "running",
    };
  }

  /** Number of connections currently being handled. */
  get activeConnections(): number {
    return this.inFlight.size;
  }

  /**
   * Bind and start accepting. Resolves with the bound port; rejects if the
   * port cannot be bound. A stopped server cannot be started again.
   */
  start(): Promise<number> {
    if (this.lifecycle === "stopped") {
      return Promise.reject(new Error("Server has been stopped"));
    }
    if (this.lifecycle !== "idle") {
      return Promise.reject(new Error("Server is already started"));
    }
    this.lifecycle = "starting";

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        this.dispatch(rawSocket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          this.lifecycle = "stopped";
          reject(err);
          return;
        }

        if (this.lifecycle !== "running") {
          // The listener was closed on purpose; whatever it reports now is
          // part of shutting down.
          this.logger.debug("Listener error after stop:", err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        if (this.lifecycle !== "starting") {
          server.close();
          reject(new Error("Server was stopped during startup"));
          return;
        }
        this.lifecycle = "running";
        this.boundPort = server.address()?.port ?? this.config.port;
        this.emit("listening", this.boundPort);
        resolve(this.boundPort);
      });
    });
  }

  /**
   * Stop accepting connections. Handlers already dispatched keep running to
   * completion; use `idle()` to wait for them.
   */
  async stop(): Promise<void> {
    if (this.lifecycle === "stopped") return;
    this.lifecycle = "stopped";

    const server = this.tcpServer;
    this.tcpServer = null;
    if (!server) {
      this.emit("close");
      return;
    }

    server.close(() => {
      this.emit("close");
    });
  }

  /** Resolves once every in-flight connection handler has finished. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private dispatch(rawSocket: unknown): void {
    let socket: ITcpSocket;
    try {
      socket = this.socketFactory.wrapTcpSocket(rawSocket);
    } catch (err) {
      this.logger.error("Rejected incoming connection:", err);
      return;
    }

    const handler = new ConnectionHandler(socket, this.context);
    const task = handler
      .run()
      .then((outcome) => {
        this.emit("connection", outcome);
      })
      .catch((err: unknown) => {
        this.logger.error("Connection handler failed:", err);
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}
