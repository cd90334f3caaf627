import { type ServerConfig, validateConfig } from "../config/server-config.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import { errorCode } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import {
  type ConnectionOutcome,
  ConnectionHandler,
} from "./connection-handler.js";
import { FileResolver } from "./file-resolver.js";
import { WorkerPool } from "./worker-pool.js";

/** Accept-time failures that leave the listening socket usable. */
const TRANSIENT_ACCEPT_ERRORS = new Set([
  "EMFILE",
  "ENFILE",
  "ECONNABORTED",
  "ECONNRESET",
  "EAGAIN",
  "EWOULDBLOCK",
  "EINTR",
]);

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
}

export type WebServerEvents = {
  listening: [port: number];
  connection: [outcome: ConnectionOutcome];
  error: [err: Error];
  close: [];
};

/**
 * Listener and dispatcher. Accepted sockets go to a fixed-size worker
 * pool; when its queue is full the connection gets an immediate 503, so
 * the number of live handlers never exceeds
 * `workerPoolSize + maxQueuedConnections`.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private resolver: FileResolver;
  private handler: ConnectionHandler;
  private pool: WorkerPool;
  private activeConnections: Set<ITcpSocket> = new Set();
  private stopped: { error: Error | null } | null = null;
  private doneWaiters: Array<{
    resolve: () => void;
    reject: (err: Error) => void;
  }> = [];

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    validateConfig(this.config);

    this.resolver = new FileResolver({
      root: this.config.root,
      fs: options.fileSystem,
      indexFile: this.config.indexFile,
    });
    this.handler = new ConnectionHandler({
      config: this.config,
      resolver: this.resolver,
      logger: this.logger,
    });
    this.pool = new WorkerPool({
      size: this.config.workerPoolSize,
      maxQueue: this.config.maxQueuedConnections,
      onError: (err) => this.logger.error("Connection worker failed:", err),
    });
  }

  /** Connections currently being handled, and those waiting for a worker. */
  get load(): { active: number; queued: number } {
    return { active: this.pool.active, queued: this.pool.pending };
  }

  /**
   * Bind and start accepting. Resolves with the bound port; rejects on a
   * missing document root or a bind failure.
   */
  async start(): Promise<number> {
    if (this.tcpServer) {
      throw new Error("Server is already started");
    }

    await this.resolver.verifyRoot();
    this.stopped = null;

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
          reject(err);
          return;
        }

        const code = errorCode(err);
        if (code && TRANSIENT_ACCEPT_ERRORS.has(code)) {
          this.logger.warn(`Transient accept error (${code}), still listening`);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
        void this.shutdown(err);
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

  /**
   * Settles when the server stops: resolves after `stop()`, rejects with
   * the error that made the listener unusable.
   */
  done(): Promise<void> {
    const stopped = this.stopped;
    if (stopped) {
      return stopped.error ? Promise.reject(stopped.error) : Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.doneWaiters.push({ resolve, reject });
    });
  }

  stop(): Promise<void> {
    return this.shutdown(null);
  }

  private shutdown(fatalError: Error | null): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      this.pool.clear();
      // A graceful close can wait forever on a peer that stopped reading.
      for (const socket of this.activeConnections) {
        socket.destroy();
      }
      this.activeConnections.clear();

      const finish = () => {
        this.stopped = { error: fatalError };
        const waiters = this.doneWaiters;
        this.doneWaiters = [];
        for (const waiter of waiters) {
          if (fatalError) {
            waiter.reject(fatalError);
          } else {
            waiter.resolve();
          }
        }
        this.emit("close");
        resolve();
      };

      if (!server) {
        finish();
        return;
      }

      server.close(finish);
    });
  }

  private dispatch(rawSocket: unknown): void {
    let socket: ITcpSocket;
    try {
      socket = this.socketFactory.wrapTcpSocket(rawSocket);
    } catch (err) {
      this.logger.error("Could not accept connection:", err);
      return;
    }

    this.activeConnections.add(socket);
    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });
    // Covers the time a socket spends queued or being rejected, before
    // the handler listens for errors itself.
    socket.onError((err) => {
      this.logger.debug(
        `Connection error from ${socket.remoteAddress ?? "?"}:`,
        err.message,
      );
      this.activeConnections.delete(socket);
    });

    const accepted = this.pool.submit(async () => {
      if (!this.activeConnections.has(socket)) {
        this.logger.debug(
          `Dropping ${socket.remoteAddress ?? "?"}, closed while queued`,
        );
        return;
      }
      const outcome = await this.handler.handle(socket);
      this.emit("connection", outcome);
    });

    if (!accepted) {
      this.logger.warn(
        `Worker pool saturated, rejecting ${socket.remoteAddress ?? "?"}`,
      );
      void this.handler.reject(socket, 503);
    }
  }
}
