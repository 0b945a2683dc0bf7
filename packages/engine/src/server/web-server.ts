import type { ServerConfig } from "../config/server-config.js";
import type { Compressor } from "../http/compression.js";
import {
  HttpRequestReadError,
  parseHttpRequest,
  readRequestBytes,
} from "../http/request-parser.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest, HttpResponseOptions } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { Router } from "./router.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  /** Replaces the gzip compressor used by /echo. */
  compress?: Compressor;
}

export type WebServerEvents = {
  listening: [port: number];
  error: [err: Error];
  close: [];
};

/**
 * One request per connection: read once, parse, route, write once, close.
 * Every accepted socket is served by its own async task; the accept path
 * never waits on a connection.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private router: Router;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.router = new Router({
      directory: this.config.directory,
      fs: options.fileSystem,
      logger: this.logger,
      compress: options.compress,
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

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Error accepting connection:", err);
          return;
        }
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Connection handler failed:", err);
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

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    // Must subscribe before the first await or the request may be missed.
    const pendingRead = readRequestBytes(socket, {
      maxBytes: this.config.readBufferSize,
    });

    try {
      let raw: Uint8Array;
      try {
        raw = await pendingRead;
      } catch (err) {
        this.logReadFailure(err);
        return;
      }

      const request = parseHttpRequest(raw);
      this.logRequest(socket, request);

      const response = await this.router.dispatch(request);

      try {
        await sendResponse(socket, response);
      } catch (err) {
        if (this.tcpServer === null) {
          this.logger.debug("Response dropped during shutdown:", err);
        } else {
          this.logger.error("Error writing response:", err);
        }
        return;
      }
      this.logResponse(response);
    } finally {
      try {
        socket.close();
      } catch (err) {
        this.logger.debug("Socket close failed:", err);
      }
    }
  }

  private logRequest(socket: ITcpSocket, request: HttpRequest): void {
    if (!this.config.quiet) {
      const addr = socket.remoteAddress ?? "?";
      this.logger.info(`${request.method} ${request.path} - ${addr}`);
    }
    this.logger.debug("Headers:", Object.fromEntries(request.headers));
    this.logger.debug(`Body: ${request.body.length} bytes`);
  }

  private logResponse(response: HttpResponseOptions): void {
    this.logger.debug(`Response sent: ${response.status} ${response.statusText}`);
  }

  private logReadFailure(err: unknown): void {
    if (err instanceof HttpRequestReadError && err.code === "CONNECTION_CLOSED") {
      this.logger.debug("Connection closed without a request");
      return;
    }
    this.logger.error("Error reading request:", err);
  }
}
