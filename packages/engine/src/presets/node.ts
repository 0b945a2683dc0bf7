import { NodeFileSystem, NodeSocketFactory } from "../adapters/node/index.js";
import { defaultConfig, type ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import { WebServer } from "../server/web-server.js";

export interface NodeServerOptions {
  /** Base directory for /files. */
  directory: string;
  /** Overrides applied on top of `defaultConfig(directory)`. */
  config?: Partial<Omit<ServerConfig, "directory">>;
  logger?: Logger;
}

/** A WebServer over node:net sockets and the local filesystem. */
export function createNodeServer(options: NodeServerOptions): WebServer {
  return new WebServer({
    socketFactory: new NodeSocketFactory(),
    fileSystem: new NodeFileSystem(),
    config: { ...defaultConfig(options.directory), ...options.config },
    logger: options.logger,
  });
}
