import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  filteredLogger,
  type Logger,
  prefixedLogger,
  type WebServer,
} from "@tinyhttpd/engine";
import type { CliOptions } from "./args.js";

export interface RunningServer {
  server: WebServer;
  port: number;
  /** Absolute base directory for /files. */
  directory: string;
  logger: Logger;
}

/**
 * Build the Node server for parsed CLI options and start it. Rejects when the
 * port cannot be bound.
 */
export async function serve(
  options: CliOptions,
  base: Logger = basicLogger(),
): Promise<RunningServer> {
  const directory = path.resolve(options.directory);
  const logger = filteredLogger(
    options.logLevel,
    prefixedLogger("tinyhttpd", base),
  );

  const server = createNodeServer({
    directory,
    config: {
      port: options.port,
      host: options.host,
      quiet: options.quiet,
    },
    logger,
  });

  const port = await server.start();
  return { server, port, directory, logger };
}
