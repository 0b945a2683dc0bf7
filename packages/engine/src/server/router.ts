import type { Compressor } from "../http/compression.js";
import type { HttpRequest, HttpResponseOptions } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { FileHandler } from "./file-handler.js";
import { echoHandler, emptyResponse, userAgentHandler } from "./handlers.js";

export interface RouterOptions {
  /** Base directory for /files. */
  directory: string;
  fs: IFileSystem;
  logger?: Logger;
  /** Replaces the gzip compressor used by /echo. */
  compress?: Compressor;
}

const FILE_METHODS = "GET, POST";

/**
 * Fixed, ordered prefix routes. The first match wins:
 *
 *   /              200, empty
 *   /echo...       echo the rest of the path after "/echo/"
 *   /user-agent... echo the User-Agent header
 *   /files...      GET reads, POST creates, anything else is 405
 *   otherwise      404
 */
export class Router {
  private files: FileHandler;
  private logger?: Logger;
  private compress?: Compressor;

  constructor(options: RouterOptions) {
    this.logger = options.logger;
    this.compress = options.compress;
    this.files = new FileHandler({
      directory: options.directory,
      fs: options.fs,
      logger: options.logger,
    });
  }

  async dispatch(request: HttpRequest): Promise<HttpResponseOptions> {
    const { method, path, headers } = request;

    if (path === "/") {
      return emptyResponse(200);
    }

    if (path.startsWith("/echo")) {
      return echoHandler(
        trimPrefix(path, "/echo/"),
        headers.get("accept-encoding"),
        { compress: this.compress, logger: this.logger },
      );
    }

    if (path.startsWith("/user-agent")) {
      return userAgentHandler(headers.get("user-agent"));
    }

    if (path.startsWith("/files")) {
      const name = trimPrefix(path, "/files/");
      if (method === "GET") {
        return this.files.read(name);
      }
      if (method === "POST") {
        return this.files.create(name, request.body);
      }
      return emptyResponse(405, new Map([["Allow", FILE_METHODS]]));
    }

    return emptyResponse(404);
  }
}

function trimPrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}
