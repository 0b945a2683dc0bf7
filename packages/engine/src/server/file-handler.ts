import * as path from "node:path";
import type { HttpResponseOptions } from "../http/types.js";
import { STATUS_TEXT } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { emptyResponse } from "./handlers.js";

export interface FileHandlerOptions {
  /** Base directory. Names are joined onto it without sandboxing. */
  directory: string;
  fs: IFileSystem;
  logger?: Logger;
}

export class FileHandler {
  private directory: string;
  private fs: IFileSystem;
  private logger?: Logger;

  constructor(options: FileHandlerOptions) {
    this.directory = options.directory;
    this.fs = options.fs;
    this.logger = options.logger;
  }

  resolve(name: string): string {
    return path.join(this.directory, name);
  }

  /** 200 with the file bytes, or 404 if it cannot be read for any reason. */
  async read(name: string): Promise<HttpResponseOptions> {
    const filePath = this.resolve(name);
    let data: Uint8Array;
    try {
      data = await this.fs.readFile(filePath);
    } catch (err) {
      this.logger?.debug(`File not readable: ${filePath}`, err);
      return emptyResponse(404);
    }

    this.logger?.debug(`File found: ${filePath} (${data.length} bytes)`);
    return {
      status: 200,
      statusText: STATUS_TEXT[200],
      headers: new Map([
        ["Content-Type", "application/octet-stream"],
        ["Content-Length", String(data.length)],
      ]),
      body: data,
    };
  }

  /** Create or replace the file with `body`: 201, or 400 on any I/O error. */
  async create(name: string, body: Uint8Array): Promise<HttpResponseOptions> {
    const filePath = this.resolve(name);
    try {
      await this.fs.writeFile(filePath, body);
    } catch (err) {
      this.logger?.warn(`Error creating file: ${filePath}`, err);
      return emptyResponse(400);
    }

    this.logger?.debug(`Wrote ${body.length} bytes to ${filePath}`);
    return emptyResponse(201);
  }
}
