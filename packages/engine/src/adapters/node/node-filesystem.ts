import * as fs from "node:fs/promises";
import type { IFileSystem } from "../../interfaces/filesystem.js";

export class NodeFileSystem implements IFileSystem {
  async readFile(filePath: string): Promise<Uint8Array> {
    const data = await fs.readFile(filePath);
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }

  async writeFile(filePath: string, data: Uint8Array): Promise<void> {
    // "w" creates or truncates; a missing parent directory is an error.
    await fs.writeFile(filePath, data, { flag: "w" });
  }
}
