import type { IFileSystem } from "../interfaces/filesystem.js";

/**
 * Path-keyed file store for tests. Paths are POSIX-normalized; the root
 * directory always exists and others are made with `mkdir`.
 */
export class InMemoryFileSystem implements IFileSystem {
  private readonly files = new Map<string, Uint8Array>();
  private readonly directories = new Set<string>(["/"]);

  async mkdir(path: string): Promise<void> {
    const normalized = normalizePath(path);
    const segments = normalized === "/" ? [] : normalized.slice(1).split("/");
    let current = "/";
    for (const segment of segments) {
      current = current === "/" ? `/${segment}` : `${current}/${segment}`;
      if (this.files.has(current)) {
        throw new Error(`ENOTDIR: file exists where directory expected: ${current}`);
      }
      this.directories.add(current);
    }
  }

  async readFile(path: string): Promise<Uint8Array> {
    const normalized = normalizePath(path);
    if (this.directories.has(normalized)) {
      throw new Error(`EISDIR: illegal operation on a directory: ${normalized}`);
    }
    const data = this.files.get(normalized);
    if (!data) {
      throw new Error(`ENOENT: no such file or directory: ${normalized}`);
    }
    return data.slice();
  }

  async writeFile(path: string, data: Uint8Array): Promise<void> {
    const normalized = normalizePath(path);
    if (this.directories.has(normalized)) {
      throw new Error(`EISDIR: illegal operation on a directory: ${normalized}`);
    }
    const parent = parentDirectory(normalized);
    if (!this.directories.has(parent)) {
      throw new Error(`ENOENT: no such file or directory: ${parent}`);
    }
    this.files.set(normalized, data.slice());
  }
}

function normalizePath(path: string): string {
  const slashNormalized = path.replace(/\\/g, "/");
  const withRoot = slashNormalized.startsWith("/")
    ? slashNormalized
    : `/${slashNormalized}`;

  const parts = withRoot.split("/");
  const output: string[] = [];

  for (const part of parts) {
    if (part === "" || part === ".") {
      continue;
    }
    if (part === "..") {
      output.pop();
      continue;
    }
    output.push(part);
  }

  return output.length === 0 ? "/" : `/${output.join("/")}`;
}

function parentDirectory(path: string): string {
  if (path === "/") {
    return "/";
  }
  const idx = path.lastIndexOf("/");
  return idx <= 0 ? "/" : path.slice(0, idx);
}
