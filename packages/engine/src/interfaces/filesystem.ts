/**
 * Abstract File System Interface
 *
 * The `/files` routes only ever read or replace whole files.
 */

export interface IFileSystem {
  /** Read the whole file. Rejects if it is missing or not a regular file. */
  readFile(path: string): Promise<Uint8Array>

  /**
   * Create the file, or truncate an existing one, and write `data` to it.
   * Parent directories are not created.
   */
  writeFile(path: string, data: Uint8Array): Promise<void>
}
