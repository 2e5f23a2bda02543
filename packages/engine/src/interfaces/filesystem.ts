/**
 * Abstract File System Interfaces
 *
 * The file handlers only ever read a whole file or replace one, so the
 * surface is small: open, stat, and positional reads and writes.
 */

export interface IFileStat {
  size: number;
  isDirectory: boolean;
  isFile: boolean;
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>;

  /** Write data to the file at a specific position. */
  write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }>;

  /** Close the file handle. */
  close(): Promise<void>;
}

export type FileOpenMode = "r" | "w";

export interface IFileSystem {
  /**
   * Open a file. `"r"` requires an existing file; `"w"` creates or
   * truncates it. Parent directories are never created.
   */
  open(path: string, mode: FileOpenMode): Promise<IFileHandle>;

  /** Get file statistics. */
  stat(path: string): Promise<IFileStat>;
}
