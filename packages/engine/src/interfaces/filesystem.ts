/**
 * Abstract file system interfaces. Read-only: the server never writes under
 * its root.
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>

  /** Close the file handle. */
  close(): Promise<void>
}

export interface IFileSystem {
  /** Open a file for reading. */
  open(path: string): Promise<IFileHandle>

  /** Get file statistics. Rejects if the path does not exist. */
  stat(path: string): Promise<IFileStat>

  /** Check if a path exists. */
  exists(path: string): Promise<boolean>

  /**
   * Resolve symlinks to a canonical absolute path. Optional: file systems
   * without links can leave it out.
   */
  realpath?(path: string): Promise<string>
}
