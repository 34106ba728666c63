/**
 * Platform-agnostic file system interface
 * Implementation uses fs/promises + fast-glob
 */

export interface Stats {
  isFile(): boolean;
  isDirectory(): boolean;
  size: number;
  mtime: Date;
}

export interface GlobOptions {
  cwd?: string;
  ignore?: string[];
  dot?: boolean;
}

export interface IFileSystem {
  /**
   * Read file contents as string
   */
  readFile(path: string, encoding?: BufferEncoding): Promise<string>;

  /**
   * Read file contents as raw bytes
   */
  readFileBuffer(path: string): Promise<Buffer>;

  /**
   * Write text or bytes to a file
   */
  writeFile(path: string, content: string | Uint8Array, encoding?: BufferEncoding): Promise<void>;

  /**
   * Check if file or directory exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Create directory (recursive)
   */
  mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;

  /**
   * Create a uniquely named directory; returns its path
   */
  mkdtemp(prefix: string): Promise<string>;

  /**
   * Read directory contents
   */
  readdir(path: string): Promise<string[]>;

  /**
   * Get file/directory stats
   */
  stat(path: string): Promise<Stats>;

  /**
   * Remove a file or a directory tree. Missing paths are not an error.
   */
  remove(path: string): Promise<void>;

  /**
   * Find files matching glob pattern
   */
  glob(pattern: string, options?: GlobOptions): Promise<string[]>;
}
