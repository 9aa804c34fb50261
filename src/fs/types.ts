/**
 * Error thrown when a file cannot be read, written or inspected.
 */
export class IoError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly operation: "read" | "write" | "stat",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "IoError";
  }
}

/**
 * Filesystem abstraction for reading and writing configuration files.
 */
export interface FileSystem {
  /**
   * Read a text file at the given path.
   */
  read(path: string): Promise<string>;

  /**
   * Replace the content of a text file. Either the whole new content lands
   * or the previous file is left as it was.
   */
  write(path: string, content: string): Promise<void>;

  /**
   * Check if a file exists at the given path.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Get modification time and size.
   */
  stat(path: string): Promise<{ mtime: Date; size: number }>;
}
