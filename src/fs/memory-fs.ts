import { IoError, type FileSystem } from "./types.js";

/**
 * File metadata for in-memory files.
 */
interface FileMeta {
  mtime: Date;
  size: number;
}

/**
 * In-memory filesystem implementation for testing.
 */
export class MemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private fileMeta = new Map<string, FileMeta>();
  private failingWrites = new Set<string>();

  constructor(initialFiles?: Record<string, string>) {
    if (initialFiles) {
      for (const [path, content] of Object.entries(initialFiles)) {
        this.setFile(path, content);
      }
    }
  }

  private normalizePath(path: string): string {
    // Normalize path separators and collapse repeated slashes
    return path.replace(/\\/g, "/").replace(/\/+/g, "/");
  }

  read(path: string): Promise<string> {
    const content = this.files.get(this.normalizePath(path));
    if (content === undefined) {
      return Promise.reject(new IoError(`File not found: ${path}`, path, "read"));
    }
    return Promise.resolve(content);
  }

  write(path: string, content: string): Promise<void> {
    const normalized = this.normalizePath(path);
    if (this.failingWrites.has(normalized)) {
      return Promise.reject(new IoError(`Write refused: ${path}`, path, "write"));
    }
    this.setFile(normalized, content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(this.normalizePath(path)));
  }

  stat(path: string): Promise<{ mtime: Date; size: number }> {
    const meta = this.fileMeta.get(this.normalizePath(path));
    if (meta) {
      return Promise.resolve({ mtime: meta.mtime, size: meta.size });
    }
    return Promise.reject(new IoError(`File not found: ${path}`, path, "stat"));
  }

  /**
   * Set a file's content directly (useful for testing).
   */
  setFile(path: string, content: string): void {
    const normalized = this.normalizePath(path);
    this.files.set(normalized, content);
    this.fileMeta.set(normalized, {
      mtime: new Date(),
      size: new TextEncoder().encode(content).length,
    });
  }

  /**
   * Set a file's modification time (useful for testing staleness).
   */
  setMtime(path: string, mtime: Date): void {
    const normalized = this.normalizePath(path);
    const meta = this.fileMeta.get(normalized);
    if (meta) {
      this.fileMeta.set(normalized, { ...meta, mtime });
    }
  }

  /**
   * Make every write to a path fail (useful for testing error paths).
   */
  failWritesTo(path: string): void {
    this.failingWrites.add(this.normalizePath(path));
  }

  /**
   * Remove a file.
   */
  delete(path: string): void {
    const normalized = this.normalizePath(path);
    this.files.delete(normalized);
    this.fileMeta.delete(normalized);
  }
}
