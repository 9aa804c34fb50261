import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomBytes } from "node:crypto";
import { IoError, type FileSystem } from "./types.js";

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Node.js filesystem implementation.
 */
export class NodeFileSystem implements FileSystem {
  async read(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (e) {
      throw new IoError(`Cannot read ${filePath}: ${describe(e)}`, filePath, "read", {
        cause: e,
      });
    }
  }

  /**
   * Write to a temporary file beside the target, flush it, then rename it
   * over the target.
   */
  async write(filePath: string, content: string): Promise<void> {
    const temp = this.tempPathFor(filePath);

    try {
      const handle = await fs.open(temp, "wx");
      try {
        await handle.writeFile(content, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(temp, filePath);
    } catch (e) {
      let leftover = "";
      try {
        await fs.rm(temp, { force: true });
      } catch (rmError) {
        leftover = `; could not remove ${temp}: ${describe(rmError)}`;
      }
      throw new IoError(
        `Cannot write ${filePath}: ${describe(e)}${leftover}`,
        filePath,
        "write",
        { cause: e }
      );
    }
  }

  /**
   * Sibling path the content is staged in before the rename.
   */
  protected tempPathFor(filePath: string): string {
    return path.join(
      path.dirname(filePath),
      `.${path.basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`
    );
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async stat(filePath: string): Promise<{ mtime: Date; size: number }> {
    try {
      const stats = await fs.stat(filePath);
      return {
        mtime: stats.mtime,
        size: stats.size,
      };
    } catch (e) {
      throw new IoError(`Cannot stat ${filePath}: ${describe(e)}`, filePath, "stat", {
        cause: e,
      });
    }
  }
}
