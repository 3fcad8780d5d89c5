import { promises as fs } from "node:fs";
import path from "node:path";
import type { StoragePort } from "../../interfaces/ports";

export class LocalStorage implements StoragePort {
  async exists(filePath: string) {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async isDirectory(dirPath: string) {
    try {
      return (await fs.stat(dirPath)).isDirectory();
    } catch {
      return false;
    }
  }

  async listDirectory(dirPath: string) {
    return fs.readdir(dirPath);
  }

  async walkFiles(root: string, recursive: boolean) {
    const files: string[] = [];
    const pending = [path.resolve(root)];
    while (pending.length) {
      const dir = pending.shift();
      if (dir === undefined) {
        break;
      }
      const entries = await fs.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (recursive) {
            pending.push(fullPath);
          }
        } else if (entry.isFile()) {
          files.push(fullPath);
        }
      }
    }
    return files.sort();
  }

  async ensureDir(dirPath: string) {
    await fs.mkdir(dirPath, { recursive: true });
    return dirPath;
  }

  /** Rename, falling back to copy + unlink when source and target sit on different devices. */
  async move(from: string, to: string) {
    try {
      await fs.rename(from, to);
    } catch (error) {
      if (!isCrossDeviceError(error)) {
        throw error;
      }
      await fs.copyFile(from, to);
      await fs.unlink(from);
    }
  }

  async remove(filePath: string) {
    await fs.rm(filePath, { force: true });
  }
}

function isCrossDeviceError(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "EXDEV";
}
