/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Node errors are reported as MarcError("io_error").
 */

import { access, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import type { FileSystem } from "../../domain/ports/filesystem.js";
import { MarcError } from "../../domain/entities/errors.js";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf-8");
    } catch (e) {
      if (isNotFound(e)) {
        throw new MarcError("io_error", `File not found: ${path}`);
      }
      throw new MarcError("io_error", `Failed to read file: ${path}`);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    try {
      await writeFile(path, content, "utf-8");
    } catch {
      throw new MarcError("io_error", `Failed to write file: ${path}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch (e) {
      if (isNotFound(e)) {
        return false;
      }
      throw new MarcError("io_error", `Failed to access: ${path}`);
    }
  }

  async ensureDir(path: string): Promise<void> {
    try {
      await mkdir(path, { recursive: true });
    } catch {
      throw new MarcError("io_error", `Failed to create directory: ${path}`);
    }
  }

  async rename(from: string, to: string): Promise<void> {
    try {
      await rename(from, to);
    } catch {
      throw new MarcError("io_error", `Failed to move ${from} to ${to}`);
    }
  }

  async remove(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch {
      throw new MarcError("io_error", `Failed to remove: ${path}`);
    }
  }
}
