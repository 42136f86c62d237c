/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem implementation for testing.
 * All operations work on a Map<string, string> for files
 * and a Set<string> for directories.
 *
 * Dependencies: domain ports only.
 */

import type { FileSystem } from "../../domain/ports/filesystem.js";
import { MarcError } from "../../domain/entities/errors.js";

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private dirs = new Set<string>();

  // --- FileSystem interface ---

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(
        new MarcError("io_error", `File not found: ${path}`),
      );
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    const parent = path.slice(0, path.lastIndexOf("/"));
    if (parent && !this.dirs.has(parent)) {
      return Promise.reject(
        new MarcError("io_error", `Failed to write file: ${path}`),
      );
    }
    this.files.set(path, content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path) || this.dirs.has(path));
  }

  ensureDir(path: string): Promise<void> {
    this.dirs.add(path);
    // Also add all parent directories
    const parts = path.split("/");
    for (let i = 1; i < parts.length; i++) {
      this.dirs.add(parts.slice(0, i).join("/"));
    }
    return Promise.resolve();
  }

  rename(from: string, to: string): Promise<void> {
    const content = this.files.get(from);
    if (content === undefined) {
      return Promise.reject(
        new MarcError("io_error", `Failed to move ${from} to ${to}`),
      );
    }
    this.files.delete(from);
    this.files.set(to, content);
    return Promise.resolve();
  }

  remove(path: string): Promise<void> {
    this.files.delete(path);
    return Promise.resolve();
  }

  // --- Test helpers ---

  /** Get a snapshot of all stored files. */
  getAll(): Map<string, string> {
    return new Map(this.files);
  }

  /** Set a file directly (convenience for test setup). */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
    const parent = path.slice(0, path.lastIndexOf("/"));
    if (parent) {
      this.dirs.add(parent);
    }
  }
}
