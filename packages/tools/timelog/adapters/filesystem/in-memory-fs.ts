/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem implementation for testing.
 * Files live in a Map<string, string>.
 */

import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { TlError } from "../../domain/entities/errors.ts";

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();

  // --- FileSystem interface ---

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(
        new TlError("io_error", `File not found: ${path}`),
      );
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    this.files.set(path, content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path));
  }

  // --- Test helpers ---

  /** Set a file directly (convenience for test setup). */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  /** Get a file's content, or undefined when absent. */
  getFile(path: string): string | undefined {
    return this.files.get(path);
  }

  /** Get the number of stored files. */
  get size(): number {
    return this.files.size;
  }
}
