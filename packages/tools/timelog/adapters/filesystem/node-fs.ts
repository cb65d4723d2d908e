/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by Node and fs-extra.
 * Failures surface as TlError("io_error").
 *
 * Dependencies: fs-extra (outputFile, pathExists).
 */

import fse from "fs-extra";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { TlError } from "../../domain/entities/errors.ts";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await fse.readFile(path, "utf8");
    } catch (e) {
      if (isNotFound(e)) {
        throw new TlError("io_error", `File not found: ${path}`);
      }
      throw new TlError("io_error", `Failed to read file: ${path}`);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    try {
      await fse.outputFile(path, content, "utf8");
    } catch {
      throw new TlError("io_error", `Failed to write file: ${path}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    return await fse.pathExists(path);
  }
}
