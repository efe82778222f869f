/**
 * File-system operations used by the store, index and lifecycle modules.
 *
 * Every store function takes a `StoreFileOps` so tests can make a single
 * operation fail without touching permissions on disk.
 */

import * as fs from "node:fs";

export interface DirEntry {
  name: string;
  isDirectory: boolean;
}

export interface StoreFileOps {
  /** List a directory, non-recursively. Throws if it cannot be read. */
  listDir(dir: string): DirEntry[];
  /** True if the path exists (file or directory). */
  exists(filePath: string): boolean;
  readFile(filePath: string): string;
  /** Overwrite a file with the given content. */
  writeFile(filePath: string, content: string): void;
  removeFile(filePath: string): void;
  /** Create a directory and its parents if missing. */
  ensureDir(dir: string): void;
}

export const nodeFileOps: StoreFileOps = {
  listDir(dir) {
    return fs.readdirSync(dir, { withFileTypes: true }).map((entry) => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
    }));
  },
  exists(filePath) {
    return fs.existsSync(filePath);
  },
  readFile(filePath) {
    return fs.readFileSync(filePath, "utf-8");
  },
  writeFile(filePath, content) {
    fs.writeFileSync(filePath, content, "utf-8");
  },
  removeFile(filePath) {
    fs.unlinkSync(filePath);
  },
  ensureDir(dir) {
    fs.mkdirSync(dir, { recursive: true });
  },
};
