/**
 * The file system calls the planner and executor depend on.
 */

import { lstatSync, readdirSync, renameSync } from "node:fs";

export interface FileSystem {
  /** Names of the regular files directly inside `dir`. Throws if `dir` cannot be read. */
  listFiles(dir: string): string[];
  /** True for any entry at `path`, dangling symlinks included. */
  exists(path: string): boolean;
  rename(from: string, to: string): void;
}

export const nodeFileSystem: FileSystem = {
  listFiles(dir) {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name);
  },
  exists(path) {
    return lstatSync(path, { throwIfNoEntry: false }) !== undefined;
  },
  rename(from, to) {
    renameSync(from, to);
  },
};
