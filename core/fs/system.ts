/**
 * This module provides the filesystem API that temporary handles use to
 * create, open and remove objects on disk.
 *
 * The default implementation, {@linkcode nodeFileSystem}, is backed by
 * `node:fs/promises`. A different implementation can be passed to the
 * constructors in `@ephemera/fs/temp`, for example to observe or fail
 * specific calls in tests.
 *
 * ```ts
 * import { nodeFileSystem, type TempFileSystem } from "@ephemera/fs/system";
 * const fs: TempFileSystem = {
 *   ...nodeFileSystem,
 *   unlink: () => Promise.reject(new Error("read-only")),
 * };
 * ```
 *
 * @module system
 */

import { rmSync } from "node:fs";
import {
  type FileHandle,
  mkdir,
  open,
  readdir,
  rmdir,
  stat,
  unlink,
} from "node:fs/promises";
import { tmpdir } from "node:os";

/** Flags accepted by {@linkcode TempFileSystem.open}. */
export type OpenFlags = "wx+" | "r+" | "r";

/** The kind of an object, as reported by {@linkcode TempFileSystem.stat}. */
export interface TempStats {
  isFile(): boolean;
  isDirectory(): boolean;
}

/** A directory entry, as reported by {@linkcode TempFileSystem.readdir}. */
export interface TempEntry {
  name: string;
  isDirectory(): boolean;
}

/** The asynchronous filesystem operations needed by temporary handles. */
export interface TempFileSystem {
  /** Opens a file; `wx+` creates it and fails if it exists. */
  open(path: string, flags: OpenFlags): Promise<FileHandle>;
  /** Creates a single directory; fails if it exists or its parent is missing. */
  mkdir(path: string): Promise<void>;
  stat(path: string): Promise<TempStats>;
  readdir(path: string): Promise<TempEntry[]>;
  unlink(path: string): Promise<void>;
  rmdir(path: string): Promise<void>;
  /**
   * Removes a file or directory tree, blocking the thread.
   *
   * Only used when removal can no longer be dispatched asynchronously.
   */
  removeSync(path: string): void;
}

/** The {@linkcode TempFileSystem} backed by Node.js. */
export const nodeFileSystem: TempFileSystem = {
  open: (path, flags) => open(path, flags),
  mkdir: async (path) => {
    await mkdir(path);
  },
  stat: (path) => stat(path),
  readdir: (path) => readdir(path, { withFileTypes: true }),
  unlink: (path) => unlink(path),
  rmdir: (path) => rmdir(path),
  removeSync: (path) => rmSync(path, { recursive: true, force: true }),
};

/** Returns the platform directory for temporary objects. */
export function defaultDirectory(): string {
  return tmpdir();
}
