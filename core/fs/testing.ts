/**
 * This module provides utilities to test code that uses temporary handles.
 *
 * The {@linkcode failingFileSystem} function returns a filesystem that fails
 * selected operations, to exercise the error paths of deletion.
 *
 * ```ts
 * import { tempFile } from "@ephemera/fs/temp";
 * import { failingFileSystem } from "@ephemera/fs/testing";
 * const fs = failingFileSystem({ unlink: () => true });
 * const file = await tempFile({ fs });
 * await file.delete(); // throws
 * ```
 *
 * @module testing
 */

import { stat } from "node:fs/promises";
import { nodeFileSystem, type TempFileSystem } from "./system.ts";

/** Operations of a {@linkcode failingFileSystem}, and the paths they fail. */
export interface Failures {
  open?: (path: string) => boolean;
  mkdir?: (path: string) => boolean;
  unlink?: (path: string) => boolean;
  rmdir?: (path: string) => boolean;
  removeSync?: (path: string) => boolean;
}

/** Returns a Node.js system error with the given code. */
export function errno(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

/**
 * Returns a filesystem that throws a system error for matching calls, and
 * otherwise uses the real filesystem.
 *
 * The error message is `<code>: <operation> <path>`.
 *
 * @param failures Predicates for the paths to fail, for each operation.
 * @param code The error code to throw.
 */
export function failingFileSystem(
  failures: Failures,
  code = "EACCES",
): TempFileSystem {
  const fail = (operation: keyof Failures, path: string) => {
    if (failures[operation]?.(path)) {
      throw errno(code, `${code}: ${operation} ${path}`);
    }
  };
  return {
    ...nodeFileSystem,
    open: async (path, flags) => {
      fail("open", path);
      return await nodeFileSystem.open(path, flags);
    },
    mkdir: async (path) => {
      fail("mkdir", path);
      await nodeFileSystem.mkdir(path);
    },
    unlink: async (path) => {
      fail("unlink", path);
      await nodeFileSystem.unlink(path);
    },
    rmdir: async (path) => {
      fail("rmdir", path);
      await nodeFileSystem.rmdir(path);
    },
    removeSync: (path) => {
      fail("removeSync", path);
      nodeFileSystem.removeSync(path);
    },
  };
}

/** Returns whether anything exists at the path. */
export async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
