/**
 * This module provides helpers for working with temporary files and
 * directories that are removed exactly once, when their owning handle is
 * destroyed.
 *
 * ```ts
 * import { tempDirectory } from "@ephemera/fs/temp";
 * import { writeFile } from "node:fs/promises";
 * await using directory = await tempDirectory();
 * await writeFile(directory.path("file.txt"), "Hello, world!");
 * ```
 *
 * A handle created by {@linkcode tempFile} or {@linkcode tempDirectory} is
 * the `owner` of its object. Additional handles to the same object are
 * `borrower` handles, and destroying them leaves the object on disk.
 *
 * ```ts
 * import { tempFile } from "@ephemera/fs/temp";
 * await using file = await tempFile();
 * {
 *   await using reader = await file.openReadOnly();
 *   await reader.readText();
 * }
 * // the file still exists here, and is removed at the end of the scope
 * ```
 *
 * A handle is destroyed in one of these ways:
 *
 *  - `await handle.delete()` or `await using`: the object is removed before
 *    the promise resolves, and failures are thrown.
 *  - `using`, or calling `handle[Symbol.dispose]()`: removal starts in the
 *    background, and failures are only logged.
 *  - garbage collection of a handle that was never destroyed: removal starts
 *    in the background, if the runtime ever collects the handle.
 *
 * Objects are created with generated names, such as
 * `etmp_3f9c0a7e12b4d865.tmp` for files, unless a name is given. Creation
 * never overwrites an existing object.
 *
 * @module temp
 */

import type { FileHandle } from "node:fs/promises";
import { join, resolve } from "node:path";
import {
  type TempDirectory,
  TempDirectoryHandle,
} from "./directory.ts";
import { ioError, isErrnoException, TempError } from "./errors.ts";
import { type TempFile, TempFileHandle } from "./file.ts";
import type { HandleOptions, Ownership } from "./handle.ts";
import { type Logger, silentLogger } from "./log.ts";
import { DEFAULT_ATTEMPTS, type NameSuffix, tempNames } from "./name.ts";
import {
  defaultDirectory,
  nodeFileSystem,
  type TempFileSystem,
  type TempStats,
} from "./system.ts";

export type { DeletionState } from "./deletion.ts";
export type { TempDirectory } from "./directory.ts";
export type { AccessMode, TempFile } from "./file.ts";
export type { HandleOptions, Ownership } from "./handle.ts";
export type { NameSuffix } from "./name.ts";

/** Options shared by {@linkcode tempFile} and {@linkcode tempDirectory}. */
export interface CreateOptions extends HandleOptions {
  /**
   * The existing directory to create the object in. Missing directories are
   * not created.
   * @default {os.tmpdir()}
   */
  dir?: string;
  /**
   * The name of the object, used verbatim instead of a generated one. It must
   * not contain path separators. If an object with this name already exists,
   * creation fails.
   */
  name?: string;
  /**
   * The random part of generated names.
   * @default {"random"}
   */
  suffix?: NameSuffix;
  /**
   * A UUID to use in the name instead of a random suffix. Like a custom
   * `name`, it is tried once, and creation fails if the object exists.
   */
  uuid?: string;
  /** The prefix of generated names. */
  prefix?: string;
  /**
   * The number of generated names to try when a name is already taken.
   * @default {10}
   */
  attempts?: number;
  /**
   * A signal to cancel creation. An object created before the signal was
   * noticed is removed before the promise rejects.
   */
  signal?: AbortSignal;
}

/** Options for the {@linkcode tempFile} function. */
export interface TempFileOptions extends CreateOptions {
  /**
   * The extension of generated names.
   * @default {".tmp"}
   */
  extension?: string;
}

/** Options for the {@linkcode tempDirectory} function. */
export interface TempDirectoryOptions extends CreateOptions {
  /**
   * Automatically changes the current working directory to the
   * temporary directory and restores it when the handle is destroyed.
   * @default {false}
   */
  chdir?: boolean;
  /**
   * The number of entries removed concurrently within each directory when
   * the tree is removed, a positive integer or `Infinity`.
   * @default {16}
   */
  concurrency?: number;
}

/** Options for the {@linkcode wrapDirectory} function. */
export interface WrapDirectoryOptions extends HandleOptions {
  /**
   * The number of entries removed concurrently within each directory when
   * the tree is removed, a positive integer or `Infinity`.
   * @default {16}
   */
  concurrency?: number;
}

/**
 * Creates a temporary file, opened for reading and writing, and returns its
 * owner handle.
 *
 * @example Create a file in the default location.
 * ```ts
 * import { tempFile } from "@ephemera/fs/temp";
 * await using file = await tempFile();
 * await file.writeText("Hello, world!");
 * ```
 *
 * @example Create a named file in a given directory.
 * ```ts
 * import { tempFile } from "@ephemera/fs/temp";
 * await using file = await tempFile({ dir: "/var/tmp", name: "data.json" });
 * ```
 *
 * @example Use a UUID in the generated name.
 * ```ts
 * import { tempFile } from "@ephemera/fs/temp";
 * await using file = await tempFile({ suffix: "uuid" });
 * ```
 *
 * @throws {TempError} `InvalidInput` if the directory or the name is
 * unusable, `NameCollisionExhausted` if every generated name was taken, or
 * `Io` if the filesystem failed, including when a named file already exists.
 */
export async function tempFile(options?: TempFileOptions): Promise<TempFile> {
  const fs = options?.fs ?? nodeFileSystem;
  const logger = options?.logger ?? silentLogger;
  return await create("file", options ?? {}, fs, logger, async (path) => {
    const file = await fs.open(path, "wx+");
    return new TempFileHandle(file, "read-write", {
      path,
      ownership: "owner",
      fs,
      logger,
    });
  });
}

/**
 * Creates a temporary directory, and returns its owner handle.
 *
 * @example Using a temporary directory.
 * ```ts
 * import { tempDirectory } from "@ephemera/fs/temp";
 * import { stat } from "node:fs/promises";
 * await using directory = await tempDirectory();
 * (await stat(directory.path())).isDirectory(); // true
 * ```
 *
 * @example Automatically changing to the directory.
 * ```ts
 * import { tempDirectory } from "@ephemera/fs/temp";
 * import { writeFile } from "node:fs/promises";
 * {
 *   await using dir = await tempDirectory({ chdir: true });
 *   process.cwd(); // dir.path()
 *   await writeFile("file.txt", "Hello!");
 * }
 * process.cwd(); // restored
 * ```
 *
 * @throws {TempError} `InvalidInput` if the directory, the name or the
 * concurrency is unusable, `NameCollisionExhausted` if every generated name
 * was taken, or `Io` if the filesystem failed, including when a named
 * directory already exists.
 */
export async function tempDirectory(
  options?: TempDirectoryOptions,
): Promise<TempDirectory> {
  const fs = options?.fs ?? nodeFileSystem;
  const logger = options?.logger ?? silentLogger;
  const concurrency = validConcurrency(options?.concurrency);
  return await create("directory", options ?? {}, fs, logger, async (path) => {
    await fs.mkdir(path);
    const init = { path, ownership: "owner" as const, fs, logger, concurrency };
    if (!options?.chdir) return new TempDirectoryHandle(init);
    const cwd = process.cwd();
    try {
      process.chdir(path);
    } catch (e: unknown) {
      await fs.rmdir(path).catch((error: unknown) => {
        logger.warn(`Failed to remove temporary directory ${path}`, error);
      });
      throw e;
    }
    return new TempDirectoryHandle(init, cwd);
  });
}

/**
 * Wraps a handle around an existing file, and opens it for reading and
 * writing. The file is not created.
 *
 * With `owner` ownership, destroying the handle removes the file. With
 * `borrower` ownership, the file is left in place.
 *
 * @example Take ownership of a file created elsewhere.
 * ```ts
 * import { wrapFile } from "@ephemera/fs/temp";
 * import { writeFile } from "node:fs/promises";
 * await writeFile("/tmp/report.txt", "...");
 * await using file = await wrapFile("/tmp/report.txt", "owner");
 * ```
 *
 * @throws {TempError} `NotFound` if the path does not exist, `InvalidInput`
 * if it is not a file, or `Io` if the filesystem failed.
 */
export async function wrapFile(
  path: string,
  ownership: Ownership,
  options?: HandleOptions,
): Promise<TempFile> {
  const fs = options?.fs ?? nodeFileSystem;
  const logger = options?.logger ?? silentLogger;
  const resolved = await existing(fs, path, "file");
  let file: FileHandle;
  try {
    file = await fs.open(resolved, "r+");
  } catch (e: unknown) {
    throw ioError(`Cannot open ${resolved}`, resolved, e);
  }
  logger.debug(`Wrapped file ${resolved} as ${ownership}`);
  return new TempFileHandle(file, "read-write", {
    path: resolved,
    ownership,
    fs,
    logger,
  });
}

/**
 * Wraps a handle around an existing directory. The directory is not created.
 *
 * With `owner` ownership, destroying the handle removes the directory with
 * all of its contents. With `borrower` ownership, it is left in place.
 *
 * @throws {TempError} `NotFound` if the path does not exist, `InvalidInput`
 * if it is not a directory or the concurrency is unusable, or `Io` if the
 * filesystem failed.
 */
export async function wrapDirectory(
  path: string,
  ownership: Ownership,
  options?: WrapDirectoryOptions,
): Promise<TempDirectory> {
  const fs = options?.fs ?? nodeFileSystem;
  const logger = options?.logger ?? silentLogger;
  const concurrency = validConcurrency(options?.concurrency);
  const resolved = await existing(fs, path, "directory");
  logger.debug(`Wrapped directory ${resolved} as ${ownership}`);
  return new TempDirectoryHandle({
    path: resolved,
    ownership,
    fs,
    logger,
    concurrency,
  });
}

async function create<T extends TempFile | TempDirectory>(
  kind: "file" | "directory",
  options: TempFileOptions & TempDirectoryOptions,
  fs: TempFileSystem,
  logger: Logger,
  make: (path: string) => Promise<T>,
): Promise<T> {
  const { signal, attempts = DEFAULT_ATTEMPTS } = options;
  signal?.throwIfAborted();
  const dir = await parent(fs, options.dir);
  const names = tempNames({
    kind,
    name: options.name,
    suffix: options.suffix,
    uuid: options.uuid,
    prefix: options.prefix,
    extension: options.extension,
    attempts,
  });
  let collision: unknown;
  for (const name of names) {
    signal?.throwIfAborted();
    const path = join(dir, name);
    let handle: T;
    try {
      handle = await make(path);
    } catch (e: unknown) {
      const generated = options.name === undefined &&
        options.uuid === undefined;
      if (generated && isErrnoException(e, "EEXIST")) {
        logger.debug(`Name ${name} is taken in ${dir}, retrying`);
        collision = e;
        continue;
      }
      throw ioError(`Cannot create ${path}`, path, e);
    }
    if (signal?.aborted) {
      await handle.delete();
      signal.throwIfAborted();
    }
    logger.debug(`Created temporary ${kind} ${path}`);
    return handle;
  }
  throw new TempError(
    "NameCollisionExhausted",
    `Cannot find a free name in ${dir} after ${attempts} attempts`,
    { path: dir, cause: collision },
  );
}

function validConcurrency(concurrency?: number): number | undefined {
  if (
    concurrency === undefined || concurrency === Infinity ||
    (Number.isInteger(concurrency) && concurrency >= 1)
  ) {
    return concurrency;
  }
  throw new TempError(
    "InvalidInput",
    `Concurrency must be a positive integer or Infinity, got ${concurrency}`,
  );
}

async function parent(fs: TempFileSystem, dir?: string): Promise<string> {
  if (dir === "") {
    throw new TempError("InvalidInput", "Directory must not be empty");
  }
  const path = resolve(dir ?? defaultDirectory());
  let stats: TempStats;
  try {
    stats = await fs.stat(path);
  } catch (e: unknown) {
    throw ioError(`Cannot use directory ${path}`, path, e);
  }
  if (!stats.isDirectory()) {
    throw new TempError("InvalidInput", `Not a directory: ${path}`, { path });
  }
  return path;
}

async function existing(
  fs: TempFileSystem,
  path: string,
  kind: "file" | "directory",
): Promise<string> {
  const resolved = resolve(path);
  let stats: TempStats;
  try {
    stats = await fs.stat(resolved);
  } catch (e: unknown) {
    if (isErrnoException(e, "ENOENT")) {
      throw new TempError("NotFound", `No such ${kind}: ${resolved}`, {
        path: resolved,
        cause: e,
      });
    }
    throw ioError(`Cannot access ${resolved}`, resolved, e);
  }
  if (kind === "file" ? !stats.isFile() : !stats.isDirectory()) {
    throw new TempError("InvalidInput", `Not a ${kind}: ${resolved}`, {
      path: resolved,
    });
  }
  return resolved;
}
