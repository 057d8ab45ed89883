/**
 * This module removes temporary objects from disk.
 *
 * There are two ways to remove an object. {@linkcode removeObject} is the
 * explicit way: it resolves once the object is gone and rejects with a
 * {@linkcode TempError} otherwise. {@linkcode removeInBackground} is the
 * best-effort way used when a handle is disposed synchronously: it starts
 * removal on the event loop and returns immediately, or removes the object
 * with a blocking call when the process is already exiting and no further
 * asynchronous work would run. Its failures are logged and never thrown.
 *
 * Removing an object that no longer exists succeeds.
 *
 * @module deletion
 */

import { pool } from "@ephemera/async/pool";
import { join } from "node:path";
import { ioError, isErrnoException, TempError } from "./errors.ts";
import type { Logger } from "./log.ts";
import type { TempEntry, TempFileSystem } from "./system.ts";

/** The default number of entries removed concurrently within a directory. */
export const DEFAULT_CONCURRENCY = 16;

/**
 * The deletion state of a handle.
 *
 *  - `active`: the handle can be used.
 *  - `deleting`: explicit deletion is in progress.
 *  - `deleted`: explicit deletion removed the object.
 *  - `deletion-failed`: explicit deletion failed and reported the error.
 *  - `deletion-attempted`: best-effort removal was started on disposal.
 *  - `released`: a borrower was deleted or disposed, leaving the object.
 *
 * All states except `active` and `deleting` are terminal.
 */
export type DeletionState =
  | "active"
  | "deleting"
  | "deleted"
  | "deletion-failed"
  | "deletion-attempted"
  | "released";

/** An object on disk to remove, and what is needed to remove it. */
export interface RemovalTarget {
  path: string;
  kind: "file" | "directory";
  fs: TempFileSystem;
  logger: Logger;
  /** Entries removed concurrently within each directory of a tree. */
  concurrency: number;
}

let exiting = false;
process.once("exit", () => {
  exiting = true;
});

/** Returns whether asynchronous work can still run in this process. */
export function canDispatch(): boolean {
  return !exiting;
}

/**
 * Removes a file, or a directory with all of its contents.
 *
 * Directory removal continues past failing entries, so that as much of the
 * tree as possible is removed. A directory whose entries could not all be
 * removed is left in place.
 *
 * @throws {TempError} An `Io` error. When several entries failed, its cause
 * is an `AggregateError` of every failure.
 */
export async function removeObject(target: RemovalTarget): Promise<void> {
  const { path, kind, fs, logger, concurrency } = target;
  try {
    if (kind === "file") await removeFile(fs, path);
    else await removeTree(fs, path, concurrency);
  } catch (e: unknown) {
    throw removalError(path, e);
  }
  logger.debug(`Removed temporary ${kind} ${path}`);
}

/**
 * Removes an object without waiting for it, after running the optional
 * `before` step, such as closing a file descriptor.
 *
 * Never throws. Failures are logged as warnings.
 */
export function removeInBackground(
  target: RemovalTarget,
  before?: () => Promise<void>,
): void {
  const { path, kind, logger } = target;
  if (!canDispatch()) {
    removeBlocking(target);
    return;
  }
  void (async () => {
    await before?.().catch((e: unknown) => {
      logger.warn(`Failed to close ${path}`, e);
    });
    await removeObject(target);
  })().catch((e: unknown) => {
    logger.warn(`Failed to remove temporary ${kind} ${path}`, e);
  });
}

/**
 * Removes an object with a blocking call, for when the process is exiting.
 *
 * Never throws. Failures are logged as warnings.
 */
export function removeBlocking(target: RemovalTarget): void {
  const { path, kind, fs, logger } = target;
  try {
    fs.removeSync(path);
    logger.debug(`Removed temporary ${kind} ${path} on exit`);
  } catch (e: unknown) {
    logger.warn(`Failed to remove temporary ${kind} ${path} on exit`, e);
  }
}

/** Removes the object of a handle that was collected without disposal. */
export function removeCollected(target: RemovalTarget): void {
  target.logger.warn(
    `Temporary ${target.kind} ${target.path} was never disposed, removing`,
  );
  removeInBackground(target);
}

const collected = new FinalizationRegistry<RemovalTarget>(removeCollected);

/**
 * Removes the target if the handle is garbage collected before it is
 * disposed. This may never happen before the process exits.
 */
export function removeOnCollect(handle: object, target: RemovalTarget): void {
  collected.register(handle, target, handle);
}

/** Undoes {@linkcode removeOnCollect} for a disposed handle. */
export function keepOnCollect(handle: object): void {
  collected.unregister(handle);
}

async function removeFile(fs: TempFileSystem, path: string): Promise<void> {
  try {
    await fs.unlink(path);
  } catch (e: unknown) {
    if (!isErrnoException(e, "ENOENT")) throw e;
  }
}

async function removeTree(
  fs: TempFileSystem,
  path: string,
  concurrency: number,
): Promise<void> {
  let entries: TempEntry[];
  try {
    entries = await fs.readdir(path);
  } catch (e: unknown) {
    if (isErrnoException(e, "ENOENT")) return;
    throw e;
  }
  await pool(entries, async (entry) => {
    const child = join(path, entry.name);
    if (entry.isDirectory()) await removeTree(fs, child, concurrency);
    else await removeFile(fs, child);
  }, { concurrency });
  try {
    await fs.rmdir(path);
  } catch (e: unknown) {
    if (!isErrnoException(e, "ENOENT")) throw e;
  }
}

function flatten(error: unknown): unknown[] {
  if (error instanceof AggregateError) {
    return error.errors.flatMap((e: unknown) => flatten(e));
  }
  return [error];
}

function removalError(path: string, error: unknown): TempError {
  const errors = flatten(error);
  const [first] = errors;
  if (errors.length === 1) return ioError(`Cannot remove ${path}`, path, first);
  return new TempError(
    "Io",
    `Cannot remove ${path}: ${errors.length} entries failed`,
    { path, cause: new AggregateError(errors) },
  );
}
