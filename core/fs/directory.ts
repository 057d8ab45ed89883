/**
 * This module provides the handle for temporary directories.
 *
 * @module directory
 */

import { join } from "node:path";
import type { DeletionState } from "./deletion.ts";
import { type HandleInit, type Ownership, TempHandle } from "./handle.ts";

/** A handle to a temporary directory. */
export interface TempDirectory extends Disposable, AsyncDisposable {
  /** Whether this handle removes the directory tree when destroyed. */
  readonly ownership: Ownership;
  /** The deletion state of this handle. */
  readonly state: DeletionState;
  /** Returns the temporary directory path, with optional relative children. */
  path(...paths: string[]): string;
  /**
   * Returns another handle to the directory, which never removes it.
   *
   * @throws {TempError} An `AlreadyConsumed` error after destruction.
   */
  open(): TempDirectory;
  /**
   * Destroys the handle, and if it is an owner, removes the directory with
   * all of its contents and waits until it is gone.
   */
  delete(): Promise<void>;
}

/** Implementation of {@linkcode TempDirectory}. */
export class TempDirectoryHandle extends TempHandle implements TempDirectory {
  #cwd: string | undefined;

  /**
   * @param init The directory to track.
   * @param cwd The working directory to restore when destroyed.
   */
  constructor(init: HandleInit, cwd?: string) {
    super("directory", init);
    this.#cwd = cwd;
  }

  path(...paths: string[]): string {
    return join(this.root, ...paths);
  }

  open(): TempDirectory {
    this.assertActive("open()");
    return new TempDirectoryHandle(this.borrowed());
  }

  protected async release(): Promise<void> {
    this.releaseSync();
  }

  protected releaseSync(): void {
    if (this.#cwd === undefined) return;
    const cwd = this.#cwd;
    this.#cwd = undefined;
    process.chdir(cwd);
    this.logger.debug(`Restored working directory ${cwd}`);
  }
}
