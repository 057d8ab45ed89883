/**
 * This module provides the {@linkcode TempHandle} base class shared by
 * temporary file and directory handles.
 *
 * A handle tracks a single object on disk, and whether the handle is
 * responsible for removing it. Any number of handles may refer to the same
 * path, but only an `owner` handle removes the object. A `borrower` handle
 * never touches the filesystem when it is deleted or disposed.
 *
 * @module handle
 */

import {
  canDispatch,
  DEFAULT_CONCURRENCY,
  type DeletionState,
  keepOnCollect,
  removeInBackground,
  removeBlocking,
  removeObject,
  removeOnCollect,
  type RemovalTarget,
} from "./deletion.ts";
import { ioError, TempError } from "./errors.ts";
import { type Logger, silentLogger } from "./log.ts";
import { nodeFileSystem, type TempFileSystem } from "./system.ts";

/**
 * The responsibility of a handle for the object it refers to.
 *
 *  - `owner`: deleting or disposing the handle removes the object.
 *  - `borrower`: deleting or disposing the handle leaves the object.
 */
export type Ownership = "owner" | "borrower";

/** Options shared by all handle constructors. */
export interface HandleOptions {
  /**
   * The filesystem used to create, open and remove the object.
   * @default {nodeFileSystem}
   */
  fs?: TempFileSystem;
  /**
   * The logger for diagnostics, including failures of removal on disposal.
   * @default {silentLogger}
   */
  logger?: Logger;
}

/** The resolved state a handle is constructed from. */
export interface HandleInit {
  path: string;
  ownership: Ownership;
  fs?: TempFileSystem | undefined;
  logger?: Logger | undefined;
  concurrency?: number | undefined;
}

/**
 * A handle to a temporary object.
 *
 * The handle can be destroyed in two ways:
 *
 *  - {@linkcode TempHandle.delete | delete()} removes an owned object and
 *    reports the outcome. `await using` calls it through
 *    `Symbol.asyncDispose`.
 *  - `Symbol.dispose`, called by `using`, starts removal of an owned object
 *    in the background and returns immediately. It never throws.
 *
 * An owned object whose handle is garbage collected without being destroyed
 * is removed in the background as a last resort.
 */
export abstract class TempHandle implements Disposable, AsyncDisposable {
  /** The responsibility of this handle for its object. */
  readonly ownership: Ownership;
  #state: DeletionState = "active";
  readonly #target: RemovalTarget;

  protected constructor(kind: "file" | "directory", init: HandleInit) {
    this.ownership = init.ownership;
    this.#target = {
      path: init.path,
      kind,
      fs: init.fs ?? nodeFileSystem,
      logger: init.logger ?? silentLogger,
      concurrency: init.concurrency ?? DEFAULT_CONCURRENCY,
    };
    if (this.ownership === "owner") removeOnCollect(this, this.#target);
  }

  /** The deletion state of this handle. */
  get state(): DeletionState {
    return this.#state;
  }

  /** The filesystem this handle operates on. */
  protected get fs(): TempFileSystem {
    return this.#target.fs;
  }

  /** The logger of this handle. */
  protected get logger(): Logger {
    return this.#target.logger;
  }

  /** The absolute path of the object. */
  protected get root(): string {
    return this.#target.path;
  }

  /** Options to construct another handle to the same object. */
  protected borrowed(): HandleInit {
    const { path, fs, logger, concurrency } = this.#target;
    return { path, ownership: "borrower", fs, logger, concurrency };
  }

  /** Releases resources held by this handle, such as a file descriptor. */
  protected abstract release(): Promise<void>;

  /** Releases resources held by this handle, blocking the thread. */
  protected abstract releaseSync(): void;

  /**
   * Throws if this handle was already deleted or disposed.
   *
   * @throws {TempError} An `AlreadyConsumed` error.
   */
  protected assertActive(operation: string): void {
    if (this.#state === "active") return;
    throw new TempError(
      "AlreadyConsumed",
      `Cannot call ${operation} on a ${this.#state} handle for ${this.root}`,
      { path: this.root },
    );
  }

  /**
   * Destroys this handle, and if it is an owner, removes the object and waits
   * until it is gone.
   *
   * Removing an object that no longer exists succeeds. An owned object is
   * removed even if its resources could not be released, and the release
   * failure is thrown afterwards.
   *
   * @throws {TempError} An `AlreadyConsumed` error if the handle was already
   * destroyed, or an `Io` error if the handle could not be released or the
   * object could not be removed. When both failed, the cause is an
   * `AggregateError` of the two.
   */
  async delete(): Promise<void> {
    this.assertActive("delete()");
    this.#state = "deleting";
    keepOnCollect(this);
    let closeError: TempError | undefined;
    try {
      await this.release();
    } catch (e: unknown) {
      closeError = ioError(`Cannot close ${this.root}`, this.root, e);
    }
    if (this.ownership === "borrower") {
      this.#state = "released";
      if (closeError) throw closeError;
      return;
    }
    try {
      await removeObject(this.#target);
    } catch (e: unknown) {
      this.#state = "deletion-failed";
      if (!closeError) throw e;
      throw new TempError(
        "Io",
        `Cannot close or remove ${this.root}`,
        { path: this.root, cause: new AggregateError([closeError, e]) },
      );
    }
    this.#state = "deleted";
    if (closeError) throw closeError;
  }

  /**
   * Destroys this handle with {@linkcode TempHandle.delete | delete()}, unless
   * it was already destroyed.
   */
  async [Symbol.asyncDispose](): Promise<void> {
    if (this.#state !== "active") return;
    await this.delete();
  }

  /**
   * Destroys this handle without waiting, unless it was already destroyed.
   *
   * An owned object is removed in the background, and there is no guarantee
   * that it is gone when this method returns. Failures are logged as
   * warnings.
   */
  [Symbol.dispose](): void {
    if (this.#state !== "active") return;
    keepOnCollect(this);
    this.#state = this.ownership === "owner" ? "deletion-attempted" : "released";
    if (!canDispatch()) {
      try {
        this.releaseSync();
      } catch (e: unknown) {
        this.logger.warn(`Failed to close ${this.root}`, e);
      }
      if (this.ownership === "owner") removeBlocking(this.#target);
      return;
    }
    if (this.ownership === "borrower") {
      void this.release().catch((e: unknown) => {
        this.logger.warn(`Failed to close ${this.root}`, e);
      });
      return;
    }
    this.logger.debug(`Removing temporary ${this.#target.kind} ${this.root}`);
    removeInBackground(this.#target, () => this.release());
  }

  /** Returns the object path. */
  toString(): string {
    return this.root;
  }
}
