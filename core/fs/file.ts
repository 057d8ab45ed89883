/**
 * This module provides the handle for temporary files.
 *
 * @module file
 */

import { closeSync } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import type { DeletionState } from "./deletion.ts";
import { ioError } from "./errors.ts";
import { type HandleInit, type Ownership, TempHandle } from "./handle.ts";

/** How the file descriptor of a file handle was opened. */
export type AccessMode = "read-write" | "read-only";

/** A handle to a temporary file. */
export interface TempFile extends Disposable, AsyncDisposable {
  /** Whether this handle removes the file when destroyed. */
  readonly ownership: Ownership;
  /** How the file descriptor of this handle was opened. */
  readonly mode: AccessMode;
  /** The deletion state of this handle. */
  readonly state: DeletionState;
  /**
   * The open file descriptor of this handle.
   *
   * @throws {TempError} An `AlreadyConsumed` error after destruction.
   */
  readonly file: FileHandle;
  /** Returns the absolute path of the file. */
  path(): string;
  /** Reads the whole file as UTF-8 text. */
  readText(): Promise<string>;
  /** Replaces the contents of the file with UTF-8 text. */
  writeText(text: string): Promise<void>;
  /** Opens another read-write handle to the file, which never removes it. */
  openReadWrite(): Promise<TempFile>;
  /** Opens another read-only handle to the file, which never removes it. */
  openReadOnly(): Promise<TempFile>;
  /**
   * Destroys the handle, and if it is an owner, removes the file and waits
   * until it is gone.
   */
  delete(): Promise<void>;
}

/** Implementation of {@linkcode TempFile}. */
export class TempFileHandle extends TempHandle implements TempFile {
  readonly mode: AccessMode;
  readonly #file: FileHandle;

  constructor(file: FileHandle, mode: AccessMode, init: HandleInit) {
    super("file", init);
    this.#file = file;
    this.mode = mode;
  }

  get file(): FileHandle {
    this.assertActive("file");
    return this.#file;
  }

  path(): string {
    return this.root;
  }

  async readText(): Promise<string> {
    this.assertActive("readText()");
    try {
      const { size } = await this.#file.stat();
      const buffer = Buffer.alloc(size);
      const { bytesRead } = await this.#file.read(buffer, 0, size, 0);
      return buffer.toString("utf8", 0, bytesRead);
    } catch (e: unknown) {
      throw ioError(`Cannot read ${this.root}`, this.root, e);
    }
  }

  async writeText(text: string): Promise<void> {
    this.assertActive("writeText()");
    try {
      await this.#file.truncate(0);
      await this.#file.write(text, 0, "utf8");
    } catch (e: unknown) {
      throw ioError(`Cannot write ${this.root}`, this.root, e);
    }
  }

  openReadWrite(): Promise<TempFile> {
    return this.#reopen("read-write");
  }

  openReadOnly(): Promise<TempFile> {
    return this.#reopen("read-only");
  }

  async #reopen(mode: AccessMode): Promise<TempFile> {
    this.assertActive(
      mode === "read-write" ? "openReadWrite()" : "openReadOnly()",
    );
    let file: FileHandle;
    try {
      file = await this.fs.open(this.root, mode === "read-write" ? "r+" : "r");
    } catch (e: unknown) {
      throw ioError(`Cannot open ${this.root}`, this.root, e);
    }
    this.logger.debug(`Opened ${mode} borrower for ${this.root}`);
    return new TempFileHandle(file, mode, this.borrowed());
  }

  protected async release(): Promise<void> {
    await this.#file.close();
  }

  protected releaseSync(): void {
    if (this.#file.fd !== -1) closeSync(this.#file.fd);
  }
}
