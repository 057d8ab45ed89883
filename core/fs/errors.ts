/**
 * This module provides the {@linkcode TempError} class thrown by the
 * temporary file and directory constructors, and by explicit deletion.
 *
 * ```ts
 * import { TempError } from "@ephemera/fs/errors";
 * import { wrapFile } from "@ephemera/fs/temp";
 * try {
 *   await wrapFile("/does/not/exist", "owner");
 * } catch (e: unknown) {
 *   if (e instanceof TempError && e.kind === "NotFound") {
 *     // ...
 *   }
 * }
 * ```
 *
 * @module errors
 */

/**
 * The kind of a {@linkcode TempError}.
 *
 *  - `InvalidInput`: a directory or name was unusable.
 *  - `NotFound`: an existing object to wrap was missing.
 *  - `NameCollisionExhausted`: every generated name was already taken.
 *  - `Io`: the filesystem failed; the `cause` holds the system error.
 *  - `AlreadyConsumed`: the handle was already deleted or disposed.
 */
export type TempErrorKind =
  | "InvalidInput"
  | "NotFound"
  | "NameCollisionExhausted"
  | "Io"
  | "AlreadyConsumed";

/**
 * An error thrown by the `fs` package.
 *
 * When removing a directory tree fails for several entries, the error kind is
 * `Io` and the `cause` is an `AggregateError` holding every failure.
 */
export class TempError extends Error {
  /** The kind of failure. */
  readonly kind: TempErrorKind;
  /** The path the failing operation was working on. */
  readonly path?: string;

  /** Construct TempError. */
  constructor(
    kind: TempErrorKind,
    message: string,
    options?: { path?: string; cause?: unknown },
  ) {
    super(message, options);
    this.name = "TempError";
    this.kind = kind;
    if (options?.path !== undefined) this.path = options.path;
  }
}

/**
 * Returns whether the value is a Node.js system error, optionally with the
 * given error code, such as `ENOENT`.
 */
export function isErrnoException(
  error: unknown,
  code?: string,
): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return code === undefined || error.code === code;
}

/** Wraps a filesystem failure into an `Io` {@linkcode TempError}. */
export function ioError(
  message: string,
  path: string,
  cause: unknown,
): TempError {
  if (cause instanceof TempError) return cause;
  const detail = cause instanceof Error ? `: ${cause.message}` : "";
  return new TempError("Io", `${message}${detail}`, { path, cause });
}
