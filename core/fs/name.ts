/**
 * This module generates base names for temporary files and directories.
 *
 * Generated names are made of a fixed prefix, a random suffix, and for files,
 * the `.tmp` extension, e.g. `etmp_3f9c0a7e12b4d865.tmp`.
 *
 * ```ts
 * import { tempName } from "@ephemera/fs/name";
 * const file = tempName({ kind: "file" });
 * const dir = tempName({ kind: "directory", suffix: "uuid" });
 * ```
 *
 * @module name
 */

import { randomBytes } from "node:crypto";
import { v4 as uuid, validate } from "uuid";
import { TempError } from "./errors.ts";

/** Prefix of generated temporary file names. */
export const FILE_PREFIX = "etmp_";
/** Prefix of generated temporary directory names. */
export const DIR_PREFIX = "etmpd_";
/** Extension of generated temporary file names. */
export const FILE_EXTENSION = ".tmp";
/** Number of generated names tried before creation gives up. */
export const DEFAULT_ATTEMPTS = 10;

const RANDOM_BYTES = 8;

/**
 * How the random part of a generated name is made.
 *
 *  - `random`: 16 hexadecimal characters.
 *  - `uuid`: a version 4 UUID.
 */
export type NameSuffix = "random" | "uuid";

/** Options for the {@linkcode tempName} function. */
export interface NameOptions {
  /** Whether the name is for a file or a directory. */
  kind: "file" | "directory";
  /**
   * A name to use verbatim instead of generating one. The caller accepts the
   * risk of a collision.
   */
  name?: string;
  /**
   * The random part of generated names.
   * @default {"random"}
   */
  suffix?: NameSuffix;
  /**
   * A UUID to use as the suffix instead of a random one, such as an
   * identifier the caller already has for the object.
   */
  uuid?: string;
  /**
   * The prefix of generated names.
   * @default {"etmp_" for files, "etmpd_" for directories}
   */
  prefix?: string;
  /**
   * The extension of generated file names. Ignored for directories.
   * @default {".tmp"}
   */
  extension?: string;
}

/** Options for the {@linkcode tempNames} function. */
export interface NamesOptions extends NameOptions {
  /**
   * The number of generated names to yield.
   * @default {10}
   */
  attempts?: number;
}

/**
 * Returns a base name for a temporary object.
 *
 * @throws {TempError} If a custom name is not a bare name, or a given UUID
 * is not valid.
 */
export function tempName(options: NameOptions): string {
  if (options.name !== undefined) return validName(options.name);
  const { kind, suffix = "random" } = options;
  const prefix = options.prefix ?? (kind === "file" ? FILE_PREFIX : DIR_PREFIX);
  const extension = kind === "file" ? options.extension ?? FILE_EXTENSION : "";
  if (options.uuid !== undefined && !validate(options.uuid)) {
    throw new TempError(
      "InvalidInput",
      `Invalid UUID for a temporary object: ${JSON.stringify(options.uuid)}`,
    );
  }
  const random = options.uuid ?? (suffix === "uuid"
    ? uuid()
    : randomBytes(RANDOM_BYTES).toString("hex"));
  return validName(`${prefix}${random}${extension}`);
}

/**
 * Yields candidate names for creating a temporary object, one for each
 * creation attempt.
 *
 * A custom name, or a name built from a given UUID, is yielded only once.
 *
 * @throws {TempError} If a custom name is not a bare name, a given UUID is
 * not valid, or the number of attempts is not a positive integer.
 */
export function* tempNames(options: NamesOptions): Generator<string> {
  const { attempts = DEFAULT_ATTEMPTS } = options;
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new TempError(
      "InvalidInput",
      `Attempts must be a positive integer, got ${attempts}`,
    );
  }
  if (options.name !== undefined || options.uuid !== undefined) {
    yield tempName(options);
    return;
  }
  for (let i = 0; i < attempts; i++) yield tempName(options);
}

function validName(name: string): string {
  if (
    name === "" || name === "." || name === ".." ||
    /[/\\\0]/.test(name)
  ) {
    throw new TempError(
      "InvalidInput",
      `Invalid name for a temporary object: ${JSON.stringify(name)}`,
    );
  }
  return name;
}
