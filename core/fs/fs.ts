/**
 * A library for temporary files and directories that are removed exactly
 * once, without relying on the caller to remember it.
 *
 * ```ts
 * import { tempFile } from "@ephemera/fs/temp";
 * await using file = await tempFile();
 * await file.writeText("Hello, world!");
 * ```
 *
 * ## Modules
 *
 *  -  {@link [temp]}: Create and wrap temporary files and directories.
 *  -  {@link [name]}: Generate names for temporary objects.
 *  -  {@link [errors]}: The error thrown by this package.
 *  -  {@link [system]}: The filesystem API used by handles.
 *  -  {@link [log]}: Diagnostics for handles.
 *
 * @module fs
 */

export * from "./errors.ts";
export * from "./log.ts";
export * from "./name.ts";
export * from "./system.ts";
export * from "./temp.ts";
