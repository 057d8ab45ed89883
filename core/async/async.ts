/**
 * A library for working with asynchronous operations.
 *
 * ```ts
 * import { pool } from "@ephemera/async/pool";
 * const results = await pool(
 *   [1, 2, 3, 4, 5, 6],
 *   (x) => Promise.resolve(x * 2),
 *   { concurrency: 2 },
 * );
 * // results: [2, 4, 6, 8, 10, 12]
 * ```
 *
 * ## Modules
 *
 *  -  {@link [pool]}: Limit concurrency, collect every failure.
 *
 * @module async
 */

export * from "./pool.ts";
