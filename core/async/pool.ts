/**
 * This module provides the {@linkcode pool} function that maps a collection
 * of values to promises while limiting how many run at the same time.
 *
 * ```ts
 * import { pool } from "@ephemera/async/pool";
 * await pool([1, 2, 3], (x) => Promise.resolve(x * 2), { concurrency: 2 });
 * ```
 *
 * Unlike `Promise.all`, a rejection does not stop the pool. Every value is
 * processed, and once all operations settled, the rejections are thrown
 * together in an `AggregateError`.
 *
 * The pool is a thin wrapper around the
 * {@link https://github.com/sindresorhus/p-map | **p-map**} package.
 *
 * @module pool
 */

import pMap from "p-map";

/** Options for the {@linkcode pool} function. */
export interface PoolOptions {
  /**
   * The maximum number of concurrent operations.
   * @default {Infinity}
   */
  concurrency?: number;
}

/**
 * Transforms values to promises, resolves them, and returns the results as an
 * array in input order, while limiting the maximum amount of concurrency.
 *
 * @example Resolve a mapping of promises with a concurrency limit.
 * ```ts
 * import { pool } from "@ephemera/async/pool";
 * const results = await pool(
 *   [1, 2, 3],
 *   (value) => Promise.resolve(value * 2),
 *   { concurrency: 2 },
 * );
 * // results: [2, 4, 6]
 * ```
 *
 * @example Collect every failure.
 * ```ts
 * import { pool } from "@ephemera/async/pool";
 * try {
 *   await pool([1, 2], (value) => Promise.reject(new Error(`${value}`)));
 * } catch (error) {
 *   // error is an AggregateError with two errors
 * }
 * ```
 *
 * @typeParam T The type of the input values.
 * @typeParam R The type of the output values.
 * @param values The input values to map to promises.
 * @param fn The function to transform the values to promises.
 * @returns The resolved results, in the order of the input values.
 * @throws {AggregateError} If any of the operations rejects.
 * @throws {TypeError} If the concurrency is not a positive number.
 */
export async function pool<T, R>(
  values: Iterable<T> | AsyncIterable<T>,
  fn: (value: T) => Promise<R>,
  options?: PoolOptions,
): Promise<R[]> {
  const { concurrency = Infinity } = options ?? {};
  const results: R[] = [];
  await pMap(values, async (value, index) => {
    results[index] = await fn(value);
  }, { concurrency, stopOnError: false });
  return results;
}
