/**
 * Result helpers.
 * Expected failures travel as values; only broken graph declarations throw.
 */

import type { Result } from './types.ts';

export const ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

export const err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});

/** Settle a promise into a Result, mapping whatever it rejects with. */
export const fromPromise = async <T, E>(
  promise: Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return ok(await promise);
  } catch (e) {
    return err(mapError(e));
  }
};

export const match = <T, E, U>(
  result: Result<T, E>,
  handlers: {
    readonly ok: (value: T) => U;
    readonly err: (error: E) => U;
  }
): U =>
  result.ok ? handlers.ok(result.value) : handlers.err(result.error);
