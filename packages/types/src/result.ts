/**
 * Result Type
 *
 * Verification and resolution steps return a Result instead of throwing.
 * Callers branch on `ok` and propagate the failure unchanged; only the
 * HTTP boundary converts a failure into a thrown error.
 */

import type { Failure } from "./errors.js";

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Fail<F> {
  readonly ok: false;
  readonly error: F;
}

export type Result<T, F = Failure> = Ok<T> | Fail<F>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function fail<F>(error: F): Fail<F> {
  return { ok: false, error };
}
