/**
 * Outcome of a store operation.
 *
 * Store methods return failures instead of throwing so the shell can report
 * them and keep running. "Nothing matched" is not a failure: update and delete
 * succeed with a count of 0.
 */

export type StoreErrorKind =
  | "unique_violation"
  | "constraint_violation"
  | "connection_failed"
  | "query_failed";

export interface StoreError {
  kind: StoreErrorKind;
  message: string;
  cause?: unknown;
}

export type StoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: StoreError };

export function success<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: StoreError): StoreResult<T> {
  return { ok: false, error };
}
