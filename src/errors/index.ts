// ============================================================================
// ERRORS & RESULTS
// ============================================================================
// Expected conditions (bad input, unknown task) travel as Result values.
// Exceptions are kept for faults: a failed completion call or a failed write.

export type ErrorKind = "validation" | "not_found" | "resolver_failure" | "persistence";

export abstract class DuskError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends DuskError {
  readonly kind = "validation";

  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
  }
}

export class NotFoundError extends DuskError {
  readonly kind = "not_found";

  constructor(
    readonly entity: string,
    readonly id: string
  ) {
    super(`${entity} not found: ${id}`);
  }
}

/** The completion service timed out, failed, or answered with something unusable. */
export class ResolverFailure extends DuskError {
  readonly kind = "resolver_failure";
}

/** A store write failed; the transaction was rolled back. */
export class PersistenceError extends DuskError {
  readonly kind = "persistence";
}

// ---- Result ----

export type Result<T, E extends DuskError = DuskError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends DuskError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
