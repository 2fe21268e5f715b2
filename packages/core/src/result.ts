/**
 * Result type for service boundaries.
 * Lookups that indicate a caller bug may throw; importing, loading and tool
 * handlers return a Result instead.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

/**
 * Transform the success value, passing failures through untouched.
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result;
}

/**
 * Transform the failure, passing successes through untouched.
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return result.ok ? result : Err(fn(result.error));
}

/**
 * Chain a step that can itself fail.
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

/**
 * Get the value or throw the error.
 * Meant for tests and start-up code where a failure should abort.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

/**
 * Lift a nullable value: null and undefined become the given error.
 */
export function fromNullable<T, E>(value: T | null | undefined, error: E): Result<T, E> {
  return value === null || value === undefined ? Err(error) : Ok(value);
}

function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

/**
 * Run fn and capture what it throws.
 * Without a mapper the thrown value is normalized to an Error.
 */
export function tryCatch<T>(fn: () => T): Result<T, Error>;
export function tryCatch<T, E>(fn: () => T, mapError: (thrown: unknown) => E): Result<T, E>;
export function tryCatch<T, E>(
  fn: () => T,
  mapError?: (thrown: unknown) => E
): Result<T, E | Error> {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(mapError ? mapError(e) : toError(e));
  }
}

export async function tryCatchAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(toError(e));
  }
}
