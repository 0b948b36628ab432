/**
 * Result Type for Functional Error Handling
 *
 * Expected outcomes (conflicts, missing records, bad input) travel as values
 * so control flow is visible in signatures.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing a value
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
