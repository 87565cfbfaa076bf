/**
 * Core type definitions for the release tooling.
 * Provides the Result type used at every seam between CLI, workflow and engine.
 */

/**
 * Result type for functional error handling.
 *
 * Stages never throw across the workflow boundary; each one hands back a
 * Result and the caller decides whether to continue.
 *
 * @example
 * ```typescript
 * const result = await engine.ping();
 * if (!result.ok) {
 *   logger.error(result.error.message);
 *   return Failure(result.error);
 * }
 * ```
 */
export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

/** Create a success result */
export const Success = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

/** Create a failure result */
export const Failure = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });
