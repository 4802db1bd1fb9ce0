/**
 * Internal assertions for the scheduler and the store. A failed assertion
 * means a caller broke a precondition, not that input was malformed.
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new Error(`[Trellis Invariant] ${message}${contextStr}`);
  }
}

/**
 * Scheduler preconditions (no re-entrant flush, no use after dispose).
 * @internal
 */
export function assertSchedulingPrecondition(
  condition: boolean,
  violationMessage: string
): asserts condition {
  invariant(condition, `[Scheduler Precondition] ${violationMessage}`);
}

/**
 * Store preconditions (live store, valid ttl).
 * @internal
 */
export function assertStorePrecondition(
  condition: boolean,
  violationMessage: string
): asserts condition {
  invariant(condition, `[Store Precondition] ${violationMessage}`);
}
