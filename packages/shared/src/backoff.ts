/**
 * Computes an exponential backoff delay.
 *
 * The delay doubles with each attempt, starting from `initial` and capping at `max`.
 * Formula: min(initial * 2^(attempt - 1), max)
 *
 * @param attempt - The attempt number (1-indexed)
 * @param initial - Initial delay in milliseconds
 * @param max - Maximum delay in milliseconds
 * @returns The computed delay in milliseconds
 *
 * @example
 * // Broker reconnection: 1000ms → 2000ms → 4000ms → ... → 30000ms (capped)
 * const delay = exponentialBackoff(reconnectAttempts, 1000, 30000);
 */
export function exponentialBackoff(attempt: number, initial: number, max: number): number {
  return Math.min(initial * 2 ** (attempt - 1), max);
}
