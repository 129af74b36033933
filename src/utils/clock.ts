/**
 * Source of the current time in epoch milliseconds.
 * Every expiry decision in the server reads the same injected clock.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Convert epoch milliseconds to JWT NumericDate (seconds)
 */
export function toEpochSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}
