/**
 * Math utility functions shared by the oscillators and envelopes
 */

/**
 * Clamp a value to a given range
 * @param value The value to clamp
 * @param min Minimum allowed value
 * @param max Maximum allowed value
 * @returns The clamped value
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Wrap a value into [0, period). Unlike `%`, negative inputs land in range too.
 */
export function wrap(value: number, period: number): number {
  const r = value % period;
  if (r >= 0) return r;
  const shifted = r + period;
  // A tiny negative remainder can round up to exactly `period`
  return shifted >= period ? 0 : shifted;
}

/**
 * Check if a value is a finite number within bounds
 */
export function isValidNumber(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= min && value <= max;
}
