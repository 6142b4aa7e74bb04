/**
 * Numeric Utilities Module
 * Shared numeric safety functions for the scoring and merge modules
 */

/**
 * Safe division with fallback for division by zero or invalid inputs.
 *
 * @example
 * safeDiv(10, 2)      // returns 5
 * safeDiv(10, 0)      // returns 0 (default fallback)
 * safeDiv(10, 0, -1)  // returns -1 (custom fallback)
 */
export function safeDiv(a: number, b: number, fallback: number = 0): number {
  const safeFallback = Number.isFinite(fallback) ? fallback : 0

  if (!Number.isFinite(a) || !Number.isFinite(b)) return safeFallback
  if (b === 0) return safeFallback

  const result = a / b
  if (!Number.isFinite(result)) return safeFallback

  return result
}

/**
 * Clamp a value to a specified range [min, max].
 * NaN and Infinity fall back to min.
 *
 * @example
 * clamp(5, 0, 10)    // returns 5
 * clamp(15, 0, 10)   // returns 10
 * clamp(NaN, 0, 10)  // returns 0
 */
export function clamp(value: number, min: number, max: number): number {
  const safeMin = Number.isFinite(min) ? min : 0
  const safeMax = Number.isFinite(max) ? max : safeMin
  const [effectiveMin, effectiveMax] = safeMin <= safeMax ? [safeMin, safeMax] : [safeMax, safeMin]

  if (!Number.isFinite(value)) return effectiveMin

  return Math.max(effectiveMin, Math.min(effectiveMax, value))
}

/**
 * Non-negative integer or 0. Used for engagement counts and budgets.
 */
export function toCount(n: unknown): number {
  if (!isValidNumber(n) || n <= 0) return 0
  return Math.floor(n)
}

/**
 * Type guard to check if a value is a valid finite number.
 *
 * @example
 * isValidNumber(5)         // returns true
 * isValidNumber(NaN)       // returns false
 * isValidNumber("5")       // returns false
 */
export function isValidNumber(n: unknown): n is number {
  return typeof n === 'number' && Number.isFinite(n)
}
