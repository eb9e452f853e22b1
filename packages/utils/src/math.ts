/**
 * @module util/math
 */

export function intDiv(dividend: number, divisor: number): number {
  return Math.floor(dividend / divisor);
}

/**
 * Multiply two non-negative integers, throwing instead of losing precision past 2**53 - 1.
 *
 * Chain values (slots, epochs, committee counts) are modelled as `number`, so products that would
 * wrap a uint64 must be caught explicitly.
 */
export function safeMultiply(a: number, b: number): number {
  const result = a * b;
  if (!Number.isSafeInteger(result)) {
    throw new Error(`Integer overflow: ${a} * ${b} exceeds MAX_SAFE_INTEGER`);
  }
  return result;
}
