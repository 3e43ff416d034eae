/**
 * Single-digit helpers. A digit is a 32-bit unsigned value held in a JS number;
 * anything wider than 53 bits is split into two digits before it is formed.
 */

import { InvariantViolationError } from '../errors';

export const DIGIT_BITS = 32;
export const BASE = 0x1_0000_0000;
export const MAX_DIGIT = 0xffff_ffff;

const HALF = 0x1_0000;

export function isDigit(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_DIGIT;
}

export function ensureDigit(value: number, label = 'digit'): number {
  if (!isDigit(value)) {
    throw new TypeError(`${label} must be an integer in [0, 2^32). Received: ${value}.`);
  }
  return value;
}

/** B - d, the digit that adds up to the base with d. */
export function inverseDigit(d: number): number {
  if (d <= 0 || d > BASE) {
    throw new InvariantViolationError(`Digit ${d} has no inverse in base 2^32.`);
  }
  return BASE - d;
}

/**
 * a * d + carry as a [low, high] pair of digits.
 * The full product needs up to 64 bits, so d is split into 16-bit halves.
 */
export function multiplyDigits(a: number, d: number, carry = 0): [number, number] {
  const dLow = d % HALF;
  const dHigh = (d - dLow) / HALF;

  const lowPart = a * dLow + carry;
  const highPart = a * dHigh;
  const highPartLow = highPart % HALF;
  const highPartHigh = (highPart - highPartLow) / HALF;

  const sum = lowPart + highPartLow * HALF;
  const low = sum % BASE;
  const high = (sum - low) / BASE + highPartHigh;
  return [low, high];
}

/** Reads the int32 result of a bitwise operator back as an unsigned digit. */
export function toDigit(value: number): number {
  return value >>> 0;
}
