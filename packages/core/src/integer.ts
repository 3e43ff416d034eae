/**
 * Signed arbitrary-precision integer: a digit vector plus a sign flag.
 *
 * Canonical form: no zero digit at the high end, and zero is the empty vector
 * with `negative = false`. Every public operation returns canonical values.
 */

import { DigitVector } from './digits';
import type { Sign } from './types';

export class Integer {
  readonly digits: DigitVector;
  readonly negative: boolean;

  private constructor(digits: DigitVector, negative: boolean) {
    this.digits = digits;
    this.negative = negative;
  }

  static readonly zero: Integer = new Integer(DigitVector.empty, false);

  /**
   * Builds a value from little-endian base-2^32 digits. Trailing zeros are
   * accepted and stripped.
   */
  static fromDigits(digits: Iterable<number>, negative = false): Integer {
    return canonical(Integer.raw(DigitVector.from(digits), negative));
  }

  /**
   * Kernel-side constructor. Keeps the digits as given, except that an empty
   * vector always yields `Integer.zero`. Callers that can produce high zeros
   * must pass the result through `canonical` before handing it out.
   */
  static raw(digits: DigitVector, negative: boolean): Integer {
    if (digits.isEmpty) return Integer.zero;
    return new Integer(digits, negative);
  }
}

export const zero = Integer.zero;

export function canonical(x: Integer): Integer {
  const digits = x.digits.trimHigh();
  if (digits.isEmpty) return Integer.zero;
  return digits === x.digits ? x : Integer.raw(digits, x.negative);
}

export function isZero(x: Integer): boolean {
  return x.digits.isEmpty;
}

export function sign(x: Integer): Sign {
  if (isZero(x)) return 0;
  return x.negative ? -1 : 1;
}

export function negate(x: Integer): Integer {
  if (isZero(x)) return Integer.zero;
  return Integer.raw(x.digits, !x.negative);
}

export function absoluteValue(x: Integer): Integer {
  return x.negative ? Integer.raw(x.digits, false) : x;
}

/** Same digits, sign forced to `negative` (zero stays non-negative). */
export function withSign(x: Integer, negative: boolean): Integer {
  if (isZero(x)) return Integer.zero;
  return x.negative === negative ? x : Integer.raw(x.digits, negative);
}
