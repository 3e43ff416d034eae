/**
 * Long division in base 2^32. Each quotient digit comes from a bitwise binary
 * search over its 32 bits against the running remainder.
 */

import { DigitVector } from '../digits';
import { DivisionByZeroError } from '../errors';
import { absoluteValue, Integer, isZero, withSign, zero } from '../integer';
import type { DivisionResult } from '../types';
import { DIGIT_BITS } from '../utils/word';
import { subtractMagnitudes } from './additive';
import { compareMagnitude } from './compare';
import { multiplyByDigit } from './multiply';

/**
 * The digit q in [0, 2^32) with q*y <= carry < (q+1)*y.
 * Both operands are read as magnitudes; carry must be below y * 2^32.
 */
export function smallDivide(carry: Integer, y: Integer): number {
  if (compareMagnitude(carry, y) < 0) return 0;
  let q = 0;
  for (let bit = DIGIT_BITS - 1; bit >= 0; bit--) {
    const candidate = q + 2 ** bit;
    if (compareMagnitude(multiplyByDigit(y, candidate), carry) <= 0) {
      q = candidate;
    }
  }
  return q;
}

/**
 * Truncated division: the quotient rounds toward zero and the remainder takes
 * the sign of the dividend, so `x = quotient * y + remainder` and
 * `|remainder| < |y|`.
 */
export function divide(x: Integer, y: Integer): DivisionResult {
  if (isZero(y)) {
    throw new DivisionByZeroError();
  }
  if (compareMagnitude(x, y) < 0) {
    return { quotient: zero, remainder: x };
  }

  const negative = x.negative !== y.negative;
  const divisor = absoluteValue(y);

  let carry = zero;
  let digits = DigitVector.empty;
  for (let i = x.digits.length - 1; i >= 0; i--) {
    const d = x.digits.at(i);
    // carry = carry * B + d, keeping zero canonical
    if (!isZero(carry) || d !== 0) {
      carry = Integer.raw(carry.digits.pushFront(d), false);
    }

    const q = smallDivide(carry, divisor);
    if (!digits.isEmpty || q !== 0) {
      digits = digits.pushFront(q);
    }
    if (q !== 0) {
      carry = subtractMagnitudes(carry, multiplyByDigit(divisor, q));
    }
  }

  return {
    quotient: Integer.raw(digits, negative),
    remainder: withSign(carry, x.negative),
  };
}

export function quotient(x: Integer, y: Integer): Integer {
  return divide(x, y).quotient;
}

export function remainder(x: Integer, y: Integer): Integer {
  return divide(x, y).remainder;
}
