/**
 * School-book multiplication: one digit-by-vector pass per digit of the
 * shorter operand, each shifted into place and summed.
 */

import { DigitVectorBuilder } from '../digits';
import { absoluteValue, canonical, Integer, withSign, zero } from '../integer';
import { ensureNonNegativeInteger } from '../utils/validate';
import { ensureDigit, multiplyDigits } from '../utils/word';
import { addMagnitudes } from './additive';
import { shiftLeft } from './shift';

const ONE = Integer.fromDigits([1]);

/** v * d for a single digit d; keeps the sign of v. */
export function multiplyByDigit(v: Integer, d: number): Integer {
  ensureDigit(d);
  const out = new DigitVectorBuilder(v.digits.length + 1);
  let carry = 0;
  for (const digit of v.digits) {
    const [low, high] = multiplyDigits(digit, d, carry);
    out.push(low);
    carry = high;
  }
  if (carry !== 0) out.push(carry);
  return canonical(Integer.raw(out.build(), v.negative));
}

export function multiply(x: Integer, y: Integer): Integer {
  // Shorter operand on the right bounds the number of partial products.
  if (y.digits.length > x.digits.length) return multiply(y, x);

  const negative = x.negative !== y.negative;
  const left = absoluteValue(x);
  const right = absoluteValue(y);

  let accumulator = zero;
  for (let i = 0; i < right.digits.length; i++) {
    const partial = multiplyByDigit(left, right.digits.at(i));
    accumulator = addMagnitudes(accumulator, shiftLeft(partial, i));
  }
  return withSign(canonical(accumulator), negative);
}

export function square(x: Integer): Integer {
  return multiply(x, x);
}

/** x^exponent by repeated squaring. `pow(x, 0)` is one, including for zero. */
export function pow(x: Integer, exponent: number): Integer {
  let remaining = ensureNonNegativeInteger(exponent, 'exponent');
  let result = ONE;
  let base = x;
  while (remaining > 0) {
    if (remaining % 2 === 1) result = multiply(result, base);
    remaining = Math.floor(remaining / 2);
    if (remaining > 0) base = square(base);
  }
  return result;
}
