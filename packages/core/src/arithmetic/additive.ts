/**
 * Addition and subtraction. The signed entry points reduce each other until
 * both operands are non-negative (and x >= y for subtraction), then run the
 * unsigned carry/borrow kernels below.
 */

import { DigitVectorBuilder } from '../digits';
import { InvariantViolationError } from '../errors';
import { canonical, Integer, negate } from '../integer';
import { BASE, inverseDigit } from '../utils/word';
import { lessThan } from './compare';

export function add(x: Integer, y: Integer): Integer {
  // -x + -y = -(x + y)
  if (x.negative && y.negative) return negate(add(negate(x), negate(y)));
  // -x + y = y - x
  if (x.negative) return subtract(y, negate(x));
  // x + -y = x - y
  if (y.negative) return subtract(x, negate(y));
  return addMagnitudes(x, y);
}

export function subtract(x: Integer, y: Integer): Integer {
  // x - y = -(y - x)
  if (lessThan(x, y)) return negate(subtract(y, x));
  // -x - -y = -(x - y)
  if (x.negative && y.negative) return negate(subtract(negate(x), negate(y)));
  // -x - y = -(x + y)
  if (x.negative) return negate(add(negate(x), y));
  // x - -y = x + y
  if (y.negative) return add(x, negate(y));
  return subtractMagnitudes(x, y);
}

/** |x| + |y|. */
export function addMagnitudes(x: Integer, y: Integer): Integer {
  const a = x.digits;
  const b = y.digits;
  const n = Math.max(a.length, b.length);
  const out = new DigitVectorBuilder(n + 1);
  let carry = 0;
  for (let i = 0; i < n; i++) {
    const sum = a.digit(i) + b.digit(i) + carry;
    if (sum >= BASE) {
      out.push(sum - BASE);
      carry = 1;
    } else {
      out.push(sum);
      carry = 0;
    }
  }
  if (carry === 1) out.push(1);
  return canonical(Integer.raw(out.build(), false));
}

/** |x| - |y|; requires |x| >= |y|. */
export function subtractMagnitudes(x: Integer, y: Integer): Integer {
  const a = x.digits;
  const b = y.digits;
  const n = Math.max(a.length, b.length);
  const out = new DigitVectorBuilder(n);
  let borrow = 0;
  for (let i = 0; i < n; i++) {
    const minuend = a.digit(i) - borrow;
    const subtrahend = b.digit(i);
    if (minuend >= subtrahend) {
      out.push(minuend - subtrahend);
      borrow = 0;
    } else {
      out.push(inverseDigit(subtrahend - minuend));
      borrow = 1;
    }
  }
  if (borrow !== 0) {
    throw new InvariantViolationError('Unsigned subtraction underflowed: minuend is smaller than subtrahend.');
  }
  while (out.last() === 0) out.pop();
  return Integer.raw(out.build(), false);
}
