import { Integer, isZero } from '../integer';
import { ensureNonNegativeInteger } from '../utils/validate';

/** x * B^k: prepends k zero digits. Zero stays zero. */
export function shiftLeft(x: Integer, k: number): Integer {
  ensureNonNegativeInteger(k, 'shift amount');
  if (isZero(x) || k === 0) return x;
  let digits = x.digits;
  for (let i = 0; i < k; i++) {
    digits = digits.pushFront(0);
  }
  return Integer.raw(digits, x.negative);
}

/** x / B^k with the magnitude truncated: drops the k lowest digits. */
export function shiftRight(x: Integer, k: number): Integer {
  ensureNonNegativeInteger(k, 'shift amount');
  if (k === 0) return x;
  return Integer.raw(x.digits.drop(k), x.negative);
}
