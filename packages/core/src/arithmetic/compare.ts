import { absoluteValue, isZero, type Integer } from '../integer';
import type { Ordering } from '../types';

/** Orders |x| and |y|. Both must be canonical. */
export function compareMagnitude(x: Integer, y: Integer): Ordering {
  const a = x.digits;
  const b = y.digits;
  if (a.length !== b.length) return a.length < b.length ? -1 : 1;
  for (let i = a.length - 1; i >= 0; i--) {
    const da = a.at(i);
    const db = b.at(i);
    if (da !== db) return da < db ? -1 : 1;
  }
  return 0;
}

export function lessThan(x: Integer, y: Integer): boolean {
  if (isZero(x) && isZero(y)) return false;
  if (x.negative !== y.negative) return x.negative;
  if (x.negative) return lessThan(absoluteValue(y), absoluteValue(x));
  return compareMagnitude(x, y) < 0;
}

export function equal(x: Integer, y: Integer): boolean {
  if (isZero(x) && isZero(y)) return true;
  return x.negative === y.negative && x.digits.equals(y.digits);
}

export function compare(x: Integer, y: Integer): Ordering {
  if (equal(x, y)) return 0;
  return lessThan(x, y) ? -1 : 1;
}

export function lessThanOrEqual(x: Integer, y: Integer): boolean {
  return !lessThan(y, x);
}

export function greaterThan(x: Integer, y: Integer): boolean {
  return lessThan(y, x);
}

export function max(x: Integer, ...rest: Integer[]): Integer {
  return rest.reduce((acc, v) => (lessThan(acc, v) ? v : acc), x);
}

export function min(x: Integer, ...rest: Integer[]): Integer {
  return rest.reduce((acc, v) => (lessThan(v, acc) ? v : acc), x);
}
