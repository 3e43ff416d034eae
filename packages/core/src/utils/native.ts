/**
 * Bridges between Integer and the host bigint / number types.
 */

import { DigitVectorBuilder } from '../digits';
import { Integer } from '../integer';
import { parseHex } from '../text';
import type { IntegerLike } from '../types';

const DIGIT_MASK = (1n << 32n) - 1n;

export function fromBigInt(value: bigint): Integer {
  const negative = value < 0n;
  let rest = negative ? -value : value;
  const out = new DigitVectorBuilder();
  while (rest > 0n) {
    out.push(Number(rest & DIGIT_MASK));
    rest >>= 32n;
  }
  return Integer.raw(out.build(), negative);
}

export function toBigInt(x: Integer): bigint {
  let value = 0n;
  for (let i = x.digits.length - 1; i >= 0; i--) {
    value = (value << 32n) | BigInt(x.digits.at(i));
  }
  return x.negative ? -value : value;
}

/** Coerces a value to an Integer; strings are read as hex literals. */
export function toInteger(value: IntegerLike): Integer {
  if (value instanceof Integer) return value;
  if (typeof value === 'bigint') return fromBigInt(value);
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new TypeError(`Expected a safe integer. Received: ${value}.`);
    }
    return fromBigInt(BigInt(value));
  }
  return parseHex(value);
}
