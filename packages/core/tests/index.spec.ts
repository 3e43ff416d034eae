import { describe, expect, it } from 'vitest';
import {
  BigDigits,
  DivisionByZeroError,
  divide,
  fromBigInt,
  Integer,
  toBigInt,
  toHex,
  toInteger,
} from '../src/index';

describe('index exports', () => {
  it('exposes the free operations', () => {
    expect(typeof divide).toBe('function');
    expect(typeof toHex).toBe('function');
  });

  it('exposes the BigDigits namespace', () => {
    const x = BigDigits.parseHex('FFFFFFFF');
    const y = BigDigits.from(1);
    expect(BigDigits.toHex(BigDigits.add(x, y))).toBe('100000000');
    expect(BigDigits.format(BigDigits.fromDigits([0, 1]), { radix: 2 })).toBe(`1${'0'.repeat(32)}`);
    expect(BigDigits.errors.DivisionByZeroError).toBe(DivisionByZeroError);
    expect(() => BigDigits.divide(x, BigDigits.zero)).toThrow(DivisionByZeroError);
  });
});

describe('toInteger', () => {
  it('passes Integer values through', () => {
    const x = Integer.fromDigits([3]);
    expect(toInteger(x)).toBe(x);
  });

  it('converts numbers, bigints and hex strings', () => {
    expect(toHex(toInteger(-255))).toBe('-FF');
    expect(toHex(toInteger(2n ** 64n))).toBe('10000000000000000');
    expect(toHex(toInteger('-abc'))).toBe('-ABC');
  });

  it('rejects numbers that are not safe integers', () => {
    expect(() => toInteger(1.5)).toThrow(TypeError);
    expect(() => toInteger(2 ** 60)).toThrow(/safe integer/);
  });

  it('bridges to native bigint', () => {
    expect(toBigInt(fromBigInt(-(2n ** 100n) + 1n))).toBe(-(2n ** 100n) + 1n);
    expect(toBigInt(BigDigits.zero)).toBe(0n);
  });
});
