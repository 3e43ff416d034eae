import { describe, expect, it } from 'vitest';

import { MalformedLiteralError, UnsupportedRadixError } from '../src/errors';
import { negate, zero } from '../src/integer';
import { formatInteger, parseHex, parseInteger, toHex } from '../src/text';

describe('parseHex', () => {
  it('packs eight characters per digit from the right', () => {
    expect(parseHex('123456789').digits.toArray()).toEqual([0x23456789, 1]);
    expect(parseHex('100000000').digits.toArray()).toEqual([0, 1]);
  });

  it('accepts either case', () => {
    expect(parseHex('abcDEF').digits.toArray()).toEqual([0xabcdef]);
  });

  it('reads an optional sign', () => {
    expect(toHex(parseHex('+1F'))).toBe('1F');
    expect(parseHex('-1F').negative).toBe(true);
    expect(parseHex('-0')).toBe(zero);
  });

  it('strips leading zeros', () => {
    expect(parseHex('0000000000000001').digits.toArray()).toEqual([1]);
    expect(parseHex('00000000')).toBe(zero);
  });

  it('reads an empty digit section as zero', () => {
    expect(parseHex('')).toBe(zero);
    expect(parseHex('-')).toBe(zero);
  });

  it('rejects characters outside the hex alphabet', () => {
    let caught: unknown;
    try {
      parseHex('12G4');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedLiteralError);
    expect(caught).toMatchObject({
      code: 'MalformedTextualLiteral',
      index: 2,
      character: 'G',
      literal: '12G4',
      message: 'Unexpected character "G" at index 2 in "12G4".',
    });
  });

  it('rejects a second sign and embedded whitespace', () => {
    expect(() => parseHex('+-1')).toThrow(/at index 1/);
    expect(() => parseHex('1 2')).toThrow(MalformedLiteralError);
    expect(() => parseHex('0x10')).toThrow(/"x" at index 1/);
  });
});

describe('toHex', () => {
  it('renders uppercase by default and lowercase on request', () => {
    const x = parseHex('abcdef');
    expect(toHex(x)).toBe('ABCDEF');
    expect(toHex(x, false)).toBe('abcdef');
  });

  it('suppresses leading zero nibbles of the top digit only', () => {
    expect(toHex(parseHex('100000001'))).toBe('100000001');
    expect(toHex(parseHex('1000000000000000F'))).toBe('1000000000000000F');
  });

  it('prints a sign for negatives', () => {
    expect(toHex(negate(parseHex('FF')))).toBe('-FF');
  });

  it('prints zero as "0"', () => {
    expect(toHex(zero)).toBe('0');
    expect(parseHex(toHex(zero))).toBe(zero);
  });
});

describe('other power-of-two radices', () => {
  it('packs octal characters across digit boundaries', () => {
    expect(parseInteger('37777777777', { radix: 8 }).digits.toArray()).toEqual([0xffffffff]);
    expect(parseInteger('40000000000', { radix: 8 }).digits.toArray()).toEqual([0, 1]);
    expect(formatInteger(parseHex('100000000'), { radix: 8 })).toBe('40000000000');
  });

  it('handles binary and base 32', () => {
    expect(formatInteger(parseHex('A'), { radix: 2 })).toBe('1010');
    expect(toHex(parseInteger('-1010', { radix: 2 }))).toBe('-A');
    expect(formatInteger(parseHex('-FFFFFFFF'), { radix: 32, uppercase: false })).toBe('-3vvvvvv');
    expect(formatInteger(parseHex('FFFFFFFF'), { radix: 32 })).toBe('3VVVVVV');
    expect(toHex(parseInteger('3vvvvvv', { radix: 32 }))).toBe('FFFFFFFF');
  });

  it('rejects characters at or above the radix', () => {
    expect(() => parseInteger('102', { radix: 2 })).toThrow(/"2" at index 2/);
    expect(() => parseInteger('8', { radix: 8 })).toThrow(MalformedLiteralError);
  });

  it('rejects radices that are not powers of two up to 32', () => {
    expect(() => parseInteger('10', { radix: 10 })).toThrow(UnsupportedRadixError);
    expect(() => formatInteger(zero, { radix: 64 })).toThrow(/Radix 64 is not supported/);
  });
});
