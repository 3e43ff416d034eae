/**
 * Text codec for power-of-two radices. Each character carries log2(radix)
 * bits; parsing packs them into 32-bit digits from the right, spilling across
 * digit boundaries when the width does not divide 32.
 */

import { DigitVectorBuilder, type DigitVector } from './digits';
import { MalformedLiteralError, UnsupportedRadixError } from './errors';
import { canonical, Integer, isZero } from './integer';
import type { FormatOptions, ParseOptions, Radix } from './types';
import { DIGIT_BITS, toDigit } from './utils/word';

export const DEFAULT_RADIX: Radix = 16;
export const DEFAULT_UPPERCASE = true;

const BITS_PER_CHARACTER = new Map<number, number>([
  [2, 1],
  [4, 2],
  [8, 3],
  [16, 4],
  [32, 5],
]);

const UPPER_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const LOWER_ALPHABET = UPPER_ALPHABET.toLowerCase();

function bitsPerCharacter(radix: number): number {
  const bits = BITS_PER_CHARACTER.get(radix);
  if (bits === undefined) {
    throw new UnsupportedRadixError(radix);
  }
  return bits;
}

/** 0-9 and a-z/A-Z map to 0..35; anything else to -1. */
function characterValue(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30;
  if (code >= 0x41 && code <= 0x5a) return code - 0x41 + 10;
  if (code >= 0x61 && code <= 0x7a) return code - 0x61 + 10;
  return -1;
}

export function parseInteger(text: string, options: ParseOptions = {}): Integer {
  const radix = options.radix ?? DEFAULT_RADIX;
  const width = bitsPerCharacter(radix);

  let first = 0;
  let negative = false;
  if (text.startsWith('-') || text.startsWith('+')) {
    negative = text.startsWith('-');
    first = 1;
  }

  const out = new DigitVectorBuilder(Math.ceil(((text.length - first) * width) / DIGIT_BITS));
  let current = 0;
  let filled = 0;
  for (let i = text.length - 1; i >= first; i--) {
    const value = characterValue(text.charCodeAt(i));
    if (value < 0 || value >= radix) {
      throw new MalformedLiteralError(text, i);
    }
    current = toDigit(current | (value << filled));
    filled += width;
    if (filled >= DIGIT_BITS) {
      out.push(current);
      filled -= DIGIT_BITS;
      current = filled > 0 ? value >>> (width - filled) : 0;
    }
  }
  if (current !== 0) out.push(current);

  return canonical(Integer.raw(out.build(), negative));
}

function readBits(digits: DigitVector, position: number, width: number): number {
  let value = 0;
  for (let bit = position + width - 1; bit >= position; bit--) {
    const index = Math.floor(bit / DIGIT_BITS);
    const set = (digits.digit(index) >>> (bit % DIGIT_BITS)) & 1;
    value = value * 2 + set;
  }
  return value;
}

/** Renders x in the given radix. Zero renders as "0". */
export function formatInteger(x: Integer, options: FormatOptions = {}): string {
  const radix = options.radix ?? DEFAULT_RADIX;
  const width = bitsPerCharacter(radix);
  const alphabet = (options.uppercase ?? DEFAULT_UPPERCASE) ? UPPER_ALPHABET : LOWER_ALPHABET;

  if (isZero(x)) return '0';

  const parts: string[] = x.negative ? ['-'] : [];
  const characters = Math.ceil((x.digits.length * DIGIT_BITS) / width);
  let started = false;
  for (let c = characters - 1; c >= 0; c--) {
    const value = readBits(x.digits, c * width, width);
    if (!started && value === 0) continue;
    started = true;
    parts.push(alphabet.charAt(value));
  }
  return parts.join('');
}

export function parseHex(text: string): Integer {
  return parseInteger(text, { radix: 16 });
}

export function toHex(x: Integer, uppercase = DEFAULT_UPPERCASE): string {
  return formatInteger(x, { radix: 16, uppercase });
}
