import { DigitVector, DigitVectorBuilder } from './digits';
import { Integer, zero, canonical, isZero, sign, negate, absoluteValue, withSign } from './integer';
import {
  compare,
  compareMagnitude,
  equal,
  greaterThan,
  lessThan,
  lessThanOrEqual,
  max,
  min,
} from './arithmetic/compare';
import { add, subtract } from './arithmetic/additive';
import { shiftLeft, shiftRight } from './arithmetic/shift';
import { multiply, multiplyByDigit, pow, square } from './arithmetic/multiply';
import { divide, quotient, remainder, smallDivide } from './arithmetic/divide';
import { parseInteger, formatInteger, parseHex, toHex, DEFAULT_RADIX, DEFAULT_UPPERCASE } from './text';
import { fromBigInt, toBigInt, toInteger } from './utils/native';
import { BASE, DIGIT_BITS, MAX_DIGIT } from './utils/word';
import {
  BigDigitsError,
  DivisionByZeroError,
  MalformedLiteralError,
  UnsupportedRadixError,
  InvariantViolationError,
  isBigDigitsError,
} from './errors';

export type {
  Sign,
  Ordering,
  Radix,
  ParseOptions,
  FormatOptions,
  DivisionResult,
  IntegerLike,
} from './types';

export { DigitVector, DigitVectorBuilder };
export { Integer, zero, canonical, isZero, sign, negate, absoluteValue, withSign };
export { compare, compareMagnitude, equal, greaterThan, lessThan, lessThanOrEqual, max, min };
export { add, subtract };
export { shiftLeft, shiftRight };
export { multiply, multiplyByDigit, pow, square };
export { divide, quotient, remainder, smallDivide };
export { parseInteger, formatInteger, parseHex, toHex, DEFAULT_RADIX, DEFAULT_UPPERCASE };
export { fromBigInt, toBigInt, toInteger };
export { BASE, DIGIT_BITS, MAX_DIGIT };
export {
  BigDigitsError,
  DivisionByZeroError,
  MalformedLiteralError,
  UnsupportedRadixError,
  InvariantViolationError,
  isBigDigitsError,
};

export const BigDigits = {
  zero,
  fromDigits: Integer.fromDigits,
  from: toInteger,
  parse: parseInteger,
  format: formatInteger,
  parseHex,
  toHex,
  negate,
  abs: absoluteValue,
  compare,
  equal,
  lessThan,
  add,
  subtract,
  multiply,
  divide,
  pow,
  shiftLeft,
  shiftRight,
  errors: {
    BigDigitsError,
    DivisionByZeroError,
    MalformedLiteralError,
    UnsupportedRadixError,
    InvariantViolationError,
    isBigDigitsError,
  },
};
