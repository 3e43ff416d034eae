/**
 * Shared types for the bigdigits core.
 */
import type { Integer } from './integer';

export type Sign = -1 | 0 | 1;

/** Result of `compare`: negative, zero or positive like a sort comparator. */
export type Ordering = -1 | 0 | 1;

/** Textual radices the codec can pack into 32-bit digits. */
export type Radix = 2 | 4 | 8 | 16 | 32;

export interface ParseOptions {
  /** Radix of the digit characters: one of {@link Radix}. Default 16. */
  radix?: number;
}

export interface FormatOptions {
  /** Radix of the produced characters: one of {@link Radix}. Default 16. */
  radix?: number;
  /** Use `A-Z` rather than `a-z` for digit values above 9. Default true. */
  uppercase?: boolean;
}

export interface DivisionResult {
  /** `x / y` truncated toward zero. */
  quotient: Integer;
  /** `x - quotient * y`; carries the sign of the dividend. */
  remainder: Integer;
}

/** Anything `toInteger` accepts. Strings are read as hex literals. */
export type IntegerLike = Integer | bigint | number | string;
