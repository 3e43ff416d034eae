export class BigDigitsError extends Error {
  readonly code: string;

  constructor(code: string, message?: string) {
    super(message ?? code);
    this.name = new.target?.name ?? 'BigDigitsError';
    this.code = code;
  }
}

export class DivisionByZeroError extends BigDigitsError {
  constructor(message?: string) {
    super('DivisionByZero', message ?? 'Division by zero.');
  }
}

export class MalformedLiteralError extends BigDigitsError {
  readonly literal: string;
  readonly index: number;
  readonly character: string;

  constructor(literal: string, index: number, message?: string) {
    const character = literal.charAt(index);
    super(
      'MalformedTextualLiteral',
      message ?? `Unexpected character ${JSON.stringify(character)} at index ${index} in ${JSON.stringify(literal)}.`
    );
    this.literal = literal;
    this.index = index;
    this.character = character;
  }
}

export class UnsupportedRadixError extends BigDigitsError {
  readonly radix: number;

  constructor(radix: number, message?: string) {
    super('UnsupportedRadix', message ?? `Radix ${radix} is not supported; use 2, 4, 8, 16 or 32.`);
    this.radix = radix;
  }
}

/** A kernel reached a state that well-formed operands cannot produce. */
export class InvariantViolationError extends BigDigitsError {
  constructor(message: string) {
    super('InvariantViolation', message);
  }
}

export function isBigDigitsError(error: unknown, code?: string): error is BigDigitsError {
  if (!(error instanceof BigDigitsError)) return false;
  return code === undefined || error.code === code;
}
