/**
 * Octet Format - Error Types
 *
 * Closed family of errors raised by the parser, formatter and value type.
 * Every error carries a `kind` discriminant so callers can switch on it
 * without instanceof chains.
 */

// =============================================================================
// Types
// =============================================================================

export type NumericErrorKind =
  | 'NullInput'        // parse(null)
  | 'InvalidStyle'     // malformed style bitset
  | 'Format'           // malformed text
  | 'Overflow'         // well-formed text outside [0, 255]
  | 'InvalidFormat'    // unknown format token
  | 'InvalidArgument'; // bad value, comparand or conventions

export const NUMERIC_ERROR_KINDS: readonly NumericErrorKind[] = [
  'NullInput',
  'InvalidStyle',
  'Format',
  'Overflow',
  'InvalidFormat',
  'InvalidArgument',
];

// =============================================================================
// Base Class
// =============================================================================

export abstract class NumericError extends Error {
  abstract readonly kind: NumericErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// =============================================================================
// Parser Errors
// =============================================================================

export class NullInputError extends NumericError {
  readonly kind = 'NullInput' as const;

  constructor() {
    super('Value cannot be null.');
  }
}

export class InvalidStyleError extends NumericError {
  readonly kind = 'InvalidStyle' as const;
  style: number;

  constructor(style: number, reason: string) {
    super(`Invalid number style 0x${(style >>> 0).toString(16).toUpperCase()}: ${reason}`);
    this.style = style;
  }
}

export class FormatError extends NumericError {
  readonly kind = 'Format' as const;
  input: string;

  constructor(input: string) {
    super(`Input string was not in a correct format: ${JSON.stringify(input)}`);
    this.input = input;
  }
}

export class OverflowError extends NumericError {
  readonly kind = 'Overflow' as const;
  input: string;

  constructor(input: string) {
    super(`Value was either too large or too small for an unsigned byte: ${JSON.stringify(input)}`);
    this.input = input;
  }
}

// =============================================================================
// Formatter / Argument Errors
// =============================================================================

export class InvalidFormatError extends NumericError {
  readonly kind = 'InvalidFormat' as const;
  format: string;

  constructor(format: string) {
    super(`Format specifier was invalid: ${JSON.stringify(format)}`);
    this.format = format;
  }
}

export class InvalidArgumentError extends NumericError {
  readonly kind = 'InvalidArgument' as const;
  argument: string;

  constructor(argument: string, message: string) {
    super(`${message} (parameter '${argument}')`);
    this.argument = argument;
  }
}

// =============================================================================
// Guards
// =============================================================================

export function isNumericError(error: unknown): error is NumericError {
  return error instanceof NumericError;
}

export function isNumericErrorKind(value: string): value is NumericErrorKind {
  return NUMERIC_ERROR_KINDS.some((kind) => kind === value);
}
