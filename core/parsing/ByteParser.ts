/**
 * Octet Format - Byte Parser
 *
 * Converts text to an unsigned 8-bit integer under a style bitset and a
 * conventions snapshot.
 *
 * Pipeline:
 * 1. Null check
 * 2. Style validation (before any text is read)
 * 3. Lexing: leading section, digits, trailing section
 * 4. Value: fraction check, 32-bit intermediate, narrowing to [0, 255]
 *
 * Failures are classified in that order, so an OverflowError always means
 * the text itself was well formed.
 */

import {
  FormatError,
  NullInputError,
  OverflowError,
} from '../errors/NumericErrors.js';
import type { NumericConventions } from '../conventions/NumericConventions.js';
import {
  type ConventionSource,
  currentConventions,
  resolveConventions,
} from '../conventions/ConventionProvider.js';
import {
  type NumberStyle,
  NumberStyles,
  hasFlag,
  validateNumberStyle,
} from './NumberStyles.js';

// =============================================================================
// Types
// =============================================================================

export interface TryParseResult {
  /** Whether the text was parsed */
  success: boolean;
  /** Parsed value, 0 on failure */
  value: number;
}

/** Lexed form of the input, before any arithmetic */
export interface ScannedNumber {
  /** A negative sign or parentheses were consumed */
  negative: boolean;
  /** Digits are base 16 */
  hex: boolean;
  /** Digits before the decimal separator */
  integral: string;
  /** Digits after the decimal separator */
  fraction: string;
  /** Decimal exponent (0 unless AllowExponent) */
  exponent: number;
}

export type ParseFailure = 'Format' | 'Overflow';

export type ParseOutcome =
  | { ok: true; value: number }
  | { ok: false; failure: ParseFailure };

// =============================================================================
// Constants
// =============================================================================

/** Largest magnitude of the 32-bit signed intermediate */
const INT32_MAX = 2147483647;
const INT32_MIN_MAGNITUDE = 2147483648;
const BYTE_MAX = 255;

/** Exponents beyond this overflow regardless of the digits */
const EXPONENT_CAP = 100000;

// =============================================================================
// Character Classes
// =============================================================================

function isWhite(ch: string): boolean {
  return /^\s$/u.test(ch);
}

function isDecimalDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isHexDigit(ch: string): boolean {
  return isDecimalDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

// =============================================================================
// Lexer
// =============================================================================

class Lexer {
  pos = 0;

  constructor(
    private readonly text: string,
    private readonly conventions: NumericConventions
  ) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text[this.pos];
  }

  matches(token: string): boolean {
    return token.length > 0 && this.text.startsWith(token, this.pos);
  }

  consume(token: string): boolean {
    if (!this.matches(token)) return false;
    this.pos += token.length;
    return true;
  }

  /**
   * Consume a sign token. The longer token wins when one is a prefix of
   * the other. Returns whether the sign was negative, or null.
   */
  consumeSign(): { negative: boolean } | null {
    const { negativeSign, positiveSign } = this.conventions;
    const candidates = [
      { token: negativeSign, negative: true },
      { token: positiveSign, negative: false },
    ].sort((a, b) => b.token.length - a.token.length);

    for (const candidate of candidates) {
      if (this.consume(candidate.token)) {
        return { negative: candidate.negative };
      }
    }
    return null;
  }
}

/**
 * Lex `text` per `style`. Returns null when the text is not a number in
 * that style; no arithmetic happens here.
 */
export function scanNumber(
  text: string,
  style: NumberStyle,
  conventions: NumericConventions
): ScannedNumber | null {
  const lexer = new Lexer(text, conventions);
  const hex = hasFlag(style, NumberStyles.AllowHexSpecifier);

  let signSeen = false;
  let negative = false;
  let parenOpen = false;
  let currencySeen = false;

  // Leading section
  while (!lexer.done) {
    if (hasFlag(style, NumberStyles.AllowLeadingWhite) && !signSeen && isWhite(lexer.peek())) {
      lexer.pos++;
      continue;
    }
    if (hasFlag(style, NumberStyles.AllowLeadingSign) && !signSeen) {
      const sign = lexer.consumeSign();
      if (sign) {
        signSeen = true;
        negative = sign.negative;
        continue;
      }
    }
    if (hasFlag(style, NumberStyles.AllowParentheses) && !signSeen && lexer.consume('(')) {
      signSeen = true;
      negative = true;
      parenOpen = true;
      continue;
    }
    if (hasFlag(style, NumberStyles.AllowCurrencySymbol) && !currencySeen && lexer.consume(conventions.currencySymbol)) {
      currencySeen = true;
      continue;
    }
    break;
  }

  // Digits
  let integral = '';
  let fraction = '';
  let exponent = 0;

  if (hex) {
    while (!lexer.done && isHexDigit(lexer.peek())) {
      integral += lexer.peek();
      lexer.pos++;
    }
    if (integral === '') return null;
  } else {
    let inFraction = false;
    while (!lexer.done) {
      const ch = lexer.peek();
      if (isDecimalDigit(ch)) {
        if (inFraction) fraction += ch;
        else integral += ch;
        lexer.pos++;
        continue;
      }
      if (hasFlag(style, NumberStyles.AllowDecimalPoint) && !inFraction && lexer.consume(conventions.decimalSeparator)) {
        inFraction = true;
        continue;
      }
      if (hasFlag(style, NumberStyles.AllowThousands) && !inFraction && integral !== '' && lexer.consume(conventions.groupSeparator)) {
        continue;
      }
      break;
    }
    if (integral === '' && fraction === '') return null;

    if (hasFlag(style, NumberStyles.AllowExponent) && (lexer.peek() === 'e' || lexer.peek() === 'E')) {
      const mark = lexer.pos;
      lexer.pos++;
      const sign = lexer.consumeSign();
      let expDigits = 0;
      let value = 0;
      while (!lexer.done && isDecimalDigit(lexer.peek())) {
        value = Math.min(value * 10 + (lexer.peek().charCodeAt(0) - 48), EXPONENT_CAP);
        expDigits++;
        lexer.pos++;
      }
      if (expDigits === 0) {
        // Not an exponent; leave the marker for the trailing check to reject
        lexer.pos = mark;
      } else {
        exponent = sign?.negative ? -value : value;
      }
    }
  }

  // Trailing section
  while (!lexer.done) {
    if (hasFlag(style, NumberStyles.AllowTrailingWhite) && isWhite(lexer.peek())) {
      lexer.pos++;
      continue;
    }
    if (hasFlag(style, NumberStyles.AllowTrailingSign) && !signSeen) {
      const sign = lexer.consumeSign();
      if (sign) {
        signSeen = true;
        negative = sign.negative;
        continue;
      }
    }
    if (hasFlag(style, NumberStyles.AllowCurrencySymbol) && !currencySeen && lexer.consume(conventions.currencySymbol)) {
      currencySeen = true;
      continue;
    }
    if (parenOpen && lexer.consume(')')) {
      parenOpen = false;
      continue;
    }
    break;
  }

  if (!lexer.done || parenOpen) return null;

  return { negative, hex, integral, fraction, exponent };
}

// =============================================================================
// Value Computation
// =============================================================================

/**
 * Turn a scanned number into a byte, or classify why it cannot be one.
 */
export function computeByte(scanned: ScannedNumber): ParseOutcome {
  if (scanned.hex) {
    // More than 8 significant hex digits exceeds the 32-bit intermediate
    const digits = scanned.integral.replace(/^0+/, '');
    if (digits.length > 8) return { ok: false, failure: 'Overflow' };
    const value = digits === '' ? 0 : parseInt(digits, 16);
    if (value > BYTE_MAX) return { ok: false, failure: 'Overflow' };
    return { ok: true, value };
  }

  // Position the decimal point inside one digit run, then drop leading zeros
  let digits = scanned.integral + scanned.fraction;
  let scale = scanned.integral.length + scanned.exponent;
  const leadingZeros = digits.length - digits.replace(/^0+/, '').length;
  digits = digits.slice(leadingZeros);
  scale -= leadingZeros;

  let magnitude = 0;
  if (digits !== '') {
    const remainder = digits.slice(Math.max(scale, 0));
    if (/[1-9]/.test(remainder)) return { ok: false, failure: 'Format' };

    // First digit is non-zero, so more than 10 integral digits exceeds 32 bits
    if (scale > 10) return { ok: false, failure: 'Overflow' };
    const integralDigits = digits.slice(0, scale).padEnd(scale, '0');
    magnitude = Number(integralDigits);
  }

  const limit = scanned.negative ? INT32_MIN_MAGNITUDE : INT32_MAX;
  if (magnitude > limit) return { ok: false, failure: 'Overflow' };

  if (scanned.negative && magnitude !== 0) return { ok: false, failure: 'Overflow' };
  if (magnitude > BYTE_MAX) return { ok: false, failure: 'Overflow' };

  return { ok: true, value: magnitude };
}

// =============================================================================
// ByteParser Class
// =============================================================================

export class ByteParser {
  private source: ConventionSource;

  constructor(source: ConventionSource = currentConventions) {
    this.source = source;
  }

  /**
   * Parse text into a byte.
   *
   * @throws NullInputError when text is null or undefined
   * @throws InvalidStyleError when the style bitset is malformed
   * @throws FormatError when the text is not a number in this style
   * @throws OverflowError when the number lies outside [0, 255]
   */
  parse(
    text: string | null | undefined,
    style: NumberStyle = NumberStyles.Integer,
    conventions?: NumericConventions | null
  ): number {
    if (text === null || text === undefined) {
      throw new NullInputError();
    }
    validateNumberStyle(style);

    const outcome = this.run(text, style, conventions);
    if (outcome.ok) return outcome.value;

    throw outcome.failure === 'Overflow' ? new OverflowError(text) : new FormatError(text);
  }

  /**
   * Parse without throwing for bad text. Still throws InvalidStyleError:
   * a malformed style is a caller bug, not bad input.
   */
  tryParse(
    text: string | null | undefined,
    style: NumberStyle = NumberStyles.Integer,
    conventions?: NumericConventions | null
  ): TryParseResult {
    validateNumberStyle(style);
    if (text === null || text === undefined) {
      return { success: false, value: 0 };
    }

    const outcome = this.run(text, style, conventions);
    return outcome.ok
      ? { success: true, value: outcome.value }
      : { success: false, value: 0 };
  }

  /**
   * Get the conventions source consulted when none are passed.
   */
  getSource(): ConventionSource {
    return this.source;
  }

  private run(
    text: string,
    style: NumberStyle,
    conventions: NumericConventions | null | undefined
  ): ParseOutcome {
    const snapshot = resolveConventions(conventions, this.source);
    const scanned = scanNumber(text, style, snapshot);
    if (!scanned) return { ok: false, failure: 'Format' };
    return computeByte(scanned);
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

/** Default parser reading the process-wide conventions */
export const byteParser = new ByteParser();

// =============================================================================
// Factory Function
// =============================================================================

export function createByteParser(source?: ConventionSource): ByteParser {
  return new ByteParser(source);
}
