/**
 * Octet Format - UInt8 Value Type
 *
 * Immutable 8-bit unsigned integer with comparison, equality, hashing and
 * text conversion. Plain numbers are accepted at the edges (`of`,
 * `compare`), but `equals` and `compareTo` only treat other UInt8 instances
 * as the same type, so `UInt8.of(78).equals(78)` is false.
 */

import { InvalidArgumentError } from '../errors/NumericErrors.js';
import type { NumericConventions } from '../conventions/NumericConventions.js';
import { byteFormatter } from '../formatting/ByteFormatter.js';
import { byteParser } from '../parsing/ByteParser.js';
import { type NumberStyle, NumberStyles } from '../parsing/NumberStyles.js';

// =============================================================================
// Constants
// =============================================================================

export const MIN_VALUE = 0;
export const MAX_VALUE = 0xff;

export function isByteValue(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= MIN_VALUE && value <= MAX_VALUE;
}

/**
 * Three-way comparison of two byte values: negative, zero or positive.
 */
export function compare(a: number, b: number): number {
  return a - b;
}

// =============================================================================
// UInt8 Class
// =============================================================================

export class UInt8 {
  static readonly MIN_VALUE = MIN_VALUE;
  static readonly MAX_VALUE = MAX_VALUE;

  readonly value: number;

  /**
   * Create a byte. Without an argument the value is 0.
   *
   * @throws InvalidArgumentError unless value is an integer in [0, 255]
   */
  constructor(value: number = 0) {
    if (!isByteValue(value)) {
      throw new InvalidArgumentError('value', `Expected an integer in [${MIN_VALUE}, ${MAX_VALUE}], got ${value}`);
    }
    this.value = value;
  }

  static of(value: number): UInt8 {
    return new UInt8(value);
  }

  static zero(): UInt8 {
    return new UInt8();
  }

  // ===========================================================================
  // Text Conversion
  // ===========================================================================

  /**
   * Parse text into a UInt8.
   *
   * @throws NullInputError, InvalidStyleError, FormatError or OverflowError
   */
  static parse(
    text: string | null | undefined,
    style: NumberStyle = NumberStyles.Integer,
    conventions?: NumericConventions | null
  ): UInt8 {
    return new UInt8(byteParser.parse(text, style, conventions));
  }

  /**
   * Parse text without throwing for bad input. The value is 0 on failure.
   *
   * @throws InvalidStyleError for a malformed style
   */
  static tryParse(
    text: string | null | undefined,
    style: NumberStyle = NumberStyles.Integer,
    conventions?: NumericConventions | null
  ): { success: boolean; value: UInt8 } {
    const result = byteParser.tryParse(text, style, conventions);
    return { success: result.success, value: new UInt8(result.value) };
  }

  toString(format?: string | null, conventions?: NumericConventions | null): string {
    return byteFormatter.format(this.value, format, conventions);
  }

  valueOf(): number {
    return this.value;
  }

  toJSON(): number {
    return this.value;
  }

  // ===========================================================================
  // Comparison & Equality
  // ===========================================================================

  /**
   * Compare with another UInt8. null and undefined sort before every byte.
   *
   * @throws InvalidArgumentError when `other` is any other type,
   * including a plain number
   */
  compareTo(other: unknown): number {
    if (other === null || other === undefined) return 1;
    if (!(other instanceof UInt8)) {
      throw new InvalidArgumentError('other', 'Object must be of type UInt8');
    }
    return compare(this.value, other.value);
  }

  equals(other: unknown): boolean {
    return other instanceof UInt8 && other.value === this.value;
  }

  hashCode(): number {
    return this.value;
  }
}
