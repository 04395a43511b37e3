/**
 * Octet Format - Byte Formatter
 *
 * Renders an unsigned 8-bit integer as text under a standard format token.
 *
 * Supported tokens (letter case-insensitive, optional 0-99 precision):
 * - G / g  General: shortest decimal digits
 * - D / d  Decimal: zero-padded to the precision
 * - X / x  Hexadecimal: digit case follows the letter
 * - N / n  Number: grouped digits plus a zero fraction (default 2 digits)
 *
 * Design:
 * - Pure: the value has no fractional part, so N is purely textual
 * - Cached: parsed tokens are memoized per formatter
 * - Locale-ready: separators come from a conventions snapshot
 */

import { InvalidArgumentError, InvalidFormatError } from '../errors/NumericErrors.js';
import {
  type NumericConventions,
  groupDigits,
} from '../conventions/NumericConventions.js';
import {
  type ConventionSource,
  currentConventions,
  resolveConventions,
} from '../conventions/ConventionProvider.js';

// =============================================================================
// Types
// =============================================================================

export type FormatKind = 'general' | 'decimal' | 'hex' | 'number';

export interface FormatSpec {
  /** Original format token */
  original: string;
  /** Rendering mode */
  kind: FormatKind;
  /** Whether the letter was uppercase (hex digits, exponent marker) */
  upper: boolean;
  /** Explicit precision, or null when the token had none */
  precision: number | null;
}

// =============================================================================
// Constants
// =============================================================================

const KIND_BY_LETTER: Record<string, FormatKind> = {
  g: 'general',
  d: 'decimal',
  x: 'hex',
  n: 'number',
};

const DEFAULT_NUMBER_DECIMALS = 2;

const GENERAL_SPEC: FormatSpec = Object.freeze({
  original: 'G',
  kind: 'general',
  upper: true,
  precision: null,
});

// =============================================================================
// ByteFormatter Class
// =============================================================================

export class ByteFormatter {
  /** Cache for parsed format tokens */
  private cache: Map<string, FormatSpec> = new Map();

  private source: ConventionSource;

  constructor(source: ConventionSource = currentConventions) {
    this.source = source;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Parse a format token. Results are cached.
   *
   * @throws InvalidFormatError for anything but a known letter plus an
   * optional 0-99 precision
   */
  parseFormat(format: string | null | undefined): FormatSpec {
    if (format === null || format === undefined || format === '') {
      return GENERAL_SPEC;
    }

    const cached = this.cache.get(format);
    if (cached) return cached;

    const parsed = parseFormatToken(format);
    this.cache.set(format, parsed);
    return parsed;
  }

  /**
   * Format a byte.
   *
   * @param value Integer in [0, 255]
   * @param format Format token; empty or absent means G
   * @param conventions Snapshot to use; absent reads the current one
   */
  format(
    value: number,
    format?: string | null,
    conventions?: NumericConventions | null
  ): string {
    assertByte(value);
    const spec = this.parseFormat(format);

    switch (spec.kind) {
      case 'general':
        return formatGeneral(value, spec);
      case 'decimal':
        return String(value).padStart(spec.precision ?? 0, '0');
      case 'hex':
        return formatHex(value, spec);
      case 'number':
        return formatNumber(value, spec, resolveConventions(conventions, this.source));
    }
  }

  /**
   * Clear the format cache.
   */
  clearCache(): void {
    this.cache.clear();
  }

  getCacheSize(): number {
    return this.cache.size;
  }
}

// =============================================================================
// Token Parsing
// =============================================================================

function parseFormatToken(format: string): FormatSpec {
  const match = /^([A-Za-z])(\d{0,2})$/.exec(format);
  if (!match) {
    throw new InvalidFormatError(format);
  }

  const letter = match[1];
  const kind = KIND_BY_LETTER[letter.toLowerCase()];
  if (kind === undefined) {
    throw new InvalidFormatError(format);
  }

  return {
    original: format,
    kind,
    upper: letter === letter.toUpperCase(),
    precision: match[2] === '' ? null : parseInt(match[2], 10),
  };
}

// =============================================================================
// Renderers
// =============================================================================

function assertByte(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new InvalidArgumentError('value', `Expected an integer in [0, 255], got ${value}`);
  }
}

/**
 * Shortest decimal digits. A precision below the digit count switches to
 * scientific notation, rounding half away from zero.
 */
function formatGeneral(value: number, spec: FormatSpec): string {
  const digits = String(value);
  const precision = spec.precision ?? 0;
  if (precision === 0 || precision >= digits.length) {
    return digits;
  }

  let exponent = digits.length - 1;
  let mantissa = digits.slice(0, precision);
  if (digits.charCodeAt(precision) >= 53 /* '5' */) {
    const rounded = String(Number(mantissa) + 1);
    if (rounded.length > mantissa.length) {
      exponent++;
    }
    mantissa = rounded.slice(0, precision);
  }

  mantissa = mantissa.replace(/0+$/, '');
  const head = mantissa.slice(0, 1);
  const tail = mantissa.slice(1);
  const marker = spec.upper ? 'E' : 'e';
  const exponentText = String(exponent).padStart(2, '0');

  return `${head}${tail === '' ? '' : `.${tail}`}${marker}+${exponentText}`;
}

function formatHex(value: number, spec: FormatSpec): string {
  const digits = value.toString(16);
  const cased = spec.upper ? digits.toUpperCase() : digits;
  return cased.padStart(spec.precision ?? 0, '0');
}

function formatNumber(
  value: number,
  spec: FormatSpec,
  conventions: NumericConventions
): string {
  const grouped = groupDigits(String(value), conventions);
  const decimals = spec.precision ?? DEFAULT_NUMBER_DECIMALS;
  if (decimals === 0) return grouped;
  return `${grouped}${conventions.decimalSeparator}${'0'.repeat(decimals)}`;
}

// =============================================================================
// Singleton Instance
// =============================================================================

/** Default formatter reading the process-wide conventions */
export const byteFormatter = new ByteFormatter();

// =============================================================================
// Factory Function
// =============================================================================

export function createByteFormatter(source?: ConventionSource): ByteFormatter {
  return new ByteFormatter(source);
}
