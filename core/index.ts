/**
 * Octet Format - Core Module Exports
 *
 * This is the main entry point for the byte parser and formatter.
 */

import type { NumericConventions } from './conventions/NumericConventions.js';
import { byteFormatter } from './formatting/ByteFormatter.js';
import { byteParser, type TryParseResult } from './parsing/ByteParser.js';
import { type NumberStyle, NumberStyles } from './parsing/NumberStyles.js';

// Value Type
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Conventions
export * from './conventions/index.js';

// Parsing
export * from './parsing/index.js';

// Formatting
export * from './formatting/index.js';

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Format a byte with the default formatter.
 */
export function format(
  value: number,
  formatToken?: string | null,
  conventions?: NumericConventions | null
): string {
  return byteFormatter.format(value, formatToken, conventions);
}

/**
 * Parse a byte with the default parser.
 */
export function parse(
  text: string | null | undefined,
  style: NumberStyle = NumberStyles.Integer,
  conventions?: NumericConventions | null
): number {
  return byteParser.parse(text, style, conventions);
}

/**
 * Parse a byte without throwing for bad text.
 */
export function tryParse(
  text: string | null | undefined,
  style: NumberStyle = NumberStyles.Integer,
  conventions?: NumericConventions | null
): TryParseResult {
  return byteParser.tryParse(text, style, conventions);
}
