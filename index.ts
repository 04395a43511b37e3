/**
 * Octet Format
 *
 * Culture-aware parsing and formatting for unsigned 8-bit integers:
 * - Standard format tokens (G, D, X, N) with optional precision
 * - Style-driven parsing (whitespace, signs, parentheses, grouping,
 *   decimal point, exponent, currency, hex)
 * - Classified errors: null input, invalid style, format, overflow
 * - Swappable convention snapshots for separators and symbols
 *
 * @example
 * ```typescript
 * import { parse, format, NumberStyles, getConventions } from 'octet-format';
 *
 * parse('  123  ');                              // 123
 * parse('ff', NumberStyles.HexNumber);           // 255
 * parse('$100', NumberStyles.Currency);          // 100
 * format(24, 'N', getConventions('de-DE'));      // "24,00"
 * format(0x2a, 'x4');                            // "002a"
 * ```
 */

export * from './core/index.js';
