/**
 * Octet Format - Number Styles
 *
 * Bitset of parsing leniencies. Flag values match the conventional
 * number-style layout so styles can be exchanged as plain integers.
 */

import { InvalidArgumentError, InvalidStyleError } from '../errors/NumericErrors.js';

// =============================================================================
// Flags
// =============================================================================

export const NumberStyles = {
  None: 0x000,
  AllowLeadingWhite: 0x001,
  AllowTrailingWhite: 0x002,
  AllowLeadingSign: 0x004,
  AllowTrailingSign: 0x008,
  AllowParentheses: 0x010,
  AllowDecimalPoint: 0x020,
  AllowThousands: 0x040,
  AllowExponent: 0x080,
  AllowCurrencySymbol: 0x100,
  AllowHexSpecifier: 0x200,

  // Composites
  Integer: 0x007,
  HexNumber: 0x203,
  Number: 0x06f,
  Float: 0x0a7,
  Currency: 0x17f,
  Any: 0x1ff,
} as const;

export type NumberStyleName = keyof typeof NumberStyles;

/** A style bitset. Any integer; validity is checked by `validateNumberStyle`. */
export type NumberStyle = number;

const ALL_FLAGS = 0x3ff;

/** Flags that may accompany AllowHexSpecifier */
const HEX_COMPATIBLE = NumberStyles.AllowLeadingWhite | NumberStyles.AllowTrailingWhite | NumberStyles.AllowHexSpecifier;

const SINGLE_FLAGS: readonly NumberStyleName[] = [
  'AllowLeadingWhite',
  'AllowTrailingWhite',
  'AllowLeadingSign',
  'AllowTrailingSign',
  'AllowParentheses',
  'AllowDecimalPoint',
  'AllowThousands',
  'AllowExponent',
  'AllowCurrencySymbol',
  'AllowHexSpecifier',
];

// =============================================================================
// Validation
// =============================================================================

/**
 * Reject unknown bits and hex combined with anything but whitespace.
 * Runs before any text is inspected.
 */
export function validateNumberStyle(style: NumberStyle): void {
  if (!Number.isInteger(style) || style < 0 || style > ALL_FLAGS) {
    throw new InvalidStyleError(style, 'unknown style bits');
  }
  if ((style & NumberStyles.AllowHexSpecifier) !== 0 && (style & ~HEX_COMPATIBLE) !== 0) {
    throw new InvalidStyleError(style, 'hex specifier may only be combined with whitespace flags');
  }
}

export function hasFlag(style: NumberStyle, flag: number): boolean {
  return (style & flag) !== 0;
}

// =============================================================================
// Text Form
// =============================================================================

function isStyleName(name: string): name is NumberStyleName {
  return Object.prototype.hasOwnProperty.call(NumberStyles, name);
}

/**
 * Parse a textual style such as `Integer|AllowParentheses`, `0x203` or `7`.
 * Names are case-insensitive; `Allow` may be omitted (`LeadingWhite`).
 */
export function parseNumberStyle(text: string): NumberStyle {
  const trimmed = text.trim();
  if (trimmed === '') {
    throw new InvalidArgumentError('style', 'Style expression is empty');
  }

  let style = 0;
  for (const rawPart of trimmed.split('|')) {
    const part = rawPart.trim();

    if (/^0x[0-9a-f]+$/i.test(part)) {
      style |= parseInt(part.slice(2), 16);
      continue;
    }
    if (/^\d+$/.test(part)) {
      style |= parseInt(part, 10);
      continue;
    }

    const name = Object.keys(NumberStyles).find(
      (key) => key.toLowerCase() === part.toLowerCase() || key.toLowerCase() === `allow${part.toLowerCase()}`
    );
    if (name === undefined || !isStyleName(name)) {
      throw new InvalidArgumentError('style', `Unknown number style '${part}'`);
    }
    style |= NumberStyles[name];
  }

  return style >>> 0;
}

/**
 * Render a style as a `|`-joined list of flag names. Composite names are
 * used when the style equals a composite exactly.
 */
export function describeNumberStyle(style: NumberStyle): string {
  if (style === NumberStyles.None) return 'None';

  const composite = (['Integer', 'HexNumber', 'Number', 'Float', 'Currency', 'Any'] as const).find(
    (name) => NumberStyles[name] === style
  );
  if (composite) return composite;

  const names: string[] = SINGLE_FLAGS.filter((name) => hasFlag(style, NumberStyles[name]));
  const unknownBits = (style & ~ALL_FLAGS) >>> 0;
  if (unknownBits !== 0) {
    names.push(`0x${unknownBits.toString(16).toUpperCase()}`);
  }
  return names.join('|');
}
