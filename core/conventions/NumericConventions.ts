/**
 * Octet Format - Numeric Conventions
 *
 * Locale-like bundle of the tokens used when formatting and parsing:
 * signs, separators, digit grouping and the currency symbol.
 *
 * Design:
 * - Immutable: snapshots are frozen, a change means a new snapshot
 * - Data only: no logic beyond validation of the tokens
 * - Ordinal: tokens are matched exactly, never case-folded
 */

import { InvalidArgumentError } from '../errors/NumericErrors.js';

// =============================================================================
// Types
// =============================================================================

export interface NumericConventions {
  /** Negation token */
  readonly negativeSign: string;
  /** Explicit positive token */
  readonly positiveSign: string;
  /** Separator between integral and fractional digits */
  readonly decimalSeparator: string;
  /** Separator between digit groups */
  readonly groupSeparator: string;
  /**
   * Group widths from the right. The last entry repeats; a final 0 stops
   * grouping after the preceding groups.
   */
  readonly groupSizes: readonly number[];
  /** Currency token recognized by currency-style parsing */
  readonly currencySymbol: string;
}

export type ConventionOverrides = Partial<{
  -readonly [K in keyof NumericConventions]: NumericConventions[K];
}>;

export type ProfileName = 'invariant' | 'en-US' | 'de-DE' | 'fr-FR' | 'en-IN';

// =============================================================================
// Defaults
// =============================================================================

/** Invariant conventions */
export const DEFAULT_CONVENTIONS: NumericConventions = Object.freeze({
  negativeSign: '-',
  positiveSign: '+',
  decimalSeparator: '.',
  groupSeparator: ',',
  groupSizes: Object.freeze([3]),
  currencySymbol: '$',
});

const TOKEN_FIELDS = [
  'negativeSign',
  'positiveSign',
  'decimalSeparator',
  'groupSeparator',
  'currencySymbol',
] as const;

type TokenField = (typeof TOKEN_FIELDS)[number];

// =============================================================================
// Construction
// =============================================================================

/**
 * Create a validated, frozen conventions snapshot from overrides on top of
 * a base snapshot (the invariant conventions by default).
 */
export function createConventions(
  overrides: ConventionOverrides = {},
  base: NumericConventions = DEFAULT_CONVENTIONS
): NumericConventions {
  const merged = { ...base, ...overrides };
  validateConventions(merged);

  return Object.freeze({
    negativeSign: merged.negativeSign,
    positiveSign: merged.positiveSign,
    decimalSeparator: merged.decimalSeparator,
    groupSeparator: merged.groupSeparator,
    groupSizes: Object.freeze([...merged.groupSizes]),
    currencySymbol: merged.currencySymbol,
  });
}

/**
 * Build conventions from untrusted data such as decoded JSON. Unknown keys
 * are rejected so a typo does not silently fall back to a default.
 */
export function conventionsFromObject(
  data: unknown,
  base: NumericConventions = DEFAULT_CONVENTIONS
): NumericConventions {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new InvalidArgumentError('conventions', 'Conventions must be an object');
  }

  const overrides: ConventionOverrides = {};
  const entries: Array<[string, unknown]> = Object.entries(data);
  for (const [key, value] of entries) {
    if (key === 'groupSizes') {
      validateGroupSizes(value);
      overrides.groupSizes = value;
      continue;
    }
    const field = TOKEN_FIELDS.find((name) => name === key);
    if (!field) {
      throw new InvalidArgumentError('conventions', `Unknown convention field '${key}'`);
    }
    validateToken(field, value);
    overrides[field] = value;
  }

  return createConventions(overrides, base);
}

/**
 * Check the tokens and group sizes of a snapshot. Tokens may not contain
 * ASCII digits; sign tokens may not start with whitespace.
 */
export function validateConventions(conventions: NumericConventions): void {
  for (const field of TOKEN_FIELDS) {
    validateToken(field, conventions[field]);
  }
  validateGroupSizes(conventions.groupSizes);
}

function validateToken(field: TokenField, token: unknown): asserts token is string {
  if (typeof token !== 'string' || token.length === 0) {
    throw new InvalidArgumentError(field, 'Convention token must be a non-empty string');
  }
  if (/[0-9]/.test(token)) {
    throw new InvalidArgumentError(field, 'Convention token must not contain digits');
  }
  if ((field === 'negativeSign' || field === 'positiveSign') && /^\s/.test(token)) {
    throw new InvalidArgumentError(field, 'Sign token must not start with whitespace');
  }
}

function validateGroupSizes(sizes: unknown): asserts sizes is number[] {
  if (!Array.isArray(sizes)) {
    throw new InvalidArgumentError('groupSizes', 'Group sizes must be an array');
  }

  const list: unknown[] = sizes;
  for (let i = 0; i < list.length; i++) {
    const size = list[i];
    if (typeof size !== 'number' || !Number.isInteger(size) || size < 0 || size > 9) {
      throw new InvalidArgumentError('groupSizes', 'Group sizes must be integers between 0 and 9');
    }
    if (size === 0 && i !== list.length - 1) {
      throw new InvalidArgumentError('groupSizes', 'Only the last group size may be 0');
    }
  }
}

// =============================================================================
// Built-in Profiles
// =============================================================================

const PROFILES: Record<ProfileName, NumericConventions> = {
  invariant: DEFAULT_CONVENTIONS,
  'en-US': createConventions(),
  'de-DE': createConventions({
    decimalSeparator: ',',
    groupSeparator: '.',
    currencySymbol: '€',
  }),
  'fr-FR': createConventions({
    decimalSeparator: ',',
    groupSeparator: '\u202F',
    currencySymbol: '€',
  }),
  'en-IN': createConventions({
    groupSizes: [3, 2],
    currencySymbol: '₹',
  }),
};

export function isProfileName(name: string): name is ProfileName {
  return Object.prototype.hasOwnProperty.call(PROFILES, name);
}

/**
 * Look up a built-in profile by name.
 */
export function getConventions(name: ProfileName): NumericConventions {
  return PROFILES[name];
}

export function listProfiles(): ProfileName[] {
  return Object.keys(PROFILES).filter(isProfileName);
}

// =============================================================================
// Grouping
// =============================================================================

/**
 * Insert group separators into a run of decimal digits per `groupSizes`.
 */
export function groupDigits(digits: string, conventions: NumericConventions): string {
  const { groupSizes, groupSeparator } = conventions;
  if (groupSizes.length === 0) return digits;

  const groups: string[] = [];
  let end = digits.length;
  let sizeIndex = 0;
  let size = groupSizes[0];

  while (end > 0) {
    if (!Number.isInteger(size) || size <= 0) {
      groups.unshift(digits.slice(0, end));
      break;
    }
    const start = Math.max(0, end - size);
    groups.unshift(digits.slice(start, end));
    end = start;

    if (sizeIndex < groupSizes.length - 1) {
      sizeIndex++;
      size = groupSizes[sizeIndex];
    }
  }

  return groups.join(groupSeparator);
}
