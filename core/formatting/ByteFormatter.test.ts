/**
 * ByteFormatter Unit Tests
 *
 * Tests the byte formatter including:
 * - Token parsing and caching
 * - General, decimal, hex and number tokens
 * - Precision handling (padding, scientific general form)
 * - Conventions snapshots and the current-conventions fallback
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ByteFormatter,
  createByteFormatter,
  byteFormatter,
} from './ByteFormatter.js';
import {
  createConventions,
  getConventions,
} from '../conventions/NumericConventions.js';
import { createConventionProvider } from '../conventions/ConventionProvider.js';
import { InvalidArgumentError, InvalidFormatError } from '../errors/NumericErrors.js';

describe('ByteFormatter', () => {
  let formatter: ByteFormatter;

  beforeEach(() => {
    formatter = createByteFormatter(createConventionProvider());
  });

  // ===========================================================================
  // Token Parsing
  // ===========================================================================

  describe('Token parsing', () => {
    it('should treat empty and missing tokens as general', () => {
      expect(formatter.parseFormat('')).toEqual({ original: 'G', kind: 'general', upper: true, precision: null });
      expect(formatter.parseFormat(null).kind).toBe('general');
      expect(formatter.parseFormat(undefined).kind).toBe('general');
    });

    it('should parse letter and precision', () => {
      expect(formatter.parseFormat('x4')).toEqual({ original: 'x4', kind: 'hex', upper: false, precision: 4 });
      expect(formatter.parseFormat('N0')).toEqual({ original: 'N0', kind: 'number', upper: true, precision: 0 });
      expect(formatter.parseFormat('d99').precision).toBe(99);
    });

    it.each(['Y', 'G100', 'GX', 'X-1', ' G', 'G ', 'XX', '5', 'é'])(
      'should reject %j',
      (token) => {
        expect(() => formatter.format(1, token)).toThrow(InvalidFormatError);
      }
    );

    it('should cache parsed tokens', () => {
      const first = formatter.parseFormat('X2');
      const second = formatter.parseFormat('X2');
      expect(second).toBe(first);
      expect(formatter.getCacheSize()).toBe(1);
    });

    it('should not cache the general default', () => {
      formatter.parseFormat('');
      formatter.parseFormat(null);
      expect(formatter.getCacheSize()).toBe(0);
    });

    it('should clear the cache', () => {
      formatter.parseFormat('D3');
      formatter.parseFormat('n');
      expect(formatter.getCacheSize()).toBe(2);
      formatter.clearCache();
      expect(formatter.getCacheSize()).toBe(0);
    });
  });

  // ===========================================================================
  // General Format
  // ===========================================================================

  describe('General format', () => {
    it('should render shortest decimal digits', () => {
      expect(formatter.format(0)).toBe('0');
      expect(formatter.format(7, 'G')).toBe('7');
      expect(formatter.format(255, 'g')).toBe('255');
      expect(formatter.format(123, 'G0')).toBe('123');
      expect(formatter.format(123, 'G3')).toBe('123');
      expect(formatter.format(123, 'G9')).toBe('123');
    });

    it('should switch to scientific form below the digit count', () => {
      expect(formatter.format(123, 'G2')).toBe('1.2E+02');
      expect(formatter.format(123, 'g2')).toBe('1.2e+02');
      expect(formatter.format(123, 'G1')).toBe('1E+02');
      expect(formatter.format(42, 'G1')).toBe('4E+01');
    });

    it('should round half up and trim trailing zeros', () => {
      expect(formatter.format(255, 'G1')).toBe('3E+02');
      expect(formatter.format(255, 'G2')).toBe('2.6E+02');
      expect(formatter.format(199, 'G2')).toBe('2E+02');
      expect(formatter.format(99, 'G1')).toBe('1E+02');
      expect(formatter.format(200, 'G2')).toBe('2E+02');
    });
  });

  // ===========================================================================
  // Decimal Format
  // ===========================================================================

  describe('Decimal format', () => {
    it('should pad with zeros to the precision', () => {
      expect(formatter.format(255, 'D')).toBe('255');
      expect(formatter.format(255, 'D5')).toBe('00255');
      expect(formatter.format(7, 'd0')).toBe('7');
      expect(formatter.format(0, 'D3')).toBe('000');
      expect(formatter.format(12, 'D1')).toBe('12');
    });
  });

  // ===========================================================================
  // Hex Format
  // ===========================================================================

  describe('Hex format', () => {
    it('should follow the letter case', () => {
      expect(formatter.format(255, 'X')).toBe('FF');
      expect(formatter.format(255, 'x')).toBe('ff');
      expect(formatter.format(0, 'X')).toBe('0');
    });

    it('should pad to the precision', () => {
      expect(formatter.format(42, 'X4')).toBe('002A');
      expect(formatter.format(42, 'x4')).toBe('002a');
      expect(formatter.format(171, 'x1')).toBe('ab');
    });
  });

  // ===========================================================================
  // Number Format
  // ===========================================================================

  describe('Number format', () => {
    it('should append two zero decimals by default', () => {
      expect(formatter.format(24, 'N')).toBe('24.00');
      expect(formatter.format(0, 'n')).toBe('0.00');
    });

    it('should honor the precision', () => {
      expect(formatter.format(24, 'N0')).toBe('24');
      expect(formatter.format(24, 'N3')).toBe('24.000');
    });

    it('should use the given separators', () => {
      const custom = createConventions({
        decimalSeparator: '~',
        groupSeparator: '*',
        negativeSign: '#',
      });
      expect(formatter.format(24, 'N', custom)).toBe('24~00');
      expect(formatter.format(24, 'N', getConventions('de-DE'))).toBe('24,00');
    });

    it('should group digits per the group sizes', () => {
      const ones = createConventions({ groupSizes: [1] });
      expect(formatter.format(255, 'N0', ones)).toBe('2,5,5');
      const twoThenStop = createConventions({ groupSizes: [2, 0], groupSeparator: '_' });
      expect(formatter.format(255, 'N1', twoThenStop)).toBe('2_55.0');
    });

    it('should ignore conventions for the other tokens', () => {
      const deDE = getConventions('de-DE');
      expect(formatter.format(200, 'G', deDE)).toBe('200');
      expect(formatter.format(200, 'X', deDE)).toBe('C8');
    });
  });

  // ===========================================================================
  // Conventions Source
  // ===========================================================================

  describe('Conventions source', () => {
    it('should read the provider when no conventions are given', () => {
      const provider = createConventionProvider(getConventions('de-DE'));
      const local = createByteFormatter(provider);
      expect(local.format(24, 'N')).toBe('24,00');

      provider.reset();
      expect(local.format(24, 'N')).toBe('24.00');
    });

    it('should expose a default instance', () => {
      expect(byteFormatter.format(42, 'x4')).toBe('002a');
    });
  });

  // ===========================================================================
  // Argument Validation
  // ===========================================================================

  describe('Argument validation', () => {
    it.each([-1, 256, 1.5, Number.NaN])('should reject %s', (value) => {
      expect(() => formatter.format(value)).toThrow(InvalidArgumentError);
    });
  });
});
