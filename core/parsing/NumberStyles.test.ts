/**
 * NumberStyles Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  NumberStyles,
  validateNumberStyle,
  hasFlag,
  parseNumberStyle,
  describeNumberStyle,
} from './NumberStyles.js';
import { InvalidArgumentError, InvalidStyleError } from '../errors/NumericErrors.js';

describe('NumberStyles', () => {
  describe('Composites', () => {
    it('should combine the single flags', () => {
      expect(NumberStyles.Integer).toBe(
        NumberStyles.AllowLeadingWhite | NumberStyles.AllowTrailingWhite | NumberStyles.AllowLeadingSign
      );
      expect(NumberStyles.HexNumber).toBe(
        NumberStyles.AllowLeadingWhite | NumberStyles.AllowTrailingWhite | NumberStyles.AllowHexSpecifier
      );
      expect(NumberStyles.Number).toBe(
        NumberStyles.Integer | NumberStyles.AllowTrailingSign | NumberStyles.AllowDecimalPoint | NumberStyles.AllowThousands
      );
      expect(NumberStyles.Float).toBe(
        NumberStyles.Integer | NumberStyles.AllowDecimalPoint | NumberStyles.AllowExponent
      );
      expect(NumberStyles.Currency).toBe(NumberStyles.Number | NumberStyles.AllowParentheses | NumberStyles.AllowCurrencySymbol);
      expect(NumberStyles.Any).toBe(NumberStyles.Currency | NumberStyles.AllowExponent);
    });

    it('should test single flags', () => {
      expect(hasFlag(NumberStyles.Integer, NumberStyles.AllowLeadingSign)).toBe(true);
      expect(hasFlag(NumberStyles.Integer, NumberStyles.AllowThousands)).toBe(false);
    });
  });

  describe('Validation', () => {
    it.each([0, 0x007, 0x1ff, 0x200, 0x201, 0x203])('should accept %i', (style) => {
      expect(() => validateNumberStyle(style)).not.toThrow();
    });

    it.each([0x400, 0x204, 0x3ff, -1, 1.5, 0xfffffc00])('should reject %s', (style) => {
      expect(() => validateNumberStyle(style)).toThrow(InvalidStyleError);
    });

    it('should report the offending style', () => {
      expect(() => validateNumberStyle(0x204)).toThrow(
        'Invalid number style 0x204: hex specifier may only be combined with whitespace flags'
      );
    });
  });

  describe('Text form', () => {
    it('should parse names, numbers and unions', () => {
      expect(parseNumberStyle('Integer|AllowParentheses')).toBe(0x17);
      expect(parseNumberStyle('leadingwhite')).toBe(1);
      expect(parseNumberStyle('allowHexSpecifier')).toBe(0x200);
      expect(parseNumberStyle('0x203')).toBe(0x203);
      expect(parseNumberStyle('7')).toBe(7);
      expect(parseNumberStyle(' hexnumber | 0x4 ')).toBe(0x207);
      expect(parseNumberStyle('None')).toBe(0);
    });

    it('should keep unknown bits for validation to reject', () => {
      expect(parseNumberStyle('0xfffffc00')).toBe(0xfffffc00);
    });

    it('should reject empty and unknown names', () => {
      expect(() => parseNumberStyle('')).toThrow(InvalidArgumentError);
      expect(() => parseNumberStyle('Integer|Bogus')).toThrow("Unknown number style 'Bogus'");
    });

    it('should describe styles', () => {
      expect(describeNumberStyle(0)).toBe('None');
      expect(describeNumberStyle(NumberStyles.Integer)).toBe('Integer');
      expect(describeNumberStyle(0x17)).toBe(
        'AllowLeadingWhite|AllowTrailingWhite|AllowLeadingSign|AllowParentheses'
      );
      expect(describeNumberStyle(0x401)).toBe('AllowLeadingWhite|0x400');
    });
  });
});
