/**
 * NumericConventions & ConventionProvider Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_CONVENTIONS,
  createConventions,
  conventionsFromObject,
  getConventions,
  groupDigits,
  isProfileName,
  listProfiles,
} from './NumericConventions.js';
import {
  createConventionProvider,
  resolveConventions,
} from './ConventionProvider.js';
import { InvalidArgumentError } from '../errors/NumericErrors.js';

describe('NumericConventions', () => {
  // ===========================================================================
  // Construction
  // ===========================================================================

  describe('createConventions', () => {
    it('should default to the invariant tokens', () => {
      expect(createConventions()).toEqual({
        negativeSign: '-',
        positiveSign: '+',
        decimalSeparator: '.',
        groupSeparator: ',',
        groupSizes: [3],
        currencySymbol: '$',
      });
    });

    it('should merge overrides onto the base', () => {
      const deDE = getConventions('de-DE');
      const custom = createConventions({ currencySymbol: 'EUR' }, deDE);
      expect(custom.decimalSeparator).toBe(',');
      expect(custom.currencySymbol).toBe('EUR');
    });

    it('should freeze the snapshot and its group sizes', () => {
      const sizes = [3, 2];
      const conventions = createConventions({ groupSizes: sizes });
      sizes.push(1);
      expect(conventions.groupSizes).toEqual([3, 2]);
      expect(Object.isFrozen(conventions)).toBe(true);
      expect(Object.isFrozen(conventions.groupSizes)).toBe(true);
    });

    it('should reject empty tokens', () => {
      expect(() => createConventions({ negativeSign: '' })).toThrow(
        "Convention token must be a non-empty string (parameter 'negativeSign')"
      );
    });

    it('should reject tokens that overlap the digit run', () => {
      expect(() => createConventions({ positiveSign: '1' })).toThrow(
        "Convention token must not contain digits (parameter 'positiveSign')"
      );
      expect(() => createConventions({ currencySymbol: 'US1' })).toThrow(InvalidArgumentError);
      expect(() => createConventions({ groupSeparator: '0' })).toThrow(InvalidArgumentError);
      expect(() => createConventions({ negativeSign: ' -' })).toThrow(
        "Sign token must not start with whitespace (parameter 'negativeSign')"
      );
      expect(createConventions({ groupSeparator: ' ' }).groupSeparator).toBe(' ');
    });

    it.each([[[0, 3]], [[10]], [[1.5]], [[-1]]])('should reject group sizes %j', (groupSizes) => {
      expect(() => createConventions({ groupSizes })).toThrow(InvalidArgumentError);
    });
  });

  describe('conventionsFromObject', () => {
    it('should read known fields', () => {
      const conventions = conventionsFromObject({ decimalSeparator: ',', groupSizes: [3, 0] });
      expect(conventions.decimalSeparator).toBe(',');
      expect(conventions.groupSizes).toEqual([3, 0]);
      expect(conventions.negativeSign).toBe('-');
    });

    it('should reject unknown fields', () => {
      expect(() => conventionsFromObject({ decimal: ',' })).toThrow("Unknown convention field 'decimal'");
    });

    it.each<[unknown]>([[null], ['x'], [[1]], [42]])('should reject %j', (data) => {
      expect(() => conventionsFromObject(data)).toThrow(InvalidArgumentError);
    });

    it('should reject mistyped values', () => {
      expect(() => conventionsFromObject({ negativeSign: 1 })).toThrow(InvalidArgumentError);
      expect(() => conventionsFromObject({ groupSizes: '3' })).toThrow(InvalidArgumentError);
    });
  });

  // ===========================================================================
  // Profiles
  // ===========================================================================

  describe('Profiles', () => {
    it('should list the built-in profiles', () => {
      expect(listProfiles()).toEqual(['invariant', 'en-US', 'de-DE', 'fr-FR', 'en-IN']);
      expect(isProfileName('en-IN')).toBe(true);
      expect(isProfileName('xx-XX')).toBe(false);
    });

    it('should carry regional tokens', () => {
      expect(getConventions('invariant')).toBe(DEFAULT_CONVENTIONS);
      expect(getConventions('fr-FR').groupSeparator).toBe('\u202F');
      expect(getConventions('en-IN').groupSizes).toEqual([3, 2]);
      expect(getConventions('en-IN').currencySymbol).toBe('₹');
    });
  });

  // ===========================================================================
  // Grouping
  // ===========================================================================

  describe('groupDigits', () => {
    it('should repeat the last size', () => {
      expect(groupDigits('1234567', DEFAULT_CONVENTIONS)).toBe('1,234,567');
      expect(groupDigits('123', DEFAULT_CONVENTIONS)).toBe('123');
      expect(groupDigits('1234567', getConventions('en-IN'))).toBe('12,34,567');
    });

    it('should stop grouping at a final zero', () => {
      expect(groupDigits('1234567', createConventions({ groupSizes: [3, 0] }))).toBe('1234,567');
    });

    it('should stop grouping at a size that is not a positive integer', () => {
      expect(groupDigits('12345', { ...DEFAULT_CONVENTIONS, groupSizes: [-1] })).toBe('12345');
      expect(groupDigits('12345', { ...DEFAULT_CONVENTIONS, groupSizes: [2, 1.5] })).toBe('123,45');
    });

    it('should leave digits alone without sizes', () => {
      expect(groupDigits('1234567', createConventions({ groupSizes: [] }))).toBe('1234567');
    });
  });
});

describe('ConventionProvider', () => {
  it('should start from the invariant conventions', () => {
    expect(createConventionProvider().current()).toBe(DEFAULT_CONVENTIONS);
  });

  it('should swap snapshots and notify', () => {
    const onChange = vi.fn();
    const provider = createConventionProvider(DEFAULT_CONVENTIONS, { onChange });
    const deDE = getConventions('de-DE');

    provider.update(deDE);

    expect(provider.current()).toBe(deDE);
    expect(onChange).toHaveBeenCalledWith(deDE, DEFAULT_CONVENTIONS);
  });

  it('should validate and freeze unfrozen snapshots', () => {
    const provider = createConventionProvider();
    provider.update({ ...DEFAULT_CONVENTIONS, decimalSeparator: ',' });
    expect(Object.isFrozen(provider.current())).toBe(true);
    expect(provider.current().decimalSeparator).toBe(',');

    expect(() => provider.update({ ...DEFAULT_CONVENTIONS, groupSeparator: '' })).toThrow(InvalidArgumentError);
    expect(provider.current().decimalSeparator).toBe(',');
  });

  it('should validate frozen snapshots', () => {
    const onChange = vi.fn();
    const provider = createConventionProvider(DEFAULT_CONVENTIONS, { onChange });

    expect(() => provider.update(Object.freeze({ ...DEFAULT_CONVENTIONS, groupSizes: [-1] }))).toThrow(
      InvalidArgumentError
    );
    expect(() =>
      provider.update(Object.freeze({ ...DEFAULT_CONVENTIONS, groupSizes: Object.freeze([-1]) }))
    ).toThrow("Group sizes must be integers between 0 and 9 (parameter 'groupSizes')");
    expect(() => provider.update(Object.freeze({ ...DEFAULT_CONVENTIONS, negativeSign: '' }))).toThrow(
      InvalidArgumentError
    );

    expect(provider.current()).toBe(DEFAULT_CONVENTIONS);
    expect(onChange).not.toHaveBeenCalled();
  });

  it('should validate the initial snapshot', () => {
    expect(() => createConventionProvider(Object.freeze({ ...DEFAULT_CONVENTIONS, positiveSign: '7' }))).toThrow(
      InvalidArgumentError
    );
  });

  it('should copy frozen snapshots with mutable group sizes', () => {
    const sizes = [3];
    const provider = createConventionProvider();
    provider.update(Object.freeze({ ...DEFAULT_CONVENTIONS, groupSizes: sizes }));
    sizes.push(2);
    expect(provider.current().groupSizes).toEqual([3]);
    expect(Object.isFrozen(provider.current().groupSizes)).toBe(true);
  });

  it('should reset to the invariant conventions', () => {
    const provider = createConventionProvider(getConventions('fr-FR'));
    const onChange = vi.fn();
    provider.setEventHandlers({ onChange });
    provider.reset();
    expect(provider.current()).toBe(DEFAULT_CONVENTIONS);
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('should resolve an explicit snapshot before the source', () => {
    const provider = createConventionProvider(getConventions('de-DE'));
    expect(resolveConventions(null, provider)).toBe(getConventions('de-DE'));
    expect(resolveConventions(DEFAULT_CONVENTIONS, provider)).toBe(DEFAULT_CONVENTIONS);
  });
});
