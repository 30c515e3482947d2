/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import {
  DEFAULT_NAVIGATOR_SETTINGS,
  isValidNavigatorSettings,
  mergeWithDefaults,
  mergeWithExisting,
  parseNavigatorSettings,
  validateNavigatorSettings,
} from '../../src/settings/NavigatorSettingsUtilities';

describe('Navigator Settings Utilities', () => {
  describe('validateNavigatorSettings', () => {
    it('should accept empty and partial updates', () => {
      expect(validateNavigatorSettings({})).toEqual({
        isValid: true,
        details: [],
      });
      expect(
        validateNavigatorSettings({
          navigator: { definition: { tieBreak: 'first' }, logLevel: 'warn' },
        }).isValid,
      ).toBe(true);
    });

    it('should accept the defaults', () => {
      expect(validateNavigatorSettings(DEFAULT_NAVIGATOR_SETTINGS).isValid).toBe(
        true,
      );
    });

    it('should report the path of an unknown tie-break policy', () => {
      const result = validateNavigatorSettings({
        navigator: { definition: { tieBreak: 'random' } },
      });

      expect(result.isValid).toBe(false);
      expect(result.details).toHaveLength(1);
      expect(result.details[0]).toMatch(/^navigator\.definition\.tieBreak: /);
    });

    it.each([-1, 6, 1.5])('should reject %p typecheck retries', (retries) => {
      const result = validateNavigatorSettings({
        navigator: { definition: { typecheckAbortRetries: retries } },
      });

      expect(result.details[0]).toMatch(
        /^navigator\.definition\.typecheckAbortRetries: /,
      );
    });

    it('should reject extensions without a leading dot', () => {
      const result = validateNavigatorSettings({
        navigator: { definition: { scriptFileExtensions: ['.fsx', 'csx'] } },
      });

      expect(result.details[0]).toMatch(
        /^navigator\.definition\.scriptFileExtensions\.1: /,
      );
    });

    it('should reject unknown keys', () => {
      const result = validateNavigatorSettings({
        navigator: { colour: 'red' },
      });

      expect(result.isValid).toBe(false);
      expect(result.details[0]).toMatch(/^navigator: .*colour/);
    });

    it('should label problems with the whole value as <root>', () => {
      expect(validateNavigatorSettings(null).details).toEqual([
        '<root>: Expected object, received null',
      ]);
    });
  });

  describe('parseNavigatorSettings', () => {
    it('should return the parsed update', () => {
      expect(
        parseNavigatorSettings({
          navigator: { definition: { typecheckAbortRetries: 2 } },
        }),
      ).toEqual({
        success: true,
        settings: { navigator: { definition: { typecheckAbortRetries: 2 } } },
      });
    });
  });

  describe('isValidNavigatorSettings', () => {
    it('should narrow valid values only', () => {
      expect(isValidNavigatorSettings({ navigator: {} })).toBe(true);
      expect(isValidNavigatorSettings('navigator')).toBe(false);
    });
  });

  describe('merging', () => {
    it('should fill unspecified values from the defaults', () => {
      const merged = mergeWithDefaults({
        navigator: { definition: { typecheckAbortRetries: 2 } },
      });

      expect(merged).toEqual({
        navigator: {
          definition: {
            tieBreak: 'sameProject',
            typecheckAbortRetries: 2,
            scriptFileExtensions: ['.fsx', '.fsscript'],
            editingDefine: 'EDITING',
          },
          logLevel: 'info',
        },
      });
    });

    it('should replace arrays instead of concatenating them', () => {
      const merged = mergeWithExisting(DEFAULT_NAVIGATOR_SETTINGS, {
        navigator: { definition: { scriptFileExtensions: ['.csx'] } },
      });

      expect(merged.navigator.definition.scriptFileExtensions).toEqual([
        '.csx',
      ]);
    });

    it('should not share arrays with the defaults', () => {
      const merged = mergeWithDefaults({});
      merged.navigator.definition.scriptFileExtensions.push('.csx');

      expect(
        DEFAULT_NAVIGATOR_SETTINGS.navigator.definition.scriptFileExtensions,
      ).toEqual(['.fsx', '.fsscript']);
    });
  });
});
