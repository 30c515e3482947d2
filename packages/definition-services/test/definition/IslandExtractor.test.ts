/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import {
  extractIsland,
  isIdentifierChar,
} from '../../src/definition/IslandExtractor';

describe('extractIsland', () => {
  describe('quoted identifiers', () => {
    it.each([2, 3, 4])(
      'should return the quoted text as one qualifier at column %i',
      (column) => {
        expect(extractIsland('``a.b``', column)).toEqual({
          text: 'a.b',
          column: 0,
          qualifiers: ['a.b'],
          isQuoted: true,
        });
      },
    );

    it('should find a quoted identifier in the middle of a line', () => {
      expect(extractIsland('let v = ``my.value`` + 1', 12)).toEqual({
        text: 'my.value',
        column: 8,
        qualifiers: ['my.value'],
        isQuoted: true,
      });
    });

    it('should accept a cursor just after the closing delimiter', () => {
      expect(extractIsland('f ``a b``', 9)?.qualifiers).toEqual(['a b']);
    });

    it('should skip an earlier quoted identifier on the same line', () => {
      expect(extractIsland('``a`` ``b.c``', 9)?.qualifiers).toEqual(['b.c']);
    });

    it.each([17, 18, 19])(
      'should ignore an unmatched delimiter earlier on the line at column %i',
      (column) => {
        expect(extractIsland('let s = "``" + ``a.b``', column)).toEqual({
          text: 'a.b',
          column: 15,
          qualifiers: ['a.b'],
          isQuoted: true,
        });
      },
    );

    it('should not pair delimiters of two different identifiers', () => {
      expect(extractIsland('``a`` + b + ``c``', 8)).toEqual({
        text: 'b',
        column: 8,
        qualifiers: ['b'],
        isQuoted: false,
      });
    });

    it('should not return empty quoted identifiers', () => {
      expect(extractIsland('````', 2)).toBeUndefined();
    });
  });

  describe('dotted paths', () => {
    it('should split every segment of the path', () => {
      expect(extractIsland('System.Text.Encoding', 8)).toEqual({
        text: 'System.Text.Encoding',
        column: 0,
        qualifiers: ['System', 'Text', 'Encoding'],
        isQuoted: false,
      });
    });

    it('should start the island at the first qualifier', () => {
      expect(extractIsland('    x.Length', 6)).toEqual({
        text: 'x.Length',
        column: 4,
        qualifiers: ['x', 'Length'],
        isQuoted: false,
      });
    });

    it('should resolve a cursor on a dot between identifiers', () => {
      expect(extractIsland('a.b', 1)?.qualifiers).toEqual(['a', 'b']);
    });

    it('should trim a trailing dot', () => {
      expect(extractIsland('foo. ', 3)).toEqual({
        text: 'foo',
        column: 0,
        qualifiers: ['foo'],
        isQuoted: false,
      });
    });
  });

  describe('simple identifiers', () => {
    it('should return a single qualifier', () => {
      expect(extractIsland('let y = x + 1', 8)).toEqual({
        text: 'x',
        column: 8,
        qualifiers: ['x'],
        isQuoted: false,
      });
    });

    it('should accept a cursor just after the identifier', () => {
      expect(extractIsland('let y = x + 1', 9)?.column).toBe(8);
    });

    it('should keep primes and letters outside ASCII', () => {
      expect(extractIsland("x' = été", 0)?.qualifiers).toEqual(["x'"]);
      expect(extractIsland("x' = été", 6)?.qualifiers).toEqual(['été']);
    });
  });

  describe('no island', () => {
    it.each([
      ['a  +  b', 2],
      ['a  +  b', 3],
      ['x . y', 2],
      ['.', 0],
      ['', 0],
    ])('should return undefined for %p at column %i', (line, column) => {
      expect(extractIsland(line, column)).toBeUndefined();
    });

    it('should return undefined for columns outside the line', () => {
      expect(extractIsland('abc', 4)).toBeUndefined();
      expect(extractIsland('abc', -1)).toBeUndefined();
    });
  });

  describe('isIdentifierChar', () => {
    it('should classify identifier characters', () => {
      expect(isIdentifierChar('a')).toBe(true);
      expect(isIdentifierChar('_')).toBe(true);
      expect(isIdentifierChar('7')).toBe(true);
      expect(isIdentifierChar('.')).toBe(false);
      expect(isIdentifierChar(' ')).toBe(false);
      expect(isIdentifierChar(undefined)).toBe(false);
    });
  });
});
