/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import type { Island } from '../types/resolution';

export const QUOTE_DELIMITER = '``';

const IDENTIFIER_CHAR = /^[\p{L}\p{Nd}_']$/u;

export const isIdentifierChar = (ch: string | undefined): boolean =>
  ch !== undefined && IDENTIFIER_CHAR.test(ch);

const isIslandChar = (ch: string | undefined): boolean =>
  ch === '.' || isIdentifierChar(ch);

function quotedIsland(
  lineText: string,
  open: number,
  close: number,
): Island | undefined {
  if (open < 0 || close < open + QUOTE_DELIMITER.length) {
    return undefined;
  }
  const text = lineText.slice(open + QUOTE_DELIMITER.length, close);
  // Whitespace at either end: the delimiters belong to two identifiers
  if (text.length === 0 || text.trim() !== text) {
    return undefined;
  }
  return { text, column: open, qualifiers: [text], isQuoted: true };
}

/**
 * Find the ``quoted`` identifier around `column` by pairing the nearest
 * delimiter before it with the nearest one at or after it. Delimiters
 * further away on the line (in a string literal, say) play no part.
 */
function findQuotedIsland(
  lineText: string,
  column: number,
): Island | undefined {
  const width = QUOTE_DELIMITER.length;

  // Cursor just after a closing delimiter
  if (
    column >= 2 * width &&
    lineText.startsWith(QUOTE_DELIMITER, column - width) &&
    !isIslandChar(lineText[column])
  ) {
    const close = column - width;
    const island = quotedIsland(
      lineText,
      lineText.lastIndexOf(QUOTE_DELIMITER, close - width),
      close,
    );
    if (island) {
      return island;
    }
  }

  if (column < width) {
    return undefined;
  }
  return quotedIsland(
    lineText,
    lineText.lastIndexOf(QUOTE_DELIMITER, column - width),
    lineText.indexOf(QUOTE_DELIMITER, column),
  );
}

/**
 * Character index the island scan starts from, if any
 */
function findAnchor(lineText: string, column: number): number | undefined {
  const at = column < lineText.length ? lineText[column] : undefined;
  if (isIdentifierChar(at)) {
    return column;
  }
  if (
    at === '.' &&
    (isIdentifierChar(lineText[column - 1]) ||
      isIdentifierChar(lineText[column + 1]))
  ) {
    return column;
  }
  // Cursor sitting just after an identifier
  if (column > 0 && isIdentifierChar(lineText[column - 1])) {
    return column - 1;
  }
  return undefined;
}

/**
 * Extract the maximal identifier expression ("island") containing `column`.
 *
 * Quoted islands (``like.this``) come back as a single qualifier. Unquoted
 * islands are split on `.`, and `column` of the result is the start of the
 * first qualifier.
 *
 * @param lineText Text of one line, without its line break
 * @param column 0-based column of the cursor
 */
export function extractIsland(
  lineText: string,
  column: number,
): Island | undefined {
  if (!Number.isInteger(column) || column < 0 || column > lineText.length) {
    return undefined;
  }

  const quoted = findQuotedIsland(lineText, column);
  if (quoted) {
    return quoted;
  }

  const anchor = findAnchor(lineText, column);
  if (anchor === undefined) {
    return undefined;
  }

  let start = anchor;
  while (start > 0 && isIslandChar(lineText[start - 1])) {
    start--;
  }
  let end = anchor + 1;
  while (end < lineText.length && isIslandChar(lineText[end])) {
    end++;
  }

  while (start < end && lineText[start] === '.') {
    start++;
  }
  while (end > start && lineText[end - 1] === '.') {
    end--;
  }
  if (start === end) {
    return undefined;
  }

  const text = lineText.slice(start, end);
  return {
    text,
    column: start,
    qualifiers: text.split('.').filter((segment) => segment.length > 0),
    isQuoted: false,
  };
}
