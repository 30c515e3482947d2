/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { Effect } from 'effect';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { Position, Range } from 'vscode-languageserver-protocol';

import type { TextSpan } from '../types/document';
import type { OraclePosition, OracleRange } from '../types/oracle';
import { InvalidOffsetError, RangeOutOfDocumentError } from '../types/errors';

// Past any line end; TextDocument.offsetAt clamps it before the line break
const END_OF_LINE = Number.MAX_SAFE_INTEGER;

/**
 * Map a flat document offset to oracle coordinates (1-based line, 0-based
 * column). Offsets outside `[0, text.length]` fail with InvalidOffset.
 */
export function toOraclePosition(
  document: TextDocument,
  offset: number,
): Effect.Effect<OraclePosition, InvalidOffsetError> {
  const length = document.getText().length;
  if (!Number.isInteger(offset) || offset < 0 || offset > length) {
    return Effect.fail(
      new InvalidOffsetError({
        message: `Offset ${offset} is outside document ${document.uri} (length ${length})`,
        offset,
        length,
      }),
    );
  }
  const position = document.positionAt(offset);
  return Effect.succeed({
    line: position.line + 1, // Convert 0-based to 1-based line
    column: position.character,
  });
}

const checkLine = (
  document: TextDocument,
  line: number,
): Effect.Effect<void, RangeOutOfDocumentError> =>
  line >= 1 && line <= document.lineCount
    ? Effect.void
    : Effect.fail(
        new RangeOutOfDocumentError({
          message: `Line ${line} is outside document ${document.uri} (${document.lineCount} lines)`,
          line,
          lineCount: document.lineCount,
        }),
      );

/**
 * Map an oracle range onto a document's offsets by locating line starts.
 * Columns past a line's end clamp to that line's end.
 */
export function toDocumentSpan(
  document: TextDocument,
  range: OracleRange,
): Effect.Effect<TextSpan, RangeOutOfDocumentError> {
  return Effect.gen(function* () {
    yield* checkLine(document, range.start.line);
    yield* checkLine(document, range.end.line);
    const start = document.offsetAt(toLspPosition(range.start));
    const end = document.offsetAt(toLspPosition(range.end));
    return { start, end: Math.max(start, end) };
  });
}

/**
 * Text and offsets of a line, addressed by its 1-based oracle line number
 */
export function getOracleLine(
  document: TextDocument,
  line: number,
): { text: string; span: TextSpan } {
  const lspLine = line - 1;
  const start = document.offsetAt({ line: lspLine, character: 0 });
  const end = document.offsetAt({ line: lspLine, character: END_OF_LINE });
  return { text: document.getText().slice(start, end), span: { start, end } };
}

/**
 * Transform an oracle position (1-based line) to an LSP position (0-based line)
 */
export function toLspPosition(position: OraclePosition): Position {
  return {
    line: position.line - 1,
    character: position.column,
  };
}

export function spanToLspRange(document: TextDocument, span: TextSpan): Range {
  return {
    start: document.positionAt(span.start),
    end: document.positionAt(span.end),
  };
}

/**
 * Create a debug string representation of a position
 */
export function formatPosition(
  position: Position | OraclePosition,
): string {
  return 'column' in position
    ? `${position.line}:${position.column} (oracle)`
    : `${position.line}:${position.character} (lsp)`;
}
