/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { Effect } from 'effect';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { LoggerInterface } from '@symnav/lsp-shared';

import type { DocumentId } from '../types/document';
import type { ClassifiedSpan, LanguageOracle } from '../types/oracle';
import type { ExternalRequestError, InvalidOffsetError } from '../types/errors';
import { callExternal } from '../utils/externalCall';
import { getOracleLine, toOraclePosition } from '../utils/positionUtils';

export interface ClassificationContext {
  documentId: DocumentId;
  filePath: string;
  defines: readonly string[];
}

/**
 * Span containing `offset`; when none does, the span ending right at it.
 * The fallback matches extractIsland, which accepts a cursor just after an
 * identifier.
 */
export function findSpanAt(
  spans: readonly ClassifiedSpan[],
  offset: number,
): ClassifiedSpan | undefined {
  return (
    spans.find(({ span }) => span.start <= offset && offset < span.end) ??
    spans.find(({ span }) => span.start < offset && span.end === offset)
  );
}

/**
 * Gate in front of resolution: only identifier-classified text is worth
 * sending to the oracle.
 */
export class ClassificationFilter {
  constructor(
    private readonly logger: LoggerInterface,
    private readonly oracle: LanguageOracle,
  ) {}

  public isIdentifierSpan(
    document: TextDocument,
    offset: number,
    context: ClassificationContext,
  ): Effect.Effect<boolean, InvalidOffsetError | ExternalRequestError> {
    const self = this;
    return Effect.gen(function* () {
      const position = yield* toOraclePosition(document, offset);
      const line = getOracleLine(document, position.line);
      const spans = yield* callExternal('classification', (signal) =>
        self.oracle.classifyLine(
          {
            documentId: context.documentId,
            filePath: context.filePath,
            text: document.getText(),
            lineSpan: line.span,
            defines: context.defines,
          },
          signal,
        ),
      );
      const classified = findSpanAt(spans, offset);
      self.logger.debug(
        () =>
          `Classification at offset ${offset}: ${classified?.category ?? 'unclassified'}`,
      );
      return classified?.category === 'identifier';
    });
  }
}
