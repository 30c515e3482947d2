/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import * as path from 'path';
import { Effect } from 'effect';
import { URI } from 'vscode-uri';
import {
  DefinitionTieBreak,
  LoggerInterface,
  normalizeError,
} from '@symnav/lsp-shared';

import type {
  NavigableTarget,
  ProjectDocument,
  SolutionGraph,
} from '../types/document';
import type { OracleRange } from '../types/oracle';
import type { ExternalRequestError } from '../types/errors';
import { callExternal } from '../utils/externalCall';
import {
  formatPosition,
  spanToLspRange,
  toDocumentSpan,
} from '../utils/positionUtils';

/**
 * Absolute form of an oracle file name; `file:` URIs are accepted. Falls back
 * to the raw string when it cannot be normalized.
 */
export function normalizeFilePath(
  fileName: string,
  onError?: (error: Error) => void,
): string {
  try {
    const fsPath = fileName.startsWith('file:')
      ? URI.parse(fileName).fsPath
      : fileName;
    return path.resolve(fsPath);
  } catch (error) {
    onError?.(normalizeError(error));
    return fileName;
  }
}

/**
 * Maps oracle ranges onto documents known to the solution graph
 */
export class CrossDocumentLocator {
  constructor(
    private readonly logger: LoggerInterface,
    private readonly solution: SolutionGraph,
    private readonly tieBreak: () => DefinitionTieBreak = () => 'sameProject',
  ) {}

  /**
   * Resolve `range` to a navigable target, or undefined when the defining
   * file is not part of the solution or the range does not fit it.
   */
  public locate(
    range: OracleRange,
    requestingDocument?: ProjectDocument,
  ): Effect.Effect<NavigableTarget | undefined, ExternalRequestError> {
    const self = this;
    return Effect.gen(function* () {
      const filePath = normalizeFilePath(range.fileName, (error) =>
        self.logger.debug(
          () => `Could not normalize ${range.fileName}: ${error.message}`,
        ),
      );
      const document = self.pickDocument(filePath, requestingDocument);
      if (!document) {
        self.logger.debug(
          () => `Definition file ${filePath} is outside the solution`,
        );
        return undefined;
      }

      const snapshot = yield* callExternal('documentText', (signal) =>
        document.getText(signal),
      );
      const span = yield* toDocumentSpan(snapshot, range).pipe(
        Effect.catchTag('RangeOutOfDocument', (error) => {
          self.logger.debug(() => error.message);
          return Effect.succeed(undefined);
        }),
      );
      if (!span) {
        return undefined;
      }

      self.logger.debug(
        () =>
          `Located ${formatPosition(range.start)}-${formatPosition(range.end)} in ${document.uri}`,
      );
      const target: NavigableTarget = {
        document,
        span,
        displayText: snapshot.getText().slice(span.start, span.end),
        range: spanToLspRange(snapshot, span),
      };
      return target;
    });
  }

  private pickDocument(
    filePath: string,
    requestingDocument: ProjectDocument | undefined,
  ): ProjectDocument | undefined {
    const candidates = this.solution
      .getDocumentIdsWithFilePath(filePath)
      .map((id) => this.solution.getDocument(id))
      .filter((document): document is ProjectDocument => !!document);

    if (this.tieBreak() === 'sameProject' && requestingDocument) {
      const sameProject = candidates.find(
        (candidate) => candidate.projectId === requestingDocument.projectId,
      );
      if (sameProject) {
        return sameProject;
      }
    }
    return candidates[0];
  }
}
