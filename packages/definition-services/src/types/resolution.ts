/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import type { OracleRange } from './oracle';

/**
 * Identifier expression under the cursor
 */
export interface Island {
  /** Island text as it appears on the line, without quote delimiters */
  text: string;
  /** Column where the island starts (the opening delimiter when quoted) */
  column: number;
  /** Dotted segments, or the single quoted name; never empty */
  qualifiers: readonly string[];
  isQuoted: boolean;
}

export type NotFoundReason =
  | 'noProjectOptions'
  | 'classificationMiss'
  | 'islandNotFound'
  | 'declarationNotFound';

export type ResolutionResult =
  | { kind: 'found'; range: OracleRange }
  | { kind: 'notFound'; reason: NotFoundReason };

export const found = (range: OracleRange): ResolutionResult => ({
  kind: 'found',
  range,
});

export const notFound = (reason: NotFoundReason): ResolutionResult => ({
  kind: 'notFound',
  reason,
});
