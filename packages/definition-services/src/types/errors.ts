/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { Data } from 'effect';

/**
 * Cursor offset outside `[0, text.length]`
 */
export class InvalidOffsetError extends Data.TaggedError('InvalidOffset')<{
  readonly message: string;
  readonly offset: number;
  readonly length: number;
}> {}

/**
 * Oracle range line outside the target document
 */
export class RangeOutOfDocumentError extends Data.TaggedError(
  'RangeOutOfDocument',
)<{
  readonly message: string;
  readonly line: number;
  readonly lineCount: number;
}> {}

/**
 * The oracle gave up typechecking the request's snapshot
 */
export class TypecheckAbortedError extends Data.TaggedError(
  'TypecheckAborted',
)<{
  readonly message: string;
  readonly filePath: string;
  readonly version: number;
}> {}

/**
 * Calls that leave this package: the oracle's stages and the host's text
 * retrieval
 */
export type ExternalStage =
  | 'classification'
  | 'parse'
  | 'typecheck'
  | 'declaration'
  | 'documentText';

/**
 * An external collaborator rejected or threw
 */
export class ExternalRequestError extends Data.TaggedError(
  'ExternalRequestError',
)<{
  readonly message: string;
  readonly stage: ExternalStage;
  readonly cause?: unknown;
}> {}

export type DefinitionError =
  | InvalidOffsetError
  | RangeOutOfDocumentError
  | TypecheckAbortedError
  | ExternalRequestError;
