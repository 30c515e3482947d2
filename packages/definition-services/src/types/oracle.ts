/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import type { DocumentId, ProjectId, TextSpan } from './document';

/**
 * Oracle coordinates: 1-based line, 0-based column
 */
export interface OraclePosition {
  line: number;
  column: number;
}

export interface OracleRange {
  fileName: string;
  start: OraclePosition;
  end: OraclePosition;
}

export type ClassificationCategory =
  | 'identifier'
  | 'keyword'
  | 'comment'
  | 'string'
  | 'number'
  | 'operator'
  | 'punctuation'
  | 'preprocessor'
  | 'text';

export interface ClassifiedSpan {
  /** Document offsets */
  span: TextSpan;
  category: ClassificationCategory;
}

export interface ClassificationRequest {
  documentId: DocumentId;
  filePath: string;
  text: string;
  /** Span of the line to classify, without its line break */
  lineSpan: TextSpan;
  defines: readonly string[];
}

/**
 * Compilation configuration of a project
 */
export interface ProjectOptions {
  projectFileName: string;
  sourceFiles: readonly string[];
  /** Raw compiler flags, e.g. `--define:DEBUG` */
  otherOptions: readonly string[];
}

export interface ProjectOptionsProvider {
  getOptions(projectId: ProjectId): ProjectOptions | undefined;
}

export interface ParseFileRequest {
  filePath: string;
  text: string;
  options: ProjectOptions;
}

/**
 * Parse output; oracles may carry their own tree on extended types
 */
export interface ParseFileResults {
  readonly fileName: string;
  readonly parseHadErrors: boolean;
}

export interface CheckFileRequest {
  parseResults: ParseFileResults;
  filePath: string;
  /** Version stamp of the text being checked */
  version: number;
  text: string;
  options: ProjectOptions;
}

export interface DeclarationQuery {
  /** 1-based */
  line: number;
  /** Start column of the island */
  column: number;
  lineText: string;
  qualifiers: readonly string[];
  exactPosition: boolean;
}

export type FindDeclResult =
  | { kind: 'declFound'; range: OracleRange }
  | { kind: 'declNotFound'; reason: string };

export interface CheckFileResults {
  getDeclarationLocation(
    query: DeclarationQuery,
    signal: AbortSignal,
  ): Promise<FindDeclResult>;
}

/**
 * `aborted` means the oracle could not finish checking (stale input or its
 * own cancellation)
 */
export type CheckFileAnswer =
  | { kind: 'aborted' }
  | { kind: 'succeeded'; results: CheckFileResults };

/**
 * External classification, parse and typecheck service. Caching of parse and
 * check artifacts is its own business.
 */
export interface LanguageOracle {
  classifyLine(
    request: ClassificationRequest,
    signal: AbortSignal,
  ): Promise<readonly ClassifiedSpan[]>;
  parseFile(
    request: ParseFileRequest,
    signal: AbortSignal,
  ): Promise<ParseFileResults>;
  checkFile(
    request: CheckFileRequest,
    signal: AbortSignal,
  ): Promise<CheckFileAnswer>;
}
