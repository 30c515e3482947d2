/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { Range } from 'vscode-languageserver-protocol';

export type DocumentId = string;
export type ProjectId = string;

/**
 * Half-open span of document offsets, `[start, end)`
 */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * A document owned by the host's project system.
 *
 * The text snapshot is fetched on demand; its `version` is the document's
 * monotonically increasing version stamp.
 */
export interface ProjectDocument {
  readonly id: DocumentId;
  readonly projectId: ProjectId;
  /** Display name, usually the file name */
  readonly name: string;
  /** Absolute file system path */
  readonly filePath: string;
  readonly uri: string;
  getText(signal?: AbortSignal): Promise<TextDocument>;
}

/**
 * The host's view of every document across the open projects
 */
export interface SolutionGraph {
  /**
   * Ids of the documents whose (normalized) file path matches, in
   * enumeration order
   */
  getDocumentIdsWithFilePath(filePath: string): readonly DocumentId[];
  getDocument(id: DocumentId): ProjectDocument | undefined;
  getDocumentByUri(uri: string): ProjectDocument | undefined;
}

/**
 * A resolved definition the host can navigate to
 */
export interface NavigableTarget {
  readonly document: ProjectDocument;
  readonly span: TextSpan;
  /** Text covered by `span` in the target document */
  readonly displayText: string;
  /** `span` expressed in LSP (0-based) coordinates */
  readonly range: Range;
}
