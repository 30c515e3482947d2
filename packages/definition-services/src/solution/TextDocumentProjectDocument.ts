/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import * as path from 'path';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';

import type { DocumentId, ProjectDocument, ProjectId } from '../types/document';

export interface TextDocumentProjectDocumentInit {
  id: DocumentId;
  projectId: ProjectId;
  filePath: string;
  text: string;
  languageId?: string;
  version?: number;
}

/**
 * ProjectDocument over an in-memory TextDocument. Each update produces a new
 * snapshot with the next version; snapshots handed out earlier stay as they
 * were.
 */
export class TextDocumentProjectDocument implements ProjectDocument {
  public readonly id: DocumentId;
  public readonly projectId: ProjectId;
  public readonly name: string;
  public readonly filePath: string;
  public readonly uri: string;
  private snapshot: TextDocument;

  constructor(init: TextDocumentProjectDocumentInit) {
    this.id = init.id;
    this.projectId = init.projectId;
    this.filePath = path.resolve(init.filePath);
    this.name = path.basename(this.filePath);
    this.uri = URI.file(this.filePath).toString();
    this.snapshot = TextDocument.create(
      this.uri,
      init.languageId ?? 'plaintext',
      init.version ?? 1,
      init.text,
    );
  }

  public get version(): number {
    return this.snapshot.version;
  }

  public async getText(_signal?: AbortSignal): Promise<TextDocument> {
    return this.snapshot;
  }

  /**
   * Replace the whole text
   */
  public update(text: string): void {
    this.snapshot = TextDocument.create(
      this.uri,
      this.snapshot.languageId,
      this.snapshot.version + 1,
      text,
    );
  }
}
