/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { HashMap } from 'data-structure-typed';
import { getLogger } from '@symnav/lsp-shared';

import type {
  DocumentId,
  ProjectDocument,
  ProjectId,
  SolutionGraph,
} from '../types/document';
import type { ProjectOptions, ProjectOptionsProvider } from '../types/oracle';
import { normalizeFilePath } from '../definition/CrossDocumentLocator';

/**
 * Solution graph held in memory by the host: documents plus the compilation
 * options of each project.
 */
export class InMemorySolutionGraph
  implements SolutionGraph, ProjectOptionsProvider
{
  private readonly logger = getLogger();
  private readonly documents = new HashMap<DocumentId, ProjectDocument>();
  private readonly documentsByPath = new HashMap<string, DocumentId[]>();
  private readonly documentsByUri = new HashMap<string, DocumentId>();
  private readonly projectOptions = new HashMap<ProjectId, ProjectOptions>();

  public setProjectOptions(projectId: ProjectId, options: ProjectOptions): void {
    this.projectOptions.set(projectId, options);
  }

  public getOptions(projectId: ProjectId): ProjectOptions | undefined {
    return this.projectOptions.get(projectId);
  }

  /**
   * Add a document, replacing any document with the same id
   */
  public addDocument(document: ProjectDocument): void {
    if (this.documents.has(document.id)) {
      this.removeDocument(document.id);
    }
    const key = normalizeFilePath(document.filePath);
    this.documents.set(document.id, document);
    this.documentsByPath.set(key, [
      ...(this.documentsByPath.get(key) ?? []),
      document.id,
    ]);
    this.documentsByUri.set(document.uri, document.id);
    this.logger.debug(
      () => `Added ${document.uri} to project ${document.projectId}`,
    );
  }

  public removeDocument(id: DocumentId): boolean {
    const document = this.documents.get(id);
    if (!document) {
      return false;
    }
    this.documents.delete(id);

    const key = normalizeFilePath(document.filePath);
    const remaining = (this.documentsByPath.get(key) ?? []).filter(
      (candidate) => candidate !== id,
    );
    if (remaining.length > 0) {
      this.documentsByPath.set(key, remaining);
    } else {
      this.documentsByPath.delete(key);
    }

    if (this.documentsByUri.get(document.uri) === id) {
      this.documentsByUri.delete(document.uri);
      // Another project may still hold a document at the same uri
      const sibling = remaining
        .map((candidate) => this.documents.get(candidate))
        .find((candidate) => candidate?.uri === document.uri);
      if (sibling) {
        this.documentsByUri.set(sibling.uri, sibling.id);
      }
    }
    return true;
  }

  public getDocumentIdsWithFilePath(filePath: string): readonly DocumentId[] {
    return [...(this.documentsByPath.get(normalizeFilePath(filePath)) ?? [])];
  }

  public getDocument(id: DocumentId): ProjectDocument | undefined {
    return this.documents.get(id);
  }

  /**
   * The most recently added document at `uri`
   */
  public getDocumentByUri(uri: string): ProjectDocument | undefined {
    const id = this.documentsByUri.get(uri);
    return id === undefined ? undefined : this.documents.get(id);
  }

  public get documentCount(): number {
    return this.documents.size;
  }
}
