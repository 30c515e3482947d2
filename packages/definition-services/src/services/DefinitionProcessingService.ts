/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { Effect } from 'effect';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import {
  DefinitionSettings,
  LoggerInterface,
  NavigatorSettingsManager,
} from '@symnav/lsp-shared';

import type {
  DocumentId,
  NavigableTarget,
  ProjectDocument,
  SolutionGraph,
} from '../types/document';
import type {
  CheckFileResults,
  LanguageOracle,
  ProjectOptions,
  ProjectOptionsProvider,
} from '../types/oracle';
import {
  DefinitionError,
  ExternalRequestError,
  TypecheckAbortedError,
} from '../types/errors';
import { found, notFound, ResolutionResult } from '../types/resolution';
import { ClassificationFilter } from '../definition/ClassificationFilter';
import { CrossDocumentLocator } from '../definition/CrossDocumentLocator';
import { extractIsland } from '../definition/IslandExtractor';
import { getCompilationDefinesForEditing } from '../definition/CompilationDefines';
import { callExternal } from '../utils/externalCall';
import {
  formatPosition,
  getOracleLine,
  toOraclePosition,
} from '../utils/positionUtils';

/**
 * Everything one resolution needs; built fresh per request
 */
export interface DefinitionRequest {
  documentId: DocumentId;
  filePath: string;
  snapshot: TextDocument;
  offset: number;
  options: ProjectOptions;
  defines: readonly string[];
}

/**
 * Interface for definition processing functionality
 */
export interface IDefinitionProcessor {
  /**
   * Resolve the definition under `offset` to a navigable target. Runs until
   * completion or interruption; interruption leaves no partial result.
   */
  processDefinition(
    document: ProjectDocument,
    offset: number,
  ): Effect.Effect<NavigableTarget | undefined, DefinitionError>;
}

export interface DefinitionServiceDependencies {
  oracle: LanguageOracle;
  projectOptions: ProjectOptionsProvider;
  solution: SolutionGraph;
  /** Defaults to the shared settings manager */
  settings?: () => DefinitionSettings;
}

/**
 * Service for processing definition requests against the language oracle
 */
export class DefinitionProcessingService implements IDefinitionProcessor {
  private readonly oracle: LanguageOracle;
  private readonly projectOptions: ProjectOptionsProvider;
  private readonly settings: () => DefinitionSettings;
  private readonly classificationFilter: ClassificationFilter;
  private readonly locator: CrossDocumentLocator;

  constructor(
    private readonly logger: LoggerInterface,
    dependencies: DefinitionServiceDependencies,
  ) {
    this.oracle = dependencies.oracle;
    this.projectOptions = dependencies.projectOptions;
    this.settings =
      dependencies.settings ??
      (() => NavigatorSettingsManager.getInstance().getDefinitionSettings());
    this.classificationFilter = new ClassificationFilter(logger, this.oracle);
    this.locator = new CrossDocumentLocator(
      logger,
      dependencies.solution,
      () => this.settings().tieBreak,
    );
  }

  public processDefinition(
    document: ProjectDocument,
    offset: number,
  ): Effect.Effect<NavigableTarget | undefined, DefinitionError> {
    const self = this;
    return Effect.gen(function* () {
      self.logger.debug(
        () => `Processing definition request: ${document.uri}@${offset}`,
      );

      const options = self.projectOptions.getOptions(document.projectId);
      if (!options) {
        self.logger.debug(
          () => `No project options for ${document.projectId}`,
        );
        return undefined;
      }

      const snapshot = yield* callExternal('documentText', (signal) =>
        document.getText(signal),
      );
      const defines = getCompilationDefinesForEditing(
        document.name,
        options.otherOptions,
        self.settings(),
      );

      const result = yield* self.findDefinition({
        documentId: document.id,
        filePath: document.filePath,
        snapshot,
        offset,
        options,
        defines,
      });
      if (result.kind === 'notFound') {
        self.logger.debug(() => `No definition: ${result.reason}`);
        return undefined;
      }
      return yield* self.locator.locate(result.range, document);
    });
  }

  /**
   * classify → island → parse → typecheck → declaration lookup.
   * At most one range comes back; the oracle's answer is taken as-is.
   */
  public findDefinition(
    request: DefinitionRequest,
  ): Effect.Effect<ResolutionResult, DefinitionError> {
    const self = this;
    return Effect.gen(function* () {
      const { snapshot, offset } = request;
      const position = yield* toOraclePosition(snapshot, offset);

      const isIdentifier = yield* self.classificationFilter.isIdentifierSpan(
        snapshot,
        offset,
        request,
      );
      if (!isIdentifier) {
        return notFound('classificationMiss');
      }

      const line = getOracleLine(snapshot, position.line);
      const island = extractIsland(line.text, position.column);
      if (!island) {
        return notFound('islandNotFound');
      }
      self.logger.debug(
        () =>
          `Island [${island.qualifiers.join(', ')}] at ${formatPosition(position)}`,
      );

      const checkResults = yield* self.typecheck(request);
      const declaration = yield* callExternal('declaration', (signal) =>
        checkResults.getDeclarationLocation(
          {
            line: position.line,
            column: island.column,
            lineText: line.text,
            qualifiers: island.qualifiers,
            exactPosition: false,
          },
          signal,
        ),
      );

      if (declaration.kind === 'declFound') {
        return found(declaration.range);
      }
      self.logger.debug(
        () => `Declaration not found: ${declaration.reason}`,
      );
      return notFound('declarationNotFound');
    });
  }

  /**
   * Parse then typecheck the request's snapshot. An aborted check fails the
   * request unless retries are configured.
   */
  private typecheck(
    request: DefinitionRequest,
  ): Effect.Effect<
    CheckFileResults,
    ExternalRequestError | TypecheckAbortedError
  > {
    const self = this;
    const { snapshot, filePath, options } = request;
    const text = snapshot.getText();

    const attempt = Effect.gen(function* () {
      const parseResults = yield* callExternal('parse', (signal) =>
        self.oracle.parseFile({ filePath, text, options }, signal),
      );
      const answer = yield* callExternal('typecheck', (signal) =>
        self.oracle.checkFile(
          {
            parseResults,
            filePath,
            version: snapshot.version,
            text,
            options,
          },
          signal,
        ),
      );
      if (answer.kind === 'aborted') {
        return yield* Effect.fail(
          new TypecheckAbortedError({
            message: `Typecheck of ${filePath} (version ${snapshot.version}) aborted`,
            filePath,
            version: snapshot.version,
          }),
        );
      }
      return answer.results;
    });

    const retries = self.settings().typecheckAbortRetries;
    if (retries <= 0) {
      return attempt;
    }
    return attempt.pipe(
      Effect.tapError((error) =>
        Effect.sync(() => self.logger.debug(() => error.message)),
      ),
      Effect.retry({
        times: retries,
        while: (error) => error._tag === 'TypecheckAborted',
      }),
    );
  }
}
