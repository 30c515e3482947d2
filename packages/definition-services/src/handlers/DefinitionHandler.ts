/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { Effect, Exit } from 'effect';
import type { CancellationToken } from 'vscode-jsonrpc';
import type {
  DefinitionParams,
  Location,
} from 'vscode-languageserver-protocol';
import { LoggerInterface } from '@symnav/lsp-shared';

import type {
  NavigableTarget,
  ProjectDocument,
  SolutionGraph,
} from '../types/document';
import type { DefinitionError } from '../types/errors';
import type { IDefinitionProcessor } from '../services/DefinitionProcessingService';
import { toAbortSignal } from '../utils/cancellation';
import { logFailedExit, logHandlerError } from '../utils/handlerUtil';

/**
 * Host callback that displays a successful go-to-definition
 */
export type DefinitionPresenter = (
  displayString: string,
  targets: readonly NavigableTarget[],
) => void;

/**
 * Handler for definition requests. Nothing thrown below this point reaches
 * the host: every outcome is a result or no result.
 */
export class DefinitionHandler {
  constructor(
    private readonly logger: LoggerInterface,
    private readonly definitionProcessor: IDefinitionProcessor,
    private readonly solution: SolutionGraph,
    private readonly presenters: readonly DefinitionPresenter[] = [],
  ) {}

  /**
   * Find the definition under `offset`
   * @returns Zero or one navigable target
   */
  public async findDefinitions(
    document: ProjectDocument,
    offset: number,
    token?: CancellationToken,
  ): Promise<NavigableTarget[]> {
    try {
      const exit = await this.run(document, offset, token);
      return Exit.isSuccess(exit) && exit.value ? [exit.value] : [];
    } catch (error) {
      logHandlerError(this.logger, 'findDefinitions', error, document.uri);
      return [];
    }
  }

  /**
   * Entry point for hosts that cannot consume a result list: waits for the
   * pipeline to complete or the token to fire, and shows the target through
   * the presenters.
   * @returns True only when the pipeline ran to completion with a target
   */
  public async tryGoToDefinition(
    document: ProjectDocument,
    offset: number,
    token?: CancellationToken,
  ): Promise<boolean> {
    try {
      const exit = await this.run(document, offset, token);
      if (!Exit.isSuccess(exit) || !exit.value) {
        return false;
      }
      const targets = [exit.value];
      this.present(exit.value.displayText, targets);
      return true;
    } catch (error) {
      logHandlerError(this.logger, 'tryGoToDefinition', error, document.uri);
      return false;
    }
  }

  /**
   * LSP `textDocument/definition`
   * @param params The definition parameters
   * @returns Definition locations for the requested symbol
   */
  public async handleDefinition(
    params: DefinitionParams,
    token?: CancellationToken,
  ): Promise<Location[]> {
    this.logger.debug(
      () => `Processing definition request: ${params.textDocument.uri}`,
    );

    const document = this.solution.getDocumentByUri(params.textDocument.uri);
    if (!document) {
      this.logger.debug(
        () => `${params.textDocument.uri} is not part of the solution`,
      );
      return [];
    }

    try {
      const snapshot = await document.getText();
      const offset = snapshot.offsetAt(params.position);
      const targets = await this.findDefinitions(document, offset, token);
      return targets.map((target) => ({
        uri: target.document.uri,
        range: target.range,
      }));
    } catch (error) {
      logHandlerError(
        this.logger,
        'handleDefinition',
        error,
        params.textDocument.uri,
      );
      return [];
    }
  }

  private async run(
    document: ProjectDocument,
    offset: number,
    token: CancellationToken | undefined,
  ): Promise<Exit.Exit<NavigableTarget | undefined, DefinitionError>> {
    const cancellation = toAbortSignal(token);
    try {
      const exit = await Effect.runPromiseExit(
        this.definitionProcessor.processDefinition(document, offset),
        { signal: cancellation.signal },
      );
      logFailedExit(this.logger, 'definition', exit);
      return exit;
    } finally {
      cancellation.dispose();
    }
  }

  private present(
    displayString: string,
    targets: readonly NavigableTarget[],
  ): void {
    for (const presenter of this.presenters) {
      try {
        presenter(displayString, targets);
      } catch (error) {
        logHandlerError(this.logger, 'presenter', error, displayString);
      }
    }
  }
}
