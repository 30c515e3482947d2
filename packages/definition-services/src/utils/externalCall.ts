/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { Effect } from 'effect';
import { normalizeError } from '@symnav/lsp-shared';

import { ExternalRequestError, ExternalStage } from '../types/errors';

/**
 * Lift a promise-returning collaborator call into an interruptible Effect.
 * Interrupting the fiber aborts the signal handed to `run`.
 */
export function callExternal<A>(
  stage: ExternalStage,
  run: (signal: AbortSignal) => Promise<A>,
): Effect.Effect<A, ExternalRequestError> {
  return Effect.tryPromise({
    try: run,
    catch: (cause) =>
      new ExternalRequestError({
        message: `${stage} request failed: ${normalizeError(cause).message}`,
        stage,
        cause,
      }),
  });
}
