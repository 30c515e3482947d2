/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { Cause, Exit, Option } from 'effect';
import { formattedError, LoggerInterface } from '@symnav/lsp-shared';

/**
 * Utility function to log handler errors consistently
 * @param handlerName The name of the handler that encountered the error
 * @param error The error that occurred
 * @param context Optional context information about the error
 */
export function logHandlerError(
  logger: LoggerInterface,
  handlerName: string,
  error: unknown,
  context?: string,
): void {
  logger.error(() =>
    formattedError(error, {
      context: context ? `${handlerName}: ${context}` : handlerName,
    }),
  );
}

/**
 * Log why an Effect run did not produce a value. Cancellation is routine and
 * only shows up at debug level.
 */
export function logFailedExit<A, E>(
  logger: LoggerInterface,
  handlerName: string,
  exit: Exit.Exit<A, E>,
): void {
  if (Exit.isSuccess(exit)) {
    return;
  }
  if (Cause.isInterruptedOnly(exit.cause)) {
    logger.debug(() => `${handlerName}: request cancelled`);
    return;
  }
  if (Option.isSome(Cause.failureOption(exit.cause))) {
    logger.debug(() => `${handlerName}: ${Cause.pretty(exit.cause)}`);
    return;
  }
  // Defects are bugs in a collaborator or in this package
  logger.error(() => `${handlerName}: ${Cause.pretty(exit.cause)}`);
}
