/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import type { CancellationToken } from 'vscode-jsonrpc';

export interface CancellationBridge {
  readonly signal: AbortSignal;
  dispose(): void;
}

/**
 * Expose a host cancellation token as an AbortSignal for the Effect runtime.
 * Dispose the bridge once the request settles.
 */
export function toAbortSignal(token?: CancellationToken): CancellationBridge {
  const controller = new AbortController();
  if (!token) {
    return { signal: controller.signal, dispose: () => undefined };
  }
  if (token.isCancellationRequested) {
    controller.abort();
    return { signal: controller.signal, dispose: () => undefined };
  }
  const registration = token.onCancellationRequested(() => controller.abort());
  return {
    signal: controller.signal,
    dispose: () => registration.dispose(),
  };
}
