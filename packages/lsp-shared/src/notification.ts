/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

/**
 * Log message type union, mirroring the LSP `window/logMessage` levels
 */
export type LogMessageType = 'error' | 'warning' | 'info' | 'log' | 'debug';

/**
 * Log message parameters interface
 */
export interface LogMessageParams {
  /**
   * The type of the log message
   */
  type: LogMessageType;
  /**
   * The message to log
   */
  message: string;
}

/**
 * Forwards log messages to whatever sits on the other end of the host
 * connection (typically a language client).
 */
export interface LogNotificationHandler {
  sendLogMessage(params: LogMessageParams): void;
}

export class DefaultLogNotificationHandler implements LogNotificationHandler {
  public sendLogMessage(_params: LogMessageParams): void {
    // Nothing is connected until a host installs its own handler
  }
}

let logNotificationHandler: LogNotificationHandler =
  new DefaultLogNotificationHandler();

/**
 * Set the log notification handler
 * @param handler The log notification handler to use
 */
export const setLogNotificationHandler = (
  handler: LogNotificationHandler,
): void => {
  logNotificationHandler = handler;
};

/**
 * Get the current log notification handler
 */
export const getLogNotificationHandler = (): LogNotificationHandler =>
  logNotificationHandler;
