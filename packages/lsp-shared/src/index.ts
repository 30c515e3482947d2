/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

export {
  DefaultLogNotificationHandler,
  setLogNotificationHandler,
  getLogNotificationHandler,
} from './notification';
export type {
  LogMessageType,
  LogMessageParams,
  LogNotificationHandler,
} from './notification';

// Export logger functionality
export * from './logger';

export * from './utils/ErrorUtils';

// Settings
export type * from './settings/SymbolNavigatorSettings';
export * from './settings/NavigatorSettingsUtilities';
export * from './settings/NavigatorSettingsManager';
