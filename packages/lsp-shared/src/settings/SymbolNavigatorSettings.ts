/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

/**
 * How a definition target is chosen when several documents in the solution
 * share the defining file path.
 *
 * - `sameProject`: prefer a document of the requesting document's project,
 *   otherwise the first match in enumeration order
 * - `first`: the first match in enumeration order
 */
export type DefinitionTieBreak = 'sameProject' | 'first';

/**
 * Go-to-definition settings
 */
export interface DefinitionSettings {
  /** Tie-break policy for documents sharing a file path (default: 'sameProject') */
  tieBreak: DefinitionTieBreak;

  /**
   * Extra typecheck attempts after the oracle reports an aborted check
   * (default: 0, the request fails on the first abort)
   */
  typecheckAbortRetries: number;

  /** File extensions compiled in interactive (script) mode */
  scriptFileExtensions: string[];

  /** Define symbol that is always present while editing */
  editingDefine: string;
}

/**
 * Complete Symbol Navigator settings
 */
export interface SymbolNavigatorSettings {
  navigator: {
    definition: DefinitionSettings;

    /**
     * General log level (optional, from navigator.logLevel)
     * Accepts: 'error', 'warning', 'info', 'log', 'debug'
     */
    logLevel?: string;
  };
}

/**
 * Partial settings as they arrive from a host configuration change
 */
export interface SymbolNavigatorSettingsUpdate {
  navigator?: {
    definition?: Partial<DefinitionSettings>;
    logLevel?: string;
  };
}
