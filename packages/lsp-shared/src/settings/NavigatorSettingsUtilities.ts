/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { z } from 'zod';

import type {
  SymbolNavigatorSettings,
  SymbolNavigatorSettingsUpdate,
} from './SymbolNavigatorSettings';

/**
 * Default settings for the Symbol Navigator
 */
export const DEFAULT_NAVIGATOR_SETTINGS: SymbolNavigatorSettings = {
  navigator: {
    definition: {
      tieBreak: 'sameProject',
      typecheckAbortRetries: 0,
      scriptFileExtensions: ['.fsx', '.fsscript'],
      editingDefine: 'EDITING',
    },
    logLevel: 'info',
  },
};

const definitionSettingsSchema = z
  .object({
    tieBreak: z.enum(['sameProject', 'first']),
    typecheckAbortRetries: z.number().int().min(0).max(5),
    scriptFileExtensions: z.array(z.string().startsWith('.')),
    editingDefine: z.string().min(1),
  })
  .strict()
  .partial();

const settingsUpdateSchema = z
  .object({
    navigator: z
      .object({
        definition: definitionSettingsSchema.optional(),
        logLevel: z
          .enum(['error', 'warn', 'warning', 'info', 'log', 'debug'])
          .optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Validation result for settings objects
 */
export interface ValidationResult {
  isValid: boolean;
  /** One entry per problem, `path: message` */
  details: string[];
}

export type ParsedSettings =
  | { success: true; settings: SymbolNavigatorSettingsUpdate }
  | { success: false; details: string[] };

/**
 * Parse a (possibly partial) settings object received from a host
 */
export function parseNavigatorSettings(obj: unknown): ParsedSettings {
  const parsed = settingsUpdateSchema.safeParse(obj);
  if (parsed.success) {
    return { success: true, settings: parsed.data };
  }
  return {
    success: false,
    details: parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
    ),
  };
}

export function validateNavigatorSettings(obj: unknown): ValidationResult {
  const parsed = parseNavigatorSettings(obj);
  return parsed.success
    ? { isValid: true, details: [] }
    : { isValid: false, details: parsed.details };
}

/**
 * Type guard over validateNavigatorSettings
 */
export function isValidNavigatorSettings(
  obj: unknown,
): obj is SymbolNavigatorSettingsUpdate {
  return validateNavigatorSettings(obj).isValid;
}

/**
 * Merge a partial update over an existing settings object.
 * Arrays are replaced, never concatenated.
 */
export function mergeWithExisting(
  existing: SymbolNavigatorSettings,
  update: SymbolNavigatorSettingsUpdate,
): SymbolNavigatorSettings {
  const existingDefinition = existing.navigator.definition;
  const definitionUpdate = update.navigator?.definition ?? {};
  return {
    navigator: {
      definition: {
        ...existingDefinition,
        ...definitionUpdate,
        scriptFileExtensions: [
          ...(definitionUpdate.scriptFileExtensions ??
            existingDefinition.scriptFileExtensions),
        ],
      },
      logLevel: update.navigator?.logLevel ?? existing.navigator.logLevel,
    },
  };
}

/**
 * Merge a partial update over the defaults
 */
export function mergeWithDefaults(
  update: SymbolNavigatorSettingsUpdate,
): SymbolNavigatorSettings {
  return mergeWithExisting(DEFAULT_NAVIGATOR_SETTINGS, update);
}
