/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import * as path from 'path';
import type { DefinitionSettings } from '@symnav/lsp-shared';

const DEFINE_FLAG_PREFIXES = ['--define:', '-d:'];

export const INTERACTIVE_DEFINE = 'INTERACTIVE';
export const COMPILED_DEFINE = 'COMPILED';

/**
 * Conditional-compilation symbols in effect while a document is edited:
 * the compilation mode, the editing define, then every `--define:X` / `-d:X`
 * flag in order, without duplicates.
 */
export function getCompilationDefinesForEditing(
  documentName: string,
  otherOptions: readonly string[],
  settings: Pick<DefinitionSettings, 'scriptFileExtensions' | 'editingDefine'>,
): string[] {
  const extension = path.extname(documentName).toLowerCase();
  const isScript = settings.scriptFileExtensions.some(
    (scriptExtension) => scriptExtension.toLowerCase() === extension,
  );

  const defines = [
    isScript ? INTERACTIVE_DEFINE : COMPILED_DEFINE,
    settings.editingDefine,
  ];
  for (const option of otherOptions) {
    const prefix = DEFINE_FLAG_PREFIXES.find((candidate) =>
      option.startsWith(candidate),
    );
    if (prefix) {
      const symbol = option.slice(prefix.length).trim();
      if (symbol.length > 0) {
        defines.push(symbol);
      }
    }
  }
  return [...new Set(defines)];
}
