/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

/**
 * Normalizes any error-like value into a proper Error instance
 */
export const normalizeError = (error: unknown): Error => {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  if (error && typeof error === 'object' && 'message' in error) {
    const normalizedError = new Error(String(error.message));

    if ('stack' in error && typeof error.stack === 'string') {
      normalizedError.stack = error.stack;
    }

    for (const [key, value] of Object.entries(error)) {
      if (key !== 'message' && key !== 'stack') {
        Object.defineProperty(normalizedError, key, {
          value,
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
    }

    return normalizedError;
  }

  return new Error(String(error));
};

const stringifyProperty = (value: unknown): string => {
  if (value === undefined) {
    return 'undefined';
  }
  if (typeof value === 'function') {
    return '[Function]';
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return '[Circular Object]';
  }
};

export interface FormattedErrorOptions {
  includeStack?: boolean;
  includeProperties?: boolean;
  maxStackLines?: number;
  context?: string;
}

/**
 * Creates a detailed error message string with stack trace and properties
 * @param error - The error to format (any type - will be normalized)
 * @param options - Formatting options
 */
export const formattedError = (
  error: unknown,
  options: FormattedErrorOptions = {},
): string => {
  const normalizedError = normalizeError(error);

  const {
    includeStack = true,
    includeProperties = true,
    maxStackLines = 10,
    context,
  } = options;

  const parts: string[] = [];

  if (context) {
    parts.push(`[${context}]`);
  }

  parts.push(`Error: ${normalizedError.message}`);

  if (normalizedError.name && normalizedError.name !== 'Error') {
    parts.push(`Type: ${normalizedError.name}`);
  }

  if (includeProperties) {
    const customProps = Object.getOwnPropertyNames(normalizedError)
      .filter((prop) => !['name', 'message', 'stack'].includes(prop))
      .map(
        (prop) =>
          `${prop}: ${stringifyProperty(Reflect.get(normalizedError, prop))}`,
      )
      .join(', ');

    if (customProps) {
      parts.push(`Properties: {${customProps}}`);
    }
  }

  if (includeStack && normalizedError.stack) {
    const stackLines = normalizedError.stack.split('\n');
    // +1 keeps the leading message line
    const relevantStack =
      maxStackLines > 0 ? stackLines.slice(0, maxStackLines + 1) : stackLines;

    parts.push(`Stack:\n${relevantStack.join('\n')}`);
  }

  return parts.join('\n');
};
