/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { Effect } from 'effect';
import { TextDocument } from 'vscode-languageserver-textdocument';

import {
  ClassificationFilter,
  findSpanAt,
} from '../../src/definition/ClassificationFilter';
import { createFakeOracle, createMockLogger } from '../helpers/fakeOracle';

describe('ClassificationFilter', () => {
  const context = {
    documentId: 'doc-1',
    filePath: '/work/src/a.fs',
    defines: ['COMPILED', 'EDITING'],
  };

  const createDocument = (text: string) =>
    TextDocument.create('file:///work/src/a.fs', 'plaintext', 1, text);

  it('should accept offsets inside identifiers', async () => {
    const fake = createFakeOracle();
    const filter = new ClassificationFilter(createMockLogger(), fake.oracle);

    const result = await Effect.runPromise(
      filter.isIdentifierSpan(createDocument('let x = 1 // x is one'), 4, context),
    );

    expect(result).toBe(true);
  });

  it('should reject offsets inside comments and keywords', async () => {
    const fake = createFakeOracle();
    const filter = new ClassificationFilter(createMockLogger(), fake.oracle);
    const document = createDocument('let x = 1 // x is one');

    expect(
      await Effect.runPromise(filter.isIdentifierSpan(document, 13, context)),
    ).toBe(false);
    expect(
      await Effect.runPromise(filter.isIdentifierSpan(document, 0, context)),
    ).toBe(false);
  });

  it('should reject offsets in whitespace between tokens', async () => {
    const fake = createFakeOracle();
    const filter = new ClassificationFilter(createMockLogger(), fake.oracle);

    const result = await Effect.runPromise(
      filter.isIdentifierSpan(createDocument('a  +  b'), 2, context),
    );

    expect(result).toBe(false);
  });

  it('should ask the oracle about the line holding the offset', async () => {
    const fake = createFakeOracle();
    const filter = new ClassificationFilter(createMockLogger(), fake.oracle);
    const text = 'let x = 1\nlet y = x + 1';

    const result = await Effect.runPromise(
      filter.isIdentifierSpan(createDocument(text), 18, context),
    );

    expect(result).toBe(true);
    expect(fake.classifyLine).toHaveBeenCalledWith(
      {
        documentId: 'doc-1',
        filePath: '/work/src/a.fs',
        text,
        lineSpan: { start: 10, end: 23 },
        defines: ['COMPILED', 'EDITING'],
      },
      expect.any(AbortSignal),
    );
  });

  it('should fail with InvalidOffset before calling the oracle', async () => {
    const fake = createFakeOracle();
    const filter = new ClassificationFilter(createMockLogger(), fake.oracle);

    const error = await Effect.runPromise(
      Effect.flip(filter.isIdentifierSpan(createDocument('x'), 5, context)),
    );

    expect(error._tag).toBe('InvalidOffset');
    expect(fake.classifyLine).not.toHaveBeenCalled();
  });

  it('should fail with ExternalRequestError when the oracle rejects', async () => {
    const fake = createFakeOracle();
    fake.classifyLine.mockRejectedValueOnce(new Error('colorizer offline'));
    const filter = new ClassificationFilter(createMockLogger(), fake.oracle);

    const error = await Effect.runPromise(
      Effect.flip(filter.isIdentifierSpan(createDocument('x'), 0, context)),
    );

    expect(error).toMatchObject({
      _tag: 'ExternalRequestError',
      stage: 'classification',
      message: 'classification request failed: colorizer offline',
    });
  });

  describe('findSpanAt', () => {
    const spans = [
      { span: { start: 0, end: 3 }, category: 'keyword' as const },
      { span: { start: 4, end: 5 }, category: 'identifier' as const },
    ];

    it('should prefer the span containing the offset', () => {
      expect(findSpanAt(spans, 4)?.category).toBe('identifier');
      expect(findSpanAt(spans, 3)?.category).toBe('keyword');
    });

    it('should fall back to the span ending at the offset', () => {
      expect(findSpanAt(spans, 5)?.category).toBe('identifier');
    });

    it('should return undefined when nothing touches the offset', () => {
      expect(findSpanAt(spans, 7)).toBeUndefined();
      expect(findSpanAt([], 0)).toBeUndefined();
    });
  });
});
