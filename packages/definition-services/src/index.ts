/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

export type * from './types/document';
export type * from './types/oracle';
export * from './types/errors';
export * from './types/resolution';

export * from './utils/positionUtils';
export * from './utils/cancellation';

export * from './definition/IslandExtractor';
export * from './definition/ClassificationFilter';
export * from './definition/CompilationDefines';
export * from './definition/CrossDocumentLocator';

export * from './services/DefinitionProcessingService';
export * from './handlers/DefinitionHandler';

export * from './solution/InMemorySolutionGraph';
export * from './solution/TextDocumentProjectDocument';
