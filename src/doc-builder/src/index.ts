/**
 * @docsmith/doc-builder
 *
 * Structured docstring synthesis for Python sources.
 *
 * extract -> infer types and complexity -> generate / critique / score
 * (bounded refinement per element) -> inject into the original text
 */

// Core types
export * from './types';

// Parsing and extraction
export * from './core';

// Type and complexity inference
export * from './analysis';

// Text capabilities
export * from './ai';

// Generation, review and scoring
export * from './generation';

// Refinement loop and batch driver
export * from './refinement';

// Text surgery
export * from './injection';

// Supporting layers
export * from './cache';
export * from './config';
export * from './report';
export { mapInChunks, withDeadline } from './utils/concurrency';
