/**
 * Query module — predicate parsing, evaluation, and chunked filtering.
 */

export * from './types.js';
export * from './ExpressionParser.js';
export * from './ExpressionRewriter.js';
export * from './PredicateEvaluator.js';
export * from './ChunkedFilter.js';
export * from './ProcessChunkExecutor.js';
