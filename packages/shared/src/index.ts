export * from './logger.js';
export * from './utils/errors.js';
export * from './utils/math.js';
export * from './utils/random.js';
export * from './rdf/vocabulary.js';
export * from './rdf/terms.js';
export type * from './types/graph.types.js';
export type * from './types/evaluation.types.js';
