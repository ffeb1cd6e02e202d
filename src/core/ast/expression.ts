/**
 * Expression and clause IR.
 * Re-exports the node types, builders and the visitor.
 */
export * from './expression-nodes.js';
export * from './literals.js';
export * from './expression-builders.js';
export * from './aggregate-functions.js';
export * from './expression-visitor.js';
export * from './clause-nodes.js';
export * from './clause-visitor.js';
export * from '../functions/numeric.js';
