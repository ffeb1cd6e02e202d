/**
 * relpipe core exports.
 * Provides schema definition, the expression IR, pipeline building and rendering.
 */
export * from './schema/table.js';
export * from './schema/column-types.js';
export * from './schema/snapshot.js';
export * from './schema/identifier.js';
export * from './core/ast/expression.js';
export * from './core/algebra/operators.js';
export * from './core/errors.js';
export * from './core/typing/type-checker.js';
export * from './core/functions/types.js';
export * from './core/functions/catalog.js';
export * from './core/functions/function-registry.js';
export * from './core/functions/standard-strategy.js';
export * from './core/dialect/abstract.js';
export * from './core/dialect/dialect-factory.js';
export * from './core/dialect/pure-relation/index.js';
export type { OrderByStyle } from './core/dialect/base/orderby-compiler.js';
export type { PaginationStrategy } from './core/dialect/base/pagination-strategy.js';
export * from './core/logging/query-logger.js';
export * from './query-builder/pipeline.js';
export type { ResolvedClause, RenameInput, OrderInput } from './query-builder/clause-resolver.js';
export { ClauseResolver } from './query-builder/clause-resolver.js';
