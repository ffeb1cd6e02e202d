import type { FunctionCallNode } from './expression-nodes.js';
import { ColumnInput, toColumnOperand } from './expression-builders.js';
import type { FunctionName } from '../functions/types.js';

const buildAggregate = (fn: FunctionName) => (col: ColumnInput): FunctionCallNode => ({
  type: 'FunctionCall',
  fn,
  args: [toColumnOperand(col)]
});

/**
 * Creates a count function expression
 * @param col - Column to count
 */
export const count = buildAggregate('count');

/**
 * Creates a sum function expression
 * @param col - Numeric column to sum
 */
export const sum = buildAggregate('sum');

/**
 * Creates an average function expression
 * @param col - Numeric column to average
 */
export const avg = buildAggregate('avg');

/**
 * Creates a minimum function expression
 */
export const min = buildAggregate('min');

/**
 * Creates a maximum function expression
 */
export const max = buildAggregate('max');
