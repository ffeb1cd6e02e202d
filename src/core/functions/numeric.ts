// Pure AST builders, no backend logic here

import type { FunctionCallNode } from '../ast/expression-nodes.js';
import { ColumnInput, ValueInput, toColumnOperand, toValueOperand } from '../ast/expression-builders.js';

/**
 * Returns the remainder of dividing one integral value by another.
 *
 * @param dividend - Integer or long column or expression.
 * @param divisor - Integer or long value.
 * @returns A function call node rendered as `mod(...)`.
 *
 * @example
 * mod('employee_id', 2);
 */
export const mod = (dividend: ColumnInput, divisor: ValueInput): FunctionCallNode => ({
  type: 'FunctionCall',
  fn: 'modulo',
  args: [toColumnOperand(dividend), toValueOperand(divisor)]
});

/**
 * Raises a number to the given power. The result is always a double.
 *
 * @example
 * pow('growth', 2);
 */
export const pow = (base: ColumnInput, exponent: ValueInput): FunctionCallNode => ({
  type: 'FunctionCall',
  fn: 'power',
  args: [toColumnOperand(base), toValueOperand(exponent)]
});
