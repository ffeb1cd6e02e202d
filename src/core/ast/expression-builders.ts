import type { ColumnDef } from '../../schema/column-types.js';
import {
  AliasNode,
  BinaryNode,
  ColumnRefNode,
  ConditionalNode,
  ExpressionNode,
  GroupSpecNode,
  JoinSpecNode,
  LiteralNode,
  OrderSpecNode,
  UnaryNode,
  ValueListNode,
  isExpressionNode
} from './expression-nodes.js';
import { LiteralValue, toLiteral } from './literals.js';
import {
  ARITHMETIC_OPERATORS,
  BITWISE_OPERATORS,
  BinaryOperator,
  COMPARISON_OPERATORS,
  LOGICAL_OPERATORS,
  ORDER_DIRECTIONS,
  OrderDirection,
  UNARY_OPERATORS
} from '../algebra/operators.js';

/**
 * Something that names a column: a column definition, a column name or an existing node.
 * A bare string in this position is a column name.
 */
export type ColumnInput = ExpressionNode | ColumnDef | string;

/**
 * Something that yields a value: a node, a column definition or a plain value.
 * A bare string in this position is a string literal; use `column()` to reference a column.
 */
export type ValueInput = ExpressionNode | ColumnDef | LiteralValue;

const isColumnDef = (value: unknown): value is ColumnDef =>
  typeof value === 'object' && value !== null && !isExpressionNode(value) && 'name' in value && 'type' in value;

/**
 * Creates a column reference node
 */
export const column = (name: string): ColumnRefNode => ({ type: 'ColumnRef', name });

export const toColumnOperand = (input: ColumnInput): ExpressionNode => {
  if (typeof input === 'string') return column(input);
  if (isColumnDef(input)) return column(input.name);
  return input;
};

export const toValueOperand = (input: ValueInput): ExpressionNode => {
  if (isColumnDef(input)) return column(input.name);
  if (isExpressionNode(input)) return input;
  return toLiteral(input);
};

/**
 * Creates a binary expression for any operator
 */
export const binary = (operator: BinaryOperator, left: ValueInput | ColumnInput, right: ValueInput): BinaryNode => ({
  type: 'Binary',
  operator,
  left: typeof left === 'string' ? column(left) : toValueOperand(left),
  right: toValueOperand(right)
});

/**
 * Creates an equality expression (left = right)
 * @param left - Column (name, definition or node)
 * @param right - Value or operand
 */
export const eq = (left: ColumnInput, right: ValueInput): BinaryNode =>
  binary(COMPARISON_OPERATORS.EQUALS, left, right);

/**
 * Creates a not equal expression (left != right)
 */
export const neq = (left: ColumnInput, right: ValueInput): BinaryNode =>
  binary(COMPARISON_OPERATORS.NOT_EQUALS, left, right);

/**
 * Creates a greater-than expression (left > right)
 */
export const gt = (left: ColumnInput, right: ValueInput): BinaryNode =>
  binary(COMPARISON_OPERATORS.GREATER_THAN, left, right);

export const gte = (left: ColumnInput, right: ValueInput): BinaryNode =>
  binary(COMPARISON_OPERATORS.GREATER_OR_EQUAL, left, right);

/**
 * Creates a less-than expression (left < right)
 */
export const lt = (left: ColumnInput, right: ValueInput): BinaryNode =>
  binary(COMPARISON_OPERATORS.LESS_THAN, left, right);

export const lte = (left: ColumnInput, right: ValueInput): BinaryNode =>
  binary(COMPARISON_OPERATORS.LESS_OR_EQUAL, left, right);

/**
 * Creates a LIKE pattern matching expression
 * @param left - String column
 * @param pattern - Pattern literal
 */
export const like = (left: ColumnInput, pattern: string): BinaryNode =>
  binary(COMPARISON_OPERATORS.LIKE, left, pattern);

const createInExpression = (
  operator: typeof COMPARISON_OPERATORS.IN | typeof COMPARISON_OPERATORS.NOT_IN,
  left: ColumnInput,
  values: ReadonlyArray<LiteralValue | LiteralNode>
): BinaryNode => {
  const list: ValueListNode = {
    type: 'ValueList',
    items: values.map(v => (isExpressionNode(v) ? v : toLiteral(v)))
  };
  return { type: 'Binary', operator, left: toColumnOperand(left), right: list };
};

/**
 * Creates an IN expression (value IN list)
 */
export const inList = (left: ColumnInput, values: ReadonlyArray<LiteralValue | LiteralNode>): BinaryNode =>
  createInExpression(COMPARISON_OPERATORS.IN, left, values);

/**
 * Creates a NOT IN expression (value NOT IN list)
 */
export const notInList = (left: ColumnInput, values: ReadonlyArray<LiteralValue | LiteralNode>): BinaryNode =>
  createInExpression(COMPARISON_OPERATORS.NOT_IN, left, values);

/**
 * Creates an IS NULL expression
 */
export const isNull = (operand: ColumnInput): UnaryNode => ({
  type: 'Unary',
  operator: UNARY_OPERATORS.IS_NULL,
  operand: toColumnOperand(operand)
});

/**
 * Creates an IS NOT NULL expression
 */
export const isNotNull = (operand: ColumnInput): UnaryNode => ({
  type: 'Unary',
  operator: UNARY_OPERATORS.IS_NOT_NULL,
  operand: toColumnOperand(operand)
});

const fold = (operator: BinaryOperator, operands: ExpressionNode[]): ExpressionNode => {
  const [first, ...rest] = operands;
  if (!first) {
    throw new Error(`${operator} needs at least one operand`);
  }
  return rest.reduce<ExpressionNode>((acc, next) => ({ type: 'Binary', operator, left: acc, right: next }), first);
};

/**
 * Creates a logical AND of the operands, folded left
 * @example and(gt('age', 30), eq('active', true))
 */
export const and = (...operands: ExpressionNode[]): ExpressionNode => fold(LOGICAL_OPERATORS.AND, operands);

/**
 * Creates a logical OR of the operands, folded left
 */
export const or = (...operands: ExpressionNode[]): ExpressionNode => fold(LOGICAL_OPERATORS.OR, operands);

export const not = (operand: ExpressionNode): UnaryNode => ({
  type: 'Unary',
  operator: UNARY_OPERATORS.NOT,
  operand
});

export const add = (left: ColumnInput, right: ValueInput): BinaryNode => binary(ARITHMETIC_OPERATORS.ADD, left, right);
export const sub = (left: ColumnInput, right: ValueInput): BinaryNode =>
  binary(ARITHMETIC_OPERATORS.SUBTRACT, left, right);
export const mul = (left: ColumnInput, right: ValueInput): BinaryNode =>
  binary(ARITHMETIC_OPERATORS.MULTIPLY, left, right);
export const div = (left: ColumnInput, right: ValueInput): BinaryNode => binary(ARITHMETIC_OPERATORS.DIVIDE, left, right);

export const bitAnd = (left: ColumnInput, right: ValueInput): BinaryNode => binary(BITWISE_OPERATORS.AND, left, right);
export const bitOr = (left: ColumnInput, right: ValueInput): BinaryNode => binary(BITWISE_OPERATORS.OR, left, right);

/**
 * Names the result of an expression
 * @example alias(add('salary', 1000), 'bonus')
 */
export const alias = (expression: ColumnInput, name: string): AliasNode => ({
  type: 'Alias',
  name,
  expression: toColumnOperand(expression)
});

/**
 * Creates an if/then/else expression
 */
export const ifThen = (test: ExpressionNode, then: ValueInput, otherwise: ValueInput): ConditionalNode => ({
  type: 'Conditional',
  test,
  then: toValueOperand(then),
  else: toValueOperand(otherwise)
});

const orderSpec = (direction: OrderDirection) => (expression: ColumnInput): OrderSpecNode => ({
  type: 'OrderSpec',
  direction,
  expression: toColumnOperand(expression)
});

export const asc = orderSpec(ORDER_DIRECTIONS.ASC);
export const desc = orderSpec(ORDER_DIRECTIONS.DESC);

export const groupSpec = (
  selections: ReadonlyArray<ColumnInput>,
  keys: ReadonlyArray<ColumnDef | string>,
  having?: ExpressionNode
): GroupSpecNode => ({
  type: 'GroupSpec',
  selections: selections.map(toColumnOperand),
  keys: keys.map(k => column(typeof k === 'string' ? k : k.name)),
  ...(having ? { having } : {})
});

export const joinSpec = (condition: ExpressionNode): JoinSpecNode => ({ type: 'JoinSpec', condition });
