import type { BinaryOperator, OrderDirection, UnaryOperator } from '../algebra/operators.js';
import type { FunctionName } from '../functions/types.js';

export interface IntegerLiteralNode {
  readonly type: 'Literal';
  readonly literalType: 'integer';
  readonly value: number;
}

export interface LongLiteralNode {
  readonly type: 'Literal';
  readonly literalType: 'long';
  readonly value: bigint;
}

export interface DoubleLiteralNode {
  readonly type: 'Literal';
  readonly literalType: 'double';
  readonly value: number;
}

export interface StringLiteralNode {
  readonly type: 'Literal';
  readonly literalType: 'string';
  readonly value: string;
}

export interface BooleanLiteralNode {
  readonly type: 'Literal';
  readonly literalType: 'boolean';
  readonly value: boolean;
}

export interface DateLiteralNode {
  readonly type: 'Literal';
  readonly literalType: 'date';
  /** ISO calendar date, `YYYY-MM-DD` */
  readonly value: string;
}

/**
 * AST node representing a literal value, tagged with its semantic type
 */
export type LiteralNode =
  | IntegerLiteralNode
  | LongLiteralNode
  | DoubleLiteralNode
  | StringLiteralNode
  | BooleanLiteralNode
  | DateLiteralNode;

export type LiteralType = LiteralNode['literalType'];

/**
 * AST node representing a reference to a column of the current schema
 */
export interface ColumnRefNode {
  readonly type: 'ColumnRef';
  readonly name: string;
}

/**
 * AST node representing NOT and the null checks
 */
export interface UnaryNode {
  readonly type: 'Unary';
  readonly operator: UnaryOperator;
  readonly operand: ExpressionNode;
}

/**
 * AST node representing a comparison, logical, arithmetic or bitwise expression
 */
export interface BinaryNode {
  readonly type: 'Binary';
  readonly operator: BinaryOperator;
  readonly left: ExpressionNode;
  /** A ValueList for IN / NOT IN */
  readonly right: ExpressionNode;
}

/**
 * AST node representing the literal list on the right of IN / NOT IN
 */
export interface ValueListNode {
  readonly type: 'ValueList';
  readonly items: ReadonlyArray<LiteralNode>;
}

/**
 * AST node representing a function call
 */
export interface FunctionCallNode {
  readonly type: 'FunctionCall';
  /** Canonical function key */
  readonly fn: FunctionName;
  readonly args: ReadonlyArray<ExpressionNode>;
}

/**
 * AST node naming the result of an expression
 */
export interface AliasNode {
  readonly type: 'Alias';
  readonly name: string;
  readonly expression: ExpressionNode;
}

/**
 * AST node representing an if/then/else expression
 */
export interface ConditionalNode {
  readonly type: 'Conditional';
  readonly test: ExpressionNode;
  readonly then: ExpressionNode;
  readonly else: ExpressionNode;
}

export interface OrderSpecNode {
  readonly type: 'OrderSpec';
  readonly direction: OrderDirection;
  readonly expression: ExpressionNode;
}

/**
 * AST node carrying the grouping keys, the per-group selections and an optional having predicate
 */
export interface GroupSpecNode {
  readonly type: 'GroupSpec';
  readonly selections: ReadonlyArray<ExpressionNode>;
  readonly keys: ReadonlyArray<ColumnRefNode>;
  readonly having?: ExpressionNode;
}

export interface JoinSpecNode {
  readonly type: 'JoinSpec';
  readonly condition: ExpressionNode;
}

/**
 * Closed union of every expression node kind
 */
export type ExpressionNode =
  | LiteralNode
  | ColumnRefNode
  | UnaryNode
  | BinaryNode
  | ValueListNode
  | FunctionCallNode
  | AliasNode
  | ConditionalNode
  | OrderSpecNode
  | GroupSpecNode
  | JoinSpecNode;

export type ExpressionNodeType = ExpressionNode['type'];

const expressionTypes = new Set<string>([
  'Literal',
  'ColumnRef',
  'Unary',
  'Binary',
  'ValueList',
  'FunctionCall',
  'Alias',
  'Conditional',
  'OrderSpec',
  'GroupSpec',
  'JoinSpec'
] satisfies ExpressionNodeType[]);

export const isExpressionNode = (node: unknown): node is ExpressionNode =>
  typeof node === 'object' &&
  node !== null &&
  'type' in node &&
  typeof node.type === 'string' &&
  expressionTypes.has(node.type);
