/**
 * Comparison operators used in predicates
 */
export const COMPARISON_OPERATORS = {
  /** Equality operator */
  EQUALS: '=',
  /** Not equals operator */
  NOT_EQUALS: '!=',
  /** Greater than operator */
  GREATER_THAN: '>',
  /** Greater than or equal operator */
  GREATER_OR_EQUAL: '>=',
  /** Less than operator */
  LESS_THAN: '<',
  /** Less than or equal operator */
  LESS_OR_EQUAL: '<=',
  /** LIKE pattern matching operator */
  LIKE: 'LIKE',
  /** IN membership operator */
  IN: 'IN',
  /** NOT IN membership operator */
  NOT_IN: 'NOT IN'
} as const;

export const LOGICAL_OPERATORS = {
  AND: 'AND',
  OR: 'OR'
} as const;

export const ARITHMETIC_OPERATORS = {
  ADD: '+',
  SUBTRACT: '-',
  MULTIPLY: '*',
  DIVIDE: '/',
  MOD: 'MOD',
  POW: 'POW'
} as const;

/**
 * Bitwise operators (integral operands only)
 */
export const BITWISE_OPERATORS = {
  AND: '&',
  OR: '|'
} as const;

/**
 * Operators taking a single operand
 */
export const UNARY_OPERATORS = {
  NOT: 'NOT',
  IS_NULL: 'IS NULL',
  IS_NOT_NULL: 'IS NOT NULL'
} as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[keyof typeof COMPARISON_OPERATORS];
export type LogicalOperator = (typeof LOGICAL_OPERATORS)[keyof typeof LOGICAL_OPERATORS];
export type ArithmeticOperator = (typeof ARITHMETIC_OPERATORS)[keyof typeof ARITHMETIC_OPERATORS];
export type BitwiseOperator = (typeof BITWISE_OPERATORS)[keyof typeof BITWISE_OPERATORS];
export type UnaryOperator = (typeof UNARY_OPERATORS)[keyof typeof UNARY_OPERATORS];

/**
 * Any operator that combines two operands
 */
export type BinaryOperator = ComparisonOperator | LogicalOperator | ArithmeticOperator | BitwiseOperator;

const comparisonSet = new Set<string>(Object.values(COMPARISON_OPERATORS));
const logicalSet = new Set<string>(Object.values(LOGICAL_OPERATORS));
const arithmeticSet = new Set<string>(Object.values(ARITHMETIC_OPERATORS));
const bitwiseSet = new Set<string>(Object.values(BITWISE_OPERATORS));

export const isComparisonOperator = (op: BinaryOperator): op is ComparisonOperator => comparisonSet.has(op);
export const isLogicalOperator = (op: BinaryOperator): op is LogicalOperator => logicalSet.has(op);
export const isArithmeticOperator = (op: BinaryOperator): op is ArithmeticOperator => arithmeticSet.has(op);
export const isBitwiseOperator = (op: BinaryOperator): op is BitwiseOperator => bitwiseSet.has(op);

/**
 * Sort directions
 */
export const ORDER_DIRECTIONS = {
  ASC: 'asc',
  DESC: 'desc'
} as const;

export type OrderDirection = (typeof ORDER_DIRECTIONS)[keyof typeof ORDER_DIRECTIONS];

/**
 * Types of joins supported by the pipeline
 */
export const JOIN_KINDS = {
  /** INNER join type */
  INNER: 'inner',
  /** LEFT OUTER join type */
  LEFT: 'left'
} as const;

export type JoinKind = (typeof JOIN_KINDS)[keyof typeof JOIN_KINDS];
