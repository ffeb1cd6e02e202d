import type { SemanticType } from '../../schema/column-types.js';

/**
 * Groups of semantic types whose values can be compared with each other
 */
export type TypeFamily = 'numeric' | 'string' | 'temporal' | 'boolean';

const NUMERIC_RANK: Partial<Record<SemanticType, number>> = {
  integer: 0,
  long: 1,
  double: 2
};

export const familyOf = (type: SemanticType): TypeFamily => {
  switch (type) {
    case 'integer':
    case 'long':
    case 'double':
      return 'numeric';
    case 'string':
      return 'string';
    case 'date':
    case 'datetime':
      return 'temporal';
    case 'boolean':
      return 'boolean';
  }
};

export const isNumeric = (type: SemanticType): boolean => NUMERIC_RANK[type] !== undefined;

export const isIntegral = (type: SemanticType): boolean => type === 'integer' || type === 'long';

/**
 * Widens two numeric types to the wider one (integer < long < double)
 */
export const widen = (left: SemanticType, right: SemanticType): SemanticType => {
  const l = NUMERIC_RANK[left] ?? 0;
  const r = NUMERIC_RANK[right] ?? 0;
  return l >= r ? left : right;
};

/**
 * Whether two types may be compared for equality
 */
export const areEqualityComparable = (left: SemanticType, right: SemanticType): boolean =>
  familyOf(left) === familyOf(right);

/**
 * Whether two types may be ordered (<, <=, >, >=); booleans are not ordered
 */
export const areOrderComparable = (left: SemanticType, right: SemanticType): boolean =>
  areEqualityComparable(left, right) && familyOf(left) !== 'boolean';
