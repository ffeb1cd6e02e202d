import type { SemanticType } from '../../schema/column-types.js';
import type { FunctionName, FunctionSignature } from './types.js';
import { familyOf, isIntegral, isNumeric, widen } from '../typing/type-rules.js';

type Resolution = ReturnType<FunctionSignature['resolve']>;

const numericArg = (type: SemanticType, fn: string): Resolution | undefined =>
  isNumeric(type) ? undefined : { error: `${fn} expects a numeric argument, got ${type}` };

const aggregate = (name: FunctionName, resolve: (arg: SemanticType) => Resolution): FunctionSignature => ({
  name,
  arity: 1,
  aggregate: true,
  resolve: ([arg]) => (arg === undefined ? { error: `${name} expects one argument` } : resolve(arg))
});

const scalar = (
  name: FunctionName,
  resolve: (left: SemanticType, right: SemanticType) => Resolution
): FunctionSignature => ({
  name,
  arity: 2,
  aggregate: false,
  resolve: ([left, right]) =>
    left === undefined || right === undefined ? { error: `${name} expects two arguments` } : resolve(left, right)
});

const orderable = (fn: string) => (arg: SemanticType): Resolution =>
  familyOf(arg) === 'boolean' ? { error: `${fn} cannot be applied to a boolean argument` } : arg;

/**
 * Typing contracts of every supported function, keyed by function name
 */
export const FUNCTION_SIGNATURES: Readonly<Record<FunctionName, FunctionSignature>> = {
  count: aggregate('count', () => 'long'),
  sum: aggregate('sum', arg => numericArg(arg, 'sum') ?? (arg === 'double' ? 'double' : 'long')),
  avg: aggregate('avg', arg => numericArg(arg, 'avg') ?? 'double'),
  min: aggregate('min', orderable('min')),
  max: aggregate('max', orderable('max')),
  modulo: scalar('modulo', (left, right) =>
    isIntegral(left) && isIntegral(right)
      ? widen(left, right)
      : { error: `modulo expects integer or long arguments, got ${left} and ${right}` }
  ),
  power: scalar('power', (left, right) =>
    numericArg(left, 'power') ?? numericArg(right, 'power') ?? 'double'
  )
};

export const getFunctionSignature = (name: FunctionName): FunctionSignature => FUNCTION_SIGNATURES[name];

export const isAggregateFunction = (name: FunctionName): boolean => FUNCTION_SIGNATURES[name].aggregate;
