import { describe, it, expect } from 'vitest';
import {
  alias,
  and,
  column,
  eq,
  gt,
  groupSpec,
  ifThen,
  inList,
  isNull,
  like,
  not,
  or,
  desc
} from '../src/core/ast/expression-builders.js';
import { avg, count } from '../src/core/ast/aggregate-functions.js';
import { mod, pow } from '../src/core/functions/numeric.js';
import { childExpressions, referencedColumns } from '../src/core/ast/expression-visitor.js';
import { Employees } from './fixtures/schema.js';

describe('expression builders', () => {
  it('treats a bare string on the left as a column and on the right as a literal', () => {
    expect(eq('name', 'Alice')).toEqual({
      type: 'Binary',
      operator: '=',
      left: { type: 'ColumnRef', name: 'name' },
      right: { type: 'Literal', literalType: 'string', value: 'Alice' }
    });
  });

  it('accepts column definitions on either side', () => {
    expect(gt(Employees.columns.age, Employees.columns.department_id)).toEqual({
      type: 'Binary',
      operator: '>',
      left: { type: 'ColumnRef', name: 'age' },
      right: { type: 'ColumnRef', name: 'department_id' }
    });
  });

  it('references a column on the right through column()', () => {
    expect(eq('department_id', column('dept_id')).right).toEqual({ type: 'ColumnRef', name: 'dept_id' });
  });

  it('folds and/or to the left', () => {
    const a = eq('active', true);
    const b = gt('age', 30);
    const c = like('name', 'A%');
    expect(and(a, b, c)).toEqual({
      type: 'Binary',
      operator: 'AND',
      left: { type: 'Binary', operator: 'AND', left: a, right: b },
      right: c
    });
    expect(or(a)).toBe(a);
    expect(() => and()).toThrow('AND needs at least one operand');
  });

  it('builds IN lists from plain values', () => {
    expect(inList('age', [30, 40])).toEqual({
      type: 'Binary',
      operator: 'IN',
      left: { type: 'ColumnRef', name: 'age' },
      right: {
        type: 'ValueList',
        items: [
          { type: 'Literal', literalType: 'integer', value: 30 },
          { type: 'Literal', literalType: 'integer', value: 40 }
        ]
      }
    });
  });

  it('builds unary, conditional, alias and ordering nodes', () => {
    expect(not(isNull('name'))).toEqual({
      type: 'Unary',
      operator: 'NOT',
      operand: { type: 'Unary', operator: 'IS NULL', operand: { type: 'ColumnRef', name: 'name' } }
    });
    expect(ifThen(gt('age', 30), 'Senior', 'Junior')).toMatchObject({
      type: 'Conditional',
      then: { literalType: 'string', value: 'Senior' },
      else: { literalType: 'string', value: 'Junior' }
    });
    expect(alias(count('id'), 'total')).toEqual({
      type: 'Alias',
      name: 'total',
      expression: { type: 'FunctionCall', fn: 'count', args: [{ type: 'ColumnRef', name: 'id' }] }
    });
    expect(desc('salary')).toEqual({
      type: 'OrderSpec',
      direction: 'desc',
      expression: { type: 'ColumnRef', name: 'salary' }
    });
  });

  it('maps mod and pow to the modulo and power function keys', () => {
    expect(mod('id', 2).fn).toBe('modulo');
    expect(pow('salary', 2).fn).toBe('power');
    expect(pow('salary', 2).args[1]).toEqual({ type: 'Literal', literalType: 'integer', value: 2 });
  });

  it('never mutates operands', () => {
    const left = gt('age', 30);
    const snapshot = JSON.stringify(left);
    and(left, eq('active', true));
    expect(JSON.stringify(left)).toBe(snapshot);
  });
});

describe('expression traversal', () => {
  it('lists direct children and referenced columns', () => {
    const spec = groupSpec(['department_id', alias(avg('salary'), 'avg_salary')], ['department_id'], gt('avg_salary', 1));
    expect(childExpressions(spec)).toHaveLength(4);
    expect(referencedColumns(spec)).toEqual(['department_id', 'department_id', 'salary', 'avg_salary']);
  });
});
