import { describe, it, expect } from 'vitest';
import { from } from '../src/query-builder/pipeline.js';
import { PureRelationDialect, formatDouble } from '../src/core/dialect/pure-relation/index.js';
import type { PaginationStrategy } from '../src/core/dialect/base/pagination-strategy.js';
import { defineTable } from '../src/schema/table.js';
import { col } from '../src/schema/column-types.js';
import { StandardFunctionStrategy } from '../src/core/functions/standard-strategy.js';
import type { FunctionStrategy } from '../src/core/functions/types.js';
import type { ExpressionNode } from '../src/core/ast/expression-nodes.js';
import {
  add,
  alias,
  and,
  asc,
  binary,
  bitOr,
  column,
  desc,
  div,
  eq,
  gt,
  ifThen,
  inList,
  isNotNull,
  isNull,
  like,
  mul,
  not,
  notInList,
  or
} from '../src/core/ast/expression-builders.js';
import { lit } from '../src/core/ast/literals.js';
import { avg, count } from '../src/core/ast/aggregate-functions.js';
import { mod, pow } from '../src/core/functions/numeric.js';
import { BackendUnsupportedError, PipelineError } from '../src/core/errors.js';
import { Departments, Employees, People } from './fixtures/schema.js';

describe('PureRelationDialect', () => {
  const dialect = new PureRelationDialect();

  it('renders a bare source as db.table', () => {
    expect(from(Employees).render(dialect)).toBe('company.employees');
  });

  it('renders a projection of every column of a three-column table', () => {
    const employees = defineTable('company', 'employees', { id: col.int(), name: col.string(), age: col.int() });
    expect(from(employees).select('id', 'name', 'age').render()).toBe(
      'company.employees\n->project([id, name, age])'
    );
  });

  it('renders select as project', () => {
    expect(from(People).select('id', 'name', 'age').render()).toBe('company.people\n->project([id, name, age])');
  });

  it('renders filter predicates in parentheses', () => {
    expect(from(Employees).filter(gt('age', 30)).render()).toBe('company.employees\n->filter((age > 30))');
  });

  it('renders extend with aliases', () => {
    expect(from(Employees).extend(alias(add('salary', 1000), 'bonus')).render()).toBe(
      'company.employees\n->extend([(salary + 1000) as bonus])'
    );
  });

  it('renders nested arithmetic', () => {
    const pipeline = from(Employees).extend(alias(add(mul('salary', 2), div('age', 10)), 'calculation'));
    expect(pipeline.render()).toBe('company.employees\n->extend([((salary * 2) + (age / 10)) as calculation])');
  });

  it('renders conditionals', () => {
    const pipeline = from(Employees).extend(alias(ifThen(gt('age', 30), 'Senior', 'Junior'), 'status'));
    expect(pipeline.render()).toBe("company.employees\n->extend([if((age > 30), 'Senior', 'Junior') as status])");
  });

  it('renders rename pairs', () => {
    const pipeline = from(Employees).rename({ id: 'employee_id', name: 'employee_name' });
    expect(pipeline.render()).toBe('company.employees\n->rename([id as employee_id, name as employee_name])');
  });

  it('renders groupBy keys and selections', () => {
    const pipeline = from(Employees).groupBy(['department_id'], ['department_id', alias(avg('salary'), 'avg_salary')]);
    expect(pipeline.render()).toBe(
      'company.employees\n->groupBy([department_id], [department_id, avg(salary) as avg_salary])'
    );
  });

  it('renders aggregate selections', () => {
    const pipeline = from(Employees).groupBy(['department_id'], [
      alias(count('id'), 'count'),
      alias(avg('salary'), 'avg_salary')
    ]);
    expect(pipeline.render()).toBe(
      'company.employees\n->groupBy([department_id], [count(id) as count, avg(salary) as avg_salary])'
    );
  });

  it('renders the having predicate as a third argument', () => {
    const pipeline = from(Employees).groupBy(
      ['department_id'],
      ['department_id', alias(avg('salary'), 'avg_salary')],
      gt('avg_salary', 50000)
    );
    expect(pipeline.render()).toBe(
      'company.employees\n->groupBy([department_id], [department_id, avg(salary) as avg_salary], (avg_salary > 50000))'
    );
  });

  it('renders sort directions only by default', () => {
    expect(from(Employees).orderBy(desc('salary'), asc('name')).render()).toBe('company.employees\n->sort([desc, asc])');
  });

  it('renders sort terms when configured', () => {
    const terms = new PureRelationDialect({ orderBy: 'term' });
    expect(from(Employees).orderBy(desc('salary'), 'name').render(terms)).toBe(
      'company.employees\n->sort([salary desc, name asc])'
    );
  });

  it('renders limit and offset in append order', () => {
    expect(from(Employees).limit(5).offset(10).render()).toBe('company.employees\n->take(5)\n->drop(10)');
    expect(from(Employees).offset(10).limit(5).render()).toBe('company.employees\n->drop(10)\n->take(5)');
  });

  it('renders a page as drop then take', () => {
    expect(from(Employees).page(20, 10).render()).toBe('company.employees\n->drop(20)\n->take(10)');
  });

  it('uses a configured pagination strategy', () => {
    const slice: PaginationStrategy = {
      compileLimit: count => `limit(${count})`,
      compileOffset: count => `skip(${count})`
    };
    expect(from(Employees).page(20, 10).render(new PureRelationDialect({ paginationStrategy: slice }))).toBe(
      'company.employees\n->skip(20)\n->limit(10)'
    );
  });

  it('renders joins with the backend kind tokens', () => {
    const inner = from(Employees).innerJoin(Departments, eq('department_id', column('dept_id')));
    expect(inner.render()).toBe('company.employees\n->join(company.departments, INNER, (department_id == dept_id))');

    const left = from(Employees).leftJoin(Departments, eq('department_id', column('dept_id')));
    expect(left.render()).toBe(
      'company.employees\n->join(company.departments, LEFT_OUTER, (department_id == dept_id))'
    );
  });

  it('renders a multi-clause pipeline line by line', () => {
    const pipeline = from(Employees)
      .filter(and(gt('age', 30), eq('active', true)))
      .select('id', 'name', 'salary')
      .orderBy(desc('salary'))
      .limit(10);
    expect(pipeline.render()).toBe(
      [
        'company.employees',
        '->filter(((age > 30) && (active == true)))',
        '->project([id, name, salary])',
        '->sort([desc])',
        '->take(10)'
      ].join('\n')
    );
  });

  describe('literals', () => {
    it('renders doubles with a fractional part', () => {
      expect(from(Employees).filter(gt('salary', lit.double(2))).render()).toBe(
        'company.employees\n->filter((salary > 2.0))'
      );
      expect(from(Employees).filter(gt('salary', 2.5)).render()).toBe('company.employees\n->filter((salary > 2.5))');
    });

    it('renders large and small doubles in plain decimal form', () => {
      expect(from(Employees).filter(gt('salary', 1e20)).render()).toBe(
        'company.employees\n->filter((salary > 100000000000000000000.0))'
      );
      expect(formatDouble(1e21)).toBe('1000000000000000000000.0');
      expect(formatDouble(1e-7)).toBe('0.0000001');
      expect(formatDouble(-1.5e-7)).toBe('-0.00000015');
      expect(formatDouble(1.25e22)).toBe('12500000000000000000000.0');
      expect(formatDouble(-3)).toBe('-3.0');
    });

    it('renders longs as bare digits', () => {
      expect(from(Departments).filter(gt('budget', 3000000000)).render()).toBe(
        'company.departments\n->filter((budget > 3000000000))'
      );
    });

    it('escapes quotes and backslashes in strings', () => {
      expect(from(Employees).filter(eq('name', "O'Brien")).render()).toBe(
        "company.employees\n->filter((name == 'O\\'Brien'))"
      );
      expect(from(Employees).filter(eq('name', 'a\\b')).render()).toBe("company.employees\n->filter((name == 'a\\\\b'))");
    });

    it('renders dates between percent signs', () => {
      expect(from(Employees).filter(gt('hired_on', lit.date('2020-01-31'))).render()).toBe(
        'company.employees\n->filter((hired_on > %2020-01-31%))'
      );
    });

    it('renders booleans as words', () => {
      expect(from(Employees).filter(eq('active', false)).render()).toBe('company.employees\n->filter((active == false))');
    });
  });

  describe('operators', () => {
    const renderFilter = (predicate: ExpressionNode): string =>
      from(Employees).filter(predicate).render().split('\n->')[1] ?? '';

    it('maps comparison and logical tokens', () => {
      expect(renderFilter(or(eq('id', 1), binary('!=', 'id', 2)))).toBe('filter(((id == 1) || (id != 2)))');
      expect(renderFilter(like('name', 'A%'))).toBe("filter((name like 'A%'))");
    });

    it('renders membership tests with bracketed lists', () => {
      expect(renderFilter(inList('age', [30, 40]))).toBe('filter((age in [30, 40]))');
      expect(renderFilter(notInList('name', ['a', 'b']))).toBe("filter((name notIn ['a', 'b']))");
    });

    it('renders null checks and negation', () => {
      expect(renderFilter(isNull('name'))).toBe('filter((name is null))');
      expect(renderFilter(not(isNotNull('name')))).toBe('filter(not((name is not null)))');
    });

    it('renders modulo and power in function form', () => {
      const pipeline = from(Employees).extend(
        alias(mod('age', 2), 'parity'),
        alias(pow('salary', 2), 'squared'),
        alias(binary('MOD', 'id', 3), 'bucket'),
        alias(bitOr('age', 1), 'flags')
      );
      expect(pipeline.render()).toBe(
        'company.employees\n->extend([mod(age, 2) as parity, pow(salary, 2) as squared, mod(id, 3) as bucket, (age | 1) as flags])'
      );
    });
  });

  describe('renderSuffix', () => {
    it('appends exactly what the last clause contributes', () => {
      const before = from(Employees).filter(gt('age', 30));
      const after = before.select('id', 'age');
      const last = after.clauses[after.clauses.length - 1];
      expect(after.render()).toBe(before.render() + after.renderSuffix(last));
      expect(after.renderSuffix(last)).toBe('\n->project([id, age])');
    });
  });

  describe('unsupported nodes', () => {
    it('raises BackendUnsupportedError for distinct', () => {
      const pipeline = from(People).distinct('name');
      let caught: unknown;
      try {
        pipeline.render();
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(BackendUnsupportedError);
      if (caught instanceof PipelineError) {
        expect(caught.kind).toBe('BackendUnsupported');
        expect(caught.subject).toBe('Distinct');
        expect(caught.clause).toBe('Distinct');
        expect(caught.message).toBe('Node kind "Distinct" is not supported by the pure-relation backend');
      }
    });

    it('raises BackendUnsupportedError for functions without a renderer', () => {
      const empty: FunctionStrategy = { getRenderer: () => undefined };
      const pipeline = from(Employees).groupBy(['department_id'], [alias(count('id'), 'n')]);
      expect(() => pipeline.render(new PureRelationDialect({ functionStrategy: empty }))).toThrow(
        'Node kind "count" is not supported by the pure-relation backend'
      );
    });
  });

  it('uses overridden function renderers', () => {
    class MeanStrategy extends StandardFunctionStrategy {
      constructor() {
        super();
        this.add('avg', ({ compiledArgs }) => `mean(${compiledArgs[0]})`);
      }
    }
    const pipeline = from(Employees).groupBy(['department_id'], [alias(avg('salary'), 'mean_salary')]);
    expect(pipeline.render(new PureRelationDialect({ functionStrategy: new MeanStrategy() }))).toBe(
      'company.employees\n->groupBy([department_id], [mean(salary) as mean_salary])'
    );
  });
});
