import { describe, it, expect } from 'vitest';
import { defineTable, registerTable, defineDatabase, tableColumns } from '../src/schema/table.js';
import { col } from '../src/schema/column-types.js';
import { SchemaSnapshot } from '../src/schema/snapshot.js';
import { ConfigError, DuplicateAliasError, UnknownColumnError } from '../src/core/errors.js';
import { from } from '../src/query-builder/pipeline.js';
import { Employees } from './fixtures/schema.js';

describe('table definitions', () => {
  it('fills column names and table on defineTable', () => {
    expect(Employees.database).toBe('company');
    expect(Employees.name).toBe('employees');
    expect(Employees.columns.salary).toEqual({ name: 'salary', type: 'double', table: 'employees' });
  });

  it('keeps declaration order', () => {
    expect(tableColumns(Employees).map(c => c.name)).toEqual([
      'id',
      'name',
      'age',
      'salary',
      'department_id',
      'active',
      'hired_on'
    ]);
  });

  it('freezes the definition', () => {
    expect(Object.isFrozen(Employees)).toBe(true);
    expect(Object.isFrozen(Employees.columns)).toBe(true);
  });

  it('rejects empty names', () => {
    expect(() => defineTable('', 'users', { id: col.int() })).toThrow(ConfigError);
    expect(() => defineTable('db', ' ', { id: col.int() })).toThrow(ConfigError);
  });

  it('rejects names that are not identifiers', () => {
    expect(() => defineTable('db', 'users', { 'first name': col.string() })).toThrow(
      'Invalid value "first name": Column name must consist of letters, digits and underscores'
    );
    expect(() => defineTable('my-db', 'users', { id: col.int() })).toThrow(ConfigError);
  });
});

describe('registerTable', () => {
  it('accepts ordered entries with case-insensitive type names', () => {
    const table = registerTable({
      database: 'hr',
      table: 'staff',
      columns: [
        ['id', 'INTEGER'],
        ['email', 'string'],
        ['joined', 'Date']
      ]
    });

    expect(tableColumns(table)).toEqual([
      { name: 'id', type: 'integer' },
      { name: 'email', type: 'string' },
      { name: 'joined', type: 'date' }
    ]);
  });

  it('keeps entry order for numeric and reserved-looking names', () => {
    const table = registerTable({
      database: 'hr',
      table: 'staff',
      columns: [
        ['b', 'integer'],
        ['2', 'string'],
        ['__proto__', 'integer']
      ]
    });

    expect(tableColumns(table).map(c => c.name)).toEqual(['b', '2', '__proto__']);
    expect(Object.hasOwn(table.columns, '__proto__')).toBe(true);
    expect(from(table).schema.names()).toEqual(['b', '2', '__proto__']);
    expect(from(table).select('__proto__', '2').render()).toBe('hr.staff\n->project([__proto__, 2])');
  });

  it('rejects registrations with invalid names', () => {
    expect(() => registerTable({ database: 'hr', table: 'staff list', columns: [['id', 'integer']] })).toThrow(
      ConfigError
    );
  });

  it('accepts a record of type names', () => {
    const table = registerTable({ database: 'hr', table: 'staff', columns: { id: 'long', ok: 'boolean' } });
    expect(tableColumns(table)).toEqual([
      { name: 'id', type: 'long' },
      { name: 'ok', type: 'boolean' }
    ]);
  });

  it('rejects unknown type names', () => {
    expect(() => registerTable({ database: 'hr', table: 'staff', columns: [['id', 'uuid']] })).toThrow(
      'Invalid value "uuid": column "id" has an unknown semantic type'
    );
  });

  it('rejects duplicate columns', () => {
    const register = () =>
      registerTable({
        database: 'hr',
        table: 'staff',
        columns: [
          ['id', 'integer'],
          ['id', 'long']
        ]
      });
    expect(register).toThrow(ConfigError);
  });
});

describe('defineDatabase', () => {
  const company = defineDatabase('company', {
    employees: { id: col.int(), department_id: col.int() },
    departments: { dept_id: col.int(), title: col.string() }
  });

  it('looks tables up by name', () => {
    const departments = company.table('departments');
    expect(departments.database).toBe('company');
    expect(departments.columns.title).toEqual({ name: 'title', type: 'string', table: 'departments' });
    expect(company.tables.map(t => t.name)).toEqual(['employees', 'departments']);
  });

  it('throws ConfigError for unknown tables', () => {
    expect(() => company.table('projects')).toThrow(ConfigError);
  });
});

describe('SchemaSnapshot', () => {
  const snapshot = SchemaSnapshot.fromTable(Employees);

  it('looks columns up', () => {
    expect(snapshot.has('age')).toBe(true);
    expect(snapshot.has('bonus')).toBe(false);
    expect(snapshot.get('age')).toEqual({ name: 'age', type: 'integer' });
    expect(() => snapshot.get('bonus')).toThrow(UnknownColumnError);
  });

  it('projects in the requested order', () => {
    const projected = snapshot.project(['salary', 'id']);
    expect(projected.columns).toEqual([
      { name: 'salary', type: 'double' },
      { name: 'id', type: 'integer' }
    ]);
    expect(snapshot.names()).toHaveLength(7);
  });

  it('renames in place', () => {
    const renamed = snapshot.project(['id', 'name']).rename(new Map([['id', 'employee_id']]));
    expect(renamed.names()).toEqual(['employee_id', 'name']);
  });

  it('rejects duplicate names on append', () => {
    expect(() => snapshot.append([{ name: 'age', type: 'long' }])).toThrow(DuplicateAliasError);
  });

  it('compares by names and types', () => {
    expect(snapshot.project(snapshot.names()).equals(snapshot)).toBe(true);
    expect(snapshot.project(['id']).equals(snapshot)).toBe(false);
  });
});
