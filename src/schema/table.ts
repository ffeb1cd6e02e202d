import { ColumnDef, SemanticType, isSemanticType, col } from './column-types.js';
import { assertIdentifier } from './identifier.js';
import { ConfigError } from '../core/errors.js';

/**
 * Definition of a table with its columns
 * @typeParam T - Type of the columns record
 */
export interface TableDef<T extends Record<string, ColumnDef> = Record<string, ColumnDef>> {
  /** Name of the database the table lives in */
  readonly database: string;
  /** Name of the table */
  readonly name: string;
  /** Record of column definitions keyed by column name */
  readonly columns: T;
  /** Column definitions in declaration order */
  readonly columnList: ReadonlyArray<ColumnDef>;
}

/**
 * Validates names and types, stamps name and table onto each column
 */
const stampColumns = (
  database: string,
  table: string,
  entries: ReadonlyArray<readonly [string, ColumnDef]>
): ColumnDef[] => {
  const seen = new Set<string>();
  return entries.map(([key, def]) => {
    assertIdentifier(key, 'Column');
    if (seen.has(key)) {
      throw new ConfigError(key, `column is declared twice in ${database}.${table}`);
    }
    seen.add(key);
    if (!isSemanticType(def.type)) {
      throw new ConfigError(String(def.type), `column "${key}" has an unknown semantic type`);
    }
    return Object.freeze({ name: key, type: def.type, table });
  });
};

/**
 * Creates a table definition
 * @typeParam T - Type of the columns record
 * @param database - Database name
 * @param name - Table name
 * @param columns - Record of column definitions
 * @returns Table definition with runtime-filled column metadata
 *
 * Integer-like keys of an object literal enumerate first; use registerTable with
 * an entry list when such names must keep their position.
 *
 * @example
 * ```typescript
 * const employees = defineTable('company', 'employees', {
 *   id: col.int(),
 *   name: col.string(),
 *   age: col.int()
 * });
 * ```
 */
export const defineTable = <T extends Record<string, ColumnDef>>(
  database: string,
  name: string,
  columns: T
): TableDef<T> => {
  assertIdentifier(database, 'Database');
  assertIdentifier(name, 'Table');

  const columnList = stampColumns(database, name, Object.entries(columns));

  // Runtime mutability to assign names to column definitions for convenience
  const colsWithNames = columnList.reduce((acc, colDef) => {
    (acc as Record<string, ColumnDef>)[colDef.name] = colDef;
    return acc;
  }, {} as T);

  return Object.freeze({
    database,
    name,
    columns: Object.freeze(colsWithNames),
    columnList: Object.freeze(columnList)
  });
};

/**
 * Table registration as supplied by an external collaborator (catalog, config file, code)
 */
export interface TableRegistration {
  database: string;
  table: string;
  /** Ordered column name → type entries, or a record whose key order is the column order */
  columns: ReadonlyArray<readonly [string, string]> | Readonly<Record<string, string>>;
}

const isEntryList = (
  columns: TableRegistration['columns']
): columns is ReadonlyArray<readonly [string, string]> => Array.isArray(columns);

/**
 * Validates an external registration and turns it into a table definition.
 * Type names are matched case-insensitively against the semantic types.
 */
export const registerTable = (registration: TableRegistration): TableDef => {
  const database = assertIdentifier(registration.database, 'Database');
  const table = assertIdentifier(registration.table, 'Table');
  const entries = isEntryList(registration.columns)
    ? registration.columns
    : Object.entries(registration.columns);

  const columnList = stampColumns(
    database,
    table,
    entries.map(([name, rawType]): [string, ColumnDef] => {
      const type = String(rawType).toLowerCase();
      if (!isSemanticType(type)) {
        throw new ConfigError(String(rawType), `column "${name}" has an unknown semantic type`);
      }
      return [name, col.of(type)];
    })
  );

  // fromEntries defines own properties, so names such as "__proto__" stay columns
  return Object.freeze({
    database,
    name: table,
    columns: Object.freeze(Object.fromEntries(columnList.map(c => [c.name, c]))),
    columnList: Object.freeze(columnList)
  });
};

/**
 * Ordered `[name, type]` pairs of a table
 */
export const tableColumns = (table: TableDef): ReadonlyArray<{ name: string; type: SemanticType }> =>
  table.columnList.map(c => ({ name: c.name, type: c.type }));

/**
 * A named group of tables
 */
export interface DatabaseDef {
  readonly name: string;
  readonly tables: ReadonlyArray<TableDef>;
  /**
   * Looks a table up by name
   * @throws ConfigError when the table is not part of the database
   */
  table(name: string): TableDef;
}

/**
 * Creates a database definition from a record of table column records
 *
 * @example
 * ```typescript
 * const company = defineDatabase('company', {
 *   employees: { id: col.int(), department_id: col.int() },
 *   departments: { id: col.int(), title: col.string() }
 * });
 * company.table('employees');
 * ```
 */
export const defineDatabase = (
  name: string,
  tables: Record<string, Record<string, ColumnDef>>
): DatabaseDef => {
  const defs = Object.entries(tables).map(([tableName, columns]) => defineTable(name, tableName, columns));
  const byName = new Map(defs.map(def => [def.name, def]));
  return Object.freeze({
    name,
    tables: Object.freeze(defs),
    table(tableName: string): TableDef {
      const found = byName.get(tableName);
      if (!found) {
        throw new ConfigError(tableName, `table is not defined in database "${name}"`);
      }
      return found;
    }
  });
};
