import type { SemanticType } from './column-types.js';
import type { TableDef } from './table.js';
import { tableColumns } from './table.js';
import { DuplicateAliasError, UnknownColumnError } from '../core/errors.js';

/**
 * A column as seen by a schema snapshot
 */
export interface SnapshotColumn {
  readonly name: string;
  readonly type: SemanticType;
}

/**
 * Immutable, ordered column set valid at one point of a pipeline.
 * Derivations return new snapshots and never touch the receiver.
 */
export class SchemaSnapshot {
  readonly columns: ReadonlyArray<SnapshotColumn>;
  private readonly index: ReadonlyMap<string, SnapshotColumn>;

  constructor(columns: ReadonlyArray<SnapshotColumn>) {
    const index = new Map<string, SnapshotColumn>();
    for (const column of columns) {
      if (index.has(column.name)) {
        throw new DuplicateAliasError(column.name);
      }
      index.set(column.name, Object.freeze({ name: column.name, type: column.type }));
    }
    this.index = index;
    this.columns = Object.freeze([...index.values()]);
  }

  static fromTable(table: TableDef): SchemaSnapshot {
    return new SchemaSnapshot(tableColumns(table));
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  /**
   * Looks a column up by name
   * @throws UnknownColumnError when the column is absent
   */
  get(name: string): SnapshotColumn {
    const column = this.index.get(name);
    if (!column) {
      throw new UnknownColumnError(name);
    }
    return column;
  }

  names(): string[] {
    return this.columns.map(c => c.name);
  }

  /**
   * Keeps the given columns, in the given order
   */
  project(names: ReadonlyArray<string>): SchemaSnapshot {
    return new SchemaSnapshot(names.map(name => this.get(name)));
  }

  /**
   * Appends columns after the existing ones
   * @throws DuplicateAliasError when an appended name already exists
   */
  append(columns: ReadonlyArray<SnapshotColumn>): SchemaSnapshot {
    return new SchemaSnapshot([...this.columns, ...columns]);
  }

  /**
   * Renames columns in place, preserving order
   */
  rename(renames: ReadonlyMap<string, string>): SchemaSnapshot {
    return new SchemaSnapshot(
      this.columns.map(c => ({ name: renames.get(c.name) ?? c.name, type: c.type }))
    );
  }

  equals(other: SchemaSnapshot): boolean {
    return (
      this.columns.length === other.columns.length &&
      this.columns.every((c, i) => c.name === other.columns[i]?.name && c.type === other.columns[i]?.type)
    );
  }
}
