import type { TableDef } from '../schema/table.js';
import { SchemaSnapshot } from '../schema/snapshot.js';
import type { FromClause, PipelineStage } from '../core/ast/clause-nodes.js';

/**
 * Immutable state of a pipeline: its source, the clauses appended so far and
 * the schema snapshot after each clause (snapshots[0] is the source schema).
 * States are only created from a table and grown one resolved clause at a time.
 */
export class PipelineState {
  public readonly from: FromClause;
  public readonly clauses: ReadonlyArray<PipelineStage>;
  public readonly snapshots: ReadonlyArray<SchemaSnapshot>;
  /** Schema after the last clause */
  public readonly schema: SchemaSnapshot;

  private constructor(
    from: FromClause,
    clauses: ReadonlyArray<PipelineStage>,
    snapshots: ReadonlyArray<SchemaSnapshot>,
    schema: SchemaSnapshot
  ) {
    this.from = from;
    this.clauses = Object.freeze([...clauses]);
    this.snapshots = Object.freeze([...snapshots]);
    this.schema = schema;
  }

  static fromTable(table: TableDef): PipelineState {
    const schema = SchemaSnapshot.fromTable(table);
    return new PipelineState(
      Object.freeze({ type: 'From', database: table.database, table: table.name }),
      [],
      [schema],
      schema
    );
  }

  /**
   * Returns a new state with the clause and the schema it produced appended
   */
  withClause(clause: PipelineStage, schema: SchemaSnapshot): PipelineState {
    return new PipelineState(this.from, [...this.clauses, clause], [...this.snapshots, schema], schema);
  }
}
