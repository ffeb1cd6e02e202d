import type { TableDef } from '../schema/table.js';
import type { ColumnDef } from '../schema/column-types.js';
import type { SchemaSnapshot } from '../schema/snapshot.js';
import {
  AliasNode,
  ClauseNode,
  ClauseType,
  ColumnInput,
  ExpressionNode,
  FromClause,
  PipelineIR,
  PipelineStage,
  groupSpec
} from '../core/ast/expression.js';
import { JOIN_KINDS, JoinKind } from '../core/algebra/operators.js';
import type { PipelineRenderer } from '../core/dialect/abstract.js';
import { DialectKey, resolveDialectInput } from '../core/dialect/dialect-factory.js';
import { PureRelationDialect } from '../core/dialect/pure-relation/index.js';
import { QueryLogger, createRenderLoggingRenderer } from '../core/logging/query-logger.js';
import { isPipelineError } from '../core/errors.js';
import { PipelineState } from './pipeline-state.js';
import { ClauseResolver, OrderInput, RenameInput, ResolvedClause } from './clause-resolver.js';

export interface PipelineOptions {
  /** Receives append, reject and render events */
  logger?: QueryLogger;
}

type PipelineDialectInput = PipelineRenderer | DialectKey;

/**
 * Immutable, schema-aware pipeline of relational operations.
 *
 * Every clause method validates the request against the current schema snapshot
 * and returns a new pipeline; on failure it throws a PipelineError and the
 * receiver stays usable as it was.
 *
 * @example
 * const text = from(employees)
 *   .filter(gt('age', 30))
 *   .select('id', 'name')
 *   .render();
 */
export class Pipeline implements PipelineIR {
  private state: PipelineState;
  private readonly table: TableDef;
  private readonly options: PipelineOptions;

  /**
   * Creates a new Pipeline instance
   * @param table - The base table
   * @param options - Logger and other pipeline-wide settings
   */
  constructor(table: TableDef, options: PipelineOptions = {}) {
    this.table = table;
    this.state = PipelineState.fromTable(table);
    this.options = options;
  }

  private clone(state: PipelineState): Pipeline {
    const next = new Pipeline(this.table, this.options);
    next.state = state;
    return next;
  }

  private append(kind: ClauseType, resolve: (resolver: ClauseResolver) => ResolvedClause): Pipeline {
    const { logger } = this.options;
    let resolved: ResolvedClause;
    try {
      resolved = resolve(new ClauseResolver(this.state.schema));
    } catch (error) {
      if (!isPipelineError(error)) {
        throw error;
      }
      const attributed = error.inClause(kind);
      logger?.({ event: 'reject', clause: kind, error: attributed });
      throw attributed;
    }
    logger?.({ event: 'append', clause: kind, columns: resolved.schema.names() });
    return this.clone(this.state.withClause(resolved.clause, resolved.schema));
  }

  get from(): FromClause {
    return this.state.from;
  }

  /**
   * Validated stages after the source, in append order
   */
  get clauses(): ReadonlyArray<PipelineStage> {
    return this.state.clauses;
  }

  /**
   * The full clause list, with the source From as element zero
   */
  allClauses(): ClauseNode[] {
    return [this.state.from, ...this.state.clauses];
  }

  /**
   * Schema history: the source schema, then one snapshot per stage
   */
  get snapshots(): ReadonlyArray<SchemaSnapshot> {
    return this.state.snapshots;
  }

  /**
   * Schema after the last stage
   */
  get schema(): SchemaSnapshot {
    return this.state.schema;
  }

  /**
   * Keeps the given columns, in the given order
   * @example pipeline.select('id', employees.columns.name)
   */
  select(...columns: ColumnInput[]): Pipeline {
    return this.append('Select', resolver => resolver.select(columns));
  }

  /**
   * Appends computed columns
   * @example pipeline.extend(alias(add('salary', 1000), 'bonus'))
   */
  extend(...expressions: AliasNode[]): Pipeline {
    return this.append('Extend', resolver => resolver.extend(expressions));
  }

  /**
   * Renames columns in place
   * @example pipeline.rename({ id: 'employee_id' })
   */
  rename(renames: RenameInput): Pipeline {
    return this.append('Rename', resolver => resolver.rename(renames));
  }

  /**
   * Keeps the rows matching a boolean predicate
   */
  filter(predicate: ExpressionNode): Pipeline {
    return this.append('Filter', resolver => resolver.filter(predicate));
  }

  /**
   * Groups rows by key columns
   * @param keys - Grouping key columns
   * @param selections - Keys and aggregates making up the new schema
   * @param having - Optional predicate over the grouped schema
   * @example pipeline.groupBy(['department_id'], ['department_id', alias(avg('salary'), 'avg_salary')])
   */
  groupBy(
    keys: ReadonlyArray<ColumnDef | string>,
    selections: ReadonlyArray<ColumnInput>,
    having?: ExpressionNode
  ): Pipeline {
    return this.append('GroupBy', resolver => resolver.groupBy(groupSpec(selections, keys, having)));
  }

  /**
   * Sorts rows; plain columns sort ascending
   * @example pipeline.orderBy(desc('salary'), 'name')
   */
  orderBy(...specs: OrderInput[]): Pipeline {
    return this.append('OrderBy', resolver => resolver.orderBy(specs));
  }

  limit(count: number): Pipeline {
    return this.append('Limit', resolver => resolver.limit(count));
  }

  offset(count: number): Pipeline {
    return this.append('Offset', resolver => resolver.offset(count));
  }

  /**
   * Skips `offset` rows, then keeps `limit` rows
   * @example pipeline.page(20, 10) // drop(20), take(10)
   */
  page(offset: number, limit: number): Pipeline {
    return this.offset(offset).limit(limit);
  }

  /**
   * Keeps distinct rows, over the given columns or over all of them
   */
  distinct(...columns: ColumnInput[]): Pipeline {
    return this.append('Distinct', resolver => resolver.distinct(columns));
  }

  /**
   * Joins another table; the two sides must not share column names
   */
  join(other: TableDef, kind: JoinKind, condition: ExpressionNode): Pipeline {
    return this.append('Join', resolver => resolver.join(other, kind, condition));
  }

  innerJoin(other: TableDef, condition: ExpressionNode): Pipeline {
    return this.join(other, JOIN_KINDS.INNER, condition);
  }

  leftJoin(other: TableDef, condition: ExpressionNode): Pipeline {
    return this.join(other, JOIN_KINDS.LEFT, condition);
  }

  /**
   * Renders the pipeline with a backend
   * @param dialect - Renderer instance, or a key registered with DialectFactory
   */
  render(dialect: PipelineDialectInput = new PureRelationDialect()): string {
    const renderer = createRenderLoggingRenderer(resolveDialectInput(dialect), this.options.logger);
    return renderer.render({ from: this.state.from, clauses: this.state.clauses });
  }

  /**
   * Text one stage contributes to the rendered output
   */
  renderSuffix(clause: PipelineStage, dialect: PipelineDialectInput = new PureRelationDialect()): string {
    return resolveDialectInput(dialect).renderSuffix(clause);
  }
}

/**
 * Starts a pipeline from a table
 * @param table - Source table
 * @param options - Pipeline options
 */
export const from = (table: TableDef, options?: PipelineOptions): Pipeline => new Pipeline(table, options);
