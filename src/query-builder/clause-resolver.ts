import type { TableDef } from '../schema/table.js';
import { SchemaSnapshot, SnapshotColumn } from '../schema/snapshot.js';
import {
  AliasNode,
  ColumnRefNode,
  ExpressionNode,
  GroupSpecNode,
  OrderSpecNode,
  column,
  toColumnOperand,
  ColumnInput,
  childExpressions
} from '../core/ast/expression.js';
import type {
  DistinctClause,
  ExtendClause,
  FilterClause,
  GroupByClause,
  JoinClause,
  LimitClause,
  OffsetClause,
  OrderByClause,
  PipelineStage,
  RenameClause,
  SelectClause
} from '../core/ast/clause-nodes.js';
import { JOIN_KINDS, JoinKind, ORDER_DIRECTIONS } from '../core/algebra/operators.js';
import { isAggregateFunction } from '../core/functions/catalog.js';
import { TypeChecker } from '../core/typing/type-checker.js';
import { assertIdentifier } from '../schema/identifier.js';
import {
  ConfigError,
  DuplicateAliasError,
  InvalidAggregateReferenceError,
  PipelineError,
  TypeMismatchError,
  UnknownColumnError
} from '../core/errors.js';

/**
 * A validated clause together with the schema it produces
 */
export interface ResolvedClause<C extends PipelineStage = PipelineStage> {
  clause: C;
  schema: SchemaSnapshot;
}

/**
 * Source → target column name pairs
 */
export type RenameInput = ReadonlyArray<readonly [string, string]> | Readonly<Record<string, string>>;

export type OrderInput = OrderSpecNode | ColumnInput;

const toColumnRef = (input: ColumnInput, clause: string): ColumnRefNode => {
  const node = toColumnOperand(input);
  if (node.type !== 'ColumnRef') {
    throw new TypeMismatchError(node.type, `${clause} takes column references only`);
  }
  return node;
};

const isRenameList = (input: RenameInput): input is ReadonlyArray<readonly [string, string]> => Array.isArray(input);

const requireNonEmpty = (items: ReadonlyArray<unknown>, what: string): void => {
  if (items.length === 0) {
    throw new ConfigError('[]', `${what} needs at least one entry`);
  }
};

const requireCount = (value: number, what: string): void => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigError(String(value), `${what} must be a non-negative integer`);
  }
};

/**
 * Walks a grouped expression and checks the columns it uses.
 * Unless `withinAggregates` is set, aggregate arguments are left to the type checker.
 */
const checkGroupedReferences = (
  node: ExpressionNode,
  isAllowed: (name: string) => boolean,
  reject: (name: string) => PipelineError,
  withinAggregates = false
): void => {
  if (!withinAggregates && node.type === 'FunctionCall' && isAggregateFunction(node.fn)) return;
  if (node.type === 'ColumnRef') {
    if (isAllowed(node.name)) return;
    throw reject(node.name);
  }
  for (const child of childExpressions(node)) {
    checkGroupedReferences(child, isAllowed, reject, withinAggregates);
  }
};

/**
 * Resolves clause requests against one schema snapshot.
 * Each method validates the request and returns the clause IR plus the next snapshot;
 * nothing is returned for an invalid request.
 */
export class ClauseResolver {
  private readonly checker: TypeChecker;

  /**
   * @param schema - Snapshot the clause is applied to
   */
  constructor(private readonly schema: SchemaSnapshot) {
    this.checker = new TypeChecker(schema);
  }

  /**
   * Keeps the given columns in the given order, with their original types
   */
  select(columns: ReadonlyArray<ColumnInput>): ResolvedClause<SelectClause> {
    requireNonEmpty(columns, 'select');
    const refs = columns.map(c => toColumnRef(c, 'select'));
    return {
      clause: { type: 'Select', columns: refs },
      schema: this.schema.project(refs.map(r => r.name))
    };
  }

  /**
   * Appends one column per aliased expression, typed by the operator rules
   */
  extend(expressions: ReadonlyArray<AliasNode>): ResolvedClause<ExtendClause> {
    requireNonEmpty(expressions, 'extend');
    const added: SnapshotColumn[] = [];
    const names = new Set<string>();
    for (const expression of expressions) {
      if (expression.type !== 'Alias') {
        throw new TypeMismatchError(String(expression.type), 'extend expressions must be aliased');
      }
      assertIdentifier(expression.name, 'Alias');
      if (this.schema.has(expression.name) || names.has(expression.name)) {
        throw new DuplicateAliasError(expression.name);
      }
      names.add(expression.name);
      added.push({ name: expression.name, type: this.checker.typeOf(expression.expression) });
    }
    return {
      clause: { type: 'Extend', expressions: [...expressions] },
      schema: this.schema.append(added)
    };
  }

  /**
   * Renames columns in place, keeping their position
   */
  rename(input: RenameInput): ResolvedClause<RenameClause> {
    const pairs = isRenameList(input) ? input : Object.entries(input);
    requireNonEmpty(pairs, 'rename');

    const renames = new Map<string, string>();
    const targets = new Set<string>();
    for (const [from, to] of pairs) {
      this.schema.get(from);
      assertIdentifier(to, 'Rename target');
      if (renames.has(from)) {
        throw new DuplicateAliasError(from);
      }
      if (targets.has(to)) {
        throw new DuplicateAliasError(to);
      }
      renames.set(from, to);
      targets.add(to);
    }
    for (const to of targets) {
      if (this.schema.has(to) && !renames.has(to)) {
        throw new DuplicateAliasError(to);
      }
    }

    return {
      clause: {
        type: 'Rename',
        renames: [...renames].map(([from, to]) => ({ type: 'Alias', name: to, expression: column(from) }))
      },
      schema: this.schema.rename(renames)
    };
  }

  filter(predicate: ExpressionNode): ResolvedClause<FilterClause> {
    const type = this.checker.typeOf(predicate);
    if (type !== 'boolean') {
      throw new TypeMismatchError('filter', `predicate must be boolean, got ${type}`);
    }
    return { clause: { type: 'Filter', predicate }, schema: this.schema };
  }

  /**
   * Groups by key columns. Selections are keys or aggregates over source columns;
   * the result schema is the selections, named by alias, by column or by position.
   */
  groupBy(spec: GroupSpecNode): ResolvedClause<GroupByClause> {
    requireNonEmpty(spec.keys, 'groupBy keys');
    requireNonEmpty(spec.selections, 'groupBy selections');

    const keys = new Set<string>();
    for (const key of spec.keys) {
      this.schema.get(key.name);
      keys.add(key.name);
    }

    const aggregating = new TypeChecker(this.schema, { allowAggregates: true });
    const columns = spec.selections.map((selection, index): SnapshotColumn => {
      checkGroupedReferences(selection, name => keys.has(name), name =>
        this.schema.has(name) ? new InvalidAggregateReferenceError(name) : new UnknownColumnError(name)
      );
      const type = aggregating.typeOf(selection);
      const name =
        selection.type === 'Alias' ? assertIdentifier(selection.name, 'Alias') :
          selection.type === 'ColumnRef' ? selection.name :
            `column${index + 1}`;
      return { name, type };
    });
    const grouped = new SchemaSnapshot(columns);

    if (spec.having) {
      checkGroupedReferences(
        spec.having,
        name => grouped.has(name),
        name => {
          if (keys.has(name)) {
            return new InvalidAggregateReferenceError(name, undefined, 'is a grouping key missing from the selections');
          }
          return this.schema.has(name)
            ? new InvalidAggregateReferenceError(name, undefined, 'is not part of the grouped schema')
            : new UnknownColumnError(name);
        },
        true
      );
      const havingType = new TypeChecker(grouped, { allowAggregates: true }).typeOf(spec.having);
      if (havingType !== 'boolean') {
        throw new TypeMismatchError('having', `predicate must be boolean, got ${havingType}`);
      }
    }

    return { clause: { type: 'GroupBy', spec }, schema: grouped };
  }

  orderBy(specs: ReadonlyArray<OrderInput>): ResolvedClause<OrderByClause> {
    requireNonEmpty(specs, 'orderBy');
    const ordering = specs.map((spec): OrderSpecNode => {
      const node: OrderSpecNode =
        typeof spec === 'object' && 'type' in spec && spec.type === 'OrderSpec'
          ? spec
          : { type: 'OrderSpec', direction: ORDER_DIRECTIONS.ASC, expression: toColumnOperand(spec) };
      this.checker.typeOf(node.expression);
      return node;
    });
    return { clause: { type: 'OrderBy', ordering }, schema: this.schema };
  }

  limit(value: number): ResolvedClause<LimitClause> {
    requireCount(value, 'limit');
    return { clause: { type: 'Limit', value }, schema: this.schema };
  }

  offset(value: number): ResolvedClause<OffsetClause> {
    requireCount(value, 'offset');
    return { clause: { type: 'Offset', value }, schema: this.schema };
  }

  /**
   * Keeps distinct rows over the given columns (all columns when none are given)
   */
  distinct(columns: ReadonlyArray<ColumnInput> = []): ResolvedClause<DistinctClause> {
    const refs = columns.map(c => toColumnRef(c, 'distinct'));
    return {
      clause: { type: 'Distinct', columns: refs },
      schema: refs.length ? this.schema.project(refs.map(r => r.name)) : this.schema
    };
  }

  /**
   * Joins another table. Column names must not collide; the condition is
   * checked against both sides only after the collision check passed.
   */
  join(other: TableDef, kind: JoinKind, condition: ExpressionNode): ResolvedClause<JoinClause> {
    if (kind !== JOIN_KINDS.INNER && kind !== JOIN_KINDS.LEFT) {
      throw new ConfigError(String(kind), 'join kind must be inner or left');
    }
    const otherSchema = SchemaSnapshot.fromTable(other);
    const collision = otherSchema.columns.find(c => this.schema.has(c.name));
    if (collision) {
      throw new DuplicateAliasError(collision.name);
    }
    const combined = this.schema.append(otherSchema.columns);
    const type = new TypeChecker(combined).typeOf(condition);
    if (type !== 'boolean') {
      throw new TypeMismatchError('join', `condition must be boolean, got ${type}`);
    }
    return {
      clause: {
        type: 'Join',
        from: { type: 'From', database: other.database, table: other.name },
        kind,
        spec: { type: 'JoinSpec', condition }
      },
      schema: combined
    };
  }
}
