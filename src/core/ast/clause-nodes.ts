import type {
  AliasNode,
  ColumnRefNode,
  ExpressionNode,
  GroupSpecNode,
  JoinSpecNode,
  OrderSpecNode
} from './expression-nodes.js';
import type { JoinKind } from '../algebra/operators.js';

/**
 * Source table of a pipeline or of the other side of a join
 */
export interface FromClause {
  readonly type: 'From';
  readonly database: string;
  readonly table: string;
}

/**
 * Keeps the listed columns, in order
 */
export interface SelectClause {
  readonly type: 'Select';
  readonly columns: ReadonlyArray<ColumnRefNode>;
}

/**
 * Appends computed columns
 */
export interface ExtendClause {
  readonly type: 'Extend';
  readonly expressions: ReadonlyArray<AliasNode>;
}

/**
 * Renames columns in place; each alias wraps a reference to the source column
 */
export interface RenameClause {
  readonly type: 'Rename';
  readonly renames: ReadonlyArray<AliasNode & { readonly expression: ColumnRefNode }>;
}

export interface FilterClause {
  readonly type: 'Filter';
  readonly predicate: ExpressionNode;
}

export interface GroupByClause {
  readonly type: 'GroupBy';
  readonly spec: GroupSpecNode;
}

export interface OrderByClause {
  readonly type: 'OrderBy';
  readonly ordering: ReadonlyArray<OrderSpecNode>;
}

export interface LimitClause {
  readonly type: 'Limit';
  readonly value: number;
}

export interface OffsetClause {
  readonly type: 'Offset';
  readonly value: number;
}

export interface DistinctClause {
  readonly type: 'Distinct';
  readonly columns: ReadonlyArray<ColumnRefNode>;
}

export interface JoinClause {
  readonly type: 'Join';
  /** The other side of the join */
  readonly from: FromClause;
  readonly kind: JoinKind;
  readonly spec: JoinSpecNode;
}

/**
 * Closed union of every pipeline stage
 */
export type ClauseNode =
  | FromClause
  | SelectClause
  | ExtendClause
  | RenameClause
  | FilterClause
  | GroupByClause
  | OrderByClause
  | LimitClause
  | OffsetClause
  | DistinctClause
  | JoinClause;

export type ClauseType = ClauseNode['type'];

/**
 * Every clause that may follow the initial From
 */
export type PipelineStage = Exclude<ClauseNode, FromClause>;

/**
 * What a renderer reads from a pipeline: the source and the validated stages
 */
export interface PipelineIR {
  readonly from: FromClause;
  readonly clauses: ReadonlyArray<PipelineStage>;
}
