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
} from './clause-nodes.js';

/**
 * Visitor for pipeline stages, with the same fallback rules as ExpressionVisitor
 */
export interface ClauseVisitor<R> {
  visitSelect?(clause: SelectClause): R;
  visitExtend?(clause: ExtendClause): R;
  visitRename?(clause: RenameClause): R;
  visitFilter?(clause: FilterClause): R;
  visitGroupBy?(clause: GroupByClause): R;
  visitOrderBy?(clause: OrderByClause): R;
  visitLimit?(clause: LimitClause): R;
  visitOffset?(clause: OffsetClause): R;
  visitDistinct?(clause: DistinctClause): R;
  visitJoin?(clause: JoinClause): R;
  otherwise?(clause: PipelineStage): R;
}

const assertNever = (clause: never): never => {
  throw new Error(`Unexpected clause ${JSON.stringify(clause)}`);
};

const unsupportedClause = (clause: PipelineStage): never => {
  throw new Error(`Unsupported clause type "${clause.type}"`);
};

export const visitClause = <R>(
  clause: PipelineStage,
  visitor: ClauseVisitor<R>,
  unsupported: (clause: PipelineStage) => never = unsupportedClause
): R => {
  switch (clause.type) {
    case 'Select':
      if (visitor.visitSelect) return visitor.visitSelect(clause);
      break;
    case 'Extend':
      if (visitor.visitExtend) return visitor.visitExtend(clause);
      break;
    case 'Rename':
      if (visitor.visitRename) return visitor.visitRename(clause);
      break;
    case 'Filter':
      if (visitor.visitFilter) return visitor.visitFilter(clause);
      break;
    case 'GroupBy':
      if (visitor.visitGroupBy) return visitor.visitGroupBy(clause);
      break;
    case 'OrderBy':
      if (visitor.visitOrderBy) return visitor.visitOrderBy(clause);
      break;
    case 'Limit':
      if (visitor.visitLimit) return visitor.visitLimit(clause);
      break;
    case 'Offset':
      if (visitor.visitOffset) return visitor.visitOffset(clause);
      break;
    case 'Distinct':
      if (visitor.visitDistinct) return visitor.visitDistinct(clause);
      break;
    case 'Join':
      if (visitor.visitJoin) return visitor.visitJoin(clause);
      break;
    default:
      return assertNever(clause);
  }
  if (visitor.otherwise) return visitor.otherwise(clause);
  return unsupported(clause);
};
