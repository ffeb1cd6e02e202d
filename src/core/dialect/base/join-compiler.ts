import type { JoinClause, FromClause } from '../../ast/clause-nodes.js';
import type { ExpressionNode } from '../../ast/expression-nodes.js';
import type { JoinKind } from '../../algebra/operators.js';

/**
 * Compiler for join clauses.
 */
export class JoinCompiler {
  static compileJoin(
    join: JoinClause,
    compileFrom: (from: FromClause) => string,
    compileExpression: (expr: ExpressionNode) => string,
    renderKind: (kind: JoinKind) => string
  ): string {
    const table = compileFrom(join.from);
    const cond = compileExpression(join.spec.condition);
    return `${table}, ${renderKind(join.kind)}, ${cond}`;
  }
}
