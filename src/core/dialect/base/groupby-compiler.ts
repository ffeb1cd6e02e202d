import type { ExpressionNode, GroupSpecNode } from '../../ast/expression-nodes.js';

type TermRenderer = (term: ExpressionNode) => string;

/**
 * Compiler for grouping clauses.
 */
export class GroupByCompiler {
  /**
   * Compiles the arguments of a grouping clause.
   * @param spec - Keys, selections and optional having predicate.
   * @param renderTerm - Function to render a key, selection or predicate.
   * @returns Argument list (e.g., "[dept], [dept, avg(salary) as avg_salary]").
   */
  static compileGroupBy(spec: GroupSpecNode, renderTerm: TermRenderer): string {
    const keys = spec.keys.map(renderTerm).join(', ');
    const selections = spec.selections.map(renderTerm).join(', ');
    const having = spec.having ? `, ${renderTerm(spec.having)}` : '';
    return `[${keys}], [${selections}]${having}`;
  }
}
