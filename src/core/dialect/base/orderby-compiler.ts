import type { OrderSpecNode } from '../../ast/expression-nodes.js';

type TermRenderer = (term: OrderSpecNode['expression']) => string;

/**
 * How an ordering entry is written: only its direction, or its term followed by the direction
 */
export type OrderByStyle = 'direction' | 'term';

/**
 * Compiler for sort clauses.
 * Handles compilation of ordering entries with direction (asc/desc).
 */
export class OrderByCompiler {
  /**
   * Compiles the ordering list of a sort clause.
   * @param ordering - Ordering entries in priority order.
   * @param renderTerm - Function to render an ordering term.
   * @param style - Whether the term is written before its direction.
   * @returns Bracketed list (e.g., "[desc, asc]" or "[salary desc, name asc]").
   */
  static compileOrdering(
    ordering: ReadonlyArray<OrderSpecNode>,
    renderTerm: TermRenderer,
    style: OrderByStyle = 'direction'
  ): string {
    const parts = ordering.map(o => (style === 'term' ? `${renderTerm(o.expression)} ${o.direction}` : o.direction));
    return `[${parts.join(', ')}]`;
  }
}
