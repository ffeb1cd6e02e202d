import type { ExpressionNode } from '../ast/expression-nodes.js';
import type { FromClause, PipelineIR, PipelineStage } from '../ast/clause-nodes.js';
import { ClauseVisitor, visitClause } from '../ast/clause-visitor.js';
import { ExpressionVisitor, visitExpression } from '../ast/expression-visitor.js';
import type { FunctionStrategy } from '../functions/types.js';
import { StandardFunctionStrategy } from '../functions/standard-strategy.js';
import { BackendUnsupportedError, isPipelineError } from '../errors.js';

/**
 * Anything that turns a validated pipeline into backend text
 */
export interface PipelineRenderer {
  /** Backend identifier, used in logs and errors */
  readonly name: string;
  render(pipeline: PipelineIR): string;
  /**
   * Text appended for one clause, so that
   * render(p ++ [c]) === render(p) + renderSuffix(c)
   */
  renderSuffix(clause: PipelineStage): string;
}

/**
 * Abstract base class for backends.
 * Rendering is read-only: it never validates and never touches the pipeline.
 * Any clause or expression kind a backend has no mapping for raises BackendUnsupportedError.
 */
export abstract class Dialect implements PipelineRenderer {
  abstract readonly name: string;

  protected readonly functionStrategy: FunctionStrategy;

  protected constructor(functionStrategy?: FunctionStrategy) {
    this.functionStrategy = functionStrategy || new StandardFunctionStrategy();
  }

  /** Clause mappings of the backend */
  protected abstract readonly clauseCompilers: ClauseVisitor<string>;

  /** Expression mappings of the backend */
  protected abstract readonly expressionCompilers: ExpressionVisitor<string>;

  /**
   * Compiles the source table (to be implemented by concrete dialects)
   */
  protected abstract compileFrom(from: FromClause): string;

  render(pipeline: PipelineIR): string {
    return this.compileFrom(pipeline.from) + pipeline.clauses.map(clause => this.renderSuffix(clause)).join('');
  }

  renderSuffix(clause: PipelineStage): string {
    try {
      return visitClause(clause, this.clauseCompilers, unsupported => this.unsupported(unsupported.type));
    } catch (error) {
      if (isPipelineError(error) && error.clause === undefined) {
        throw error.inClause(clause.type);
      }
      throw error;
    }
  }

  /**
   * Compiles an expression node
   */
  protected compileExpression(node: ExpressionNode): string {
    return visitExpression(node, this.expressionCompilers, unsupported => this.unsupported(unsupported.type));
  }

  protected unsupported(nodeKind: string): never {
    throw new BackendUnsupportedError(nodeKind, this.name);
  }
}
