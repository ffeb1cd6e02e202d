import type { FunctionCallNode } from '../ast/expression-nodes.js';
import type { SemanticType } from '../../schema/column-types.js';

/**
 * Canonical function keys known to the builder
 */
export type FunctionName = 'count' | 'sum' | 'avg' | 'min' | 'max' | 'modulo' | 'power';

/**
 * Typing contract of a function: arity, accepted argument types and result type.
 */
export interface FunctionSignature {
  readonly name: FunctionName;
  /** Exact number of arguments */
  readonly arity: number;
  /** Whether the function folds a group of rows into one value */
  readonly aggregate: boolean;
  /**
   * Checks the argument types and returns the result type,
   * or a description of the violated rule.
   */
  resolve(argTypes: ReadonlyArray<SemanticType>): SemanticType | { error: string };
}

/**
 * Context provided to function renderers.
 */
export interface FunctionRenderContext {
  /** The function node being rendered. */
  node: FunctionCallNode;
  /** The rendered arguments for the function. */
  compiledArgs: string[];
}

/**
 * A function that renders a function call in backend syntax.
 */
export type FunctionRenderer = (ctx: FunctionRenderContext) => string;

/**
 * Strategy for rendering functions in a specific backend.
 */
export interface FunctionStrategy {
  /**
   * Returns a renderer for a function key, or undefined when the backend has none.
   */
  getRenderer(functionName: FunctionName): FunctionRenderer | undefined;
}
