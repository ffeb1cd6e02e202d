import type { FunctionRenderer } from '../types.js';

/**
 * Simple renderer for functions that take one argument.
 */
export function unaryRenderer(name: string): FunctionRenderer {
  return ({ compiledArgs }) => `${name}(${compiledArgs[0]})`;
}

/**
 * Simple renderer for functions that take two arguments.
 */
export function binaryRenderer(name: string): FunctionRenderer {
  return ({ compiledArgs }) => `${name}(${compiledArgs[0]}, ${compiledArgs[1]})`;
}
