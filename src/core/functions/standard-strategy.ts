import type { FunctionStrategy, FunctionRenderer, FunctionName } from './types.js';
import { FunctionRegistry } from './function-registry.js';
import type { FunctionDefinition } from './function-registry.js';
import { aggregateFunctionDefinitions } from './definitions/aggregate.js';
import { numericFunctionDefinitions } from './definitions/numeric.js';

/**
 * Function strategy for the pure-relation text form:
 * aggregates keep their key, modulo and power render as `mod` and `pow`.
 */
export class StandardFunctionStrategy implements FunctionStrategy {
  protected readonly registry: FunctionRegistry;

  /**
   * Creates a new StandardFunctionStrategy and registers the built-in functions.
   * Renderers already present in the given registry are overridden.
   */
  constructor(registry?: FunctionRegistry) {
    this.registry = registry ?? new FunctionRegistry();
    this.registerStandard();
  }

  protected registerStandard(): void {
    this.registerDefinitions(aggregateFunctionDefinitions);
    this.registerDefinitions(numericFunctionDefinitions);
  }

  protected registerDefinitions(definitions: FunctionDefinition[]): void {
    this.registry.register(definitions);
  }

  /**
   * Registers a renderer for a function key.
   */
  protected add(name: FunctionName, renderer: FunctionRenderer): void {
    this.registry.add(name, renderer);
  }

  getRenderer(name: FunctionName): FunctionRenderer | undefined {
    return this.registry.get(name);
  }
}
