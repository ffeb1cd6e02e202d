import type { FunctionName, FunctionRenderer } from './types.js';

/**
 * Definition for a function renderer.
 */
export interface FunctionDefinition {
  name: FunctionName;
  renderer: FunctionRenderer;
}

/**
 * Registry that keeps track of function renderers and exposes them by function key.
 */
export class FunctionRegistry {
  private readonly renderers: Map<FunctionName, FunctionRenderer> = new Map();

  /**
   * Registers or overrides a renderer for the given function key.
   */
  add(name: FunctionName, renderer: FunctionRenderer): void {
    this.renderers.set(name, renderer);
  }

  /**
   * Registers a batch of definitions.
   */
  register(definitions: Iterable<FunctionDefinition>): void {
    for (const definition of definitions) {
      this.add(definition.name, definition.renderer);
    }
  }

  get(name: FunctionName): FunctionRenderer | undefined {
    return this.renderers.get(name);
  }
}
