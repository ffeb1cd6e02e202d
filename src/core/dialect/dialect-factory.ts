// Dialect factory for pipeline rendering.
// Centralizes how we go from a symbolic name ("pure-relation") to a concrete renderer instance.

import type { PipelineRenderer } from './abstract.js';
import { PureRelationDialect } from './pure-relation/index.js';
import { ConfigError } from '../errors.js';

export type DialectKey =
  | 'pure-relation'
  | (string & {}); // allow user-defined keys without constraining too much

type DialectFactoryFn = () => PipelineRenderer;

export class DialectFactory {
  private static registry = new Map<DialectKey, DialectFactoryFn>();
  private static defaultsInitialized = false;

  private static ensureDefaults(): void {
    if (this.defaultsInitialized) return;
    this.defaultsInitialized = true;

    // Register built-in dialects only if no override exists yet.
    if (!this.registry.has('pure-relation')) {
      this.registry.set('pure-relation', () => new PureRelationDialect());
    }
  }

  /**
   * Register (or override) a dialect factory for a key.
   *
   * Examples:
   *   DialectFactory.register('pure-relation', () => new PureRelationDialect({ orderBy: 'term' }));
   *   DialectFactory.register('my-backend', () => new CustomDialect());
   */
  public static register(key: DialectKey, factory: DialectFactoryFn): void {
    this.registry.set(key, factory);
  }

  /**
   * Resolve a key into a renderer instance.
   * @throws ConfigError if the key is not registered.
   */
  public static create(key: DialectKey): PipelineRenderer {
    this.ensureDefaults();
    const factory = this.registry.get(key);
    if (!factory) {
      throw new ConfigError(
        String(key),
        'dialect is not registered. Use DialectFactory.register(...) to register it.'
      );
    }
    return factory();
  }

  /**
   * Clear all registrations (mainly for tests).
   * Built-ins will be re-registered lazily on the next create().
   */
  public static clear(): void {
    this.registry.clear();
    this.defaultsInitialized = false;
  }
}

/**
 * Helper to normalize either a renderer instance OR a key into a renderer.
 * This is what pipelines use.
 */
export const resolveDialectInput = (
  dialect: PipelineRenderer | DialectKey
): PipelineRenderer => {
  if (typeof dialect === 'string') {
    return DialectFactory.create(dialect);
  }
  return dialect;
};
