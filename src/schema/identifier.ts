import { ConfigError } from '../core/errors.js';

/**
 * Database, table, column and alias names: one or more letters, digits or underscores.
 */
export const IDENTIFIER_PATTERN = /^[A-Za-z0-9_]+$/;

export const isIdentifier = (value: unknown): value is string =>
  typeof value === 'string' && IDENTIFIER_PATTERN.test(value);

/**
 * @throws ConfigError when the value is not an identifier
 */
export const assertIdentifier = (value: unknown, what: string): string => {
  if (!isIdentifier(value)) {
    throw new ConfigError(String(value), `${what} name must consist of letters, digits and underscores`);
  }
  return value;
};
