/**
 * Error taxonomy for pipeline construction and rendering.
 * Every error carries its kind, the clause being appended (when known) and the offending subject.
 */
export const PIPELINE_ERROR_KINDS = {
  UNKNOWN_COLUMN: 'UnknownColumn',
  TYPE_ERROR: 'TypeError',
  DUPLICATE_ALIAS: 'DuplicateAlias',
  INVALID_AGGREGATE_REFERENCE: 'InvalidAggregateReference',
  CONFIG_ERROR: 'ConfigError',
  BACKEND_UNSUPPORTED: 'BackendUnsupported'
} as const;

export type PipelineErrorKind = (typeof PIPELINE_ERROR_KINDS)[keyof typeof PIPELINE_ERROR_KINDS];

export interface PipelineErrorDetails {
  /** Clause kind that was being appended or rendered */
  clause?: string;
  /** Offending column, alias, node kind or value */
  subject: string;
}

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly clause?: string;
  readonly subject: string;

  protected constructor(message: string, details: PipelineErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.clause = details.clause;
    this.subject = details.subject;
  }

  /**
   * Returns a copy of this error attributed to the given clause kind.
   * Resolution helpers raise errors without knowing which clause they serve.
   */
  abstract inClause(clause: string): PipelineError;
}

const describeClause = (clause?: string): string => (clause ? ` in ${clause}` : '');

export class UnknownColumnError extends PipelineError {
  readonly kind = PIPELINE_ERROR_KINDS.UNKNOWN_COLUMN;

  constructor(column: string, clause?: string) {
    super(`Unknown column "${column}"${describeClause(clause)}`, { clause, subject: column });
  }

  inClause(clause: string): UnknownColumnError {
    return new UnknownColumnError(this.subject, clause);
  }
}

/**
 * Raised when an operator or function is applied outside its operand type rules.
 * Named to avoid shadowing the global TypeError.
 */
export class TypeMismatchError extends PipelineError {
  readonly kind = PIPELINE_ERROR_KINDS.TYPE_ERROR;
  readonly detail: string;

  constructor(subject: string, detail: string, clause?: string) {
    super(`Type error on "${subject}"${describeClause(clause)}: ${detail}`, { clause, subject });
    this.detail = detail;
  }

  inClause(clause: string): TypeMismatchError {
    return new TypeMismatchError(this.subject, this.detail, clause);
  }
}

export class DuplicateAliasError extends PipelineError {
  readonly kind = PIPELINE_ERROR_KINDS.DUPLICATE_ALIAS;

  constructor(alias: string, clause?: string) {
    super(`Column "${alias}" already exists${describeClause(clause)}`, { clause, subject: alias });
  }

  inClause(clause: string): DuplicateAliasError {
    return new DuplicateAliasError(this.subject, clause);
  }
}

export class InvalidAggregateReferenceError extends PipelineError {
  readonly kind = PIPELINE_ERROR_KINDS.INVALID_AGGREGATE_REFERENCE;
  readonly detail: string;

  constructor(column: string, clause?: string, detail = 'is neither a grouping key nor an aggregate') {
    super(`Column "${column}" ${detail}${describeClause(clause)}`, { clause, subject: column });
    this.detail = detail;
  }

  inClause(clause: string): InvalidAggregateReferenceError {
    return new InvalidAggregateReferenceError(this.subject, clause, this.detail);
  }
}

export class ConfigError extends PipelineError {
  readonly kind = PIPELINE_ERROR_KINDS.CONFIG_ERROR;
  readonly detail: string;

  constructor(subject: string, detail: string, clause?: string) {
    super(`Invalid value "${subject}"${describeClause(clause)}: ${detail}`, { clause, subject });
    this.detail = detail;
  }

  inClause(clause: string): ConfigError {
    return new ConfigError(this.subject, this.detail, clause);
  }
}

export class BackendUnsupportedError extends PipelineError {
  readonly kind = PIPELINE_ERROR_KINDS.BACKEND_UNSUPPORTED;
  readonly backend: string;

  constructor(nodeKind: string, backend: string, clause?: string) {
    super(`Node kind "${nodeKind}" is not supported by the ${backend} backend`, { clause, subject: nodeKind });
    this.backend = backend;
  }

  inClause(clause: string): BackendUnsupportedError {
    return new BackendUnsupportedError(this.subject, this.backend, clause);
  }
}

export const isPipelineError = (value: unknown): value is PipelineError => value instanceof PipelineError;

/**
 * Outcome of a fallible build step
 */
export type BuildResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: PipelineError };

/**
 * Runs a build step and captures pipeline errors as a failed result.
 * Anything that is not a PipelineError is rethrown.
 *
 * @example
 * const result = tryBuild(() => pipeline.filter(gt('age', 30)));
 * if (!result.ok) console.error(result.error.kind, result.error.subject);
 */
export const tryBuild = <T>(step: () => T): BuildResult<T> => {
  try {
    return { ok: true, value: step() };
  } catch (error) {
    if (isPipelineError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
};
