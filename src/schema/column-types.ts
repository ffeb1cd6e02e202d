/**
 * Canonical semantic column types understood by the pipeline builder.
 * Backends map these to their own type names; the builder only needs them for typing rules.
 */
export const SEMANTIC_TYPES = [
  'integer',
  'long',
  'double',
  'string',
  'boolean',
  'date',
  'datetime'
] as const;

/** Known semantic types */
export type SemanticType = (typeof SEMANTIC_TYPES)[number];

const SEMANTIC_TYPE_SET = new Set<string>(SEMANTIC_TYPES);

export const isSemanticType = (value: unknown): value is SemanticType =>
  typeof value === 'string' && SEMANTIC_TYPE_SET.has(value);

/**
 * Definition of a table column
 */
export interface ColumnDef<T extends SemanticType = SemanticType> {
  /** Column name (filled at runtime by defineTable) */
  readonly name: string;
  /** Semantic type of the column */
  readonly type: T;
  /** Table name this column belongs to (filled at runtime by defineTable) */
  readonly table?: string;
}

/**
 * Factory for creating column definitions with the supported semantic types
 */
export const col = {
  /**
   * Creates a 32-bit integer column definition
   */
  int: (): ColumnDef<'integer'> => ({ name: '', type: 'integer' }),

  /**
   * Creates a 64-bit integer column definition
   */
  long: (): ColumnDef<'long'> => ({ name: '', type: 'long' }),

  double: (): ColumnDef<'double'> => ({ name: '', type: 'double' }),

  /**
   * Creates a string column definition
   */
  string: (): ColumnDef<'string'> => ({ name: '', type: 'string' }),

  boolean: (): ColumnDef<'boolean'> => ({ name: '', type: 'boolean' }),

  /**
   * Creates a calendar date column definition (no time part)
   */
  date: (): ColumnDef<'date'> => ({ name: '', type: 'date' }),

  datetime: (): ColumnDef<'datetime'> => ({ name: '', type: 'datetime' }),

  /**
   * Creates a column definition from a runtime type name
   * @param type - Semantic type
   */
  of: <T extends SemanticType>(type: T): ColumnDef<T> => ({ name: '', type })
};
