/**
 * Strategy interface for compiling pagination clauses.
 * Allows backends to customize how row limits and skips are written.
 */
export interface PaginationStrategy {
  /**
   * @param limit - Maximum number of rows to keep.
   */
  compileLimit(limit: number): string;
  /**
   * @param offset - Number of rows to skip.
   */
  compileOffset(offset: number): string;
}

/**
 * Pagination written as `take(n)` and `drop(n)` operations.
 */
export class TakeDropPagination implements PaginationStrategy {
  compileLimit(limit: number): string {
    return `take(${limit})`;
  }

  compileOffset(offset: number): string {
    return `drop(${offset})`;
  }
}
