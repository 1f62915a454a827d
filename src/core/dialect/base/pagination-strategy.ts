/**
 * Strategy interface for compiling pagination clauses.
 * Allows dialects to customize how pagination (LIMIT/OFFSET, OFFSET/FETCH) is generated.
 */
export interface PaginationStrategy {
  /**
   * Compiles pagination logic into SQL clause.
   * @param limit - The limit value, if present.
   * @param offset - The offset value, if present.
   * @returns SQL pagination clause (e.g., " LIMIT 10 OFFSET 0") or empty string if no pagination.
   */
  compilePagination(limit?: number, offset?: number): string;
}

/**
 * Standard SQL pagination using LIMIT and OFFSET.
 */
export class StandardLimitOffsetPagination implements PaginationStrategy {
  compilePagination(limit?: number, offset?: number): string {
    const parts: string[] = [];
    if (limit !== undefined) parts.push(`LIMIT ${limit}`);
    if (offset !== undefined) parts.push(`OFFSET ${offset}`);
    return parts.length ? ` ${parts.join(' ')}` : '';
  }
}

/**
 * SQL:2008 row limiting: OFFSET n ROWS FETCH NEXT m ROWS ONLY.
 */
export class OffsetFetchPagination implements PaginationStrategy {
  compilePagination(limit?: number, offset?: number): string {
    const parts: string[] = [];
    if (offset !== undefined) parts.push(`OFFSET ${offset} ROWS`);
    if (limit !== undefined) {
      parts.push(offset !== undefined ? `FETCH NEXT ${limit} ROWS ONLY` : `FETCH FIRST ${limit} ROWS ONLY`);
    }
    return parts.length ? ` ${parts.join(' ')}` : '';
  }
}
