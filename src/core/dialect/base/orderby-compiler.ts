import { OrderByNode, SelectQueryNode } from '../../ast/query.js';
import { SQL_KEYWORDS } from '../../sql/sql.js';

type TermRenderer = (term: OrderByNode['term']) => string;

/**
 * Compiler for ORDER BY clauses in SELECT statements.
 * Handles compilation of sorting expressions with direction (ASC/DESC).
 */
export class OrderByCompiler {
  /**
   * Compiles ORDER BY clause from a SELECT query AST.
   * @param ast - The SELECT query AST containing sort specifications.
   * @param renderTerm - Function to render an ordering term.
   * @returns SQL ORDER BY clause (e.g., ` ORDER BY "col1","col2" DESC`) or empty string if no ordering.
   */
  static compileOrderBy(ast: SelectQueryNode, renderTerm: TermRenderer): string {
    if (ast.orderBy.length === 0) return '';
    const parts = ast.orderBy
      .map(o => (o.direction ? `${renderTerm(o.term)} ${o.direction}` : renderTerm(o.term)))
      .join(',');
    return ` ${SQL_KEYWORDS.ORDER_BY} ${parts}`;
  }
}
