import { SelectQueryNode } from '../../ast/query.js';
import { OperandNode } from '../../ast/expression.js';
import { SQL_KEYWORDS } from '../../sql/sql.js';

type TermRenderer = (term: OperandNode) => string;

/**
 * Compiler for GROUP BY clauses in SELECT statements.
 */
export class GroupByCompiler {
  /**
   * Compiles GROUP BY clause from a SELECT query AST.
   * @param ast - The SELECT query AST containing grouping terms.
   * @param renderTerm - Function to render a grouping term.
   * @returns SQL GROUP BY clause (e.g., ` GROUP BY "col1","col2"`) or empty string if no grouping.
   */
  static compileGroupBy(ast: SelectQueryNode, renderTerm: TermRenderer): string {
    if (ast.groupBy.length === 0) return '';
    const cols = ast.groupBy.map(renderTerm).join(',');
    return ` ${SQL_KEYWORDS.GROUP_BY} ${cols}`;
  }
}
