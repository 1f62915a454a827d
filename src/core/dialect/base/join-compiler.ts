import { JoinNode } from '../../ast/join.js';
import { TableNode } from '../../ast/query.js';
import { ConditionNode } from '../../ast/expression.js';
import { JoinKind, SQL_KEYWORDS } from '../../sql/sql.js';

/**
 * Compiler for JOIN clauses in SELECT statements.
 * Handles compilation of all join types (INNER, LEFT, RIGHT, FULL).
 */
export class JoinCompiler {
  static compileJoins(
    joins: readonly JoinNode[],
    keywordFor: (kind: JoinKind) => string,
    compileTable: (table: TableNode) => string,
    compileCondition: (condition: ConditionNode) => string
  ): string {
    if (joins.length === 0) return '';
    const parts = joins.map(j => {
      const table = compileTable(j.table);
      const cond = compileCondition(j.condition);
      return `${keywordFor(j.kind)} ${table} ${SQL_KEYWORDS.ON} ${cond}`;
    });
    return ` ${parts.join(' ')}`;
  }
}
