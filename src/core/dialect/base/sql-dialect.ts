import { Dialect, DialectRules } from '../abstract.js';
import { SelectQueryNode, TableNode } from '../../ast/query.js';
import { OperandNode } from '../../ast/expression.js';
import { JoinKind, SQL_KEYWORDS } from '../../sql/sql.js';
import type { FunctionStrategy } from '../../functions/types.js';
import { JoinCompiler } from './join-compiler.js';
import { GroupByCompiler } from './groupby-compiler.js';
import { OrderByCompiler } from './orderby-compiler.js';
import {
  OffsetFetchPagination,
  PaginationStrategy,
  StandardLimitOffsetPagination
} from './pagination-strategy.js';

const paginationFor = (rules: DialectRules): PaginationStrategy =>
  rules.pagination === 'offset-fetch' ? new OffsetFetchPagination() : new StandardLimitOffsetPagination();

/**
 * Shared SQL compiler driven entirely by a dialect's rules record.
 * Concrete dialects supply the rules and override only the hooks where they diverge.
 *
 * Clause order:
 * SELECT cols FROM source [AS alias] [joins] [WHERE] [GROUP BY] [HAVING] [ORDER BY] [pagination]
 */
export abstract class SqlDialectBase extends Dialect {
  protected readonly paginationStrategy: PaginationStrategy;

  protected constructor(rules: DialectRules, functionStrategy?: FunctionStrategy) {
    super(rules, functionStrategy);
    this.paginationStrategy = paginationFor(rules);
  }

  protected compileSelectAst(ast: SelectQueryNode, from: TableNode): string {
    const columns = this.compileSelectColumns(ast);
    const source = this.compileTableSource(from);
    const joins = JoinCompiler.compileJoins(
      ast.joins,
      kind => this.joinKeyword(kind),
      table => this.compileTableSource(table),
      condition => this.compileCondition(condition)
    );
    const whereClause = ast.where ? ` ${SQL_KEYWORDS.WHERE} ${this.compileCondition(ast.where)}` : '';
    const groupBy = GroupByCompiler.compileGroupBy(ast, term => this.compileListTerm(term));
    const having = ast.having ? ` ${SQL_KEYWORDS.HAVING} ${this.compileCondition(ast.having)}` : '';
    const orderBy = OrderByCompiler.compileOrderBy(ast, term => this.compileListTerm(term));
    const pagination = this.paginationStrategy.compilePagination(ast.limit, ast.offset);

    return `${SQL_KEYWORDS.SELECT} ${columns} ${SQL_KEYWORDS.FROM} ${source}${joins}${whereClause}${groupBy}${having}${orderBy}${pagination}`;
  }

  protected joinKeyword(kind: JoinKind): string {
    return this.rules.joinKeywords[kind];
  }

  /**
   * Comma-joined projection list; an empty list selects every column.
   */
  protected compileSelectColumns(ast: SelectQueryNode): string {
    if (ast.columns.length === 0) return '*';
    return ast.columns
      .map(c => {
        const expr = this.compileListTerm(c);
        if (c.type !== 'AliasRef' && c.alias) {
          return `${expr} ${SQL_KEYWORDS.AS} ${this.quoteIdentifier(c.alias)}`;
        }
        return expr;
      })
      .join(',');
  }

  /**
   * Renders an item of the SELECT, GROUP BY or ORDER BY list.
   * Bare columns and alias references are quoted; the table qualifier is not rendered.
   */
  protected compileListTerm(term: OperandNode): string {
    switch (term.type) {
      case 'Column':
      case 'AliasRef':
        return this.quoteIdentifier(term.name);
      default:
        return this.compileOperand(term);
    }
  }

  /**
   * Compiles a table source with its optional alias.
   */
  protected compileTableSource(table: TableNode): string {
    const base = this.compileTableName(table);
    return table.alias ? `${base} ${SQL_KEYWORDS.AS} ${this.quoteIdentifier(table.alias)}` : base;
  }

  protected compileTableName(table: { name: string; schema?: string }): string {
    if (table.schema) {
      return `${this.quoteIdentifier(table.schema)}.${this.quoteIdentifier(table.name)}`;
    }
    return this.quoteIdentifier(table.name);
  }
}
