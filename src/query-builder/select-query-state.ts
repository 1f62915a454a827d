import { SelectQueryNode, TableNode, OrderByNode, emptySelectQuery } from '../core/ast/query.js';
import { ConditionNode, OperandNode } from '../core/ast/expression.js';
import { JoinNode } from '../core/ast/join.js';

/**
 * Immutable snapshot of a SELECT query being built.
 * Every `with*` call returns a new state; the previous one is never modified.
 */
export class SelectQueryState {
  /**
   * Abstract Syntax Tree (AST) representation of the query
   */
  public readonly ast: SelectQueryNode;

  /**
   * Creates a new SelectQueryState instance
   * @param ast - Optional existing AST
   */
  constructor(ast?: SelectQueryNode) {
    this.ast = ast ?? emptySelectQuery();
  }

  /**
   * Creates a new SelectQueryState with updated AST
   * @param nextAst - Updated AST
   */
  private clone(nextAst: SelectQueryNode): SelectQueryState {
    return new SelectQueryState(nextAst);
  }

  /**
   * Replaces the source table
   */
  withFrom(from: TableNode): SelectQueryState {
    return this.clone({ ...this.ast, from });
  }

  /**
   * Adds columns to the projection
   */
  withColumns(newCols: readonly OperandNode[]): SelectQueryState {
    return this.clone({
      ...this.ast,
      columns: [...this.ast.columns, ...newCols]
    });
  }

  /**
   * Adds a join to the query
   */
  withJoin(join: JoinNode): SelectQueryState {
    return this.clone({
      ...this.ast,
      joins: [...this.ast.joins, join]
    });
  }

  /**
   * Sets the WHERE predicate, replacing any previous one
   */
  withWhere(predicate: ConditionNode): SelectQueryState {
    return this.clone({
      ...this.ast,
      where: predicate
    });
  }

  /**
   * Sets the HAVING predicate, replacing any previous one
   */
  withHaving(predicate: ConditionNode): SelectQueryState {
    return this.clone({
      ...this.ast,
      having: predicate
    });
  }

  /**
   * Adds GROUP BY terms, keeping call order and duplicates
   */
  withGroupBy(terms: readonly OperandNode[]): SelectQueryState {
    return this.clone({
      ...this.ast,
      groupBy: [...this.ast.groupBy, ...terms]
    });
  }

  /**
   * Adds an ORDER BY term
   */
  withOrderBy(term: OrderByNode): SelectQueryState {
    return this.clone({
      ...this.ast,
      orderBy: [...this.ast.orderBy, term]
    });
  }

  withLimit(limit: number): SelectQueryState {
    return this.clone({ ...this.ast, limit });
  }

  withOffset(offset: number): SelectQueryState {
    return this.clone({ ...this.ast, offset });
  }
}
