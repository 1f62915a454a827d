import type { ConditionNode, OperandNode } from './expression-nodes.js';
import type { JoinNode } from './join.js';
import type { OrderDirection } from '../sql/sql.js';
import type { TableRef } from './types.js';
import { assertIdentifier } from './identifier.js';

/**
 * AST node representing a table reference in a query
 */
export interface TableNode {
  readonly type: 'Table';
  /** Table name */
  readonly name: string;
  /** Optional schema name */
  readonly schema?: string;
  /** Optional table alias */
  readonly alias?: string;
}

/**
 * AST node representing an ORDER BY term
 */
export interface OrderByNode {
  readonly type: 'OrderBy';
  /** Expression to order by */
  readonly term: OperandNode;
  /** Order direction; omitted means the database default */
  readonly direction?: OrderDirection;
}

/**
 * AST node representing a complete SELECT query
 */
export interface SelectQueryNode {
  readonly type: 'SelectQuery';
  /** FROM clause table; absent until a source is set */
  readonly from?: TableNode;
  /** SELECT clause columns; empty means SELECT * */
  readonly columns: readonly OperandNode[];
  /** JOIN clauses */
  readonly joins: readonly JoinNode[];
  /** Optional WHERE clause */
  readonly where?: ConditionNode;
  /** GROUP BY terms */
  readonly groupBy: readonly OperandNode[];
  /** Optional HAVING clause */
  readonly having?: ConditionNode;
  /** ORDER BY terms */
  readonly orderBy: readonly OrderByNode[];
  /** Optional LIMIT */
  readonly limit?: number;
  /** Optional OFFSET */
  readonly offset?: number;
}

/**
 * Builds a TableNode from a name or table reference, validating every identifier
 */
export const tableNode = (table: string | TableRef): TableNode => {
  if (typeof table === 'string') {
    return { type: 'Table', name: assertIdentifier(table, 'table') };
  }
  const node: TableNode = { type: 'Table', name: assertIdentifier(table.name, 'table') };
  return {
    ...node,
    ...(table.schema !== undefined ? { schema: assertIdentifier(table.schema, 'schema') } : {}),
    ...(table.alias !== undefined ? { alias: assertIdentifier(table.alias, 'alias') } : {})
  };
};

/**
 * An empty SELECT with no source
 */
export const emptySelectQuery = (): SelectQueryNode => ({
  type: 'SelectQuery',
  columns: [],
  joins: [],
  groupBy: [],
  orderBy: []
});
