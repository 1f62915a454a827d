import type { TableNode } from './query.js';
import type { ConditionNode } from './expression-nodes.js';
import type { JoinKind } from '../sql/sql.js';

/**
 * AST node representing a JOIN clause
 */
export interface JoinNode {
  readonly type: 'Join';
  /** Type of join (INNER, LEFT, RIGHT, FULL) */
  readonly kind: JoinKind;
  /** Table to join */
  readonly table: TableNode;
  /** Join condition */
  readonly condition: ConditionNode;
}

/**
 * Creates a JoinNode ready for AST insertion.
 */
export const createJoinNode = (kind: JoinKind, table: TableNode, condition: ConditionNode): JoinNode => ({
  type: 'Join',
  kind,
  table,
  condition
});
