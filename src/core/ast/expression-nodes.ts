import type { ComparisonOperator, LogicalOperator } from '../sql/sql.js';

/**
 * AST node representing a literal value
 */
export interface LiteralNode {
  readonly type: 'Literal';
  /** The literal value (string, number, boolean, or null) */
  readonly value: string | number | boolean | null;
  /** Optional alias when the literal is projected */
  readonly alias?: string;
}

/**
 * AST node representing a column reference
 */
export interface ColumnNode {
  readonly type: 'Column';
  /** Column name */
  readonly name: string;
  /** Table the column belongs to, when known */
  readonly table?: string;
  /** Optional alias for the column */
  readonly alias?: string;
}

/**
 * AST node representing a function call
 */
export interface FunctionNode {
  readonly type: 'Function';
  /** Function name (e.g., COUNT, UPPER) */
  readonly name: string;
  /** Function arguments */
  readonly args: readonly OperandNode[];
  /** Optional alias for the function result */
  readonly alias?: string;
}

/**
 * AST node referring to an alias declared elsewhere in the query
 */
export interface AliasRefNode {
  readonly type: 'AliasRef';
  readonly name: string;
}

/**
 * Union type representing any operand that can be used in expressions
 */
export type OperandNode = ColumnNode | LiteralNode | FunctionNode | AliasRefNode;

/**
 * Operands that may carry an alias in a projection
 */
export type AliasableNode = ColumnNode | LiteralNode | FunctionNode;

const operandTypes = new Set<string>(['Column', 'Literal', 'Function', 'AliasRef']);

const hasType = (node: unknown): node is { type: unknown } =>
  typeof node === 'object' && node !== null && 'type' in node;

export const isOperandNode = (node: unknown): node is OperandNode =>
  hasType(node) && typeof node.type === 'string' && operandTypes.has(node.type);

export const isColumnNode = (node: unknown): node is ColumnNode => hasType(node) && node.type === 'Column';
export const isFunctionNode = (node: unknown): node is FunctionNode => hasType(node) && node.type === 'Function';

/**
 * AST node representing a comparison (e.g., column = value)
 */
export interface ComparisonNode {
  readonly type: 'Comparison';
  /** Comparison operator */
  readonly operator: ComparisonOperator;
  /** Left operand */
  readonly left: OperandNode;
  /** Right operand */
  readonly right: OperandNode;
}

/**
 * AST node combining two conditions with AND/OR
 */
export interface LogicalNode {
  readonly type: 'Logical';
  readonly operator: LogicalOperator;
  readonly left: ConditionNode;
  readonly right: ConditionNode;
}

/**
 * Union type representing any condition tree node
 */
export type ConditionNode = ComparisonNode | LogicalNode;

export const isConditionNode = (node: unknown): node is ConditionNode =>
  hasType(node) && (node.type === 'Comparison' || node.type === 'Logical');
