import { COMPARISON_OPERATORS, ComparisonOperator, LOGICAL_OPERATORS, LogicalOperator } from '../sql/sql.js';
import { assertIdentifier } from './identifier.js';
import {
  AliasableNode,
  AliasRefNode,
  ColumnNode,
  ComparisonNode,
  ConditionNode,
  FunctionNode,
  LiteralNode,
  LogicalNode,
  OperandNode,
  isOperandNode
} from './expression-nodes.js';

export type LiteralValue = LiteralNode['value'];

/**
 * Operand accepted where a column is expected: a bare string names a column.
 */
export type OperandInput = OperandNode | string;

/**
 * Operand accepted on the value side of a comparison: a bare string is a literal.
 */
export type ValueOperandInput = OperandNode | LiteralValue;

/**
 * Creates a column reference, optionally qualified by its table
 * @example
 * column('salary');              // salary
 * column('employee', 'salary');  // employee.salary
 */
export function column(name: string): ColumnNode;
export function column(table: string, name: string): ColumnNode;
export function column(tableOrName: string, name?: string): ColumnNode {
  if (name === undefined) {
    return { type: 'Column', name: assertIdentifier(tableOrName, 'column') };
  }
  return {
    type: 'Column',
    table: assertIdentifier(tableOrName, 'table'),
    name: assertIdentifier(name, 'column')
  };
}

/**
 * Creates a literal operand
 * @throws RangeError for NaN or infinite numbers, which have no SQL spelling
 */
export const literal = (value: LiteralValue): LiteralNode => {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new RangeError(`Cannot use ${value} as a SQL literal`);
  }
  return { type: 'Literal', value };
};

/**
 * Creates a reference to an alias declared elsewhere in the query (e.g. in GROUP BY)
 */
export const aliasRef = (name: string): AliasRefNode => ({
  type: 'AliasRef',
  name: assertIdentifier(name, 'alias')
});

/**
 * Normalizes a bare column name or an existing operand into an operand node.
 * This is the only place where strings are interpreted as columns.
 */
export const toOperand = (input: OperandInput): OperandNode =>
  typeof input === 'string' ? column(input) : input;

/**
 * Normalizes a literal value or an existing operand into an operand node.
 */
export const toValueOperand = (input: ValueOperandInput): OperandNode =>
  isOperandNode(input) ? input : literal(input);

/**
 * Creates a function call node; the name is upper-cased
 * @example
 * call('coalesce', ['nickname', literal('n/a')]);
 */
export const call = (name: string, args: readonly OperandInput[]): FunctionNode => ({
  type: 'Function',
  name: assertIdentifier(name, 'function').toUpperCase(),
  args: args.map(toOperand)
});

/**
 * Returns a copy of the expression carrying the given alias; the argument is left untouched
 * @example
 * alias(max('salary'), 'top_salary');
 */
export function alias<T extends AliasableNode>(expr: T, name: string): T;
export function alias(expr: string, name: string): ColumnNode;
export function alias(expr: AliasableNode | string, name: string): AliasableNode {
  const node = typeof expr === 'string' ? column(expr) : expr;
  return { ...node, alias: assertIdentifier(name, 'alias') };
}

const createComparison = (
  operator: ComparisonOperator,
  left: OperandInput,
  right: ValueOperandInput
): ComparisonNode => ({
  type: 'Comparison',
  operator,
  left: toOperand(left),
  right: toValueOperand(right)
});

/**
 * Creates an equality comparison (left = right)
 * @example
 * eq(payroll.column('id'), employee.column('payroll_id'));
 */
export const eq = (left: OperandInput, right: ValueOperandInput): ComparisonNode =>
  createComparison(COMPARISON_OPERATORS.EQUALS, left, right);

/**
 * Creates a not-equal comparison (left <> right)
 */
export const neq = (left: OperandInput, right: ValueOperandInput): ComparisonNode =>
  createComparison(COMPARISON_OPERATORS.NOT_EQUALS, left, right);

/**
 * Creates a greater-than comparison (left > right)
 * @example
 * gt(employee.column('salary'), 1000);
 */
export const gt = (left: OperandInput, right: ValueOperandInput): ComparisonNode =>
  createComparison(COMPARISON_OPERATORS.GREATER_THAN, left, right);

/**
 * Creates a greater-than-or-equal comparison (left >= right)
 */
export const gte = (left: OperandInput, right: ValueOperandInput): ComparisonNode =>
  createComparison(COMPARISON_OPERATORS.GREATER_OR_EQUAL, left, right);

/**
 * Creates a less-than comparison (left < right)
 */
export const lt = (left: OperandInput, right: ValueOperandInput): ComparisonNode =>
  createComparison(COMPARISON_OPERATORS.LESS_THAN, left, right);

/**
 * Creates a less-than-or-equal comparison (left <= right)
 */
export const lte = (left: OperandInput, right: ValueOperandInput): ComparisonNode =>
  createComparison(COMPARISON_OPERATORS.LESS_OR_EQUAL, left, right);

const combine = (
  operator: LogicalOperator,
  first: ConditionNode,
  second: ConditionNode,
  rest: ConditionNode[]
): LogicalNode =>
  rest.reduce<LogicalNode>(
    (left, right) => ({ type: 'Logical', operator, left, right }),
    { type: 'Logical', operator, left: first, right: second }
  );

/**
 * Combines conditions with AND, nesting strictly left to right:
 * `and(a, b, c)` is `and(and(a, b), c)`.
 */
export const and = (first: ConditionNode, second: ConditionNode, ...rest: ConditionNode[]): LogicalNode =>
  combine(LOGICAL_OPERATORS.AND, first, second, rest);

/**
 * Combines conditions with OR, nesting strictly left to right.
 */
export const or = (first: ConditionNode, second: ConditionNode, ...rest: ConditionNode[]): LogicalNode =>
  combine(LOGICAL_OPERATORS.OR, first, second, rest);
