import type { FunctionNode } from './expression-nodes.js';
import { OperandInput, toOperand } from './expression-builders.js';

const buildAggregate = (name: string) => (col: OperandInput): FunctionNode => ({
  type: 'Function',
  name,
  args: [toOperand(col)]
});

/**
 * Creates a COUNT function expression
 * @param col - Column to count
 */
export const count = buildAggregate('COUNT');

/**
 * Creates a SUM function expression
 * @param col - Column to sum
 */
export const sum = buildAggregate('SUM');

/**
 * Creates an AVG function expression
 * @param col - Column to average
 */
export const avg = buildAggregate('AVG');

/**
 * Creates a MIN function expression
 * @param col - Column to take the minimum of
 */
export const min = buildAggregate('MIN');

/**
 * Creates a MAX function expression
 * @param col - Column to take the maximum of
 * @example
 * max(employee.column('salary')); // MAX(salary)
 */
export const max = buildAggregate('MAX');

/**
 * Creates a COUNT(*) function expression.
 */
export const countAll = (): FunctionNode => ({
  type: 'Function',
  name: 'COUNT',
  args: []
});
