// Pure AST Builders - No Dialect Logic Here!

import { FunctionNode, OperandInput, toOperand } from '../ast/expression.js';

const fn = (key: string, value: OperandInput): FunctionNode => ({
  type: 'Function',
  name: key,
  args: [toOperand(value)]
});

/**
 * Converts a string to uppercase.
 *
 * @param value - Column name or operand.
 * @returns A function node rendering `UPPER(value)`.
 *
 * @example
 * upper(employee.column('store_location'));
 */
export const upper = (value: OperandInput): FunctionNode => fn('UPPER', value);

/**
 * Converts a string to lowercase.
 *
 * @param value - Column name or operand.
 * @returns A function node rendering `LOWER(value)`.
 *
 * @example
 * lower('email');
 */
export const lower = (value: OperandInput): FunctionNode => fn('LOWER', value);

/**
 * Removes leading and trailing whitespace.
 */
export const trim = (value: OperandInput): FunctionNode => fn('TRIM', value);

/**
 * Returns the length of a string.
 */
export const length = (value: OperandInput): FunctionNode => fn('LENGTH', value);
