// Pure AST Builders - No Dialect Logic Here!

import { FunctionNode, OperandInput, toOperand } from '../ast/expression.js';

const nfn = (key: string, value: OperandInput): FunctionNode => ({
  type: 'Function',
  name: key,
  args: [toOperand(value)]
});

/**
 * Returns the absolute value of a number.
 *
 * @param value - Column name or operand.
 * @returns A function node rendering `ABS(value)`.
 *
 * @example
 * abs(transactions.column('amount'));
 */
export const abs = (value: OperandInput): FunctionNode => nfn('ABS', value);

/**
 * Returns the square root of a number.
 *
 * @example
 * sqrt('area');
 */
export const sqrt = (value: OperandInput): FunctionNode => nfn('SQRT', value);

/**
 * Rounds a number up to the nearest integer.
 */
export const ceil = (value: OperandInput): FunctionNode => nfn('CEIL', value);

/**
 * Rounds a number down to the nearest integer.
 */
export const floor = (value: OperandInput): FunctionNode => nfn('FLOOR', value);

/**
 * Rounds a number to the nearest integer.
 */
export const round = (value: OperandInput): FunctionNode => nfn('ROUND', value);

export const sign = (value: OperandInput): FunctionNode => nfn('SIGN', value);
