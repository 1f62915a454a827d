import type { ConditionNode, OperandNode } from './expression-nodes.js';

/**
 * Structural equality of two operands: same variant, same fields,
 * recursively over function arguments. Object identity is irrelevant.
 */
export const expressionsEqual = (a: OperandNode, b: OperandNode): boolean => {
  switch (a.type) {
    case 'Column':
      return b.type === 'Column' && a.name === b.name && a.table === b.table && a.alias === b.alias;
    case 'Literal':
      return b.type === 'Literal' && Object.is(a.value, b.value) && a.alias === b.alias;
    case 'AliasRef':
      return b.type === 'AliasRef' && a.name === b.name;
    case 'Function':
      return (
        b.type === 'Function' &&
        a.name === b.name &&
        a.alias === b.alias &&
        a.args.length === b.args.length &&
        a.args.every((arg, i) => expressionsEqual(arg, b.args[i]))
      );
  }
};

/**
 * Structural equality of two condition trees
 */
export const conditionsEqual = (a: ConditionNode, b: ConditionNode): boolean => {
  if (a.type === 'Comparison') {
    return (
      b.type === 'Comparison' &&
      a.operator === b.operator &&
      expressionsEqual(a.left, b.left) &&
      expressionsEqual(a.right, b.right)
    );
  }
  return (
    b.type === 'Logical' &&
    a.operator === b.operator &&
    conditionsEqual(a.left, b.left) &&
    conditionsEqual(a.right, b.right)
  );
};

/**
 * Whether a structurally equal operand already appears in the list
 */
export const containsExpression = (list: readonly OperandNode[], candidate: OperandNode): boolean =>
  list.some(item => expressionsEqual(item, candidate));
