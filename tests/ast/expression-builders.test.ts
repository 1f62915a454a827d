import { describe, expect, it } from 'vitest';
import {
  alias,
  aliasRef,
  call,
  column,
  literal,
  toOperand,
  toValueOperand
} from '../../src/core/ast/expression-builders.js';
import {
  containsExpression,
  eq,
  expressionsEqual,
  isColumnNode,
  isConditionNode,
  isFunctionNode,
  isOperandNode,
  max
} from '../../src/core/ast/expression.js';
import { InvalidIdentifierError } from '../../src/core/errors.js';

describe('expression builders', () => {
  it('creates bare and table-qualified columns', () => {
    expect(column('salary')).toEqual({ type: 'Column', name: 'salary' });
    expect(column('employee', 'salary')).toEqual({ type: 'Column', table: 'employee', name: 'salary' });
  });

  it('rejects names outside the identifier rules', () => {
    expect(() => column('1st')).toThrow(InvalidIdentifierError);
    expect(() => column('employee', 'sal ary')).toThrow('Invalid column name "sal ary"');
    expect(() => column('emp-loyee', 'salary')).toThrow('Invalid table name "emp-loyee"');
    expect(() => aliasRef('a"b')).toThrow(InvalidIdentifierError);
  });

  it('accepts underscores and dollar signs after the first character', () => {
    expect(column('_tmp$1').name).toBe('_tmp$1');
  });

  it('creates literals and refuses non-finite numbers', () => {
    expect(literal('x')).toEqual({ type: 'Literal', value: 'x' });
    expect(literal(null)).toEqual({ type: 'Literal', value: null });
    expect(() => literal(Number.NaN)).toThrow(RangeError);
    expect(() => literal(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });

  it('upper-cases function names in call()', () => {
    const node = call('coalesce', ['nickname', literal('n/a')]);
    expect(node).toEqual({
      type: 'Function',
      name: 'COALESCE',
      args: [
        { type: 'Column', name: 'nickname' },
        { type: 'Literal', value: 'n/a' }
      ]
    });
  });

  it('alias() copies the expression and leaves the original untouched', () => {
    const original = column('employee', 'salary');
    const aliased = alias(original, 'pay');

    expect(aliased).toEqual({ type: 'Column', table: 'employee', name: 'salary', alias: 'pay' });
    expect(original.alias).toBeUndefined();
    expect(aliased).not.toBe(original);
  });

  it('alias() turns a bare string into an aliased column', () => {
    expect(alias('salary', 'pay')).toEqual({ type: 'Column', name: 'salary', alias: 'pay' });
  });

  it('toOperand reads strings as columns, toValueOperand reads them as literals', () => {
    expect(toOperand('salary')).toEqual({ type: 'Column', name: 'salary' });
    expect(toValueOperand('salary')).toEqual({ type: 'Literal', value: 'salary' });
    expect(toValueOperand(false)).toEqual({ type: 'Literal', value: false });

    const node = column('salary');
    expect(toOperand(node)).toBe(node);
    expect(toValueOperand(node)).toBe(node);
  });
});

describe('expressionsEqual', () => {
  it('compares structurally, not by identity', () => {
    expect(expressionsEqual(column('t', 'a'), column('t', 'a'))).toBe(true);
    expect(expressionsEqual(max('salary'), max('salary'))).toBe(true);
  });

  it('distinguishes variants and fields', () => {
    expect(expressionsEqual(column('a'), column('t', 'a'))).toBe(false);
    expect(expressionsEqual(column('a'), aliasRef('a'))).toBe(false);
    expect(expressionsEqual(literal(1), literal('1'))).toBe(false);
    expect(expressionsEqual(max('salary'), max('bonus'))).toBe(false);
    expect(expressionsEqual(alias(max('salary'), 'top'), max('salary'))).toBe(false);
  });

  it('finds structurally equal members of a list', () => {
    const list = [column('a'), max('b')];
    expect(containsExpression(list, max('b'))).toBe(true);
    expect(containsExpression(list, column('c'))).toBe(false);
  });
});

describe('node guards', () => {
  it('recognizes operand and condition nodes', () => {
    expect(isOperandNode(column('a'))).toBe(true);
    expect(isOperandNode(eq('a', 1))).toBe(false);
    expect(isOperandNode('a')).toBe(false);
    expect(isOperandNode(null)).toBe(false);
    expect(isColumnNode(column('a'))).toBe(true);
    expect(isFunctionNode(max('a'))).toBe(true);
    expect(isFunctionNode(column('a'))).toBe(false);
    expect(isConditionNode(eq('a', 1))).toBe(true);
    expect(isConditionNode(literal(1))).toBe(false);
  });
});
