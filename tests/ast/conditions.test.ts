import { describe, expect, it } from 'vitest';
import {
  aliasRef,
  and,
  column,
  conditionsEqual,
  eq,
  gt,
  gte,
  lt,
  lte,
  max,
  neq,
  or
} from '../../src/core/ast/expression.js';
import { upper } from '../../src/core/functions/text.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { MySqlDialect } from '../../src/core/dialect/mysql/index.js';

const dialect = new PostgresDialect();
const render = dialect.compileCondition.bind(dialect);

const a = gt('x', 1);
const b = lt('y', 2);
const c = eq('z', 3);

describe('comparisons', () => {
  it('renders every comparison operator', () => {
    expect(render(eq('a', 1))).toBe('a = 1');
    expect(render(neq('a', 1))).toBe('a <> 1');
    expect(render(gt('a', 1))).toBe('a > 1');
    expect(render(gte('a', 1))).toBe('a >= 1');
    expect(render(lt('a', 1))).toBe('a < 1');
    expect(render(lte('a', 1))).toBe('a <= 1');
  });

  it('renders a table column against a literal by its bare name', () => {
    expect(render(gt(column('employee', 'salary'), 1000))).toBe('salary > 1000');
  });

  it('qualifies both sides of a column-to-column comparison', () => {
    expect(render(eq(column('payroll', 'id'), column('employee', 'payroll_id')))).toBe(
      'payroll.id = employee.payroll_id'
    );
    expect(render(eq(column('id'), column('employee', 'payroll_id')))).toBe('id = employee.payroll_id');
  });

  it('renders literals inline', () => {
    expect(render(eq('name', "O'Brien"))).toBe("name = 'O''Brien'");
    expect(render(eq('active', true))).toBe('active = TRUE');
    expect(render(eq('active', false))).toBe('active = FALSE');
    expect(render(eq('deleted_at', null))).toBe('deleted_at = NULL');
    expect(render(gt('ratio', 0.5))).toBe('ratio > 0.5');
    expect(render(gt('delta', -3))).toBe('delta > -3');
  });

  it('renders functions and alias references as operands', () => {
    expect(render(gt(max('salary'), 100))).toBe('MAX(salary) > 100');
    expect(render(eq(upper(column('employee', 'name')), 'BOB'))).toBe("UPPER(name) = 'BOB'");
    expect(render(gt(aliasRef('total'), 5))).toBe('total > 5');
  });

  it('leaves identifiers unquoted in every dialect', () => {
    expect(new MySqlDialect().compileCondition(gt('salary', 1000))).toBe('salary > 1000');
  });
});

describe('logical combination', () => {
  it('folds variadic and() strictly left to right', () => {
    expect(and(a, b, c)).toEqual({
      type: 'Logical',
      operator: 'AND',
      left: { type: 'Logical', operator: 'AND', left: a, right: b },
      right: c
    });
  });

  it('does not wrap a same-operator child on the left', () => {
    expect(render(and(a, b, c))).toBe('x > 1 AND y < 2 AND z = 3');
    expect(render(or(a, b, c))).toBe('x > 1 OR y < 2 OR z = 3');
  });

  it('wraps a logical child on the right to keep the tree shape', () => {
    expect(render(and(a, and(b, c)))).toBe('x > 1 AND (y < 2 AND z = 3)');
  });

  it('wraps children with a different operator', () => {
    expect(render(or(and(a, b), c))).toBe('(x > 1 AND y < 2) OR z = 3');
    expect(render(and(a, or(b, c)))).toBe('x > 1 AND (y < 2 OR z = 3)');
  });

  it('creates new nodes and leaves operands untouched', () => {
    const combined = and(a, b);
    expect(combined.left).toBe(a);
    expect(a).toEqual({
      type: 'Comparison',
      operator: '>',
      left: { type: 'Column', name: 'x' },
      right: { type: 'Literal', value: 1 }
    });
  });

  it('compares condition trees structurally', () => {
    expect(conditionsEqual(and(gt('x', 1), lt('y', 2)), and(a, b))).toBe(true);
    expect(conditionsEqual(and(a, b), or(a, b))).toBe(false);
    expect(conditionsEqual(and(a, b, c), and(a, and(b, c)))).toBe(false);
  });
});
