import { describe, expect, it } from 'vitest';
import { SelectQueryBuilder } from '../../src/query-builder/select.js';
import { column, eq } from '../../src/core/ast/expression.js';
import type { SelectQueryNode } from '../../src/core/ast/query.js';
import { STANDARD_JOIN_KEYWORDS } from '../../src/core/dialect/abstract.js';
import { createDialect } from '../../src/core/dialect/rule-based.js';
import { MySqlDialect } from '../../src/core/dialect/mysql/index.js';
import { POSTGRES_RULES, PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { SQLITE_RULES, SqliteDialect } from '../../src/core/dialect/sqlite/index.js';
import { OracleDialect } from '../../src/core/dialect/oracle/index.js';
import { IncompleteQueryError, UnsupportedCapabilityError } from '../../src/core/errors.js';

const onPayroll = eq(column('payroll', 'id'), column('employee', 'payroll_id'));

const baseAst = (overrides: Partial<SelectQueryNode> = {}): SelectQueryNode => ({
  type: 'SelectQuery',
  from: { type: 'Table', name: 't' },
  columns: [],
  joins: [],
  groupBy: [],
  orderBy: [],
  ...overrides
});

describe('built-in dialects', () => {
  it.each([
    ['mysql', 'SELECT `c1`,`c2` FROM `t`'],
    ['postgres', 'SELECT "c1","c2" FROM "t"'],
    ['sqlite', 'SELECT "c1","c2" FROM "t"'],
    ['oracle', 'SELECT "c1","c2" FROM "t"']
  ])('%s quotes identifiers in the select list and source', (key, expected) => {
    expect(new SelectQueryBuilder(key).select('c1', 'c2').from('t').build()).toBe(expected);
  });

  it('renders schema-qualified and aliased sources', () => {
    const sql = new SelectQueryBuilder(new PostgresDialect())
      .from({ name: 'employee', schema: 'hr', alias: 'e' })
      .build();
    expect(sql).toBe('SELECT * FROM "hr"."employee" AS "e"');
  });

  it('reports join support per dialect', () => {
    expect(new MySqlDialect().supportsJoin('FULL')).toBe(false);
    expect(new MySqlDialect().supportsJoin('RIGHT')).toBe(true);
    expect(new PostgresDialect().supportsJoin('FULL')).toBe(true);
    expect(new SqliteDialect().supportsJoin('FULL')).toBe(true);
    expect(new OracleDialect().supportsJoin('FULL')).toBe(true);
  });

  it('renders FULL joins where supported', () => {
    const sql = new SelectQueryBuilder('sqlite').from('employee').fullJoin('payroll', onPayroll).build();
    expect(sql).toBe('SELECT * FROM "employee" FULL JOIN "payroll" ON payroll.id = employee.payroll_id');
  });

  it('rejects FULL joins on mysql at the call', () => {
    const qb = new SelectQueryBuilder('mysql').from('employee');
    expect(() => qb.fullJoin('payroll', onPayroll)).toThrow(UnsupportedCapabilityError);
    expect(() => qb.join('payroll', 'full', onPayroll)).toThrow(
      'FULL JOIN is not supported by the mysql dialect.'
    );
  });

  it('re-checks capabilities when compiling a hand-built AST', () => {
    const ast = baseAst({
      joins: [{ type: 'Join', kind: 'FULL', table: { type: 'Table', name: 'payroll' }, condition: onPayroll }]
    });
    expect(() => new MySqlDialect().compileSelect(ast)).toThrow(UnsupportedCapabilityError);
  });

  it('requires a source table', () => {
    expect(() => new SqliteDialect().compileSelect(baseAst({ from: undefined }))).toThrow(IncompleteQueryError);
  });
});

describe('string literals', () => {
  const quoteAndBackslash = "\\' OR 1=1 -- ";

  it('doubles backslashes as well as quotes on mysql', () => {
    const sql = new SelectQueryBuilder('mysql').from('t').where(eq('name', quoteAndBackslash)).build();
    expect(sql).toBe("SELECT * FROM `t` WHERE name = '\\\\'' OR 1=1 -- '");
  });

  it('keeps backslashes as they are where they are not escapes', () => {
    const sql = new SelectQueryBuilder('postgres').from('t').where(eq('path', 'C:\\tmp')).build();
    expect(sql).toBe("SELECT * FROM \"t\" WHERE path = 'C:\\tmp'");
  });

  it('follows the backslashEscapes rule of a custom dialect', () => {
    const escaping = createDialect({ ...POSTGRES_RULES, name: 'pg_escaping', backslashEscapes: true });
    expect(escaping.compileCondition(eq('path', 'C:\\tmp'))).toBe("path = 'C:\\\\tmp'");
  });
});

describe('pagination', () => {
  it('uses LIMIT/OFFSET for mysql, postgres and sqlite', () => {
    expect(new SelectQueryBuilder('mysql').from('t').limit(10).offset(20).build()).toBe(
      'SELECT * FROM `t` LIMIT 10 OFFSET 20'
    );
    expect(new SelectQueryBuilder('postgres').from('t').limit(10).build()).toBe('SELECT * FROM "t" LIMIT 10');
    expect(new SelectQueryBuilder('sqlite').from('t').offset(5).build()).toBe('SELECT * FROM "t" OFFSET 5');
  });

  it('uses the row limiting clause for oracle', () => {
    expect(new SelectQueryBuilder('oracle').from('t').limit(10).offset(20).build()).toBe(
      'SELECT * FROM "t" OFFSET 20 ROWS FETCH NEXT 10 ROWS ONLY'
    );
    expect(new SelectQueryBuilder('oracle').from('t').limit(10).build()).toBe(
      'SELECT * FROM "t" FETCH FIRST 10 ROWS ONLY'
    );
    expect(new SelectQueryBuilder('oracle').from('t').offset(5).build()).toBe('SELECT * FROM "t" OFFSET 5 ROWS');
  });
});

describe('createDialect', () => {
  const legacy = createDialect({
    ...SQLITE_RULES,
    name: 'legacy',
    capabilities: { supportsOffset: false, supportedJoins: ['INNER', 'LEFT'] }
  });

  it('builds a working dialect from rules alone', () => {
    expect(legacy.name).toBe('legacy');
    expect(new SelectQueryBuilder(legacy).select('a').from('t').limit(3).build()).toBe('SELECT "a" FROM "t" LIMIT 3');
  });

  it('enforces supportsOffset = false at the call and at compile time', () => {
    expect(() => new SelectQueryBuilder(legacy).from('t').offset(1)).toThrow(
      'OFFSET is not supported by the legacy dialect.'
    );
    expect(() => legacy.compileSelect(baseAst({ offset: 1 }))).toThrow(UnsupportedCapabilityError);
  });

  it('enforces the supported join set', () => {
    expect(() => new SelectQueryBuilder(legacy).from('employee').rightJoin('payroll', onPayroll)).toThrow(
      'RIGHT JOIN is not supported by the legacy dialect.'
    );
  });

  it('uses custom quote characters and join keywords', () => {
    const bracketed = createDialect({
      ...POSTGRES_RULES,
      name: 'bracketed',
      identifierQuote: { open: '[', close: ']' },
      joinKeywords: { ...STANDARD_JOIN_KEYWORDS, LEFT: 'LEFT OUTER JOIN' }
    });
    const sql = new SelectQueryBuilder(bracketed).select('c1').from('employee').leftJoin('payroll', onPayroll).build();
    expect(sql).toBe('SELECT [c1] FROM [employee] LEFT OUTER JOIN [payroll] ON payroll.id = employee.payroll_id');
  });
});
