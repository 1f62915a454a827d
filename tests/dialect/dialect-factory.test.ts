import { afterEach, describe, expect, it } from 'vitest';
import { DialectFactory, resolveDialectInput } from '../../src/core/dialect/dialect-factory.js';
import { createDialect } from '../../src/core/dialect/rule-based.js';
import { SQLITE_RULES, SqliteDialect } from '../../src/core/dialect/sqlite/index.js';
import { MySqlDialect } from '../../src/core/dialect/mysql/index.js';
import { OracleDialect } from '../../src/core/dialect/oracle/index.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { UnsupportedDialectError } from '../../src/core/errors.js';
import { SelectQueryBuilder } from '../../src/query-builder/select.js';

describe('DialectFactory', () => {
  afterEach(() => {
    DialectFactory.clear();
  });

  it('registers the built-in dialects lazily', () => {
    expect(DialectFactory.create('mysql')).toBeInstanceOf(MySqlDialect);
    expect(DialectFactory.create('postgres')).toBeInstanceOf(PostgresDialect);
    expect(DialectFactory.create('sqlite')).toBeInstanceOf(SqliteDialect);
    expect(DialectFactory.create('oracle')).toBeInstanceOf(OracleDialect);
    expect(DialectFactory.keys()).toEqual(['postgres', 'mysql', 'sqlite', 'oracle']);
  });

  it('throws UnsupportedDialectError for unknown keys instead of falling back', () => {
    expect(DialectFactory.has('informix')).toBe(false);
    expect(() => DialectFactory.create('informix')).toThrow(UnsupportedDialectError);
    expect(() => new SelectQueryBuilder('informix')).toThrow(
      'Dialect "informix" is not registered. Use DialectFactory.register(...) to register it.'
    );
  });

  it('makes registered dialects available by key', () => {
    DialectFactory.register('legacy', () =>
      createDialect({
        ...SQLITE_RULES,
        name: 'legacy',
        capabilities: { supportsOffset: false, supportedJoins: ['INNER'] }
      })
    );

    expect(DialectFactory.has('legacy')).toBe(true);
    expect(new SelectQueryBuilder('legacy').select('a').from('t').build()).toBe('SELECT "a" FROM "t"');
  });

  it('lets a registration override a built-in key', () => {
    DialectFactory.register('sqlite', () => createDialect({ ...SQLITE_RULES, name: 'sqlite_custom' }));
    expect(DialectFactory.create('sqlite').name).toBe('sqlite_custom');
  });

  it('drops custom registrations on clear() but restores the built-ins', () => {
    DialectFactory.register('legacy', () => createDialect({ ...SQLITE_RULES, name: 'legacy' }));
    DialectFactory.clear();

    expect(DialectFactory.has('legacy')).toBe(false);
    expect(DialectFactory.has('mysql')).toBe(true);
  });

  it('resolveDialectInput passes instances through', () => {
    const dialect = new OracleDialect();
    expect(resolveDialectInput(dialect)).toBe(dialect);
    expect(resolveDialectInput('oracle')).toBeInstanceOf(OracleDialect);
  });
});
