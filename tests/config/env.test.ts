import { describe, expect, it } from 'vitest';
import { DIALECT_ENV_VAR, resolveDefaultDialect } from '../../src/config/env.js';

describe('resolveDefaultDialect', () => {
  it('reads, trims and lower-cases the variable', () => {
    expect(resolveDefaultDialect({ [DIALECT_ENV_VAR]: '  PostgreS\n' })).toBe('postgres');
  });

  it('returns undefined when unset or blank', () => {
    expect(resolveDefaultDialect({})).toBeUndefined();
    expect(resolveDefaultDialect({ QUILLSQL_DIALECT: '' })).toBeUndefined();
    expect(resolveDefaultDialect({ QUILLSQL_DIALECT: '   ' })).toBeUndefined();
  });

  it('ignores unrelated variables', () => {
    expect(resolveDefaultDialect({ DIALECT: 'mysql' })).toBeUndefined();
  });
});
