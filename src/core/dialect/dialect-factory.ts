// Dialect factory for the SQL builder.
// Centralizes how we go from a symbolic name ("postgres") to a concrete Dialect instance.

import { Dialect } from './abstract.js';
import { PostgresDialect } from './postgres/index.js';
import { MySqlDialect } from './mysql/index.js';
import { SqliteDialect } from './sqlite/index.js';
import { OracleDialect } from './oracle/index.js';
import { UnsupportedDialectError } from '../errors.js';
import { DialectName, SUPPORTED_DIALECTS } from '../sql/sql.js';

export type DialectKey = DialectName | (string & {}); // allow user-defined keys without constraining too much

type DialectFactoryFn = () => Dialect;

export class DialectFactory {
  private static registry = new Map<DialectKey, DialectFactoryFn>();
  private static defaultsInitialized = false;

  private static ensureDefaults(): void {
    if (this.defaultsInitialized) return;
    this.defaultsInitialized = true;

    // Register built-in dialects only if no override exists yet.
    if (!this.registry.has(SUPPORTED_DIALECTS.POSTGRES)) {
      this.registry.set(SUPPORTED_DIALECTS.POSTGRES, () => new PostgresDialect());
    }
    if (!this.registry.has(SUPPORTED_DIALECTS.MYSQL)) {
      this.registry.set(SUPPORTED_DIALECTS.MYSQL, () => new MySqlDialect());
    }
    if (!this.registry.has(SUPPORTED_DIALECTS.SQLITE)) {
      this.registry.set(SUPPORTED_DIALECTS.SQLITE, () => new SqliteDialect());
    }
    if (!this.registry.has(SUPPORTED_DIALECTS.ORACLE)) {
      this.registry.set(SUPPORTED_DIALECTS.ORACLE, () => new OracleDialect());
    }
  }

  /**
   * Register (or override) a dialect factory for a key.
   *
   * Examples:
   *   DialectFactory.register('sqlite', () => new SqliteDialect());
   *   DialectFactory.register('my-tenant-dialect', () => createDialect(rules));
   */
  public static register(key: DialectKey, factory: DialectFactoryFn): void {
    this.registry.set(key, factory);
  }

  public static has(key: DialectKey): boolean {
    this.ensureDefaults();
    return this.registry.has(key);
  }

  /**
   * Keys currently resolvable, built-ins included.
   */
  public static keys(): DialectKey[] {
    this.ensureDefaults();
    return [...this.registry.keys()];
  }

  /**
   * Resolve a key into a Dialect instance.
   * @throws UnsupportedDialectError if the key is not registered
   */
  public static create(key: DialectKey): Dialect {
    this.ensureDefaults();
    const factory = this.registry.get(key);
    if (!factory) {
      throw new UnsupportedDialectError(String(key));
    }
    return factory();
  }

  /**
   * Clear all registrations (mainly for tests).
   * Built-ins will be re-registered lazily on the next create().
   */
  public static clear(): void {
    this.registry.clear();
    this.defaultsInitialized = false;
  }
}

/**
 * Helper to normalize either a Dialect instance OR a key into a Dialect instance.
 * This is what query builders use.
 */
export const resolveDialectInput = (dialect: Dialect | DialectKey): Dialect => {
  if (typeof dialect === 'string') {
    return DialectFactory.create(dialect);
  }
  return dialect;
};
