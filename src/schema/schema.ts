import { assertIdentifier } from '../core/ast/identifier.js';
import { Dialect } from '../core/dialect/abstract.js';
import { DialectKey, resolveDialectInput } from '../core/dialect/dialect-factory.js';
import { UnknownFieldError, UnsupportedDialectError } from '../core/errors.js';
import { Env, DIALECT_ENV_VAR, resolveDefaultDialect } from '../config/env.js';
import { QueryLogger } from '../query-builder/query-logger.js';
import { Table } from './table.js';

/**
 * A table declared inside a schema, with its fields
 */
export interface TableSpec {
  name: string;
  fields?: readonly string[];
}

export interface SchemaOptions {
  /** Dialect instance or key; falls back to QUILLSQL_DIALECT */
  dialect?: Dialect | DialectKey;
  logger?: QueryLogger;
  /** Environment to read the fallback dialect from (defaults to process.env) */
  env?: Env;
}

const toSpec = (entry: string | TableSpec): TableSpec =>
  typeof entry === 'string' ? { name: entry } : entry;

/**
 * Groups tables under one schema name and one dialect.
 *
 * @example
 * ```typescript
 * const hr = new Schema('hr', [{ name: 'employee', fields: ['id', 'salary'] }], { dialect: 'oracle' });
 * hr.table('employee').select('salary').build();
 * // SELECT "salary" FROM "hr"."employee"
 * ```
 */
export class Schema {
  readonly name: string;
  private readonly dialect: Dialect;
  private readonly tableMap = new Map<string, Table>();

  constructor(name: string, tables: readonly (string | TableSpec)[], options: SchemaOptions = {}) {
    this.name = assertIdentifier(name, 'schema');
    const dialect = options.dialect ?? resolveDefaultDialect(options.env);
    if (dialect === undefined) {
      throw new UnsupportedDialectError(
        undefined,
        `No dialect configured for schema "${name}". Pass one explicitly or set ${DIALECT_ENV_VAR}.`
      );
    }
    this.dialect = resolveDialectInput(dialect);

    for (const entry of tables.map(toSpec)) {
      this.tableMap.set(
        entry.name,
        new Table(entry.name, entry.fields ?? [], {
          schema: this.name,
          dialect: this.dialect,
          logger: options.logger
        })
      );
    }
  }

  get dialectName(): string {
    return this.dialect.name;
  }

  get tables(): Table[] {
    return [...this.tableMap.values()];
  }

  /**
   * Looks a table up by name.
   * @throws UnknownFieldError when the schema has no such table
   */
  table(name: string): Table {
    const table = this.tableMap.get(name);
    if (!table) {
      throw new UnknownFieldError(this.name, name);
    }
    return table;
  }
}
