import { ColumnNode, ConditionNode, OperandInput } from '../core/ast/expression.js';
import { assertIdentifier } from '../core/ast/identifier.js';
import { TableNode, tableNode } from '../core/ast/query.js';
import { Dialect } from '../core/dialect/abstract.js';
import { DialectKey, resolveDialectInput } from '../core/dialect/dialect-factory.js';
import { UnknownFieldError } from '../core/errors.js';
import { OrderDirection } from '../core/sql/sql.js';
import { JoinTypeInput, SelectQueryBuilder, TableInput } from '../query-builder/select.js';
import { QueryLogger } from '../query-builder/query-logger.js';

export interface TableOptions {
  /** Optional schema the table lives in */
  schema?: string;
  /** Dialect instance or registered dialect key */
  dialect: Dialect | DialectKey;
  /** Passed on to every builder the table starts */
  logger?: QueryLogger;
}

/**
 * A named table with a known set of fields.
 *
 * Hands out column handles qualified by the table name and starts
 * a fresh {@link SelectQueryBuilder} with this table as the source
 * for every query method.
 *
 * @example
 * ```typescript
 * const employee = new Table('employee', ['id', 'salary'], { dialect: 'postgres' });
 * employee.select('salary').where(gt(employee.column('salary'), 1000)).build();
 * // SELECT "salary" FROM "employee" WHERE salary > 1000
 * ```
 */
export class Table {
  readonly name: string;
  readonly schema?: string;
  private readonly dialect: Dialect;
  private readonly logger?: QueryLogger;
  private fieldSet: ReadonlySet<string>;

  constructor(name: string, fields: readonly string[], options: TableOptions) {
    this.name = assertIdentifier(name, 'table');
    this.schema = options.schema === undefined ? undefined : assertIdentifier(options.schema, 'schema');
    this.dialect = resolveDialectInput(options.dialect);
    this.logger = options.logger;
    this.fieldSet = Table.toFieldSet(fields);
  }

  get fields(): string[] {
    return [...this.fieldSet];
  }

  get dialectName(): string {
    return this.dialect.name;
  }

  /**
   * Replaces the whole field set. Handles for fields that are gone
   * can no longer be obtained through column().
   */
  setFields(fields: readonly string[]): void {
    this.fieldSet = Table.toFieldSet(fields);
  }

  hasField(name: string): boolean {
    return this.fieldSet.has(name);
  }

  /**
   * Returns a handle for one field, qualified by this table's name.
   * @throws UnknownFieldError when the field is not declared
   */
  column(name: string): ColumnNode {
    if (!this.fieldSet.has(name)) {
      throw new UnknownFieldError(this.name, name);
    }
    return { type: 'Column', table: this.name, name };
  }

  ref(alias?: string): TableNode {
    return tableNode({ name: this.name, schema: this.schema, alias });
  }

  select(...columns: OperandInput[]): SelectQueryBuilder {
    return this.query().select(...columns);
  }

  where(condition: ConditionNode): SelectQueryBuilder {
    return this.query().where(condition);
  }

  join(table: TableInput, kind: JoinTypeInput, condition: ConditionNode): SelectQueryBuilder {
    return this.query().join(table, kind, condition);
  }

  innerJoin(table: TableInput, condition: ConditionNode): SelectQueryBuilder {
    return this.query().innerJoin(table, condition);
  }

  leftJoin(table: TableInput, condition: ConditionNode): SelectQueryBuilder {
    return this.query().leftJoin(table, condition);
  }

  rightJoin(table: TableInput, condition: ConditionNode): SelectQueryBuilder {
    return this.query().rightJoin(table, condition);
  }

  fullJoin(table: TableInput, condition: ConditionNode): SelectQueryBuilder {
    return this.query().fullJoin(table, condition);
  }

  groupBy(...terms: OperandInput[]): SelectQueryBuilder {
    return this.query().groupBy(...terms);
  }

  having(condition: ConditionNode): SelectQueryBuilder {
    return this.query().having(condition);
  }

  orderBy(term: OperandInput, direction?: OrderDirection): SelectQueryBuilder {
    return this.query().orderBy(term, direction);
  }

  /**
   * Starts a query on this table under an alias.
   * Handles from column() still carry the table name, not the alias.
   */
  as(alias: string): SelectQueryBuilder {
    return this.query().as(alias);
  }

  /**
   * Starts an empty query with this table as the source.
   */
  query(): SelectQueryBuilder {
    return new SelectQueryBuilder(this.dialect, { logger: this.logger }).from(this);
  }

  private static toFieldSet(fields: readonly string[]): ReadonlySet<string> {
    return new Set(fields.map(field => assertIdentifier(field, 'column')));
  }
}

/**
 * Creates a table facade
 * @param name - Table name
 * @param fields - Field names
 * @param options - Schema, dialect and logger
 */
export const defineTable = (name: string, fields: readonly string[], options: TableOptions): Table =>
  new Table(name, fields, options);
