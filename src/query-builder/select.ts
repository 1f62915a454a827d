import { SelectQueryNode, TableNode, tableNode } from '../core/ast/query.js';
import { ConditionNode, OperandInput, TableRef, toOperand } from '../core/ast/expression.js';
import { assertIdentifier } from '../core/ast/identifier.js';
import { createJoinNode } from '../core/ast/join.js';
import { Dialect } from '../core/dialect/abstract.js';
import { DialectKey, resolveDialectInput } from '../core/dialect/dialect-factory.js';
import { JOIN_KINDS, JoinKind, OrderDirection, isJoinKind } from '../core/sql/sql.js';
import { IncompleteQueryError, InvalidJoinTypeError } from '../core/errors.js';
import { SelectQueryState } from './select-query-state.js';
import { QueryLogger, logQuery } from './query-logger.js';

/**
 * Anything that can hand out a table reference node (e.g. the Table facade)
 */
export interface TableSource {
  ref(): TableNode;
}

/**
 * Accepted wherever a source or join target is expected
 */
export type TableInput = string | TableRef | TableSource;

/**
 * Join kind as accepted by join(); case-insensitive and checked at runtime
 */
export type JoinTypeInput = JoinKind | Lowercase<JoinKind> | (string & {});

export interface SelectQueryBuilderOptions {
  /** Receives every SQL string produced by build() */
  logger?: QueryLogger;
}

const JOIN_KIND_LIST: readonly JoinKind[] = Object.values(JOIN_KINDS);

const toTableNode = (input: TableInput): TableNode => {
  if (typeof input === 'string') return tableNode(input);
  if ('ref' in input) return input.ref();
  return tableNode(input);
};

const normalizeJoinKind = (kind: JoinTypeInput): JoinKind => {
  const normalized = kind.trim().toUpperCase();
  if (!isJoinKind(normalized)) {
    throw new InvalidJoinTypeError(kind, JOIN_KIND_LIST);
  }
  return normalized;
};

const assertNonNegativeInteger = (value: number, clause: string): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${clause} expects a non-negative integer, received ${value}`);
  }
  return value;
};

/**
 * Fluent builder for SQL SELECT statements bound to one dialect.
 *
 * Each call records its clause and returns the same builder; `build()` renders
 * the current query without resetting it, so the builder can keep being extended.
 *
 * @example
 * ```typescript
 * new SelectQueryBuilder('mysql').select('c1', 'c2').from('t').build();
 * // SELECT `c1`,`c2` FROM `t`
 * ```
 */
export class SelectQueryBuilder {
  private state: SelectQueryState;
  private readonly dialect: Dialect;
  private readonly logger?: QueryLogger;

  /**
   * Creates a new SelectQueryBuilder instance
   * @param dialect - Dialect instance or registered dialect key
   * @param options - Builder options
   * @throws UnsupportedDialectError when the key is not registered
   */
  constructor(dialect: Dialect | DialectKey, options: SelectQueryBuilderOptions = {}) {
    this.dialect = resolveDialectInput(dialect);
    this.logger = options.logger;
    this.state = new SelectQueryState();
  }

  /**
   * Name of the dialect this builder renders for
   */
  get dialectName(): string {
    return this.dialect.name;
  }

  /**
   * Appends columns to the projection. Strings name columns.
   * Calling with no arguments leaves the projection empty, which renders as `*`.
   */
  select(...columns: OperandInput[]): this {
    this.state = this.state.withColumns(columns.map(toOperand));
    return this;
  }

  /**
   * Sets the source table; a later call replaces the earlier one.
   */
  from(table: TableInput): this {
    this.state = this.state.withFrom(toTableNode(table));
    return this;
  }

  /**
   * Applies an alias to the source table.
   * Column handles keep the table name as their qualifier, not the alias.
   * @throws IncompleteQueryError when no source is set yet
   */
  as(alias: string): this {
    const from = this.state.ast.from;
    if (!from) {
      throw new IncompleteQueryError('Cannot alias a query without a source table. Call from(...) first.');
    }
    this.state = this.state.withFrom({ ...from, alias: assertIdentifier(alias, 'alias') });
    return this;
  }

  /**
   * Appends a join.
   * @param table - Table to join
   * @param kind - INNER, LEFT, RIGHT or FULL (any case)
   * @param condition - ON condition
   * @throws InvalidJoinTypeError for kinds outside that set
   * @throws UnsupportedCapabilityError when the dialect cannot express the kind
   */
  join(table: TableInput, kind: JoinTypeInput, condition: ConditionNode): this {
    const joinKind = normalizeJoinKind(kind);
    this.dialect.assertJoinSupported(joinKind);
    this.state = this.state.withJoin(createJoinNode(joinKind, toTableNode(table), condition));
    return this;
  }

  innerJoin(table: TableInput, condition: ConditionNode): this {
    return this.join(table, JOIN_KINDS.INNER, condition);
  }

  leftJoin(table: TableInput, condition: ConditionNode): this {
    return this.join(table, JOIN_KINDS.LEFT, condition);
  }

  rightJoin(table: TableInput, condition: ConditionNode): this {
    return this.join(table, JOIN_KINDS.RIGHT, condition);
  }

  fullJoin(table: TableInput, condition: ConditionNode): this {
    return this.join(table, JOIN_KINDS.FULL, condition);
  }

  /**
   * Sets the WHERE predicate. A second call replaces the first;
   * combine conditions with and()/or() before passing them.
   */
  where(condition: ConditionNode): this {
    this.state = this.state.withWhere(condition);
    return this;
  }

  /**
   * Appends GROUP BY terms in call order. Duplicates are kept.
   */
  groupBy(...terms: OperandInput[]): this {
    this.state = this.state.withGroupBy(terms.map(toOperand));
    return this;
  }

  /**
   * Sets the HAVING predicate, replacing any previous one.
   */
  having(condition: ConditionNode): this {
    this.state = this.state.withHaving(condition);
    return this;
  }

  /**
   * Appends an ORDER BY term.
   */
  orderBy(term: OperandInput, direction?: OrderDirection): this {
    this.state = this.state.withOrderBy({
      type: 'OrderBy',
      term: toOperand(term),
      ...(direction ? { direction } : {})
    });
    return this;
  }

  /**
   * Limits the number of returned rows.
   */
  limit(count: number): this {
    this.state = this.state.withLimit(assertNonNegativeInteger(count, 'LIMIT'));
    return this;
  }

  /**
   * Skips rows before returning results.
   * @throws UnsupportedCapabilityError when the dialect has no OFFSET
   */
  offset(count: number): this {
    this.dialect.assertOffsetSupported();
    this.state = this.state.withOffset(assertNonNegativeInteger(count, 'OFFSET'));
    return this;
  }

  /**
   * Returns the current query AST
   */
  getAST(): SelectQueryNode {
    return this.state.ast;
  }

  /**
   * Renders the query as SQL. The builder stays usable afterwards.
   * @throws IncompleteQueryError when no source table was set
   */
  build(): string {
    const sql = this.dialect.compileSelect(this.state.ast);
    logQuery(this.logger, { sql, dialect: this.dialect.name });
    return sql;
  }
}
