/**
 * quillsql public exports.
 * Expression builders, dialects, the select builder and the table facade.
 */
export * from './core/ast/expression.js';
export * from './core/ast/query.js';
export * from './core/ast/join.js';
export * from './core/sql/sql.js';
export * from './core/errors.js';
export * from './core/functions/text.js';
export * from './core/functions/numeric.js';
export * from './core/functions/types.js';
export * from './core/functions/function-registry.js';
export * from './core/functions/standard-strategy.js';
export * from './core/dialect/abstract.js';
export * from './core/dialect/base/sql-dialect.js';
export * from './core/dialect/rule-based.js';
export * from './core/dialect/dialect-factory.js';
export * from './core/dialect/mysql/index.js';
export * from './core/dialect/postgres/index.js';
export * from './core/dialect/sqlite/index.js';
export * from './core/dialect/oracle/index.js';
export * from './query-builder/select.js';
export * from './query-builder/select-query-state.js';
export * from './query-builder/query-logger.js';
export * from './schema/table.js';
export * from './schema/schema.js';
export * from './config/env.js';
