import { DialectRules } from './abstract.js';
import { SqlDialectBase } from './base/sql-dialect.js';
import { StandardFunctionStrategy } from '../functions/standard-strategy.js';
import type { FunctionRegistry } from '../functions/function-registry.js';

/**
 * A dialect described only by its rules record.
 */
export class RuleBasedDialect extends SqlDialectBase {
  public constructor(rules: DialectRules, functionOverrides?: FunctionRegistry) {
    super(rules, new StandardFunctionStrategy(functionOverrides));
  }
}

/**
 * Creates a dialect from a rules record, without subclassing.
 *
 * @example
 * DialectFactory.register('legacy', () => createDialect({
 *   ...SQLITE_RULES,
 *   name: 'legacy',
 *   capabilities: { supportsOffset: false, supportedJoins: ['INNER', 'LEFT'] }
 * }));
 */
export const createDialect = (rules: DialectRules, functionOverrides?: FunctionRegistry): SqlDialectBase =>
  new RuleBasedDialect(rules, functionOverrides);
