import { DialectRules, STANDARD_JOIN_KEYWORDS } from '../abstract.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

export const POSTGRES_RULES: DialectRules = {
  name: 'postgres',
  identifierQuote: { open: '"', close: '"' },
  joinKeywords: STANDARD_JOIN_KEYWORDS,
  capabilities: { supportsOffset: true, supportedJoins: ['INNER', 'LEFT', 'RIGHT', 'FULL'] },
  pagination: 'limit-offset',
  backslashEscapes: false
};

/**
 * PostgreSQL dialect implementation
 */
export class PostgresDialect extends SqlDialectBase {
  /**
   * Creates a new PostgresDialect instance
   */
  public constructor() {
    super(POSTGRES_RULES);
  }
}
