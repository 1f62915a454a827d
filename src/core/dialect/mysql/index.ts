import { DialectRules, STANDARD_JOIN_KEYWORDS } from '../abstract.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

export const MYSQL_RULES: DialectRules = {
  name: 'mysql',
  identifierQuote: { open: '`', close: '`' },
  joinKeywords: STANDARD_JOIN_KEYWORDS,
  // MySQL has no FULL [OUTER] JOIN
  capabilities: { supportsOffset: true, supportedJoins: ['INNER', 'LEFT', 'RIGHT'] },
  pagination: 'limit-offset',
  // default sql_mode reads \ as an escape inside string literals
  backslashEscapes: true
};

/**
 * MySQL dialect implementation
 */
export class MySqlDialect extends SqlDialectBase {
  /**
   * Creates a new MySqlDialect instance
   */
  public constructor() {
    super(MYSQL_RULES);
  }
}
