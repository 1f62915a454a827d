import { DialectRules, STANDARD_JOIN_KEYWORDS } from '../abstract.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

export const SQLITE_RULES: DialectRules = {
  name: 'sqlite',
  identifierQuote: { open: '"', close: '"' },
  joinKeywords: STANDARD_JOIN_KEYWORDS,
  // RIGHT and FULL joins need SQLite 3.39+
  capabilities: { supportsOffset: true, supportedJoins: ['INNER', 'LEFT', 'RIGHT', 'FULL'] },
  pagination: 'limit-offset',
  backslashEscapes: false
};

/**
 * SQLite dialect implementation
 */
export class SqliteDialect extends SqlDialectBase {
  /**
   * Creates a new SqliteDialect instance
   */
  public constructor() {
    super(SQLITE_RULES);
  }
}
