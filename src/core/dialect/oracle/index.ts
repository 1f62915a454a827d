import { DialectRules, STANDARD_JOIN_KEYWORDS } from '../abstract.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

export const ORACLE_RULES: DialectRules = {
  name: 'oracle',
  identifierQuote: { open: '"', close: '"' },
  joinKeywords: STANDARD_JOIN_KEYWORDS,
  capabilities: { supportsOffset: true, supportedJoins: ['INNER', 'LEFT', 'RIGHT', 'FULL'] },
  // Oracle 12c+ row limiting clause; there is no LIMIT keyword
  pagination: 'offset-fetch',
  backslashEscapes: false
};

/**
 * Oracle dialect implementation
 */
export class OracleDialect extends SqlDialectBase {
  /**
   * Creates a new OracleDialect instance
   */
  public constructor() {
    super(ORACLE_RULES);
  }
}
