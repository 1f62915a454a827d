/**
 * Represents a single built-query log entry
 */
export interface QueryLogEntry {
  /** The SQL text that was produced */
  sql: string;
  /** Name of the dialect that rendered it */
  dialect: string;
}

/**
 * Function type for query logging callbacks
 * @param entry - The query log entry to process
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Sends an entry to the logger when one is configured
 */
export const logQuery = (logger: QueryLogger | undefined, entry: QueryLogEntry): void => {
  if (!logger) {
    return;
  }
  logger(entry);
};
