/**
 * SQL keywords used in query generation
 */
export const SQL_KEYWORDS = {
  /** SELECT clause keyword */
  SELECT: 'SELECT',
  /** FROM clause keyword */
  FROM: 'FROM',
  /** WHERE clause keyword */
  WHERE: 'WHERE',
  /** ON keyword of a join */
  ON: 'ON',
  /** AS keyword for aliases */
  AS: 'AS',
  /** GROUP BY clause keyword */
  GROUP_BY: 'GROUP BY',
  /** HAVING clause keyword */
  HAVING: 'HAVING',
  /** ORDER BY clause keyword */
  ORDER_BY: 'ORDER BY'
} as const;

/**
 * Comparison operators accepted in conditions
 */
export const COMPARISON_OPERATORS = {
  /** Equality operator */
  EQUALS: '=',
  /** Not equals operator */
  NOT_EQUALS: '<>',
  /** Greater than operator */
  GREATER_THAN: '>',
  /** Greater than or equal operator */
  GREATER_OR_EQUAL: '>=',
  /** Less than operator */
  LESS_THAN: '<',
  /** Less than or equal operator */
  LESS_OR_EQUAL: '<='
} as const;

/**
 * Type representing any supported comparison operator
 */
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[keyof typeof COMPARISON_OPERATORS];

/**
 * Boolean combinators for conditions
 */
export const LOGICAL_OPERATORS = {
  AND: 'AND',
  OR: 'OR'
} as const;

export type LogicalOperator = (typeof LOGICAL_OPERATORS)[keyof typeof LOGICAL_OPERATORS];

/**
 * Types of SQL joins supported
 */
export const JOIN_KINDS = {
  /** INNER JOIN type */
  INNER: 'INNER',
  /** LEFT JOIN type */
  LEFT: 'LEFT',
  /** RIGHT JOIN type */
  RIGHT: 'RIGHT',
  /** FULL JOIN type */
  FULL: 'FULL'
} as const;

/**
 * Type representing any supported join kind
 */
export type JoinKind = (typeof JOIN_KINDS)[keyof typeof JOIN_KINDS];

const joinKinds: ReadonlySet<string> = new Set(Object.values(JOIN_KINDS));

export const isJoinKind = (value: string): value is JoinKind => joinKinds.has(value);

/**
 * Ordering directions for result sorting
 */
export const ORDER_DIRECTIONS = {
  /** Ascending order */
  ASC: 'ASC',
  /** Descending order */
  DESC: 'DESC'
} as const;

/**
 * Type representing any supported order direction
 */
export type OrderDirection = (typeof ORDER_DIRECTIONS)[keyof typeof ORDER_DIRECTIONS];

/**
 * Built-in database dialects
 */
export const SUPPORTED_DIALECTS = {
  /** MySQL database dialect */
  MYSQL: 'mysql',
  /** PostgreSQL database dialect */
  POSTGRES: 'postgres',
  /** SQLite database dialect */
  SQLITE: 'sqlite',
  /** Oracle database dialect */
  ORACLE: 'oracle'
} as const;

/**
 * Type representing any built-in database dialect
 */
export type DialectName = (typeof SUPPORTED_DIALECTS)[keyof typeof SUPPORTED_DIALECTS];
