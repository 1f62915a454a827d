/**
 * Environment variable naming the dialect used when none is passed explicitly.
 */
export const DIALECT_ENV_VAR = 'QUILLSQL_DIALECT';

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads the default dialect key from the environment.
 * Returns undefined when the variable is unset or blank.
 */
export const resolveDefaultDialect = (env: Env = process.env): string | undefined => {
  const raw = env[DIALECT_ENV_VAR];
  if (raw === undefined) return undefined;
  const value = raw.trim().toLowerCase();
  return value.length > 0 ? value : undefined;
};
