import { InvalidIdentifierError } from '../errors.js';

/**
 * Accepted shape for table, schema, column and alias names.
 * Identifiers never contain a quote character, so quoting needs no escaping.
 */
export const VALID_IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export type IdentifierKind = 'table' | 'schema' | 'column' | 'alias' | 'function';

export const isValidIdentifier = (name: string): boolean => VALID_IDENTIFIER_REGEX.test(name);

/**
 * Returns the name unchanged, or throws InvalidIdentifierError.
 */
export const assertIdentifier = (name: string, kind: IdentifierKind): string => {
  if (!isValidIdentifier(name)) {
    throw new InvalidIdentifierError(name, kind);
  }
  return name;
};
