/**
 * Minimal table reference accepted wherever a source or join target is expected.
 * Keeps the AST decoupled from the Table facade shape.
 */
export interface TableRef {
  name: string;
  schema?: string;
  alias?: string;
}
