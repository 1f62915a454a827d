/**
 * Expression AST nodes and builders.
 * Re-exports components for building SQL expression and condition trees.
 */
export * from './expression-nodes.js';
export * from './expression-builders.js';
export * from './aggregate-functions.js';
export * from './helpers.js';
export * from './identifier.js';
export type { TableRef } from './types.js';
