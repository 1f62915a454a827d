import type { FunctionNode } from '../ast/expression.js';

/**
 * Context provided to function renderers.
 */
export interface FunctionRenderContext {
  /** The function node being rendered. */
  node: FunctionNode;
  /** The compiled arguments for the function. */
  compiledArgs: string[];
}

/**
 * A function that renders a SQL function call.
 * @param ctx - The rendering context.
 * @returns The rendered SQL string.
 */
export type FunctionRenderer = (ctx: FunctionRenderContext) => string;

/**
 * Strategy for rendering SQL functions in a specific dialect.
 */
export interface FunctionStrategy {
  /**
   * Returns a renderer for a specific function name (e.g. "UPPER").
   * Returns undefined when the generic NAME(args) spelling applies.
   * @param functionName - The name of the function.
   */
  getRenderer(functionName: string): FunctionRenderer | undefined;
}
