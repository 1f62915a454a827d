import type { FunctionRenderer } from '../types.js';

/**
 * Renderer for functions that take one argument.
 * Any other argument count is rendered as given so nothing is dropped.
 */
export function unaryRenderer(name: string): FunctionRenderer {
  return ({ compiledArgs }) =>
    compiledArgs.length === 1 ? `${name}(${compiledArgs[0]})` : `${name}(${compiledArgs.join(',')})`;
}
