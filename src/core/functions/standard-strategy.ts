import { FunctionStrategy, FunctionRenderer } from './types.js';
import { FunctionRegistry } from './function-registry.js';
import type { FunctionDefinition } from './function-registry.js';
import { aggregateFunctionDefinitions } from './definitions/aggregate.js';
import { textFunctionDefinitions } from './definitions/text.js';
import { numericFunctionDefinitions } from './definitions/numeric.js';

/**
 * Standard implementation of FunctionStrategy for ANSI SQL functions.
 * Dialects pass overrides to change how individual functions are spelled.
 */
export class StandardFunctionStrategy implements FunctionStrategy {
  protected readonly registry: FunctionRegistry;

  /**
   * Creates a new StandardFunctionStrategy and registers standard functions.
   * @param overrides - Renderers that replace the standard ones
   */
  constructor(overrides?: FunctionRegistry) {
    this.registry = new FunctionRegistry();
    this.registerStandard();
    if (overrides) {
      this.registry.merge(overrides);
    }
  }

  protected registerStandard(): void {
    this.registerDefinitions(aggregateFunctionDefinitions);
    this.registerDefinitions(textFunctionDefinitions);
    this.registerDefinitions(numericFunctionDefinitions);
  }

  protected registerDefinitions(definitions: FunctionDefinition[]): void {
    this.registry.register(definitions);
  }

  /**
   * @inheritDoc
   */
  getRenderer(name: string): FunctionRenderer | undefined {
    return this.registry.get(name);
  }
}
