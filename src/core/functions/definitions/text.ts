import type { FunctionDefinition } from '../function-registry.js';
import { unaryRenderer } from './helpers.js';

export const textFunctionDefinitions: FunctionDefinition[] = [
  { name: 'UPPER', renderer: unaryRenderer('UPPER') },
  { name: 'LOWER', renderer: unaryRenderer('LOWER') },
  { name: 'TRIM', renderer: unaryRenderer('TRIM') },
  { name: 'LENGTH', renderer: unaryRenderer('LENGTH') }
];
