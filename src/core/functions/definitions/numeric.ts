import type { FunctionDefinition } from '../function-registry.js';
import { unaryRenderer } from './helpers.js';

export const numericFunctionDefinitions: FunctionDefinition[] = [
  { name: 'ABS', renderer: unaryRenderer('ABS') },
  { name: 'SQRT', renderer: unaryRenderer('SQRT') },
  { name: 'CEIL', renderer: unaryRenderer('CEIL') },
  { name: 'FLOOR', renderer: unaryRenderer('FLOOR') },
  { name: 'ROUND', renderer: unaryRenderer('ROUND') },
  { name: 'SIGN', renderer: unaryRenderer('SIGN') }
];
