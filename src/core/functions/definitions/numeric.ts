import type { FunctionDefinition } from '../function-registry.js';
import { binaryRenderer } from './helpers.js';

export const numericFunctionDefinitions: FunctionDefinition[] = [
  { name: 'modulo', renderer: binaryRenderer('mod') },
  { name: 'power', renderer: binaryRenderer('pow') }
];
