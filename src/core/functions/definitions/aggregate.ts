import type { FunctionDefinition } from '../function-registry.js';
import { unaryRenderer } from './helpers.js';

export const aggregateFunctionDefinitions: FunctionDefinition[] = [
  { name: 'count', renderer: unaryRenderer('count') },
  { name: 'sum', renderer: unaryRenderer('sum') },
  { name: 'avg', renderer: unaryRenderer('avg') },
  { name: 'min', renderer: unaryRenderer('min') },
  { name: 'max', renderer: unaryRenderer('max') }
];
