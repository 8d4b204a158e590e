/**
 * Built-in capabilities.
 *
 * Every catalog starts with these; ontology documents may add more.
 */

import type { CapabilityDefinition } from './types.js';

const nullableString = { type: ['string', 'null'] };

export const BUILTIN_CAPABILITIES: readonly CapabilityDefinition[] = [
  {
    name: 'location',
    description: 'Data stored at a filesystem location',
    fields: {
      location: { schema: nullableString, description: 'Primary path of the data' },
      externalLocations: {
        schema: { type: ['array', 'null'], items: { type: 'string' } },
        description: 'Additional paths holding copies or parts of the data',
      },
    },
  },
  {
    name: 'file',
    description: 'A single file of a known type',
    fields: {
      fileType: { schema: nullableString, description: 'File extension or format name' },
    },
  },
  {
    name: 'tabular',
    description: 'Delimited tabular data with named columns',
    fields: {
      columns: {
        schema: { type: 'array', items: { type: 'string' } },
        default: [],
        description: 'Column names in order',
      },
      delimiter: { schema: { type: 'string' }, default: '\t' },
    },
  },
  {
    name: 'algorithm',
    description: 'A procedure that produces informants from inputs',
    fields: {
      parameterDescriptions: {
        schema: { type: ['object', 'null'] },
        description: 'Parameter name -> description',
      },
      scriptPath: { schema: nullableString },
    },
  },
  {
    name: 'parameters',
    description: 'Concrete parameter values fed to an algorithm',
    fields: {
      parameters: { schema: { type: 'object' }, default: {} },
      parameterDescriptions: { schema: { type: ['object', 'null'] }, default: {} },
    },
  },
];
