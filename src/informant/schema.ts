/**
 * Runtime schema for informants crossing a file or process boundary.
 */

import { z } from 'zod';
import type { Informant } from './types.js';

export const informantSchema: z.ZodType<Informant> = z.lazy(() =>
  z.object({
    name: z.string(),
    description: z.string(),
    tags: z.array(z.string()),
    referenceNames: z.array(z.string()),
    typeName: z.string().min(1),
    sourceDepth: z.number().int().nonnegative(),
    algorithm: informantSchema.nullable(),
    algorithmicParameters: z.record(z.unknown()).nullable(),
    constructorCommand: z.string(),
    fields: z.record(z.unknown()),
  })
);
