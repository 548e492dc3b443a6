import { z } from 'zod';
import { booleanQuerySchema } from '../../utils/validation.js';

export const processClaimSchema = z
  .object({
    collectBalance: z.union([z.boolean(), booleanQuerySchema]).default(false),
  })
  .default({});

export type ProcessClaimInput = z.infer<typeof processClaimSchema>;
