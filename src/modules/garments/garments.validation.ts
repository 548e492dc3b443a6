import { z } from 'zod';
import { GarmentCategory } from '../../utils/constants.js';
import { moneySchema, objectIdSchema } from '../../utils/validation.js';

export const garmentAccessorySchema = z.object({
  accessoryId: objectIdSchema,
  quantityRequired: z.coerce.number().positive().max(1000),
});

export const createGarmentTypeSchema = z.object({
  name: z.string().min(1).max(100).trim(),
  description: z.string().max(1000).trim().optional(),
  category: z.nativeEnum(GarmentCategory).default(GarmentCategory.BOTH),
  estimatedFabricMeters: z.coerce.number().min(0).max(100),
  basePrice: moneySchema,
  defaultTailorId: objectIdSchema.nullable().optional(),
  requiredAccessories: z
    .array(garmentAccessorySchema)
    .default([])
    .refine(
      (items) => new Set(items.map((i) => i.accessoryId)).size === items.length,
      'Each accessory may be listed once',
    ),
});

export const updateGarmentTypeSchema = createGarmentTypeSchema.partial();

export type CreateGarmentTypeInput = z.infer<typeof createGarmentTypeSchema>;
export type UpdateGarmentTypeInput = z.infer<typeof updateGarmentTypeSchema>;
export type GarmentAccessoryInput = z.infer<typeof garmentAccessorySchema>;
