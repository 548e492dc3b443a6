import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { AccessoryUnit, GarmentCategory } from '../utils/constants.js';

const seedDataSchema = z.object({
  tailor: z.object({
    username: z.string(),
    email: z.string().email(),
    firstName: z.string(),
    lastName: z.string(),
    phone: z.string(),
  }),
  fabrics: z.array(
    z.object({
      name: z.string(),
      color: z.string(),
      stockMeters: z.number().min(0),
      pricePerMeter: z.number().min(0),
    }),
  ),
  accessories: z.array(
    z.object({
      name: z.string(),
      unit: z.nativeEnum(AccessoryUnit),
      stockQuantity: z.number().min(0),
      pricePerUnit: z.number().min(0),
    }),
  ),
  garmentTypes: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      category: z.nativeEnum(GarmentCategory),
      estimatedFabricMeters: z.number().positive(),
      basePrice: z.number().positive(),
      accessories: z.array(z.tuple([z.string(), z.number().positive()])),
    }),
  ),
  customers: z.array(
    z.object({
      name: z.string(),
      contactNumber: z.string(),
      address: z.string().optional(),
      email: z.string().email().optional(),
    }),
  ),
});

export type SeedData = z.infer<typeof seedDataSchema>;

export function loadSeedData(file = new URL('./data/seed-data.json', import.meta.url)): SeedData {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return seedDataSchema.parse(raw);
}
