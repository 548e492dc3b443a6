import { z } from 'zod';
import { AccessoryUnit, InventoryAction, InventoryItemType } from '../../utils/constants.js';
import { moneySchema, objectIdSchema, paginationQuery } from '../../utils/validation.js';

export const createFabricSchema = z.object({
  name: z.string().min(1).max(100).trim(),
  color: z.string().min(1).max(50).trim(),
  stockMeters: z.coerce.number().min(0, 'Stock cannot be negative').default(0),
  pricePerMeter: moneySchema,
  description: z.string().max(1000).trim().optional(),
});

export const updateFabricSchema = createFabricSchema.partial();

export const createAccessorySchema = z.object({
  name: z.string().min(1).max(100).trim(),
  unit: z.nativeEnum(AccessoryUnit).default(AccessoryUnit.PIECES),
  stockQuantity: z.coerce.number().min(0, 'Stock cannot be negative').default(0),
  pricePerUnit: moneySchema,
  description: z.string().max(1000).trim().optional(),
});

export const updateAccessorySchema = createAccessorySchema.partial();

export const addStockSchema = z.object({
  quantity: z.coerce.number().positive('Quantity must be greater than zero'),
  notes: z.string().max(500).trim().optional(),
});

export const inventoryLogQuerySchema = paginationQuery(50).extend({
  itemType: z.nativeEnum(InventoryItemType).optional(),
  action: z.nativeEnum(InventoryAction).optional(),
  orderId: objectIdSchema.optional(),
});

export const stockCheckQuerySchema = z.object({
  fabricId: objectIdSchema,
  garmentTypeId: objectIdSchema,
  quantity: z.coerce.number().int().min(1).default(1),
});

export type CreateFabricInput = z.infer<typeof createFabricSchema>;
export type UpdateFabricInput = z.infer<typeof updateFabricSchema>;
export type CreateAccessoryInput = z.infer<typeof createAccessorySchema>;
export type UpdateAccessoryInput = z.infer<typeof updateAccessorySchema>;
export type AddStockInput = z.infer<typeof addStockSchema>;
export type InventoryLogQuery = z.infer<typeof inventoryLogQuerySchema>;
export type StockCheckQuery = z.infer<typeof stockCheckQuerySchema>;
