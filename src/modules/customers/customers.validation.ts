import { z } from 'zod';
import { paginationQuery } from '../../utils/validation.js';

const contactNumberSchema = z
  .string()
  .trim()
  .min(7, 'Contact number is too short')
  .max(20)
  .regex(/^\+?[\d\s-]+$/, 'Digits, spaces and dashes only');

export const createCustomerSchema = z.object({
  name: z.string().min(1).max(200).trim(),
  contactNumber: contactNumberSchema,
  address: z.string().max(500).trim().optional(),
  email: z.union([z.string().email().toLowerCase().trim(), z.literal('')]).optional().transform((v) => v || undefined),
});

export const updateCustomerSchema = createCustomerSchema.partial();

export const listCustomersQuerySchema = paginationQuery().extend({
  search: z.string().trim().max(100).optional(),
});

export const searchCustomersQuerySchema = z.object({
  q: z.string().trim().max(100).default(''),
});

export type CreateCustomerInput = z.infer<typeof createCustomerSchema>;
export type UpdateCustomerInput = z.infer<typeof updateCustomerSchema>;
export type ListCustomersQuery = z.infer<typeof listCustomersQuerySchema>;
