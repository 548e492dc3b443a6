import { z } from 'zod';

export const objectIdSchema = z.string().regex(/^[a-f\d]{24}$/i, 'Invalid ID');

export const idParamSchema = z.object({ id: objectIdSchema });

/** Money from a form field: at most two decimals, never negative. */
export const moneySchema = z.coerce.number().min(0).multipleOf(0.01, 'At most two decimal places');

export const booleanQuerySchema = z.enum(['true', 'false']).transform((v) => v === 'true');

export function paginationQuery(defaultLimit = 20) {
  return z.object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(defaultLimit),
  });
}

export const dateRangeQuery = z.object({
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
});
