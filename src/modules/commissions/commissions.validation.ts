import { z } from 'zod';
import { CommissionPeriod, CommissionStatus } from '../../utils/constants.js';
import { objectIdSchema, paginationQuery } from '../../utils/validation.js';

const daySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Use YYYY-MM-DD');

const periodQuery = (defaultPeriod: CommissionPeriod) =>
  z.object({
    type: z.nativeEnum(CommissionPeriod).default(defaultPeriod),
    startDate: daySchema.optional(),
    endDate: daySchema.optional(),
  });

export const tailorReportQuerySchema = periodQuery(CommissionPeriod.WEEKLY).extend({
  tailorId: objectIdSchema.optional(),
});

export const adminReportQuerySchema = periodQuery(CommissionPeriod.MONTHLY).extend({
  format: z.enum(['json', 'pdf']).default('json'),
});

export const commissionHistoryQuerySchema = paginationQuery(30).extend({
  status: z.nativeEnum(CommissionStatus).optional(),
  tailorId: objectIdSchema.optional(),
  startDate: daySchema.optional(),
  endDate: daySchema.optional(),
});

export const markPaidSchema = z.object({
  commissionIds: z.array(objectIdSchema).min(1).max(200),
  notes: z.string().max(500).trim().optional(),
});

export type TailorReportQuery = z.infer<typeof tailorReportQuerySchema>;
export type AdminReportQuery = z.infer<typeof adminReportQuerySchema>;
export type CommissionHistoryQuery = z.infer<typeof commissionHistoryQuerySchema>;
export type MarkPaidInput = z.infer<typeof markPaidSchema>;
