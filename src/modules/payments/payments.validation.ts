import { z } from 'zod';
import { PaymentMethod, PaymentStatus, PaymentType } from '../../utils/constants.js';
import { dateRangeQuery, moneySchema, objectIdSchema, paginationQuery } from '../../utils/validation.js';

export const createPaymentSchema = z.object({
  orderId: objectIdSchema,
  amount: moneySchema.refine((v) => v > 0, 'Amount must be greater than zero'),
  paymentType: z.nativeEnum(PaymentType).default(PaymentType.BALANCE),
  paymentMethod: z.nativeEnum(PaymentMethod).default(PaymentMethod.CASH),
  notes: z.string().max(500).trim().optional(),
});

export const listPaymentsQuerySchema = paginationQuery(30)
  .merge(dateRangeQuery)
  .extend({
    orderId: objectIdSchema.optional(),
    paymentType: z.nativeEnum(PaymentType).optional(),
    paymentMethod: z.nativeEnum(PaymentMethod).optional(),
    status: z.nativeEnum(PaymentStatus).optional(),
  });

export const receiptFormatQuerySchema = z.object({
  format: z.enum(['html', 'pdf']).default('html'),
});

export type CreatePaymentInput = z.infer<typeof createPaymentSchema>;
export type ListPaymentsQuery = z.infer<typeof listPaymentsQuerySchema>;
