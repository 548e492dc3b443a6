import { z } from 'zod';
import { OrderStatus, PaymentMethod, PaymentOption } from '../../utils/constants.js';
import { createCustomerSchema } from '../customers/customers.validation.js';
import { moneySchema, objectIdSchema, paginationQuery } from '../../utils/validation.js';

const measurementsSchema = z.record(z.string().min(1), z.coerce.number().positive().max(500));

const newCustomerSchema = createCustomerSchema.pick({ name: true, contactNumber: true });

export const createOrderSchema = z
  .object({
    customerId: objectIdSchema.optional(),
    newCustomer: newCustomerSchema.optional(),
    garmentTypeId: objectIdSchema,
    fabricId: objectIdSchema,
    quantity: z.coerce.number().int().min(1).default(1),
    totalPrice: moneySchema.optional(),
    paymentOption: z.nativeEnum(PaymentOption).default(PaymentOption.DEPOSIT),
    initialPayment: moneySchema.optional(),
    paymentMethod: z.nativeEnum(PaymentMethod).default(PaymentMethod.CASH),
    measurements: measurementsSchema.default({}),
    specialInstructions: z.string().max(2000).trim().optional(),
    dueDate: z.coerce.date().optional(),
  })
  .refine((v) => Boolean(v.customerId) !== Boolean(v.newCustomer), {
    message: 'Please select or create a customer.',
    path: ['customerId'],
  });

export const updateOrderSchema = z.object({
  customerId: objectIdSchema.optional(),
  garmentTypeId: objectIdSchema.optional(),
  fabricId: objectIdSchema.optional(),
  quantity: z.coerce.number().int().min(1).optional(),
  totalPrice: moneySchema.optional(),
  measurements: measurementsSchema.optional(),
  specialInstructions: z.string().max(2000).trim().optional(),
  dueDate: z.coerce.date().nullable().optional(),
});

export const listOrdersQuerySchema = paginationQuery(20).extend({
  status: z.nativeEnum(OrderStatus).optional(),
  search: z.string().trim().optional(),
  customerId: objectIdSchema.optional(),
});

export type CreateOrderInput = z.infer<typeof createOrderSchema>;
export type UpdateOrderInput = z.infer<typeof updateOrderSchema>;
export type ListOrdersQuery = z.infer<typeof listOrdersQuerySchema>;
