import { z } from 'zod';
import { Role } from '../../utils/constants.js';
import { booleanQuerySchema, paginationQuery } from '../../utils/validation.js';
import { passwordSchema } from '../auth/auth.validation.js';

const phoneSchema = z.string().max(20).trim();

export const createUserSchema = z.object({
  username: z
    .string()
    .min(3)
    .max(30)
    .regex(/^[a-zA-Z0-9_.-]+$/, 'Letters, digits, dot, dash and underscore only')
    .toLowerCase()
    .trim(),
  email: z.string().email().toLowerCase().trim(),
  firstName: z.string().min(1).max(50).trim(),
  lastName: z.string().min(1).max(50).trim(),
  phone: phoneSchema.optional().default(''),
  role: z.nativeEnum(Role),
  password: passwordSchema,
});

export const updateUserSchema = z.object({
  email: z.string().email().toLowerCase().trim().optional(),
  firstName: z.string().min(1).max(50).trim().optional(),
  lastName: z.string().min(1).max(50).trim().optional(),
  phone: phoneSchema.optional(),
  role: z.nativeEnum(Role).optional(),
});

export const listUsersQuerySchema = paginationQuery().extend({
  role: z.nativeEnum(Role).optional(),
  isActive: booleanQuerySchema.optional(),
  search: z.string().trim().max(100).optional(),
});

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;
