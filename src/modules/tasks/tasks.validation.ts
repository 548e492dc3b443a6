import { z } from 'zod';
import { TaskStatus } from '../../utils/constants.js';
import { objectIdSchema, paginationQuery } from '../../utils/validation.js';

export const assignTaskSchema = z.object({
  orderId: objectIdSchema,
  tailorId: objectIdSchema,
});

export const updateTaskStatusSchema = z.object({
  status: z.enum([TaskStatus.IN_PROGRESS, TaskStatus.COMPLETED]),
  notes: z.string().max(2000).trim().optional(),
});

export const updateTaskNotesSchema = z.object({
  notes: z.string().max(2000).trim(),
});

export const listTasksQuerySchema = paginationQuery(20).extend({
  status: z.nativeEnum(TaskStatus).optional(),
  tailorId: objectIdSchema.optional(),
});

export type AssignTaskInput = z.infer<typeof assignTaskSchema>;
export type UpdateTaskStatusInput = z.infer<typeof updateTaskStatusSchema>;
export type UpdateTaskNotesInput = z.infer<typeof updateTaskNotesSchema>;
export type ListTasksQuery = z.infer<typeof listTasksQuerySchema>;
