import { z } from 'zod';
import { objectIdSchema, paginationQuerySchema } from './common.validator';

export const categoryBodySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255, 'Name must be at most 255 characters'),
  description: z.string().trim().min(1).optional(),
  parentCategory: objectIdSchema.nullable().optional()
});

export const listCategoriesQuerySchema = paginationQuerySchema.extend({
  search: z.string().trim().min(1).optional()
});

export type CategoryBody = z.infer<typeof categoryBodySchema>;
