import { z } from 'zod';
import mongoose from 'mongoose';

export const objectIdSchema = z
  .string()
  .refine((value) => mongoose.isValidObjectId(value), 'Invalid ID format');

export const idParamsSchema = z.object({
  id: objectIdSchema
});

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export const paginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE)
});

export type PaginationQuery = z.infer<typeof paginationQuerySchema>;

export const paginationMeta = ({ page, pageSize }: PaginationQuery, total: number) => ({
  page,
  pageSize,
  total,
  pages: Math.ceil(total / pageSize)
});

export const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
