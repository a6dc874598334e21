import { z } from 'zod';
import { TRANSACTION_TYPES } from '../models/Transaction';
import { objectIdSchema, paginationQuerySchema } from './common.validator';

export const listTransactionsQuerySchema = paginationQuerySchema.extend({
  type: z.enum(TRANSACTION_TYPES).optional(),
  productId: objectIdSchema.optional(),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional()
});
