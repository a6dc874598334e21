import { z } from 'zod';

// Records are checked field by field by validateStockRecords
export const reportPreviewSchema = z.object({
  records: z.array(z.unknown(), { required_error: 'records is required' }),
  companyName: z.string().trim().min(1).optional(),
  reportType: z.string().trim().min(1).optional()
});
