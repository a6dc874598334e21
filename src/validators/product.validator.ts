import { z } from 'zod';
import { paginationQuerySchema } from './common.validator';

const quantity = (label: string) =>
  z
    .number({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be a number`
    })
    .int(`${label} must be an integer`);

export const productBodySchema = z
  .object({
    name: z.string().trim().min(1, 'Name is required').max(100, 'Name must be at most 100 characters'),
    description: z.string().default(''),
    price: z
      .number({ required_error: 'Price is required', invalid_type_error: 'Price must be a number' })
      .min(0, 'Price must be a positive number'),
    stockQuantity: quantity('Stock quantity').min(0, 'Stock quantity cannot be negative'),
    minThreshold: quantity('Minimum threshold').min(0, 'Minimum threshold cannot be negative').default(0),
    maxThreshold: quantity('Maximum threshold').min(0, 'Maximum threshold cannot be negative').default(0),
    category: z.string({ required_error: 'Category name is required' }).trim().min(1, 'Category name is required'),
    barcode: z.string().trim().max(100).optional()
  })
  .refine((body) => body.maxThreshold >= body.minThreshold, {
    path: ['maxThreshold'],
    message: 'Maximum threshold must be greater than or equal to minimum threshold'
  });

export const stockChangeSchema = z.object({
  quantity: quantity('Quantity').positive('Quantity must be positive'),
  note: z.string().trim().max(500).optional()
});

export const listProductsQuerySchema = paginationQuerySchema
  .extend({
    name: z.string().trim().min(1).optional(),
    category: z.string().trim().min(1).optional(),
    minPrice: z.coerce.number().min(0).optional(),
    maxPrice: z.coerce.number().min(0).optional(),
    status: z.enum(['low', 'out', 'normal']).optional()
  })
  .refine(
    (query) => query.minPrice === undefined || query.maxPrice === undefined || query.minPrice <= query.maxPrice,
    { path: ['maxPrice'], message: 'maxPrice must be greater than or equal to minPrice' }
  );

export type ProductBody = z.infer<typeof productBodySchema>;
export type StockChange = z.infer<typeof stockChangeSchema>;
export type ListProductsQuery = z.infer<typeof listProductsQuerySchema>;
