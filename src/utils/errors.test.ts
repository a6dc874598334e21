import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { AppError, ErrorCode, InvalidRecordError, NotFoundError, toErrorResponse } from './errors';

describe('toErrorResponse', () => {
  it('uses the status and code of an AppError', () => {
    const error = new AppError(ErrorCode.INSUFFICIENT_STOCK, 'Insufficient stock', 409, { available: 2 });

    expect(toErrorResponse(error, 'fallback')).toEqual({
      status: 409,
      body: { error: 'Insufficient stock', code: 'INSUFFICIENT_STOCK', details: { available: 2 } }
    });
  });

  it('maps NotFoundError to 404 without details', () => {
    expect(toErrorResponse(new NotFoundError('Product'), 'fallback')).toEqual({
      status: 404,
      body: { error: 'Product not found', code: 'NOT_FOUND' }
    });
  });

  it('reports invalid records as unprocessable', () => {
    const { status, body } = toErrorResponse(new InvalidRecordError('sku', 3, 'is required'), 'fallback');

    expect(status).toBe(422);
    expect(body).toEqual({
      error: 'Invalid record at index 3: sku is required',
      code: 'INVALID_RECORD',
      details: { field: 'sku', index: 3 }
    });
  });

  it('lists every zod issue with its field path', () => {
    const result = z.object({ quantity: z.number(), note: z.string() }).safeParse({ quantity: 'many' });
    if (result.success) {
      throw new Error('expected validation to fail');
    }

    expect(toErrorResponse(result.error, 'fallback')).toEqual({
      status: 400,
      body: {
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: {
          errors: [
            { field: 'quantity', message: 'Expected number, received string' },
            { field: 'note', message: 'Required' }
          ]
        }
      }
    });
  });

  it('turns duplicate key errors into conflicts', () => {
    expect(toErrorResponse({ code: 11000 }, 'fallback')).toEqual({
      status: 409,
      body: { error: 'Duplicate resource', code: 'CONFLICT' }
    });
  });

  it('hides unexpected errors behind the fallback message', () => {
    expect(toErrorResponse(new Error('connection reset'), 'Failed to fetch products')).toEqual({
      status: 500,
      body: { error: 'Failed to fetch products', code: 'INTERNAL_ERROR' }
    });
  });
});
