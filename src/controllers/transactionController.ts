import { Response } from 'express';
import { FilterQuery } from 'mongoose';
import { AuthRequest } from '../middleware/auth';
import Transaction, { ITransaction } from '../models/Transaction';
import { sendError, NotFoundError } from '../utils/errors';
import { idParamsSchema, paginationMeta } from '../validators/common.validator';
import { listTransactionsQuerySchema } from '../validators/transaction.validator';

export const getTransactions = async (req: AuthRequest, res: Response) => {
  try {
    const { type, productId, startDate, endDate, ...pagination } = listTransactionsQuerySchema.parse(req.query);

    const filter: FilterQuery<ITransaction> = {};
    if (type) filter.type = type;
    if (productId) filter.productId = productId;
    if (startDate || endDate) {
      filter.createdAt = {
        ...(startDate && { $gte: startDate }),
        ...(endDate && { $lte: endDate })
      };
    }

    const [transactions, total] = await Promise.all([
      Transaction.find(filter)
        .populate('productId', 'name sku')
        .populate('createdBy', 'name')
        .sort({ createdAt: -1 })
        .skip((pagination.page - 1) * pagination.pageSize)
        .limit(pagination.pageSize),
      Transaction.countDocuments(filter)
    ]);

    res.json({
      transactions,
      pagination: paginationMeta(pagination, total)
    });
  } catch (error) {
    sendError(res, error, 'Failed to fetch transactions');
  }
};

export const getTransactionById = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);

    const transaction = await Transaction.findById(id)
      .populate('productId', 'name sku')
      .populate('createdBy', 'name');

    if (!transaction) {
      throw new NotFoundError('Transaction');
    }

    res.json(transaction);
  } catch (error) {
    sendError(res, error, 'Failed to fetch transaction');
  }
};
