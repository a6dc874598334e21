import { Response } from 'express';
import { AuthRequest } from '../middleware/auth';
import Transaction from '../models/Transaction';
import { sendError } from '../utils/errors';
import { generateStockReport } from '../utils/stockReportMailer';

export const getDashboardData = async (req: AuthRequest, res: Response) => {
  try {
    const [report, recentTransactions] = await Promise.all([
      generateStockReport('Dashboard'),
      Transaction.find()
        .populate('productId', 'name sku')
        .populate('createdBy', 'name')
        .sort({ createdAt: -1 })
        .limit(10)
    ]);

    const totalStock = report.items.reduce((sum, item) => sum + item.currentStock, 0);

    res.json({
      summary: {
        ...report.summary,
        totalStock
      },
      lowStockItems: report.lowStockItems,
      criticalItems: report.criticalItems,
      recentTransactions
    });
  } catch (error) {
    sendError(res, error, 'Failed to fetch dashboard data');
  }
};
