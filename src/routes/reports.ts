import { Router } from 'express';
import {
  getStockReport,
  previewStockReport,
  buildStockReportFromRecords,
  downloadStockReportPdf,
  sendStockReportNow
} from '../controllers/reportController';
import { authenticateToken, requireAdmin } from '../middleware/auth';

const router = Router();

router.get('/stock', authenticateToken, getStockReport);
router.get('/stock/preview', authenticateToken, previewStockReport);
router.post('/stock/preview', authenticateToken, buildStockReportFromRecords);
router.get('/stock/pdf', authenticateToken, downloadStockReportPdf);
router.post('/stock/send', authenticateToken, requireAdmin, sendStockReportNow);

export default router;
