import { Response } from 'express';
import { AuthRequest } from '../middleware/auth';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { sendError } from '../utils/errors';
import { generateStockReportPdf } from '../utils/reportPdf';
import { renderStockReportHtml } from '../utils/reportTemplate';
import { attachReportMetadata, buildReport } from '../utils/stockReport';
import { generateStockReport, STOCK_REPORT_TYPE } from '../utils/stockReportMailer';
import { runStockReportJob } from '../jobs/stockReportJob';
import { reportPreviewSchema } from '../validators/report.validator';

/**
 * GET /api/reports/stock
 */
export const getStockReport = async (req: AuthRequest, res: Response) => {
  try {
    const report = await generateStockReport();
    res.json(report);
  } catch (error) {
    sendError(res, error, 'Failed to generate stock report');
  }
};

/**
 * GET /api/reports/stock/preview
 * The report email body as it would be sent.
 */
export const previewStockReport = async (req: AuthRequest, res: Response) => {
  try {
    const report = await generateStockReport();
    res.type('html').send(renderStockReportHtml(report));
  } catch (error) {
    sendError(res, error, 'Failed to render stock report');
  }
};

/**
 * POST /api/reports/stock/preview
 * Builds a report from the records in the body; nothing is read or stored.
 */
export const buildStockReportFromRecords = async (req: AuthRequest, res: Response) => {
  try {
    const body = reportPreviewSchema.parse(req.body);
    const report = attachReportMetadata(buildReport(body.records), {
      companyName: body.companyName ?? env.COMPANY_NAME,
      reportType: body.reportType ?? STOCK_REPORT_TYPE,
      generatedAt: new Date()
    });

    res.json(report);
  } catch (error) {
    sendError(res, error, 'Failed to build stock report');
  }
};

/**
 * GET /api/reports/stock/pdf
 */
export const downloadStockReportPdf = async (req: AuthRequest, res: Response) => {
  try {
    const report = await generateStockReport();
    const pdf = await generateStockReportPdf(report);
    const day = report.generatedAt.toISOString().slice(0, 10);

    res
      .status(200)
      .type('application/pdf')
      .attachment(`low-stock-report-${day}.pdf`)
      .send(pdf);
  } catch (error) {
    sendError(res, error, 'Failed to generate stock report PDF');
  }
};

/**
 * POST /api/reports/stock/send
 * Delivery runs in the background with the job's retries; the outcome is logged.
 */
export const sendStockReportNow = (req: AuthRequest, res: Response) => {
  runStockReportJob().catch((error: unknown) => {
    logger.error('Manual stock report run failed', {
      error: error instanceof Error ? error.message : String(error)
    });
  });

  res.status(202).json({ message: 'Stock report queued for delivery' });
};
