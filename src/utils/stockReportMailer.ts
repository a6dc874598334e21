import Product, { IProduct } from '../models/Product';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { sendEmail } from './emailService';
import { getReportRecipients } from './recipients';
import { withRetry } from './retry';
import { generateStockReportPdf } from './reportPdf';
import { renderStockReportHtml, renderStockReportText, stockReportSubject } from './reportTemplate';
import {
  attachReportMetadata,
  buildReport,
  ProductStockRecord,
  RenderableReport
} from './stockReport';

export const STOCK_REPORT_TYPE = 'Stock Level Report';

type StockFields = Pick<IProduct, 'name' | 'sku' | 'stockQuantity' | 'minThreshold' | 'maxThreshold' | 'price'>;

export const toStockRecord = (product: StockFields): ProductStockRecord => ({
  name: product.name,
  sku: product.sku,
  currentStock: product.stockQuantity,
  minThreshold: product.minThreshold,
  maxThreshold: product.maxThreshold,
  unitPrice: product.price
});

export const loadStockRecords = async (): Promise<ProductStockRecord[]> => {
  const products = await Product.find({ isActive: true })
    .select('name sku stockQuantity minThreshold maxThreshold price')
    .sort({ name: 1 });

  return products.map(toStockRecord);
};

export const generateStockReport = async (
  reportType: string = STOCK_REPORT_TYPE,
  generatedAt: Date = new Date()
): Promise<RenderableReport> => {
  const records = await loadStockRecords();
  return attachReportMetadata(buildReport(records), {
    companyName: env.COMPANY_NAME,
    reportType,
    generatedAt
  });
};

export type StockReportOutcome =
  | { sent: true; recipients: number; lowStockCount: number; attempts: number }
  | { sent: false; reason: 'NO_RECIPIENTS' | 'NO_LOW_STOCK' | 'INVALID_RECIPIENT' };

const isInvalidRecipientError = (error: unknown): boolean =>
  error instanceof Error && /invalid recipient/i.test(error.message);

/**
 * Emails the stock report to every active admin and manager, but only
 * when at least one product is at or below its minimum threshold.
 */
export const sendStockReport = async (generatedAt: Date = new Date()): Promise<StockReportOutcome> => {
  const recipients = await getReportRecipients();
  if (!recipients.length) {
    logger.error('No valid recipients found for stock report');
    return { sent: false, reason: 'NO_RECIPIENTS' };
  }

  const report = await generateStockReport(STOCK_REPORT_TYPE, generatedAt);
  const { lowStockCount } = report.summary;

  if (lowStockCount === 0) {
    logger.info('No products found below minimum stock threshold');
    return { sent: false, reason: 'NO_LOW_STOCK' };
  }

  logger.warn('Low stock detected', {
    lowStockCount,
    products: report.lowStockItems.map((item) => item.sku)
  });

  const pdf = await generateStockReportPdf(report);
  const day = generatedAt.toISOString().slice(0, 10);

  try {
    const { attempts } = await withRetry(
      () =>
        sendEmail({
          bcc: recipients,
          subject: stockReportSubject(report),
          html: renderStockReportHtml(report),
          text: renderStockReportText(report),
          attachments: [
            { filename: `low-stock-report-${day}.pdf`, content: pdf, contentType: 'application/pdf' }
          ]
        }),
      {
        maxRetries: env.REPORT_EMAIL_MAX_RETRIES,
        baseDelayMs: env.REPORT_EMAIL_RETRY_DELAY_MS,
        shouldRetry: (error) => !isInvalidRecipientError(error),
        label: 'Stock report email'
      }
    );

    logger.info('Stock report sent', { recipients: recipients.length, lowStockCount, attempts });
    return { sent: true, recipients: recipients.length, lowStockCount, attempts };
  } catch (error) {
    if (isInvalidRecipientError(error)) {
      logger.error('Invalid recipient address, stock report not retried', {
        error: error instanceof Error ? error.message : String(error)
      });
      return { sent: false, reason: 'INVALID_RECIPIENT' };
    }
    throw error;
  }
};
