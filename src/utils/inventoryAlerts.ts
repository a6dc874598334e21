import type { IProduct } from '../models/Product';
import { logger } from '../config/logger';
import { env } from '../config/env';
import { sendEmail } from './emailService';
import { getReportRecipients } from './recipients';
import { classifyStock, stockLevelPercent } from './stockReport';
import { escapeHtml, formatPercent } from './reportTemplate';

type AlertProduct = Pick<IProduct, 'id' | 'name' | 'sku' | 'stockQuantity' | 'minThreshold' | 'maxThreshold'>;

/**
 * Emails admins and managers when a product is at or below its minimum
 * threshold. Failures are logged, not thrown: the stock change that
 * triggered the alert has already been saved.
 */
export const notifyLowStock = async (product: AlertProduct): Promise<boolean> => {
  const status = classifyStock(product.stockQuantity, product.minThreshold);
  if (status === 'NORMAL') {
    return false;
  }

  const headline = status === 'OUT_OF_STOCK' ? 'is out of stock' : 'is low on stock';
  const level = formatPercent(stockLevelPercent(product.stockQuantity, product.maxThreshold));

  try {
    const recipients = await getReportRecipients();
    if (!recipients.length) {
      logger.warn('Low stock detected but no alert recipients configured', { sku: product.sku });
      return false;
    }

    await sendEmail({
      bcc: recipients,
      subject: `${env.COMPANY_NAME} Alert – ${product.name} ${headline}`,
      html: `
        <p><strong>${escapeHtml(product.name)}</strong> (${escapeHtml(product.sku)}) ${headline}.</p>
        <p>Current stock: ${product.stockQuantity}</p>
        <p>Minimum threshold: ${product.minThreshold}</p>
        <p>Stock level: ${level}</p>
        <p>Please review and take action.</p>
      `
    });
    logger.warn('Low stock alert sent', { productId: product.id, sku: product.sku, status });
    return true;
  } catch (error) {
    logger.error('Failed to send low stock alert', {
      sku: product.sku,
      error: error instanceof Error ? error.message : String(error)
    });
    return false;
  }
};
