import PDFDocument from 'pdfkit';
import type { RenderableReport } from './stockReport';
import { formatMoney, formatPercent, formatTimestamp } from './reportTemplate';

/**
 * Renders the stock report as a PDF attachment.
 */
export const generateStockReportPdf = (report: RenderableReport): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    const doc = new PDFDocument({ margin: 36 });
    const chunks: Buffer[] = [];

    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    const { summary } = report;

    doc.fontSize(16).text(`${report.companyName} - ${report.reportType}`);
    doc.fontSize(10).text(`Generated at ${formatTimestamp(report.generatedAt)}`);
    doc.moveDown();

    doc.fontSize(12);
    doc.text(`Total products: ${summary.totalProducts}`);
    doc.text(`Low stock products: ${summary.lowStockCount}`);
    doc.text(`Critical items: ${summary.criticalItemsCount}`);
    doc.text(`Average stock level: ${formatPercent(summary.avgStockLevel)}`);
    doc.text(`Products below 50% of capacity: ${summary.itemsBelow50Pct}`);
    if (summary.totalInventoryValue !== undefined) {
      doc.text(`Total inventory value: ${formatMoney(summary.totalInventoryValue)}`);
    }
    doc.moveDown();

    doc.fontSize(14).text('Products at or below minimum threshold');
    doc.moveDown(0.5);
    doc.fontSize(10);

    const lowStock = report.items.filter((item) => item.status !== 'NORMAL');
    if (!lowStock.length) {
      doc.text('No products are below their minimum threshold.');
    } else {
      doc.text('Product | SKU | Current | Min | Max | Level');
      lowStock.forEach((item) => {
        doc.text(
          [
            item.name,
            item.sku,
            item.currentStock,
            item.minThreshold,
            item.maxThreshold,
            formatPercent(item.stockLevelPct)
          ].join(' | ')
        );
      });
    }

    doc.end();
  });
