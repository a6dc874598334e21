import type { RenderableReport, ReportItem } from './stockReport';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

export const formatPercent = (value: number): string => `${value.toFixed(1)}%`;

export const formatMoney = (value: number): string => value.toFixed(2);

// UTC keeps the rendered report independent of the server's timezone
export const formatTimestamp = (date: Date): string =>
  `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;

export const stockReportSubject = (report: RenderableReport): string =>
  `Low Stock Alert - ${report.summary.lowStockCount} Products Need Attention`;

const lowStockRow = (item: ReportItem): string => `
        <tr>
          <td>${escapeHtml(item.name)}</td>
          <td>${item.currentStock}</td>
          <td>${item.minThreshold}</td>
          <td>${formatPercent(item.stockLevelPct)}</td>
        </tr>`;

const inventoryRow = (item: ReportItem): string => `
        <tr>
          <td>${escapeHtml(item.name)}</td>
          <td>${escapeHtml(item.sku)}</td>
          <td>${item.currentStock}</td>
          <td>${item.minThreshold}</td>
          <td>${item.maxThreshold}</td>
        </tr>`;

const criticalRow = (item: ReportItem): string =>
  `<li><strong>${escapeHtml(item.name)}</strong>: ${item.currentStock} units</li>`;

export const renderStockReportHtml = (report: RenderableReport): string => {
  const { summary } = report;

  const valueLine =
    summary.totalInventoryValue !== undefined
      ? `<p>Total inventory value: ${formatMoney(summary.totalInventoryValue)}</p>`
      : '';

  const lowStockSection = report.lowStockItems.length
    ? `
    <h3>Low Stock Alerts</h3>
    <table border="1" cellpadding="6" cellspacing="0">
      <thead>
        <tr><th>Product</th><th>Current Stock</th><th>Min Threshold</th><th>Stock Level</th></tr>
      </thead>
      <tbody>${report.lowStockItems.map(lowStockRow).join('')}
      </tbody>
    </table>`
    : '<p>No products are below their minimum threshold.</p>';

  const criticalSection = summary.criticalItemsCount
    ? `
    <h3>Critical Items (${summary.criticalItemsCount})</h3>
    <ul>${report.criticalItems.map(criticalRow).join('')}</ul>`
    : '';

  return `
  <div>
    <h2>${escapeHtml(report.companyName)} - ${escapeHtml(report.reportType)}</h2>
    <p>Generated at ${formatTimestamp(report.generatedAt)}</p>
    <p>Total products: ${summary.totalProducts}</p>
    <p>Low stock products: ${summary.lowStockCount}</p>
    ${valueLine}
    <p>Average stock level: ${formatPercent(summary.avgStockLevel)}</p>
    <p>Products below 50% of capacity: ${summary.itemsBelow50Pct}</p>
    ${lowStockSection}
    ${criticalSection}
    <h3>Inventory</h3>
    <table border="1" cellpadding="6" cellspacing="0">
      <thead>
        <tr><th>Product</th><th>SKU</th><th>Current Stock</th><th>Min</th><th>Max</th></tr>
      </thead>
      <tbody>${report.items.map(inventoryRow).join('')}
      </tbody>
    </table>
  </div>
  `;
};

/**
 * Plain-text body sent alongside the HTML report.
 */
export const renderStockReportText = (report: RenderableReport): string => {
  const lines = [
    'Low Stock Alert Report',
    '',
    'The following products are at or below their minimum stock threshold:',
    '',
    ...report.lowStockItems.map(
      (item) => `- ${item.name}: ${item.currentStock} units (Minimum: ${item.minThreshold})`
    )
  ];

  const hidden = report.summary.lowStockCount - report.lowStockItems.length;
  if (hidden > 0) {
    lines.push(`...and ${hidden} more`);
  }

  lines.push('', 'The full report is attached as a PDF.');
  return lines.join('\n');
};
