import { describe, expect, it } from 'vitest';
import { attachReportMetadata, buildReport, ProductStockRecord } from './stockReport';
import {
  escapeHtml,
  formatTimestamp,
  renderStockReportHtml,
  renderStockReportText,
  stockReportSubject
} from './reportTemplate';

const generatedAt = new Date('2024-05-01T08:30:00Z');

const record = (name: string, currentStock: number, unitPrice?: number): ProductStockRecord => ({
  name,
  sku: name.toUpperCase().replace(/[^A-Z]/g, ''),
  currentStock,
  minThreshold: 10,
  maxThreshold: 100,
  ...(unitPrice !== undefined ? { unitPrice } : {})
});

const render = (records: ProductStockRecord[]) =>
  attachReportMetadata(buildReport(records), {
    companyName: 'Acme & Co',
    reportType: 'Stock Level Report',
    generatedAt
  });

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });
});

describe('formatTimestamp', () => {
  it('formats in UTC to the minute', () => {
    expect(formatTimestamp(generatedAt)).toBe('2024-05-01 08:30 UTC');
  });
});

describe('stockReportSubject', () => {
  it('counts every low-stock product', () => {
    const report = render([record('Anvil', 0), record('Bolt', 5), record('Crate', 80)]);

    expect(stockReportSubject(report)).toBe('Low Stock Alert - 2 Products Need Attention');
  });
});

describe('renderStockReportHtml', () => {
  const report = render([record('Widget <A>', 0), record('Bolt', 5), record('Crate', 80)]);
  const html = renderStockReportHtml(report);

  it('renders the header with escaped metadata', () => {
    expect(html).toContain('<h2>Acme &amp; Co - Stock Level Report</h2>');
    expect(html).toContain('<p>Generated at 2024-05-01 08:30 UTC</p>');
  });

  it('renders the summary figures', () => {
    expect(html).toContain('<p>Total products: 3</p>');
    expect(html).toContain('<p>Low stock products: 2</p>');
    expect(html).toContain('<p>Average stock level: 28.3%</p>');
    expect(html).toContain('<p>Products below 50% of capacity: 2</p>');
    expect(html).not.toContain('Total inventory value');
  });

  it('renders alert rows and critical items with escaped names', () => {
    expect(html).toContain('<td>Widget &lt;A&gt;</td>');
    expect(html).toContain('<td>5.0%</td>');
    expect(html).toContain('<h3>Critical Items (1)</h3>');
    expect(html).toContain('<li><strong>Widget &lt;A&gt;</strong>: 0 units</li>');
  });

  it('shows the inventory value when every product is priced', () => {
    const priced = render([record('Anvil', 0, 2.5), record('Bolt', 5, 4), record('Crate', 80, 1.25)]);

    expect(renderStockReportHtml(priced)).toContain('<p>Total inventory value: 120.00</p>');
  });

  it('says so when nothing is low on stock', () => {
    const healthy = renderStockReportHtml(render([record('Crate', 80)]));

    expect(healthy).toContain('<p>No products are below their minimum threshold.</p>');
    expect(healthy).not.toContain('Critical Items');
  });
});

describe('renderStockReportText', () => {
  it('lists the low-stock products', () => {
    const text = renderStockReportText(render([record('Anvil', 0), record('Bolt', 5), record('Crate', 80)]));

    expect(text).toBe(
      [
        'Low Stock Alert Report',
        '',
        'The following products are at or below their minimum stock threshold:',
        '',
        '- Anvil: 0 units (Minimum: 10)',
        '- Bolt: 5 units (Minimum: 10)',
        '',
        'The full report is attached as a PDF.'
      ].join('\n')
    );
  });

  it('mentions products beyond the listed five', () => {
    const records = [1, 2, 3, 4, 5, 6, 7].map((stock) => record(`Item ${stock}`, stock));

    const lines = renderStockReportText(render(records)).split('\n');

    expect(lines).toContain('...and 2 more');
    expect(lines.filter((line) => line.startsWith('- '))).toHaveLength(5);
  });
});
