import { describe, expect, it } from 'vitest';
import { InvalidRecordError } from './errors';
import {
  attachReportMetadata,
  buildReport,
  classifyStock,
  ProductStockRecord,
  REPORT_LIST_LIMIT,
  stockLevelPercent
} from './stockReport';

const record = (overrides: Partial<ProductStockRecord> = {}): ProductStockRecord => ({
  name: 'Widget',
  sku: 'WID-001',
  currentStock: 50,
  minThreshold: 10,
  maxThreshold: 100,
  ...overrides
});

const outOfStock = record({ name: 'Anvil', sku: 'ANV-1', currentStock: 0 });
const lowStock = record({ name: 'Bolt', sku: 'BLT-1', currentStock: 5 });
const healthy = record({ name: 'Crate', sku: 'CRT-1', currentStock: 80 });

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
};

describe('classifyStock', () => {
  it('treats zero stock as out of stock regardless of threshold', () => {
    expect(classifyStock(0, 10)).toBe('OUT_OF_STOCK');
    expect(classifyStock(0, 0)).toBe('OUT_OF_STOCK');
  });

  it('treats stock at or below the minimum as low', () => {
    expect(classifyStock(1, 10)).toBe('LOW_STOCK');
    expect(classifyStock(10, 10)).toBe('LOW_STOCK');
  });

  it('treats stock above the minimum as normal', () => {
    expect(classifyStock(11, 10)).toBe('NORMAL');
    expect(classifyStock(3, 0)).toBe('NORMAL');
  });
});

describe('stockLevelPercent', () => {
  it('returns 0 when the maximum is 0', () => {
    expect(stockLevelPercent(0, 0)).toBe(0);
    expect(stockLevelPercent(25, 0)).toBe(0);
  });

  it('keeps values above 100 for overstock', () => {
    expect(stockLevelPercent(150, 100)).toBe(150);
  });

  it('computes the percentage of capacity', () => {
    expect(stockLevelPercent(80, 100)).toBe(80);
    expect(stockLevelPercent(1, 3)).toBeCloseTo(33.333, 3);
  });
});

describe('buildReport', () => {
  it('reports an out-of-stock product as low stock and critical', () => {
    const report = buildReport([outOfStock]);

    expect(report.items[0]).toMatchObject({ status: 'OUT_OF_STOCK', stockLevelPct: 0 });
    expect(report.lowStockItems.map((item) => item.sku)).toEqual(['ANV-1']);
    expect(report.criticalItems.map((item) => item.sku)).toEqual(['ANV-1']);
  });

  it('reports a low-stock product as low stock but not critical', () => {
    const report = buildReport([lowStock]);

    expect(report.items[0]).toMatchObject({ status: 'LOW_STOCK', stockLevelPct: 5 });
    expect(report.lowStockItems.map((item) => item.sku)).toEqual(['BLT-1']);
    expect(report.criticalItems).toEqual([]);
  });

  it('leaves a healthy product out of both lists', () => {
    const report = buildReport([healthy]);

    expect(report.items[0]).toMatchObject({ status: 'NORMAL', stockLevelPct: 80 });
    expect(report.lowStockItems).toEqual([]);
    expect(report.criticalItems).toEqual([]);
  });

  it('bounds the critical list at five while counting every critical item', () => {
    const records = Array.from({ length: 7 }, (_, i) =>
      record({ name: `Empty ${i}`, sku: `EMP-${i}`, currentStock: 0 })
    );

    const report = buildReport(records);

    expect(report.criticalItems).toHaveLength(REPORT_LIST_LIMIT);
    expect(report.summary.criticalItemsCount).toBe(7);
    expect(report.lowStockItems).toHaveLength(REPORT_LIST_LIMIT);
    expect(report.summary.lowStockCount).toBe(7);
    // equal percentages keep input order
    expect(report.criticalItems.map((item) => item.sku)).toEqual(['EMP-0', 'EMP-1', 'EMP-2', 'EMP-3', 'EMP-4']);
  });

  it('computes the summary figures', () => {
    const report = buildReport([outOfStock, lowStock, healthy]);

    expect(report.summary.totalProducts).toBe(3);
    expect(report.summary.lowStockCount).toBe(2);
    expect(report.summary.criticalItemsCount).toBe(1);
    expect(report.summary.itemsBelow50Pct).toBe(2);
    expect(report.summary.avgStockLevel).toBeCloseTo(85 / 3, 10);
    expect('totalInventoryValue' in report.summary).toBe(false);
  });

  it('keeps the full item table in input order', () => {
    const report = buildReport([healthy, outOfStock, lowStock]);

    expect(report.items.map((item) => item.sku)).toEqual(['CRT-1', 'ANV-1', 'BLT-1']);
  });

  it('sorts alerts by ascending stock level', () => {
    const report = buildReport([
      record({ sku: 'A', currentStock: 8, minThreshold: 10, maxThreshold: 20 }),
      record({ sku: 'B', currentStock: 3, minThreshold: 10, maxThreshold: 100 }),
      record({ sku: 'C', currentStock: 0, minThreshold: 10, maxThreshold: 100 }),
      record({ sku: 'D', currentStock: 10, minThreshold: 10, maxThreshold: 50 }),
      record({ sku: 'E', currentStock: 90, minThreshold: 10, maxThreshold: 100 })
    ]);

    expect(report.lowStockItems.map((item) => item.sku)).toEqual(['C', 'B', 'D', 'A']);
    expect(report.lowStockItems.map((item) => item.stockLevelPct)).toEqual([0, 3, 20, 40]);
  });

  it('keeps the lowest five when more products are low', () => {
    const records = [9, 2, 7, 4, 1, 8, 3, 6].map((stock) =>
      record({ sku: `S${stock}`, currentStock: stock, minThreshold: 10, maxThreshold: 100 })
    );

    const report = buildReport(records);

    expect(report.lowStockItems.map((item) => item.sku)).toEqual(['S1', 'S2', 'S3', 'S4', 'S6']);
    expect(report.summary.lowStockCount).toBe(8);
  });

  it('reports 0% for products without a maximum threshold', () => {
    const report = buildReport([
      record({ sku: 'Z1', currentStock: 0, minThreshold: 0, maxThreshold: 0 }),
      record({ sku: 'Z2', currentStock: 4, minThreshold: 0, maxThreshold: 0 })
    ]);

    expect(report.items.map((item) => item.stockLevelPct)).toEqual([0, 0]);
    expect(report.items.map((item) => item.status)).toEqual(['OUT_OF_STOCK', 'NORMAL']);
  });

  it('returns zeroed figures for an empty list', () => {
    const report = buildReport([]);

    expect(report.items).toEqual([]);
    expect(report.lowStockItems).toEqual([]);
    expect(report.criticalItems).toEqual([]);
    expect(report.summary).toEqual({
      totalProducts: 0,
      lowStockCount: 0,
      criticalItemsCount: 0,
      itemsBelow50Pct: 0,
      avgStockLevel: 0
    });
  });

  it('adds the inventory value only when every record has a price', () => {
    const priced = buildReport([
      { ...outOfStock, unitPrice: 2.5 },
      { ...lowStock, unitPrice: 4 },
      { ...healthy, unitPrice: 1.25 }
    ]);
    const partlyPriced = buildReport([{ ...outOfStock, unitPrice: 2.5 }, healthy]);

    expect(priced.summary.totalInventoryValue).toBe(120);
    expect('totalInventoryValue' in partlyPriced.summary).toBe(false);
  });

  it('returns the same report for the same input without touching it', () => {
    const records = [outOfStock, lowStock, healthy];
    const before = JSON.parse(JSON.stringify(records));

    const first = buildReport(records);
    const second = buildReport(records);

    expect(first).toEqual(second);
    expect(records).toEqual(before);
  });

  describe('invalid records', () => {
    it('rejects negative stock and names the field', () => {
      const error = captureError(() => buildReport([healthy, record({ currentStock: -1 })]));

      expect(error).toBeInstanceOf(InvalidRecordError);
      expect(error).toMatchObject({
        field: 'currentStock',
        index: 1,
        statusCode: 422,
        message: 'Invalid record at index 1: currentStock must not be negative'
      });
    });

    it('rejects a maximum below the minimum', () => {
      const error = captureError(() => buildReport([record({ minThreshold: 20, maxThreshold: 10 })]));

      expect(error).toMatchObject({
        field: 'maxThreshold',
        index: 0,
        message: 'Invalid record at index 0: maxThreshold must be greater than or equal to minThreshold'
      });
    });

    it('rejects non-numeric and fractional stock values', () => {
      expect(captureError(() => buildReport([{ ...healthy, currentStock: '5' }]))).toMatchObject({
        field: 'currentStock',
        message: 'Invalid record at index 0: currentStock must be a number'
      });
      expect(captureError(() => buildReport([record({ minThreshold: 2.5 })]))).toMatchObject({
        field: 'minThreshold',
        message: 'Invalid record at index 0: minThreshold must be an integer'
      });
    });

    it('rejects a missing sku and a negative price', () => {
      const { sku: _sku, ...withoutSku } = healthy;

      expect(captureError(() => buildReport([withoutSku]))).toMatchObject({
        field: 'sku',
        message: 'Invalid record at index 0: sku is required'
      });
      expect(captureError(() => buildReport([record({ unitPrice: -1 })]))).toMatchObject({
        field: 'unitPrice'
      });
    });
  });
});

describe('attachReportMetadata', () => {
  it('adds the caller metadata to the report', () => {
    const generatedAt = new Date('2024-05-01T08:00:00Z');
    const report = attachReportMetadata(buildReport([lowStock]), {
      companyName: 'Acme',
      reportType: 'Stock Level Report',
      generatedAt
    });

    expect(report.companyName).toBe('Acme');
    expect(report.reportType).toBe('Stock Level Report');
    expect(report.generatedAt).toBe(generatedAt);
    expect(report.summary.lowStockCount).toBe(1);
  });
});
