import { z } from 'zod';
import { InvalidRecordError } from './errors';

/**
 * Stock report aggregation.
 *
 * Turns a list of product stock records into the per-item table, the
 * bounded alert lists and the summary figures used by the stock report
 * email, the PDF export and the dashboard. Pure and synchronous: records
 * are validated up front and never modified.
 */

export const REPORT_LIST_LIMIT = 5;

export type StockStatus = 'NORMAL' | 'LOW_STOCK' | 'OUT_OF_STOCK';

export interface ProductStockRecord {
  name: string;
  sku: string;
  currentStock: number;
  minThreshold: number;
  maxThreshold: number;
  /** Per-unit price. Only when every record has one is an inventory value reported. */
  unitPrice?: number;
}

export interface ReportItem extends Readonly<ProductStockRecord> {
  readonly stockLevelPct: number;
  readonly status: StockStatus;
}

export interface ReportSummary {
  readonly totalProducts: number;
  readonly lowStockCount: number;
  readonly criticalItemsCount: number;
  readonly itemsBelow50Pct: number;
  readonly avgStockLevel: number;
  readonly totalInventoryValue?: number;
}

export interface ReportResult {
  readonly items: readonly ReportItem[];
  readonly lowStockItems: readonly ReportItem[];
  readonly criticalItems: readonly ReportItem[];
  readonly summary: ReportSummary;
}

export interface ReportMetadata {
  readonly companyName: string;
  readonly reportType: string;
  readonly generatedAt: Date;
}

export type RenderableReport = ReportResult & ReportMetadata;

const stockCount = z
  .number({
    required_error: 'is required',
    invalid_type_error: 'must be a number'
  })
  .int('must be an integer')
  .min(0, 'must not be negative');

const label = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .refine((value) => value.trim().length > 0, 'must not be empty');

const stockRecordSchema = z
  .object({
    name: label,
    sku: label,
    currentStock: stockCount,
    minThreshold: stockCount,
    maxThreshold: stockCount,
    unitPrice: z
      .number({ invalid_type_error: 'must be a number' })
      .finite('must be finite')
      .min(0, 'must not be negative')
      .optional()
  })
  .refine((record) => record.maxThreshold >= record.minThreshold, {
    path: ['maxThreshold'],
    message: 'must be greater than or equal to minThreshold'
  });

/**
 * Validates raw records, throwing InvalidRecordError for the first bad
 * field found. Values are returned exactly as given.
 */
export const validateStockRecords = (records: readonly unknown[]): ProductStockRecord[] =>
  records.map((record, index) => {
    const result = stockRecordSchema.safeParse(record);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'record';
      throw new InvalidRecordError(field, index, issue?.message ?? 'is invalid');
    }
    return result.data;
  });

export const classifyStock = (currentStock: number, minThreshold: number): StockStatus => {
  if (currentStock === 0) {
    return 'OUT_OF_STOCK';
  }
  if (currentStock <= minThreshold) {
    return 'LOW_STOCK';
  }
  return 'NORMAL';
};

// Not clamped: above 100 means overstock.
export const stockLevelPercent = (currentStock: number, maxThreshold: number): number =>
  maxThreshold === 0 ? 0 : (currentStock * 100) / maxThreshold;

const byStockLevel = (a: ReportItem, b: ReportItem): number => a.stockLevelPct - b.stockLevelPct;

export const buildReport = (records: readonly unknown[]): ReportResult => {
  const validated = validateStockRecords(records);

  const items: ReportItem[] = validated.map((record) => ({
    ...record,
    stockLevelPct: stockLevelPercent(record.currentStock, record.maxThreshold),
    status: classifyStock(record.currentStock, record.minThreshold)
  }));

  // Array.prototype.sort is stable, so ties keep input order
  const lowStock = items.filter((item) => item.status !== 'NORMAL').sort(byStockLevel);
  const critical = lowStock.filter((item) => item.status === 'OUT_OF_STOCK');

  const totalPct = items.reduce((sum, item) => sum + item.stockLevelPct, 0);
  const priced = items.length > 0 && items.every((item) => item.unitPrice !== undefined);

  const summary: ReportSummary = {
    totalProducts: items.length,
    lowStockCount: lowStock.length,
    criticalItemsCount: critical.length,
    itemsBelow50Pct: items.filter((item) => item.stockLevelPct < 50).length,
    avgStockLevel: items.length === 0 ? 0 : totalPct / items.length,
    ...(priced
      ? {
          totalInventoryValue: items.reduce(
            (sum, item) => sum + item.currentStock * (item.unitPrice ?? 0),
            0
          )
        }
      : {})
  };

  return {
    items,
    lowStockItems: lowStock.slice(0, REPORT_LIST_LIMIT),
    criticalItems: critical.slice(0, REPORT_LIST_LIMIT),
    summary
  };
};

export const attachReportMetadata = (
  report: ReportResult,
  metadata: ReportMetadata
): RenderableReport => ({ ...report, ...metadata });
