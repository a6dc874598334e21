import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  productFind: vi.fn(),
  transactionFind: vi.fn(),
  limit: vi.fn(),
  userFindById: vi.fn()
}));

vi.mock('../models/Product', () => ({ default: { find: mocks.productFind } }));
vi.mock('../models/Transaction', () => ({
  TRANSACTION_TYPES: ['STOCK_IN', 'STOCK_OUT'],
  default: { find: mocks.transactionFind }
}));
vi.mock('../models/User', () => ({
  default: { findById: mocks.userFindById },
  USER_ROLES: ['admin', 'manager', 'staff']
}));
vi.mock('../utils/emailService', () => ({ sendEmail: vi.fn(), sendPasswordResetEmail: vi.fn() }));

import { startTestServer, TestServer } from '../testing/testServer';
import { signAccessToken } from '../utils/tokens';

const products = [
  { name: 'Anvil', sku: 'ANV-1', stockQuantity: 0, minThreshold: 10, maxThreshold: 100, price: 2 },
  { name: 'Bolt', sku: 'BLT-1', stockQuantity: 5, minThreshold: 10, maxThreshold: 100, price: 1 },
  { name: 'Crate', sku: 'CRT-1', stockQuantity: 80, minThreshold: 10, maxThreshold: 100, price: 3 }
];

let server: TestServer;

beforeAll(async () => {
  server = await startTestServer();
});

afterAll(async () => {
  await server.close();
});

beforeEach(() => {
  vi.clearAllMocks();
  mocks.userFindById.mockResolvedValue({ _id: 'user-1', role: 'staff', isActive: true });
  mocks.productFind.mockReturnValue({ select: () => ({ sort: () => Promise.resolve(products) }) });
  mocks.limit.mockResolvedValue([{ type: 'STOCK_IN', quantity: 3 }]);
  mocks.transactionFind.mockReturnValue({
    populate: () => ({ populate: () => ({ sort: () => ({ limit: mocks.limit }) }) })
  });
});

describe('GET /api/dashboard', () => {
  it('combines the report summary with recent movements', async () => {
    const res = await fetch(`${server.url}/api/dashboard`, {
      headers: { Authorization: `Bearer ${signAccessToken('user-1')}` }
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      summary: {
        totalProducts: 3,
        lowStockCount: 2,
        criticalItemsCount: 1,
        itemsBelow50Pct: 2,
        avgStockLevel: 85 / 3,
        totalInventoryValue: 245,
        totalStock: 85
      },
      lowStockItems: [
        expect.objectContaining({ sku: 'ANV-1', status: 'OUT_OF_STOCK' }),
        expect.objectContaining({ sku: 'BLT-1', status: 'LOW_STOCK' })
      ],
      criticalItems: [expect.objectContaining({ sku: 'ANV-1' })],
      recentTransactions: [{ type: 'STOCK_IN', quantity: 3 }]
    });
    expect(mocks.limit).toHaveBeenCalledWith(10);
  });
});
