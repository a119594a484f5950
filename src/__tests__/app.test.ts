import { describe, expect, it, vi } from 'vitest';
import { createPurchasesHandler, createStatusHandler, healthHandler, type StatusSource } from '../app';
import type { PurchaseAttempt } from '../db/PurchaseStore';

const attempt: PurchaseAttempt = {
  id: 3,
  kind: 'ticket',
  status: 'published',
  network: 'testnet3',
  amount: '100002980',
  mixed: false,
  fundingTxHash: 'aa'.repeat(32),
  fundingOutputIndex: 0,
  publishedTxHash: 'bb'.repeat(32),
  errorCode: null,
  errorMessage: null,
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:00:01.000Z',
};

function source(withStore = true) {
  const store = {
    listRecent: vi.fn(async () => [attempt]),
    lastAttempt: vi.fn(async () => attempt),
  };
  const status: StatusSource = {
    network: 'testnet3',
    mixed: false,
    buyer: {
      status: () => ({ inFlight: false, attempts: 4, lastError: null, lastTicketHash: 'bb'.repeat(32) }),
    },
    store: withStore ? store : undefined,
  };
  return { status, store };
}

describe('/health', () => {
  it('reports ok', () => {
    const res = createMockRes();
    healthHandler({ query: {} }, res);
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok' });
    expect(typeof res.body.timestamp).toBe('string');
  });
});

describe('/api/status', () => {
  it('combines buyer status with the last recorded attempt', async () => {
    const { status } = source();
    const res = createMockRes();
    await createStatusHandler(status)({ query: {} }, res);
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      network: 'testnet3',
      mixed: false,
      inFlight: false,
      attempts: 4,
      lastError: null,
      lastTicketHash: 'bb'.repeat(32),
      lastAttempt: attempt,
    });
  });

  it('reports ledger failures', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { status, store } = source();
    store.lastAttempt.mockRejectedValueOnce(new Error('SQLITE_BUSY'));
    const res = createMockRes();
    await createStatusHandler(status)({ query: {} }, res);
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: 'SQLITE_BUSY' });
  });
});

describe('/api/purchases', () => {
  it('lists recent attempts', async () => {
    const { status, store } = source();
    const res = createMockRes();
    await createPurchasesHandler(status)({ query: { limit: '5' } }, res);
    expect(store.listRecent).toHaveBeenCalledWith(5);
    expect(res.body).toEqual({ purchases: [attempt] });
  });

  it('caps the limit', async () => {
    const { status, store } = source();
    await createPurchasesHandler(status)({ query: { limit: '500' } }, createMockRes());
    expect(store.listRecent).toHaveBeenCalledWith(200);
  });

  it('rejects a malformed limit', async () => {
    const { status, store } = source();
    const res = createMockRes();
    await createPurchasesHandler(status)({ query: { limit: 'abc' } }, res);
    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: 'limit must be a positive integer' });
    expect(store.listRecent).not.toHaveBeenCalled();
  });

  it('returns nothing without a ledger', async () => {
    const { status } = source(false);
    const res = createMockRes();
    await createPurchasesHandler(status)({ query: {} }, res);
    expect(res.body).toEqual({ purchases: [] });
  });
});

function createMockRes() {
  return new MockRes();
}

class MockRes {
  statusCode = 200;
  body: Record<string, unknown> = {};

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(payload: unknown): this {
    this.body = isRecord(payload) ? payload : { value: payload };
    return this;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
