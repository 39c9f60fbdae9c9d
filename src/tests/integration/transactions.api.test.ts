import request from 'supertest';
import { PoolClient } from 'pg';
import { LedgerModule, MockedDependencies, apiLedger } from '@/tests/utils/apiLedger';
import app from '@/app';

jest.mock('@/config/dependencies', () => {
  const ledger = jest
    .requireActual<LedgerModule>('@/tests/utils/inMemoryLedger')
    .createInMemoryLedger();
  return { ...ledger.services, mockLedger: ledger };
});

jest.mock('@/config/database', () => ({
  transaction: <T>(callback: (client: PoolClient) => Promise<T>) =>
    jest.requireMock<MockedDependencies>('@/config/dependencies').mockLedger.runInTransaction(callback),
}));

const USER = '1';
const BTC = 1;
const USDT = 2;

describe('Transactions API', () => {
  let portfolioId: number;
  let walletId: number;

  const buy = (overrides: Record<string, unknown> = {}) => ({
    type: 'Buy',
    date: '2024-03-01T10:00:00.000Z',
    instrumentId: BTC,
    instrument2Id: USDT,
    quantity: '0.1',
    quantity2: '6000',
    priceUsd: '59500',
    portfolioId,
    walletId,
    ...overrides,
  });

  beforeEach(async () => {
    apiLedger().reset();

    const portfolio = await request(app)
      .post('/api/v1/portfolios')
      .set('X-User-Id', USER)
      .send({ name: 'Long term', market: 'Binance' })
      .expect(201);
    const wallet = await request(app)
      .post('/api/v1/wallets')
      .set('X-User-Id', USER)
      .send({ name: 'Cold storage' })
      .expect(201);

    portfolioId = portfolio.body.id;
    walletId = wallet.body.id;
  });

  it('should require X-User-Id', async () => {
    const response = await request(app).get('/api/v1/transactions').expect(401);

    expect(response.body).toEqual({
      success: false,
      error: { message: 'Missing or invalid X-User-Id header' },
    });
  });

  describe('POST /api/v1/transactions', () => {
    it('should record a Buy and return the touched positions', async () => {
      const response = await request(app)
        .post('/api/v1/transactions')
        .set('X-User-Id', USER)
        .send(buy())
        .expect(201);

      expect(response.body.transaction).toMatchObject({
        type: 'Buy',
        date: '2024-03-01T10:00:00.000Z',
        quantity: '0.1',
        order: false,
        portfolioId,
        walletId,
      });
      expect(response.body.portfolioPositions).toEqual([
        expect.objectContaining({ instrumentId: BTC, quantity: '0.1', amount: '5950' }),
        expect.objectContaining({ instrumentId: USDT, quantity: '-6000', amount: '6000' }),
      ]);
      expect(response.body.walletPositions).toEqual([
        expect.objectContaining({ instrumentId: BTC, quantity: '0.1' }),
        expect.objectContaining({ instrumentId: USDT, quantity: '-6000' }),
      ]);
    });

    it('should accept JSON numbers for decimal fields', async () => {
      const response = await request(app)
        .post('/api/v1/transactions')
        .set('X-User-Id', USER)
        .send({ type: 'Input', instrumentId: BTC, quantity: 2.5, walletId })
        .expect(201);

      expect(response.body.walletPositions).toEqual([
        expect.objectContaining({ ownerId: walletId, instrumentId: BTC, quantity: '2.5' }),
      ]);
      expect(response.body.portfolioPositions).toEqual([]);
    });

    it('should reject a malformed payload with field details', async () => {
      const response = await request(app)
        .post('/api/v1/transactions')
        .set('X-User-Id', USER)
        .send(buy({ quantity: 'a lot' }))
        .expect(400);

      expect(response.body.error.message).toBe('Invalid transaction data');
      expect(response.body.error.details.fieldErrors.quantity).toEqual(['Must be a decimal number']);
    });

    it('should name the fields a type is missing', async () => {
      const response = await request(app)
        .post('/api/v1/transactions')
        .set('X-User-Id', USER)
        .send(buy({ walletId: undefined }))
        .expect(400);

      expect(response.body.error).toEqual({
        message: 'Missing required fields for Buy transaction: walletId',
        details: { missing: ['walletId'] },
      });
    });

    it("should not write into another user's portfolio", async () => {
      await request(app)
        .post('/api/v1/transactions')
        .set('X-User-Id', '2')
        .send({ type: 'Input', instrumentId: BTC, quantity: '1', portfolioId })
        .expect(404);

      expect(apiLedger().store.portfolioPositions).toEqual([]);
    });
  });

  describe('GET /api/v1/transactions/:transactionId', () => {
    it('should return a stored transaction', async () => {
      const created = await request(app)
        .post('/api/v1/transactions')
        .set('X-User-Id', USER)
        .send(buy())
        .expect(201);
      const id = created.body.transaction.id;

      const response = await request(app)
        .get(`/api/v1/transactions/${id}`)
        .set('X-User-Id', USER)
        .expect(200);

      expect(response.body).toMatchObject({ id, type: 'Buy', quantity2: '6000' });
    });

    it('should validate the id and report missing transactions', async () => {
      const invalid = await request(app).get('/api/v1/transactions/abc').set('X-User-Id', USER).expect(400);
      expect(invalid.body.error.message).toBe('Invalid transaction ID');

      const missing = await request(app).get('/api/v1/transactions/999').set('X-User-Id', USER).expect(404);
      expect(missing.body.error.message).toBe('Transaction with ID 999 not found');
    });
  });

  describe('PUT and DELETE', () => {
    it('should replace a transaction and then remove it', async () => {
      const created = await request(app)
        .post('/api/v1/transactions')
        .set('X-User-Id', USER)
        .send(buy())
        .expect(201);
      const id = created.body.transaction.id;

      const updated = await request(app)
        .put(`/api/v1/transactions/${id}`)
        .set('X-User-Id', USER)
        .send(buy({ quantity: '0.2', quantity2: '12000', priceUsd: '60000' }))
        .expect(200);

      expect(updated.body.previous.quantity).toBe('0.1');
      expect(updated.body.portfolioPositions[0]).toMatchObject({ quantity: '0.2', amount: '12000' });

      const deleted = await request(app)
        .delete(`/api/v1/transactions/${id}`)
        .set('X-User-Id', USER)
        .expect(200);

      expect(deleted.body.portfolioPositions).toEqual([
        expect.objectContaining({ instrumentId: BTC, quantity: '0', amount: '0' }),
        expect.objectContaining({ instrumentId: USDT, quantity: '0', amount: '0' }),
      ]);
      await request(app).get(`/api/v1/transactions/${id}`).set('X-User-Id', USER).expect(404);
    });
  });

  describe('POST /api/v1/transactions/:transactionId/execute', () => {
    it('should execute a pending order once', async () => {
      const created = await request(app)
        .post('/api/v1/transactions')
        .set('X-User-Id', USER)
        .send(buy({ order: true }))
        .expect(201);
      const id = created.body.transaction.id;

      const executed = await request(app)
        .post(`/api/v1/transactions/${id}/execute`)
        .set('X-User-Id', USER)
        .expect(200);

      expect(executed.body.transaction.order).toBe(false);
      expect(executed.body.portfolioPositions[0]).toMatchObject({ quantity: '0.1', buyOrders: '0' });

      const again = await request(app)
        .post(`/api/v1/transactions/${id}/execute`)
        .set('X-User-Id', USER)
        .expect(422);
      expect(again.body.error.message).toBe(`Transaction ${id} is not a pending order`);
    });
  });

  describe('GET /api/v1/transactions', () => {
    it('should filter and paginate', async () => {
      for (const date of ['2024-01-01T00:00:00.000Z', '2024-01-02T00:00:00.000Z']) {
        await request(app)
          .post('/api/v1/transactions')
          .set('X-User-Id', USER)
          .send({ type: 'Input', date, instrumentId: BTC, quantity: '1', portfolioId })
          .expect(201);
      }

      const response = await request(app)
        .get('/api/v1/transactions')
        .query({ limit: 1, type: 'Input', instrumentId: BTC })
        .set('X-User-Id', USER)
        .expect(200);

      expect(response.body.transactions).toHaveLength(1);
      expect(response.body.transactions[0].date).toBe('2024-01-02T00:00:00.000Z');
      expect(response.body).toMatchObject({ hasMore: true, nextCursor: '2024-01-02T00:00:00.000Z_5' });

      const next = await request(app)
        .get('/api/v1/transactions')
        .query({ limit: 1, cursor: response.body.nextCursor })
        .set('X-User-Id', USER)
        .expect(200);
      expect(next.body.transactions.map((row: { date: string }) => row.date)).toEqual([
        '2024-01-01T00:00:00.000Z',
      ]);
      expect(next.body.hasMore).toBe(false);

      await request(app).get('/api/v1/transactions').query({ limit: 0 }).set('X-User-Id', USER).expect(400);
    });
  });

  describe('GET /api/v1/instruments/:instrumentId/distribution', () => {
    it('should report both domains', async () => {
      await request(app).post('/api/v1/transactions').set('X-User-Id', USER).send(buy()).expect(201);

      const response = await request(app)
        .get(`/api/v1/instruments/${BTC}/distribution`)
        .set('X-User-Id', USER)
        .expect(200);

      expect(response.body).toEqual({
        instrumentId: BTC,
        portfolios: {
          instrumentId: BTC,
          domain: 'portfolio',
          totalQuantity: '0.1',
          totalAmount: '5950',
          entries: [
            { ownerId: portfolioId, ownerName: 'Long term', quantity: '0.1', amount: '5950', percentage: 100 },
          ],
        },
        wallets: {
          instrumentId: BTC,
          domain: 'wallet',
          totalQuantity: '0.1',
          totalAmount: null,
          entries: [
            { ownerId: walletId, ownerName: 'Cold storage', quantity: '0.1', amount: null, percentage: 100 },
          ],
        },
      });
    });
  });
});
