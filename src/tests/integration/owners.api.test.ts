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

describe('Portfolios API', () => {
  beforeEach(() => {
    apiLedger().reset();
  });

  const createPortfolio = (body: Record<string, unknown>) =>
    request(app).post('/api/v1/portfolios').set('X-User-Id', USER).send(body);

  it('should create a portfolio for the caller', async () => {
    const response = await createPortfolio({ name: '  Long term ', market: 'Binance' }).expect(201);

    expect(response.body).toEqual({
      id: 1,
      userId: 1,
      name: 'Long term',
      market: 'Binance',
      comment: null,
    });
  });

  it('should reject an empty name', async () => {
    const response = await createPortfolio({ name: '' }).expect(400);

    expect(response.body.error.message).toBe('Invalid portfolio data');
    expect(response.body.error.details.fieldErrors.name).toHaveLength(1);
  });

  it('should keep names unique per user', async () => {
    await createPortfolio({ name: 'Long term' }).expect(201);

    const duplicate = await createPortfolio({ name: 'Long term' }).expect(409);
    expect(duplicate.body.error.message).toBe('Portfolio named "Long term" already exists');

    await request(app)
      .post('/api/v1/portfolios')
      .set('X-User-Id', '2')
      .send({ name: 'Long term' })
      .expect(201);
  });

  it('should list and fetch portfolios with their positions', async () => {
    await createPortfolio({ name: 'Long term' }).expect(201);
    await request(app)
      .post('/api/v1/transactions')
      .set('X-User-Id', USER)
      .send({ type: 'Input', instrumentId: BTC, quantity: '2', portfolioId: 1 })
      .expect(201);

    const list = await request(app).get('/api/v1/portfolios').set('X-User-Id', USER).expect(200);
    expect(list.body).toHaveLength(1);
    expect(list.body[0].positions).toEqual([
      expect.objectContaining({ ownerId: 1, instrumentId: BTC, quantity: '2', amount: '0' }),
    ]);

    const single = await request(app).get('/api/v1/portfolios/1').set('X-User-Id', USER).expect(200);
    expect(single.body).toMatchObject({ id: 1, name: 'Long term' });

    await request(app).get('/api/v1/portfolios').set('X-User-Id', '2').expect(200, []);
  });

  it("should hide another user's portfolio", async () => {
    await createPortfolio({ name: 'Long term' }).expect(201);

    const response = await request(app).get('/api/v1/portfolios/1').set('X-User-Id', '2').expect(404);
    expect(response.body.error.message).toBe('Portfolio with ID 1 not found');
  });

  it('should validate the portfolio id', async () => {
    const response = await request(app).get('/api/v1/portfolios/x').set('X-User-Id', USER).expect(400);
    expect(response.body.error.message).toBe('Invalid portfolio ID');
  });

  it('should rename a portfolio', async () => {
    await createPortfolio({ name: 'Long term' }).expect(201);

    const response = await request(app)
      .put('/api/v1/portfolios/1')
      .set('X-User-Id', USER)
      .send({ name: 'Retirement', comment: 'monthly' })
      .expect(200);

    expect(response.body).toEqual({
      id: 1,
      userId: 1,
      name: 'Retirement',
      market: null,
      comment: 'monthly',
    });
  });

  it('should refuse to delete a portfolio that transactions reference', async () => {
    await createPortfolio({ name: 'Long term' }).expect(201);
    await request(app)
      .post('/api/v1/transactions')
      .set('X-User-Id', USER)
      .send({ type: 'Input', instrumentId: BTC, quantity: '2', portfolioId: 1 })
      .expect(201);

    const response = await request(app).delete('/api/v1/portfolios/1').set('X-User-Id', USER).expect(409);
    expect(response.body.error.message).toBe(
      'Portfolio 1 is referenced by 1 transaction(s); delete them first'
    );
  });

  it('should delete an unused portfolio', async () => {
    await createPortfolio({ name: 'Long term' }).expect(201);

    await request(app).delete('/api/v1/portfolios/1').set('X-User-Id', USER).expect(204);
    await request(app).get('/api/v1/portfolios/1').set('X-User-Id', USER).expect(404);
  });

  describe('POST /api/v1/portfolios/:id/positions', () => {
    it('should open an empty position once', async () => {
      await createPortfolio({ name: 'Long term' }).expect(201);

      const response = await request(app)
        .post('/api/v1/portfolios/1/positions')
        .set('X-User-Id', USER)
        .send({ instrumentId: 3 })
        .expect(201);
      expect(response.body).toEqual({
        id: 2,
        ownerId: 1,
        instrumentId: 3,
        quantity: '0',
        amount: '0',
        buyOrders: '0',
        sellOrders: '0',
      });

      const duplicate = await request(app)
        .post('/api/v1/portfolios/1/positions')
        .set('X-User-Id', USER)
        .send({ instrumentId: 3 })
        .expect(409);
      expect(duplicate.body.error.message).toBe('Portfolio 1 already has a position in instrument 3');
    });

    it('should validate the instrument id', async () => {
      await createPortfolio({ name: 'Long term' }).expect(201);

      const response = await request(app)
        .post('/api/v1/portfolios/1/positions')
        .set('X-User-Id', USER)
        .send({ instrumentId: 'x' })
        .expect(400);
      expect(response.body.error.message).toBe('Invalid position data');
    });
  });

  describe('DELETE /api/v1/portfolios/:id/positions/:instrumentId', () => {
    it('should remove an unused position', async () => {
      await createPortfolio({ name: 'Long term' }).expect(201);
      await request(app)
        .post('/api/v1/portfolios/1/positions')
        .set('X-User-Id', USER)
        .send({ instrumentId: 3 })
        .expect(201);

      await request(app).delete('/api/v1/portfolios/1/positions/3').set('X-User-Id', USER).expect(204);
      await request(app).get('/api/v1/portfolios/1/positions/3').set('X-User-Id', USER).expect(404);
    });

    it('should refuse while transactions build the position', async () => {
      await createPortfolio({ name: 'Long term' }).expect(201);
      await request(app)
        .post('/api/v1/transactions')
        .set('X-User-Id', USER)
        .send({ type: 'Input', instrumentId: BTC, quantity: '2', portfolioId: 1 })
        .expect(201);

      const response = await request(app)
        .delete(`/api/v1/portfolios/1/positions/${BTC}`)
        .set('X-User-Id', USER)
        .expect(409);
      expect(response.body.error.message).toBe(
        'Position in instrument 1 is built by 1 transaction(s); delete them first'
      );
    });
  });

  describe('GET /api/v1/portfolios/:id/positions/:instrumentId', () => {
    it('should return the position, its transactions and the distribution', async () => {
      await createPortfolio({ name: 'Long term' }).expect(201);
      await createPortfolio({ name: 'Trading' }).expect(201);
      for (const [portfolioId, quantity] of [
        [1, '3'],
        [2, '1'],
      ] as const) {
        await request(app)
          .post('/api/v1/transactions')
          .set('X-User-Id', USER)
          .send({ type: 'Input', instrumentId: BTC, quantity, portfolioId })
          .expect(201);
      }

      const response = await request(app)
        .get(`/api/v1/portfolios/1/positions/${BTC}`)
        .set('X-User-Id', USER)
        .expect(200);

      expect(response.body.position).toMatchObject({ ownerId: 1, instrumentId: BTC, quantity: '3' });
      expect(response.body.transactions).toHaveLength(1);
      expect(response.body.distribution).toMatchObject({ domain: 'portfolio', totalQuantity: '4' });
      expect(response.body.distribution.entries.map((entry: { percentage: number }) => entry.percentage)).toEqual([
        75, 25,
      ]);
    });

    it('should report a missing position', async () => {
      await createPortfolio({ name: 'Long term' }).expect(201);

      const response = await request(app)
        .get('/api/v1/portfolios/1/positions/3')
        .set('X-User-Id', USER)
        .expect(404);
      expect(response.body.error.message).toBe('Portfolio 1 has no position in instrument 3');
    });
  });
});

describe('Wallets API', () => {
  beforeEach(() => {
    apiLedger().reset();
  });

  it('should track quantity without cost basis', async () => {
    const created = await request(app)
      .post('/api/v1/wallets')
      .set('X-User-Id', USER)
      .send({ name: 'Cold storage', market: 'ignored' })
      .expect(201);
    expect(created.body).toEqual({ id: 1, userId: 1, name: 'Cold storage', comment: null });

    await request(app)
      .post('/api/v1/transactions')
      .set('X-User-Id', USER)
      .send({ type: 'Input', instrumentId: BTC, quantity: '0.5', walletId: 1 })
      .expect(201);

    const detail = await request(app)
      .get(`/api/v1/wallets/1/positions/${BTC}`)
      .set('X-User-Id', USER)
      .expect(200);

    expect(detail.body.position).toEqual({
      id: 2,
      ownerId: 1,
      instrumentId: BTC,
      quantity: '0.5',
      buyOrders: '0',
      sellOrders: '0',
    });
    expect(detail.body.distribution).toEqual({
      instrumentId: BTC,
      domain: 'wallet',
      totalQuantity: '0.5',
      totalAmount: null,
      entries: [{ ownerId: 1, ownerName: 'Cold storage', quantity: '0.5', amount: null, percentage: 100 }],
    });
  });

  it('should use wallet wording in validation errors', async () => {
    const response = await request(app)
      .post('/api/v1/wallets')
      .set('X-User-Id', USER)
      .send({ comment: 'no name' })
      .expect(400);

    expect(response.body.error.message).toBe('Invalid wallet data');
  });
});

describe('Instruments API', () => {
  beforeEach(() => {
    apiLedger().reset();
  });

  it("should list the instruments of the caller's positions", async () => {
    await request(app).post('/api/v1/portfolios').set('X-User-Id', USER).send({ name: 'Long term' }).expect(201);
    await request(app).post('/api/v1/wallets').set('X-User-Id', USER).send({ name: 'Cold storage' }).expect(201);
    await request(app)
      .post('/api/v1/transactions')
      .set('X-User-Id', USER)
      .send({ type: 'Input', instrumentId: BTC, quantity: '2', portfolioId: 1 })
      .expect(201);
    await request(app)
      .post('/api/v1/wallets/2/positions')
      .set('X-User-Id', USER)
      .send({ instrumentId: 5 })
      .expect(201);

    await request(app).get('/api/v1/instruments').set('X-User-Id', USER).expect(200, { instrumentIds: [1, 5] });
    await request(app).get('/api/v1/instruments').set('X-User-Id', '2').expect(200, { instrumentIds: [] });
  });
});
