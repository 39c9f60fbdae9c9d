import { normalizePath } from '@/api/middlewares/metricsMiddleware';

describe('normalizePath', () => {
  it('should collapse numeric ids', () => {
    expect(normalizePath('/api/v1/portfolios/12/positions/7')).toBe('/api/v1/portfolios/:id/positions/:id');
    expect(normalizePath('/api/v1/transactions/456/execute')).toBe('/api/v1/transactions/:id/execute');
  });

  it('should leave versioned prefixes alone', () => {
    expect(normalizePath('/api/v1/transactions')).toBe('/api/v1/transactions');
  });
});

