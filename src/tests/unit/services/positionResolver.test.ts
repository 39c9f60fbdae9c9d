import { Client, PoolClient } from 'pg';
import { PositionResolver } from '@/services/positionResolver';
import { ConflictError } from '@/errors';
import { IPortfolioPositionRepository } from '@/repositories/interfaces';
import { PortfolioPosition } from '@/models';
import {
  createMockPortfolioPositionRepository,
  portfolioPosition,
} from '@/tests/utils/mockRepositories';

describe('PositionResolver', () => {
  const key = { ownerId: 1, instrumentId: 2 };
  const client: PoolClient = Object.assign(new Client(), { release: (): void => undefined });
  let repository: jest.Mocked<IPortfolioPositionRepository>;
  let resolver: PositionResolver<PortfolioPosition>;

  beforeEach(() => {
    repository = createMockPortfolioPositionRepository();
    resolver = new PositionResolver(repository, client);
  });

  it('should lock and return an existing position', async () => {
    const existing = portfolioPosition({ id: 5, ...key, quantity: '3' });
    repository.findForUpdate.mockResolvedValue(existing);

    await expect(resolver.resolve(key)).resolves.toEqual({ position: existing, created: false });
    expect(repository.findForUpdate).toHaveBeenCalledWith(key, client);
    expect(repository.insert).not.toHaveBeenCalled();
  });

  it('should insert a zero position the first time a key is referenced', async () => {
    const inserted = portfolioPosition({ id: 6, ...key });
    repository.findForUpdate.mockResolvedValue(null);
    repository.insert.mockResolvedValue(inserted);

    await expect(resolver.resolve(key)).resolves.toEqual({ position: inserted, created: true });
    expect(repository.insert).toHaveBeenCalledWith(key, client);
  });

  it('should collapse concurrent resolutions of one key into a single insert', async () => {
    repository.findForUpdate.mockResolvedValue(null);
    repository.insert.mockResolvedValue(portfolioPosition({ id: 6, ...key }));

    const [first, second, third] = await Promise.all([
      resolver.resolve(key),
      resolver.resolve({ ...key }),
      resolver.resolve(key),
    ]);

    expect(repository.findForUpdate).toHaveBeenCalledTimes(1);
    expect(repository.insert).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(third).toBe(first);
  });

  it('should surface a cross-request race as ConflictError', async () => {
    repository.findForUpdate.mockResolvedValue(null);
    repository.insert.mockRejectedValue(new ConflictError('Position was created concurrently'));

    await expect(resolver.resolve(key)).rejects.toThrow(ConflictError);
  });

  it('should refuse to update a key that was never resolved', () => {
    expect(() => resolver.get(key)).toThrow('Position 1:2 was not resolved in this unit of work');
  });

  it('should save only changed positions on flush', async () => {
    const untouched = { ownerId: 1, instrumentId: 3 };
    repository.findForUpdate.mockImplementation(async (requested) =>
      portfolioPosition({ id: requested.instrumentId, ...requested, quantity: '1' })
    );
    repository.save.mockImplementation(async (position) => position);

    await resolver.resolve(key);
    await resolver.resolve(untouched);
    resolver.update(key, (position) => ({ ...position, quantity: '4' }));

    const saved = await resolver.flush();

    expect(repository.save).toHaveBeenCalledTimes(1);
    expect(saved).toEqual([portfolioPosition({ id: 2, ...key, quantity: '4' })]);
    await expect(resolver.flush()).resolves.toEqual([]);
  });

  it('should look up session state first and storage otherwise', async () => {
    const stored = { ownerId: 9, instrumentId: 9 };
    const missing = { ownerId: 8, instrumentId: 8 };
    repository.findForUpdate.mockResolvedValue(portfolioPosition({ id: 1, ...key }));
    repository.findByKey.mockImplementation(async (requested) =>
      requested.ownerId === stored.ownerId ? portfolioPosition({ id: 3, ...stored }) : null
    );

    await resolver.resolve(key);
    resolver.update(key, (position) => ({ ...position, amount: '10' }));

    const positions = await resolver.lookup([key, stored, missing]);

    expect(positions).toEqual([
      portfolioPosition({ id: 1, ...key, amount: '10' }),
      portfolioPosition({ id: 3, ...stored }),
    ]);
    expect(repository.findByKey).toHaveBeenCalledTimes(2);
  });
});
