import { PoolClient } from 'pg';
import { Position, PositionKey } from '@/models';
import { IPositionRepository } from '@/repositories/interfaces';
import { positionKeyId } from '@/ledger/legs';

export interface ResolvedPosition<P extends Position> {
  position: P;
  /** True when this unit of work inserted the row */
  created: boolean;
}

/**
 * Get-or-create of position rows for one unit of work.
 *
 * The identity map stores the in-flight promise per key, so concurrent
 * resolutions of the same (owner, instrument) share one SELECT ... FOR UPDATE
 * and at most one INSERT. Updates are kept in memory and written by flush().
 */
export class PositionResolver<P extends Position> {
  private readonly resolutions = new Map<string, Promise<ResolvedPosition<P>>>();
  private readonly current = new Map<string, P>();
  private readonly dirty = new Set<string>();

  constructor(
    private readonly repository: IPositionRepository<P>,
    private readonly client: PoolClient
  ) {}

  resolve(key: PositionKey): Promise<ResolvedPosition<P>> {
    const id = positionKeyId(key);
    const inFlight = this.resolutions.get(id);
    if (inFlight) {
      return inFlight;
    }

    const resolution = this.load(key, id);
    this.resolutions.set(id, resolution);
    return resolution;
  }

  /**
   * Current in-memory state of a resolved position
   */
  get(key: PositionKey): P {
    const position = this.current.get(positionKeyId(key));
    if (!position) {
      throw new Error(
        `Position ${positionKeyId(key)} was not resolved in this unit of work`
      );
    }
    return position;
  }

  update(key: PositionKey, change: (position: P) => P): P {
    const updated = change(this.get(key));
    const id = positionKeyId(key);
    this.current.set(id, updated);
    this.dirty.add(id);
    return updated;
  }

  /**
   * Writes every changed position, in the order they were first changed
   */
  async flush(): Promise<P[]> {
    const saved: P[] = [];
    for (const id of this.dirty) {
      const position = this.current.get(id);
      if (!position) continue;
      const persisted = await this.repository.save(position, this.client);
      this.current.set(id, persisted);
      saved.push(persisted);
    }
    this.dirty.clear();
    return saved;
  }

  /**
   * Positions for the given keys: session state first, storage otherwise.
   * Keys with no row are skipped.
   */
  async lookup(keys: readonly PositionKey[]): Promise<P[]> {
    const positions: (P | null)[] = await Promise.all(
      keys.map(
        async (key): Promise<P | null> =>
          this.current.get(positionKeyId(key)) ?? (await this.repository.findByKey(key, this.client))
      )
    );
    return positions.filter((position): position is P => position !== null);
  }

  private async load(key: PositionKey, id: string): Promise<ResolvedPosition<P>> {
    const existing = await this.repository.findForUpdate(key, this.client);
    const resolved: ResolvedPosition<P> = existing
      ? { position: existing, created: false }
      : { position: await this.repository.insert(key, this.client), created: true };

    this.current.set(id, resolved.position);
    return resolved;
  }
}
