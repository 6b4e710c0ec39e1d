/**
 * PlantPoolCache: one pool per plant plus one for the central database,
 * shared by every request in the process.
 *
 * Construction is single-flight: the first caller for a key stores the
 * pending promise before its first await, so concurrent callers for the
 * same key await that promise instead of building their own pool.
 * A failed construction is dropped from the cache so the next request
 * retries it. Pools are never evicted otherwise.
 */

import type { DatabaseDescriptor } from '../types/plant';
import { CENTRAL } from '../types/plant';
import type { ManagedPool, PoolFactory, PoolLike, PoolProvider } from '../interfaces/pool-provider';
import type { EventBus } from '../interfaces/event-bus';
import { DatabaseUnavailableError, OperationTimeoutError, ServiceUnavailableError } from '../types/errors';
import type { PlantRegistry } from './plant-registry';
import { now, withTimeout } from '../utils/time';

export interface PlantPoolCacheOptions {
  registry: PlantRegistry;
  factory: PoolFactory;
  central: DatabaseDescriptor;
  events?: EventBus;
  /** Upper bound on establishing one pool (default: 5000) */
  connectTimeoutMs?: number;
}

export class PlantPoolCache implements PoolProvider {
  private readonly pools = new Map<string, Promise<ManagedPool>>();
  private readonly registry: PlantRegistry;
  private readonly factory: PoolFactory;
  private readonly central: DatabaseDescriptor;
  private readonly events?: EventBus;
  private readonly connectTimeoutMs: number;
  private closed = false;

  constructor(options: PlantPoolCacheOptions) {
    this.registry = options.registry;
    this.factory = options.factory;
    this.central = options.central;
    this.events = options.events;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000;
  }

  /**
   * @throws PlantNotFoundError if the plant is not registered
   * @throws DatabaseUnavailableError if the pool cannot be established
   */
  async acquire(plantId: string): Promise<PoolLike> {
    const descriptor = this.registry.resolve(plantId);
    return this.getOrCreate(descriptor.plantKey, descriptor);
  }

  async acquireCentral(): Promise<PoolLike> {
    return this.getOrCreate(CENTRAL, this.central);
  }

  /** Whether a pool for the key exists or is being built. */
  has(key: string): boolean {
    return this.pools.has(key);
  }

  get size(): number {
    return this.pools.size;
  }

  async closeAll(): Promise<void> {
    this.closed = true;
    const pending = [...this.pools.values()];
    this.pools.clear();

    const results = await Promise.allSettled(
      pending.map(async (p) => {
        const pool = await p;
        await pool.end();
      })
    );
    // Pools that never came up have nothing to end.
    const ended = results.filter(r => r.status === 'fulfilled').length;
    this.events?.onPoolsClosed?.({ count: ended });
  }

  private getOrCreate(key: string, descriptor: DatabaseDescriptor): Promise<ManagedPool> {
    if (this.closed) {
      return Promise.reject(new ServiceUnavailableError(key, 'acquire', 'Pool cache is closed'));
    }

    const existing = this.pools.get(key);
    if (existing) return existing;

    const created = this.create(key, descriptor);
    this.pools.set(key, created);

    created.catch(() => {
      // Only drop our own entry; a retry may already have replaced it.
      if (this.pools.get(key) === created) {
        this.pools.delete(key);
      }
    });

    return created;
  }

  private async create(key: string, descriptor: DatabaseDescriptor): Promise<ManagedPool> {
    const startedAt = now();
    let pending: Promise<ManagedPool> | undefined;
    try {
      pending = this.factory.create(key, descriptor);
      const pool = await withTimeout(pending, this.connectTimeoutMs, key, 'connect');
      this.events?.onPoolCreated?.({ target: key, durationMs: now() - startedAt });
      return pool;
    } catch (err) {
      if (err instanceof OperationTimeoutError && pending) {
        // The factory may still finish; that pool is never handed out.
        pending
          .then(late => late.end())
          .catch((lateErr: unknown) => {
            this.events?.onPoolError?.({
              target: key,
              message: lateErr instanceof Error ? lateErr.message : String(lateErr),
            });
          });
      }
      const error = new DatabaseUnavailableError(key, err);
      this.events?.onPoolFailed?.({
        target: key,
        operation: 'connect',
        error: { code: error.code, message: error.message },
      });
      throw error;
    }
  }
}
