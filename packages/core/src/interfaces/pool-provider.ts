/**
 * PoolProvider: abstracts database pool resolution.
 *
 * Pools are keyed by plant key (plus one for the central database) and
 * shared by every request that targets the same database. The rest of the
 * system only sees PoolLike and doesn't know which driver is behind it.
 */

import type { DatabaseDescriptor } from '../types/plant';

export type Row = Record<string, unknown>;

/**
 * Minimal Postgres pool interface (avoids hard dependency on 'pg').
 */
export interface PoolLike {
  query<R extends Row = Row>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

/**
 * A pool whose lifecycle is owned by the PoolProvider.
 */
export interface ManagedPool extends PoolLike {
  end(): Promise<void>;
}

/**
 * Builds and verifies a pool for one database.
 * Rejects if the database cannot be reached.
 */
export interface PoolFactory {
  /**
   * @param name - plant key, or `central`
   */
  create(name: string, descriptor: DatabaseDescriptor): Promise<ManagedPool>;
}

/**
 * Resolves a database pool per plant.
 */
export interface PoolProvider {
  /** Pool for a registered plant. Created on first use. */
  acquire(plantId: string): Promise<PoolLike>;

  /** Pool for the central database. */
  acquireCentral(): Promise<PoolLike>;

  /** End every pool. Only at process shutdown. */
  closeAll(): Promise<void>;
}
