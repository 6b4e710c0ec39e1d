/**
 * PgPoolFactory: builds one pg Pool per database and verifies it with a
 * round trip before handing it to the pool cache.
 */

import { Pool } from 'pg';
import type { DatabaseDescriptor, EventBus, ManagedPool, PoolFactory, Row } from '@plantgate/core';

export const VERIFY_QUERY = 'SELECT 1';

export interface PgPoolFactoryOptions {
  /** Max clients per pool (default 10) */
  max?: number;
  /** Passed to pg as connectionTimeoutMillis (default 5000) */
  connectTimeoutMs?: number;
  /** Idle clients are closed after this long (default 30000) */
  idleTimeoutMs?: number;
  events?: EventBus;
}

/**
 * ManagedPool over a pg Pool.
 */
export class PgManagedPool implements ManagedPool {
  constructor(readonly pool: Pool) {}

  async query<R extends Row = Row>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }> {
    const result = await this.pool.query<R>(text, values);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

export class PgPoolFactory implements PoolFactory {
  private readonly max: number;
  private readonly connectTimeoutMs: number;
  private readonly idleTimeoutMs: number;
  private readonly events?: EventBus;

  constructor(options: PgPoolFactoryOptions = {}) {
    this.max = options.max ?? 10;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30_000;
    this.events = options.events;
  }

  async create(name: string, descriptor: DatabaseDescriptor): Promise<ManagedPool> {
    const pool = new Pool({
      host: descriptor.host,
      port: descriptor.port,
      database: descriptor.database,
      user: descriptor.user,
      password: descriptor.password,
      ssl: descriptor.ssl ? { rejectUnauthorized: false } : false,
      max: this.max,
      connectionTimeoutMillis: this.connectTimeoutMs,
      idleTimeoutMillis: this.idleTimeoutMs,
    });

    // An idle client dropping its connection must not crash the process
    pool.on('error', (err: Error) => {
      this.events?.onPoolError?.({ target: name, message: err.message });
    });

    try {
      await pool.query(VERIFY_QUERY);
    } catch (err) {
      await pool.end().catch((endErr: unknown) => {
        this.events?.onPoolError?.({
          target: name,
          message: endErr instanceof Error ? endErr.message : String(endErr),
        });
      });
      throw err;
    }

    return new PgManagedPool(pool);
  }
}
