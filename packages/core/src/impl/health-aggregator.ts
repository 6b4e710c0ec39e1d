/**
 * HealthAggregator: probes the central database and every registered
 * plant concurrently. Each probe has its own timeout and its own result;
 * one slow or failing database never holds up or fails the others.
 */

import type { PoolLike, PoolProvider } from '../interfaces/pool-provider';
import type { EventBus } from '../interfaces/event-bus';
import type { DatabaseHealth, HealthReport, HealthStatus } from '../types/plant';
import { CENTRAL } from '../types/plant';
import type { PlantRegistry } from './plant-registry';
import { now, withTimeout } from '../utils/time';

export const PROBE_QUERY = 'SELECT 1';

export interface HealthAggregatorOptions {
  registry: PlantRegistry;
  pools: PoolProvider;
  events?: EventBus;
  /** Per-probe timeout (default: 2000) */
  timeoutMs?: number;
}

export class HealthAggregator {
  private readonly registry: PlantRegistry;
  private readonly pools: PoolProvider;
  private readonly events?: EventBus;
  private readonly timeoutMs: number;

  constructor(options: HealthAggregatorOptions) {
    this.registry = options.registry;
    this.pools = options.pools;
    this.events = options.events;
    this.timeoutMs = options.timeoutMs ?? 2000;
  }

  async checkHealth(): Promise<HealthReport> {
    const startedAt = now();
    const keys = this.registry.keys();

    const [central, ...plantResults] = await Promise.all([
      this.probe(CENTRAL, () => this.pools.acquireCentral()),
      ...keys.map(key => this.probe(key, () => this.pools.acquire(key))),
    ]);

    const plants: Record<string, DatabaseHealth> = {};
    keys.forEach((key, i) => {
      plants[key] = plantResults[i];
    });

    const unreachable = keys.filter(key => !plants[key].reachable);
    const status: HealthStatus = !central.reachable
      ? 'unavailable'
      : unreachable.length > 0
        ? 'degraded'
        : 'healthy';

    this.events?.onHealthChecked?.({
      status,
      unreachable: central.reachable ? unreachable : [CENTRAL, ...unreachable],
      durationMs: now() - startedAt,
    });

    return {
      status,
      checkedAt: new Date(startedAt).toISOString(),
      central,
      plants,
    };
  }

  /** Probe only the central database. Backs the readiness check. */
  async checkCentral(): Promise<DatabaseHealth> {
    return this.probe(CENTRAL, () => this.pools.acquireCentral());
  }

  /** Registered plant keys that answered their probe, sorted. */
  async reachablePlants(): Promise<string[]> {
    const report = await this.checkHealth();
    return Object.keys(report.plants)
      .filter(key => report.plants[key].reachable)
      .sort();
  }

  private async probe(target: string, acquire: () => Promise<PoolLike>): Promise<DatabaseHealth> {
    const startedAt = now();
    try {
      await withTimeout(
        acquire().then(pool => pool.query(PROBE_QUERY)),
        this.timeoutMs,
        target,
        'health_probe'
      );
      return { reachable: true, latencyMs: now() - startedAt };
    } catch (err) {
      return {
        reachable: false,
        latencyMs: now() - startedAt,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }
}
