// ──────────────────────────────────────────
// App assembly: config → services → Express
// ──────────────────────────────────────────

import express, { type Express } from 'express';
import {
  AccessValidator,
  EventDispatcher,
  HealthAggregator,
  PlantPoolCache,
  PlantRegistry,
  attachConsoleLogger,
  type AccessStore,
  type LogSink,
  type PlantGateConfig,
  type PoolFactory,
} from '@plantgate/core';
import { PgAccessStore, PgPoolFactory } from '@plantgate/postgres';
import { PlantGateExpress } from '@plantgate/express';

export interface AppOverrides {
  /** Replaces the pg pool factory */
  poolFactory?: PoolFactory;
  /** Replaces the central grants table */
  accessStore?: AccessStore;
  /** Where log lines go (default: console) */
  logSink?: LogSink;
}

export interface PlantGateApp {
  app: Express;
  plantgate: PlantGateExpress;
  registry: PlantRegistry;
  pools: PlantPoolCache;
  events: EventDispatcher;
}

/**
 * Wire every service from a loaded configuration. Nothing connects until
 * the first request or health check.
 */
export function createPlantGateApp(config: PlantGateConfig, overrides: AppOverrides = {}): PlantGateApp {
  // ── Observability ──
  const events = new EventDispatcher({
    onError: (err) => console.error('[PlantGate] Event listener failed:', err),
  });
  attachConsoleLogger(events, overrides.logSink);

  // ── Routing ──
  const registry = new PlantRegistry(config.plants);
  const poolFactory = overrides.poolFactory ?? new PgPoolFactory({
    max: config.pool.max,
    connectTimeoutMs: config.pool.connectTimeoutMs,
    events,
  });
  const pools = new PlantPoolCache({
    registry,
    factory: poolFactory,
    central: config.central,
    events,
    connectTimeoutMs: config.pool.connectTimeoutMs,
  });

  // ── Authorization ──
  const access = new AccessValidator({
    store: overrides.accessStore ?? new PgAccessStore(pools),
    events,
    timeoutMs: config.accessCheckTimeoutMs,
  });

  // ── Health ──
  const health = new HealthAggregator({
    registry,
    pools,
    events,
    timeoutMs: config.healthProbeTimeoutMs,
  });

  // ── Express app ──
  const app = express();
  app.disable('x-powered-by');
  const plantgate = PlantGateExpress.builder()
    .app(app)
    .registry(registry)
    .pools(pools)
    .access(access)
    .health(health)
    .events(events)
    .prefix(config.http.prefix)
    .build();

  return { app, plantgate, registry, pools, events };
}
