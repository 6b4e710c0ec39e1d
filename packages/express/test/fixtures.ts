/**
 * Test fixtures for @plantgate/express tests.
 *
 * Builds the real core services over in-process fakes: FakePoolFactory
 * instead of pg, MemoryAccessStore instead of the central grants table.
 */

import express, { type Express } from 'express';
import {
  AccessValidator,
  EventDispatcher,
  HealthAggregator,
  PlantPoolCache,
  PlantRegistry,
  type DispatchedEvent,
} from '@plantgate/core';
import {
  FakePoolFactory,
  MemoryAccessStore,
  centralDescriptor,
  plantDescriptor,
} from '@plantgate/core/test';
import { ServiceContainer } from '../src/container';
import { ServiceTokens } from '../src/tokens';
import { PlantGateExpress } from '../src/plantgate-express';

export interface TestStack {
  registry: PlantRegistry;
  factory: FakePoolFactory;
  store: MemoryAccessStore;
  pools: PlantPoolCache;
  access: AccessValidator;
  health: HealthAggregator;
  events: EventDispatcher;
  /** Every event emitted, in order */
  received: DispatchedEvent[];
}

export function createTestStack(plantKeys: string[] = ['ALEX', 'CAIRO'], timeoutMs = 200): TestStack {
  const registry = new PlantRegistry(plantKeys.map(key => plantDescriptor(key)));
  const factory = new FakePoolFactory();
  const store = new MemoryAccessStore();
  const events = new EventDispatcher({ mode: 'sync' });
  const received: DispatchedEvent[] = [];
  events.on('*', e => received.push(e));

  const pools = new PlantPoolCache({
    registry,
    factory,
    central: centralDescriptor,
    events,
    connectTimeoutMs: timeoutMs,
  });
  const access = new AccessValidator({ store, events, timeoutMs });
  const health = new HealthAggregator({ registry, pools, events, timeoutMs });

  return { registry, factory, store, pools, access, health, events, received };
}

/**
 * Container with every service of the stack registered.
 */
export function createTestContainer(stack: TestStack): ServiceContainer {
  return new ServiceContainer()
    .registerInstance(ServiceTokens.PlantRegistry, stack.registry)
    .registerInstance(ServiceTokens.PoolProvider, stack.pools)
    .registerInstance(ServiceTokens.AccessValidator, stack.access)
    .registerInstance(ServiceTokens.HealthAggregator, stack.health)
    .registerInstance(ServiceTokens.EventBus, stack.events);
}

/**
 * Express app with PlantGate mounted at `/api/v1`.
 */
export function createTestApp(stack: TestStack): { app: Express; plantgate: PlantGateExpress } {
  const app = express();
  const plantgate = PlantGateExpress.builder()
    .app(app)
    .registry(stack.registry)
    .pools(stack.pools)
    .access(stack.access)
    .health(stack.health)
    .events(stack.events)
    .prefix('/api/v1')
    .build();

  return { app, plantgate };
}

/** Number of database calls made through any fake, including pool creation. */
export function databaseCalls(stack: TestStack): number {
  let queries = 0;
  for (const pool of stack.factory.pools.values()) {
    queries += pool.queries.length;
  }
  return stack.factory.created.length + stack.store.lookups.length + queries;
}
