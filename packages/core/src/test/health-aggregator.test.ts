/**
 * HealthAggregator Tests
 *
 * Verifies concurrent probing, per-probe timeouts, status severity and
 * the reachable-plants listing.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { HealthAggregator, PROBE_QUERY } from '../impl/health-aggregator';
import { PlantPoolCache } from '../impl/plant-pool-cache';
import { PlantRegistry } from '../impl/plant-registry';
import { EventDispatcher, type DispatchedEvent } from '../impl/event-dispatcher';
import { CENTRAL } from '../types/plant';
import { FakePoolFactory, centralDescriptor, plantDescriptor } from './fakes';

describe('HealthAggregator', () => {
  let factory: FakePoolFactory;
  let events: EventDispatcher;
  let received: DispatchedEvent[];

  function createAggregator(keys: string[], timeoutMs = 100): HealthAggregator {
    const registry = new PlantRegistry(keys.map(k => plantDescriptor(k)));
    const pools = new PlantPoolCache({ registry, factory, central: centralDescriptor, connectTimeoutMs: 1000 });
    return new HealthAggregator({ registry, pools, events, timeoutMs });
  }

  beforeEach(() => {
    factory = new FakePoolFactory();
    events = new EventDispatcher({ mode: 'sync' });
    received = [];
    events.on('*', e => received.push(e));
  });

  it('reports healthy when every database answers', async () => {
    const report = await createAggregator(['ALEX', 'CAIRO']).checkHealth();

    expect(report.status).toBe('healthy');
    expect(report.central.reachable).toBe(true);
    expect(Object.keys(report.plants)).toEqual(['ALEX', 'CAIRO']);
    expect(report.plants.ALEX.reachable).toBe(true);
    expect(report.plants.CAIRO.reachable).toBe(true);
  });

  it('reports healthy with no plants registered', async () => {
    const report = await createAggregator([]).checkHealth();

    expect(report.status).toBe('healthy');
    expect(report.plants).toEqual({});
  });

  it('runs the probe query on every database', async () => {
    await createAggregator(['CAIRO']).checkHealth();

    expect(factory.pools.get(CENTRAL)?.queries).toEqual([{ text: PROBE_QUERY, values: undefined }]);
    expect(factory.pools.get('CAIRO')?.queries).toEqual([{ text: PROBE_QUERY, values: undefined }]);
  });

  it('marks only the failing plant as unreachable', async () => {
    factory.behave('ALEX', { fail: new Error('connect ECONNREFUSED') });

    const report = await createAggregator(['ALEX', 'CAIRO', 'GIZA']).checkHealth();

    expect(report.status).toBe('degraded');
    expect(report.plants.ALEX).toMatchObject({
      reachable: false,
      error: 'Database for "ALEX" is unavailable: connect ECONNREFUSED',
    });
    expect(report.plants.CAIRO.reachable).toBe(true);
    expect(report.plants.GIZA.reachable).toBe(true);
    expect(report.central.reachable).toBe(true);
  });

  it('records a failing probe query', async () => {
    factory.behave('CAIRO', {
      handler: () => {
        throw new Error('relation does not exist');
      },
    });

    const report = await createAggregator(['CAIRO']).checkHealth();

    expect(report.plants.CAIRO).toMatchObject({ reachable: false, error: 'relation does not exist' });
  });

  it('times out a stalled plant without waiting on it', async () => {
    factory.behave('ALEX', { hang: true });
    const started = Date.now();

    const report = await createAggregator(['ALEX', 'CAIRO'], 50).checkHealth();

    expect(Date.now() - started).toBeLessThan(500);
    expect(report.plants.ALEX).toMatchObject({
      reachable: false,
      error: 'health_probe on "ALEX" timed out after 50ms',
    });
    expect(report.plants.CAIRO.reachable).toBe(true);
  });

  it('probes concurrently rather than one after another', async () => {
    for (const key of ['P1', 'P2', 'P3', 'P4', 'P5']) {
      factory.behave(key, { delayMs: 40 });
    }
    const started = Date.now();

    const report = await createAggregator(['P1', 'P2', 'P3', 'P4', 'P5'], 1000).checkHealth();

    expect(report.status).toBe('healthy');
    expect(Date.now() - started).toBeLessThan(150);
  });

  it('reports unavailable when the central database is down', async () => {
    factory.behave(CENTRAL, { fail: new Error('central down') });

    const report = await createAggregator(['CAIRO']).checkHealth();

    expect(report.status).toBe('unavailable');
    expect(report.central.reachable).toBe(false);
    expect(report.plants.CAIRO.reachable).toBe(true);
  });

  it('ranks a central outage above plant outages', async () => {
    factory.behave(CENTRAL, { fail: new Error('central down') });
    factory.behave('CAIRO', { fail: new Error('cairo down') });

    const report = await createAggregator(['CAIRO']).checkHealth();

    expect(report.status).toBe('unavailable');
  });

  it('emits health.checked with the unreachable databases', async () => {
    factory.behave(CENTRAL, { fail: new Error('central down') });
    factory.behave('CAIRO', { fail: new Error('cairo down') });

    await createAggregator(['ALEX', 'CAIRO']).checkHealth();

    const checked = received.find(e => e.type === 'health.checked');
    expect(checked?.status).toBe('unavailable');
    expect(checked?.unreachable).toEqual([CENTRAL, 'CAIRO']);
  });

  it('builds a fresh report on every call', async () => {
    const aggregator = createAggregator(['CAIRO']);

    const first = await aggregator.checkHealth();
    factory.pools.get('CAIRO')?.respondWith(() => {
      throw new Error('went away');
    });
    const second = await aggregator.checkHealth();

    expect(first.plants.CAIRO.reachable).toBe(true);
    expect(second.plants.CAIRO.reachable).toBe(false);
    expect(second.status).toBe('degraded');
  });

  describe('checkCentral', () => {
    it('probes only the central database', async () => {
      const health = await createAggregator(['CAIRO']).checkCentral();

      expect(health.reachable).toBe(true);
      expect(factory.created.map(c => c.name)).toEqual([CENTRAL]);
    });

    it('reports the central failure', async () => {
      factory.behave(CENTRAL, { fail: new Error('central down') });

      const health = await createAggregator(['CAIRO']).checkCentral();

      expect(health).toMatchObject({
        reachable: false,
        error: 'Database for "central" is unavailable: central down',
      });
    });
  });

  describe('reachablePlants', () => {
    it('lists reachable plants sorted', async () => {
      factory.behave('BETA', { fail: new Error('down') });

      const plants = await createAggregator(['GAMMA', 'BETA', 'ALPHA']).reachablePlants();

      expect(plants).toEqual(['ALPHA', 'GAMMA']);
    });
  });
});
