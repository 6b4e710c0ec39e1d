import { describe, it, expect } from 'vitest';
import { FakePool, type QueryHandler } from '@plantgate/core/test';
import { PgAccessStore } from '../src/access-store';
import { applyCentralSchema, centralSchema } from '../src/schema';

function createStore(handler: QueryHandler): { store: PgAccessStore; central: FakePool } {
  const central = new FakePool('central', handler);
  const store = new PgAccessStore({ acquireCentral: async () => central });
  return { store, central };
}

describe('PgAccessStore', () => {
  it('looks up the grant by user and plant', async () => {
    const { store, central } = createStore(() => []);

    await store.findGrant(123, 'CAIRO');

    expect(central.queries).toHaveLength(1);
    expect(central.queries[0].text).toContain('FROM user_plant_access');
    expect(central.queries[0].values).toEqual([123, 'CAIRO']);
  });

  it('maps a row to a grant', async () => {
    const { store } = createStore(() => [
      { user_id: '123', plant_id: 'CAIRO', role: 'engineer', is_active: true },
    ]);

    await expect(store.findGrant(123, 'CAIRO')).resolves.toEqual({
      userId: 123,
      plantId: 'CAIRO',
      role: 'engineer',
      isActive: true,
    });
  });

  it('keeps inactive grants for the validator to judge', async () => {
    const { store } = createStore(() => [
      { user_id: 7, plant_id: 'ALEX', role: 'viewer', is_active: false },
    ]);

    const grant = await store.findGrant(7, 'ALEX');

    expect(grant?.isActive).toBe(false);
  });

  it('returns undefined when no row matches', async () => {
    const { store } = createStore(() => []);

    await expect(store.findGrant(999, 'CAIRO')).resolves.toBeUndefined();
  });

  it('propagates query failures', async () => {
    const { store } = createStore(() => {
      throw new Error('relation "user_plant_access" does not exist');
    });

    await expect(store.findGrant(1, 'CAIRO')).rejects.toThrow('relation "user_plant_access" does not exist');
  });

  it('propagates central pool failures', async () => {
    const store = new PgAccessStore({
      acquireCentral: async () => {
        throw new Error('central down');
      },
    });

    await expect(store.findGrant(1, 'CAIRO')).rejects.toThrow('central down');
  });
});

describe('applyCentralSchema', () => {
  it('creates the access table', async () => {
    const pool = new FakePool('central', () => []);

    await applyCentralSchema(pool);

    expect(pool.queries).toEqual([{ text: centralSchema, values: undefined }]);
    expect(centralSchema).toContain('CREATE TABLE IF NOT EXISTS user_plant_access');
    expect(centralSchema).toContain('PRIMARY KEY (user_id, plant_id)');
  });
});
