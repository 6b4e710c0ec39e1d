import { describe, it, expect } from 'vitest';
import { PlantRegistry } from '../impl/plant-registry';
import { PlantNotFoundError, ConfigurationError } from '../types/errors';
import { plantDescriptor } from './fakes';

describe('PlantRegistry', () => {
  describe('with no plants', () => {
    const registry = new PlantRegistry([]);

    it('is empty', () => {
      expect(registry.size).toBe(0);
      expect(registry.keys()).toEqual([]);
    });

    it('resolves nothing', () => {
      expect(() => registry.resolve('CAIRO')).toThrow(PlantNotFoundError);
    });
  });

  describe('with one plant', () => {
    const registry = new PlantRegistry([plantDescriptor('CAIRO')]);

    it('resolves the plant by key', () => {
      expect(registry.resolve('CAIRO')).toEqual(plantDescriptor('CAIRO'));
    });

    it('matches plant ids case-insensitively and ignores surrounding spaces', () => {
      expect(registry.resolve(' cairo ').plantKey).toBe('CAIRO');
      expect(registry.has('Cairo')).toBe(true);
    });

    it('returns the identical descriptor on every resolution', () => {
      const first = registry.resolve('CAIRO');
      for (let i = 0; i < 5; i++) {
        expect(registry.resolve('CAIRO')).toBe(first);
      }
      expect(JSON.stringify(registry.resolve('cairo'))).toBe(JSON.stringify(first));
    });

    it('hands out frozen descriptors', () => {
      expect(Object.isFrozen(registry.resolve('CAIRO'))).toBe(true);
    });
  });

  describe('with many plants', () => {
    const keys = Array.from({ length: 50 }, (_, i) => `PLANT_${String(i).padStart(2, '0')}`);
    const registry = new PlantRegistry(keys.map(k => plantDescriptor(k)).reverse());

    it('lists keys sorted', () => {
      expect(registry.size).toBe(50);
      expect(registry.keys()).toEqual(keys);
    });

    it('resolves each plant to its own descriptor', () => {
      expect(registry.resolve('PLANT_07').host).toBe('plant_07.db.internal');
      expect(registry.resolve('PLANT_42').database).toBe('plant_42_ops');
    });
  });

  it('does not see later changes to the input descriptors', () => {
    const input = plantDescriptor('CAIRO');
    const registry = new PlantRegistry([input]);

    const mutated = { ...input, host: 'elsewhere' };
    Object.assign(input, mutated);

    expect(registry.resolve('CAIRO').host).toBe('cairo.db.internal');
  });

  it.each(['ATLANTIS', 'atlantis', '', '   ', 'CAIRO; DROP TABLE'])(
    'fails with PlantNotFoundError for unregistered id %j',
    (plantId) => {
      const registry = new PlantRegistry([plantDescriptor('CAIRO')]);

      expect(() => registry.resolve(plantId)).toThrow(PlantNotFoundError);
    }
  );

  it('carries the requested id on the error', () => {
    const registry = new PlantRegistry([]);

    try {
      registry.resolve('ATLANTIS');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PlantNotFoundError);
      if (err instanceof PlantNotFoundError) {
        expect(err.plantId).toBe('ATLANTIS');
        expect(err.status).toBe(404);
        expect(err.code).toBe('PLANT_NOT_FOUND');
      }
    }
  });

  it('rejects duplicate keys', () => {
    expect(() => new PlantRegistry([plantDescriptor('CAIRO'), plantDescriptor('CAIRO')])).toThrow(
      ConfigurationError
    );
  });

  it('rejects keys that are not upper-case identifiers', () => {
    expect(() => new PlantRegistry([plantDescriptor('cairo')])).toThrow(ConfigurationError);
  });
});
