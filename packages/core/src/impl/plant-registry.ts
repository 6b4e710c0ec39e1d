import type { PlantDescriptor } from '../types/plant';
import { PlantNotFoundError, ConfigurationError } from '../types/errors';
import { PLANT_KEY_PATTERN } from '../config/env';

/**
 * Immutable plant id → descriptor lookup, built once at startup.
 *
 * Plant ids are matched case-insensitively: `cairo` resolves `CAIRO`.
 */
export class PlantRegistry {
  private readonly plants: ReadonlyMap<string, PlantDescriptor>;

  constructor(descriptors: readonly PlantDescriptor[]) {
    const plants = new Map<string, PlantDescriptor>();
    for (const descriptor of descriptors) {
      if (!PLANT_KEY_PATTERN.test(descriptor.plantKey)) {
        throw new ConfigurationError([{ path: descriptor.plantKey, message: 'is not a valid plant key' }]);
      }
      if (plants.has(descriptor.plantKey)) {
        throw new ConfigurationError([{ path: descriptor.plantKey, message: 'is registered twice' }]);
      }
      plants.set(descriptor.plantKey, Object.freeze({ ...descriptor }));
    }
    this.plants = plants;
  }

  /**
   * @throws PlantNotFoundError for an unregistered plant id
   */
  resolve(plantId: string): PlantDescriptor {
    const descriptor = this.plants.get(normalizePlantId(plantId));
    if (!descriptor) {
      throw new PlantNotFoundError(plantId);
    }
    return descriptor;
  }

  has(plantId: string): boolean {
    return this.plants.has(normalizePlantId(plantId));
  }

  /** Registered plant keys, sorted. */
  keys(): string[] {
    return [...this.plants.keys()].sort();
  }

  get size(): number {
    return this.plants.size;
  }
}

export function normalizePlantId(plantId: string): string {
  return plantId.trim().toUpperCase();
}
