import type { UserPlantAccess } from '../types/plant';

/**
 * Read access to the central `user_plant_access` relation.
 * Never written through this layer.
 */
export interface AccessStore {
  /** Active grant for (userId, plantId), or undefined. */
  findGrant(userId: number, plantId: string): Promise<UserPlantAccess | undefined>;
}
