import type { AccessStore, PoolProvider, UserPlantAccess } from '@plantgate/core';

type GrantRow = {
  user_id: string | number;
  plant_id: string;
  role: string;
  is_active: boolean;
};

/**
 * Reads grants from the central database's `user_plant_access` table.
 * Goes to the database on every call so revocations apply to the next request.
 */
export class PgAccessStore implements AccessStore {
  constructor(private pools: Pick<PoolProvider, 'acquireCentral'>) {}

  async findGrant(userId: number, plantId: string): Promise<UserPlantAccess | undefined> {
    const central = await this.pools.acquireCentral();
    const { rows } = await central.query<GrantRow>(
      `SELECT user_id, plant_id, role, is_active
       FROM user_plant_access
       WHERE user_id = $1 AND plant_id = $2
       LIMIT 1`,
      [userId, plantId]
    );

    const row = rows[0];
    if (!row) return undefined;

    // BIGINT comes back as a string
    return {
      userId: Number(row.user_id),
      plantId: row.plant_id,
      role: row.role,
      isActive: row.is_active,
    };
  }
}
