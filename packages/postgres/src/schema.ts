import type { PoolLike } from '@plantgate/core';

export const SCHEMA_VERSION = '0.1.0';

/**
 * Central database schema. Plant databases are owned by the plants and
 * never migrated from here.
 */
export const centralSchema = `
-- ============================================
-- Central Schema v${SCHEMA_VERSION}
-- ============================================

-- Which user may use which plant's database
CREATE TABLE IF NOT EXISTS user_plant_access (
  user_id     BIGINT NOT NULL,
  plant_id    TEXT NOT NULL,
  role        TEXT NOT NULL DEFAULT 'viewer',
  is_active   BOOLEAN NOT NULL DEFAULT TRUE,
  granted_at  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (user_id, plant_id)
);

CREATE INDEX IF NOT EXISTS idx_user_plant_access_plant ON user_plant_access(plant_id);
`;

/**
 * Apply the central schema (idempotent)
 */
export async function applyCentralSchema(pool: PoolLike): Promise<void> {
  await pool.query(centralSchema);
}
