import type { PoolLike } from '../interfaces/pool-provider';

/** Key the central database is reported and cached under. */
export const CENTRAL = 'central';

/**
 * Connection settings for one physical database.
 */
export interface DatabaseDescriptor {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string;
  readonly ssl: boolean;
}

/**
 * A plant's database. Identity is `plantKey`.
 */
export interface PlantDescriptor extends DatabaseDescriptor {
  /** Stable short code, e.g. `CAIRO` */
  readonly plantKey: string;
}

/**
 * Row of the central `user_plant_access` relation.
 */
export interface UserPlantAccess {
  readonly userId: number;
  readonly plantId: string;
  readonly role: string;
  readonly isActive: boolean;
}

/**
 * Outcome of an access check. A denial carries no reason.
 */
export type AccessDecision =
  | { readonly allowed: true; readonly role: string }
  | { readonly allowed: false };

/**
 * Resolved routing and authorization for one request.
 * Created by the context middleware, discarded with the request.
 */
export interface RequestPlantContext {
  readonly plantId: string;
  readonly userId: number;
  /** Pool of the plant's database, shared with other requests for the same plant */
  readonly db: PoolLike;
  readonly descriptor: PlantDescriptor;
  readonly access: Extract<AccessDecision, { allowed: true }>;
}

// ── Health ──────────────────────────────────────────────────────

export type HealthStatus = 'healthy' | 'degraded' | 'unavailable';

export interface DatabaseHealth {
  readonly reachable: boolean;
  readonly latencyMs: number;
  readonly error?: string;
}

export interface HealthReport {
  readonly status: HealthStatus;
  readonly checkedAt: string;
  readonly central: DatabaseHealth;
  readonly plants: Readonly<Record<string, DatabaseHealth>>;
}
