/**
 * AccessValidator: decides whether a user may use a plant's database.
 *
 * Every call reads the central database; decisions are never cached.
 * "No grant", "inactive grant" and "unknown user" all produce the same
 * `{ allowed: false }`. A failing central database is an error, never a
 * denial.
 */

import type { AccessStore } from '../interfaces/access-store';
import type { EventBus } from '../interfaces/event-bus';
import type { AccessDecision, UserPlantAccess } from '../types/plant';
import { CENTRAL } from '../types/plant';
import { ServiceUnavailableError } from '../types/errors';
import { withTimeout } from '../utils/time';

export interface AccessValidatorOptions {
  store: AccessStore;
  events?: EventBus;
  /** Upper bound on one access query (default: 3000) */
  timeoutMs?: number;
}

export class AccessValidator {
  private readonly store: AccessStore;
  private readonly events?: EventBus;
  private readonly timeoutMs: number;

  constructor(options: AccessValidatorOptions) {
    this.store = options.store;
    this.events = options.events;
    this.timeoutMs = options.timeoutMs ?? 3000;
  }

  /**
   * @throws ServiceUnavailableError if the central database cannot answer
   */
  async checkAccess(userId: number, plantId: string): Promise<AccessDecision> {
    let grant: UserPlantAccess | undefined;
    try {
      grant = await withTimeout(
        this.store.findGrant(userId, plantId),
        this.timeoutMs,
        CENTRAL,
        'check_access'
      );
    } catch (err) {
      const error = err instanceof ServiceUnavailableError
        ? err
        : new ServiceUnavailableError(
            CENTRAL,
            'check_access',
            `Access check failed: ${err instanceof Error ? err.message : String(err)}`,
            err
          );
      this.events?.onAccessFailed?.({ userId, plantId, operation: 'check_access', message: error.message });
      throw error;
    }

    if (!grant || !grant.isActive) {
      this.events?.onAccessDenied?.({ userId, plantId });
      return { allowed: false };
    }

    this.events?.onAccessGranted?.({ userId, plantId, role: grant.role });
    return { allowed: true, role: grant.role };
  }
}
