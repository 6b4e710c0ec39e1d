/**
 * Service tokens for dependency injection.
 *
 * These tokens identify services in the ServiceContainer. Each token is a
 * key of PlantGateServices, so resolving one yields the service's type.
 */

import type {
  AccessValidator,
  EventBus,
  HealthAggregator,
  PlantRegistry,
  PoolProvider,
} from '@plantgate/core';

/**
 * Everything the routes and middleware resolve.
 */
export interface PlantGateServices {
  plantRegistry: PlantRegistry;
  poolProvider: PoolProvider;
  accessValidator: AccessValidator;
  healthAggregator: HealthAggregator;
  eventBus: EventBus;
}

export const ServiceTokens = {
  // Routing
  PlantRegistry: 'plantRegistry',
  PoolProvider: 'poolProvider',

  // Authorization
  AccessValidator: 'accessValidator',

  // Operations
  HealthAggregator: 'healthAggregator',
  EventBus: 'eventBus',
} as const satisfies Record<string, keyof PlantGateServices>;

export type ServiceToken = (typeof ServiceTokens)[keyof typeof ServiceTokens];
