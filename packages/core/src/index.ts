// Types
export type {
  DatabaseDescriptor,
  PlantDescriptor,
  UserPlantAccess,
  AccessDecision,
  RequestPlantContext,
  HealthStatus,
  DatabaseHealth,
  HealthReport,
} from './types/plant';
export { CENTRAL } from './types/plant';
export {
  PlantGateError,
  BadRequestError,
  PlantNotFoundError,
  ForbiddenError,
  ServiceUnavailableError,
  DatabaseUnavailableError,
  OperationTimeoutError,
  ConfigurationError,
} from './types/errors';
export type { ConfigurationIssue } from './types/errors';

// Interfaces
export type { Row, PoolLike, ManagedPool, PoolFactory, PoolProvider } from './interfaces/pool-provider';
export type { AccessStore } from './interfaces/access-store';
export type { EventBus } from './interfaces/event-bus';

// Configuration
export {
  loadConfig,
  discoverPlantKeys,
  CREDENTIAL_FIELDS,
  CENTRAL_PREFIX,
  PLANT_KEY_PATTERN,
  type Env,
  type CredentialField,
  type PlantGateConfig,
} from './config/env';

// Implementations
export { PlantRegistry, normalizePlantId } from './impl/plant-registry';
export { PlantPoolCache, type PlantPoolCacheOptions } from './impl/plant-pool-cache';
export { AccessValidator, type AccessValidatorOptions } from './impl/access-validator';
export { HealthAggregator, PROBE_QUERY, type HealthAggregatorOptions } from './impl/health-aggregator';
export {
  EventDispatcher,
  type EventDispatcherOptions,
  type EventType,
  type DispatchedEvent,
  type EventListener,
} from './impl/event-dispatcher';
export { attachConsoleLogger, formatEvent, type LogSink } from './impl/console-logger';

// Utils
export { now, withTimeout } from './utils/time';
