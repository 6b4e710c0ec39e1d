// Schema
export { centralSchema, SCHEMA_VERSION, applyCentralSchema } from './schema';

// Pools
export { PgPoolFactory, PgManagedPool, VERIFY_QUERY, type PgPoolFactoryOptions } from './pool-factory';

// Stores
export { PgAccessStore } from './access-store';
