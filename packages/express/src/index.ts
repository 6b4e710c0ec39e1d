/**
 * @plantgate/express - Express integration for plant routing and access control.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { PlantGateExpress } from '@plantgate/express';
 *
 * const app = express();
 *
 * const plantgate = PlantGateExpress.builder()
 *   .app(app)
 *   .registry(registry)
 *   .pools(pools)
 *   .access(accessValidator)
 *   .health(healthAggregator)
 *   .prefix('/api/v1')
 *   .build();
 *
 * // Routes are automatically registered:
 * // GET /api/v1/health
 * // GET /api/v1/ready
 * // GET /api/v1/plants
 * // GET /api/v1/context   (plant-id and x-user-id headers required)
 *
 * app.listen(8004);
 * ```
 */

// Main class
export { PlantGateExpress, PlantGateExpressBuilder } from './plantgate-express';
export type { PlantGateExpressConfig } from './plantgate-express';
export { PlantRouter } from './plant-router';

// Service container
export { ServiceContainer, type ServiceFactory } from './container';
export { ServiceTokens, type ServiceToken, type PlantGateServices } from './tokens';

// Routes
export { Routes, DefaultRouteConfig } from './routes';
export type { RouteName, RoutePath, RouteConfig } from './routes';

// Middleware
export {
  createPlantContextMiddleware,
  createErrorHandler,
  asyncHandler,
  requirePlantContext,
  readRoutingHeaders,
  DEFAULT_PLANT_HEADER,
  DEFAULT_USER_HEADER,
} from './middleware';
export type { ContextState, PlantContextOptions, ErrorResponse } from './middleware';

// Route handlers (for custom routing)
export { registerHealthRoutes, registerContextRoutes } from './handlers';
