/**
 * Express route handlers for PlantGate.
 */

import type { Router, Request, Response } from 'express';
import type { ServiceContainer } from './container';
import { Routes } from './routes';
import { ServiceTokens } from './tokens';
import type { PlantRouter } from './plant-router';
import { asyncHandler, requirePlantContext } from './middleware';

/**
 * Register health check routes (health, ready, plants).
 * None of them read the routing headers.
 */
export function registerHealthRoutes(router: Router, container: ServiceContainer): void {
  // GET /health - Full report; 503 only when the central database is down
  router.get(
    Routes.Health,
    asyncHandler(async (_req: Request, res: Response) => {
      const report = await container.resolve(ServiceTokens.HealthAggregator).checkHealth();
      res.status(report.status === 'unavailable' ? 503 : 200).json(report);
    })
  );

  // GET /ready - Readiness check (central database only)
  router.get(
    Routes.Ready,
    asyncHandler(async (_req: Request, res: Response) => {
      const central = await container.resolve(ServiceTokens.HealthAggregator).checkCentral();

      res.status(central.reachable ? 200 : 503).json({
        ready: central.reachable,
        checks: { central: central.reachable ? 'ok' : 'error' },
        timestamp: new Date().toISOString(),
      });
    })
  );

  // GET /plants - Registered plants that answer a probe
  router.get(
    Routes.Plants,
    asyncHandler(async (_req: Request, res: Response) => {
      const plants = await container.resolve(ServiceTokens.HealthAggregator).reachablePlants();
      res.json({ plants });
    })
  );
}

/**
 * Register routes that run behind the plant context middleware.
 */
export function registerContextRoutes(router: PlantRouter): void {
  // GET /context - Echo the resolved context (never the headers)
  router.get(Routes.Context, (req: Request, res: Response) => {
    requirePlantContext(req);
    const { plantId, userId, access } = req.plant;

    res.json({ plantId, userId, role: access.role });
  });
}
