/**
 * PlantGateExpress - Main integration class for Express applications.
 *
 * Mounts the operations routes and the plant router under one prefix.
 * Every route on the plant router runs behind the context middleware.
 */

import { Router, type Application, type RequestHandler } from 'express';
import type {
  AccessValidator,
  EventBus,
  HealthAggregator,
  PlantRegistry,
  PoolProvider,
} from '@plantgate/core';
import { ServiceContainer } from './container';
import { ServiceTokens } from './tokens';
import {
  createPlantContextMiddleware,
  createErrorHandler,
  type PlantContextOptions,
} from './middleware';
import { registerHealthRoutes, registerContextRoutes } from './handlers';
import { PlantRouter } from './plant-router';
import { type RouteConfig, DefaultRouteConfig } from './routes';

/**
 * Configuration for PlantGateExpress.
 */
export interface PlantGateExpressConfig {
  /**
   * Express application instance.
   */
  app: Application;

  registry: PlantRegistry;
  pools: PoolProvider;
  access: AccessValidator;
  health: HealthAggregator;

  /**
   * Receives rejections and attached contexts.
   */
  events?: EventBus;

  /**
   * Route configuration.
   */
  routes?: RouteConfig;

  /**
   * Header names for the context middleware.
   */
  context?: PlantContextOptions;

  /**
   * Route prefix (default: '').
   */
  prefix?: string;

  /**
   * Additional middleware to apply before PlantGate routes.
   */
  middleware?: RequestHandler[];

  /**
   * Lifecycle hooks.
   */
  hooks?: {
    /** Called once every service is registered */
    onContainerReady?: (container: ServiceContainer) => void;
    /** Called after routes are registered */
    onRoutesRegistered?: (app: Application) => void;
  };
}

/**
 * Builder for PlantGateExpress configuration.
 */
export class PlantGateExpressBuilder {
  private config: Partial<PlantGateExpressConfig> = {};

  /**
   * Set the Express application.
   */
  app(app: Application): this {
    this.config.app = app;
    return this;
  }

  registry(registry: PlantRegistry): this {
    this.config.registry = registry;
    return this;
  }

  pools(pools: PoolProvider): this {
    this.config.pools = pools;
    return this;
  }

  access(access: AccessValidator): this {
    this.config.access = access;
    return this;
  }

  health(health: HealthAggregator): this {
    this.config.health = health;
    return this;
  }

  events(events: EventBus): this {
    this.config.events = events;
    return this;
  }

  /**
   * Configure routes.
   */
  routes(config: RouteConfig): this {
    this.config.routes = config;
    return this;
  }

  /**
   * Set route prefix.
   */
  prefix(prefix: string): this {
    this.config.prefix = prefix;
    return this;
  }

  /**
   * Configure the routing header names.
   */
  context(options: PlantContextOptions): this {
    this.config.context = options;
    return this;
  }

  /**
   * Add middleware.
   */
  use(...middleware: RequestHandler[]): this {
    this.config.middleware = [...(this.config.middleware ?? []), ...middleware];
    return this;
  }

  /**
   * Add lifecycle hooks.
   */
  hooks(hooks: PlantGateExpressConfig['hooks']): this {
    this.config.hooks = { ...this.config.hooks, ...hooks };
    return this;
  }

  /**
   * Build the PlantGateExpress instance.
   */
  build(): PlantGateExpress {
    const { app, registry, pools, access, health, ...rest } = this.config;
    if (!app) {
      throw new Error('Express app is required. Call .app(expressApp) first.');
    }
    if (!registry || !pools || !access || !health) {
      throw new Error('Plant registry, pools, access validator and health aggregator are required.');
    }

    return new PlantGateExpress({ ...rest, app, registry, pools, access, health });
  }
}

/**
 * PlantGateExpress - Main integration class.
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
 *   .events(dispatcher)
 *   .prefix('/api/v1')
 *   .build();
 *
 * plantgate.getPlantRouter().get('/sessions', asyncHandler(async (req, res) => {
 *   requirePlantContext(req);
 *   const { rows } = await req.plant.db.query('SELECT id FROM chat_sessions WHERE user_id = $1', [req.plant.userId]);
 *   res.json(rows);
 * }));
 *
 * app.listen(8004);
 * ```
 */
export class PlantGateExpress {
  private container: ServiceContainer;
  private app: Application;
  private config: PlantGateExpressConfig;
  private plantRouter: PlantRouter;
  private _initialized = false;

  constructor(config: PlantGateExpressConfig) {
    this.config = {
      ...config,
      routes: { ...DefaultRouteConfig, ...config.routes },
    };
    this.app = config.app;
    this.container = new ServiceContainer();
    this.plantRouter = new PlantRouter(createPlantContextMiddleware(this.container, config.context));

    this.setupContainer();
    this.setupRoutes();
  }

  /**
   * Check if routes are mounted.
   */
  get isInitialized(): boolean {
    return this._initialized;
  }

  /**
   * Create a builder for configuring PlantGateExpress.
   */
  static builder(): PlantGateExpressBuilder {
    return new PlantGateExpressBuilder();
  }

  /**
   * Get the service container.
   */
  getContainer(): ServiceContainer {
    return this.container;
  }

  /**
   * Router whose routes run behind the plant context middleware.
   * Handlers mounted here can rely on `req.plant`.
   */
  getPlantRouter(): PlantRouter {
    return this.plantRouter;
  }

  private setupContainer(): void {
    this.container
      .registerInstance(ServiceTokens.PlantRegistry, this.config.registry)
      .registerInstance(ServiceTokens.PoolProvider, this.config.pools)
      .registerInstance(ServiceTokens.AccessValidator, this.config.access)
      .registerInstance(ServiceTokens.HealthAggregator, this.config.health);

    if (this.config.events) {
      this.container.registerInstance(ServiceTokens.EventBus, this.config.events);
    }

    // Call hook
    this.config.hooks?.onContainerReady?.(this.container);
  }

  private setupRoutes(): void {
    const { routes, prefix = '', middleware = [] } = this.config;
    const router = Router();

    // Apply custom middleware
    for (const mw of middleware) {
      router.use(mw);
    }

    // Operations routes never need the routing headers
    if (routes?.health) {
      registerHealthRoutes(router, this.container);
    }

    // Plant-scoped routes; unknown paths fall through to a 404
    if (routes?.context) {
      registerContextRoutes(this.plantRouter);
    }
    router.use(this.plantRouter.handler);

    // Apply error handler
    router.use(createErrorHandler());

    // Mount router on app
    if (prefix) {
      this.app.use(prefix, router);
    } else {
      this.app.use(router);
    }

    // Call hook
    this.config.hooks?.onRoutesRegistered?.(this.app);

    this._initialized = true;
  }
}
