/**
 * Type-safe route definitions for the PlantGate Express integration.
 */

/**
 * API route definitions, relative to the mount prefix.
 */
export const Routes = {
  // ── Operations Routes ───────────────────────────────────────────────
  /**
   * GET /health
   * Health report for the central database and every plant.
   */
  Health: '/health',

  /**
   * GET /ready
   * Readiness check: the central database answers.
   */
  Ready: '/ready',

  /**
   * GET /plants
   * Registered plants that are currently reachable.
   */
  Plants: '/plants',

  // ── Plant-scoped Routes ─────────────────────────────────────────────
  /**
   * GET /context
   * The caller's resolved plant context. Requires the routing headers.
   */
  Context: '/context',
} as const;

export type RouteName = keyof typeof Routes;
export type RoutePath = (typeof Routes)[RouteName];

/**
 * Route configuration for enabling/disabling routes.
 */
export interface RouteConfig {
  /** Enable health, readiness and plants routes */
  health?: boolean;
  /** Enable the plant context route */
  context?: boolean;
}

/**
 * Default route configuration - all enabled.
 */
export const DefaultRouteConfig: RouteConfig = {
  health: true,
  context: true,
};
