/**
 * Express middleware for plant routing and access control.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import {
  BadRequestError,
  ConfigurationError,
  ForbiddenError,
  PlantGateError,
  now,
  type RequestPlantContext,
} from '@plantgate/core';
import type { ServiceContainer } from './container';
import { ServiceTokens } from './tokens';

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      plant?: RequestPlantContext;
    }
  }
}

export const DEFAULT_PLANT_HEADER = 'plant-id';
export const DEFAULT_USER_HEADER = 'x-user-id';

const PLANT_ID_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;
const USER_ID_PATTERN = /^[1-9][0-9]*$/;

/**
 * Steps of the per-request state machine, in order.
 * A rejection is reported with the step that could not be completed.
 */
export type ContextState =
  | 'HeadersParsed'
  | 'PlantResolved'
  | 'ConnectionAcquired'
  | 'AccessChecked'
  | 'ContextAttached';

/**
 * Options for the plant context middleware.
 */
export interface PlantContextOptions {
  /** Header carrying the plant identifier (default: `plant-id`) */
  plantHeader?: string;
  /** Header carrying the user identity (default: `x-user-id`) */
  userHeader?: string;
}

/**
 * Read and validate the routing headers. No database work happens here.
 */
export function readRoutingHeaders(
  req: Request,
  options: PlantContextOptions = {}
): { plantId: string; userId: number } {
  const plantHeader = options.plantHeader ?? DEFAULT_PLANT_HEADER;
  const userHeader = options.userHeader ?? DEFAULT_USER_HEADER;

  const rawPlant = req.get(plantHeader)?.trim();
  if (!rawPlant) {
    throw new BadRequestError(`Header "${plantHeader}" is required`);
  }
  if (!PLANT_ID_PATTERN.test(rawPlant)) {
    throw new BadRequestError(`Header "${plantHeader}" is not a valid plant id`);
  }

  const rawUser = req.get(userHeader)?.trim();
  if (!rawUser) {
    throw new BadRequestError(`Header "${userHeader}" is required`);
  }
  const userId = Number(rawUser);
  if (!USER_ID_PATTERN.test(rawUser) || !Number.isSafeInteger(userId)) {
    throw new BadRequestError(`Header "${userHeader}" is not a valid user id`);
  }

  return { plantId: rawPlant.toUpperCase(), userId };
}

/**
 * Create middleware that resolves the plant, acquires its pool, checks the
 * caller's grant and attaches the result as `req.plant`.
 *
 * Steps run strictly in order; the first failure rejects the request through
 * `next(err)` and nothing is attached.
 */
export function createPlantContextMiddleware(
  container: ServiceContainer,
  options: PlantContextOptions = {}
): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const startedAt = now();
    const events = container.tryResolve(ServiceTokens.EventBus);
    let state: ContextState = 'HeadersParsed';
    let plantId: string | undefined;
    let userId: number | undefined;

    const build = async (): Promise<RequestPlantContext> => {
      const headers = readRoutingHeaders(req, options);
      plantId = headers.plantId;
      userId = headers.userId;

      state = 'PlantResolved';
      const descriptor = container.resolve(ServiceTokens.PlantRegistry).resolve(headers.plantId);

      state = 'ConnectionAcquired';
      const db = await container.resolve(ServiceTokens.PoolProvider).acquire(descriptor.plantKey);

      state = 'AccessChecked';
      const decision = await container
        .resolve(ServiceTokens.AccessValidator)
        .checkAccess(headers.userId, descriptor.plantKey);
      if (!decision.allowed) {
        throw new ForbiddenError();
      }

      state = 'ContextAttached';
      return Object.freeze({
        plantId: descriptor.plantKey,
        userId: headers.userId,
        db,
        descriptor,
        access: decision,
      });
    };

    build().then(
      (context) => {
        req.plant = context;
        events?.onContextAttached?.({
          plantId: context.plantId,
          userId: context.userId,
          durationMs: now() - startedAt,
        });
        next();
      },
      (err: unknown) => {
        if (err instanceof PlantGateError) {
          events?.onRequestRejected?.({ state, code: err.code, status: err.status, plantId, userId });
        }
        next(err);
      }
    );
  };
}

/**
 * Error response format.
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
}

/**
 * Create error handling middleware. PlantGate errors keep their status and
 * code; anything else is a 500 with a generic message.
 */
export function createErrorHandler(): (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => void {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof PlantGateError) {
      const body: ErrorResponse = { error: { code: err.code, message: err.message } };
      res.status(err.status).json(body);
      return;
    }

    console.error('[PlantGate] Unhandled error:', err);
    const body: ErrorResponse = {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    };
    res.status(500).json(body);
  };
}

/**
 * Request validation helpers.
 */
export function requirePlantContext(
  req: Request
): asserts req is Request & { plant: RequestPlantContext } {
  if (!req.plant) {
    throw new ConfigurationError([
      { path: 'req.plant', message: 'is not attached. Did you forget the plant context middleware?' },
    ]);
  }
}

/**
 * Async handler wrapper to catch errors.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
