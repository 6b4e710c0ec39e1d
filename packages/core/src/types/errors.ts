/**
 * Base error for all PlantGate errors.
 *
 * `status` is the HTTP status the error maps to when it reaches the
 * request boundary.
 */
export class PlantGateError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'PlantGateError';
  }
}

/**
 * Routing headers are missing or malformed.
 */
export class BadRequestError extends PlantGateError {
  constructor(message: string) {
    super('BAD_REQUEST', 400, message);
    this.name = 'BadRequestError';
  }
}

/**
 * The plant id is not in the registry.
 */
export class PlantNotFoundError extends PlantGateError {
  constructor(public readonly plantId: string) {
    super('PLANT_NOT_FOUND', 404, `Plant "${plantId}" is not registered`);
    this.name = 'PlantNotFoundError';
  }
}

/**
 * The caller has no grant for the plant. The message never says why.
 */
export class ForbiddenError extends PlantGateError {
  constructor() {
    super('FORBIDDEN', 403, 'Access to plant denied');
    this.name = 'ForbiddenError';
  }
}

/**
 * A database this layer depends on is unreachable, slow or failing.
 * `target` is a plant key or `central`.
 */
export class ServiceUnavailableError extends PlantGateError {
  constructor(
    public readonly target: string,
    public readonly operation: string,
    message: string,
    public readonly cause?: unknown
  ) {
    super('SERVICE_UNAVAILABLE', 503, message);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * A pool for one database could not be established.
 */
export class DatabaseUnavailableError extends ServiceUnavailableError {
  constructor(target: string, cause?: unknown) {
    super(
      target,
      'connect',
      `Database for "${target}" is unavailable: ${cause instanceof Error ? cause.message : 'connection failed'}`,
      cause
    );
    this.name = 'DatabaseUnavailableError';
  }
}

/**
 * A database operation did not finish within its timeout.
 */
export class OperationTimeoutError extends ServiceUnavailableError {
  constructor(target: string, operation: string, public readonly timeoutMs: number) {
    super(target, operation, `${operation} on "${target}" timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

export interface ConfigurationIssue {
  /** Variable or group the issue belongs to, e.g. `CAIRO_PASSWORD` */
  readonly path: string;
  readonly message: string;
}

/**
 * Deployment configuration is invalid. Fatal at startup.
 */
export class ConfigurationError extends PlantGateError {
  constructor(public readonly issues: ConfigurationIssue[]) {
    super(
      'CONFIGURATION_ERROR',
      500,
      issues.length === 1
        ? `Invalid configuration: ${issues[0].path} ${issues[0].message}`
        : `Invalid configuration (${issues.length} issues): ${issues.map(i => `${i.path} ${i.message}`).join('; ')}`
    );
    this.name = 'ConfigurationError';
  }
}
