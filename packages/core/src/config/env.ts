/**
 * Environment configuration.
 *
 * The central database is read from `DB_{FIELD}`; every plant from
 * `{PLANT_KEY}_{FIELD}` with FIELD one of USER, PASSWORD, HOST, PORT, NAME.
 * Each group is checked against a JSON schema; all problems are collected
 * and thrown together as one ConfigurationError.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError, type ConfigurationIssue } from '../types/errors';
import type { DatabaseDescriptor, PlantDescriptor } from '../types/plant';

export type Env = Readonly<Record<string, string | undefined>>;

export const CREDENTIAL_FIELDS = ['USER', 'PASSWORD', 'HOST', 'PORT', 'NAME'] as const;
export type CredentialField = (typeof CREDENTIAL_FIELDS)[number];

/** Prefix of the central database group. Never a plant. */
export const CENTRAL_PREFIX = 'DB';

export const PLANT_KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;

const GROUP_VARIABLE = /^([A-Z][A-Z0-9_]*)_(USER|PASSWORD|HOST|PORT|NAME)$/;

/** Fields that locate a service but say nothing about a database login. */
const ADDRESS_FIELDS: ReadonlySet<string> = new Set(['HOST', 'PORT']);

/** Single-label names with underscores, as container runtimes assign them. */
const SERVICE_NAME_PATTERN = '^[A-Za-z0-9][A-Za-z0-9_-]*$';

export interface PlantGateConfig {
  readonly central: DatabaseDescriptor;
  readonly plants: readonly PlantDescriptor[];
  readonly pool: {
    readonly max: number;
    readonly connectTimeoutMs: number;
  };
  readonly accessCheckTimeoutMs: number;
  readonly healthProbeTimeoutMs: number;
  readonly http: {
    readonly port: number;
    readonly prefix: string;
  };
}

type CredentialGroup = {
  USER: string;
  PASSWORD: string;
  HOST: string;
  PORT: number;
  NAME: string;
};

const ajv = new Ajv({ allErrors: true, coerceTypes: true });
addFormats(ajv);

const validateGroup = ajv.compile<CredentialGroup>({
  type: 'object',
  properties: {
    USER: { type: 'string', minLength: 1 },
    PASSWORD: { type: 'string', minLength: 1 },
    HOST: {
      type: 'string',
      minLength: 1,
      anyOf: [{ format: 'hostname' }, { format: 'ipv4' }, { format: 'ipv6' }, { pattern: SERVICE_NAME_PATTERN }],
    },
    PORT: { type: 'integer', minimum: 1, maximum: 65535 },
    NAME: { type: 'string', minLength: 1 },
  },
  required: [...CREDENTIAL_FIELDS],
});

function toIssue(prefix: string, err: ErrorObject): ConfigurationIssue {
  if (err.keyword === 'required') {
    return { path: `${prefix}_${String(err.params.missingProperty)}`, message: 'is required' };
  }
  const field = err.instancePath.replace(/^\//, '');
  if (err.keyword === 'anyOf') {
    return { path: `${prefix}_${field}`, message: 'must be a hostname or IP address' };
  }
  return { path: `${prefix}_${field}`, message: err.message ?? 'is invalid' };
}

/**
 * Read and validate one `{prefix}_{FIELD}` group.
 */
function readGroup(env: Env, prefix: string, ssl: boolean, issues: ConfigurationIssue[]): DatabaseDescriptor | undefined {
  const raw: Record<string, unknown> = {};
  for (const field of CREDENTIAL_FIELDS) {
    const value = env[`${prefix}_${field}`];
    if (value !== undefined && value !== '') {
      raw[field] = value.trim();
    }
  }

  if (!validateGroup(raw)) {
    for (const err of validateGroup.errors ?? []) {
      // Branch failures are summed up by their anyOf error
      if (err.schemaPath.includes('/anyOf/')) continue;
      issues.push(toIssue(prefix, err));
    }
    return undefined;
  }

  return {
    host: raw.HOST,
    port: raw.PORT,
    database: raw.NAME,
    user: raw.USER,
    password: raw.PASSWORD,
    ssl,
  };
}

/**
 * Plant keys named by the environment.
 *
 * With `PLANT_KEYS` set, exactly those keys. Otherwise every prefix that
 * carries at least two of the five fields, one of them USER, PASSWORD or
 * NAME. A lone variable (`DOCKER_HOST`, `WSL_DISTRO_NAME`) or a host/port
 * pair (`KUBERNETES_SERVICE_HOST`, `KUBERNETES_SERVICE_PORT`) is not a
 * plant; an incomplete group that passes is then rejected by validation.
 */
export function discoverPlantKeys(env: Env, issues: ConfigurationIssue[] = []): string[] {
  const declared = env.PLANT_KEYS?.trim();
  if (declared) {
    const keys = new Set<string>();
    for (const entry of declared.split(',')) {
      const key = entry.trim().toUpperCase();
      if (!key) continue;
      if (!PLANT_KEY_PATTERN.test(key) || key === CENTRAL_PREFIX) {
        issues.push({ path: 'PLANT_KEYS', message: `contains invalid plant key "${key}"` });
        continue;
      }
      keys.add(key);
    }
    return [...keys].sort();
  }

  const fields = new Map<string, Set<string>>();
  for (const name of Object.keys(env)) {
    const match = GROUP_VARIABLE.exec(name);
    if (!match || env[name] === undefined) continue;
    const [, key, field] = match;
    if (key === CENTRAL_PREFIX) continue;
    const seen = fields.get(key) ?? new Set<string>();
    seen.add(field);
    fields.set(key, seen);
  }

  const keys: string[] = [];
  for (const [key, seen] of fields) {
    const credentials = [...seen].some(field => !ADDRESS_FIELDS.has(field));
    if (seen.size >= 2 && credentials) {
      keys.push(key);
    }
  }
  return keys.sort();
}

function readInteger(env: Env, name: string, fallback: number, issues: ConfigurationIssue[]): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return fallback;
  if (!/^[0-9]+$/.test(raw) || Number(raw) <= 0) {
    issues.push({ path: name, message: 'must be a positive integer' });
    return fallback;
  }
  return Number(raw);
}

function readSsl(env: Env, issues: ConfigurationIssue[]): boolean {
  const mode = (env.DB_SSL_MODE ?? 'disable').trim().toLowerCase();
  if (mode === 'disable') return false;
  if (mode === 'require') return true;
  issues.push({ path: 'DB_SSL_MODE', message: 'must be "disable" or "require"' });
  return false;
}

/**
 * Load the whole configuration. Throws ConfigurationError listing every
 * problem found; never returns a partially valid config.
 */
export function loadConfig(env: Env = process.env): PlantGateConfig {
  const issues: ConfigurationIssue[] = [];
  const ssl = readSsl(env, issues);

  const central = readGroup(env, CENTRAL_PREFIX, ssl, issues);

  const plants: PlantDescriptor[] = [];
  for (const plantKey of discoverPlantKeys(env, issues)) {
    const descriptor = readGroup(env, plantKey, ssl, issues);
    if (descriptor) {
      plants.push(Object.freeze({ plantKey, ...descriptor }));
    }
  }

  const config = {
    pool: {
      max: readInteger(env, 'DB_POOL_MAX', 10, issues),
      connectTimeoutMs: readInteger(env, 'DB_CONNECT_TIMEOUT_MS', 5000, issues),
    },
    accessCheckTimeoutMs: readInteger(env, 'ACCESS_CHECK_TIMEOUT_MS', 3000, issues),
    healthProbeTimeoutMs: readInteger(env, 'HEALTH_PROBE_TIMEOUT_MS', 2000, issues),
    http: {
      port: readInteger(env, 'PORT', 8004, issues),
      prefix: env.API_PREFIX?.trim() || '/api/v1',
    },
  };

  if (issues.length > 0 || !central) {
    throw new ConfigurationError(issues);
  }

  return { central: Object.freeze(central), plants, ...config };
}
