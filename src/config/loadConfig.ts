/**
 * Configuration loading and validation
 * Reads an environment map once and returns an immutable AppConfig
 */
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ZodError } from 'zod';
import { appConfigSchema, type ParsedAppConfig } from './schema.js';
import { ConfigError } from '../core/errors.js';
import type { AppConfig } from '../types/index.js';

export type Environment = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** Directory holding Docker secret files */
  secretsDir?: string;
}

/**
 * Read a variable; empty strings count as unset
 */
function getEnv(env: Environment, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function getEnvBool(env: Environment, key: string, defaultValue: boolean): boolean {
  const value = getEnv(env, key);
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Read secret from file (Docker secrets support) or environment
 */
function getSecret(env: Environment, key: string, secretsDir: string): string | undefined {
  const secretPath = join(secretsDir, key.toLowerCase());
  if (existsSync(secretPath)) {
    const value = readFileSync(secretPath, 'utf-8').trim();
    if (value) return value;
  }
  return getEnv(env, key);
}

/**
 * Split a comma-separated service list, trimming entries and dropping blanks
 */
export function parseServiceNames(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Format Zod validation errors
 */
function formatZodError(error: ZodError): string[] {
  return error.errors.map((err) => {
    const field = err.path.join('.');
    return field ? `${field}: ${err.message}` : err.message;
  });
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function toAppConfig(parsed: ParsedAppConfig): AppConfig {
  return {
    adguard: parsed.adguard,
    sync: parsed.sync,
    http: parsed.http,
    logging: parsed.logging,
  };
}

/**
 * Build the run configuration. Throws ConfigError on missing or invalid settings.
 */
export function loadConfig(env: Environment, options: LoadConfigOptions = {}): Readonly<AppConfig> {
  const secretsDir = options.secretsDir ?? '/run/secrets';

  const result = appConfigSchema.safeParse({
    adguard: {
      apiUrl: getEnv(env, 'ADGUARD_API'),
      username: getSecret(env, 'ADGUARD_USERNAME', secretsDir),
      password: getSecret(env, 'ADGUARD_PASSWORD', secretsDir),
      updateMode: getEnv(env, 'UPDATE_MODE')?.toLowerCase(),
    },
    sync: {
      allServices: getEnvBool(env, 'ALL_SERVICES', false),
      serviceNames: parseServiceNames(getEnv(env, 'SERVICE_NAMES')),
      lancacheServer: getEnv(env, 'LANCACHE_SERVER'),
      catalogUrl: getEnv(env, 'CATALOG_URL'),
      maxWorkers: getEnv(env, 'MAX_WORKERS'),
      batchSize: getEnv(env, 'BATCH_SIZE'),
      cacheFile: getEnv(env, 'CACHE_FILE'),
      syncIntervalMs: getEnv(env, 'SYNC_INTERVAL'),
    },
    http: {
      requestTimeoutMs: getEnv(env, 'REQUEST_TIMEOUT'),
    },
    logging: {
      level: getEnv(env, 'LOG_LEVEL')?.toLowerCase(),
      pretty: getEnvBool(env, 'LOG_PRETTY', true),
    },
  });

  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return deepFreeze(toAppConfig(result.data));
}
