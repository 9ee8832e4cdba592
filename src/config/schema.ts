/**
 * Zod schemas for configuration validation
 */
import { z } from 'zod';

export const DEFAULT_CATALOG_URL =
  'https://raw.githubusercontent.com/uklans/cache-domains/master/cache_domains.json';

/**
 * Accepts host[:port] without a protocol; http:// is assumed
 */
function isApiUrl(value: string): boolean {
  const candidate = /^https?:\/\//i.test(value) ? value : `http://${value}`;
  try {
    new URL(candidate);
    return true;
  } catch {
    return false;
  }
}

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const updateModeSchema = z.enum(['update', 'replace']);

export const adguardConfigSchema = z.object({
  apiUrl: z
    .string({
      required_error:
        'ADGUARD_API is not set. Use the full API root including protocol and port, e.g. http://adguard.example.com:3000',
    })
    .min(1, 'ADGUARD_API must not be empty')
    .refine(isApiUrl, 'ADGUARD_API is not a valid URL'),
  username: z
    .string({ required_error: 'ADGUARD_USERNAME is not set' })
    .min(1, 'ADGUARD_USERNAME must not be empty'),
  password: z
    .string({ required_error: 'ADGUARD_PASSWORD is not set' })
    .min(1, 'ADGUARD_PASSWORD must not be empty'),
  updateMode: updateModeSchema.default('update'),
});

export const syncConfigSchema = z.object({
  allServices: z.boolean().default(false),
  serviceNames: z.array(z.string().min(1)).default([]),
  lancacheServer: z
    .string({
      required_error:
        'LANCACHE_SERVER is not set. Use the IP address or hostname of the cache server, e.g. 192.168.0.100',
    })
    .min(1, 'LANCACHE_SERVER must not be empty'),
  catalogUrl: z.string().url().default(DEFAULT_CATALOG_URL),
  maxWorkers: z.coerce.number().int().min(1).default(3),
  batchSize: z.coerce.number().int().min(1).default(100),
  cacheFile: z.string().min(1).optional(),
  syncIntervalMs: z.coerce.number().int().min(1000, 'SYNC_INTERVAL must be at least 1000 ms').optional(),
});

export const httpConfigSchema = z.object({
  requestTimeoutMs: z.coerce.number().int().min(1).default(10000),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  pretty: z.boolean().default(true),
});

export const appConfigSchema = z.object({
  adguard: adguardConfigSchema,
  sync: syncConfigSchema,
  http: httpConfigSchema,
  logging: loggingConfigSchema,
});

export type AppConfigInput = z.input<typeof appConfigSchema>;
export type ParsedAppConfig = z.output<typeof appConfigSchema>;
