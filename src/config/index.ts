/**
 * Configuration for edge-purge.
 * All values configurable via environment variables or a local JSON config file
 * (EDGE_PURGE_CONFIG_FILE). Environment variables win over the file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../protocol/errors.js';

/** Hard ceiling the purge API places on URLs per request. */
export const MAX_PURGE_BATCH_SIZE = 500;

export interface RetryConfig {
  /** Total attempts per request, including the first (default 3) */
  maxAttempts: number;
  /** Delay before the first retry (default 500) */
  initialDelayMs: number;
  /** Upper bound for any single delay (default 8000) */
  maxDelayMs: number;
  /** Growth factor between retries (default 2) */
  backoffMultiplier: number;
}

export interface PurgeConfig {
  /** Cloudflare API token with Cache Purge permission */
  apiToken: string | null;

  /** Cloudflare zone identifier */
  zoneId: string | null;

  /** API base URL (default "https://api.cloudflare.com/client/v4") */
  apiBaseUrl: string;

  /** Master switch; when false every purge is a no-op (default true) */
  enabled: boolean;

  /** Site base URL that relative paths are resolved against (default "") */
  siteUrl: string;

  /** Hosts served by the zone. Falls back to the site URL host. */
  zoneHosts: string[];

  /** Deliver purges on a background timer (default true) */
  background: boolean;

  /** URLs per purge request (default 30) */
  batchSize: number;

  /** Delay before a background job starts (default 0) */
  delaySeconds: number;

  /** Entity type -> dependent paths purged whenever that type changes */
  urlDependencies: Record<string, string[]>;

  /** Per-request timeout (default 10000) */
  requestTimeoutMs: number;

  retry: RetryConfig;

  /** Emit debug log lines (default false) */
  debug: boolean;

  /** Audit log file path (default "./purge-audit.jsonl") */
  auditLogPath: string;

  /** Manual purge operations allowed per minute on the MCP server (default 10) */
  purgeRateLimitPerMinute: number;

  /** Tier 2+ MCP tools require confirm + reason (default true) */
  confirmationRequired: boolean;
}

const defaultConfig: PurgeConfig = {
  apiToken: null,
  zoneId: null,
  apiBaseUrl: 'https://api.cloudflare.com/client/v4',
  enabled: true,
  siteUrl: '',
  zoneHosts: [],
  background: true,
  batchSize: 30,
  delaySeconds: 0,
  urlDependencies: {},
  requestTimeoutMs: 10_000,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 500,
    maxDelayMs: 8_000,
    backoffMultiplier: 2,
  },
  debug: false,
  auditLogPath: './purge-audit.jsonl',
  purgeRateLimitPerMinute: 10,
  confirmationRequired: true,
};

const UrlDependenciesSchema = z.record(z.array(z.string().min(1)));

const ConfigFileSchema = z.object({
  apiToken: z.string().optional(),
  zoneId: z.string().optional(),
  apiBaseUrl: z.string().url().optional(),
  enabled: z.boolean().optional(),
  siteUrl: z.string().optional(),
  zoneHosts: z.array(z.string().min(1)).optional(),
  background: z.boolean().optional(),
  batchSize: z.number().int().optional(),
  delaySeconds: z.number().optional(),
  urlDependencies: UrlDependenciesSchema.optional(),
  requestTimeoutMs: z.number().int().optional(),
  retry: z.object({
    maxAttempts: z.number().int().optional(),
    initialDelayMs: z.number().int().optional(),
    maxDelayMs: z.number().int().optional(),
    backoffMultiplier: z.number().optional(),
  }).optional(),
  debug: z.boolean().optional(),
  auditLogPath: z.string().optional(),
  purgeRateLimitPerMinute: z.number().int().optional(),
  confirmationRequired: z.boolean().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

type Env = Record<string, string | undefined>;

function parseIntEnv(env: Env, key: string, fallback: number): number {
  const val = env[key];
  if (val === undefined || val.trim() === '') return fallback;
  const parsed = Number(val);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${key} must be an integer, got "${val}".`);
  }
  return parsed;
}

function parseNumberEnv(env: Env, key: string, fallback: number): number {
  const val = env[key];
  if (val === undefined || val.trim() === '') return fallback;
  const parsed = Number(val);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got "${val}".`);
  }
  return parsed;
}

function parseBoolEnv(env: Env, key: string, fallback: boolean): boolean {
  const val = env[key];
  if (val === undefined || val.trim() === '') return fallback;
  return val.toLowerCase() === 'true' || val === '1';
}

function parseListEnv(env: Env, key: string, fallback: string[]): string[] {
  const val = env[key];
  if (val === undefined || val.trim() === '') return fallback;
  return val.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseDependenciesEnv(env: Env, fallback: Record<string, string[]>): Record<string, string[]> {
  const val = env['CLOUDFLARE_URL_DEPENDENCIES'];
  if (val === undefined || val.trim() === '') return fallback;
  let raw: unknown;
  try {
    raw = JSON.parse(val);
  } catch {
    throw new ConfigurationError('CLOUDFLARE_URL_DEPENDENCIES must be a JSON object of path lists.');
  }
  const parsed = UrlDependenciesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'CLOUDFLARE_URL_DEPENDENCIES must map entity types to arrays of paths.',
      parsed.error.issues,
    );
  }
  return parsed.data;
}

/**
 * Read and validate a JSON config file.
 */
export function readConfigFile(filePath: string): ConfigFile {
  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Could not read config file ${resolved}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${resolved}.`, parsed.error.issues);
  }
  return parsed.data;
}

function mergeFile(base: PurgeConfig, file: ConfigFile): PurgeConfig {
  return {
    ...base,
    apiToken: file.apiToken ?? base.apiToken,
    zoneId: file.zoneId ?? base.zoneId,
    apiBaseUrl: file.apiBaseUrl ?? base.apiBaseUrl,
    enabled: file.enabled ?? base.enabled,
    siteUrl: file.siteUrl ?? base.siteUrl,
    zoneHosts: file.zoneHosts ?? base.zoneHosts,
    background: file.background ?? base.background,
    batchSize: file.batchSize ?? base.batchSize,
    delaySeconds: file.delaySeconds ?? base.delaySeconds,
    urlDependencies: file.urlDependencies ?? base.urlDependencies,
    requestTimeoutMs: file.requestTimeoutMs ?? base.requestTimeoutMs,
    retry: {
      maxAttempts: file.retry?.maxAttempts ?? base.retry.maxAttempts,
      initialDelayMs: file.retry?.initialDelayMs ?? base.retry.initialDelayMs,
      maxDelayMs: file.retry?.maxDelayMs ?? base.retry.maxDelayMs,
      backoffMultiplier: file.retry?.backoffMultiplier ?? base.retry.backoffMultiplier,
    },
    debug: file.debug ?? base.debug,
    auditLogPath: file.auditLogPath ?? base.auditLogPath,
    purgeRateLimitPerMinute: file.purgeRateLimitPerMinute ?? base.purgeRateLimitPerMinute,
    confirmationRequired: file.confirmationRequired ?? base.confirmationRequired,
  };
}

/**
 * Reject values the purge pipeline cannot run with.
 */
export function validateConfig(config: PurgeConfig): PurgeConfig {
  if (config.batchSize < 1 || config.batchSize > MAX_PURGE_BATCH_SIZE) {
    throw new ConfigurationError(
      `Batch size must be between 1 and ${MAX_PURGE_BATCH_SIZE}, got ${config.batchSize}.`,
    );
  }
  if (config.delaySeconds < 0) {
    throw new ConfigurationError(`Purge delay cannot be negative, got ${config.delaySeconds}.`);
  }
  if (config.requestTimeoutMs <= 0) {
    throw new ConfigurationError(`Request timeout must be positive, got ${config.requestTimeoutMs}.`);
  }
  if (config.retry.maxAttempts < 1) {
    throw new ConfigurationError(`Max attempts must be at least 1, got ${config.retry.maxAttempts}.`);
  }
  if (config.siteUrl && !URL.canParse(config.siteUrl)) {
    throw new ConfigurationError(`Site URL "${config.siteUrl}" is not an absolute URL.`);
  }
  return config;
}

/**
 * Hosts that URL purges may target: explicit zone hosts, else the site URL host.
 */
export function effectiveZoneHosts(config: Pick<PurgeConfig, 'zoneHosts' | 'siteUrl'>): string[] {
  if (config.zoneHosts.length > 0) return config.zoneHosts.map((h) => h.toLowerCase());
  if (config.siteUrl && URL.canParse(config.siteUrl)) {
    return [new URL(config.siteUrl).hostname.toLowerCase()];
  }
  return [];
}

export function loadConfig(env: Env = process.env): PurgeConfig {
  const configFile = env['EDGE_PURGE_CONFIG_FILE'];
  const base = configFile ? mergeFile(defaultConfig, readConfigFile(configFile)) : defaultConfig;

  const config: PurgeConfig = {
    ...base,
    apiToken: env['CLOUDFLARE_API_TOKEN'] || base.apiToken,
    zoneId: env['CLOUDFLARE_ZONE_ID'] || base.zoneId,
    apiBaseUrl: env['CLOUDFLARE_API_BASE_URL'] || base.apiBaseUrl,
    enabled: parseBoolEnv(env, 'CLOUDFLARE_ENABLED', base.enabled),
    siteUrl: env['CLOUDFLARE_SITE_URL'] ?? base.siteUrl,
    zoneHosts: parseListEnv(env, 'CLOUDFLARE_ZONE_HOSTS', base.zoneHosts),
    background: parseBoolEnv(env, 'CLOUDFLARE_BACKGROUND_PURGE', base.background),
    batchSize: parseIntEnv(env, 'CLOUDFLARE_PURGE_BATCH_SIZE', base.batchSize),
    delaySeconds: parseNumberEnv(env, 'CLOUDFLARE_PURGE_DELAY_SECONDS', base.delaySeconds),
    urlDependencies: parseDependenciesEnv(env, base.urlDependencies),
    requestTimeoutMs: parseIntEnv(env, 'CLOUDFLARE_REQUEST_TIMEOUT_MS', base.requestTimeoutMs),
    retry: {
      ...base.retry,
      maxAttempts: parseIntEnv(env, 'CLOUDFLARE_MAX_ATTEMPTS', base.retry.maxAttempts),
      initialDelayMs: parseIntEnv(env, 'CLOUDFLARE_RETRY_INITIAL_DELAY_MS', base.retry.initialDelayMs),
      maxDelayMs: parseIntEnv(env, 'CLOUDFLARE_RETRY_MAX_DELAY_MS', base.retry.maxDelayMs),
    },
    debug: parseBoolEnv(env, 'CLOUDFLARE_DEBUG', base.debug),
    auditLogPath: env['EDGE_PURGE_AUDIT_LOG_PATH'] ?? base.auditLogPath,
    purgeRateLimitPerMinute: parseIntEnv(env, 'EDGE_PURGE_RATE_LIMIT', base.purgeRateLimitPerMinute),
    confirmationRequired: parseBoolEnv(env, 'EDGE_PURGE_CONFIRM_REQUIRED', base.confirmationRequired),
  };

  return Object.freeze(validateConfig(config));
}

export { defaultConfig };
