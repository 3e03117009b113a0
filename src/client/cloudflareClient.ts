/**
 * Cloudflare API client for zone cache purges.
 * Uses native Node.js fetch with a per-request timeout and bounded retries.
 * Delivery problems come back as a PurgeOutcome; only validation and
 * configuration problems are thrown, and always before any request is sent.
 */

import type { Logger } from '../audit/logger.js';
import { silentLogger } from '../audit/logger.js';
import { ConfigurationError, ErrorKinds, PurgeErrorKind, ValidationError, describeError } from '../protocol/errors.js';
import { PurgeMode, PurgeOutcome, TokenVerification } from '../protocol/types.js';
import { executeWithRetry, RetryOptions } from './retry.js';

export interface CloudflareApiErrorItem {
  code: number;
  message: string;
}

interface CloudflareEnvelope {
  success: boolean;
  errors: CloudflareApiErrorItem[];
  result: Record<string, unknown> | null;
}

/** Cloudflare error codes that mean the credential itself was refused. */
const AUTH_ERROR_CODES = new Set([1000, 6003, 9103, 9106, 9109, 10000, 10001]);

export interface CloudflareClientOptions {
  apiToken: string | null;
  zoneId: string | null;
  apiBaseUrl?: string;
  /** Largest URL list accepted by a single purgeUrls call. */
  batchSize: number;
  requestTimeoutMs?: number;
  retry?: RetryOptions;
  logger?: Logger;
}

/**
 * The operations the dispatcher needs from a purge backend.
 */
export interface PurgeClient {
  purgeUrls(urls: string[]): Promise<PurgeOutcome>;
  purgeEverything(): Promise<PurgeOutcome>;
  purgeTags(tags: string[]): Promise<PurgeOutcome>;
  purgePrefixes(prefixes: string[]): Promise<PurgeOutcome>;
  verifyToken(): Promise<TokenVerification>;
  hasCredentials(): boolean;
}

export class CloudflareClient implements PurgeClient {
  private readonly apiBaseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: CloudflareClientOptions) {
    this.apiBaseUrl = (options.apiBaseUrl ?? 'https://api.cloudflare.com/client/v4').replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.logger = options.logger ?? silentLogger;
  }

  hasCredentials(): boolean {
    return Boolean(this.options.apiToken && this.options.zoneId);
  }

  /**
   * Purge one batch of URLs.
   */
  async purgeUrls(urls: string[]): Promise<PurgeOutcome> {
    if (urls.length === 0) {
      throw new ValidationError('purgeUrls needs at least one URL.');
    }
    if (urls.length > this.options.batchSize) {
      throw new ValidationError(
        `purgeUrls received ${urls.length} URLs, exceeding the batch ceiling of ${this.options.batchSize}. Split the list first.`,
        { count: urls.length, ceiling: this.options.batchSize },
      );
    }
    return this.purge(PurgeMode.ByUrl, { files: urls }, urls);
  }

  /**
   * Purge every cached object in the zone.
   */
  async purgeEverything(): Promise<PurgeOutcome> {
    return this.purge(PurgeMode.Everything, { purge_everything: true }, []);
  }

  /**
   * Purge by cache tag. Plans without tag purge are reported as CapabilityUnavailable.
   */
  async purgeTags(tags: string[]): Promise<PurgeOutcome> {
    if (tags.length === 0) {
      throw new ValidationError('purgeTags needs at least one tag.');
    }
    return this.purge(PurgeMode.ByTag, { tags }, []);
  }

  /**
   * Purge by URL prefix. Same plan restriction as tags.
   */
  async purgePrefixes(prefixes: string[]): Promise<PurgeOutcome> {
    if (prefixes.length === 0) {
      throw new ValidationError('purgePrefixes needs at least one prefix.');
    }
    return this.purge(PurgeMode.ByPrefix, { prefixes }, []);
  }

  /**
   * Check that the configured token is accepted. Not retried.
   */
  async verifyToken(): Promise<TokenVerification> {
    const token = this.requireToken();
    try {
      const envelope = await this.request('GET', '/user/tokens/verify', token, undefined, PurgeMode.Everything);
      const result = envelope.result ?? {};
      return {
        valid: true,
        status: 200,
        tokenId: typeof result['id'] === 'string' ? result['id'] : undefined,
        tokenStatus: typeof result['status'] === 'string' ? result['status'] : undefined,
      };
    } catch (err) {
      if (err instanceof CloudflareApiException) {
        return { valid: false, status: err.statusCode, errorKind: err.kind, error: err.message };
      }
      throw err;
    }
  }

  // ── Private ─────────────────────────────────────────────────────────────

  private async purge(mode: PurgeMode, body: Record<string, unknown>, batchUrls: string[]): Promise<PurgeOutcome> {
    const token = this.requireToken();
    const zoneId = this.requireZone();
    const endpoint = `/zones/${encodeURIComponent(zoneId)}/purge_cache`;

    try {
      const envelope = await executeWithRetry(
        (attempt) => {
          this.logger.debug('Sending purge request', { mode, attempt, urls: batchUrls.length });
          return this.request('POST', endpoint, token, body, mode);
        },
        {
          ...this.options.retry,
          shouldRetry: (err) => err instanceof CloudflareApiException && err.kind === ErrorKinds.TRANSIENT,
          minDelayFor: (err) => (err instanceof CloudflareApiException ? err.retryAfterMs : undefined),
        },
        this.logger,
      );
      const purgeId = envelope.result?.['id'];
      return {
        success: true,
        mode,
        status: 200,
        batchUrls,
        purgeId: typeof purgeId === 'string' ? purgeId : undefined,
      };
    } catch (err) {
      if (!(err instanceof CloudflareApiException)) {
        throw err;
      }
      const kind = err.kind === ErrorKinds.TRANSIENT ? ErrorKinds.DELIVERY_FAILED : err.kind;
      return {
        success: false,
        mode,
        status: err.statusCode,
        errorKind: kind,
        error: err.message,
        batchUrls,
      };
    }
  }

  private async request(
    method: 'GET' | 'POST',
    endpoint: string,
    token: string,
    body: Record<string, unknown> | undefined,
    mode: PurgeMode,
  ): Promise<CloudflareEnvelope> {
    let response: Response;
    try {
      response = await fetch(`${this.apiBaseUrl}${endpoint}`, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new CloudflareApiException(null, ErrorKinds.TRANSIENT, `Network error: ${describeError(err)}`);
    }
    return this.handleResponse(response, mode);
  }

  private async handleResponse(response: Response, mode: PurgeMode): Promise<CloudflareEnvelope> {
    const text = await response.text();
    const envelope = parseEnvelope(text);
    const errors = envelope?.errors ?? [];

    if (response.ok && envelope?.success) {
      return envelope;
    }

    const detail = errors.length > 0 ? errors.map((e) => e.message).join(', ') : text || response.statusText;
    const kind = classifyFailure(response.status, mode, errors);
    throw new CloudflareApiException(
      response.status,
      kind,
      `Cloudflare API error (${response.status}): ${detail}`,
      errors,
      parseRetryAfter(response.headers.get('retry-after')),
    );
  }

  private requireToken(): string {
    if (!this.options.apiToken) {
      throw new ConfigurationError('Cloudflare API token is not configured. Set CLOUDFLARE_API_TOKEN.');
    }
    return this.options.apiToken;
  }

  private requireZone(): string {
    if (!this.options.zoneId) {
      throw new ConfigurationError('Cloudflare zone id is not configured. Set CLOUDFLARE_ZONE_ID.');
    }
    return this.options.zoneId;
  }
}

/**
 * Map an unsuccessful response onto the error taxonomy.
 */
export function classifyFailure(
  status: number,
  mode: PurgeMode,
  errors: CloudflareApiErrorItem[] = [],
): PurgeErrorKind {
  if (status === 429 || status >= 500) return ErrorKinds.TRANSIENT;
  if (status === 401) return ErrorKinds.AUTH;

  const planRestricted = mode === PurgeMode.ByTag || mode === PurgeMode.ByPrefix;
  const authCode = errors.some((e) => AUTH_ERROR_CODES.has(e.code));

  if (status === 403) {
    return planRestricted && !authCode ? ErrorKinds.CAPABILITY_UNAVAILABLE : ErrorKinds.AUTH;
  }
  if (authCode) return ErrorKinds.AUTH;
  return planRestricted ? ErrorKinds.CAPABILITY_UNAVAILABLE : ErrorKinds.VALIDATION;
}

function parseEnvelope(text: string): CloudflareEnvelope | null {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null) return null;
  const record: Record<string, unknown> = { ...data };
  const errors = Array.isArray(record['errors']) ? record['errors'].flatMap(toErrorItem) : [];
  const result = record['result'];
  return {
    success: record['success'] === true,
    errors,
    result: typeof result === 'object' && result !== null ? { ...result } : null,
  };
}

function toErrorItem(value: unknown): CloudflareApiErrorItem[] {
  if (typeof value !== 'object' || value === null) return [];
  const item: Record<string, unknown> = { ...value };
  return [{
    code: typeof item['code'] === 'number' ? item['code'] : 0,
    message: typeof item['message'] === 'string' ? item['message'] : JSON.stringify(value),
  }];
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - Date.now());
}

export class CloudflareApiException extends Error {
  constructor(
    public readonly statusCode: number | null,
    public readonly kind: PurgeErrorKind,
    message: string,
    public readonly errors: CloudflareApiErrorItem[] = [],
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'CloudflareApiException';
  }
}
