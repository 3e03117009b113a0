import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { CloudflareApiErrorItem, CloudflareClient, CloudflareClientOptions, classifyFailure } from '../../../client/cloudflareClient.js';
import { ConfigurationError, ValidationError } from '../../../protocol/errors.js';
import { PurgeMode } from '../../../protocol/types.js';
import { cloudflareResponse, createMockLogger, errorEnvelope, okEnvelope } from '../../mocks.js';

const PURGE_ENDPOINT = 'https://api.cloudflare.com/client/v4/zones/test-zone/purge_cache';

describe('CloudflareClient', () => {
  let fetchMock: Mock<typeof fetch>;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const createClient = (overrides: Partial<CloudflareClientOptions> = {}) =>
    new CloudflareClient({
      apiToken: 'test-token',
      zoneId: 'test-zone',
      batchSize: 30,
      retry: { maxAttempts: 3, initialDelayMs: 100, sleep },
      logger: createMockLogger(),
      ...overrides,
    });

  const requestBody = (call: number): unknown => JSON.parse(String(fetchMock.mock.calls[call][1]?.body));

  describe('purge requests', () => {
    it('posts a URL batch to the zone purge endpoint', async () => {
      fetchMock.mockResolvedValueOnce(cloudflareResponse(okEnvelope('abc123')));
      const client = createClient();

      const outcome = await client.purgeUrls(['https://example.com/a/', 'https://example.com/b/']);

      expect(outcome).toEqual({
        success: true,
        mode: 'urls',
        status: 200,
        batchUrls: ['https://example.com/a/', 'https://example.com/b/'],
        purgeId: 'abc123',
      });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(PURGE_ENDPOINT);
      expect(init).toMatchObject({
        method: 'POST',
        headers: { Authorization: 'Bearer test-token', 'Content-Type': 'application/json' },
      });
      expect(requestBody(0)).toEqual({ files: ['https://example.com/a/', 'https://example.com/b/'] });
    });

    it('builds the request body for each purge mode', async () => {
      fetchMock.mockImplementation(async () => cloudflareResponse(okEnvelope()));
      const client = createClient();

      await client.purgeEverything();
      await client.purgeTags(['product', 'category']);
      await client.purgePrefixes(['example.com/blog/']);

      expect(requestBody(0)).toEqual({ purge_everything: true });
      expect(requestBody(1)).toEqual({ tags: ['product', 'category'] });
      expect(requestBody(2)).toEqual({ prefixes: ['example.com/blog/'] });
    });

    it('honours a custom API base URL', async () => {
      fetchMock.mockResolvedValueOnce(cloudflareResponse(okEnvelope()));
      const client = createClient({ apiBaseUrl: 'http://localhost:8787/client/v4/' });

      await client.purgeEverything();

      expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:8787/client/v4/zones/test-zone/purge_cache');
    });
  });

  describe('input checks', () => {
    it('rejects a URL list above the batch ceiling without sending it', async () => {
      const client = createClient({ batchSize: 2 });

      await expect(client.purgeUrls(['/a', '/b', '/c'])).rejects.toThrow(
        'purgeUrls received 3 URLs, exceeding the batch ceiling of 2. Split the list first.',
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('rejects empty URL, tag and prefix lists', async () => {
      const client = createClient();

      await expect(client.purgeUrls([])).rejects.toThrow(ValidationError);
      await expect(client.purgeTags([])).rejects.toThrow(ValidationError);
      await expect(client.purgePrefixes([])).rejects.toThrow(ValidationError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('fails with a configuration error when the token or zone is missing', async () => {
      await expect(createClient({ apiToken: null }).purgeEverything()).rejects.toThrow(
        'Cloudflare API token is not configured. Set CLOUDFLARE_API_TOKEN.',
      );
      await expect(createClient({ zoneId: '' }).purgeEverything()).rejects.toThrow(ConfigurationError);
      expect(createClient({ zoneId: null }).hasCredentials()).toBe(false);
      expect(createClient().hasCredentials()).toBe(true);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('retries', () => {
    it('retries rate-limited requests with exponential backoff', async () => {
      fetchMock
        .mockResolvedValueOnce(cloudflareResponse(errorEnvelope(971, 'Please wait and consider throttling'), 429))
        .mockResolvedValueOnce(cloudflareResponse(errorEnvelope(971, 'Please wait and consider throttling'), 429))
        .mockResolvedValueOnce(cloudflareResponse(okEnvelope()));
      const client = createClient();

      const outcome = await client.purgeUrls(['https://example.com/a/']);

      expect(outcome.success).toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    });

    it('waits at least as long as Retry-After asks', async () => {
      fetchMock
        .mockResolvedValueOnce(cloudflareResponse(errorEnvelope(971, 'Too many requests'), 429, { 'Retry-After': '2' }))
        .mockResolvedValueOnce(cloudflareResponse(okEnvelope()));
      const client = createClient();

      await client.purgeUrls(['https://example.com/a/']);

      expect(sleep).toHaveBeenCalledWith(2000);
    });

    it('reports DeliveryFailed once attempts run out on server errors', async () => {
      fetchMock.mockImplementation(async () => new Response('upstream unavailable', { status: 503 }));
      const client = createClient();

      const outcome = await client.purgeUrls(['https://example.com/a/']);

      expect(outcome).toEqual({
        success: false,
        mode: 'urls',
        status: 503,
        errorKind: 'DeliveryFailed',
        error: 'Cloudflare API error (503): upstream unavailable',
        batchUrls: ['https://example.com/a/'],
      });
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('retries network errors', async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(cloudflareResponse(okEnvelope()));
      const client = createClient();

      const outcome = await client.purgeUrls(['https://example.com/a/']);

      expect(outcome.success).toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('reports a network failure with no status after the last attempt', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const client = createClient({ retry: { maxAttempts: 2, initialDelayMs: 0, sleep } });

      const outcome = await client.purgeEverything();

      expect(outcome).toEqual({
        success: false,
        mode: 'everything',
        status: null,
        errorKind: 'DeliveryFailed',
        error: 'Network error: fetch failed',
        batchUrls: [],
      });
    });
  });

  describe('non-retryable failures', () => {
    it('returns an AuthError on the first rejected credential', async () => {
      fetchMock.mockResolvedValueOnce(cloudflareResponse(errorEnvelope(10000, 'Authentication error'), 403));
      const client = createClient();

      const outcome = await client.purgeUrls(['https://example.com/a/']);

      expect(outcome).toEqual({
        success: false,
        mode: 'urls',
        status: 403,
        errorKind: 'AuthError',
        error: 'Cloudflare API error (403): Authentication error',
        batchUrls: ['https://example.com/a/'],
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('reports tag purges refused by the plan as CapabilityUnavailable', async () => {
      fetchMock.mockResolvedValueOnce(cloudflareResponse(errorEnvelope(1134, 'Purge by tag is not available'), 400));
      const client = createClient();

      const outcome = await client.purgeTags(['product']);

      expect(outcome.errorKind).toBe('CapabilityUnavailable');
      expect(outcome.error).toBe('Cloudflare API error (400): Purge by tag is not available');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('does not retry a rejected URL purge request', async () => {
      fetchMock.mockResolvedValueOnce(cloudflareResponse(errorEnvelope(1012, 'Request must contain one of files'), 400));
      const client = createClient();

      const outcome = await client.purgeUrls(['https://example.com/a/']);

      expect(outcome).toEqual({
        success: false,
        mode: 'urls',
        status: 400,
        errorKind: 'ValidationError',
        error: 'Cloudflare API error (400): Request must contain one of files',
        batchUrls: ['https://example.com/a/'],
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('treats a successful status with success=false as a validation failure', async () => {
      fetchMock.mockResolvedValueOnce(cloudflareResponse(errorEnvelope(1012, 'Request must contain one of files'), 200));
      const client = createClient();

      const outcome = await client.purgeUrls(['https://example.com/a/']);

      expect(outcome.success).toBe(false);
      expect(outcome.status).toBe(200);
      expect(outcome.errorKind).toBe('ValidationError');
    });
  });

  describe('verifyToken', () => {
    it('reports an active token', async () => {
      fetchMock.mockResolvedValueOnce(cloudflareResponse({
        success: true,
        errors: [],
        messages: [],
        result: { id: 'tok-1', status: 'active' },
      }));
      const client = createClient();

      await expect(client.verifyToken()).resolves.toEqual({
        valid: true,
        status: 200,
        tokenId: 'tok-1',
        tokenStatus: 'active',
      });
      expect(fetchMock.mock.calls[0][0]).toBe('https://api.cloudflare.com/client/v4/user/tokens/verify');
      expect(fetchMock.mock.calls[0][1]).toMatchObject({ method: 'GET' });
    });

    it('reports a refused token without retrying', async () => {
      fetchMock.mockResolvedValueOnce(cloudflareResponse(errorEnvelope(1000, 'Invalid API Token'), 401));
      const client = createClient();

      await expect(client.verifyToken()).resolves.toEqual({
        valid: false,
        status: 401,
        errorKind: 'AuthError',
        error: 'Cloudflare API error (401): Invalid API Token',
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});

interface FailureCase {
  status: number;
  mode: PurgeMode;
  errors: CloudflareApiErrorItem[];
  expected: string;
}

const failureCases: FailureCase[] = [
  { status: 429, mode: PurgeMode.ByUrl, errors: [], expected: 'TransientDeliveryError' },
  { status: 502, mode: PurgeMode.ByTag, errors: [], expected: 'TransientDeliveryError' },
  { status: 401, mode: PurgeMode.ByUrl, errors: [], expected: 'AuthError' },
  { status: 403, mode: PurgeMode.ByUrl, errors: [], expected: 'AuthError' },
  { status: 403, mode: PurgeMode.ByPrefix, errors: [], expected: 'CapabilityUnavailable' },
  { status: 403, mode: PurgeMode.ByTag, errors: [{ code: 9109, message: 'Unauthorized' }], expected: 'AuthError' },
  { status: 400, mode: PurgeMode.ByUrl, errors: [{ code: 6003, message: 'Invalid request headers' }], expected: 'AuthError' },
  { status: 400, mode: PurgeMode.ByUrl, errors: [{ code: 1012, message: 'Bad files' }], expected: 'ValidationError' },
  { status: 400, mode: PurgeMode.ByTag, errors: [], expected: 'CapabilityUnavailable' },
];

describe('classifyFailure', () => {
  it.each(failureCases)('maps HTTP $status for $mode purges to $expected', ({ status, mode, errors, expected }) => {
    expect(classifyFailure(status, mode, errors)).toBe(expected);
  });
});
