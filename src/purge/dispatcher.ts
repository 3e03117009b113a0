/**
 * Purge dispatcher: the single entry point for entity changes, the CLI and
 * the MCP tools.
 *
 * Resolution, batching and validation always run before the first await, so
 * a rejected request never reaches the scheduler. Delivery then either runs
 * inline (the caller gets every batch outcome) or is handed to the background
 * scheduler (the caller only gets the job id; failures are logged). Background
 * URL purges coalesce into the job that is still waiting.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../audit/logger.js';
import { silentLogger } from '../audit/logger.js';
import { PurgeClient } from '../client/cloudflareClient.js';
import { ConfigurationError, ErrorKinds, ValidationError, describeError } from '../protocol/errors.js';
import { PurgeJob, PurgeMode, PurgeOutcome, PurgeResult, PurgeTarget } from '../protocol/types.js';
import { splitIntoBatches } from './batcher.js';
import { UrlResolver } from './resolver.js';
import { BackgroundScheduler } from './scheduler.js';

export interface DispatcherSettings {
  enabled: boolean;
  background: boolean;
  batchSize: number;
  delaySeconds: number;
  /** Hosts URL purges may target; empty disables the check. */
  zoneHosts: string[];
}

export interface DispatchOptions {
  /** Override the configured execution mode for this call. */
  background?: boolean;
  /** Resolve and batch, but do not call the CDN. */
  dryRun?: boolean;
}

export interface DispatcherDeps {
  client: PurgeClient;
  resolver: UrlResolver;
  settings: DispatcherSettings;
  scheduler?: BackgroundScheduler;
  logger?: Logger;
  now?: () => Date;
}

interface PendingUrlJob {
  job: PurgeJob;
  urls: Set<string>;
}

export class PurgeDispatcher {
  private readonly client: PurgeClient;
  private readonly resolver: UrlResolver;
  private readonly settings: DispatcherSettings;
  private readonly scheduler: BackgroundScheduler;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private pendingUrlJob: PendingUrlJob | undefined;

  constructor(deps: DispatcherDeps) {
    this.client = deps.client;
    this.resolver = deps.resolver;
    this.settings = deps.settings;
    this.logger = deps.logger ?? silentLogger;
    this.scheduler = deps.scheduler ?? new BackgroundScheduler(this.logger);
    this.now = deps.now ?? (() => new Date());
  }

  get isEnabled(): boolean {
    return this.settings.enabled;
  }

  /**
   * Purge explicit URLs. Relative paths are resolved against the site URL.
   */
  purgeUrls(urls: readonly string[], options: DispatchOptions = {}): Promise<PurgeResult> {
    if (!this.settings.enabled) return this.skipped('disabled', PurgeMode.ByUrl);
    const absolute = uniqueNonEmpty(urls).map((u) => this.resolver.toAbsolute(u));
    return this.dispatch({ mode: PurgeMode.ByUrl, urls: absolute }, options);
  }

  /**
   * Purge every URL a changed entity maps to. Nothing to purge is a no-op.
   */
  purgeEntity(entityType: string, instance: unknown, options: DispatchOptions = {}): Promise<PurgeResult> {
    if (!this.settings.enabled) return this.skipped('disabled', PurgeMode.ByUrl);
    let urls: string[];
    try {
      urls = this.resolver.resolve(entityType, instance);
    } catch (err) {
      return Promise.reject(err);
    }
    if (urls.length === 0) {
      this.logger.debug('No URLs to purge for entity', { entityType });
    }
    return this.dispatch({ mode: PurgeMode.ByUrl, urls }, options);
  }

  /**
   * Purge the whole zone. Never triggered by entity changes.
   */
  purgeEverything(options: DispatchOptions = {}): Promise<PurgeResult> {
    if (!this.settings.enabled) return this.skipped('disabled', PurgeMode.Everything);
    return this.dispatch({ mode: PurgeMode.Everything }, options);
  }

  purgeTags(tags: readonly string[], options: DispatchOptions = {}): Promise<PurgeResult> {
    if (!this.settings.enabled) return this.skipped('disabled', PurgeMode.ByTag);
    return this.dispatch({ mode: PurgeMode.ByTag, tags: uniqueNonEmpty(tags) }, options);
  }

  purgePrefixes(prefixes: readonly string[], options: DispatchOptions = {}): Promise<PurgeResult> {
    if (!this.settings.enabled) return this.skipped('disabled', PurgeMode.ByPrefix);
    return this.dispatch({ mode: PurgeMode.ByPrefix, prefixes: uniqueNonEmpty(prefixes) }, options);
  }

  /**
   * Wait for every background job scheduled so far.
   */
  drain(): Promise<void> {
    return this.scheduler.drain();
  }

  /**
   * Cancel background jobs that have not started. Returns the number cancelled.
   */
  shutdown(): number {
    this.pendingUrlJob = undefined;
    return this.scheduler.shutdown();
  }

  // ── Private ─────────────────────────────────────────────────────────────

  private dispatch(target: PurgeTarget, options: DispatchOptions): Promise<PurgeResult> {
    let batches: string[][];
    try {
      batches = this.prepare(target, !options.dryRun);
    } catch (err) {
      return Promise.reject(err);
    }

    if (batches.length === 0) {
      return this.skipped('empty', target.mode);
    }

    if (options.dryRun) {
      this.logger.info('Dry run: purge not sent', { mode: target.mode, batches: batches.length });
      const preview: PurgeResult = { status: 'dry_run', success: true, target, batches };
      return Promise.resolve(preview);
    }

    const background = options.background ?? this.settings.background;
    if (!background) {
      return this.deliver(target, batches);
    }

    if (target.mode === PurgeMode.ByUrl) {
      return Promise.resolve(this.scheduleUrls(target.urls));
    }

    const job = this.createJob(target);
    this.scheduler.schedule(job, (scheduled) => this.runJob(scheduled.id, scheduled.target, batches));
    return Promise.resolve(this.scheduledResult(job, batches.length));
  }

  /**
   * URL purges arriving while a URL job is still waiting are merged into it,
   * so a burst of changes goes out as one deduplicated purge at the first
   * job's run time.
   */
  private scheduleUrls(urls: string[]): PurgeResult {
    const pending = this.pendingUrlJob;
    if (pending) {
      for (const url of urls) pending.urls.add(url);
      this.logger.debug('Merged URLs into pending purge job', { jobId: pending.job.id, urls: pending.urls.size });
      return this.scheduledResult(pending.job, Math.ceil(pending.urls.size / this.settings.batchSize));
    }

    const entry: PendingUrlJob = { job: this.createJob({ mode: PurgeMode.ByUrl, urls }), urls: new Set(urls) };
    this.pendingUrlJob = entry;
    this.scheduler.schedule(entry.job, (scheduled) => {
      if (this.pendingUrlJob === entry) this.pendingUrlJob = undefined;
      const merged = Array.from(entry.urls);
      return this.runJob(
        scheduled.id,
        { mode: PurgeMode.ByUrl, urls: merged },
        splitIntoBatches(merged, this.settings.batchSize),
      );
    });
    return this.scheduledResult(entry.job, Math.ceil(entry.urls.size / this.settings.batchSize));
  }

  private createJob(target: PurgeTarget): PurgeJob {
    const createdAt = this.now();
    return {
      id: uuidv4(),
      target,
      createdAt,
      delaySeconds: this.settings.delaySeconds,
      runAt: new Date(createdAt.getTime() + this.settings.delaySeconds * 1000),
    };
  }

  private async runJob(jobId: string, target: PurgeTarget, batches: string[][]): Promise<void> {
    const result = await this.deliver(target, batches);
    if (result.status === 'completed' && !result.success) {
      this.logger.error('Background purge finished with failures', {
        jobId,
        failed: result.outcomes.filter((o) => !o.success).length,
        batches: result.outcomes.length,
      });
    } else {
      this.logger.info('Background purge completed', { jobId, batches: batches.length });
    }
  }

  private scheduledResult(job: PurgeJob, batchCount: number): PurgeResult {
    return { status: 'scheduled', success: true, jobId: job.id, runAt: job.runAt, batchCount };
  }

  /**
   * Validate the target and split it into request payloads.
   * URL targets yield URL batches; everything/tag/prefix targets yield one batch.
   * Dry runs skip the credential check since nothing is sent.
   */
  private prepare(target: PurgeTarget, checkCredentials: boolean): string[][] {
    switch (target.mode) {
      case PurgeMode.ByUrl: {
        if (target.urls.length === 0) return [];
        if (checkCredentials) this.requireCredentials();
        this.enforceZone(target.urls);
        return splitIntoBatches(target.urls, this.settings.batchSize);
      }
      case PurgeMode.Everything:
        if (checkCredentials) this.requireCredentials();
        return [[]];
      case PurgeMode.ByTag:
        if (target.tags.length === 0) return [];
        if (checkCredentials) this.requireCredentials();
        return [target.tags];
      case PurgeMode.ByPrefix:
        if (target.prefixes.length === 0) return [];
        if (checkCredentials) this.requireCredentials();
        return [target.prefixes];
    }
  }

  private async deliver(target: PurgeTarget, batches: string[][]): Promise<PurgeResult> {
    const outcomes = await Promise.all(batches.map((batch) => this.sendBatch(target, batch)));
    const failed = outcomes.filter((o) => !o.success);
    for (const outcome of failed) {
      this.logger.error('Purge batch failed', {
        mode: outcome.mode,
        status: outcome.status,
        errorKind: outcome.errorKind,
        error: outcome.error,
        urls: outcome.batchUrls.length,
      });
    }
    if (failed.length === 0) {
      this.logger.info('Purge completed', { mode: target.mode, batches: outcomes.length });
    }
    return { status: 'completed', success: failed.length === 0, outcomes };
  }

  private async sendBatch(target: PurgeTarget, batch: string[]): Promise<PurgeOutcome> {
    try {
      switch (target.mode) {
        case PurgeMode.ByUrl:
          return await this.client.purgeUrls(batch);
        case PurgeMode.Everything:
          return await this.client.purgeEverything();
        case PurgeMode.ByTag:
          return await this.client.purgeTags(batch);
        case PurgeMode.ByPrefix:
          return await this.client.purgePrefixes(batch);
      }
    } catch (err) {
      // A throwing batch is reported like any other failure so its siblings still complete.
      return {
        success: false,
        mode: target.mode,
        status: null,
        errorKind: err instanceof ConfigurationError || err instanceof ValidationError
          ? err.kind
          : ErrorKinds.DELIVERY_FAILED,
        error: describeError(err),
        batchUrls: target.mode === PurgeMode.ByUrl ? batch : [],
      };
    }
  }

  private requireCredentials(): void {
    if (!this.client.hasCredentials()) {
      throw new ConfigurationError(
        'Cloudflare credentials are missing. Set CLOUDFLARE_API_TOKEN and CLOUDFLARE_ZONE_ID, or disable purging.',
      );
    }
  }

  private enforceZone(urls: string[]): void {
    const hosts = this.settings.zoneHosts;
    if (hosts.length === 0) return;

    const outside = urls.filter((url) => {
      if (!URL.canParse(url)) return false;
      const host = new URL(url).hostname.toLowerCase();
      return !hosts.some((zoneHost) => host === zoneHost || host.endsWith(`.${zoneHost}`));
    });
    if (outside.length > 0) {
      throw new ValidationError(
        `${outside.length} URL(s) are outside the configured zone (${hosts.join(', ')}): ${outside.join(', ')}`,
        { outside, zoneHosts: hosts },
      );
    }
  }

  private skipped(reason: 'disabled' | 'empty', mode: PurgeMode): Promise<PurgeResult> {
    this.logger.debug(`Purge skipped (${reason})`, { mode });
    const result: PurgeResult = { status: 'skipped', success: true, reason };
    return Promise.resolve(result);
  }
}

function uniqueNonEmpty(values: readonly string[]): string[] {
  return Array.from(new Set(values.map((v) => v.trim()).filter(Boolean)));
}
