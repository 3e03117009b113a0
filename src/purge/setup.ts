/**
 * Wires configuration into a ready-to-use purge pipeline.
 */

import type { Logger } from '../audit/logger.js';
import { createLogger } from '../audit/logger.js';
import { CloudflareClient, PurgeClient } from '../client/cloudflareClient.js';
import { PurgeConfig, effectiveZoneHosts } from '../config/index.js';
import { createDependencyRules, UrlTemplate } from './dependencies.js';
import { PurgeDispatcher } from './dispatcher.js';
import { createEntityChangeListener, EntityChangeListener } from './events.js';
import { ModelRegistry } from './registry.js';
import { UrlResolver } from './resolver.js';
import { BackgroundScheduler } from './scheduler.js';

export interface PurgePipeline {
  config: PurgeConfig;
  registry: ModelRegistry;
  resolver: UrlResolver;
  client: PurgeClient;
  dispatcher: PurgeDispatcher;
  listener: EntityChangeListener;
  logger: Logger;
}

export interface PipelineOptions {
  /** Entity types to register before the registry is sealed. */
  register?: (registry: ModelRegistry) => void;
  /** Computed dependency templates, appended to the configured static paths. */
  dependencyTemplates?: Record<string, readonly UrlTemplate[]>;
  /** Replace the Cloudflare client (tests, alternative transports). */
  client?: PurgeClient;
  logger?: Logger;
}

export function createPurgePipeline(config: PurgeConfig, options: PipelineOptions = {}): PurgePipeline {
  const logger = options.logger ?? createLogger('edge-purge', { debug: config.debug });

  const registry = new ModelRegistry(logger);
  options.register?.(registry);
  registry.seal();

  const rules = createDependencyRules(config.urlDependencies, options.dependencyTemplates);
  const resolver = new UrlResolver(registry, rules, config.siteUrl, logger);

  const client = options.client ?? new CloudflareClient({
    apiToken: config.apiToken,
    zoneId: config.zoneId,
    apiBaseUrl: config.apiBaseUrl,
    batchSize: config.batchSize,
    requestTimeoutMs: config.requestTimeoutMs,
    retry: config.retry,
    logger,
  });

  const dispatcher = new PurgeDispatcher({
    client,
    resolver,
    settings: {
      enabled: config.enabled,
      background: config.background,
      batchSize: config.batchSize,
      delaySeconds: config.delaySeconds,
      zoneHosts: effectiveZoneHosts(config),
    },
    scheduler: new BackgroundScheduler(logger),
    logger,
  });

  const listener = createEntityChangeListener(dispatcher, registry, logger);

  return { config, registry, resolver, client, dispatcher, listener, logger };
}
