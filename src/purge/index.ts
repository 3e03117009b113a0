export { createPurgePipeline } from './setup.js';
export type { PurgePipeline, PipelineOptions } from './setup.js';
export { PurgeDispatcher } from './dispatcher.js';
export type { DispatchOptions, DispatcherSettings } from './dispatcher.js';
export { UrlResolver, hasCanonicalUrl } from './resolver.js';
export type { CanonicalUrlSource } from './resolver.js';
export { ModelRegistry } from './registry.js';
export type { RegisteredModel, RegisterOptions } from './registry.js';
export { createDependencyRules, expandDependencies } from './dependencies.js';
export type { DependencyRules, UrlTemplate } from './dependencies.js';
export { splitIntoBatches } from './batcher.js';
export { BackgroundScheduler } from './scheduler.js';
export { createEntityChangeListener } from './events.js';
export type { EntityChangeListener } from './events.js';
export { CloudflareClient, CloudflareApiException, classifyFailure } from '../client/cloudflareClient.js';
export type { PurgeClient, CloudflareClientOptions } from '../client/cloudflareClient.js';
export { loadConfig, MAX_PURGE_BATCH_SIZE } from '../config/index.js';
export type { PurgeConfig } from '../config/index.js';
export { ConfigurationError, ValidationError, PurgeError, ErrorKinds } from '../protocol/errors.js';
export type { PurgeErrorKind } from '../protocol/errors.js';
export { PurgeMode } from '../protocol/types.js';
export type { PurgeOutcome, PurgeResult, PurgeTarget, PurgeJob, TokenVerification } from '../protocol/types.js';
