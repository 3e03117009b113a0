/**
 * Registry of entity types whose changes trigger purges.
 * Populated while the application is wired together, then sealed.
 */

import type { Logger } from '../audit/logger.js';
import { silentLogger } from '../audit/logger.js';
import { ConfigurationError } from '../protocol/errors.js';

export interface RegisteredModel {
  entityType: string;
  /** Returns the path(s) or absolute URL(s) cached for an instance. */
  resolveUrls?(instance: unknown): string | readonly string[];
  includeDependencies: boolean;
}

export interface RegisterOptions<T> {
  resolveUrls?(instance: T): string | readonly string[];
  /** Append the configured dependency URLs (default true). */
  includeDependencies?: boolean;
}

export class ModelRegistry {
  private models = new Map<string, RegisteredModel>();
  private sealed = false;

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Register an entity type. Registering the same type again replaces it.
   */
  register<T>(entityType: string, options: RegisterOptions<T> = {}): RegisteredModel {
    this.assertWritable(entityType);
    const model: RegisteredModel = {
      entityType,
      resolveUrls: options.resolveUrls,
      includeDependencies: options.includeDependencies ?? true,
    };
    this.models.set(entityType, model);
    this.logger.debug('Registered entity type for purging', { entityType });
    return model;
  }

  unregister(entityType: string): boolean {
    this.assertWritable(entityType);
    const removed = this.models.delete(entityType);
    if (removed) {
      this.logger.debug('Unregistered entity type from purging', { entityType });
    }
    return removed;
  }

  get(entityType: string): RegisteredModel | undefined {
    return this.models.get(entityType);
  }

  isRegistered(entityType: string): boolean {
    return this.models.has(entityType);
  }

  list(): RegisteredModel[] {
    return Array.from(this.models.values());
  }

  /**
   * Freeze the registry once wiring is done; later writes are configuration errors.
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private assertWritable(entityType: string): void {
    if (this.sealed) {
      throw new ConfigurationError(
        `Cannot change registration of "${entityType}": the model registry is sealed.`,
      );
    }
  }
}
