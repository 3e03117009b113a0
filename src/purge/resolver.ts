/**
 * URL resolver: maps a changed entity to every URL that must be purged.
 *
 * Own URLs come from a registered resolver function, else from the
 * instance's `getCanonicalUrl()`. Dependency paths configured for the type are
 * appended. Relative paths are resolved against the site base URL; with no
 * base URL they are returned unchanged. The result is deduplicated.
 */

import type { Logger } from '../audit/logger.js';
import { silentLogger } from '../audit/logger.js';
import { ValidationError, describeError } from '../protocol/errors.js';
import { DependencyRules, expandDependencies } from './dependencies.js';
import { ModelRegistry } from './registry.js';

export interface CanonicalUrlSource {
  getCanonicalUrl(): string;
}

export function hasCanonicalUrl(instance: unknown): instance is CanonicalUrlSource {
  return (
    typeof instance === 'object' &&
    instance !== null &&
    'getCanonicalUrl' in instance &&
    typeof instance.getCanonicalUrl === 'function'
  );
}

export class UrlResolver {
  private readonly siteUrl: string;

  constructor(
    private readonly registry: ModelRegistry,
    private readonly rules: DependencyRules,
    siteUrl: string = '',
    private readonly logger: Logger = silentLogger,
  ) {
    this.siteUrl = siteUrl.replace(/\/+$/, '');
  }

  /**
   * Every URL to purge for `instance` of `entityType`.
   * Throws ValidationError when a registered resolver or dependency template fails.
   */
  resolve(entityType: string, instance: unknown): string[] {
    const registration = this.registry.get(entityType);
    const urls = new Set<string>();

    for (const url of this.ownUrls(entityType, instance)) {
      urls.add(this.toAbsolute(url));
    }

    if (registration?.includeDependencies ?? true) {
      let dependencies: string[];
      try {
        dependencies = expandDependencies(this.rules, entityType, instance);
      } catch (err) {
        throw new ValidationError(
          `Dependency template for "${entityType}" failed: ${describeError(err)}`,
          { entityType },
        );
      }
      for (const path of dependencies) {
        urls.add(this.toAbsolute(path));
      }
    }

    return Array.from(urls);
  }

  /**
   * Resolve a path against the site base URL. Absolute URLs pass through.
   */
  toAbsolute(pathOrUrl: string): string {
    if (/^[a-z][a-z\d+.-]*:/i.test(pathOrUrl)) return pathOrUrl;
    if (pathOrUrl.startsWith('//')) return `${this.siteProtocol()}${pathOrUrl}`;
    if (!this.siteUrl) return pathOrUrl;
    return `${this.siteUrl}${pathOrUrl.startsWith('/') ? '' : '/'}${pathOrUrl}`;
  }

  /** Scheme for protocol-relative URLs: the site's, else https. */
  private siteProtocol(): string {
    return URL.canParse(this.siteUrl) ? new URL(this.siteUrl).protocol : 'https:';
  }

  private ownUrls(entityType: string, instance: unknown): string[] {
    const registration = this.registry.get(entityType);

    if (registration?.resolveUrls) {
      let produced: string | readonly string[];
      try {
        produced = registration.resolveUrls(instance);
      } catch (err) {
        throw new ValidationError(
          `URL resolver for "${entityType}" failed: ${describeError(err)}`,
          { entityType },
        );
      }
      return (typeof produced === 'string' ? [produced] : [...produced]).filter(Boolean);
    }

    if (!hasCanonicalUrl(instance)) {
      return [];
    }

    try {
      const url = instance.getCanonicalUrl();
      return url ? [url] : [];
    } catch (err) {
      this.logger.warn('Could not get canonical URL', { entityType, error: describeError(err) });
      return [];
    }
  }
}
