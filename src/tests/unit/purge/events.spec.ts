import { describe, expect, it, vi } from 'vitest';
import { createEntityChangeListener } from '../../../purge/events.js';
import { PurgeDispatcher } from '../../../purge/dispatcher.js';
import { ModelRegistry } from '../../../purge/registry.js';
import { UrlResolver } from '../../../purge/resolver.js';
import { createDependencyRules } from '../../../purge/dependencies.js';
import { createFakeClient, createMockLogger } from '../../mocks.js';

function setup() {
  const client = createFakeClient();
  const registry = new ModelRegistry();
  const resolver = new UrlResolver(registry, createDependencyRules({ 'blog.Post': ['/blog/'] }), 'https://example.com');
  const dispatcher = new PurgeDispatcher({
    client,
    resolver,
    settings: { enabled: true, background: false, batchSize: 30, delaySeconds: 0, zoneHosts: [] },
  });
  const logger = createMockLogger();
  const listener = createEntityChangeListener(dispatcher, registry, logger);
  return { client, registry, dispatcher, logger, listener };
}

describe('createEntityChangeListener', () => {
  it('purges the URLs of a registered entity', async () => {
    const { client, registry, logger, listener } = setup();
    registry.register('blog.Post');

    listener.onChange('blog.Post', { getCanonicalUrl: () => '/blog/hello/' });

    await vi.waitFor(() => {
      expect(logger.info).toHaveBeenCalledWith('Triggered cache purge for entity change', {
        entityType: 'blog.Post',
        status: 'completed',
      });
    });
    expect(client.purgeUrls).toHaveBeenCalledWith(['https://example.com/blog/hello/', 'https://example.com/blog/']);
  });

  it('ignores entity types that are not registered', () => {
    const { dispatcher, logger, listener } = setup();
    const purgeEntity = vi.spyOn(dispatcher, 'purgeEntity');

    listener.onChange('auth.Session', { getCanonicalUrl: () => '/account/' });

    expect(purgeEntity).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith('Ignoring change to unregistered entity type', {
      entityType: 'auth.Session',
    });
  });

  it('logs purge failures without throwing into the caller', async () => {
    const { registry, logger, listener } = setup();
    registry.register('blog.Post', {
      resolveUrls: () => {
        throw new Error('slug missing');
      },
    });

    expect(() => listener.onChange('blog.Post', {})).not.toThrow();

    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledWith('Failed to purge cache for entity change', {
        entityType: 'blog.Post',
        error: 'URL resolver for "blog.Post" failed: slug missing',
      });
    });
  });
});
