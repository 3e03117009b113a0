import { describe, expect, it } from 'vitest';
import { UrlResolver, hasCanonicalUrl } from '../../../purge/resolver.js';
import { ModelRegistry } from '../../../purge/registry.js';
import { createDependencyRules } from '../../../purge/dependencies.js';
import { ValidationError } from '../../../protocol/errors.js';
import { createMockLogger } from '../../mocks.js';

interface Post {
  slug: string;
  category: string;
  getCanonicalUrl(): string;
}

const post = (slug: string, category = 'news'): Post => ({
  slug,
  category,
  getCanonicalUrl: () => `/blog/${slug}/`,
});

const blogRules = createDependencyRules({ 'blog.Post': ['/blog/', '/'] });

describe('UrlResolver', () => {
  it('combines the canonical URL with configured dependencies', () => {
    const resolver = new UrlResolver(new ModelRegistry(), blogRules);

    const urls = resolver.resolve('blog.Post', post('my-post'));

    expect(urls).toHaveLength(3);
    expect(new Set(urls)).toEqual(new Set(['/blog/my-post/', '/blog/', '/']));
  });

  it('resolves paths against the site base URL', () => {
    const resolver = new UrlResolver(new ModelRegistry(), blogRules, 'https://example.com/');

    const urls = resolver.resolve('blog.Post', post('my-post'));

    expect(new Set(urls)).toEqual(new Set([
      'https://example.com/blog/my-post/',
      'https://example.com/blog/',
      'https://example.com/',
    ]));
  });

  describe('toAbsolute', () => {
    it('gives protocol-relative URLs the site scheme', () => {
      const resolver = new UrlResolver(new ModelRegistry(), blogRules, 'http://example.com');

      expect(resolver.toAbsolute('//cdn.example.com/x')).toBe('http://cdn.example.com/x');
    });

    it('falls back to https for protocol-relative URLs without a site URL', () => {
      const resolver = new UrlResolver(new ModelRegistry(), blogRules);

      expect(resolver.toAbsolute('//cdn.example.com/x')).toBe('https://cdn.example.com/x');
    });

    it('leaves URLs with any scheme untouched', () => {
      const resolver = new UrlResolver(new ModelRegistry(), blogRules, 'https://example.com');

      expect(resolver.toAbsolute('ftp://files.example.com/a')).toBe('ftp://files.example.com/a');
      expect(resolver.toAbsolute('HTTPS://example.com/a')).toBe('HTTPS://example.com/a');
    });
  });

  it('returns an empty list for an entity without any URL source', () => {
    const resolver = new UrlResolver(new ModelRegistry(), blogRules);

    expect(resolver.resolve('shop.Order', { id: 7 })).toEqual([]);
    expect(resolver.resolve('shop.Order', null)).toEqual([]);
  });

  it('adds no dependencies for unknown entity types', () => {
    const resolver = new UrlResolver(new ModelRegistry(), blogRules);

    expect(resolver.resolve('blog.Comment', post('hello'))).toEqual(['/blog/hello/']);
  });

  it('counts a URL reached from several sources once', () => {
    const rules = createDependencyRules({ 'blog.Category': ['/blog/', '/'] });
    const resolver = new UrlResolver(new ModelRegistry(), rules);
    const category = { getCanonicalUrl: () => '/blog/' };

    expect(resolver.resolve('blog.Category', category)).toEqual(['/blog/', '/']);
  });

  it('prefers a registered resolver over the canonical URL', () => {
    const registry = new ModelRegistry();
    registry.register<Post>('blog.Post', {
      resolveUrls: (p) => [`/blog/${p.slug}/`, `/blog/${p.slug}/amp/`, 'https://cdn.example.net/feed.xml', 'sitemap.xml'],
    });
    const resolver = new UrlResolver(registry, blogRules, 'https://example.com');

    const urls = resolver.resolve('blog.Post', post('launch'));

    expect(urls).toEqual([
      'https://example.com/blog/launch/',
      'https://example.com/blog/launch/amp/',
      'https://cdn.example.net/feed.xml',
      'https://example.com/sitemap.xml',
      'https://example.com/blog/',
      'https://example.com/',
    ]);
  });

  it('accepts a single string from a registered resolver', () => {
    const registry = new ModelRegistry();
    registry.register<Post>('blog.Post', { resolveUrls: (p) => `/p/${p.slug}` });
    const resolver = new UrlResolver(registry, createDependencyRules({}));

    expect(resolver.resolve('blog.Post', post('x'))).toEqual(['/p/x']);
  });

  it('skips dependencies when the registration opts out', () => {
    const registry = new ModelRegistry();
    registry.register('blog.Post', { includeDependencies: false });
    const resolver = new UrlResolver(registry, blogRules);

    expect(resolver.resolve('blog.Post', post('quiet'))).toEqual(['/blog/quiet/']);
  });

  it('expands computed dependency templates from the instance', () => {
    const rules = createDependencyRules(
      { 'blog.Post': ['/blog/'] },
      { 'blog.Post': [{ paths: (instance) => (isPost(instance) ? `/blog/category/${instance.category}/` : []) }] },
    );
    const resolver = new UrlResolver(new ModelRegistry(), rules);

    expect(resolver.resolve('blog.Post', post('a', 'releases'))).toEqual([
      '/blog/a/',
      '/blog/',
      '/blog/category/releases/',
    ]);
  });

  it('raises a ValidationError when a registered resolver throws', () => {
    const registry = new ModelRegistry();
    registry.register('blog.Post', {
      resolveUrls: () => {
        throw new Error('slug missing');
      },
    });
    const resolver = new UrlResolver(registry, blogRules);

    expect(() => resolver.resolve('blog.Post', post('x'))).toThrow(ValidationError);
    expect(() => resolver.resolve('blog.Post', post('x'))).toThrow('URL resolver for "blog.Post" failed: slug missing');
  });

  it('treats a failing canonical URL accessor as no URL and logs it', () => {
    const logger = createMockLogger();
    const resolver = new UrlResolver(new ModelRegistry(), blogRules, '', logger);
    const broken = {
      getCanonicalUrl: (): string => {
        throw new Error('no route');
      },
    };

    expect(resolver.resolve('blog.Post', broken)).toEqual(['/blog/', '/']);
    expect(logger.warn).toHaveBeenCalledWith('Could not get canonical URL', {
      entityType: 'blog.Post',
      error: 'no route',
    });
  });
});

describe('hasCanonicalUrl', () => {
  it('recognises objects exposing getCanonicalUrl()', () => {
    expect(hasCanonicalUrl(post('a'))).toBe(true);
    expect(hasCanonicalUrl({ getCanonicalUrl: '/a/' })).toBe(false);
    expect(hasCanonicalUrl('/a/')).toBe(false);
  });
});

function isPost(value: unknown): value is Post {
  return typeof value === 'object' && value !== null && 'category' in value && typeof value.category === 'string';
}
