import { describe, it, expect } from 'vitest';
import { getTrueOrigin, splitEdgePath } from '../src/origin';
import { buildEdgeUrl, normalizeUrl } from '../src/edge-url';
import { UrlCache } from '../src/cache';
import { testConfig } from './helpers';

describe('splitEdgePath', () => {
  it('separates host and path', () => {
    expect(splitEdgePath('/example.com/wp-content/a.jpg')).toEqual({ host: 'example.com', path: 'wp-content/a.jpg' });
  });

  it('needs both a host and a path', () => {
    expect(splitEdgePath('/example.com')).toBeNull();
    expect(splitEdgePath('/example.com/')).toBeNull();
    expect(splitEdgePath('/')).toBeNull();
  });
});

describe('getTrueOrigin', () => {
  it('recovers the origin URL', () => {
    expect(getTrueOrigin('https://cdn.test/example.com/wp-content/photo.jpg', 'cdn.test'))
      .toBe('https://example.com/wp-content/photo.jpg');
  });

  it('keeps query and fragment', () => {
    expect(getTrueOrigin('https://cdn.test/example.com/a.jpg?w=1&h=2#x', 'cdn.test'))
      .toBe('https://example.com/a.jpg?w=1&h=2#x');
  });

  it('recognizes whitespace-padded edge URLs', () => {
    expect(getTrueOrigin(' https://cdn.test/example.com/a.jpg\n', 'cdn.test')).toBe('https://example.com/a.jpg');
  });

  it('returns non-edge URLs unchanged', () => {
    expect(getTrueOrigin('https://example.com/a.jpg', 'cdn.test')).toBe('https://example.com/a.jpg');
    expect(getTrueOrigin('/cdn.test/example.com/a.jpg', 'cdn.test')).toBe('/cdn.test/example.com/a.jpg');
    expect(getTrueOrigin('', 'cdn.test')).toBe('');
  });

  it('returns malformed edge URLs unchanged', () => {
    expect(getTrueOrigin('https://cdn.test/example.com', 'cdn.test')).toBe('https://cdn.test/example.com');
    expect(getTrueOrigin('https://cdn.test/', 'cdn.test')).toBe('https://cdn.test/');
  });
});

describe('round trip', () => {
  const config = testConfig();
  const urls = [
    'https://example.com/wp-content/uploads/2024/01/photo.jpg',
    'https://img.example.com/a/b.webp?v=3#frag',
    '//example.com/clip.mp4',
    '/wp-content/uploads/poster.png',
  ];

  it.each(urls)('recovers the normalized origin of %s', (url) => {
    const edge = buildEdgeUrl(url, config, new UrlCache());
    expect(getTrueOrigin(edge, config.edgeDomain)).toBe(normalizeUrl(url, config.siteUrl));
  });

  it.each(urls)('does not wrap an edge URL a second time for %s', (url) => {
    const cache = new UrlCache();
    const edge = buildEdgeUrl(url, config, cache);
    expect(buildEdgeUrl(getTrueOrigin(edge, config.edgeDomain), config, cache)).toBe(edge);
  });
});
