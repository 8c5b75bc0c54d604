/**
 * Edge URL synthesis
 *
 * Edge URL format: https://{edgeDomain}/{originHost}/{originPath}[?query][#fragment]
 *
 * The origin host is always the first path segment, which is what the edge
 * worker parses to find the origin and what the client fallback splits on.
 */

import type { RewriteConfig } from './types';
import { UrlCache, getCacheKey } from './cache';
import { parseUrl, trimUrl } from './validation';

/**
 * Convert relative and protocol-relative URLs to absolute URLs
 *
 * Surrounding whitespace is dropped first. Root-relative paths take the
 * site's scheme and host; other relative paths are appended to the site
 * URL. A root-relative path comes back as is when the site URL itself
 * cannot be parsed.
 */
export function normalizeUrl(url: string, siteUrl: string): string {
  const candidate = trimUrl(url);

  if (/^https?:\/\//i.test(candidate)) {
    return candidate;
  }

  if (candidate.startsWith('//')) {
    return 'https:' + candidate;
  }

  if (candidate.startsWith('/')) {
    const site = parseUrl(siteUrl);
    if (!site) {
      return candidate;
    }
    return `${site.protocol}//${site.host}${candidate}`;
  }

  return siteUrl.replace(/\/+$/, '') + '/' + candidate.replace(/^\/+/, '');
}

/**
 * Build the edge URL for an origin URL
 *
 * Never fails: a URL that cannot be parsed, has no host or only the root
 * path, or a missing edge domain all yield the normalized input. The root
 * path is refused because an edge URL needs an origin path after the host. Every outcome is
 * memoized under the normalized URL's key.
 */
export function buildEdgeUrl(url: string, config: RewriteConfig, cache: UrlCache): string {
  const normalized = normalizeUrl(url, config.siteUrl);
  const cacheKey = getCacheKey(normalized);

  const cached = cache.get(cacheKey);
  if (cached !== undefined) {
    return cached;
  }

  const parsed = parseUrl(normalized);
  if (!parsed || !parsed.hostname || parsed.pathname === '' || parsed.pathname === '/') {
    return cache.set(cacheKey, normalized);
  }

  if (!config.edgeDomain) {
    return cache.set(cacheKey, normalized);
  }

  let edgeUrl = `https://${config.edgeDomain}/${parsed.hostname}${parsed.pathname}`;

  if (parsed.search) {
    edgeUrl += parsed.search;
  }

  if (parsed.hash) {
    edgeUrl += parsed.hash;
  }

  return cache.set(cacheKey, edgeUrl);
}
