/**
 * Origin recovery from edge URLs
 *
 * Inverse of buildEdgeUrl(): the first path segment of an edge URL is the
 * origin host, the rest is the origin path.
 */

import { isEdgeUrl, parseAbsoluteUrl } from './validation';

/**
 * Split an edge URL into origin host and origin path
 *
 * Returns null when the path does not hold both a host segment and a
 * non-empty remainder.
 */
export function splitEdgePath(pathname: string): { host: string; path: string } | null {
  const trimmed = pathname.replace(/^\/+/, '').replace(/\/+$/, '');
  const separator = trimmed.indexOf('/');

  if (separator === -1) {
    return null;
  }

  const host = trimmed.substring(0, separator);
  const path = trimmed.substring(separator + 1);

  if (!host || !path) {
    return null;
  }

  return { host, path };
}

/**
 * Get the origin URL behind any URL
 *
 * Origin URLs come back unchanged, and so do malformed edge URLs: falling
 * back to the input keeps the media loading from wherever it pointed.
 */
export function getTrueOrigin(url: string, edgeDomain: string): string {
  if (!url || !isEdgeUrl(url, edgeDomain)) {
    return url;
  }

  const parsed = parseAbsoluteUrl(url);
  if (!parsed) {
    return url;
  }

  const parts = splitEdgePath(parsed.pathname);
  if (!parts) {
    return url;
  }

  let originUrl = `https://${parts.host}/${parts.path}`;

  if (parsed.search) {
    originUrl += parsed.search;
  }

  if (parsed.hash) {
    originUrl += parsed.hash;
  }

  return originUrl;
}
