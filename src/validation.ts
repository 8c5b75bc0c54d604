/**
 * URL parsing and eligibility checks
 *
 * A candidate URL is eligible for the edge when all of these hold:
 *   - it is not already an edge URL of the configured edge domain
 *   - its host is one the edge accepts (no IPs, no internal hostnames)
 *   - with an allow-list configured, its host is a listed domain or a
 *     subdomain of one
 *   - its file extension is a supported media type
 *
 * Every check that cannot parse its input answers "not eligible".
 */

import type { RewriteConfig } from './types';

const ABSOLUTE_URL = /^(?:https?:)?\/\//i;

/**
 * Parse a URL, returning null instead of throwing
 */
export function parseUrl(url: string, base?: string): URL | null {
  try {
    return new URL(url, base);
  } catch {
    return null;
  }
}

/**
 * Strip the leading and trailing spaces and control characters that the URL
 * parser ignores, so string checks see what the browser will load
 */
export function trimUrl(url: string): string {
  return url.replace(/^[\u0000-\u0020]+|[\u0000-\u0020]+$/g, '');
}

/**
 * Parse an absolute or protocol-relative URL; anything else is null
 */
export function parseAbsoluteUrl(url: string): URL | null {
  const candidate = trimUrl(url);
  if (!ABSOLUTE_URL.test(candidate)) {
    return null;
  }
  return parseUrl(candidate, 'https://edge.invalid');
}

/**
 * Validate domain format
 *
 * Rejects IP addresses and internal hostnames; the edge refuses to fetch
 * from them, so rewriting them would only produce broken media.
 */
export function isValidDomain(domain: string): boolean {
  if (!domain || !domain.trim()) {
    return false;
  }

  const lowerDomain = domain.toLowerCase();

  const blockedHostnames = [
    'localhost',
    'localhost.localdomain',
    'broadcasthost',
  ];
  if (blockedHostnames.includes(lowerDomain)) {
    return false;
  }

  // IPv4
  if (/^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/.test(domain)) {
    return false;
  }

  // IPv6, bracketed or not
  if (domain.includes(':') || /^\[.*\]$/.test(domain)) {
    return false;
  }

  const internalPatterns = [
    /\.local$/i,
    /\.localhost$/i,
    /\.internal$/i,
    /\.lan$/i,
    /\.home$/i,
    /\.corp$/i,
    /\.private$/i,
  ];
  if (internalPatterns.some(pattern => pattern.test(lowerDomain))) {
    return false;
  }

  // At least one dot, alphanumeric labels with inner hyphens, alphabetic TLD
  const domainRegex = /^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}$/i;
  return domainRegex.test(domain);
}

/**
 * Check if a host is an allow-listed domain or one of its subdomains
 *
 * "example.com" matches "example.com" and "img.example.com", but not
 * "notexample.com".
 */
export function matchesDomain(host: string, domain: string): boolean {
  const lowerHost = host.toLowerCase();
  const lowerDomain = domain.toLowerCase().trim();

  if (!lowerDomain) {
    return false;
  }

  return lowerHost === lowerDomain || lowerHost.endsWith('.' + lowerDomain);
}

/**
 * Check if a host matches any allow-listed domain
 */
export function isDomainAllowed(host: string, allowedDomains: readonly string[]): boolean {
  if (!host || allowedDomains.length === 0) {
    return false;
  }
  return allowedDomains.some(domain => matchesDomain(host, domain));
}

/**
 * Check if a URL already points at the configured edge domain
 */
export function isEdgeUrl(url: string, edgeDomain: string): boolean {
  if (!url || !edgeDomain) {
    return false;
  }

  const parsed = parseAbsoluteUrl(url);
  return parsed !== null && parsed.hostname === edgeDomain.toLowerCase();
}

/**
 * Lower-cased extension of the last path segment, or '' when it has none
 */
export function getPathExtension(pathname: string): string {
  const segment = pathname.substring(pathname.lastIndexOf('/') + 1);
  const dot = segment.lastIndexOf('.');
  if (dot === -1) {
    return '';
  }
  return segment.substring(dot + 1).toLowerCase();
}

/**
 * Check if a parsed URL points at a supported media file
 */
export function isMediaUrl(url: URL, extensions: readonly string[]): boolean {
  const ext = getPathExtension(url.pathname);
  return ext !== '' && extensions.includes(ext);
}

/**
 * Decide whether a candidate URL may be rewritten to the edge
 *
 * Relative URLs are resolved against the site URL before their host and
 * extension are inspected.
 */
export function shouldRewrite(url: string, config: RewriteConfig): boolean {
  if (typeof url !== 'string') {
    return false;
  }

  const candidate = trimUrl(url);
  if (candidate === '') {
    return false;
  }

  if (isEdgeUrl(candidate, config.edgeDomain)) {
    return false;
  }

  const parsed = parseUrl(candidate, config.siteUrl);
  if (!parsed || (parsed.protocol !== 'http:' && parsed.protocol !== 'https:')) {
    return false;
  }

  if (!isValidDomain(parsed.hostname)) {
    return false;
  }

  if (config.allowedOriginDomains.length > 0 && !isDomainAllowed(parsed.hostname, config.allowedOriginDomains)) {
    return false;
  }

  return isMediaUrl(parsed, config.mediaExtensions);
}
