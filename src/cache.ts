/**
 * Per-request memo of synthesized edge URLs
 *
 * Keys are derived from the normalized URL so that "//host/a.jpg" and
 * "https://host/a.jpg" share one entry. A cache lives inside one rewriter
 * and is dropped with it; nothing is persisted or shared across requests,
 * so a settings change takes effect on the next request.
 */

import { createHash } from 'node:crypto';

/**
 * Cache key for a normalized URL
 */
export function getCacheKey(normalizedUrl: string): string {
  return 'edge_' + createHash('md5').update(normalizedUrl).digest('hex');
}

export class UrlCache {
  private entries = new Map<string, string>();
  private hits = 0;
  private misses = 0;

  get(key: string): string | undefined {
    const cached = this.entries.get(key);
    if (cached === undefined) {
      this.misses += 1;
    } else {
      this.hits += 1;
    }
    return cached;
  }

  set(key: string, value: string): string {
    this.entries.set(key, value);
    return value;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): { entries: number; hits: number; misses: number } {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
