/**
 * Binding of the integration points to a host's render filters
 *
 * The host passes values through named filters while it renders; each
 * filter here forwards to one integration point. Filter values arrive
 * untyped, so anything that is not the expected shape is returned as is.
 *
 * Fragment filters run late (priority 999) so they see the markup after
 * other plugins, lazy loaders included, have changed it; the attribute
 * filter runs late for the same reason.
 */

import type { EdgeRewriter } from './rewriter';
import type { ElementAttributes, ImageDescriptor, SourceSetEntry } from './types';

export type FilterCallback = (value: unknown) => unknown;

export interface FilterRegistry {
  addFilter(name: string, callback: FilterCallback, priority: number): void;
}

export const DEFAULT_PRIORITY = 10;
export const LATE_PRIORITY = 999;

/** Filters that carry whole HTML fragments */
export const FRAGMENT_FILTERS = [
  'the_content',
  'post_thumbnail_html',
  'widget_text',
  'video_shortcode',
  'audio_shortcode',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isImageDescriptor(value: unknown): value is ImageDescriptor {
  return isRecord(value) && typeof value.url === 'string';
}

function isSourceSet(value: unknown): value is SourceSetEntry[] {
  return Array.isArray(value) && value.every(isImageDescriptor);
}

function isElementAttributes(value: unknown): value is ElementAttributes {
  return isRecord(value) && Object.values(value).every(item => typeof item === 'string');
}

/**
 * Register the rewriter's integration points with the host
 *
 * Nothing is registered when rewriting is inactive. Returns the names of
 * the filters that were registered.
 */
export function registerRewriteHooks(registry: FilterRegistry, rewriter: EdgeRewriter): string[] {
  if (!rewriter.isActive()) {
    return [];
  }

  const registered: string[] = [];
  const add = (name: string, callback: FilterCallback, priority: number) => {
    registry.addFilter(name, callback, priority);
    registered.push(name);
  };

  add('attachment_url', (value) => (
    typeof value === 'string' ? rewriter.rewriteUrl(value) : value
  ), DEFAULT_PRIORITY);

  add('attachment_image_src', (value) => (
    isImageDescriptor(value) ? rewriter.rewriteImageDescriptor(value) : value
  ), DEFAULT_PRIORITY);

  add('image_srcset', (value) => (
    isSourceSet(value) ? rewriter.rewriteSourceSet(value) : value
  ), DEFAULT_PRIORITY);

  add('attachment_image_attributes', (value) => (
    isElementAttributes(value) ? rewriter.rewriteAttributes(value) : value
  ), LATE_PRIORITY);

  for (const name of FRAGMENT_FILTERS) {
    add(name, (value) => (
      typeof value === 'string' ? rewriter.rewriteFragment(value) : value
    ), LATE_PRIORITY);
  }

  return registered;
}

/**
 * Minimal in-process filter chain for hosts without one
 *
 * Callbacks run in ascending priority, then registration order.
 */
export class FilterChain implements FilterRegistry {
  private readonly filters = new Map<string, Array<{ callback: FilterCallback; priority: number; order: number }>>();
  private order = 0;

  addFilter(name: string, callback: FilterCallback, priority: number = DEFAULT_PRIORITY): void {
    const list = this.filters.get(name) ?? [];
    list.push({ callback, priority, order: this.order++ });
    list.sort((a, b) => a.priority - b.priority || a.order - b.order);
    this.filters.set(name, list);
  }

  applyFilters(name: string, value: unknown): unknown {
    let result = value;
    for (const { callback } of this.filters.get(name) ?? []) {
      result = callback(result);
    }
    return result;
  }

  has(name: string): boolean {
    return (this.filters.get(name)?.length ?? 0) > 0;
  }
}
