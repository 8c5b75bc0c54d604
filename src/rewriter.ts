/**
 * Per-request rewriting engine
 *
 * One EdgeRewriter serves one page render. It owns the request's context
 * verdict, URL memo and re-entrancy flag, so concurrent requests must each
 * construct their own instance.
 *
 * Every integration point:
 *   1. returns its input when rewriting is inactive or the context is unsafe
 *   2. checks eligibility
 *   3. synthesizes edge URLs (directly, or through the markup processor)
 *
 * Inputs are never mutated; changed values come back as copies.
 */

import type {
  ContextOverrides,
  ContextSignals,
  ElementAttributes,
  ImageDescriptor,
  LogEntry,
  RewriteConfig,
  SourceSetEntry,
  SubrequestClassifier,
} from './types';
import { isRewriteActive } from './config';
import { ContextGuard } from './context';
import { UrlCache } from './cache';
import { buildEdgeUrl } from './edge-url';
import { getTrueOrigin } from './origin';
import { shouldRewrite } from './validation';
import { hasMediaTags, processFragment } from './markup';
import {
  EDGE_MARKER_ATTRIBUTE,
  imageErrorHandler,
  imageLoadHandler,
  recoveryBootstrapScript,
} from './recovery';
import { createLogger } from './logger';
import type { TraceLogger } from './logger';

export interface EdgeRewriterOptions {
  config: RewriteConfig;
  signals: ContextSignals;
  overrides?: ContextOverrides;
  classifySubrequest?: SubrequestClassifier;
}

export class EdgeRewriter {
  readonly config: RewriteConfig;
  private readonly guard: ContextGuard;
  private readonly cache = new UrlCache();
  private readonly logs: LogEntry[] = [];
  private readonly log: TraceLogger;
  // Set while a fragment is processed; blocks nested rewriting
  private processing = false;

  constructor(options: EdgeRewriterOptions) {
    this.config = options.config;
    this.log = createLogger(this.logs, Date.now(), options.config.debug);
    this.guard = new ContextGuard({
      signals: options.signals,
      overrides: options.overrides,
      classifySubrequest: options.classifySubrequest,
      log: this.log,
    });
  }

  isActive(): boolean {
    return isRewriteActive(this.config);
  }

  isUnsafeContext(): boolean {
    return this.guard.isUnsafeContext();
  }

  shouldRewrite(url: string): boolean {
    return shouldRewrite(url, this.config);
  }

  buildEdgeUrl(url: string): string {
    return buildEdgeUrl(url, this.config, this.cache);
  }

  getTrueOrigin(url: string): string {
    return getTrueOrigin(url, this.config.edgeDomain);
  }

  private bypass(): boolean {
    return !this.isActive() || this.guard.isUnsafeContext();
  }

  /**
   * Rewrite a single media URL (attachment URL hook)
   */
  rewriteUrl(url: string): string {
    if (this.bypass() || this.processing || !this.shouldRewrite(url)) {
      return url;
    }
    return this.buildEdgeUrl(url);
  }

  /**
   * Rewrite the primary URL of an image descriptor; `false` (no image)
   * passes through
   */
  rewriteImageDescriptor<T extends ImageDescriptor>(descriptor: T | false): T | false {
    if (!descriptor || typeof descriptor !== 'object' || this.bypass() || this.processing) {
      return descriptor;
    }

    if (!descriptor.url || !this.shouldRewrite(descriptor.url)) {
      return descriptor;
    }

    return { ...descriptor, url: this.buildEdgeUrl(descriptor.url) };
  }

  /**
   * Rewrite every eligible candidate of a responsive source list
   */
  rewriteSourceSet<T extends SourceSetEntry>(sources: T[]): T[] {
    if (!Array.isArray(sources) || this.bypass() || this.processing) {
      return sources;
    }

    return sources.map((source) => {
      if (!source || !source.url || !this.shouldRewrite(source.url)) {
        return source;
      }
      return { ...source, url: this.buildEdgeUrl(source.url) };
    });
  }

  /**
   * Rewrite the attributes of an image element before it is printed
   *
   * Always produces the edge URL from the true origin, so a src that is
   * already an edge URL is re-synthesized rather than wrapped twice. Adds
   * the marker that tells the fragment pass to skip this element, plus the
   * load and fallback handlers.
   */
  rewriteAttributes(attributes: ElementAttributes): ElementAttributes {
    if (this.bypass()) {
      return attributes;
    }

    const src = attributes.src;
    if (!src) {
      return attributes;
    }

    const originUrl = this.getTrueOrigin(src);
    if (!this.shouldRewrite(originUrl)) {
      return attributes;
    }

    return {
      ...attributes,
      src: this.buildEdgeUrl(originUrl),
      [EDGE_MARKER_ATTRIBUTE]: '1',
      onload: imageLoadHandler(),
      onerror: imageErrorHandler(),
    };
  }

  /**
   * Rewrite media elements inside an HTML fragment
   */
  rewriteFragment(html: string): string {
    if (this.bypass() || this.processing || !html) {
      return html;
    }

    if (!hasMediaTags(html)) {
      return html;
    }

    this.processing = true;
    try {
      const result = processFragment(html, this);
      this.log('Fragment processed', `${result.rewritten} rewritten, ${result.skipped} already marked`);
      return result.html;
    } catch (error) {
      this.log('Fragment left unchanged', error instanceof Error ? error.message : 'Unknown error');
      return html;
    } finally {
      this.processing = false;
    }
  }

  /**
   * Inline recovery stub for the page head, or null when nothing on this
   * page will be rewritten
   */
  bootstrapScript(): string | null {
    if (this.bypass()) {
      return null;
    }
    return recoveryBootstrapScript({ debug: this.config.debug });
  }

  getLogs(): readonly LogEntry[] {
    return this.logs;
  }

  getCacheStats(): { entries: number; hits: number; misses: number } {
    return this.cache.stats();
  }
}
