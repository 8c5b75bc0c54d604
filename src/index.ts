/**
 * Media Edge Rewriter
 *
 * Rewrites media URLs on rendered pages so browsers load them from the
 * edge instead of the origin host.
 * - Origin URL: https://example.com/wp-content/uploads/photo.jpg
 * - Edge URL:   https://cdn.example.net/example.com/wp-content/uploads/photo.jpg
 *
 * Rewriting philosophy:
 * - A page always renders. Anything unparsable, misconfigured or ambiguous
 *   leaves the URL pointing at the origin.
 * - Management contexts (editor, APIs, jobs, CLI) always see origin URLs.
 * - Browsers that fail to load from the edge fall back to the origin once.
 *
 * Create one rewriter per request with createEdgeRewriter() and pass the
 * host's render values through its integration points, or bind them to the
 * host's filters with registerRewriteHooks().
 *
 * @version 1.0.0
 */

import type { ContextOverrides, ContextSignals, SettingsProvider, SubrequestClassifier } from './types';
import { readConfig } from './config';
import { EdgeRewriter } from './rewriter';

export const VERSION = '1.0.0';

export interface CreateEdgeRewriterOptions {
  settings: SettingsProvider;
  signals: ContextSignals;
  overrides?: ContextOverrides;
  classifySubrequest?: SubrequestClassifier;
}

/**
 * Build a rewriter for one request from the host's current settings
 */
export function createEdgeRewriter(options: CreateEdgeRewriterOptions): EdgeRewriter {
  return new EdgeRewriter({
    config: readConfig(options.settings),
    signals: options.signals,
    overrides: options.overrides,
    classifySubrequest: options.classifySubrequest,
  });
}

export type {
  ContextOverrides,
  ContextSignals,
  ContextVerdict,
  ElementAttributes,
  ImageDescriptor,
  LogEntry,
  RewriteConfig,
  SettingKey,
  SettingsProvider,
  SetupMode,
  SourceSetEntry,
  SubrequestClassifier,
} from './types';
export type { EdgeEnv } from './config';
export type { EdgeRewriterOptions } from './rewriter';
export type { FilterCallback, FilterRegistry } from './hooks';
export type { MarkupUrlOps, MarkupResult } from './markup';
export type { TagVisitor } from './html';

export {
  DEFAULT_CONFIG,
  DEFAULT_MEDIA_EXTENSIONS,
  MANAGED_EDGE_DOMAIN,
  isRewriteActive,
  readConfig,
  sanitizeDomain,
  settingsFromEnv,
  settingsFromObject,
} from './config';
export { ContextGuard, classifyByAuthentication } from './context';
export { EdgeRewriter } from './rewriter';
export { UrlCache } from './cache';
export { buildEdgeUrl, normalizeUrl } from './edge-url';
export { getTrueOrigin } from './origin';
export { isDomainAllowed, isEdgeUrl, isMediaUrl, isValidDomain, shouldRewrite } from './validation';
export { hasMediaTags, processFragment } from './markup';
export { ScannedTag, rewriteTags } from './html';
export {
  EDGE_MARKER_ATTRIBUTE,
  LOADED_CLASS,
  POSTER_MARKER_ATTRIBUTE,
  imageErrorHandler,
  imageLoadHandler,
  mediaErrorHandler,
  recoveryBootstrapScript,
} from './recovery';
export { FilterChain, registerRewriteHooks } from './hooks';
