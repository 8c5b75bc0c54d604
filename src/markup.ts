/**
 * Media element rewriting in HTML fragments
 *
 * Handles the markup that attribute-level hooks never saw: post content,
 * widgets, media shortcodes. Elements already carrying the edge marker were
 * processed by an attribute hook and are left exactly as they are.
 */

import type { ScannedTag } from './html';
import { rewriteTags } from './html';
import {
  EDGE_MARKER_ATTRIBUTE,
  POSTER_MARKER_ATTRIBUTE,
  imageErrorHandler,
  imageLoadHandler,
  mediaErrorHandler,
} from './recovery';

const IMAGE_TAGS = ['img', 'amp-img', 'amp-anim'];
const TIMED_MEDIA_TAGS = ['video', 'audio'];
const MEDIA_TAGS: ReadonlySet<string> = new Set([...IMAGE_TAGS, ...TIMED_MEDIA_TAGS, 'source']);

const TAG_PATTERNS = ['<img', '<amp-img', '<amp-anim', '<video', '<audio', '<source'];

/**
 * URL operations the processor needs from the rewriter
 */
export interface MarkupUrlOps {
  getTrueOrigin(url: string): string;
  shouldRewrite(url: string): boolean;
  buildEdgeUrl(url: string): string;
}

export interface MarkupResult {
  html: string;
  rewritten: number;
  skipped: number;
}

/**
 * Cheap substring check run before any parsing
 */
export function hasMediaTags(html: string): boolean {
  const lower = html.toLowerCase();
  return TAG_PATTERNS.some(pattern => lower.includes(pattern));
}

/**
 * Recover, check, synthesize and write one URL attribute
 *
 * Returns true when the attribute now holds an edge URL.
 */
function rewriteUrlAttribute(tag: ScannedTag, attribute: string, ops: MarkupUrlOps): boolean {
  const value = tag.getAttribute(attribute);
  if (!value) {
    return false;
  }

  const originUrl = ops.getTrueOrigin(value);
  if (!ops.shouldRewrite(originUrl)) {
    return false;
  }

  tag.setAttribute(attribute, ops.buildEdgeUrl(originUrl));
  return true;
}

function processTag(tag: ScannedTag, ops: MarkupUrlOps): boolean {
  let rewritten = false;

  if (rewriteUrlAttribute(tag, 'src', ops)) {
    tag.setAttribute(EDGE_MARKER_ATTRIBUTE, '1');
    rewritten = true;

    if (IMAGE_TAGS.includes(tag.name)) {
      tag.setAttribute('onload', imageLoadHandler());
      tag.setAttribute('onerror', imageErrorHandler());
    }
  }

  // Sources usually sit in child <source> elements, so the handler goes on
  // every video/audio; the error event fires on the parent, not on <source>.
  if (TIMED_MEDIA_TAGS.includes(tag.name)) {
    tag.setAttribute('onerror', mediaErrorHandler());
  }

  if (tag.name === 'video' && rewriteUrlAttribute(tag, 'poster', ops)) {
    tag.setAttribute(POSTER_MARKER_ATTRIBUTE, '1');
    rewritten = true;
  }

  return rewritten;
}

/**
 * Rewrite every unprocessed media element of a fragment
 */
export function processFragment(html: string, ops: MarkupUrlOps): MarkupResult {
  let rewritten = 0;
  let skipped = 0;

  const output = rewriteTags(html, MEDIA_TAGS, (tag) => {
    if (tag.hasAttribute(EDGE_MARKER_ATTRIBUTE)) {
      skipped += 1;
      return;
    }

    if (processTag(tag, ops)) {
      rewritten += 1;
    }
  });

  return { html: output, rewritten, skipped };
}
