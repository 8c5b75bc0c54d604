/**
 * Client-side recovery behavior emitted with rewritten media
 *
 * Handlers are inline attribute scripts, so they use plain string splitting
 * rather than the URL constructor. For an edge URL
 *
 *   https://cdn.example.net/example.com/wp-content/photo.jpg
 *
 * `url.split('/')` yields ['https:', '', 'cdn.example.net', 'example.com',
 * 'wp-content', 'photo.jpg']; everything from index 3 on is the origin host
 * followed by the origin path, query and fragment.
 *
 * Each element gets exactly one fallback attempt: the first error moves it
 * to fallback state '1' and loads the origin, a second error marks it '2'
 * and detaches the handler.
 */

/** Idempotence marker set on every element whose src was rewritten */
export const EDGE_MARKER_ATTRIBUTE = 'data-edge-cdn';

/** Set on video elements whose poster was rewritten */
export const POSTER_MARKER_ATTRIBUTE = 'data-edge-poster';

/** Class added once an image has loaded, for CSS that hides broken-image flashes */
export const LOADED_CLASS = 'edge-loaded';

export function imageLoadHandler(): string {
  return `this.classList.add('${LOADED_CLASS}')`;
}

/**
 * onerror for images
 *
 * Uses currentSrc because the failing candidate may come from srcset, and
 * drops srcset so the browser does not pick another edge candidate.
 */
export function imageErrorHandler(): string {
  return "if (!this.dataset.fallback) { "
    + "this.dataset.fallback = '1'; "
    + "var u = this.currentSrc || this.src; "
    + "var p = u.split('/').slice(3); "
    + "this.onerror = function() { this.dataset.fallback = '2'; this.onerror = null; }; "
    + "this.removeAttribute('srcset'); "
    + "this.src = 'https://' + p[0] + '/' + p.slice(1).join('/'); "
    + "}";
}

/**
 * onerror for video and audio
 *
 * Only URLs carrying a marker are converted: the element's own src when it
 * has data-edge-cdn, marked source children, and the poster when it has
 * data-edge-poster. Unmarked players (third-party embeds) are left alone,
 * and load() is only retried when something changed.
 */
export function mediaErrorHandler(): string {
  return "if (!this.dataset.fallback) { "
    + "this.dataset.fallback = '1'; "
    + "var changed = false; "
    + "if (this.src && this.dataset.edgeCdn) { var p = this.src.split('/').slice(3); this.src = 'https://' + p[0] + '/' + p.slice(1).join('/'); changed = true; } "
    + `var sources = this.querySelectorAll('source[${EDGE_MARKER_ATTRIBUTE}]'); `
    + "for (var i = 0; i < sources.length; i++) { var sp = sources[i].src.split('/').slice(3); sources[i].src = 'https://' + sp[0] + '/' + sp.slice(1).join('/'); changed = true; } "
    + "if (this.poster && this.dataset.edgePoster) { var pp = this.poster.split('/').slice(3); this.poster = 'https://' + pp[0] + '/' + pp.slice(1).join('/'); changed = true; } "
    + "if (changed) { this.onerror = function() { this.dataset.fallback = '2'; this.onerror = null; }; this.load(); } "
    + "}";
}

/**
 * Inline stub printed before the full client script
 *
 * Defines window.EdgeMedia.handleError so images can recover even when the
 * main script is slow or blocked.
 */
export function recoveryBootstrapScript(options: { debug: boolean }): string {
  return 'window.edgeMediaConfig={debug:' + (options.debug ? '1' : '0') + '};'
    + 'window.EdgeMedia=window.EdgeMedia||{'
    + 'handleError:function(img){'
    + 'if(!img.dataset.fallback){'
    + 'try{'
    + 'var u=new URL(img.currentSrc||img.src);'
    + 'var p=u.pathname.substring(1).split("/");'
    + 'if(p.length>=2){'
    + 'img.dataset.fallback="1";'
    + `img.classList.remove("${LOADED_CLASS}");`
    + 'img.removeAttribute("srcset");'
    + 'img.removeAttribute("sizes");'
    + 'img.src=u.protocol+"//"+p[0]+"/"+p.slice(1).join("/")+(u.search||"")+(u.hash||"");'
    + '}'
    + '}catch(e){}'
    + '}'
    + '}'
    + '};';
}
