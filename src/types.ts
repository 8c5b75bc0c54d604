/**
 * Settings and configuration
 */
export interface RewriteConfig {
  /** Bare edge host (no scheme, no path). Empty disables rewriting. */
  edgeDomain: string;
  allowedOriginDomains: readonly string[];
  enabled: boolean;
  mediaExtensions: readonly string[];
  /** Site's own scheme + host, used to absolutize relative URLs */
  siteUrl: string;
  debug: boolean;
  setupMode: SetupMode;
}

export type SetupMode = 'managed' | 'self-hosted' | '';

/**
 * Read-only settings source owned by the host
 *
 * Values are untyped on purpose: the host may store anything, and the
 * config module validates every key it reads.
 */
export interface SettingsProvider {
  getSetting(key: SettingKey): unknown;
}

export type SettingKey =
  | 'edgeDomain'
  | 'allowedOriginDomains'
  | 'enabled'
  | 'mediaExtensions'
  | 'siteUrl'
  | 'debug'
  | 'setupMode';

/**
 * Ambient request signals supplied by the host
 *
 * Each signal is read lazily, on the first integration point call of a
 * request, because some hosts only know the request type after routing.
 */
export interface ContextSignals {
  isManagementSurface(): boolean;
  isAsyncSubrequest(): boolean;
  isApiRequest(): boolean;
  isScheduledJob(): boolean;
  isCommandLine(): boolean;
  isRemotePublishing(): boolean;
  isAutosave(): boolean;
  isInstalling(): boolean;
  isAuthenticated(): boolean;
}

/**
 * Extension points the host may use to override context decisions
 *
 * Return types are `unknown` because hosts wire these to plugin code;
 * anything other than a boolean is treated as a contract violation.
 */
export interface ContextOverrides {
  allowRewriteInManagementContext?(): unknown;
  forceUnsafeContext?(): unknown;
  forceFrontendSubrequest?(): unknown;
  allowAuthenticatedSubrequest?(): unknown;
}

/**
 * Decides whether an async sub-request inside a management surface comes
 * from a visitor (rewrite) or an operator (leave untouched).
 */
export type SubrequestClassifier = (
  signals: ContextSignals,
  overrides: ContextOverrides
) => boolean;

export type ContextVerdict = 'unknown' | 'safe' | 'unsafe';

/**
 * Image descriptor passed through the attribute-level image hook
 */
export interface ImageDescriptor {
  url: string;
  width?: number;
  height?: number;
  resized?: boolean;
}

/**
 * One candidate of a responsive source list
 */
export interface SourceSetEntry {
  url: string;
  descriptor?: 'w' | 'x';
  value?: number;
}

export type ElementAttributes = Record<string, string>;

/**
 * Log entry for debugging
 */
export interface LogEntry {
  time: string;
  action: string;
  details?: string;
}
