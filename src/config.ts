/**
 * Settings access and sanitization
 *
 * The host owns persisted settings; this module only reads them through a
 * SettingsProvider and turns them into a typed RewriteConfig. Values of the
 * wrong type fall back to the defaults, which leave rewriting disabled.
 *
 * Two providers are supported:
 *   - a host provider (getSetting) backed by whatever store the host uses
 *   - settingsFromEnv() for deployments configured through environment
 *     variables, using the same string conventions as the edge worker
 */

import type { RewriteConfig, SettingKey, SettingsProvider, SetupMode } from './types';

/** Edge host used when the site runs in managed mode */
export const MANAGED_EDGE_DOMAIN = 'cdn.media-edge.net';

export const DEFAULT_MEDIA_EXTENSIONS: readonly string[] = [
  // Images
  'jpg', 'jpeg', 'png', 'gif', 'webp', 'avif', 'svg',
  'bmp', 'tiff', 'ico', 'heic', 'heif',
  // Video
  'mp4', 'm4v', 'webm', 'ogv', 'mov', 'mkv',
  // Audio
  'mp3', 'ogg', 'wav', 'm4a', 'flac', 'aac', 'weba',
  // HLS
  'm3u8', 'ts',
];

export const DEFAULT_CONFIG: RewriteConfig = {
  edgeDomain: '',
  allowedOriginDomains: [],
  enabled: false,
  mediaExtensions: DEFAULT_MEDIA_EXTENSIONS,
  siteUrl: 'https://localhost',
  debug: false,
  setupMode: '',
};

/**
 * Environment variables read by settingsFromEnv()
 */
export interface EdgeEnv {
  EDGE_DOMAIN?: string;
  ALLOWED_ORIGINS?: string;
  EDGE_ENABLED?: string;
  MEDIA_EXTENSIONS?: string;
  SITE_URL?: string;
  DEBUG?: string;
  SETUP_MODE?: string;
}

/**
 * Normalize a user-entered domain to a bare host name
 *
 * Strips scheme, path and port, collapses repeated dots and trims leading
 * and trailing ones. Returns '' when the result is not a plausible host.
 */
export function sanitizeDomain(value: string): string {
  let domain = value.trim()
    .replace(/^https?:\/\//i, '')
    .replace(/\/.*$/, '')
    .replace(/:\d+$/, '');

  domain = domain
    .replace(/\.{2,}/g, '.')
    .replace(/^\.+/, '')
    .replace(/\.+$/, '')
    .toLowerCase();

  if (domain && !/^[a-z0-9](?:[a-z0-9.-]*[a-z0-9])?$/.test(domain)) {
    return '';
  }

  return domain;
}

/**
 * Split a comma or newline separated list, dropping blanks
 */
export function parseList(list: string): string[] {
  return list.split(/[,\n]/).map(item => item.trim()).filter(item => item !== '');
}

function isTruthyFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

function readSetting(provider: SettingsProvider, key: SettingKey): unknown {
  try {
    return provider.getSetting(key);
  } catch (error) {
    console.error(`Setting "${key}" could not be read:`, error);
    return undefined;
  }
}

function readStringList(value: unknown): string[] | null {
  if (typeof value === 'string') {
    return parseList(value);
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return null;
}

function readDomains(value: unknown): string[] {
  const domains = (readStringList(value) ?? [])
    .map(sanitizeDomain)
    .filter(domain => domain !== '');
  return [...new Set(domains)];
}

function readExtensions(value: unknown): readonly string[] {
  const extensions = (readStringList(value) ?? [])
    .map(ext => ext.trim().replace(/^\.+/, '').toLowerCase())
    .filter(ext => ext !== '');

  if (extensions.length === 0) {
    return DEFAULT_MEDIA_EXTENSIONS;
  }
  return [...new Set(extensions)];
}

function readSetupMode(value: unknown): SetupMode {
  return value === 'managed' || value === 'self-hosted' ? value : '';
}

/**
 * Build the typed configuration from a host settings provider
 */
export function readConfig(provider: SettingsProvider): RewriteConfig {
  const setupMode = readSetupMode(readSetting(provider, 'setupMode'));
  const storedEdgeDomain = readSetting(provider, 'edgeDomain');
  const siteUrl = readSetting(provider, 'siteUrl');

  const edgeDomain = setupMode === 'managed'
    ? MANAGED_EDGE_DOMAIN
    : typeof storedEdgeDomain === 'string' ? sanitizeDomain(storedEdgeDomain) : '';

  return {
    edgeDomain,
    allowedOriginDomains: readDomains(readSetting(provider, 'allowedOriginDomains')),
    enabled: readSetting(provider, 'enabled') === true,
    mediaExtensions: readExtensions(readSetting(provider, 'mediaExtensions')),
    siteUrl: typeof siteUrl === 'string' && siteUrl.trim() !== '' ? siteUrl.trim() : DEFAULT_CONFIG.siteUrl,
    debug: readSetting(provider, 'debug') === true,
    setupMode,
  };
}

/**
 * Settings provider backed by environment variables
 *
 * EDGE_ENABLED and DEBUG accept "true" or "1"; list values are comma
 * separated.
 */
export function settingsFromEnv(env: EdgeEnv): SettingsProvider {
  return {
    getSetting(key: SettingKey): unknown {
      switch (key) {
        case 'edgeDomain':
          return env.EDGE_DOMAIN ?? '';
        case 'allowedOriginDomains':
          return env.ALLOWED_ORIGINS ?? '';
        case 'enabled':
          return isTruthyFlag(env.EDGE_ENABLED);
        case 'mediaExtensions':
          return env.MEDIA_EXTENSIONS;
        case 'siteUrl':
          return env.SITE_URL;
        case 'debug':
          return isTruthyFlag(env.DEBUG);
        case 'setupMode':
          return env.SETUP_MODE;
      }
    },
  };
}

/**
 * Settings provider over a plain object, for hosts that already hold
 * their settings in memory
 */
export function settingsFromObject(values: Partial<Record<SettingKey, unknown>>): SettingsProvider {
  return {
    getSetting: (key: SettingKey): unknown => values[key],
  };
}

/**
 * Rewriting runs only when enabled and an edge domain is known
 */
export function isRewriteActive(config: RewriteConfig): boolean {
  return config.enabled && config.edgeDomain !== '';
}
