import type { ContextSignals, RewriteConfig } from '../src/types';
import { DEFAULT_CONFIG } from '../src/config';

export const TEST_CONFIG: RewriteConfig = {
  ...DEFAULT_CONFIG,
  edgeDomain: 'cdn.test',
  allowedOriginDomains: ['example.com'],
  enabled: true,
  siteUrl: 'https://example.com',
};

export function testConfig(overrides: Partial<RewriteConfig> = {}): RewriteConfig {
  return { ...TEST_CONFIG, ...overrides };
}

/**
 * Signals for an anonymous front-end page view, with selected signals
 * switched on
 */
export function createSignals(values: Partial<Record<keyof ContextSignals, boolean>> = {}): ContextSignals {
  const read = (name: keyof ContextSignals) => () => values[name] ?? false;
  return {
    isManagementSurface: read('isManagementSurface'),
    isAsyncSubrequest: read('isAsyncSubrequest'),
    isApiRequest: read('isApiRequest'),
    isScheduledJob: read('isScheduledJob'),
    isCommandLine: read('isCommandLine'),
    isRemotePublishing: read('isRemotePublishing'),
    isAutosave: read('isAutosave'),
    isInstalling: read('isInstalling'),
    isAuthenticated: read('isAuthenticated'),
  };
}
