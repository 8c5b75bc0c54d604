/**
 * Request context classification
 *
 * Rewriting is only safe while rendering pages for visitors. Management
 * screens, API calls, background jobs and similar contexts need origin
 * URLs, because the URLs they see get stored, edited or sent elsewhere.
 *
 * The verdict is computed on first use rather than at construction: hosts
 * often only know the request type after routing, which happens after the
 * rewriter is created. It is then memoized for the rest of the request.
 */

import type {
  ContextOverrides,
  ContextSignals,
  ContextVerdict,
  SubrequestClassifier,
} from './types';
import type { TraceLogger } from './logger';

/**
 * Thrown internally when a signal breaks its contract; always caught and
 * turned into an unsafe verdict.
 */
class SignalError extends Error {
  constructor(name: string, detail: string) {
    super(`Context signal "${name}" ${detail}`);
    this.name = 'SignalError';
  }
}

function readSignal(signals: ContextSignals, name: keyof ContextSignals): boolean {
  const value: unknown = signals[name].call(signals);
  if (typeof value !== 'boolean') {
    throw new SignalError(name, `returned ${typeof value}`);
  }
  return value;
}

/**
 * Permissive overrides only count when they return exactly `true`
 */
function isGranted(overrides: ContextOverrides, name: keyof ContextOverrides): boolean {
  const override = overrides[name];
  if (!override) {
    return false;
  }
  try {
    return override.call(overrides) === true;
  } catch {
    return false;
  }
}

/**
 * `forceUnsafeContext` fails closed: a throw or a non-boolean answer counts
 * as unsafe.
 */
function isForcedUnsafe(overrides: ContextOverrides): boolean {
  if (!overrides.forceUnsafeContext) {
    return false;
  }
  try {
    const value = overrides.forceUnsafeContext();
    return typeof value !== 'boolean' || value;
  } catch {
    return true;
  }
}

/**
 * Default visitor/operator split for async sub-requests in a management
 * surface, keyed on login state:
 *   - signed-in users are operators (media library, page builders)
 *   - anonymous users are visitors (infinite scroll, load more)
 */
export const classifyByAuthentication: SubrequestClassifier = (signals, overrides) => {
  // Only an async call can be a visitor sub-request; the overrides refine
  // that case and never apply to a management page load itself.
  if (!readSignal(signals, 'isAsyncSubrequest')) {
    return false;
  }

  if (isGranted(overrides, 'forceFrontendSubrequest')) {
    return true;
  }

  if (readSignal(signals, 'isAuthenticated')) {
    return isGranted(overrides, 'allowAuthenticatedSubrequest');
  }

  return true;
};

export interface ContextGuardOptions {
  signals: ContextSignals;
  overrides?: ContextOverrides;
  classifySubrequest?: SubrequestClassifier;
  log?: TraceLogger;
}

export class ContextGuard {
  private verdict: ContextVerdict = 'unknown';
  private readonly signals: ContextSignals;
  private readonly overrides: ContextOverrides;
  private readonly classifySubrequest: SubrequestClassifier;
  private readonly log: TraceLogger | undefined;

  constructor(options: ContextGuardOptions) {
    this.signals = options.signals;
    this.overrides = options.overrides ?? {};
    this.classifySubrequest = options.classifySubrequest ?? classifyByAuthentication;
    this.log = options.log;
  }

  getVerdict(): ContextVerdict {
    return this.verdict;
  }

  isUnsafeContext(): boolean {
    if (this.verdict === 'unknown') {
      this.verdict = this.evaluate();
    }
    return this.verdict === 'unsafe';
  }

  private evaluate(): ContextVerdict {
    try {
      const reason = this.findUnsafeReason();
      this.log?.('Context verdict', reason ? `unsafe (${reason})` : 'safe');
      return reason ? 'unsafe' : 'safe';
    } catch (error) {
      this.log?.('Context verdict', `unsafe (${error instanceof Error ? error.message : 'unknown error'})`);
      return 'unsafe';
    }
  }

  private findUnsafeReason(): string | null {
    const { signals, overrides } = this;

    if (readSignal(signals, 'isManagementSurface') && !isGranted(overrides, 'allowRewriteInManagementContext')) {
      if (this.classifySubrequest(signals, overrides) !== true) {
        return 'management surface';
      }
    }

    if (readSignal(signals, 'isApiRequest')) return 'api request';
    if (readSignal(signals, 'isScheduledJob')) return 'scheduled job';
    if (readSignal(signals, 'isCommandLine')) return 'command line';
    if (readSignal(signals, 'isRemotePublishing')) return 'remote publishing';
    if (readSignal(signals, 'isAutosave')) return 'autosave';
    if (readSignal(signals, 'isInstalling')) return 'installing';
    if (isForcedUnsafe(overrides)) return 'forced by host';

    return null;
  }
}
