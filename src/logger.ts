/**
 * Workflow tracing for a single render
 */

import type { LogEntry } from './types';

export type TraceLogger = (action: string, details?: string) => void;

/**
 * Create logger function for workflow tracking
 *
 * Entries are always recorded; they are echoed to the console only in
 * debug mode.
 */
export function createLogger(
  logs: LogEntry[],
  startTime: number,
  debugMode: boolean
): TraceLogger {
  return (action: string, details?: string) => {
    const entry: LogEntry = {
      time: `${Date.now() - startTime}ms`,
      action,
      details,
    };

    logs.push(entry);

    if (debugMode) {
      console.log(`[edge-rewriter ${entry.time}] ${action}${details ? ': ' + details : ''}`);
    }
  };
}
