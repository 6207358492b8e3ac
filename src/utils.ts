import type { LogCallback, LogEntry } from './types.js';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export function ensureTrailingNewline(s: string): string { return s.endsWith('\n') ? s : (s + '\n'); }

/** Number of spaces that right-pads `name` to `width` columns (never negative). */
export function padFor(name: string, width: number): string {
  return ' '.repeat(Math.max(0, width - name.length));
}

export function makeLogEntry(
  severity: LogEntry['severity'],
  component: LogEntry['component'],
  message: string,
  extra: Partial<Omit<LogEntry, 'severity' | 'component' | 'message'>> = {},
): LogEntry {
  return { timestamp: Date.now(), severity, component, message, ...extra };
}

export const noopLog: LogCallback = () => { /* discard */ };

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

export function getWarningSink(): ((message: string) => void) | undefined {
  return warningSink;
}

// Consistent warning logger routed through injectable sink to keep core silent
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* sink failures must not break the caller */
  }
}
