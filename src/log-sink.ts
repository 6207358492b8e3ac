import type { LogCallback, LogEntry, LogFormatName } from './types.js';

import { createStructuredLogger } from './logging/structured-logger.js';

export function makeLogCallback(
  opts: {
    color?: boolean;
    verbose?: boolean;
    trace?: boolean;
    format?: LogFormatName;
    labels?: Record<string, string>;
  },
  write?: (s: string) => void
): LogCallback {
  const writer = typeof write === 'function'
    ? write
    : (s: string) => {
        try {
          process.stderr.write(s);
        } catch {
          // stderr is gone; logging is best effort
        }
      };

  // Interactive terminals get the short console layout unless a format was requested
  const format: LogFormatName = opts.format ?? (process.stderr.isTTY ? 'console' : 'logfmt');

  const logger = createStructuredLogger({
    format,
    color: opts.color ?? process.stderr.isTTY,
    verbose: opts.verbose === true,
    logfmtWriter: writer,
    jsonWriter: writer,
    consoleWriter: writer,
    labels: opts.labels,
  });

  return (entry: LogEntry) => {
    if (entry.severity === 'VRB' && opts.verbose !== true) return;
    if (entry.severity === 'TRC' && opts.trace !== true) return;
    logger.emit(entry);
  };
}
