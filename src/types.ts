// Shared types for the transcript runner. Component-specific types live next to their modules.

export type LogSeverity = 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';

export type LogComponent = 'cli' | 'config' | 'runner' | 'evaluator' | 'harness' | 'resolver' | 'operation';

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: LogSeverity;                // FIN for end-of-run summary
  component: LogComponent;
  message: string;                      // Human readable message
  // Transcript being processed, when the entry belongs to one
  transcript?: string;
  // 1-based example position within the transcript
  example?: number;
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogCallback = (entry: LogEntry) => void;

export type LogFormatName = 'logfmt' | 'json' | 'console' | 'none';

/** Minimal writable used for progress output. */
export interface TextSink {
  write: (text: string) => void;
}

export type FlagValue = string | number | boolean | null;
