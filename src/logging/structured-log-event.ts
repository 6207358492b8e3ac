import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  component: LogEntry['component'];
  transcript?: string;
  example?: number;
  labels: Record<string, string>;
  stack?: string;
}

const PRIORITY_BY_SEVERITY: Partial<Record<LogEntry['severity'], number>> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

const DEFAULT_PRIORITY = 6;

const RESERVED_LABEL_KEYS = new Set([
  'ts',
  'level',
  'priority',
  'severity',
  'component',
  'transcript',
  'example',
  'message',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const priority = PRIORITY_BY_SEVERITY[entry.severity] ?? DEFAULT_PRIORITY;
  const isoTimestamp = new Date(entry.timestamp).toISOString();

  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (typeof value === 'string' && value.length > 0) {
      labels[key] = value;
    }
  });
  if (entry.details !== undefined) {
    Object.entries(entry.details).forEach(([key, value]) => {
      if (Object.prototype.hasOwnProperty.call(labels, key)) return;
      if (typeof value === 'string') {
        if (value.length > 0) labels[key] = value;
        return;
      }
      if (typeof value === 'number') {
        if (Number.isFinite(value)) labels[key] = String(value);
        return;
      }
      labels[key] = value ? 'true' : 'false';
    });
  }

  const filteredLabels = Object.entries(labels).reduce<Record<string, string>>((acc, [key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return acc;
    acc[key] = value;
    return acc;
  }, {});

  return {
    timestamp: entry.timestamp,
    isoTimestamp,
    severity: entry.severity,
    priority,
    message: entry.message,
    component: entry.component,
    transcript: entry.transcript,
    example: entry.example,
    labels: filteredLabels,
    stack: entry.stack,
  };
}
