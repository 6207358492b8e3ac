import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_CYAN = '\u001B[36m';
const ANSI_GRAY = '\u001B[90m';

export const COLOR_BY_SEVERITY: Partial<Record<StructuredLogEvent['severity'], string>> = {
  ERR: ANSI_RED,
  WRN: ANSI_YELLOW,
  FIN: ANSI_CYAN,
  VRB: ANSI_GRAY,
  TRC: ANSI_GRAY,
};

export { ANSI_RESET };

export function encodeValue(value: string): string {
  if (value === '') return '""';
  const needsQuotes = /\s|=|"/.test(value);
  const escaped = value.replace(/"/g, '\\"');
  return needsQuotes ? `"${escaped}"` : escaped;
}

function sanitize(value: string): string {
  return value.replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

export function formatLogfmt(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const pairs: [string, string][] = [];
  const seen = new Set<string>();
  const push = (key: string, value: string | undefined): void => {
    if (value === undefined || value.length === 0) return;
    if (seen.has(key)) return;
    pairs.push([key, value]);
    seen.add(key);
  };

  push('ts', event.isoTimestamp);
  push('level', event.severity.toLowerCase());
  push('priority', String(event.priority));
  push('component', event.component);
  push('transcript', event.transcript);
  if (event.example !== undefined) push('example', String(event.example));

  Object.entries(event.labels).forEach(([key, value]) => {
    push(key, sanitize(value));
  });

  // Render the free-form message last for readability.
  push('message', sanitize(event.message));

  let line = pairs.map(([key, value]) => `${key}=${encodeValue(value)}`).join(' ');
  if (options.color === true) {
    const ansi = COLOR_BY_SEVERITY[event.severity];
    if (ansi !== undefined) {
      line = `${ansi}${line}${ANSI_RESET}`;
    }
  }
  return line;
}
