import type { StructuredLogEvent } from './structured-log-event.js';

import { ANSI_RESET, COLOR_BY_SEVERITY } from './logfmt.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const where = event.transcript !== undefined
    ? (event.example !== undefined ? ` ${event.transcript}#${String(event.example)}` : ` ${event.transcript}`)
    : '';
  const prefix = `[${event.severity}] ${event.component}${where}:`;
  const labels = options.verbose === true
    ? Object.entries(event.labels).map(([key, value]) => ` ${key}=${value}`).join('')
    : '';
  let output = `${prefix} ${event.message}${labels}`;
  if (options.color === true) {
    const ansi = COLOR_BY_SEVERITY[event.severity];
    if (ansi !== undefined) output = `${ansi}${output}${ANSI_RESET}`;
  }

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
