import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { makeLogCallback } from '../../log-sink.js';
import { formatConsole } from '../../logging/console-format.js';
import { encodeValue, formatLogfmt } from '../../logging/logfmt.js';
import { buildStructuredLogEvent } from '../../logging/structured-log-event.js';

const SLOW: LogEntry = {
  timestamp: 0,
  severity: 'WRN',
  component: 'runner',
  message: 'slow file',
  transcript: 'basic',
  example: 2,
  details: { durationMs: 1500, path: '/a b', message: 'shadowed' },
};

describe('structured log events', () => {
  it('turns details into labels and drops reserved keys', () => {
    const event = buildStructuredLogEvent(SLOW, { labels: { session: 's1' } });
    expect(event.isoTimestamp).toBe('1970-01-01T00:00:00.000Z');
    expect(event.priority).toBe(4);
    expect(event.labels).toEqual({ session: 's1', durationMs: '1500', path: '/a b' });
  });

  it('renders booleans and skips non-finite numbers', () => {
    const event = buildStructuredLogEvent({ ...SLOW, details: { passed: false, ratio: Number.NaN } });
    expect(event.labels).toEqual({ passed: 'false' });
  });
});

describe('logfmt', () => {
  it('quotes values that need it', () => {
    expect(encodeValue('')).toBe('""');
    expect(encodeValue('plain')).toBe('plain');
    expect(encodeValue('say "hi"')).toBe('"say \\"hi\\""');
  });

  it('orders fixed fields first and the message last', () => {
    expect(formatLogfmt(buildStructuredLogEvent(SLOW))).toBe(
      'ts=1970-01-01T00:00:00.000Z level=wrn priority=4 component=runner transcript=basic example=2 durationMs=1500 path="/a b" message="slow file"',
    );
  });

  it('escapes line breaks in the message', () => {
    const line = formatLogfmt(buildStructuredLogEvent({ timestamp: 0, severity: 'ERR', component: 'cli', message: 'a\nb' }));
    expect(line.endsWith('message=a\\nb')).toBe(true);
  });
});

describe('console format', () => {
  const event = buildStructuredLogEvent(SLOW);

  it('prefixes severity, component and position', () => {
    expect(formatConsole(event)).toBe('[WRN] runner basic#2: slow file');
    expect(formatConsole(event, { verbose: true })).toBe('[WRN] runner basic#2: slow file durationMs=1500 path=/a b');
  });

  it('colours by severity', () => {
    expect(formatConsole(event, { color: true })).toBe('\u001B[33m[WRN] runner basic#2: slow file\u001B[0m');
  });

  it('indents the stack of errors', () => {
    const failed = buildStructuredLogEvent({ timestamp: 0, severity: 'ERR', component: 'cli', message: 'boom', stack: 'at a\nat b' });
    expect(formatConsole(failed)).toBe('[ERR] cli: boom\n    at a\n    at b');
  });
});

describe('makeLogCallback', () => {
  const entry = (severity: LogEntry['severity']): LogEntry => ({ timestamp: 0, severity, component: 'runner', message: severity });

  it('drops verbose and trace entries unless enabled', () => {
    const lines: string[] = [];
    const log = makeLogCallback({ format: 'console', color: false }, (line) => { lines.push(line); });
    (['VRB', 'TRC', 'WRN', 'FIN'] as const).forEach((severity) => { log(entry(severity)); });
    expect(lines).toEqual(['[WRN] runner: WRN\n', '[FIN] runner: FIN\n']);
  });

  it('passes everything through when verbose and trace are on', () => {
    const lines: string[] = [];
    const log = makeLogCallback({ format: 'console', color: false, verbose: true, trace: true }, (line) => { lines.push(line); });
    log(entry('VRB'));
    log(entry('TRC'));
    expect(lines).toEqual(['[VRB] runner: VRB\n', '[TRC] runner: TRC\n']);
  });

  it('writes one JSON object per line', () => {
    const lines: string[] = [];
    const log = makeLogCallback({ format: 'json', color: false }, (line) => { lines.push(line); });
    log(SLOW);
    expect(lines).toHaveLength(1);
    const payload: unknown = JSON.parse(lines[0]);
    expect(payload).toEqual({
      ts: '1970-01-01T00:00:00.000Z',
      timestamp: 0,
      severity: 'WRN',
      level: 'wrn',
      priority: 4,
      component: 'runner',
      transcript: 'basic',
      example: 2,
      labels: { durationMs: '1500', path: '/a b' },
      message: 'slow file',
    });
  });
});
