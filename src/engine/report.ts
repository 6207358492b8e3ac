import { createTwoFilesPatch } from 'diff';

import type { Example } from '../transcript/parser.js';

import { splitLines } from '../matching/normalize.js';
import { ensureTrailingNewline } from '../utils.js';

export const REPORT_SEPARATOR = '*'.repeat(70);

export interface FailureReportInput {
  transcript: string;
  /** Path shown in the report header */
  path: string;
  example: Example;
  /** Raw output of the example */
  got: string;
  udiff: boolean;
  /** Both sides as the matcher compared them */
  normalized?: { want: string; got: string };
}

function indent(text: string, prefix = '    '): string {
  return ensureTrailingNewline(text)
    .split('\n')
    .slice(0, -1)
    .map((line) => (line.length > 0 ? `${prefix}${line}` : line))
    .join('\n')
    .concat('\n');
}

/** Hunks of a unified diff between expected and actual text, headers dropped. */
export function unifiedDiff(want: string, got: string): string {
  const patch = createTwoFilesPatch(
    'expected',
    'actual',
    ensureTrailingNewline(want),
    ensureTrailingNewline(got),
    undefined,
    undefined,
    { context: 3 },
  );
  const lines = patch.split('\n');
  const firstHunk = lines.findIndex((line) => line.startsWith('@@'));
  return firstHunk < 0 ? '' : lines.slice(firstHunk).join('\n');
}

function asCompared(text: string): string {
  return splitLines(text).join('\n');
}

/** One failed example, laid out as a doctest failure report. */
export function formatFailureReport(input: FailureReportInput): string {
  const { example, got } = input;
  const parts = [
    `${REPORT_SEPARATOR}\n`,
    `File "${input.path}", line ${String(example.line)}, in ${input.transcript}\n`,
    'Failed example:\n',
    indent(example.source),
  ];
  if (input.udiff && example.want.length > 0 && got.length > 0) {
    parts.push('Differences (unified diff with -expected +actual):\n');
    parts.push(indent(unifiedDiff(example.want, got)));
    return parts.join('');
  }
  if (example.want.length > 0) parts.push('Expected:\n', indent(example.want));
  else parts.push('Expected nothing\n');
  if (got.length > 0) parts.push('Got:\n', indent(got));
  else parts.push('Got nothing\n');
  const { normalized } = input;
  if (normalized !== undefined && (normalized.want !== asCompared(example.want) || normalized.got !== asCompared(got))) {
    parts.push('Normalized expected:\n', indent(normalized.want));
    parts.push('Normalized got:\n', indent(normalized.got));
  }
  return parts.join('');
}

/** Trailer that closes the reports of one file. */
export function formatFailureSummary(transcript: string, failures: number, tried: number): string {
  return [
    `${REPORT_SEPARATOR}\n`,
    '1 items had failures:\n',
    `   ${String(failures)} of ${String(tried).padStart(3)} in ${transcript}\n`,
    `***Test Failed*** ${String(failures)} failures.\n`,
  ].join('');
}
