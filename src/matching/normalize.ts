import type { OptionFlags } from './option-flags.js';

// Quoted strings carrying a legacy `u` prefix, anywhere after a non-word character or at the start.
const U_PREFIX_PATTERNS: [RegExp, string][] = [
  [/(\W)u'(.*?)'/g, "$1'$2'"],
  [/(\W)u"(.*?)"/g, '$1"$2"'],
  [/^u'(.*?)'/, "'$1'"],
  [/^u"(.*?)"/, '"$1"'],
];

// `12L` (legacy long) and `12n` (BigInt) both print as `12`.
const LONG_SUFFIX_PATTERN = /(?<![\w.])([0-9]+)[Ln]\b/g;

const WINDOWS_PATH_PATTERN = /[c-zC-Z]:\\{1,2}|\\{1,2}/g;

export const BLANKLINE_MARKER = '<BLANKLINE>';

export function stripUnicodePrefix(text: string): string {
  return U_PREFIX_PATTERNS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);
}

export function stripLongSuffix(text: string): string {
  return text.replace(LONG_SUFFIX_PATTERN, '$1');
}

export function normalizePaths(text: string): string {
  return text.replace(WINDOWS_PATH_PATTERN, '/');
}

/** Leading `???` stands for `...` where a bare `...` would read as a continuation line. */
export function expandLeadingWildcardAlias(line: string): string {
  return line.startsWith('???') ? `...${line.slice(3)}` : line;
}

export function collapseWhitespace(line: string): string {
  return line.trim().replace(/\s+/g, ' ');
}

/** Split text into comparable lines: CRLF folded, trailing newlines dropped. */
export function splitLines(text: string): string[] {
  const unified = text.replace(/\r\n?/g, '\n').replace(/\n+$/, '');
  return unified.length === 0 ? [] : unified.split('\n');
}

function finishLines(lines: string[], flags: OptionFlags): string[] {
  if (!flags.has('NORMALIZE_WHITESPACE')) return lines;
  return lines.map((line) => collapseWhitespace(line)).filter((line) => line.length > 0);
}

export function normalizeGot(got: string, flags: OptionFlags): string[] {
  let text = got;
  if (flags.has('STRIP_U')) text = stripUnicodePrefix(text);
  if (flags.has('STRIP_L')) text = stripLongSuffix(text);
  if (flags.has('NORMALIZE_PATHS')) text = normalizePaths(text);
  return finishLines(splitLines(text), flags);
}

export function normalizeWant(want: string, flags: OptionFlags): string[] {
  const lines = splitLines(want)
    .map((line) => expandLeadingWildcardAlias(line))
    .map((line) => (line.trim() === BLANKLINE_MARKER ? '' : line));
  return finishLines(lines, flags);
}
