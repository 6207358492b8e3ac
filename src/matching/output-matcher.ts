import type { OptionFlags } from './option-flags.js';
import type { PatternLine, PatternSegment } from './pattern.js';

import { normalizeGot, normalizeWant } from './normalize.js';
import { compileLine, compilePattern } from './pattern.js';

export type Bindings = ReadonlyMap<string, string>;

export const EMPTY_BINDINGS: Bindings = new Map<string, string>();

export interface MatchResult {
  ok: boolean;
  /** Normalised expected text, as compared. */
  want: string;
  /** Normalised actual text, as compared. */
  got: string;
  /** Capture bindings after this match; unchanged input bindings on failure. */
  bindings: Bindings;
}

type Continuation = (bindings: Bindings) => Bindings | undefined;

function bind(bindings: Bindings, name: string, value: string): Bindings {
  const next = new Map(bindings);
  next.set(name, value);
  return next;
}

function matchSegments(
  segments: readonly PatternSegment[],
  index: number,
  text: string,
  pos: number,
  bindings: Bindings,
  onLineEnd: Continuation,
): Bindings | undefined {
  if (index === segments.length) {
    return pos === text.length ? onLineEnd(bindings) : undefined;
  }
  const segment = segments[index];
  const literal = (value: string): Bindings | undefined => (
    text.startsWith(value, pos)
      ? matchSegments(segments, index + 1, text, pos + value.length, bindings, onLineEnd)
      : undefined
  );
  if (segment.kind === 'text') return literal(segment.text);
  if (segment.kind === 'capture') {
    const bound = bindings.get(segment.name);
    if (bound !== undefined) return literal(bound);
    // eslint-disable-next-line functional/no-loop-statements
    for (let end = pos + 1; end <= text.length; end += 1) {
      const next = bind(bindings, segment.name, text.slice(pos, end));
      const result = matchSegments(segments, index + 1, text, end, next, onLineEnd);
      if (result !== undefined) return result;
    }
    return undefined;
  }
  // Same-line wildcard: shortest span first, bounded by the end of this line.
  // eslint-disable-next-line functional/no-loop-statements
  for (let end = pos; end <= text.length; end += 1) {
    const result = matchSegments(segments, index + 1, text, end, bindings, onLineEnd);
    if (result !== undefined) return result;
  }
  return undefined;
}

function matchLines(
  pattern: readonly PatternLine[],
  pi: number,
  lines: readonly string[],
  li: number,
  bindings: Bindings,
): Bindings | undefined {
  if (pi === pattern.length) {
    return li === lines.length ? bindings : undefined;
  }
  const line = pattern[pi];
  if (line.kind === 'lines') {
    // Whole-line wildcard: as many lines as possible, backing off until the rest aligns.
    // eslint-disable-next-line functional/no-loop-statements
    for (let take = lines.length - li; take >= 0; take -= 1) {
      const result = matchLines(pattern, pi + 1, lines, li + take, bindings);
      if (result !== undefined) return result;
    }
    return undefined;
  }
  if (li >= lines.length) return undefined;
  return matchSegments(line.segments, 0, lines[li], 0, bindings, (next) => matchLines(pattern, pi + 1, lines, li + 1, next));
}

function hasWildcards(pattern: readonly PatternLine[]): boolean {
  return pattern.some((line) => line.kind === 'lines' || line.segments.some((segment) => segment.kind === 'wildcard'));
}

// Whitespace runs that include line breaks collapse to one space as well.
function matchCollapsed(wantLines: readonly string[], gotLines: readonly string[], bindings: Bindings): MatchResult {
  const want = wantLines.join(' ');
  const got = gotLines.join(' ');
  const matched = matchSegments(compileLine(want, false), 0, got, 0, bindings, (next) => next);
  return { ok: matched !== undefined, want, got, bindings: matched ?? bindings };
}

/**
 * Compare expected output against actual output. Pure: the same inputs always
 * give the same result, and `bindings` is never mutated.
 */
export function matchOutput(
  want: string,
  got: string,
  flags: OptionFlags,
  bindings: Bindings = EMPTY_BINDINGS,
): MatchResult {
  if (want.length === 0) {
    return { ok: got.length === 0, want: '', got: normalizeGot(got, flags).join('\n'), bindings };
  }
  const wantLines = normalizeWant(want, flags);
  const gotLines = normalizeGot(got, flags);
  const pattern = compilePattern(wantLines, { ellipsis: flags.has('ELLIPSIS') });
  const matched = matchLines(pattern, 0, gotLines, 0, bindings);
  if (matched === undefined && flags.has('NORMALIZE_WHITESPACE') && !hasWildcards(pattern)) {
    return matchCollapsed(wantLines, gotLines, bindings);
  }
  return {
    ok: matched !== undefined,
    want: wantLines.join('\n'),
    got: gotLines.join('\n'),
    bindings: matched ?? bindings,
  };
}
