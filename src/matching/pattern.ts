export type PatternSegment =
  | { kind: 'text'; text: string }
  | { kind: 'wildcard' }
  | { kind: 'capture'; name: string };

export type PatternLine =
  | { kind: 'lines' }
  | { kind: 'line'; segments: PatternSegment[] };

export const ELLIPSIS = '...';

const CAPTURE_SOURCE = String.raw`\{\{([A-Za-z_][A-Za-z0-9_]*)\}\}`;

/**
 * Compile expected lines into the wildcard grammar: a line that is only `...`
 * spans whole lines, an embedded `...` spans part of one line, and `{{name}}`
 * captures (or re-checks) a value.
 */
export function compilePattern(lines: readonly string[], opts: { ellipsis: boolean }): PatternLine[] {
  return lines.map((line) => {
    if (opts.ellipsis && line.trim() === ELLIPSIS) return { kind: 'lines' };
    return { kind: 'line', segments: compileLine(line, opts.ellipsis) };
  });
}

export function compileLine(line: string, ellipsis: boolean): PatternSegment[] {
  const token = new RegExp(ellipsis ? String.raw`\.\.\.|${CAPTURE_SOURCE}` : CAPTURE_SOURCE, 'g');
  const segments: PatternSegment[] = [];
  let last = 0;
  // eslint-disable-next-line functional/no-loop-statements
  for (const m of line.matchAll(token)) {
    const start = m.index ?? 0;
    if (start > last) segments.push({ kind: 'text', text: line.slice(last, start) });
    const name = m[1];
    if (name !== undefined) segments.push({ kind: 'capture', name });
    else pushWildcard(segments);
    last = start + m[0].length;
  }
  if (last < line.length) segments.push({ kind: 'text', text: line.slice(last) });
  return segments;
}

// Adjacent wildcards match the same spans as one.
function pushWildcard(segments: PatternSegment[]): void {
  const prev = segments.at(-1);
  if (prev?.kind === 'wildcard') return;
  segments.push({ kind: 'wildcard' });
}

