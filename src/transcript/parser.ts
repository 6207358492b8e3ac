import type { OptionDelta, OptionFlag } from '../matching/option-flags.js';

import { parseOptionDirective, UnknownOptionFlagError } from '../matching/option-flags.js';

export interface Example {
  /** 1-based position within the transcript */
  index: number;
  /** 1-based line of the prompt */
  line: number;
  indent: number;
  source: string;
  /** Expected output; '' means no output is expected */
  want: string;
  options: OptionDelta;
}

export interface TranscriptHead {
  /** Platforms (as in `process.platform`) the whole file is skipped on */
  skipPlatforms: string[];
  /** When non-empty, the only platforms the file runs on */
  onlyPlatforms: string[];
  options: OptionDelta;
}

export class TranscriptParseError extends Error {
  public readonly transcript: string;

  public readonly line: number;

  constructor(transcript: string, line: number, message: string) {
    super(`${transcript}:${String(line)}: ${message}`);
    this.transcript = transcript;
    this.line = line;
    this.name = 'TranscriptParseError';
  }
}

const PROMPT_RE = /^([ \t]*)>>>(?: (.*))?$/;
const OPTION_COMMENT_RE = /\/\/\s*transcript:\s*(.*)$/;
const FENCE_RE = /^\s*(```|~~~)/;

const SKIP_PLATFORM_RE = /^skip-platform: *(.+)$/m;
const ONLY_PLATFORM_RE = /^only-platform: *(.+)$/m;
const SKIP_WINDOWS_RE = /^skip-windows: *yes$/m;
const HEAD_OPTIONS_RE = /^transcript-options: *(.+)$/m;

export const DEFAULT_HEAD_BYTES = 256;

function indentOf(line: string): number {
  const match = /^[ \t]*/.exec(line);
  return match !== null ? match[0].length : 0;
}

function continuationText(line: string, indent: string): string | undefined {
  if (!line.startsWith(indent)) return undefined;
  const rest = line.slice(indent.length);
  if (rest === '...') return '';
  if (rest.startsWith('... ')) return rest.slice(4);
  return undefined;
}

function platformList(match: RegExpExecArray | null): string[] {
  if (match === null) return [];
  return match[1].split(/[\s,]+/).filter((p) => p.length > 0);
}

function directiveFor(transcript: string, lineNo: number, body: string): Map<OptionFlag, boolean> {
  try {
    return parseOptionDirective(body);
  } catch (error) {
    if (error instanceof UnknownOptionFlagError) {
      throw new TranscriptParseError(transcript, lineNo, error.message);
    }
    throw error;
  }
}

function lineAt(text: string, index: number): number {
  return text.slice(0, index).split('\n').length;
}

/**
 * Read file-level directives. Only the first `headBytes` bytes are looked at
 * so a directive quoted further down in prose has no effect.
 */
export function readTranscriptHead(text: string, transcript: string, headBytes = DEFAULT_HEAD_BYTES): TranscriptHead {
  const head = Buffer.from(text, 'utf8').subarray(0, headBytes).toString('utf8');
  const skipPlatforms = platformList(SKIP_PLATFORM_RE.exec(head));
  const onlyPlatforms = platformList(ONLY_PLATFORM_RE.exec(head));
  if (SKIP_WINDOWS_RE.test(head) && !skipPlatforms.includes('win32')) skipPlatforms.push('win32');
  const optionMatch = HEAD_OPTIONS_RE.exec(head);
  const options = optionMatch !== null
    ? directiveFor(transcript, lineAt(head, optionMatch.index), optionMatch[1])
    : new Map<OptionFlag, boolean>();
  return { skipPlatforms, onlyPlatforms, options };
}

/** Whether a file with `head` is gated out on `platform`. */
export function isPlatformSkipped(head: TranscriptHead, platform: string): boolean {
  if (head.skipPlatforms.includes(platform)) return true;
  return head.onlyPlatforms.length > 0 && !head.onlyPlatforms.includes(platform);
}

/** Split a transcript into its examples. Purely structural: nothing is executed. */
export function parseTranscript(text: string, transcript: string): Example[] {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  const examples: Example[] = [];
  let i = 0;
  // eslint-disable-next-line functional/no-loop-statements
  while (i < lines.length) {
    const prompt = PROMPT_RE.exec(lines[i]);
    if (prompt === null) {
      i += 1;
      continue;
    }
    const indent = prompt[1];
    const startLine = i + 1;
    const sourceLines = [prompt[2] ?? ''];
    i += 1;
    // eslint-disable-next-line functional/no-loop-statements
    while (i < lines.length) {
      const more = continuationText(lines[i], indent);
      if (more === undefined) break;
      sourceLines.push(more);
      i += 1;
    }

    const wantLines: string[] = [];
    // eslint-disable-next-line functional/no-loop-statements
    while (i < lines.length) {
      const line = lines[i];
      if (line.trim().length === 0 || PROMPT_RE.test(line) || FENCE_RE.test(line)) break;
      if (indentOf(line) < indent.length) {
        throw new TranscriptParseError(transcript, i + 1, 'expected output is indented less than its prompt');
      }
      wantLines.push(line.slice(indent.length));
      i += 1;
    }

    const options = new Map<OptionFlag, boolean>();
    sourceLines.forEach((line, offset) => {
      const comment = OPTION_COMMENT_RE.exec(line);
      if (comment === null) return;
      directiveFor(transcript, startLine + offset, comment[1]).forEach((on, flag) => options.set(flag, on));
    });

    examples.push({
      index: examples.length + 1,
      line: startLine,
      indent: indent.length,
      source: sourceLines.join('\n'),
      want: wantLines.length > 0 ? `${wantLines.join('\n')}\n` : '',
      options,
    });
  }
  return examples;
}
