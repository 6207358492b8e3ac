import vm from 'node:vm';
import { inspect } from 'node:util';

import type { LogCallback, TextSink } from '../types.js';

import { StreamCapture } from '../scope/captures.js';
import { within } from '../scope/scope-stack.js';
import { makeLogEntry, noopLog } from '../utils.js';

/** Collects the text an example prints, in write order. */
export class OutputBuffer implements TextSink {
  private parts: string[] = [];

  public write(text: string): void {
    this.parts.push(text);
  }

  /** Everything written since the last call. */
  public take(): string {
    const text = this.parts.join('');
    this.parts = [];
    return text;
  }
}

export interface EvaluatorOptions {
  transcript: string;
  out: OutputBuffer;
  log?: LogCallback;
}

export interface EvaluationSource {
  source: string;
  /** 1-based line of the prompt, for stack traces */
  line: number;
  index: number;
}

const DECLARATION_RE = /^(?:const|let)(\s)/gm;
const CLASS_RE = /^class\s+([A-Za-z_$][\w$]*)/gm;
const AWAIT_RE = /\bawait\b/;
const STATEMENT_START_RE = /^(?:const|let|var|if|for|while|do|switch|try|function|async\s+function|class|return|throw|import|export|[}{)\]])/;

/** Show a completion value the way an interactive prompt echoes it. */
export function displayValue(value: unknown): string {
  return inspect(value, { depth: 4, breakLength: 80 });
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null
    && 'then' in value && typeof value.then === 'function';
}

/** `pkg.module.SomeError` → `SomeError` */
export function stripErrorModule(name: string): string {
  return name.slice(name.lastIndexOf('.') + 1);
}

/**
 * The single line an uncaught error leaves in the output. Errors from the
 * evaluation context come from another realm, so they are recognised by shape.
 */
export function formatUncaught(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    const rawName = 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
    const name = stripErrorModule(rawName);
    return error.message.length > 0 ? `Uncaught ${name}: ${error.message}` : `Uncaught ${name}`;
  }
  return `Uncaught ${displayValue(error)}`;
}

/**
 * Top-level `let`/`const`/`class` become `var` bindings so that each example
 * can see, and redeclare, what earlier examples defined.
 */
export function rewriteDeclarations(source: string): string {
  return source
    .replace(DECLARATION_RE, 'var$1')
    .replace(CLASS_RE, 'var $1 = class $1');
}

function rewriteForAsync(source: string): string[] {
  return source.split('\n').map((line) => {
    const destructure = /^(?:const|let|var)\s+([{[].*[}\]])\s*=\s*(.*?);?\s*$/.exec(line);
    if (destructure !== null) return `;(${destructure[1]} = ${destructure[2]});`;
    const declared = /^(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*(=.*|;?)\s*$/.exec(line);
    if (declared !== null) return `${declared[1]} ${declared[2].startsWith('=') ? declared[2] : '= undefined;'}`;
    const fn = /^(async\s+)?function\s*(\*?)\s*([A-Za-z_$][\w$]*)/.exec(line);
    if (fn !== null) return `${fn[3]} = ${line}`;
    const cls = /^class\s+([A-Za-z_$][\w$]*)/.exec(line);
    if (cls !== null) return `${cls[1]} = ${line}`;
    return line;
  });
}

/**
 * Bodies to try for an example with top-level `await`: the final expression
 * returned, starting at each unindented line from the last one upwards, then
 * the code as plain statements.
 */
function asyncCandidates(source: string): string[] {
  const original = source.split('\n');
  const lines = rewriteForAsync(source);
  const candidates: string[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  for (let start = lines.length - 1; start >= 0; start -= 1) {
    const head = original[start];
    if (head.trim().length === 0 || /^\s/.test(head) || STATEMENT_START_RE.test(head)) continue;
    const expression = lines.slice(start).join('\n').replace(/;\s*$/, '');
    candidates.push(wrapAsync([...lines.slice(0, start), `return (${expression}\n);`]));
  }
  candidates.push(wrapAsync(lines));
  return candidates;
}

/**
 * Runs example code in a shared `vm` context. Output written through the
 * namespace or to process.stdout is collected in `out`; the completion value
 * is echoed after it and an uncaught error is reduced to one line.
 */
export class Evaluator {
  private readonly context: vm.Context;

  private readonly transcript: string;

  private readonly out: OutputBuffer;

  private readonly log: LogCallback;

  constructor(context: vm.Context, opts: EvaluatorOptions) {
    this.context = context;
    this.transcript = opts.transcript;
    this.out = opts.out;
    this.log = opts.log ?? noopLog;
  }

  public async evaluate(example: EvaluationSource): Promise<string> {
    const stdout = new StreamCapture(process.stdout, {
      label: 'stdout',
      forward: (text) => { this.out.write(text); },
    });
    await within(stdout, async () => {
      try {
        const value = await this.execute(example);
        if (value !== undefined) this.out.write(`${displayValue(value)}\n`);
      } catch (error) {
        this.log(makeLogEntry('VRB', 'evaluator', formatUncaught(error), {
          transcript: this.transcript,
          example: example.index,
        }));
        this.out.write(`${formatUncaught(error)}\n`);
      }
    });
    return this.out.take();
  }

  private async execute(example: EvaluationSource): Promise<unknown> {
    const script = this.compile(example);
    const value: unknown = script.runInContext(this.context, { displayErrors: false });
    return isThenable(value) ? await value : value;
  }

  private compile(example: EvaluationSource): vm.Script {
    const filename = `${this.transcript}:${String(example.line)}`;
    if (!AWAIT_RE.test(example.source)) {
      return new vm.Script(rewriteDeclarations(example.source), { filename, lineOffset: example.line - 1 });
    }
    // the async wrapper adds one line ahead of the example
    const lineOffset = example.line - 2;
    let firstError: unknown;
    // eslint-disable-next-line functional/no-loop-statements
    for (const code of asyncCandidates(example.source)) {
      try {
        return new vm.Script(code, { filename, lineOffset });
      } catch (error) {
        firstError ??= error;
      }
    }
    throw firstError;
  }
}

function wrapAsync(lines: readonly string[]): string {
  return `(async () => {\n${lines.join('\n')}\n})()`;
}
