import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { TextSink } from '../types.js';

import { getWarningSink, setWarningSink } from '../utils.js';

import { StateGuard } from './guards.js';

type WriteFn = typeof process.stdout.write;

function chunkText(chunk: string | Uint8Array): string {
  return typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8');
}

/** Redirects writes on a process stream into memory for the life of the scope. */
export class StreamCapture extends StateGuard<WriteFn> {
  protected readonly label: string;

  private readonly stream: NodeJS.WriteStream;

  private readonly parts: string[] = [];

  private readonly forward?: (text: string) => void;

  constructor(stream: NodeJS.WriteStream, opts: { label?: string; forward?: (text: string) => void } = {}) {
    super();
    this.stream = stream;
    this.label = opts.label ?? 'StreamCapture';
    this.forward = opts.forward;
  }

  public get text(): string {
    return this.parts.join('');
  }

  public clear(): void {
    this.parts.length = 0;
  }

  protected capture(): WriteFn {
    return this.stream.write;
  }

  protected install(): void {
    this.parts.length = 0;
    this.stream.write = (chunk: string | Uint8Array, encodingOrCb?: unknown, cb?: unknown): boolean => {
      const text = chunkText(chunk);
      this.parts.push(text);
      this.forward?.(text);
      const callback = typeof encodingOrCb === 'function' ? encodingOrCb : cb;
      if (typeof callback === 'function') callback();
      return true;
    };
  }

  protected restore(previous: WriteFn): void {
    this.stream.write = previous;
  }
}

/** Collects stderr; `print()` replays what was written to the transcript output. */
export class StderrCapture extends StreamCapture {
  private readonly out: TextSink;

  constructor(out: TextSink = process.stdout) {
    super(process.stderr, { label: 'StderrCapture' });
    this.out = out;
  }

  public print(): void {
    this.out.write(this.text);
  }
}

/** Collects messages sent through `warn()` while active. */
export class LogCapture extends StateGuard<((message: string) => void) | undefined> {
  protected readonly label = 'LogCapture';

  private readonly messages: string[] = [];

  private readonly out: TextSink;

  constructor(out: TextSink = process.stdout) {
    super();
    this.out = out;
  }

  public get(): string[] {
    return [...this.messages];
  }

  public print(): void {
    this.messages.forEach((message) => {
      this.out.write(`${message}\n`);
    });
  }

  protected capture(): ((message: string) => void) | undefined {
    return getWarningSink();
  }

  protected install(): void {
    this.messages.length = 0;
    setWarningSink((message) => {
      this.messages.push(message);
    });
  }

  protected restore(previous: ((message: string) => void) | undefined): void {
    setWarningSink(previous);
  }
}

/** A fresh empty temp file that is removed when the scope exits. */
export class TempFile extends StateGuard<undefined> {
  protected readonly label = 'TempFile';

  private readonly prefix: string;

  private dir?: string;

  private file?: string;

  constructor(prefix = 'transcript-') {
    super();
    this.prefix = prefix;
  }

  public get path(): string {
    if (this.file === undefined) throw new Error('TempFile path is only available inside its scope');
    return this.file;
  }

  protected capture(): undefined {
    return undefined;
  }

  protected install(): void {
    this.dir = fs.mkdtempSync(path.join(os.tmpdir(), this.prefix));
    this.file = path.join(this.dir, 'file');
    fs.writeFileSync(this.file, '');
  }

  protected restore(): void {
    if (this.dir !== undefined) fs.rmSync(this.dir, { recursive: true, force: true });
    this.dir = undefined;
    this.file = undefined;
  }
}
