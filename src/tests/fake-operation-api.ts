import fs from 'node:fs';
import path from 'node:path';

import type { CommandOptions, OperationApi, OperationContext, RunRequest } from '../harness/operation-api.js';
import type { FlagValue } from '../types.js';

import { RunError } from '../harness/errors.js';
import { writeRunAttr } from '../harness/run-record.js';
import { RunStore } from '../harness/run-store.js';

export interface FakeCall {
  command: string;
  args: readonly string[];
  ctx: OperationContext;
  /** Value of the watched variable while the call ran */
  watchedEnv?: string;
}

export interface RunSeed {
  opref: string;
  started: number;
  flags?: Record<string, FlagValue>;
  label?: string;
  exitStatus?: number;
  marked?: boolean;
}

/** Write a finished run the way the tracked system leaves one on disk. */
export function seedRun(runDir: string, seed: RunSeed): void {
  fs.mkdirSync(runDir, { recursive: true });
  writeRunAttr(runDir, 'opref', seed.opref);
  writeRunAttr(runDir, 'started', seed.started);
  writeRunAttr(runDir, 'flags', seed.flags ?? {});
  if (seed.label !== undefined) writeRunAttr(runDir, 'label', seed.label);
  if (seed.exitStatus !== undefined) writeRunAttr(runDir, 'exit_status', seed.exitStatus);
  if (seed.marked === true) writeRunAttr(runDir, 'marked', true);
}

/**
 * In-process stand-in for the tracked system's command line. `run` writes a
 * run directory; an opspec starting with `fail` exits with status 2.
 */
export class FakeOperationApi implements OperationApi {
  public readonly calls: FakeCall[] = [];

  private clock = 1000;

  private readonly watchEnv?: string;

  constructor(opts: { watchEnv?: string } = {}) {
    this.watchEnv = opts.watchEnv;
  }

  public async runCaptureOutput(request: RunRequest, ctx: OperationContext): Promise<string> {
    this.record('run', [request.opspec ?? ''], ctx);
    await Promise.resolve();
    const store = new RunStore(ctx.home);
    const selector = request.rerun ?? request.restart;
    const runDir = request.runDir ?? (selector !== undefined ? store.findOne(selector).dir : undefined);
    if (runDir === undefined) throw new RunError('no run directory given\n', 1);
    const opspec = request.opspec ?? (selector !== undefined ? store.findOne(selector).opref : 'unknown');
    this.clock += 1;
    const failing = opspec.startsWith('fail');
    seedRun(runDir, {
      opref: opspec,
      started: this.clock,
      flags: request.flags,
      label: request.label,
      exitStatus: failing ? 2 : 0,
    });
    if (failing) throw new RunError(`${opspec}: something went wrong\n`, 2, ['runctl', 'run']);
    const flags = Object.entries(request.flags ?? {}).map(([name, value]) => `${name}=${String(value)}`).join(' ');
    const trials = request.printTrials === true ? `trial ${path.basename(runDir).slice(0, 8)}: ${flags}\n` : '';
    return `${trials}INFO: [runctl] running ${opspec}${flags.length > 0 ? ` ${flags}` : ''}\n\n`;
  }

  public async runQuiet(request: RunRequest, ctx: OperationContext): Promise<void> {
    await this.runCaptureOutput(request, ctx);
  }

  public async deleteRuns(runs: readonly string[], ctx: OperationContext): Promise<void> {
    this.record('delete', runs, ctx);
    await Promise.resolve();
    const store = new RunStore(ctx.home);
    store.select(runs).forEach((run) => { fs.rmSync(run.dir, { recursive: true, force: true }); });
  }

  public async mark(runs: readonly string[], ctx: OperationContext): Promise<void> {
    this.record('mark', runs, ctx);
    await Promise.resolve();
    new RunStore(ctx.home).select(runs).forEach((run) => { writeRunAttr(run.dir, 'marked', true); });
  }

  public async compare(runs: readonly string[], ctx: OperationContext, opts?: CommandOptions): Promise<string> {
    this.record('compare', [...runs, ...Object.keys(opts ?? {})], ctx);
    await Promise.resolve();
    const store = new RunStore(ctx.home);
    const selected = runs.length > 0 ? store.select(runs) : store.list();
    return selected.map((run) => `${run.shortId} ${run.opref} ${run.status}`).join('\n');
  }

  public async publish(runs: readonly string[], ctx: OperationContext): Promise<void> {
    this.record('publish', runs, ctx);
    await Promise.resolve();
  }

  public async package(ctx: OperationContext): Promise<void> {
    this.record('package', [], ctx);
    await Promise.resolve();
  }

  public async label(runs: readonly string[], ctx: OperationContext, opts?: CommandOptions): Promise<void> {
    this.record('label', runs, ctx);
    await Promise.resolve();
    const value = opts?.set;
    if (typeof value !== 'string') return;
    new RunStore(ctx.home).select(runs).forEach((run) => { writeRunAttr(run.dir, 'label', value); });
  }

  private record(command: string, args: readonly string[], ctx: OperationContext): void {
    const call: FakeCall = { command, args: [...args], ctx };
    if (this.watchEnv !== undefined) call.watchedEnv = process.env[this.watchEnv];
    this.calls.push(call);
  }
}
