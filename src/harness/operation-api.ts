import { spawn } from 'node:child_process';
import path from 'node:path';

import type { OperationsConfig } from '../config.js';
import type { FlagValue, LogCallback } from '../types.js';

import { makeLogEntry, noopLog } from '../utils.js';

import { RunError } from './errors.js';

/** Where an operation runs: the storage root, working directory and process overlay. */
export interface OperationContext {
  home: string;
  cwd: string;
  /** Module search path handed to the operation as NODE_PATH */
  searchPath?: readonly string[];
  /** User config file to use instead of the default one */
  userConfigFile?: string;
  env?: Record<string, string>;
}

export interface RunRequest {
  opspec?: string;
  flags?: Record<string, FlagValue>;
  runDir?: string;
  rerun?: string;
  restart?: string;
  label?: string;
  printTrials?: boolean;
  /** Further arguments passed through as given */
  extraArgs?: readonly string[];
}

export type CommandOptionValue = FlagValue | undefined | readonly string[];

/** Options of the pass-through commands, rendered as `--kebab-case value`. */
export type CommandOptions = Record<string, CommandOptionValue>;

/** The tracked system's operations, as the harness calls them. */
export interface OperationApi {
  runCaptureOutput: (request: RunRequest, ctx: OperationContext) => Promise<string>;
  runQuiet: (request: RunRequest, ctx: OperationContext) => Promise<void>;
  deleteRuns: (runs: readonly string[], ctx: OperationContext, opts?: CommandOptions) => Promise<void>;
  mark: (runs: readonly string[], ctx: OperationContext, opts?: CommandOptions) => Promise<void>;
  compare: (runs: readonly string[], ctx: OperationContext, opts?: CommandOptions) => Promise<string>;
  publish: (runs: readonly string[], ctx: OperationContext, opts?: CommandOptions) => Promise<void>;
  package: (ctx: OperationContext, opts?: CommandOptions) => Promise<void>;
  label: (runs: readonly string[], ctx: OperationContext, opts?: CommandOptions) => Promise<void>;
}

export function formatFlagValue(value: FlagValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  return String(value);
}

function kebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

export function optionArgs(opts: CommandOptions = {}): string[] {
  const args: string[] = [];
  Object.entries(opts).forEach(([name, value]) => {
    const flag = `--${kebab(name)}`;
    if (value === undefined || value === null || value === false) return;
    if (value === true) {
      args.push(flag);
      return;
    }
    if (typeof value === 'string' || typeof value === 'number') {
      args.push(flag, String(value));
      return;
    }
    value.forEach((item) => args.push(flag, item));
  });
  return args;
}

export function runArgs(request: RunRequest): string[] {
  const args = ['run', '-y'];
  if (request.runDir !== undefined) args.push('--run-dir', request.runDir);
  if (request.rerun !== undefined) args.push('--rerun', request.rerun);
  if (request.restart !== undefined) args.push('--restart', request.restart);
  if (request.label !== undefined) args.push('--label', request.label);
  if (request.printTrials === true) args.push('--print-trials');
  if (request.opspec !== undefined) args.push(request.opspec);
  Object.entries(request.flags ?? {}).forEach(([name, value]) => {
    args.push(`${name}=${formatFlagValue(value)}`);
  });
  args.push(...(request.extraArgs ?? []));
  return args;
}

/** Runs the tracked system's command line in a child process. */
export class CliOperationApi implements OperationApi {
  private readonly config: OperationsConfig;

  private readonly log: LogCallback;

  constructor(config: OperationsConfig, opts: { log?: LogCallback } = {}) {
    this.config = config;
    this.log = opts.log ?? noopLog;
  }

  public async runCaptureOutput(request: RunRequest, ctx: OperationContext): Promise<string> {
    return this.exec(runArgs(request), ctx);
  }

  public async runQuiet(request: RunRequest, ctx: OperationContext): Promise<void> {
    await this.exec(runArgs(request), ctx);
  }

  public async deleteRuns(runs: readonly string[], ctx: OperationContext, opts?: CommandOptions): Promise<void> {
    await this.exec(['runs', 'delete', '-y', ...optionArgs(opts), ...runs], ctx);
  }

  public async mark(runs: readonly string[], ctx: OperationContext, opts?: CommandOptions): Promise<void> {
    await this.exec(['mark', '-y', ...optionArgs(opts), ...runs], ctx);
  }

  public async compare(runs: readonly string[], ctx: OperationContext, opts?: CommandOptions): Promise<string> {
    return this.exec(['compare', '--table', ...optionArgs(opts), ...runs], ctx);
  }

  public async publish(runs: readonly string[], ctx: OperationContext, opts?: CommandOptions): Promise<void> {
    await this.exec(['publish', '-y', ...optionArgs(opts), ...runs], ctx);
  }

  public async package(ctx: OperationContext, opts?: CommandOptions): Promise<void> {
    await this.exec(['package', ...optionArgs(opts)], ctx);
  }

  public async label(runs: readonly string[], ctx: OperationContext, opts?: CommandOptions): Promise<void> {
    await this.exec(['label', '-y', ...optionArgs(opts), ...runs], ctx);
  }

  private buildEnv(ctx: OperationContext): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env, [this.config.homeEnv]: ctx.home };
    if (ctx.searchPath !== undefined && ctx.searchPath.length > 0) {
      env.NODE_PATH = ctx.searchPath.join(path.delimiter);
    }
    if (ctx.userConfigFile !== undefined) env[this.config.userConfigEnv] = ctx.userConfigFile;
    return { ...env, ...(ctx.env ?? {}) };
  }

  /** Combined stdout and stderr; a non-zero exit rejects with RunError. */
  private exec(args: readonly string[], ctx: OperationContext): Promise<string> {
    const [program, ...baseArgs] = this.config.command;
    const argv = [...baseArgs, ...args];
    this.log(makeLogEntry('TRC', 'operation', `spawn ${[program, ...argv].join(' ')}`, { details: { cwd: ctx.cwd } }));
    return new Promise<string>((resolve, reject) => {
      const child = spawn(program, argv, {
        cwd: ctx.cwd,
        env: this.buildEnv(ctx),
        stdio: ['ignore', 'pipe', 'pipe'],
        timeout: this.config.timeoutMs,
      });
      const chunks: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => { chunks.push(chunk); });
      child.stderr.on('data', (chunk: Buffer) => { chunks.push(chunk); });
      child.on('error', (error) => {
        reject(new RunError(`${program}: ${error.message}`, 127, [program, ...argv]));
      });
      child.on('close', (code, signal) => {
        const output = Buffer.concat(chunks).toString('utf8');
        const exitCode = code ?? (signal !== null ? 128 : 1);
        this.log(makeLogEntry('TRC', 'operation', `exit ${String(exitCode)}`, { details: { program } }));
        if (exitCode === 0) resolve(output);
        else reject(new RunError(output, exitCode, [program, ...argv]));
      });
    });
  }
}
