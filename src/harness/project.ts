import fs from 'node:fs';
import path from 'node:path';

import type { OperationsConfig } from '../config.js';
import type { ConfigSource } from '../scope/config-source.js';
import type { SearchPath } from '../scope/search-path.js';
import type { FlagValue, LogCallback } from '../types.js';
import type { CommandOptions, OperationApi, OperationContext, RunRequest } from './operation-api.js';
import type { RunFilter } from './run-store.js';

import { findPaths, mkdtemp } from '../fs-helpers.js';
import { Chdir, Env } from '../scope/guards.js';
import { within, withinSync } from '../scope/scope-stack.js';
import { makeLogEntry, noopLog } from '../utils.js';

import { RunError } from './errors.js';
import { formatFlagValue } from './operation-api.js';
import { resolveRunDir } from './run-dir-resolver.js';
import { RUN_META_DIR, RunRecord } from './run-record.js';
import { RunStore } from './run-store.js';
import { formatTable } from './table.js';

export interface ProjectDeps {
  api: OperationApi;
  operations: Pick<OperationsConfig, 'noWarnEnv'>;
  searchPath?: SearchPath;
  userConfig?: ConfigSource;
  /** Receives everything the project prints */
  print: (text: string) => void;
  log?: LogCallback;
}

export interface RunArgs extends RunRequest {
  /** Working directory relative to the project directory */
  cwd?: string;
  simplifyTrialOutput?: boolean;
}

export interface PrintRunsOptions {
  runs?: readonly RunRecord[];
  flags?: boolean;
  labels?: boolean;
  status?: boolean;
  cwd?: string;
}

export type RunRef = string | RunRecord;

const SIMPLIFY_TRIAL_OUTPUT_PATTERNS: [RegExp, string][] = [
  [/INFO: \[[\w-]+\] /g, ''],
  [/trial [a-f0-9]+/g, 'trial'],
];

export function flagsDesc(flags: Record<string, FlagValue>, delim = ' '): string {
  return Object.keys(flags).sort().map((name) => `${name}=${formatFlagValue(flags[name])}`).join(delim);
}

/**
 * A project directory plus a private storage root, driven the way a user
 * drives the tracked system from the command line.
 */
export class Project {
  public readonly cwd: string;

  public readonly home: string;

  public readonly store: RunStore;

  private readonly deps: ProjectDeps;

  private readonly log: LogCallback;

  constructor(cwd: string, home: string | undefined, deps: ProjectDeps) {
    this.cwd = cwd;
    this.home = home ?? mkdtemp();
    this.store = new RunStore(this.home);
    this.deps = deps;
    this.log = deps.log ?? noopLog;
  }

  /** Run an operation; resolves to the run it produced and its trimmed output. */
  public async runCapture(opspec?: string, args: RunArgs = {}): Promise<[RunRecord, string]> {
    const { cwd, simplifyTrialOutput, ...request } = args;
    const resolved = resolveRunDir({ ...request, opspec: opspec ?? request.opspec }, this.store);
    this.log(makeLogEntry('TRC', 'resolver', `run dir ${resolved.runDir}`, { details: { source: resolved.source } }));
    let out = await within(new Env({ [this.deps.operations.noWarnEnv]: '1' }), () => (
      this.deps.api.runCaptureOutput(resolved.request, this.context(cwd))
    ));
    if (simplifyTrialOutput === true) out = simplifyTrials(out);
    return [RunRecord.fromDir(resolved.runDir), out.trim()];
  }

  /** Print the output of a run, or its output and exit status when it fails. */
  public async run(opspec?: string, args: RunArgs = {}): Promise<void> {
    try {
      const [, out] = await this.runCapture(opspec, args);
      this.println(out);
    } catch (error) {
      if (!(error instanceof RunError)) throw error;
      this.println(`${error.output.trim()}\n<exit ${String(error.exitCode)}>`);
    }
  }

  public async runQuiet(opspec?: string, args: RunArgs = {}): Promise<void> {
    const { cwd, ...request } = args;
    delete request.simplifyTrialOutput;
    await within(new Env({ [this.deps.operations.noWarnEnv]: '1' }), () => (
      this.deps.api.runQuiet({ ...request, opspec: opspec ?? request.opspec }, this.context(cwd))
    ));
  }

  public async printTrials(opspec?: string, args: RunArgs = {}): Promise<void> {
    const [, out] = await this.runCapture(opspec, { ...args, printTrials: true });
    this.println(out);
  }

  public listRuns(filter: RunFilter = {}): RunRecord[] {
    return this.store.list(filter);
  }

  public printRuns(opts: PrintRunsOptions = {}): void {
    const cwd = opts.cwd !== undefined ? path.join(this.cwd, opts.cwd) : this.cwd;
    const runs = opts.runs ?? this.listRuns();
    const cols = ['opspec'];
    if (opts.flags === true) cols.push('flags');
    if (opts.labels === true) cols.push('label');
    if (opts.status === true) cols.push('status');
    const rows = withinSync(new Chdir(cwd), () => runs.map((run) => {
      const row: Record<string, string> = { opspec: run.opref };
      if (opts.flags === true) row.flags = flagsDesc(run.flags);
      if (opts.labels === true) row.label = run.label ?? '';
      if (opts.status === true) row.status = run.status;
      return row;
    }));
    formatTable(rows, cols).forEach((line) => { this.println(line); });
  }

  public async deleteRuns(runs?: readonly RunRef[], opts: CommandOptions = {}): Promise<void> {
    await this.deps.api.deleteRuns(this.ids(runs), this.context(), opts);
  }

  public async mark(runs?: readonly RunRef[], opts: CommandOptions = {}): Promise<void> {
    await this.deps.api.mark(this.ids(runs), this.context(), opts);
  }

  public async compare(runs?: readonly RunRef[], opts: CommandOptions = {}): Promise<string> {
    return this.deps.api.compare(this.ids(runs), this.context(), opts);
  }

  public async publish(runs?: readonly RunRef[], opts: CommandOptions = {}): Promise<void> {
    await this.deps.api.publish(this.ids(runs), this.context(), opts);
  }

  public async package(opts: CommandOptions = {}): Promise<void> {
    await this.deps.api.package(this.context(), opts);
  }

  public async label(runs?: readonly RunRef[], opts: CommandOptions = {}): Promise<void> {
    await this.deps.api.label(this.ids(runs), this.context(), opts);
  }

  /** Files in a run directory. Metadata is left out unless `all`; `sourcecode` lists only the source snapshot. */
  public static ls(run: RunRecord, opts: { all?: boolean; sourcecode?: boolean } = {}): string[] {
    const sourcecodePrefix = path.join(RUN_META_DIR, 'sourcecode');
    return findPaths(run.path).filter((p) => {
      if (opts.all === true) return true;
      if (opts.sourcecode === true) return p.startsWith(sourcecodePrefix);
      return !p.startsWith(RUN_META_DIR);
    });
  }

  public cat(run: RunRecord, relPath: string): void {
    this.println(fs.readFileSync(path.join(run.path, relPath), 'utf-8'));
  }

  private ids(runs: readonly RunRef[] | undefined): string[] {
    return (runs ?? []).map((run) => (typeof run === 'string' ? run : run.id));
  }

  private context(cwd?: string): OperationContext {
    const ctx: OperationContext = {
      home: this.home,
      cwd: path.join(this.cwd, cwd ?? '.'),
    };
    if (this.deps.searchPath !== undefined) ctx.searchPath = this.deps.searchPath.get();
    const configFile = this.deps.userConfig?.materialize();
    if (configFile !== undefined) ctx.userConfigFile = configFile;
    return ctx;
  }

  private println(text: string): void {
    this.deps.print(text.endsWith('\n') ? text : `${text}\n`);
  }
}

export function simplifyTrials(out: string): string {
  return SIMPLIFY_TRIAL_OUTPUT_PATTERNS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), out);
}
