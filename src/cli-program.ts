import path from 'node:path';

import { Command, CommanderError, Option } from 'commander';

import type { RunnerConfig } from './config.js';
import type { OperationApi } from './harness/operation-api.js';
import type { TextSink } from './types.js';

import { CaptureScopeSchema, LogFormatSchema } from './config.js';
import { ConfigError, loadRunnerConfig } from './config-resolver.js';
import { listTranscripts, runAll, runTranscripts } from './engine/runner.js';
import { CliOperationApi } from './harness/operation-api.js';
import { makeLogCallback } from './log-sink.js';
import { makeLogEntry, setWarningSink } from './utils.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INVALID = 4;

export interface CliIo {
  stdout: TextSink;
  stderr: TextSink;
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
  /** Stand-in for the spawned command line, used by tests */
  api?: OperationApi;
}

interface CliOptions {
  testsDir?: string;
  skip: string[];
  config?: string;
  list?: boolean;
  reportOnlyFirstFailure?: boolean;
  captureScope?: RunnerConfig['captureScope'];
  logFormat?: RunnerConfig['logging']['format'];
  verbose?: boolean;
  trace?: boolean;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export function createProgram(io: CliIo): Command {
  const program = new Command();
  program
    .name('transcript-runner')
    .description('Run the interactive examples in documentation files and compare their output')
    .argument('[names...]', 'transcript names or paths (default: every transcript in the tests directory)')
    .option('-d, --tests-dir <dir>', 'directory holding the transcripts')
    .option('-s, --skip <name>', 'report a transcript as skipped without running it (repeatable)', collect, [])
    .option('-c, --config <file>', 'configuration file (JSON)')
    .option('--list', 'list the transcripts that would run and exit')
    .option('--report-only-first-failure', 'report only the first failing example of each file')
    .addOption(new Option('--capture-scope <scope>', 'lifetime of {{name}} captures').choices(CaptureScopeSchema.options))
    .addOption(new Option('--log-format <fmt>', 'log output format').choices(LogFormatSchema.options))
    .option('-v, --verbose', 'log every example')
    .option('--trace', 'log run directory decisions and spawned commands')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => { io.stdout.write(text); },
      writeErr: (text) => { io.stderr.write(text); },
    });
  return program;
}

function applyOptions(config: RunnerConfig, opts: CliOptions, cwd: string): RunnerConfig {
  const next: RunnerConfig = { ...config, logging: { ...config.logging } };
  if (opts.testsDir !== undefined) next.testsDir = path.resolve(cwd, opts.testsDir);
  if (opts.reportOnlyFirstFailure === true) next.reportOnlyFirstFailure = true;
  if (opts.captureScope !== undefined) next.captureScope = opts.captureScope;
  if (opts.logFormat !== undefined) next.logging.format = opts.logFormat;
  if (opts.verbose === true) next.logging.verbose = true;
  if (opts.trace === true) next.logging.trace = true;
  return next;
}

/** Parse `argv` (without the node and script entries), run, and resolve to the exit code. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const cwd = io.cwd ?? process.cwd();
  setWarningSink((message) => { io.stderr.write(`[warn] ${message}\n`); });
  const program = createProgram(io);
  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  const opts = program.opts<CliOptions>();
  const names = program.args;

  let config: RunnerConfig;
  try {
    config = applyOptions(loadRunnerConfig({ configPath: opts.config, cwd, home: io.home, env: io.env }), opts, cwd);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr.write(`error: ${error.message}\n`);
      return EXIT_INVALID;
    }
    throw error;
  }

  if (opts.list === true) {
    listTranscripts(config).forEach((name) => { io.stdout.write(`${name}\n`); });
    return EXIT_OK;
  }

  const log = config.logging.format === 'none'
    ? undefined
    : makeLogCallback({ ...config.logging }, (line) => { io.stderr.write(line); });
  log?.(makeLogEntry('TRC', 'config', `tests dir ${config.testsDir}`, { details: { captureScope: config.captureScope } }));
  const api = io.api ?? new CliOperationApi(config.operations, { log });
  const runnerOpts = { config, api, out: io.stdout, log, skip: opts.skip };
  const ok = names.length > 0 ? await runTranscripts(names, runnerOpts) : await runAll(runnerOpts);
  return ok ? EXIT_OK : EXIT_FAILED;
}
