import path from 'node:path';

import type { RunnerConfig } from '../config.js';
import type { OperationApi } from '../harness/operation-api.js';
import type { Bindings } from '../matching/output-matcher.js';
import type { OptionFlag } from '../matching/option-flags.js';
import type { TranscriptFile } from '../transcript/discovery.js';
import type { LogCallback, TextSink } from '../types.js';

import { applyOptionDelta, DEFAULT_FLAGS } from '../matching/option-flags.js';
import { EMPTY_BINDINGS, matchOutput } from '../matching/output-matcher.js';
import { ConfigSource } from '../scope/config-source.js';
import { SearchPath } from '../scope/search-path.js';
import {
  discoverTranscripts,
  readTranscriptText,
  resolveTranscript,
  TranscriptNotFoundError,
  transcriptNameFromPath,
} from '../transcript/discovery.js';
import { isPlatformSkipped, parseTranscript, readTranscriptHead, TranscriptParseError } from '../transcript/parser.js';
import { makeLogEntry, noopLog, padFor } from '../utils.js';

import { Evaluator, OutputBuffer } from './evaluator.js';
import { buildNamespace } from './namespace.js';
import { formatFailureReport, formatFailureSummary } from './report.js';

export interface RunnerOptions {
  config: RunnerConfig;
  api: OperationApi;
  /** Progress lines and failure reports */
  out: TextSink;
  log?: LogCallback;
  /** Transcript names reported as skipped without being read */
  skip?: readonly string[];
  /** Defaults to process.platform */
  platform?: string;
}

export type FileStatus = 'ok' | 'platform-skipped' | 'failed';

export interface FileResult {
  name: string;
  status: FileStatus;
  failures: number;
  /** Examples executed and compared */
  tried: number;
  /** Examples skipped by option or platform gate */
  skipped: number;
  reports: string[];
}

function initialFlags(config: RunnerConfig): OptionFlag[] {
  return config.reportOnlyFirstFailure ? [...DEFAULT_FLAGS, 'REPORT_ONLY_FIRST_FAILURE'] : [...DEFAULT_FLAGS];
}

/** Run every example of one transcript in a fresh namespace. */
export async function runTranscriptFile(file: TranscriptFile, opts: RunnerOptions): Promise<FileResult> {
  const { config } = opts;
  const log = opts.log ?? noopLog;
  const platform = opts.platform ?? process.platform;
  const text = readTranscriptText(file);
  const head = readTranscriptHead(text, file.name, config.headBytes);
  const result: FileResult = { name: file.name, status: 'ok', failures: 0, tried: 0, skipped: 0, reports: [] };
  if (isPlatformSkipped(head, platform)) {
    log(makeLogEntry('VRB', 'runner', `skipped on ${platform}`, { transcript: file.name }));
    return { ...result, status: 'platform-skipped' };
  }

  const examples = parseTranscript(text, file.name);
  const fileFlags = applyOptionDelta(initialFlags(config), head.options);
  const out = new OutputBuffer();
  const context = buildNamespace({
    out,
    api: opts.api,
    operations: config.operations,
    searchPath: new SearchPath(),
    userConfig: new ConfigSource(config.userConfigPath),
    testsDir: config.testsDir,
    log,
  });
  const evaluator = new Evaluator(context, { transcript: file.name, out, log });
  let bindings: Bindings = EMPTY_BINDINGS;

  // eslint-disable-next-line functional/no-loop-statements
  for (const example of examples) {
    const flags = applyOptionDelta(fileFlags, example.options);
    if (flags.has('SKIP') || (platform === config.gatePlatform && !flags.has('WINDOWS'))) {
      result.skipped += 1;
      continue;
    }
    result.tried += 1;
    // eslint-disable-next-line no-await-in-loop
    const got = await evaluator.evaluate(example);
    const match = matchOutput(example.want, got, flags, config.captureScope === 'file' ? bindings : EMPTY_BINDINGS);
    if (match.ok) {
      if (config.captureScope === 'file') bindings = match.bindings;
      log(makeLogEntry('VRB', 'runner', 'example passed', { transcript: file.name, example: example.index }));
      continue;
    }
    result.failures += 1;
    log(makeLogEntry('VRB', 'runner', 'example failed', {
      transcript: file.name,
      example: example.index,
      details: { line: example.line },
    }));
    if (flags.has('REPORT_ONLY_FIRST_FAILURE') && result.failures > 1) continue;
    result.reports.push(formatFailureReport({
      transcript: file.name,
      path: file.path,
      example,
      got,
      udiff: flags.has('REPORT_UDIFF'),
      normalized: { want: match.want, got: match.got },
    }));
  }
  if (result.failures > 0) {
    result.status = 'failed';
    result.reports.push(formatFailureSummary(file.name, result.failures, result.tried));
  }
  return result;
}

function fileForName(name: string, config: RunnerConfig): TranscriptFile {
  if (name.endsWith(config.extension) || name.includes('/') || name.includes(path.sep)) {
    return { name: transcriptNameFromPath(name), path: path.resolve(name) };
  }
  return resolveTranscript(config.testsDir, name, config.extension);
}

/**
 * Run the named transcripts in order, writing one status line per file.
 * Resolves true when every file passed.
 */
export async function runTranscripts(names: readonly string[], opts: RunnerOptions): Promise<boolean> {
  const { config, out } = opts;
  const log = opts.log ?? noopLog;
  const skip = opts.skip ?? [];
  const width = config.nameWidth;
  const started = Date.now();
  let success = true;
  let failedFiles = 0;
  out.write(`${config.title}:\n`);

  // eslint-disable-next-line functional/no-loop-statements
  for (const name of names) {
    const file = fileForName(name, config);
    const label = file.name;
    if (skip.includes(name) || skip.includes(label)) {
      out.write(`  ${label}:${padFor(label, width)} skipped\n`);
      continue;
    }
    const lead = `  ${label}: ${padFor(label, width)}`;
    let result: FileResult;
    try {
      // eslint-disable-next-line no-await-in-loop
      result = await runTranscriptFile(file, opts);
    } catch (error) {
      success = false;
      failedFiles += 1;
      if (error instanceof TranscriptNotFoundError) {
        out.write(`${lead}ERROR test not found\n`);
        log(makeLogEntry('ERR', 'runner', error.message, { transcript: label }));
        continue;
      }
      if (error instanceof TranscriptParseError) {
        out.write(`${lead}ERROR ${error.message}\n`);
        log(makeLogEntry('ERR', 'runner', error.message, { transcript: label }));
        continue;
      }
      throw error;
    }

    if (result.status === 'platform-skipped') {
      out.write(`${lead}ok (skipped)\n`);
    } else if (result.status === 'ok') {
      out.write(`${lead}ok\n`);
    } else {
      success = false;
      failedFiles += 1;
      out.write(`${lead}FAILED (${String(result.failures)} of ${String(result.tried)} examples)\n`);
      result.reports.forEach((report) => { out.write(report); });
    }
  }

  log(makeLogEntry('FIN', 'runner', success ? 'all transcripts passed' : 'some transcripts failed', {
    details: { transcripts: names.length, failed: failedFiles, durationMs: Date.now() - started },
  }));
  return success;
}

/** Run every transcript found in the configured directory. */
export async function runAll(opts: RunnerOptions): Promise<boolean> {
  const files = discoverTranscripts(opts.config.testsDir, opts.config.extension);
  return runTranscripts(files.map((file) => file.name), opts);
}

export function listTranscripts(config: RunnerConfig): string[] {
  return discoverTranscripts(config.testsDir, config.extension).map((file) => file.name);
}
