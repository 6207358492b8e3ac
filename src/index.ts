// Main library exports for programmatic use
export { runAll, runTranscriptFile, runTranscripts, listTranscripts } from './engine/runner.js';
export { Evaluator, OutputBuffer, formatUncaught } from './engine/evaluator.js';
export { buildNamespace } from './engine/namespace.js';
export { matchOutput } from './matching/output-matcher.js';
export { parseTranscript, readTranscriptHead, TranscriptParseError } from './transcript/parser.js';
export { discoverTranscripts, TranscriptNotFoundError } from './transcript/discovery.js';
export { Chdir, Env, SearchPathGuard, UserConfig } from './scope/guards.js';
export { LogCapture, StderrCapture, TempFile } from './scope/captures.js';
export { ScopeStack, GuardStateError, within, withinSync } from './scope/scope-stack.js';
export { ConfigSource } from './scope/config-source.js';
export { SearchPath } from './scope/search-path.js';
export { Project } from './harness/project.js';
export { CliOperationApi } from './harness/operation-api.js';
export { resolveRunDir } from './harness/run-dir-resolver.js';
export { RunStore } from './harness/run-store.js';
export { RunRecord, mkRunId } from './harness/run-record.js';
export { InvalidRunRequestError, RunError, RunLookupError } from './harness/errors.js';
export { ConfigError, loadRunnerConfig } from './config-resolver.js';
export { runCli } from './cli-program.js';

// Type exports
export type { RunnerOptions, FileResult } from './engine/runner.js';
export type { MatchResult, Bindings } from './matching/output-matcher.js';
export type { OptionFlag, OptionFlags } from './matching/option-flags.js';
export type { Example, TranscriptHead } from './transcript/parser.js';
export type { TranscriptFile } from './transcript/discovery.js';
export type { ScopeGuard } from './scope/scope-stack.js';
export type { OperationApi, OperationContext, RunRequest } from './harness/operation-api.js';
export type { RunnerConfig, OperationsConfig } from './config.js';
export type { LogEntry, LogCallback } from './types.js';
