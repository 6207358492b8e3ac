import path from 'node:path';

import type { RunStore } from './run-store.js';

import { InvalidRunRequestError } from './errors.js';
import { mkRunId, runsDirFor } from './run-record.js';

export interface RunDirRequest {
  runDir?: string;
  rerun?: string;
  restart?: string;
}

export type RunDirSource = 'explicit' | 'rerun' | 'restart' | 'new';

export interface ResolvedRunDir<R extends RunDirRequest> {
  runDir: string;
  source: RunDirSource;
  /** The request to pass on; always carries `runDir` for a new run */
  request: R;
}

function nonEmpty(value: string | undefined): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Decide the run directory before the operation runs, so the caller can
 * open the resulting run without a second lookup:
 * an explicit directory wins, then a rerun/restart selector (which must
 * match exactly one run), otherwise a new id under `<home>/runs`. The new
 * directory is not created here.
 */
export function resolveRunDir<R extends RunDirRequest>(request: R, store: RunStore): ResolvedRunDir<R> {
  if (nonEmpty(request.runDir)) {
    return { runDir: request.runDir, source: 'explicit', request };
  }
  if (nonEmpty(request.rerun) && nonEmpty(request.restart)) {
    throw new InvalidRunRequestError('rerun and restart cannot be used together');
  }
  if (nonEmpty(request.rerun)) {
    return { runDir: store.findOne(request.rerun).dir, source: 'rerun', request };
  }
  if (nonEmpty(request.restart)) {
    return { runDir: store.findOne(request.restart).dir, source: 'restart', request };
  }
  const runDir = path.join(runsDirFor(store.home), mkRunId());
  return { runDir, source: 'new', request: { ...request, runDir } };
}
