import fs from 'node:fs';
import path from 'node:path';

import { RunLookupError } from './errors.js';
import { RunRecord, runsDirFor, type RunStatus } from './run-record.js';

export interface RunFilter {
  /** Operation names; a run matches when its opref is or ends with one */
  ops?: readonly string[];
  labels?: readonly string[];
  marked?: boolean;
  status?: readonly RunStatus[];
}

function matchesOp(run: RunRecord, op: string): boolean {
  const opref = run.opref;
  return opref === op || opref.endsWith(`:${op}`);
}

function newestFirst(a: RunRecord, b: RunRecord): number {
  const diff = (b.started ?? 0) - (a.started ?? 0);
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : (a.id > b.id ? 1 : 0);
}

/** Runs kept under one storage root (`<home>/runs/<id>`). */
export class RunStore {
  public readonly home: string;

  constructor(home: string) {
    this.home = home;
  }

  public get runsDir(): string {
    return runsDirFor(this.home);
  }

  /** All runs, newest first. */
  public list(filter: RunFilter = {}): RunRecord[] {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(this.runsDir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => RunRecord.fromDir(path.join(this.runsDir, entry.name)))
      .filter((run) => matchesFilter(run, filter))
      .sort(newestFirst);
  }

  /**
   * Exactly one run for `selector`: the marked (else latest) run of an
   * operation with that name, or the single run whose id starts with it.
   */
  public findOne(selector: string): RunRecord {
    const runs = this.list();
    const forOp = runs.filter((run) => matchesOp(run, selector));
    if (forOp.length > 0) {
      return forOp.find((run) => run.marked) ?? forOp[0];
    }
    const byId = runs.filter((run) => run.id.startsWith(selector));
    if (byId.length === 0) throw new RunLookupError(selector, 'none');
    if (byId.length > 1) throw new RunLookupError(selector, 'ambiguous', byId.map((run) => run.shortId));
    return byId[0];
  }

  /** Resolve ids, id prefixes or records to records; each must match one run. */
  public select(refs: readonly (string | RunRecord)[]): RunRecord[] {
    return refs.map((ref) => (typeof ref === 'string' ? this.findOne(ref) : ref));
  }
}

function matchesFilter(run: RunRecord, filter: RunFilter): boolean {
  if (filter.ops !== undefined && filter.ops.length > 0 && !filter.ops.some((op) => matchesOp(run, op))) return false;
  if (filter.labels !== undefined && filter.labels.length > 0) {
    const label = run.label ?? '';
    if (!filter.labels.some((wanted) => label.includes(wanted))) return false;
  }
  if (filter.marked === true && !run.marked) return false;
  if (filter.status !== undefined && filter.status.length > 0 && !filter.status.includes(run.status)) return false;
  return true;
}
