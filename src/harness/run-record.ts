import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { inspect } from 'node:util';

import * as yaml from 'js-yaml';

import type { FlagValue } from '../types.js';

import { isPlainObject } from '../utils.js';

export const RUN_META_DIR = '.run';
export const RUNS_DIR = 'runs';

export type RunStatus = 'running' | 'completed' | 'error' | 'pending';

/** 32 lowercase hex characters, unique per call. */
export function mkRunId(): string {
  return crypto.randomUUID().replace(/-/g, '');
}

export function runsDirFor(home: string): string {
  return path.join(home, RUNS_DIR);
}

function attrPath(runDir: string, name: string): string {
  return path.join(runDir, RUN_META_DIR, 'attrs', name);
}

export function writeRunAttr(runDir: string, name: string, value: unknown): void {
  const file = attrPath(runDir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, yaml.dump(value), 'utf-8');
}

function isFlagValue(value: unknown): value is FlagValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

/** Read-only view of one run directory and its attributes. */
export class RunRecord {
  public readonly id: string;

  public readonly dir: string;

  constructor(id: string, dir: string) {
    this.id = id;
    this.dir = dir;
  }

  public static fromDir(dir: string): RunRecord {
    return new RunRecord(path.basename(dir), dir);
  }

  public get path(): string {
    return this.dir;
  }

  public get shortId(): string {
    return this.id.slice(0, 8);
  }

  public get(name: string, fallback?: unknown): unknown {
    let raw: string;
    try {
      raw = fs.readFileSync(attrPath(this.dir, name), 'utf-8');
    } catch {
      return fallback;
    }
    const value: unknown = yaml.load(raw);
    return value === undefined ? fallback : value;
  }

  public get opref(): string {
    const value = this.get('opref');
    return typeof value === 'string' ? value : '';
  }

  public get flags(): Record<string, FlagValue> {
    const value = this.get('flags');
    if (!isPlainObject(value)) return {};
    return Object.fromEntries(Object.entries(value).filter((entry): entry is [string, FlagValue] => isFlagValue(entry[1])));
  }

  public get label(): string | undefined {
    const value = this.get('label');
    return typeof value === 'string' ? value : undefined;
  }

  public get started(): number | undefined {
    const value = this.get('started');
    return typeof value === 'number' ? value : undefined;
  }

  public get marked(): boolean {
    return this.get('marked') === true;
  }

  public get status(): RunStatus {
    if (fs.existsSync(path.join(this.dir, RUN_META_DIR, 'LOCK'))) return 'running';
    const exitStatus = this.get('exit_status');
    if (exitStatus === undefined) {
      return fs.existsSync(path.join(this.dir, RUN_META_DIR, 'PENDING')) ? 'pending' : 'error';
    }
    return exitStatus === 0 ? 'completed' : 'error';
  }

  public toString(): string {
    return `<RunRecord '${this.id}'>`;
  }

  public [inspect.custom](): string {
    return this.toString();
  }
}
