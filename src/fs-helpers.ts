import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import picomatch from 'picomatch';

import { runsDirFor } from './harness/run-record.js';

export type PrintFn = (text: string) => void;

export interface FindOptions {
  followLinks?: boolean;
}

/**
 * Files below `root`, relative to it and sorted. Symlinked directories are
 * listed as entries and only descended into with `followLinks`.
 */
export function findPaths(root: string, opts: FindOptions = {}): string[] {
  const found: string[] = [];
  const walk = (dir: string): void => {
    fs.readdirSync(dir, { withFileTypes: true }).forEach((entry) => {
      const full = path.join(dir, entry.name);
      const rel = path.relative(root, full);
      if (entry.isSymbolicLink()) {
        let isDir = false;
        try {
          isDir = fs.statSync(full).isDirectory();
        } catch {
          // dangling link
        }
        found.push(rel);
        if (isDir && opts.followLinks === true) walk(full);
        return;
      }
      if (entry.isDirectory()) {
        walk(full);
        return;
      }
      found.push(rel);
    });
  };
  walk(root);
  return found.sort();
}

/** Print the paths below `root`, one per line, or `<empty>`. */
export function find(root: string, print: PrintFn, opts: FindOptions = {}): void {
  const paths = findPaths(root, opts);
  if (paths.length === 0) {
    print('<empty>\n');
    return;
  }
  paths.forEach((p) => { print(`${p}\n`); });
}

export function cat(print: PrintFn, ...parts: string[]): void {
  const text = fs.readFileSync(path.join(...parts), 'utf-8');
  print(text.endsWith('\n') ? text : `${text}\n`);
}

/** Sorted directory entries, minus names matching any `ignore` glob. */
export function dir(dirPath: string, ignore?: readonly string[]): string[] {
  const isIgnored = ignore !== undefined && ignore.length > 0
    ? picomatch([...ignore], { dot: true })
    : undefined;
  return fs.readdirSync(dirPath)
    .filter((name) => isIgnored === undefined || !isIgnored(name))
    .sort();
}

export function write(filename: string, contents: string): void {
  fs.writeFileSync(filename, contents, 'utf-8');
}

/** Create `filename` if missing, otherwise bump its timestamps. */
export function touch(filename: string): void {
  const now = new Date();
  try {
    fs.utimesSync(filename, now, now);
  } catch {
    fs.closeSync(fs.openSync(filename, 'a'));
  }
}

export function sha256(filename: string): string {
  return crypto.createHash('sha256').update(fs.readFileSync(filename)).digest('hex');
}

export function copytree(src: string, dest: string): void {
  fs.cpSync(src, dest, { recursive: true, verbatimSymlinks: true });
}

export function comparePaths(a: string, b: string): boolean {
  const real = (p: string): string => {
    try {
      return fs.realpathSync(p);
    } catch {
      return path.resolve(p);
    }
  };
  return real(a) === real(b);
}

export function mkdtemp(prefix = 'transcript-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Create the layout of an empty storage root. */
export function initHome(home: string): string {
  fs.mkdirSync(runsDirFor(home), { recursive: true });
  return home;
}

export function mktempHome(): string {
  return initHome(mkdtemp());
}

export function samplesDir(testsDir: string): string {
  return path.join(testsDir, 'samples');
}

export function sample(testsDir: string, ...parts: string[]): string {
  return path.join(samplesDir(testsDir), ...parts);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => { setTimeout(resolve, ms); });
}
