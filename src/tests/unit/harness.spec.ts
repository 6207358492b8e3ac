import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_OPERATIONS } from '../../config.js';
import { initHome } from '../../fs-helpers.js';
import { InvalidRunRequestError, RunLookupError } from '../../harness/errors.js';
import type { RunRequest } from '../../harness/operation-api.js';
import { formatFlagValue, optionArgs, runArgs } from '../../harness/operation-api.js';
import { Project, simplifyTrials } from '../../harness/project.js';
import { resolveRunDir } from '../../harness/run-dir-resolver.js';
import { RunRecord, runsDirFor } from '../../harness/run-record.js';
import { RunStore } from '../../harness/run-store.js';
import { ConfigSource } from '../../scope/config-source.js';
import { FakeOperationApi, seedRun } from '../fake-operation-api.js';

const NO_WARN = DEFAULT_OPERATIONS.noWarnEnv;

class TextCollector {
  public text = '';

  public write(text: string): void {
    this.text += text;
  }
}

describe('run directory resolution', () => {
  let home: string;
  let store: RunStore;

  beforeEach(() => {
    home = initHome(fs.mkdtempSync(path.join(os.tmpdir(), 'resolver-')));
    store = new RunStore(home);
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('uses an explicit directory as given', () => {
    const resolved = resolveRunDir({ runDir: '/somewhere/run', rerun: 'ignored' }, store);
    expect(resolved.runDir).toBe('/somewhere/run');
    expect(resolved.source).toBe('explicit');
  });

  it('mints a new id under the runs directory without creating it', () => {
    const resolved = resolveRunDir<RunRequest>({ opspec: 'train' }, store);
    expect(resolved.source).toBe('new');
    expect(path.dirname(resolved.runDir)).toBe(runsDirFor(home));
    expect(path.basename(resolved.runDir)).toMatch(/^[0-9a-f]{32}$/);
    expect(fs.existsSync(resolved.runDir)).toBe(false);
    expect(resolved.request).toEqual({ opspec: 'train', runDir: resolved.runDir });
  });

  it('gives each request without a selector its own directory', () => {
    const first = resolveRunDir<RunRequest>({ opspec: 'train' }, store);
    const second = resolveRunDir<RunRequest>({ opspec: 'train' }, store);
    expect(first.runDir).not.toBe(second.runDir);
    expect(path.dirname(first.runDir)).toBe(runsDirFor(home));
    expect(path.dirname(second.runDir)).toBe(runsDirFor(home));
  });

  it('rejects rerun and restart together', () => {
    expect(() => resolveRunDir({ rerun: 'a', restart: 'b' }, store)).toThrow(InvalidRunRequestError);
  });

  it('fails when a selector matches no run', () => {
    expect(() => resolveRunDir({ rerun: 'train' }, store)).toThrow("no run matches 'train'");
  });

  it('prefers the marked run of an operation, else the latest', () => {
    const older = path.join(runsDirFor(home), '11111111aaaa');
    const newer = path.join(runsDirFor(home), '22222222bbbb');
    seedRun(older, { opref: 'mnist:train', started: 1 });
    seedRun(newer, { opref: 'mnist:train', started: 2 });
    expect(resolveRunDir({ restart: 'train' }, store)).toEqual({ runDir: newer, source: 'restart', request: { restart: 'train' } });
    seedRun(older, { opref: 'mnist:train', started: 1, marked: true });
    expect(resolveRunDir({ rerun: 'train' }, store).runDir).toBe(older);
  });

  it('matches unique id prefixes and reports ambiguous ones', () => {
    seedRun(path.join(runsDirFor(home), 'aaaa1111xyz'), { opref: 'a', started: 1 });
    seedRun(path.join(runsDirFor(home), 'aaaa2222xyz'), { opref: 'b', started: 2 });
    expect(store.findOne('aaaa1').id).toBe('aaaa1111xyz');
    expect(() => store.findOne('aaaa')).toThrow("'aaaa' is ambiguous: matches aaaa2222, aaaa1111");
    expect(() => store.findOne('cccc')).toThrow(RunLookupError);
  });

  it('derives run status from the run directory', () => {
    const done = path.join(runsDirFor(home), 'done');
    const failed = path.join(runsDirFor(home), 'failed');
    const running = path.join(runsDirFor(home), 'running');
    seedRun(done, { opref: 'x', started: 1, exitStatus: 0 });
    seedRun(failed, { opref: 'x', started: 2, exitStatus: 3 });
    seedRun(running, { opref: 'x', started: 3 });
    fs.writeFileSync(path.join(running, '.run', 'LOCK'), '');
    expect(store.list().map((run) => [run.id, run.status])).toEqual([
      ['running', 'running'],
      ['failed', 'error'],
      ['done', 'completed'],
    ]);
    expect(store.list({ status: ['completed'] }).map((run) => run.id)).toEqual(['done']);
  });
});

describe('operation arguments', () => {
  it('renders run requests as command-line arguments', () => {
    expect(runArgs({ opspec: 'train', flags: { lr: 0.1, fast: true }, label: 'b1', runDir: '/r' })).toEqual([
      'run', '-y', '--run-dir', '/r', '--label', 'b1', 'train', 'lr=0.1', 'fast=yes',
    ]);
  });

  it('renders pass-through options in kebab case', () => {
    expect(optionArgs({ skipOpCache: true, remote: 'origin', ignored: false, tags: ['a', 'b'] })).toEqual([
      '--skip-op-cache', '--remote', 'origin', '--tags', 'a', '--tags', 'b',
    ]);
    expect(formatFlagValue(null)).toBe('null');
    expect(formatFlagValue(false)).toBe('no');
  });
});

describe('Project', () => {
  let cwd: string;
  let home: string;
  let api: FakeOperationApi;
  let out: TextCollector;
  let project: Project;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'project-'));
    home = initHome(fs.mkdtempSync(path.join(os.tmpdir(), 'project-home-')));
    api = new FakeOperationApi({ watchEnv: NO_WARN });
    out = new TextCollector();
    project = new Project(cwd, home, {
      api,
      operations: DEFAULT_OPERATIONS,
      print: (text) => { out.write(text); },
    });
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('returns the run it created with trimmed output', async () => {
    const [run, output] = await project.runCapture('train', { flags: { lr: 0.1 } });
    expect(output).toBe('INFO: [runctl] running train lr=0.1');
    expect(run).toBeInstanceOf(RunRecord);
    expect(run.opref).toBe('train');
    expect(run.flags).toEqual({ lr: 0.1 });
    expect(run.status).toBe('completed');
    expect(path.dirname(run.dir)).toBe(runsDirFor(home));
  });

  it('suppresses run directory warnings only while the operation runs', async () => {
    await project.runCapture('train');
    expect(api.calls[0].watchedEnv).toBe('1');
    expect(process.env[NO_WARN]).toBeUndefined();
    expect(api.calls[0].ctx).toEqual({ home, cwd: path.join(cwd, '.'), searchPath: undefined });
  });

  it('runs in a subdirectory of the project', async () => {
    await project.runCapture('train', { cwd: 'sub' });
    expect(api.calls[0].ctx.cwd).toBe(path.join(cwd, 'sub'));
  });

  it('simplifies trial output on request', async () => {
    const [, output] = await project.runCapture('train', { simplifyTrialOutput: true });
    expect(output).toBe('running train');
    expect(simplifyTrials('INFO: [batch-1] trial 0a1b2c: x=1')).toBe('trial: x=1');
  });

  it('reruns the latest run of an operation', async () => {
    const [first] = await project.runCapture('train');
    const [again] = await project.runCapture(undefined, { rerun: 'train' });
    expect(again.id).toBe(first.id);
    expect(project.listRuns()).toHaveLength(1);
  });

  it('surfaces lookup failures from the resolver', async () => {
    await expect(project.runCapture('train', { restart: 'nothing' })).rejects.toThrow("no run matches 'nothing'");
    expect(api.calls).toHaveLength(0);
  });

  it('prints output and exit status of a failed operation', async () => {
    await project.run('fail-op');
    expect(out.text).toBe('fail-op: something went wrong\n<exit 2>\n');
  });

  it('prints the output of a successful operation', async () => {
    await project.run('train');
    expect(out.text).toBe('INFO: [runctl] running train\n');
  });

  it('prints trials', async () => {
    await project.printTrials('train', { flags: { x: 1 }, simplifyTrialOutput: true });
    expect(out.text).toBe('trial: x=1\nrunning train x=1\n');
  });

  it('prints a table of runs', () => {
    seedRun(path.join(runsDirFor(home), 'r1'), { opref: 'train', started: 1, flags: { lr: 0.1, epochs: 2 }, exitStatus: 0 });
    seedRun(path.join(runsDirFor(home), 'r2'), { opref: 'eval', started: 2, exitStatus: 1 });
    project.printRuns({ flags: true, status: true });
    expect(out.text).toBe(`eval${' '.repeat(20)}error\ntrain  epochs=2 lr=0.1  completed\n`);
  });

  it('prints labels', () => {
    seedRun(path.join(runsDirFor(home), 'r1'), { opref: 'train', started: 1, label: 'best' });
    project.printRuns({ labels: true });
    expect(out.text).toBe('train  best\n');
  });

  it('lists run files without metadata unless asked', () => {
    const runDir = path.join(runsDirFor(home), 'r1');
    seedRun(runDir, { opref: 'train', started: 1 });
    fs.writeFileSync(path.join(runDir, 'out.txt'), 'hello\n');
    fs.mkdirSync(path.join(runDir, '.run', 'sourcecode'));
    fs.writeFileSync(path.join(runDir, '.run', 'sourcecode', 'main.js'), '');
    const run = RunRecord.fromDir(runDir);
    expect(Project.ls(run)).toEqual(['out.txt']);
    expect(Project.ls(run, { sourcecode: true })).toEqual([path.join('.run', 'sourcecode', 'main.js')]);
    expect(Project.ls(run, { all: true })).toEqual([
      path.join('.run', 'attrs', 'flags'),
      path.join('.run', 'attrs', 'opref'),
      path.join('.run', 'attrs', 'started'),
      path.join('.run', 'sourcecode', 'main.js'),
      'out.txt',
    ]);
    project.cat(run, 'out.txt');
    expect(out.text).toBe('hello\n');
  });

  it('marks, labels, compares and deletes runs through the operation interface', async () => {
    const [run] = await project.runCapture('train');
    await project.mark([run]);
    expect(RunRecord.fromDir(run.dir).marked).toBe(true);
    await project.label([run.id], { set: 'keep' });
    expect(run.label).toBe('keep');
    expect(await project.compare()).toBe(`${run.shortId} train completed`);
    await project.publish([run]);
    await project.package();
    await project.deleteRuns([run]);
    expect(project.listRuns()).toEqual([]);
    expect(api.calls.map((call) => call.command)).toEqual(['run', 'mark', 'label', 'compare', 'publish', 'package', 'delete']);
  });

  it('hands an overridden user config to the operation as a file', async () => {
    const userConfig = new ConfigSource(path.join(home, 'config.yml'));
    userConfig.override({ remotes: { s3: { bucket: 'test-bucket' } } });
    const withConfig = new Project(cwd, home, {
      api,
      operations: DEFAULT_OPERATIONS,
      userConfig,
      print: (text) => { out.write(text); },
    });
    await withConfig.runCapture('train');
    const file = api.calls[0].ctx.userConfigFile;
    expect(file).toBeDefined();
    expect(fs.readFileSync(file ?? '', 'utf-8')).toBe('remotes:\n  s3:\n    bucket: test-bucket\n');
    userConfig.reset();
  });

  it('reuses one user config file across operations and removes it on reset', async () => {
    const userConfig = new ConfigSource(path.join(home, 'config.yml'));
    userConfig.override({ remote: 'origin' });
    const withConfig = new Project(cwd, home, {
      api,
      operations: DEFAULT_OPERATIONS,
      userConfig,
      print: (text) => { out.write(text); },
    });
    const [run] = await withConfig.runCapture('train');
    await withConfig.runCapture('train');
    await withConfig.mark([run]);
    const files = new Set(api.calls.map((call) => call.ctx.userConfigFile));
    expect(files.size).toBe(1);
    const [file] = [...files];
    userConfig.reset();
    expect(fs.existsSync(file ?? '')).toBe(false);
  });
});
