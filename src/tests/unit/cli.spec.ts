import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { CliIo } from '../../cli-program.js';

import { EXIT_FAILED, EXIT_INVALID, EXIT_OK, runCli } from '../../cli-program.js';
import { setWarningSink } from '../../utils.js';
import { FakeOperationApi } from '../fake-operation-api.js';

class TextCollector {
  public text = '';

  public write(text: string): void {
    this.text += text;
  }
}

const pad = (name: string): string => ' '.repeat(27 - name.length);

describe('runCli', () => {
  let cwd: string;
  let home: string;
  let stdout: TextCollector;
  let stderr: TextCollector;
  let io: CliIo;

  const writeTranscript = (dir: string, name: string, lines: string[]): void => {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, `${name}.md`), `${lines.join('\n')}\n`);
  };

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-home-'));
    stdout = new TextCollector();
    stderr = new TextCollector();
    io = { stdout, stderr, cwd, home, env: {}, api: new FakeOperationApi() };
    writeTranscript(path.join(cwd, 'tests'), 'alpha', ['>>> print(1)', '1']);
    writeTranscript(path.join(cwd, 'tests'), 'beta', ['>>> print(2)', '3']);
  });

  afterEach(() => {
    setWarningSink(undefined);
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('runs every transcript and exits non-zero on a failure', async () => {
    expect(await runCli(['--log-format', 'none'], io)).toBe(EXIT_FAILED);
    expect(stdout.text.startsWith(`internal tests:\n  alpha: ${pad('alpha')}ok\n  beta: ${pad('beta')}FAILED (1 of 1 examples)\n`)).toBe(true);
    expect(stderr.text).toBe('');
  });

  it('runs only the named transcripts', async () => {
    expect(await runCli(['--log-format', 'none', 'alpha'], io)).toBe(EXIT_OK);
    expect(stdout.text).toBe(`internal tests:\n  alpha: ${pad('alpha')}ok\n`);
  });

  it('skips transcripts given with --skip', async () => {
    expect(await runCli(['--log-format', 'none', '--skip', 'beta'], io)).toBe(EXIT_OK);
    expect(stdout.text).toBe(`internal tests:\n  alpha: ${pad('alpha')}ok\n  beta:${pad('beta')} skipped\n`);
  });

  it('lists transcripts from another directory', async () => {
    writeTranscript(path.join(cwd, 'docs'), 'guide', []);
    expect(await runCli(['--list', '-d', 'docs'], io)).toBe(EXIT_OK);
    expect(stdout.text).toBe('guide\n');
  });

  it('reads the tests directory from a config file', async () => {
    writeTranscript(path.join(cwd, 'docs'), 'guide', ['>>> print(4)', '4']);
    fs.writeFileSync(path.join(cwd, 'runner.json'), JSON.stringify({ testsDir: 'docs', title: 'guides' }));
    expect(await runCli(['--log-format', 'none', '-c', 'runner.json'], io)).toBe(EXIT_OK);
    expect(stdout.text).toBe(`guides:\n  guide: ${pad('guide')}ok\n`);
  });

  it('exits with the invalid-usage code for a missing config file', async () => {
    expect(await runCli(['-c', 'nope.json'], io)).toBe(EXIT_INVALID);
    expect(stderr.text).toBe(`error: ${path.join(cwd, 'nope.json')}: config file does not exist\n`);
  });

  it('rejects an unknown capture scope', async () => {
    expect(await runCli(['--capture-scope', 'session'], io)).toBe(1);
    expect(stderr.text).toContain("argument 'session' is invalid");
    expect(stdout.text).toBe('');
  });

  it('prints usage on --help', async () => {
    expect(await runCli(['--help'], io)).toBe(EXIT_OK);
    expect(stdout.text).toContain('Usage: transcript-runner');
    expect(stdout.text).toContain('--capture-scope <scope>');
  });

  it('writes JSON log lines to stderr', async () => {
    expect(await runCli(['--log-format', 'json', 'alpha'], io)).toBe(EXIT_OK);
    const lines = stderr.text.trimEnd().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ severity: 'FIN', component: 'runner', message: 'all transcripts passed' });
  });

  it('routes warnings to stderr', async () => {
    io = { ...io, env: { TRANSCRIPT_CAPTURE_SCOPE: 'session' } };
    await runCli(['--log-format', 'none', 'alpha'], io);
    expect(stderr.text).toBe("[warn] ignoring TRANSCRIPT_CAPTURE_SCOPE='session' (expected file or example)\n");
  });
});
