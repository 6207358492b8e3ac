import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { RunnerConfig, RunnerConfigLayer } from './config.js';

import { CaptureScopeSchema, defaultRunnerConfig, RunnerConfigLayerSchema } from './config.js';
import { warn } from './utils.js';

type LayerOrigin = '--config' | 'cwd' | 'home';

export interface ResolvedConfigLayer {
  origin: LayerOrigin;
  jsonPath: string; // may not exist
  json?: RunnerConfigLayer;
}

export class ConfigError extends Error {
  public readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.file = file;
    this.name = 'ConfigError';
  }
}

const HIDDEN_JSON = '.transcript-runner.json';
const HOME_DIR = '.transcript-runner';

function readLayer(p: string, required: boolean): RunnerConfigLayer | undefined {
  if (!fs.existsSync(p)) {
    if (required) throw new ConfigError(p, 'config file does not exist');
    return undefined;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, 'utf-8'));
  } catch (e) {
    throw new ConfigError(p, `failed to read or parse JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = RunnerConfigLayerSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(p, `${where}: ${issue.message}`);
  }
  // Relative paths in a file are relative to that file
  const base = path.dirname(path.resolve(p));
  const layer = { ...parsed.data };
  if (layer.testsDir !== undefined) layer.testsDir = path.resolve(base, layer.testsDir);
  if (layer.userConfigPath !== undefined) layer.userConfigPath = path.resolve(base, layer.userConfigPath);
  return layer;
}

/** Config files, highest priority first. */
export function discoverLayers(opts?: { configPath?: string; cwd?: string; home?: string }): ResolvedConfigLayer[] {
  const cwd = opts?.cwd ?? process.cwd();
  const home = opts?.home ?? os.homedir();
  const list: { origin: LayerOrigin; json: string; required: boolean }[] = [];
  if (typeof opts?.configPath === 'string' && opts.configPath.length > 0) {
    list.push({ origin: '--config', json: path.resolve(cwd, opts.configPath), required: true });
  }
  list.push({ origin: 'cwd', json: path.join(cwd, HIDDEN_JSON), required: false });
  if (home.length > 0) {
    list.push({ origin: 'home', json: path.join(home, HOME_DIR, 'config.json'), required: false });
  }
  return list.map((it) => ({ origin: it.origin, jsonPath: it.json, json: readLayer(it.json, it.required) }));
}

/** Merge layers (highest priority first) over the defaults, then apply the environment. */
export function buildRunnerConfig(
  layers: ResolvedConfigLayer[],
  opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): RunnerConfig {
  const config = defaultRunnerConfig(opts.cwd ?? process.cwd());
  // Lowest priority first so later assignments win
  [...layers].reverse().forEach((layer) => {
    const json = layer.json;
    if (json === undefined) return;
    const { operations, logging, ...rest } = json;
    Object.entries(rest).forEach(([key, value]) => {
      if (value === undefined) return;
      Object.assign(config, { [key]: value });
    });
    if (operations !== undefined) {
      Object.entries(operations).forEach(([key, value]) => {
        if (value !== undefined) Object.assign(config.operations, { [key]: value });
      });
    }
    if (logging !== undefined) {
      Object.entries(logging).forEach(([key, value]) => {
        if (value !== undefined) Object.assign(config.logging, { [key]: value });
      });
    }
  });
  applyEnvironment(config, opts.env ?? process.env);
  return config;
}

function applyEnvironment(config: RunnerConfig, env: NodeJS.ProcessEnv): void {
  if (env.REPORT_ONLY_FIRST_FAILURE === '1') config.reportOnlyFirstFailure = true;
  const scope = env.TRANSCRIPT_CAPTURE_SCOPE;
  if (scope !== undefined && scope.length > 0) {
    const parsed = CaptureScopeSchema.safeParse(scope);
    if (parsed.success) config.captureScope = parsed.data;
    else warn(`ignoring TRANSCRIPT_CAPTURE_SCOPE='${scope}' (expected file or example)`);
  }
}

export function loadRunnerConfig(opts?: { configPath?: string; cwd?: string; home?: string; env?: NodeJS.ProcessEnv }): RunnerConfig {
  const layers = discoverLayers(opts);
  return buildRunnerConfig(layers, { cwd: opts?.cwd, env: opts?.env });
}
