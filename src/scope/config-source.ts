import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import * as yaml from 'js-yaml';

import { isPlainObject, warn } from '../utils.js';

export type UserConfigData = Record<string, unknown>;

/**
 * Where the tracked system's user configuration comes from. Normally a YAML
 * file read once and cached; a scope may install an in-memory override.
 */
export class ConfigSource {
  public readonly path: string;

  private cached?: UserConfigData;

  private overrideData?: UserConfigData;

  private written?: { dir: string; file: string };

  constructor(configPath: string) {
    this.path = configPath;
  }

  public read(): UserConfigData {
    if (this.overrideData !== undefined) return this.overrideData;
    if (this.cached === undefined) this.cached = readYamlConfig(this.path);
    return this.cached;
  }

  public get overridden(): UserConfigData | undefined {
    return this.overrideData;
  }

  public override(data: UserConfigData): void {
    this.discardWritten();
    this.overrideData = data;
  }

  /** Drop any override and the cached file contents; the next read goes to disk. */
  public reset(): void {
    this.discardWritten();
    this.overrideData = undefined;
    this.cached = undefined;
  }

  /**
   * Write the active override to a temp YAML file so a child process can read
   * it. Returns undefined when no override is installed. The file is written
   * once per override and removed when the override is replaced or reset.
   */
  public materialize(dir: string = os.tmpdir()): string | undefined {
    if (this.overrideData === undefined) return undefined;
    if (this.written !== undefined && path.dirname(this.written.dir) === dir) return this.written.file;
    this.discardWritten();
    const target = fs.mkdtempSync(path.join(dir, 'transcript-user-config-'));
    const file = path.join(target, path.basename(this.path) || 'config.yml');
    fs.writeFileSync(file, yaml.dump(this.overrideData), 'utf-8');
    this.written = { dir: target, file };
    return file;
  }

  private discardWritten(): void {
    if (this.written === undefined) return;
    fs.rmSync(this.written.dir, { recursive: true, force: true });
    this.written = undefined;
  }
}

export function readYamlConfig(configPath: string): UserConfigData {
  if (!fs.existsSync(configPath)) return {};
  try {
    const loaded: unknown = yaml.load(fs.readFileSync(configPath, 'utf-8'));
    if (loaded === undefined || loaded === null) return {};
    if (isPlainObject(loaded)) return loaded;
    warn(`user config ${configPath} is not a mapping; ignoring it`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    warn(`failed to read user config ${configPath}: ${message}`);
  }
  return {};
}
