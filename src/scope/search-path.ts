import { createRequire } from 'node:module';
import path from 'node:path';

/**
 * Ordered list of directories searched when transcript code loads a module,
 * and handed to spawned operations as NODE_PATH.
 */
export class SearchPath {
  private entries: string[];

  constructor(entries?: readonly string[]) {
    this.entries = entries !== undefined ? [...entries] : SearchPath.fromEnv(process.env.NODE_PATH);
  }

  public static fromEnv(value: string | undefined): string[] {
    if (value === undefined || value.length === 0) return [];
    return value.split(path.delimiter).filter((entry) => entry.length > 0);
  }

  public get(): string[] {
    return [...this.entries];
  }

  public set(entries: readonly string[]): void {
    this.entries = [...entries];
  }

  public toEnvValue(): string {
    return this.entries.join(path.delimiter);
  }

  /** Resolve `request` against each entry in order, then relative to `fromDir`. */
  public resolve(request: string, fromDir: string = process.cwd()): string {
    const bases = [...this.entries.map((entry) => path.resolve(entry)), path.resolve(fromDir)];
    let lastFailure = '';
    // eslint-disable-next-line functional/no-loop-statements
    for (const base of bases) {
      try {
        return createRequire(path.join(base, '__search_path__.js')).resolve(request);
      } catch (error) {
        lastFailure = error instanceof Error ? error.message.split('\n')[0] : String(error);
      }
    }
    throw new Error(`cannot find module '${request}' in ${bases.join(', ')}: ${lastFailure}`);
  }

  public load(request: string, fromDir: string = process.cwd()): unknown {
    const resolved = this.resolve(request, fromDir);
    const load = createRequire(resolved);
    return load(resolved);
  }
}
