import type { ConfigSource, UserConfigData } from './config-source.js';
import type { ScopeGuard } from './scope-stack.js';
import type { SearchPath } from './search-path.js';

import { GuardStateError } from './scope-stack.js';

/**
 * Records one piece of state on enter and puts it back on exit. A guard may
 * be entered again once it has exited, but not while it is active.
 */
export abstract class StateGuard<S> implements ScopeGuard {
  private saved?: { value: S };

  protected abstract readonly label: string;

  public get active(): boolean {
    return this.saved !== undefined;
  }

  public enter(): void {
    if (this.saved !== undefined) throw new GuardStateError(this.label, 'already entered');
    const value = this.capture();
    this.saved = { value };
    try {
      this.install();
    } catch (error) {
      this.saved = undefined;
      this.restore(value);
      throw error;
    }
  }

  public exit(): void {
    const saved = this.saved;
    if (saved === undefined) throw new GuardStateError(this.label, 'exit without enter');
    this.saved = undefined;
    this.restore(saved.value);
  }

  protected abstract capture(): S;

  protected abstract install(): void;

  protected abstract restore(value: S): void;
}

export class Chdir extends StateGuard<string> {
  protected readonly label = 'Chdir';

  public readonly path: string;

  constructor(target: string) {
    super();
    this.path = target;
  }

  protected capture(): string {
    return process.cwd();
  }

  protected install(): void {
    process.chdir(this.path);
  }

  protected restore(previous: string): void {
    process.chdir(previous);
  }
}

type EnvSnapshot = Map<string, string | undefined>;

/** Sets environment variables; on exit each is restored, or deleted if it was absent. */
export class Env extends StateGuard<EnvSnapshot> {
  protected readonly label = 'Env';

  private readonly values: Readonly<Record<string, string>>;

  constructor(values: Record<string, string>) {
    super();
    this.values = { ...values };
  }

  protected capture(): EnvSnapshot {
    const snapshot: EnvSnapshot = new Map();
    Object.keys(this.values).forEach((name) => {
      snapshot.set(name, Object.prototype.hasOwnProperty.call(process.env, name) ? process.env[name] : undefined);
    });
    return snapshot;
  }

  protected install(): void {
    Object.entries(this.values).forEach(([name, value]) => {
      process.env[name] = value;
    });
  }

  protected restore(snapshot: EnvSnapshot): void {
    snapshot.forEach((value, name) => {
      if (value === undefined) {
        // eslint-disable-next-line @typescript-eslint/no-dynamic-delete
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    });
  }
}

export interface SearchPathChange {
  /** Replacement list; defaults to the current entries */
  path?: readonly string[];
  prepend?: readonly string[];
  append?: readonly string[];
}

export class SearchPathGuard extends StateGuard<string[]> {
  protected readonly label = 'SearchPath';

  private readonly searchPath: SearchPath;

  private readonly change: SearchPathChange;

  constructor(searchPath: SearchPath, change: SearchPathChange | readonly string[]) {
    super();
    this.searchPath = searchPath;
    this.change = isEntryList(change) ? { path: change } : change;
  }

  protected capture(): string[] {
    return this.searchPath.get();
  }

  protected install(): void {
    const base = this.change.path ?? this.searchPath.get();
    this.searchPath.set([...(this.change.prepend ?? []), ...base, ...(this.change.append ?? [])]);
  }

  protected restore(previous: string[]): void {
    this.searchPath.set(previous);
  }
}

function isEntryList(value: SearchPathChange | readonly string[]): value is readonly string[] {
  return Array.isArray(value);
}

/**
 * Serves `data` in place of the user config file. On exit an enclosing
 * override comes back; with none, the source is reset so the next read
 * reloads the file.
 */
export class UserConfig extends StateGuard<UserConfigData | undefined> {
  protected readonly label = 'UserConfig';

  private readonly source: ConfigSource;

  private readonly data: UserConfigData;

  constructor(source: ConfigSource, data: UserConfigData) {
    super();
    this.source = source;
    this.data = data;
  }

  protected capture(): UserConfigData | undefined {
    return this.source.overridden;
  }

  protected install(): void {
    this.source.override(this.data);
  }

  protected restore(previous: UserConfigData | undefined): void {
    this.source.reset();
    if (previous !== undefined) this.source.override(previous);
  }
}
