/** A scoped change to process-wide state: `enter` installs it, `exit` undoes it. */
export interface ScopeGuard {
  enter: () => void;
  exit: () => void;
}

export class GuardStateError extends Error {
  public readonly guard: string;

  constructor(guard: string, message: string) {
    super(`${guard}: ${message}`);
    this.guard = guard;
    this.name = 'GuardStateError';
  }
}

/**
 * Guards entered through the stack are exited in reverse order of entry.
 * Every guard is exited even when an earlier exit throws; the first such
 * error is rethrown once unwinding is complete.
 */
export class ScopeStack {
  private readonly entered: ScopeGuard[] = [];

  public get depth(): number {
    return this.entered.length;
  }

  public enter(guard: ScopeGuard): void {
    guard.enter();
    this.entered.push(guard);
  }

  public exitAll(): void {
    const errors: unknown[] = [];
    // eslint-disable-next-line functional/no-loop-statements -- ordered cleanup matters
    while (this.entered.length > 0) {
      const guard = this.entered.pop();
      if (guard === undefined) break;
      try {
        guard.exit();
      } catch (error) {
        errors.push(error);
      }
    }
    if (errors.length > 0) throw errors[0];
  }
}

function asList(guards: ScopeGuard | readonly ScopeGuard[]): readonly ScopeGuard[] {
  return 'enter' in guards ? [guards] : guards;
}

/** Run `fn` with `guards` entered in order; they are exited in reverse order however `fn` ends. */
export async function within<T>(guards: ScopeGuard | readonly ScopeGuard[], fn: () => T | Promise<T>): Promise<T> {
  const stack = new ScopeStack();
  try {
    asList(guards).forEach((guard) => { stack.enter(guard); });
    return await fn();
  } finally {
    stack.exitAll();
  }
}

export function withinSync<T>(guards: ScopeGuard | readonly ScopeGuard[], fn: () => T): T {
  const stack = new ScopeStack();
  try {
    asList(guards).forEach((guard) => { stack.enter(guard); });
    return fn();
  } finally {
    stack.exitAll();
  }
}
