export class RunError extends Error {
  public readonly output: string;

  public readonly exitCode: number;

  public readonly command: readonly string[];

  constructor(output: string, exitCode: number, command: readonly string[] = []) {
    super(`operation exited with status ${String(exitCode)}`);
    this.output = output;
    this.exitCode = exitCode;
    this.command = command;
    this.name = 'RunError';
  }
}

export type RunLookupFailure = 'none' | 'ambiguous';

export class RunLookupError extends Error {
  public readonly selector: string;

  public readonly reason: RunLookupFailure;

  public readonly candidates: readonly string[];

  constructor(selector: string, reason: RunLookupFailure, candidates: readonly string[] = []) {
    super(reason === 'none'
      ? `no run matches '${selector}'`
      : `'${selector}' is ambiguous: matches ${candidates.join(', ')}`);
    this.selector = selector;
    this.reason = reason;
    this.candidates = candidates;
    this.name = 'RunLookupError';
  }
}

export class InvalidRunRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRunRequestError';
  }
}
