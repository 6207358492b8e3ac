export const OPTION_FLAGS = [
  'ELLIPSIS',
  'NORMALIZE_WHITESPACE',
  'NORMALIZE_PATHS',
  'STRIP_U',
  'STRIP_L',
  'WINDOWS',
  'SKIP',
  'REPORT_UDIFF',
  'REPORT_ONLY_FIRST_FAILURE',
] as const;

export type OptionFlag = typeof OPTION_FLAGS[number];

export type OptionFlags = ReadonlySet<OptionFlag>;

/** Explicit per-file or per-example changes: `true` turns a flag on, `false` off. */
export type OptionDelta = ReadonlyMap<OptionFlag, boolean>;

/** Always active unless an example turns them off. */
export const DEFAULT_FLAGS: readonly OptionFlag[] = ['ELLIPSIS', 'NORMALIZE_WHITESPACE'];

export function isOptionFlag(value: string): value is OptionFlag {
  return OPTION_FLAGS.some((flag) => flag === value);
}

export class UnknownOptionFlagError extends Error {
  public readonly flag: string;

  constructor(flag: string) {
    super(`unknown option flag '${flag}'`);
    this.flag = flag;
    this.name = 'UnknownOptionFlagError';
  }
}

/**
 * Parse a directive body such as `+NORMALIZE_PATHS -ELLIPSIS, +STRIP_L`.
 * Items are separated by commas or whitespace; each must carry a sign.
 */
export function parseOptionDirective(body: string): Map<OptionFlag, boolean> {
  const delta = new Map<OptionFlag, boolean>();
  body.split(/[\s,]+/).filter((item) => item.length > 0).forEach((item) => {
    const sign = item.charAt(0);
    const name = item.slice(1);
    if ((sign !== '+' && sign !== '-') || !isOptionFlag(name)) {
      throw new UnknownOptionFlagError(item);
    }
    delta.set(name, sign === '+');
  });
  return delta;
}

export function applyOptionDelta(base: Iterable<OptionFlag>, ...deltas: (OptionDelta | undefined)[]): Set<OptionFlag> {
  const flags = new Set<OptionFlag>(base);
  deltas.forEach((delta) => {
    delta?.forEach((on, flag) => {
      if (on) flags.add(flag);
      else flags.delete(flag);
    });
  });
  return flags;
}
