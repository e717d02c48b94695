/**
 * CLI option extraction helpers.
 *
 * Each helper works on a copy of the argument list and hands back what is
 * left, so a command can consume its options one at a time and treat any
 * remainder as unknown.
 */

export interface ExtractedOption {
  found: boolean;
  value?: string;
  missingValue: boolean;
  remainingArgs: string[];
}

export interface ExtractedFlag {
  found: boolean;
  remainingArgs: string[];
}

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);

function inlineValue(token: string, flag: string): string | undefined {
  const prefix = `${flag}=`;
  return token.startsWith(prefix) ? token.slice(prefix.length) : undefined;
}

/**
 * Extract a single-value option and remove it from args.
 * Supports `--flag value` and `--flag=value` forms. A following token that
 * starts with "-" is never taken as the value.
 */
export function extractOption(args: string[], flags: readonly string[]): ExtractedOption {
  const remaining = [...args];

  for (let i = 0; i < remaining.length; i++) {
    const token = remaining[i];

    for (const flag of flags) {
      if (token === flag) {
        const next = remaining[i + 1];
        if (next === undefined || next === '' || next.startsWith('-')) {
          remaining.splice(i, 1);
          return { found: true, missingValue: true, remainingArgs: remaining };
        }
        remaining.splice(i, 2);
        return { found: true, value: next, missingValue: false, remainingArgs: remaining };
      }

      const value = inlineValue(token, flag);
      if (value !== undefined) {
        remaining.splice(i, 1);
        if (!value.trim()) {
          return { found: true, missingValue: true, remainingArgs: remaining };
        }
        return { found: true, value, missingValue: false, remainingArgs: remaining };
      }
    }
  }

  return { found: false, missingValue: false, remainingArgs: remaining };
}

/**
 * Extract a boolean flag and remove every occurrence of it from args.
 * `--flag` and `--flag=<truthy>` set it; `--flag=false` is consumed but unset.
 */
export function extractFlag(args: string[], flags: readonly string[]): ExtractedFlag {
  let found = false;
  const remainingArgs = args.filter((arg) => {
    for (const flag of flags) {
      if (arg === flag) {
        found = true;
        return false;
      }
      const value = inlineValue(arg, flag);
      if (value !== undefined) {
        found = found || TRUTHY_VALUES.has(value.trim().toLowerCase());
        return false;
      }
    }
    return true;
  });
  return { found, remainingArgs };
}

/** Returns true if any of the provided boolean flags are present. */
export function hasAnyFlag(args: readonly string[], flags: readonly string[]): boolean {
  return args.some((arg) =>
    flags.some((flag) => {
      if (arg === flag) {
        return true;
      }
      const value = inlineValue(arg, flag);
      return value !== undefined && TRUTHY_VALUES.has(value.trim().toLowerCase());
    })
  );
}
