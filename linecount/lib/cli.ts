/**
 * CLI argument parsing shared by linecount commands.
 */

/**
 * Parsed CLI arguments.
 * Named options are stored as key-value pairs.
 * Positional arguments are stored in _positional.
 */
export interface ParsedCliArgs {
  _positional: string[];
  [key: string]: string | boolean | string[];
}

/**
 * Parse CLI arguments, handling both --key=value and --key value formats.
 * Bare '--' separators are skipped. Boolean flags (no value) are set to true.
 *
 * Keys listed in `booleanFlags` never consume the following argument, so
 * `--summary in.txt` keeps `in.txt` as a positional.
 */
export function parseCliArgs(argv: string[], booleanFlags: readonly string[] = []): ParsedCliArgs {
  const positional: string[] = [];
  const opts: ParsedCliArgs = { _positional: positional };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') continue;
    if (arg.startsWith('--')) {
      const raw = arg.slice(2);
      const eqIdx = raw.indexOf('=');
      if (eqIdx !== -1) {
        opts[raw.slice(0, eqIdx)] = raw.slice(eqIdx + 1);
        continue;
      }
      const next = argv[i + 1];
      if (!booleanFlags.includes(raw) && next !== undefined && !next.startsWith('--')) {
        opts[raw] = next;
        i++;
      } else {
        opts[raw] = true;
      }
    } else {
      positional.push(arg);
    }
  }
  return opts;
}

/** True when a flag was given in any form other than an explicit `=false`. */
export function isFlagSet(args: ParsedCliArgs, key: string): boolean {
  const value = args[key];
  if (value === undefined) return false;
  if (value === true) return true;
  return typeof value === 'string' && value !== 'false' && value !== '0';
}
