/**
 * Output Utilities
 *
 * Terminal colors and logging for the annotate command.
 * Supports CI mode (no colors) via --ci, CI=true or NO_COLOR.
 * Warnings and errors go to the error stream.
 */

export interface Colors {
  red: string;
  green: string;
  yellow: string;
  blue: string;
  bold: string;
  reset: string;
}

/** Minimal writable sink; process.stdout and process.stderr satisfy it. */
export interface OutputStream {
  write: (chunk: string) => unknown;
}

export interface Logger {
  colors: Colors;
  ciMode: boolean;
  log: (msg: string) => void;
  error: (msg: string) => void;
  warn: (msg: string) => void;
  success: (msg: string) => void;
  heading: (msg: string) => void;
}

export interface LoggerOptions {
  ciMode?: boolean;
  stdout?: OutputStream;
  stderr?: OutputStream;
}

/**
 * Get color codes (empty strings in CI mode)
 */
export function getColors(ciMode: boolean): Colors {
  if (ciMode) {
    return {
      red: '',
      green: '',
      yellow: '',
      blue: '',
      bold: '',
      reset: '',
    };
  }

  return {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    bold: '\x1b[1m',
    reset: '\x1b[0m',
  };
}

/**
 * Create a logger with color support
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { ciMode = false, stdout = process.stdout, stderr = process.stderr } = options;
  const c = getColors(ciMode);

  const out = (msg: string) => {
    stdout.write(msg + '\n');
  };
  const err = (msg: string) => {
    stderr.write(msg + '\n');
  };

  return {
    colors: c,
    ciMode,

    log: out,
    error: (msg: string) => err(`${c.red}${msg}${c.reset}`),
    warn: (msg: string) => err(`${c.yellow}${msg}${c.reset}`),
    success: (msg: string) => out(`${c.green}${msg}${c.reset}`),
    heading: (msg: string) => out(`${c.bold}${c.blue}${msg}${c.reset}`),
  };
}

/**
 * Format a count with proper pluralization
 */
export function formatCount(count: number, singular: string, plural: string | null = null): string {
  const form = count === 1 ? singular : (plural || singular + 's');
  return `${count} ${form}`;
}
