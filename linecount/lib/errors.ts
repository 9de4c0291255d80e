/**
 * Error types raised while loading line counts and rewriting templates.
 */

/**
 * A CSV row that does not have both a directory and a value column.
 * Recovered by the loader: the row is skipped with a warning.
 */
export class MalformedRowError extends Error {
  row: string[];
  rowNumber: number;

  constructor(row: string[], rowNumber: number) {
    super(`Skipping malformed row ${rowNumber}: ${formatRow(row)}`);
    this.name = 'MalformedRowError';
    this.row = row;
    this.rowNumber = rowNumber;
  }
}

/**
 * The template file to rewrite does not exist. Fatal.
 */
export class InputNotFoundError extends Error {
  path: string;

  constructor(path: string) {
    super(`Input file not found: ${path}`);
    this.name = 'InputNotFoundError';
    this.path = path;
  }
}

/**
 * Any other read or write failure while rewriting. Fatal.
 */
export class RewriteIoError extends Error {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Error reading/writing files: ${detail}`, { cause });
    this.name = 'RewriteIoError';
  }
}

/** Node sets `code` on system errors (ENOENT, EACCES, ...). */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function formatRow(row: string[]): string {
  return `[${row.map(field => JSON.stringify(field)).join(', ')}]`;
}
