/**
 * Line Count Table
 *
 * Loads `directory,value` rows from a CSV file into a read-only map.
 * Values are either a non-negative line count or the N/A marker.
 *
 * Row faults are soft: a malformed row or an unrecognised value is
 * reported as a warning and skipped. A missing or unreadable file is
 * reported as an error and yields an empty table, which callers treat
 * as "could not load".
 */

import { parseCsvRows } from './csv.ts';
import { MalformedRowError, errnoCode } from './errors.ts';
import { readUtf8File } from './file-utils.ts';
import type { Logger } from './output.ts';

export const NOT_APPLICABLE = 'N/A' as const;

/** Counts are kept as bigint so long digit strings stay exact. */
export type LineCountValue = bigint | typeof NOT_APPLICABLE;

export type LineCountTable = ReadonlyMap<string, LineCountValue>;

const DIGITS_ONLY = /^[0-9]+$/;

/**
 * Interpret a trimmed value column. Returns null when the value is neither
 * a digit string nor N/A (any case).
 */
export function parseLineCountValue(value: string): LineCountValue | null {
  if (DIGITS_ONLY.test(value)) return BigInt(value);
  if (value.toUpperCase() === NOT_APPLICABLE) return NOT_APPLICABLE;
  return null;
}

function parseRow(row: string[], rowNumber: number): { directory: string; value: string } {
  if (row.length < 2) throw new MalformedRowError(row, rowNumber);
  return { directory: row[0].trim(), value: row[1].trim() };
}

/**
 * Build a table from CSV text. Later rows for the same directory win.
 */
export function parseLineCounts(csvText: string, logger: Logger): LineCountTable {
  const table = new Map<string, LineCountValue>();
  const rows = parseCsvRows(csvText);

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    try {
      const { directory, value } = parseRow(row, rowNumber);
      const lineCount = parseLineCountValue(value);
      if (lineCount === null) {
        logger.warn(`Warning: Skipping row ${rowNumber} for "${directory}": unrecognised line count "${value}"`);
        return;
      }
      table.set(directory, lineCount);
    } catch (err) {
      if (!(err instanceof MalformedRowError)) throw err;
      logger.warn(`Warning: ${err.message}`);
    }
  });

  return table;
}

/**
 * Read and parse a CSV file. A file that cannot be read is reported and
 * produces an empty table.
 */
export function loadLineCounts(csvPath: string, logger: Logger): LineCountTable {
  let text: string;
  try {
    text = readUtf8File(csvPath);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      logger.error(`Error: CSV file not found: ${csvPath}`);
    } else {
      logger.error(`Error: Could not read CSV file ${csvPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return new Map();
  }
  return parseLineCounts(text, logger);
}
