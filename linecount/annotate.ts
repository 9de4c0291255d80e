#!/usr/bin/env node

/**
 * Line Count Annotator
 *
 * Rewrites template lines of the form `label = "directory"` to carry the
 * directory's line count, looked up from a CSV of `directory,count` rows:
 *
 *   core = "src/core"      ->  core = "src/core, 1200"
 *   docs = "docs"          ->  docs = "docs, N/A"       (count given as N/A)
 *   misc = "misc"          ->  misc = "misc, Not Found" (no CSV row)
 *
 * Usage:
 *   linecount-annotate <input_file> <output_file> <csv_file>
 *   linecount-annotate in.txt out.txt counts.csv --summary   # Print match counts
 *   linecount-annotate in.txt out.txt counts.csv --ci        # No colors
 */

import 'dotenv/config';
import { fileURLToPath } from 'url';
import { isFlagSet, parseCliArgs } from './lib/cli.ts';
import { loadConfig } from './lib/config.ts';
import { InputNotFoundError, RewriteIoError } from './lib/errors.ts';
import { loadLineCounts } from './lib/line-count-table.ts';
import { rewriteFile, type RewriteSummary } from './lib/line-rewriter.ts';
import { createLogger, formatCount, type Logger, type OutputStream } from './lib/output.ts';

const BOOLEAN_FLAGS = ['help', 'summary', 'ci'] as const;

export const USAGE = 'Usage: linecount-annotate <input_file> <output_file> <csv_file> [--summary] [--ci]';

export interface RunOptions {
  env?: Record<string, string | undefined>;
  stdout?: OutputStream;
  stderr?: OutputStream;
}

function printSummary(logger: Logger, outputPath: string, summary: RewriteSummary): void {
  logger.heading(`Annotated ${outputPath}`);
  logger.log(`  Lines read:      ${summary.linesRead}`);
  logger.log(`  Lines rewritten: ${summary.linesMatched}`);
  logger.log(`  Counts found:    ${summary.countsResolved}`);
  logger.log(`  N/A:             ${summary.notApplicable}`);
  logger.log(`  Not found:       ${summary.notFound}`);
}

/**
 * Run the annotator with the arguments after the script name.
 * Returns the process exit status.
 */
export function run(argv: string[], options: RunOptions = {}): number {
  const args = parseCliArgs(argv, BOOLEAN_FLAGS);
  const config = loadConfig(options.env ?? process.env, isFlagSet(args, 'ci'));
  const logger = createLogger({ ciMode: config.ciMode, stdout: options.stdout, stderr: options.stderr });

  if (isFlagSet(args, 'help')) {
    logger.log(USAGE);
    return 0;
  }

  if (args._positional.length !== 3) {
    logger.log(USAGE);
    return 1;
  }

  const [inputPath, outputPath, csvPath] = args._positional;

  const table = loadLineCounts(csvPath, logger);
  if (table.size === 0) {
    logger.error(`Error: No line counts loaded from ${csvPath}`);
    return 1;
  }

  try {
    const summary = rewriteFile(inputPath, outputPath, table);
    if (isFlagSet(args, 'summary')) {
      printSummary(logger, outputPath, summary);
      logger.success(`✓ ${formatCount(summary.linesMatched, 'line')} annotated`);
    }
  } catch (err) {
    if (err instanceof InputNotFoundError || err instanceof RewriteIoError) {
      logger.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  return 0;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  try {
    process.exit(run(process.argv.slice(2)));
  } catch (err) {
    console.error('Fatal error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
