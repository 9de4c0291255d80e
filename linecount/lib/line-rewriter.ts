/**
 * Line Rewriter
 *
 * Appends line counts to quoted directories in template lines such as
 *
 *   core = "src/core"  # comment
 *
 * which becomes `core = "src/core, 1200"  # comment`. Lines that do not
 * match pass through with their original terminator. Rewritten lines are
 * always terminated with \n.
 */

import { writeFileSync } from 'fs';
import { readUtf8File } from './file-utils.ts';
import { InputNotFoundError, RewriteIoError, errnoCode } from './errors.ts';
import { NOT_APPLICABLE, type LineCountTable } from './line-count-table.ts';

/** Shortest label before `=`, optional spaces around it, first quoted run, rest. */
const ASSIGNMENT_PATTERN = /^(.*?)\s*=\s*"([^"]*)"(.*)$/s;

const NOT_FOUND_TEXT = 'Not Found';

export interface TemplateLine {
  content: string;
  /** '\n', '\r\n', '\r', or '' for a final unterminated line */
  terminator: string;
}

export interface RewriteSummary {
  linesRead: number;
  linesMatched: number;
  countsResolved: number;
  notApplicable: number;
  notFound: number;
}

export interface RewriteResult {
  output: string;
  summary: RewriteSummary;
}

/**
 * Split text into lines, keeping each line's terminator.
 */
export function splitTemplateLines(text: string): TemplateLine[] {
  const lines: TemplateLine[] = [];
  const re = /([^\r\n]*)(\r\n|\n|\r)/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = re.exec(text)) !== null) {
    lines.push({ content: match[1], terminator: match[2] });
    lastIndex = re.lastIndex;
  }
  if (lastIndex < text.length) {
    lines.push({ content: text.slice(lastIndex), terminator: '' });
  }
  return lines;
}

export type LineOutcome = 'resolved' | 'not-applicable' | 'not-found';

export interface RewrittenLine {
  text: string;
  outcome: LineOutcome;
}

function lookup(directory: string, table: LineCountTable): { rendered: string; outcome: LineOutcome } {
  const value = table.get(directory);
  if (value === undefined) return { rendered: NOT_FOUND_TEXT, outcome: 'not-found' };
  if (value === NOT_APPLICABLE) return { rendered: NOT_APPLICABLE, outcome: 'not-applicable' };
  return { rendered: String(value), outcome: 'resolved' };
}

/**
 * Match and rewrite one line (without its terminator), reporting how the
 * directory resolved. Returns null for a pass-through line.
 */
export function classifyLine(line: string, table: LineCountTable): RewrittenLine | null {
  const match = ASSIGNMENT_PATTERN.exec(line);
  if (!match) return null;

  const [, label, rawDirectory, rest] = match;
  const directory = rawDirectory.trim();
  const { rendered, outcome } = lookup(directory, table);
  return { text: `${label} = "${directory}, ${rendered}"${rest}`, outcome };
}

/**
 * Rewrite a single line (without its terminator).
 * Returns null when the line does not match and should pass through.
 */
export function rewriteLine(line: string, table: LineCountTable): string | null {
  return classifyLine(line, table)?.text ?? null;
}

function emptySummary(): RewriteSummary {
  return { linesRead: 0, linesMatched: 0, countsResolved: 0, notApplicable: 0, notFound: 0 };
}

/**
 * Rewrite template text against a table. No state is carried between lines.
 */
export function rewriteText(text: string, table: LineCountTable): RewriteResult {
  const summary = emptySummary();
  const chunks: string[] = [];

  for (const line of splitTemplateLines(text)) {
    summary.linesRead++;
    const rewritten = classifyLine(line.content, table);
    if (!rewritten) {
      chunks.push(line.content + line.terminator);
      continue;
    }

    summary.linesMatched++;
    if (rewritten.outcome === 'resolved') summary.countsResolved++;
    else if (rewritten.outcome === 'not-applicable') summary.notApplicable++;
    else summary.notFound++;

    chunks.push(rewritten.text + '\n');
  }

  return { output: chunks.join(''), summary };
}

/**
 * Rewrite `inputPath` into `outputPath`, creating or truncating the output.
 * The output file is only created once the input has been read.
 */
export function rewriteFile(inputPath: string, outputPath: string, table: LineCountTable): RewriteSummary {
  let text: string;
  try {
    text = readUtf8File(inputPath);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') throw new InputNotFoundError(inputPath);
    throw new RewriteIoError(err);
  }

  const { output, summary } = rewriteText(text, table);

  try {
    writeFileSync(outputPath, output);
  } catch (err) {
    throw new RewriteIoError(err);
  }

  return summary;
}
