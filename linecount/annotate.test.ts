/**
 * Tests for the annotate command entry point
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { USAGE, run } from './annotate.ts';
import { captureStream, type CapturedStream } from './test-helpers.ts';

describe('run', () => {
  let tmpDir: string;
  let inputPath: string;
  let outputPath: string;
  let csvPath: string;
  let stdout: CapturedStream;
  let stderr: CapturedStream;

  const plain = () => ({ env: { CI: 'true' }, stdout: stdout.stream, stderr: stderr.stream });

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'annotate-test-'));
    inputPath = join(tmpDir, 'template.txt');
    outputPath = join(tmpDir, 'out.txt');
    csvPath = join(tmpDir, 'counts.csv');
    stdout = captureStream();
    stderr = captureStream();
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('prints usage and fails with too few arguments', () => {
    expect(run([inputPath, outputPath], plain())).toBe(1);
    expect(stdout.text()).toBe(`${USAGE}\n`);
    expect(stderr.text()).toBe('');
  });

  it('prints usage and fails with too many arguments', () => {
    expect(run([inputPath, outputPath, csvPath, 'extra'], plain())).toBe(1);
    expect(stdout.text()).toBe(`${USAGE}\n`);
  });

  it('prints usage and succeeds with --help', () => {
    expect(run(['--help'], plain())).toBe(0);
    expect(stdout.text()).toBe(`${USAGE}\n`);
  });

  it('rewrites the template', () => {
    writeFileSync(csvPath, 'bar,42\nmissing-count,N/A\n');
    writeFileSync(inputPath, 'foo = "bar"  # comment\n# just a comment\nx = "missing"\ny = "missing-count"\n');

    expect(run([inputPath, outputPath, csvPath], plain())).toBe(0);
    expect(readFileSync(outputPath, 'utf-8')).toBe(
      'foo = "bar, 42"  # comment\n' +
      '# just a comment\n' +
      'x = "missing, Not Found"\n' +
      'y = "missing-count, N/A"\n',
    );
    expect(stdout.text()).toBe('');
    expect(stderr.text()).toBe('');
  });

  it('reports skipped CSV rows and still rewrites', () => {
    writeFileSync(csvPath, 'bar,42\nbaz,many\n');
    writeFileSync(inputPath, 'a = "baz"\n');

    expect(run([inputPath, outputPath, csvPath], plain())).toBe(0);
    expect(stderr.text()).toBe('Warning: Skipping row 2 for "baz": unrecognised line count "many"\n');
    expect(readFileSync(outputPath, 'utf-8')).toBe('a = "baz, Not Found"\n');
  });

  it('prints a summary with --summary', () => {
    writeFileSync(csvPath, 'bar,42\n');
    writeFileSync(inputPath, 'foo = "bar"  # comment\n# just a comment\n');

    expect(run(['--summary', inputPath, outputPath, csvPath], plain())).toBe(0);
    expect(stdout.text()).toBe(
      `Annotated ${outputPath}\n` +
      '  Lines read:      2\n' +
      '  Lines rewritten: 1\n' +
      '  Counts found:    1\n' +
      '  N/A:             0\n' +
      '  Not found:       0\n' +
      '✓ 1 line annotated\n',
    );
  });

  it('fails before rewriting when the CSV file is missing', () => {
    writeFileSync(inputPath, 'a = "bar"\n');

    expect(run([inputPath, outputPath, csvPath], plain())).toBe(1);
    expect(stderr.text()).toBe(
      `Error: CSV file not found: ${csvPath}\n` +
      `Error: No line counts loaded from ${csvPath}\n`,
    );
    expect(existsSync(outputPath)).toBe(false);
  });

  it('fails when the CSV file has no usable rows', () => {
    writeFileSync(csvPath, '');
    writeFileSync(inputPath, 'a = "bar"\n');

    expect(run([inputPath, outputPath, csvPath], plain())).toBe(1);
    expect(stderr.text()).toBe(`Error: No line counts loaded from ${csvPath}\n`);
    expect(existsSync(outputPath)).toBe(false);
  });

  it('fails when the input file is missing', () => {
    writeFileSync(csvPath, 'bar,42\n');

    expect(run([inputPath, outputPath, csvPath], plain())).toBe(1);
    expect(stderr.text()).toBe(`Error: Input file not found: ${inputPath}\n`);
    expect(existsSync(outputPath)).toBe(false);
  });

  it('keeps long counts exact', () => {
    writeFileSync(csvPath, 'big,12345678901234567891\n');
    writeFileSync(inputPath, 'n = "big"\n');

    expect(run([inputPath, outputPath, csvPath], plain())).toBe(0);
    expect(readFileSync(outputPath, 'utf-8')).toBe('n = "big, 12345678901234567891"\n');
  });

  it('fails on a template that is not valid UTF-8', () => {
    writeFileSync(csvPath, 'bar,42\n');
    writeFileSync(inputPath, Buffer.from([0x23, 0x20, 0x63, 0x61, 0x66, 0xe9, 0x0a]));

    expect(run([inputPath, outputPath, csvPath], plain())).toBe(1);
    expect(stderr.text().startsWith('Error: Error reading/writing files: ')).toBe(true);
    expect(existsSync(outputPath)).toBe(false);
  });

  it('fails when the output cannot be written', () => {
    writeFileSync(csvPath, 'bar,42\n');
    writeFileSync(inputPath, 'a = "bar"\n');
    const badOutput = join(tmpDir, 'no-such-dir', 'out.txt');

    expect(run([inputPath, badOutput, csvPath], plain())).toBe(1);
    expect(stderr.text().startsWith('Error: Error reading/writing files: ')).toBe(true);
  });

  it('colors errors outside CI mode', () => {
    expect(run([inputPath, outputPath, csvPath], { env: {}, stdout: stdout.stream, stderr: stderr.stream })).toBe(1);
    expect(stderr.text().startsWith(`\x1b[31mError: CSV file not found: ${csvPath}\x1b[0m\n`)).toBe(true);
  });

  it('turns colors off with --ci', () => {
    expect(run(['--ci', inputPath, outputPath, csvPath], { env: {}, stdout: stdout.stream, stderr: stderr.stream })).toBe(1);
    expect(stderr.text()).toBe(
      `Error: CSV file not found: ${csvPath}\n` +
      `Error: No line counts loaded from ${csvPath}\n`,
    );
  });
});
