/**
 * Shared helpers for linecount tests.
 */

import { createLogger, type Logger, type OutputStream } from './lib/output.ts';

export interface CapturedStream {
  stream: OutputStream;
  text: () => string;
}

export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  return {
    stream: {
      write: (chunk: string) => {
        chunks.push(chunk);
        return true;
      },
    },
    text: () => chunks.join(''),
  };
}

/** Plain (CI mode) logger writing into captured streams. */
export function captureLogger(): { logger: Logger; stdout: CapturedStream; stderr: CapturedStream } {
  const stdout = captureStream();
  const stderr = captureStream();
  const logger = createLogger({ ciMode: true, stdout: stdout.stream, stderr: stderr.stream });
  return { logger, stdout, stderr };
}
