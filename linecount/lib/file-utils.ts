/**
 * File Utilities
 */

import { readFileSync } from 'fs';

/**
 * Read a file as strict UTF-8. Invalid byte sequences throw instead of
 * being replaced with U+FFFD, and a leading byte order mark is kept.
 */
export function readUtf8File(filePath: string): string {
  const bytes = readFileSync(filePath);
  return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
}
