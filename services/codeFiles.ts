import fs from 'node:fs';
import path from 'node:path';

import { filesLog } from '../config/logger.js';
import { CodeFileError } from '../utils/errors.js';

export type CodeFileContents = {
  codes: string[];
  /** Blank lines that were left out of `codes`. */
  blankLines: number;
};

/**
 * Reads one code per line. Line endings (LF or CRLF) are stripped and blank
 * lines skipped; everything else is kept verbatim, whatever its length.
 */
export function readCodeFile(filePath: string): CodeFileContents {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new CodeFileError(filePath, 'read', err);
  }

  const lines = text.split(/\r?\n/);
  // A final newline leaves one empty segment that is not a line.
  if (lines[lines.length - 1] === '') lines.pop();
  const codes = lines.filter((line) => line.length > 0);
  const blankLines = lines.length - codes.length;

  filesLog.debug('Read code file', { filePath, codes: codes.length, blankLines });
  return { codes, blankLines };
}

export function codeFileName(prefix: string): string {
  return `prefix_${prefix}.txt`;
}

export interface CodeFileWriter {
  readonly filePath: string;
  append(code: string): void;
  close(): void;
}

/**
 * Creates (or truncates) the output file for one prefix. Codes are written as
 * they are found, so an interrupted run keeps what it already produced.
 */
export function openCodeFile(outDir: string, prefix: string): CodeFileWriter {
  const filePath = path.join(outDir, codeFileName(prefix));
  let fd: number | null;
  try {
    fs.mkdirSync(outDir, { recursive: true });
    fd = fs.openSync(filePath, 'w');
  } catch (err) {
    throw new CodeFileError(filePath, 'write', err);
  }
  filesLog.debug('Opened code file', { filePath });

  let written = 0;
  return {
    filePath,
    append(code: string) {
      if (fd === null) throw new CodeFileError(filePath, 'write', new Error('file already closed'));
      try {
        fs.writeSync(fd, `${code}\n`);
        written++;
      } catch (err) {
        throw new CodeFileError(filePath, 'write', err);
      }
    },
    close() {
      if (fd === null) return;
      const current = fd;
      fd = null;
      try {
        fs.closeSync(current);
      } catch (err) {
        throw new CodeFileError(filePath, 'write', err);
      }
      filesLog.debug('Closed code file', { filePath, written });
    },
  };
}
