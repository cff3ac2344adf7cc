import { stat } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';

import { InputFileError } from '../errors';

export const INPUT_FILE_PATTERNS = ['*.csv', '*.xlsx'];
// Spreadsheet applications leave `~$name.xlsx` lock files next to open workbooks.
const IGNORED_PATTERNS = ['~$*'];

export type OrderingSource = 'filename' | 'mtime';

export interface InputFile {
  path: string;
  filename: string;
  /** `YYYY-MM-DD` from the `_YYYY_MM_DD` stem suffix, or null when absent. */
  extractedDate: string | null;
  modifiedAtMs: number;
  orderingSource: OrderingSource;
}

/** A discovered file whose metadata or contents could not be read. */
export interface UnreadableInputFile {
  path: string;
  filename: string;
  error: unknown;
}

export interface InputDiscovery {
  files: InputFile[];
  unreadable: UnreadableInputFile[];
}

const DATE_SUFFIX = /_(\d{4})_(\d{2})_(\d{2})$/;

export function extractDateFromFilename(filePath: string): string | null {
  const stem = path.basename(filePath, path.extname(filePath));
  const match = DATE_SUFFIX.exec(stem);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const millis = Date.UTC(Number(year), Number(month) - 1, Number(day));
  const date = new Date(millis);
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return `${year}-${month}-${day}`;
}

export async function describeInputFile(filePath: string): Promise<InputFile> {
  const absolutePath = path.resolve(filePath);
  const stats = await stat(absolutePath);
  const extractedDate = extractDateFromFilename(absolutePath);
  return {
    path: absolutePath,
    filename: path.basename(absolutePath),
    extractedDate,
    modifiedAtMs: stats.mtimeMs,
    orderingSource: extractedDate ? 'filename' : 'mtime'
  } satisfies InputFile;
}

export async function discoverInputFiles(inputDir: string): Promise<InputDiscovery> {
  const entries = await fg(INPUT_FILE_PATTERNS, {
    cwd: inputDir,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
    ignore: IGNORED_PATTERNS
  });
  const files: InputFile[] = [];
  const unreadable: UnreadableInputFile[] = [];
  for (const entry of entries) {
    try {
      files.push(await describeInputFile(entry));
    } catch (error) {
      unreadable.push({ path: entry, filename: path.basename(entry), error });
    }
  }
  return { files: orderInputFiles(files), unreadable };
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Resolves a single named file. A bare filename is looked up in `inputDir`;
 * anything with a directory part is taken relative to the working directory.
 */
export async function locateInputFile(inputDir: string, fileArg: string): Promise<InputDiscovery> {
  const target = path.basename(fileArg) === fileArg ? path.join(inputDir, fileArg) : path.resolve(fileArg);
  const filename = path.basename(target);
  try {
    return { files: [await describeInputFile(target)], unreadable: [] };
  } catch (error) {
    const failure = isMissingFileError(error)
      ? new InputFileError(filename, `not found at ${target}`, { cause: error })
      : error;
    return { files: [], unreadable: [{ path: target, filename, error: failure }] };
  }
}

function orderingInstant(file: InputFile): number {
  if (file.extractedDate) {
    return Date.parse(`${file.extractedDate}T00:00:00Z`);
  }
  return file.modifiedAtMs;
}

/**
 * Processing order: logical date ascending, filename as tiebreaker. Callers never
 * rely on directory listing order.
 */
export function orderInputFiles(files: InputFile[]): InputFile[] {
  return [...files].sort((left, right) => {
    const byDate = orderingInstant(left) - orderingInstant(right);
    if (byDate !== 0) {
      return byDate;
    }
    if (left.filename === right.filename) {
      return 0;
    }
    return left.filename < right.filename ? -1 : 1;
  });
}
