import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { Workbook, type CellValue as WorkbookCellValue } from 'exceljs';
import { ParquetReader } from 'parquetjs-lite';
import { InputFileError } from '../errors';

export type CellValue = string | number | boolean | Date | null;

export type TabularEncoding = 'csv' | 'xlsx';

export interface TabularFile {
  encoding: TabularEncoding;
  headers: string[];
  rows: CellValue[][];
}

export type RecordRow = Record<string, unknown>;

export function detectEncoding(filePath: string): TabularEncoding | null {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.csv') {
    return 'csv';
  }
  if (extension === '.xlsx') {
    return 'xlsx';
  }
  return null;
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

function parseCsvMatrix(content: string, filename: string): string[][] {
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true
    });
  } catch (error) {
    throw new InputFileError(filename, 'CSV could not be parsed', { cause: error });
  }
  if (!isStringMatrix(records)) {
    throw new InputFileError(filename, 'CSV parser returned an unexpected shape');
  }
  return records;
}

async function readCsv(filePath: string): Promise<TabularFile> {
  const filename = path.basename(filePath);
  const content = await readFile(filePath, 'utf8');
  const [headerRow, ...dataRows] = parseCsvMatrix(content, filename);
  if (!headerRow) {
    throw new InputFileError(filename, 'file is empty');
  }
  const headers = headerRow.map((header) => header.trim());
  const rows = dataRows.map((row) => headers.map((_, index) => normalizeTextCell(row[index])));
  return { encoding: 'csv', headers, rows };
}

function normalizeTextCell(value: string | undefined): CellValue {
  if (value === undefined) {
    return null;
  }
  return value.length === 0 ? null : value;
}

export function normalizeWorkbookCell(value: WorkbookCellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('error' in value) {
    return null;
  }
  if ('result' in value) {
    const result = value.result;
    if (result === undefined || result === null) {
      return null;
    }
    if (typeof result === 'object' && !(result instanceof Date)) {
      return null;
    }
    return result;
  }
  return null;
}

async function readWorkbook(filePath: string): Promise<TabularFile> {
  const filename = path.basename(filePath);
  const workbook = new Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw new InputFileError(filename, 'workbook could not be opened', { cause: error });
  }
  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new InputFileError(filename, 'workbook has no worksheets');
  }

  const headerRow = sheet.getRow(1);
  const headers: string[] = [];
  for (let column = 1; column <= headerRow.cellCount; column += 1) {
    const value = normalizeWorkbookCell(headerRow.getCell(column).value);
    headers.push(value === null ? '' : String(value).trim());
  }
  if (headers.every((header) => header.length === 0)) {
    throw new InputFileError(filename, 'file is empty');
  }

  const rows: CellValue[][] = [];
  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) {
      return;
    }
    rows.push(headers.map((_, index) => normalizeWorkbookCell(row.getCell(index + 1).value)));
  });
  return { encoding: 'xlsx', headers, rows };
}

export async function readTabularFile(filePath: string): Promise<TabularFile> {
  const encoding = detectEncoding(filePath);
  if (encoding === 'csv') {
    return readCsv(filePath);
  }
  if (encoding === 'xlsx') {
    return readWorkbook(filePath);
  }
  throw new InputFileError(path.basename(filePath), `unsupported file extension '${path.extname(filePath)}'`);
}

async function readParquetRecords(filePath: string): Promise<RecordRow[]> {
  const reader = await ParquetReader.openFile(filePath);
  try {
    const cursor = reader.getCursor();
    const rows: RecordRow[] = [];
    let row = await cursor.next();
    while (row) {
      rows.push(row);
      row = await cursor.next();
    }
    return rows;
  } finally {
    await reader.close();
  }
}

/**
 * Reads a reference table (Parquet or CSV) into keyed records. Used for the
 * organizational snapshot feed and the content catalog.
 */
export async function readRecordFile(filePath: string): Promise<RecordRow[]> {
  if (path.extname(filePath).toLowerCase() === '.parquet') {
    return readParquetRecords(filePath);
  }
  const table = await readTabularFile(filePath);
  return table.rows.map((row) => {
    const record: RecordRow = {};
    table.headers.forEach((header, index) => {
      record[header] = row[index] ?? null;
    });
    return record;
  });
}

export function recordValueToText(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? value.toISOString() : null;
  }
  if (Buffer.isBuffer(value)) {
    return recordValueToText(value.toString('utf8'));
  }
  return null;
}
