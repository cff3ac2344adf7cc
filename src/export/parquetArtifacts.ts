import { mkdir, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { ParquetSchema, ParquetWriter, type ParquetSchemaDefinition } from 'parquetjs-lite';

export type ColumnType = 'UTF8' | 'INT32' | 'INT64' | 'DOUBLE';

export type ColumnValue = string | number | null;

export interface ColumnDefinition<Row> {
  name: string;
  type: ColumnType;
  optional?: boolean;
  value: (row: Row) => ColumnValue;
}

export function toSnakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

function buildSchema<Row>(columns: readonly ColumnDefinition<Row>[]): ParquetSchema {
  const definition: ParquetSchemaDefinition = {};
  for (const column of columns) {
    definition[column.name] = column.optional ? { type: column.type, optional: true } : { type: column.type };
  }
  return new ParquetSchema(definition);
}

function toParquetRow<Row>(columns: readonly ColumnDefinition<Row>[], row: Row): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const column of columns) {
    const value = column.value(row);
    if (value === null) {
      if (!column.optional) {
        throw new Error(`Column ${column.name} is required but the value is null`);
      }
      continue;
    }
    record[column.name] = value;
  }
  return record;
}

let tempCounter = 0;

/**
 * Writes `rows` to `targetPath` as Parquet. The file is assembled under a
 * temporary name in the same directory and renamed into place, so readers of
 * `targetPath` only ever see a complete file.
 */
export async function writeArtifact<Row>(
  targetPath: string,
  columns: readonly ColumnDefinition<Row>[],
  rows: readonly Row[]
): Promise<number> {
  const directory = path.dirname(targetPath);
  await mkdir(directory, { recursive: true });
  tempCounter += 1;
  const tempPath = path.join(directory, `.${path.basename(targetPath)}.${process.pid}.${tempCounter}.tmp`);

  try {
    const writer = await ParquetWriter.openFile(buildSchema(columns), tempPath);
    try {
      for (const row of rows) {
        await writer.appendRow(toParquetRow(columns, row));
      }
    } finally {
      await writer.close();
    }
    await rename(tempPath, targetPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
  return rows.length;
}
