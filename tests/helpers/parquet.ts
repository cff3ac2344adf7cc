import { ParquetReader } from 'parquetjs-lite';

export async function readParquetRows(file: string): Promise<Array<Record<string, unknown>>> {
  const reader = await ParquetReader.openFile(file);
  try {
    const cursor = reader.getCursor();
    const rows: Array<Record<string, unknown>> = [];
    for (let row = await cursor.next(); row; row = await cursor.next()) {
      rows.push(row);
    }
    return rows;
  } finally {
    await reader.close();
  }
}
