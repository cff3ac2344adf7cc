declare module 'parquetjs-lite' {
  export type ParquetField = {
    type: string;
    optional?: boolean;
  };

  export type ParquetSchemaDefinition = Record<string, ParquetField>;

  export class ParquetSchema {
    constructor(schema: ParquetSchemaDefinition);
  }

  export type ParquetRow = Record<string, unknown>;

  export class ParquetWriter {
    static openFile(schema: ParquetSchema, filePath: string): Promise<ParquetWriter>;
    appendRow(row: ParquetRow): Promise<void>;
    close(): Promise<void>;
  }

  export class ParquetCursor {
    next(): Promise<ParquetRow | null>;
  }

  export class ParquetReader {
    static openFile(filePath: string): Promise<ParquetReader>;
    getCursor(): ParquetCursor;
    close(): Promise<void>;
  }
}
