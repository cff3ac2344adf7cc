export type PipelineErrorCode =
  | 'INPUT_INVALID'
  | 'REFERENCE_UNAVAILABLE'
  | 'STATE_INCONSISTENT'
  | 'STORE_FAILURE';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export class InputFileError extends PipelineError {
  readonly filename: string;

  constructor(filename: string, message: string, options?: { cause?: unknown }) {
    super('INPUT_INVALID', `${filename}: ${message}`, options);
    this.name = 'InputFileError';
    this.filename = filename;
  }
}

export class MissingColumnsError extends InputFileError {
  readonly missing: string[];

  constructor(filename: string, missing: string[]) {
    super(filename, `missing required column(s): ${missing.join(', ')}`);
    this.name = 'MissingColumnsError';
    this.missing = missing;
  }
}

export class ReferenceDataError extends PipelineError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('REFERENCE_UNAVAILABLE', message, options);
    this.name = 'ReferenceDataError';
    this.source = source;
  }
}

export class StateConsistencyError extends PipelineError {
  readonly filename: string;

  constructor(filename: string, message: string, options?: { cause?: unknown }) {
    super('STATE_INCONSISTENT', `${filename}: ${message}`, options);
    this.name = 'StateConsistencyError';
    this.filename = filename;
  }
}

export class EventStoreError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_FAILURE', message, options);
    this.name = 'EventStoreError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
