const MICROS_PER_SECOND = 1_000_000;
const MICROS_PER_MILLISECOND = 1_000;
const EXCEL_EPOCH_OFFSET_DAYS = 25_569;
const MILLIS_PER_DAY = 86_400_000;

export interface ParsedTimestamp {
  epochMicros: number;
  /** Non-zero digits beyond the sixth fractional place were cut to microseconds. */
  truncated: boolean;
}

type TimestampParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  fraction: string;
  offsetMinutes: number;
};

type TimestampPattern = {
  pattern: RegExp;
  toParts: (match: RegExpExecArray) => TimestampParts;
};

function toInt(value: string | undefined): number {
  return value ? Number.parseInt(value, 10) : 0;
}

function parseOffset(value: string | undefined): number {
  if (!value || value === 'Z') {
    return 0;
  }
  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(value);
  if (!match) {
    return 0;
  }
  const minutes = toInt(match[2]) * 60 + toInt(match[3]);
  return match[1] === '-' ? -minutes : minutes;
}

// App Insights exports use day-first dates with either separator; ISO covers
// everything produced by spreadsheets and re-exported CSVs.
const PATTERNS: TimestampPattern[] = [
  {
    pattern: /^(\d{2})\/(\d{2})\/(\d{4})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?$/,
    toParts: (m) => ({
      day: toInt(m[1]),
      month: toInt(m[2]),
      year: toInt(m[3]),
      hour: toInt(m[4]),
      minute: toInt(m[5]),
      second: toInt(m[6]),
      fraction: m[7] ?? '',
      offsetMinutes: 0
    })
  },
  {
    pattern: /^(\d{2})\.(\d{2})\.(\d{4})(?: (\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?$/,
    toParts: (m) => ({
      day: toInt(m[1]),
      month: toInt(m[2]),
      year: toInt(m[3]),
      hour: toInt(m[4]),
      minute: toInt(m[5]),
      second: toInt(m[6]),
      fraction: m[7] ?? '',
      offsetMinutes: 0
    })
  },
  {
    pattern:
      /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i,
    toParts: (m) => ({
      year: toInt(m[1]),
      month: toInt(m[2]),
      day: toInt(m[3]),
      hour: toInt(m[4]),
      minute: toInt(m[5]),
      second: toInt(m[6]),
      fraction: m[7] ?? '',
      offsetMinutes: parseOffset(m[8]?.toUpperCase())
    })
  }
];

function partsToTimestamp(parts: TimestampParts): ParsedTimestamp | null {
  const { year, month, day, hour, minute, second } = parts;
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const millis = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(millis);
  if (check.getUTCDate() !== day || check.getUTCMonth() !== month - 1) {
    return null;
  }
  const fractionDigits = parts.fraction.slice(0, 6).padEnd(6, '0');
  const micros = Number.parseInt(fractionDigits, 10);
  const epochMicros = (millis - parts.offsetMinutes * 60_000) * MICROS_PER_MILLISECOND + micros;
  return { epochMicros, truncated: /[1-9]/.test(parts.fraction.slice(6)) };
}

export function parseTimestampText(value: string): ParsedTimestamp | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  for (const { pattern, toParts } of PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match) {
      return partsToTimestamp(toParts(match));
    }
  }
  return null;
}

/**
 * Accepts the cell shapes the readers produce: text, spreadsheet dates (already
 * UTC instants) and raw spreadsheet serial numbers.
 */
export function parseTimestampValue(value: unknown): ParsedTimestamp | null {
  if (value instanceof Date) {
    const millis = value.getTime();
    return Number.isFinite(millis) ? { epochMicros: millis * MICROS_PER_MILLISECOND, truncated: false } : null;
  }
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    const millis = Math.round((value - EXCEL_EPOCH_OFFSET_DAYS) * MILLIS_PER_DAY);
    return { epochMicros: millis * MICROS_PER_MILLISECOND, truncated: false };
  }
  if (typeof value === 'string') {
    return parseTimestampText(value);
  }
  return null;
}

export function formatCanonicalTimestamp(epochMicros: number): string {
  const seconds = Math.floor(epochMicros / MICROS_PER_SECOND);
  const fraction = epochMicros - seconds * MICROS_PER_SECOND;
  const base = new Date(seconds * 1000).toISOString().slice(0, 19);
  return `${base}.${String(fraction).padStart(6, '0')}Z`;
}

export function canonicalToEpochMicros(timestamp: string): number {
  const parsed = parseTimestampText(timestamp);
  if (!parsed) {
    throw new Error(`Invalid canonical timestamp '${timestamp}'`);
  }
  return parsed.epochMicros;
}

export function hasSubSecondPrecision(epochMicros: number): boolean {
  return epochMicros % MICROS_PER_SECOND !== 0;
}

export function toUtcDate(timestamp: string): string {
  return timestamp.slice(0, 10);
}
