import { MissingColumnsError } from '../errors';
import { normalizeOrgIdentifier } from '../enrichment/orgIdentifiers';
import { identityKey, type CanonicalEvent } from '../types';
import type { CellValue, TabularFile } from './readers';
import { formatCanonicalTimestamp, hasSubSecondPrecision, parseTimestampValue } from './timestamps';

const CANONICAL_FIELDS = [
  'timestamp',
  'actorId',
  'sessionId',
  'eventName',
  'orgId',
  'email',
  'linkLabel',
  'linkType',
  'pageTitle',
  'pageUrl'
] as const;

type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/**
 * Source header candidates per canonical field, in precedence order. When a
 * field resolves to several columns the first non-empty value wins per row.
 */
export const FIELD_CANDIDATES: Record<CanonicalField, string[]> = {
  timestamp: ['timestamp', 'timestamp [UTC]'],
  actorId: ['user_id', 'user_Id', 'userId'],
  sessionId: ['session_id', 'session_Id', 'sessionId'],
  eventName: ['name', 'event_name'],
  orgId: ['CP_GPN', 'CP_gpn', 'GPN', 'gpn'],
  email: ['Email', 'email', 'CP_Email', 'CP_email'],
  linkLabel: ['CP_Link_label', 'CP_link_label', 'Link_label'],
  linkType: ['CP_Link_Type', 'CP_link_type', 'CP_LinkType'],
  pageTitle: ['CP_Page_Title', 'CP_page_title', 'CP_PageTitle', 'page_title'],
  pageUrl: ['CP_Page_URL', 'CP_page_url', 'CP_PageUrl', 'page_url', 'url']
};

const REQUIRED_FIELDS: CanonicalField[] = ['timestamp', 'actorId', 'sessionId', 'eventName'];

const CUSTOM_DIMENSIONS_HEADER = 'customdimensions';

export type TimestampPrecision = 'sub-second' | 'whole-second' | 'empty';

export interface NormalizationReport {
  sourceRows: number;
  droppedColumns: string[];
  invalidTimestampRows: number;
  incompleteRows: number;
  invalidOrgIdRows: number;
  truncatedTimestamps: number;
  collisions: number;
  precision: TimestampPrecision;
  warnings: string[];
}

export interface NormalizedFile {
  events: CanonicalEvent[];
  report: NormalizationReport;
}

export type NormalizeOptions = {
  sourceFile: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === 'object' && !Array.isArray(value));
}

export function cellToText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? value.toISOString() : null;
  }
  const text = String(value).trim();
  return text.length > 0 ? text : null;
}

function parseCustomDimensions(value: CellValue | undefined): Record<string, unknown> | null {
  const text = cellToText(value);
  if (!text) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function customValueToCell(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Flattens a JSON `customDimensions` column into `CP_<key>` columns. Existing
 * headers take precedence over flattened keys of the same name.
 */
export function expandCustomDimensions(table: TabularFile): TabularFile {
  const sourceIndex = table.headers.findIndex((header) => header.toLowerCase() === CUSTOM_DIMENSIONS_HEADER);
  if (sourceIndex === -1) {
    return table;
  }

  const parsedRows = table.rows.map((row) => parseCustomDimensions(row[sourceIndex]));
  const existing = new Set(table.headers);
  const addedKeys: string[] = [];
  for (const parsed of parsedRows) {
    if (!parsed) {
      continue;
    }
    for (const key of Object.keys(parsed)) {
      const header = `CP_${key}`;
      if (!existing.has(header)) {
        existing.add(header);
        addedKeys.push(key);
      }
    }
  }

  const headers = table.headers.filter((_, index) => index !== sourceIndex);
  headers.push(...addedKeys.map((key) => `CP_${key}`));
  const rows = table.rows.map((row, rowIndex) => {
    const base = row.filter((_, index) => index !== sourceIndex);
    const parsed = parsedRows[rowIndex];
    return [...base, ...addedKeys.map((key) => customValueToCell(parsed ? parsed[key] : null))];
  });
  return { encoding: table.encoding, headers, rows };
}

function resolveColumns(headers: string[]): { columns: Record<CanonicalField, number[]>; unmapped: string[] } {
  const used = new Set<number>();
  const claim = (field: CanonicalField): number[] => {
    const indexes: number[] = [];
    for (const candidate of FIELD_CANDIDATES[field]) {
      let index = headers.indexOf(candidate);
      if (index === -1) {
        const lowered = candidate.toLowerCase();
        index = headers.findIndex((header, position) => !used.has(position) && header.toLowerCase() === lowered);
      }
      if (index !== -1 && !used.has(index)) {
        used.add(index);
        indexes.push(index);
      }
    }
    return indexes;
  };
  // Claimed in CANONICAL_FIELDS order so a header can only feed one field.
  const columns: Record<CanonicalField, number[]> = {
    timestamp: claim('timestamp'),
    actorId: claim('actorId'),
    sessionId: claim('sessionId'),
    eventName: claim('eventName'),
    orgId: claim('orgId'),
    email: claim('email'),
    linkLabel: claim('linkLabel'),
    linkType: claim('linkType'),
    pageTitle: claim('pageTitle'),
    pageUrl: claim('pageUrl')
  };
  const unmapped = headers.filter((header, index) => !used.has(index) && header.length > 0);
  return { columns, unmapped };
}

function firstText(row: CellValue[], indexes: number[]): string | null {
  for (const index of indexes) {
    const text = cellToText(row[index]);
    if (text !== null) {
      return text;
    }
  }
  return null;
}

function firstCell(row: CellValue[], indexes: number[]): CellValue {
  for (const index of indexes) {
    const value = row[index];
    if (value !== null && value !== undefined && value !== '') {
      return value;
    }
  }
  return null;
}

/**
 * Maps one parsed export onto CanonicalEvents. Rows that collide on the identity
 * tuple inside the same file collapse onto the last occurrence.
 */
export function normalizeFile(source: TabularFile, options: NormalizeOptions): NormalizedFile {
  const table = expandCustomDimensions(source);
  const { columns, unmapped } = resolveColumns(table.headers);

  const missing = REQUIRED_FIELDS.filter((field) => columns[field].length === 0);
  if (missing.length > 0) {
    throw new MissingColumnsError(
      options.sourceFile,
      missing.map((field) => FIELD_CANDIDATES[field][0] ?? field)
    );
  }

  const byIdentity = new Map<string, CanonicalEvent>();
  let invalidTimestampRows = 0;
  let incompleteRows = 0;
  let invalidOrgIdRows = 0;
  let truncatedTimestamps = 0;
  let subSecondRows = 0;
  let acceptedRows = 0;

  for (const row of table.rows) {
    const parsedTimestamp = parseTimestampValue(firstCell(row, columns.timestamp));
    if (!parsedTimestamp) {
      invalidTimestampRows += 1;
      continue;
    }
    const actorId = firstText(row, columns.actorId);
    const eventName = firstText(row, columns.eventName);
    if (!actorId || !eventName) {
      incompleteRows += 1;
      continue;
    }

    const rawOrgId = firstText(row, columns.orgId);
    const orgId = normalizeOrgIdentifier(rawOrgId);
    if (rawOrgId !== null && orgId === null) {
      invalidOrgIdRows += 1;
    }
    if (parsedTimestamp.truncated) {
      truncatedTimestamps += 1;
    }
    if (hasSubSecondPrecision(parsedTimestamp.epochMicros)) {
      subSecondRows += 1;
    }

    const event: CanonicalEvent = {
      timestamp: formatCanonicalTimestamp(parsedTimestamp.epochMicros),
      actorId,
      sessionId: firstText(row, columns.sessionId) ?? '',
      eventName,
      orgId,
      email: firstText(row, columns.email),
      linkLabel: firstText(row, columns.linkLabel),
      linkType: firstText(row, columns.linkType),
      pageTitle: firstText(row, columns.pageTitle),
      pageUrl: firstText(row, columns.pageUrl),
      sourceFile: options.sourceFile
    };
    acceptedRows += 1;
    const key = identityKey(event);
    byIdentity.delete(key);
    byIdentity.set(key, event);
  }

  const events = Array.from(byIdentity.values());
  const collisions = acceptedRows - events.length;
  const precision: TimestampPrecision =
    events.length === 0 ? 'empty' : subSecondRows > 0 ? 'sub-second' : 'whole-second';

  const warnings: string[] = [];
  if (precision === 'whole-second') {
    warnings.push(
      'timestamps carry no sub-second precision; events in the same second may collapse onto one identity'
    );
  }
  if (truncatedTimestamps > 0) {
    warnings.push(`${truncatedTimestamps} timestamp(s) carried sub-microsecond digits that were truncated`);
  }
  if (collisions > 0) {
    warnings.push(`${collisions} row(s) shared an identity tuple with another row and were collapsed`);
  }
  if (invalidTimestampRows > 0) {
    warnings.push(`${invalidTimestampRows} row(s) dropped with unparseable timestamps`);
  }
  if (incompleteRows > 0) {
    warnings.push(`${incompleteRows} row(s) dropped without an actor or event name`);
  }
  if (invalidOrgIdRows > 0) {
    warnings.push(`${invalidOrgIdRows} row(s) carried a non-numeric organizational identifier`);
  }

  return {
    events,
    report: {
      sourceRows: table.rows.length,
      droppedColumns: unmapped,
      invalidTimestampRows,
      incompleteRows,
      invalidOrgIdRows,
      truncatedTimestamps,
      collisions,
      precision,
      warnings
    }
  };
}
