import { access } from 'node:fs/promises';
import path from 'node:path';

import { ReferenceDataError, describeError } from '../errors';
import { readRecordFile, recordValueToText, type RecordRow } from '../ingest/readers';
import { formatCanonicalTimestamp, parseTimestampValue, toUtcDate } from '../ingest/timestamps';
import { emptyOrgAttributes, ORG_ATTRIBUTE_FIELDS, type OrgAttributeField, type OrganizationalSnapshot } from '../types';
import { normalizeOrgIdentifier } from './orgIdentifiers';

const IDENTIFIER_COLUMNS = ['gpn', 'org_id', 'actor_id'];
const DATE_COLUMN = 'snapshot_date';
const YEAR_COLUMN = 'snapshot_year';
const MONTH_COLUMN = 'snapshot_month';

export const ATTRIBUTE_COLUMNS: Record<OrgAttributeField, string[]> = {
  orgDivision: ['division', 'gcrs_division_desc'],
  orgUnit: ['unit', 'gcrs_unit_desc'],
  orgArea: ['area', 'gcrs_area_desc'],
  orgSector: ['sector', 'gcrs_sector_desc'],
  orgSegment: ['segment', 'gcrs_segment_desc'],
  orgFunction: ['function', 'gcrs_function_desc'],
  orgOuCode: ['ou_code'],
  orgCountry: ['country', 'work_location_country'],
  orgRegion: ['region', 'work_location_region'],
  orgJobTitle: ['job_title'],
  orgJobFamily: ['job_family'],
  orgManagementLevel: ['management_level'],
  orgCostCenter: ['cost_center']
};

export type SnapshotFeed =
  | { status: 'loaded'; source: string; snapshots: OrganizationalSnapshot[]; skippedRows: number }
  | { status: 'missing'; source: string }
  | { status: 'unreadable'; source: string; error: ReferenceDataError };

function findColumn(headers: string[], candidates: string[]): string | null {
  for (const candidate of candidates) {
    const match = headers.find((header) => header.toLowerCase() === candidate);
    if (match !== undefined) {
      return match;
    }
  }
  return null;
}

function toInteger(value: unknown): number | null {
  if (typeof value === 'bigint') {
    return Number(value);
  }
  const text = recordValueToText(value);
  if (text === null || !/^\d+(\.0+)?$/.test(text)) {
    return null;
  }
  return Number.parseInt(text, 10);
}

function resolveSnapshotDate(
  row: RecordRow,
  dateColumn: string | null,
  yearColumn: string | null,
  monthColumn: string | null
): string | null {
  if (dateColumn) {
    const raw = row[dateColumn];
    const parsed = parseTimestampValue(raw instanceof Date ? raw : recordValueToText(raw));
    if (parsed) {
      return toUtcDate(formatCanonicalTimestamp(parsed.epochMicros));
    }
  }
  if (yearColumn && monthColumn) {
    const year = toInteger(row[yearColumn]);
    const month = toInteger(row[monthColumn]);
    if (year !== null && month !== null && month >= 1 && month <= 12) {
      return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-01`;
    }
  }
  return null;
}

/**
 * Maps raw feed records onto OrganizationalSnapshots. Rows without a usable
 * identifier or date are skipped and counted.
 */
export function parseSnapshotRecords(
  rows: RecordRow[],
  source: string
): { snapshots: OrganizationalSnapshot[]; skippedRows: number } {
  const headers = Array.from(new Set(rows.flatMap((row) => Object.keys(row))));
  const identifierColumn = findColumn(headers, IDENTIFIER_COLUMNS);
  const dateColumn = findColumn(headers, [DATE_COLUMN]);
  const yearColumn = findColumn(headers, [YEAR_COLUMN]);
  const monthColumn = findColumn(headers, [MONTH_COLUMN]);

  if (rows.length > 0 && !identifierColumn) {
    throw new ReferenceDataError(source, `no identifier column (expected one of ${IDENTIFIER_COLUMNS.join(', ')})`);
  }
  if (rows.length > 0 && !dateColumn && !(yearColumn && monthColumn)) {
    throw new ReferenceDataError(source, `no ${DATE_COLUMN} or ${YEAR_COLUMN}/${MONTH_COLUMN} columns`);
  }

  const attributeColumns = ORG_ATTRIBUTE_FIELDS.map(
    (field) => [field, findColumn(headers, ATTRIBUTE_COLUMNS[field])] as const
  );

  const snapshots: OrganizationalSnapshot[] = [];
  let skippedRows = 0;
  for (const row of rows) {
    const orgId = identifierColumn ? normalizeOrgIdentifier(recordValueToText(row[identifierColumn])) : null;
    const snapshotDate = resolveSnapshotDate(row, dateColumn, yearColumn, monthColumn);
    if (!orgId || !snapshotDate) {
      skippedRows += 1;
      continue;
    }
    const attributes = emptyOrgAttributes();
    for (const [field, column] of attributeColumns) {
      if (column) {
        attributes[field] = recordValueToText(row[column]);
      }
    }
    snapshots.push({ orgId, snapshotDate, attributes });
  }
  return { snapshots, skippedRows };
}

/**
 * Loads the organizational snapshot feed. A missing or unreadable feed is
 * reported through the returned status instead of thrown.
 */
export async function loadSnapshotFeed(filePath: string): Promise<SnapshotFeed> {
  const source = path.basename(filePath);
  try {
    await access(filePath);
  } catch {
    return { status: 'missing', source };
  }

  try {
    const rows = await readRecordFile(filePath);
    const { snapshots, skippedRows } = parseSnapshotRecords(rows, source);
    return { status: 'loaded', source, snapshots, skippedRows };
  } catch (error) {
    const referenceError =
      error instanceof ReferenceDataError
        ? error
        : new ReferenceDataError(source, `snapshot feed could not be read: ${describeError(error)}`, { cause: error });
    return { status: 'unreadable', source, error: referenceError };
  }
}
