import { access } from 'node:fs/promises';
import path from 'node:path';

import { ReferenceDataError, describeError } from '../errors';
import { readRecordFile, recordValueToText, type RecordRow } from '../ingest/readers';

const ID_COLUMNS = ['storyid', 'story id', 'story_id', 'content_id'];
const TITLE_COLUMNS = ['title', 'story title', 'story_title', 'content_title'];
const KEYS_COLUMNS = ['keys'];

export interface ContentEntry {
  contentId: string;
  title: string | null;
  keys: string | null;
}

export type ContentCatalog = ReadonlyMap<string, ContentEntry>;

export type ContentCatalogLoad =
  | { status: 'loaded'; source: string; catalog: ContentCatalog }
  | { status: 'missing'; source: string; catalog: ContentCatalog }
  | { status: 'unreadable'; source: string; catalog: ContentCatalog; error: ReferenceDataError };

function findColumn(headers: string[], candidates: string[]): string | null {
  for (const candidate of candidates) {
    const match = headers.find((header) => header.trim().toLowerCase() === candidate);
    if (match !== undefined) {
      return match;
    }
  }
  return null;
}

export function buildContentCatalog(rows: RecordRow[], source: string): Map<string, ContentEntry> {
  const catalog = new Map<string, ContentEntry>();
  if (rows.length === 0) {
    return catalog;
  }
  const headers = Array.from(new Set(rows.flatMap((row) => Object.keys(row))));
  const idColumn = findColumn(headers, ID_COLUMNS);
  const titleColumn = findColumn(headers, TITLE_COLUMNS);
  if (!idColumn || !titleColumn) {
    throw new ReferenceDataError(source, 'content catalog needs a content id column and a title column');
  }
  const keysColumn = findColumn(headers, KEYS_COLUMNS);

  for (const row of rows) {
    const rawId = recordValueToText(row[idColumn]);
    const contentId = rawId?.replace(/\.0+$/, '') ?? null;
    if (!contentId || !/^\d+$/.test(contentId)) {
      continue;
    }
    catalog.set(contentId, {
      contentId,
      title: recordValueToText(row[titleColumn]),
      keys: keysColumn ? recordValueToText(row[keysColumn]) : null
    });
  }
  return catalog;
}

export async function loadContentCatalog(filePath: string): Promise<ContentCatalogLoad> {
  const source = path.basename(filePath);
  try {
    await access(filePath);
  } catch {
    return { status: 'missing', source, catalog: new Map() };
  }
  try {
    const rows = await readRecordFile(filePath);
    return { status: 'loaded', source, catalog: buildContentCatalog(rows, source) };
  } catch (error) {
    const referenceError =
      error instanceof ReferenceDataError
        ? error
        : new ReferenceDataError(source, `content catalog could not be read: ${describeError(error)}`, { cause: error });
    return { status: 'unreadable', source, catalog: new Map(), error: referenceError };
  }
}
