import assert from 'node:assert/strict';
import { test } from 'node:test';

import { MissingColumnsError } from '../src/errors';
import { expandCustomDimensions, normalizeFile } from '../src/ingest/normalizer';
import type { TabularFile } from '../src/ingest/readers';

const CSV_HEADERS = [
  'timestamp [UTC]',
  'user_Id',
  'session_Id',
  'name',
  'CP_Link_label',
  'CP_Link_Type',
  'CP_GPN',
  'Email',
  'client_CountryOrRegion'
];

function csvTable(rows: Array<Array<string | null>>): TabularFile {
  return { encoding: 'csv', headers: CSV_HEADERS, rows };
}

test('maps source headers onto the canonical schema', () => {
  const { events, report } = normalizeFile(
    csvTable([
      [
        '05/03/2024 10:00:00.2500000',
        'u-1',
        's-1',
        'Link Click',
        '123 - Read more',
        'story',
        '1234567.0',
        'reader@example.test',
        'DE'
      ]
    ]),
    { sourceFile: 'export_2024_03_05.csv' }
  );

  assert.deepEqual(events, [
    {
      timestamp: '2024-03-05T10:00:00.250000Z',
      actorId: 'u-1',
      sessionId: 's-1',
      eventName: 'Link Click',
      orgId: '01234567',
      email: 'reader@example.test',
      linkLabel: '123 - Read more',
      linkType: 'story',
      pageTitle: null,
      pageUrl: null,
      sourceFile: 'export_2024_03_05.csv'
    }
  ]);
  assert.deepEqual(report.droppedColumns, ['client_CountryOrRegion']);
  assert.equal(report.precision, 'sub-second');
  assert.deepEqual(report.warnings, []);
});

test('header matching falls back to case-insensitive names', () => {
  const { events } = normalizeFile(
    {
      encoding: 'xlsx',
      headers: ['Timestamp', 'USER_ID', 'Session_Id', 'Name', 'cp_gpn'],
      rows: [[new Date(Date.UTC(2024, 2, 5, 10, 0, 0)), 'u-1', 's-1', 'Page View', 7654321]]
    },
    { sourceFile: 'workbook.xlsx' }
  );

  assert.equal(events.length, 1);
  assert.equal(events[0]?.timestamp, '2024-03-05T10:00:00.000000Z');
  assert.equal(events[0]?.orgId, '07654321');
});

test('first non-empty identifier candidate wins', () => {
  const { events } = normalizeFile(
    {
      encoding: 'csv',
      headers: ['timestamp', 'user_id', 'session_id', 'name', 'CP_GPN', 'GPN'],
      rows: [['2024-03-05 10:00:00.1', 'u-1', 's-1', 'Click', null, '42']]
    },
    { sourceFile: 'a.csv' }
  );

  assert.equal(events[0]?.orgId, '00000042');
});

test('missing required columns abort the file', () => {
  assert.throws(
    () =>
      normalizeFile(
        { encoding: 'csv', headers: ['timestamp', 'user_Id', 'CP_GPN'], rows: [] },
        { sourceFile: 'broken_2024_03_05.csv' }
      ),
    (error: unknown) => {
      assert.ok(error instanceof MissingColumnsError);
      assert.equal(error.code, 'INPUT_INVALID');
      assert.deepEqual(error.missing, ['session_id', 'name']);
      assert.equal(error.message, 'broken_2024_03_05.csv: missing required column(s): session_id, name');
      return true;
    }
  );
});

test('whole-second exports are accepted with a precision warning', () => {
  const { events, report } = normalizeFile(
    csvTable([
      ['05/03/2024 10:00:00', 'u-1', 's-1', 'Click', null, null, null, null, null],
      ['05/03/2024 10:00:01', 'u-1', 's-1', 'Click', null, null, null, null, null]
    ]),
    { sourceFile: 'weekly.xlsx' }
  );

  assert.equal(events.length, 2);
  assert.equal(report.precision, 'whole-second');
  assert.equal(report.warnings.length, 1);
  assert.match(report.warnings[0] ?? '', /no sub-second precision/);
});

test('identity collisions collapse onto the last row', () => {
  const { events, report } = normalizeFile(
    csvTable([
      ['05/03/2024 10:00:00', 'u-1', 's-1', 'Click', 'first', null, null, null, null],
      ['05/03/2024 10:00:00', 'u-1', 's-1', 'Click', 'second', null, null, null, null]
    ]),
    { sourceFile: 'weekly.csv' }
  );

  assert.equal(events.length, 1);
  assert.equal(events[0]?.linkLabel, 'second');
  assert.equal(report.collisions, 1);
  assert.ok(report.warnings.includes('1 row(s) shared an identity tuple with another row and were collapsed'));
});

test('rows with unusable values are dropped and counted', () => {
  const { events, report } = normalizeFile(
    csvTable([
      ['not a date', 'u-1', 's-1', 'Click', null, null, null, null, null],
      ['05/03/2024 10:00:00.5', null, 's-1', 'Click', null, null, null, null, null],
      ['05/03/2024 10:00:00.5', 'u-2', 's-2', 'Click', null, null, 'n/a', null, null]
    ]),
    { sourceFile: 'mixed.csv' }
  );

  assert.equal(events.length, 1);
  assert.equal(events[0]?.orgId, null);
  assert.equal(report.sourceRows, 3);
  assert.equal(report.invalidTimestampRows, 1);
  assert.equal(report.incompleteRows, 1);
  assert.equal(report.invalidOrgIdRows, 1);
});

test('customDimensions JSON is flattened into CP_ fields', () => {
  const table: TabularFile = {
    encoding: 'csv',
    headers: ['timestamp', 'user_Id', 'session_Id', 'name', 'customDimensions'],
    rows: [['2024-03-05 10:00:00.5', 'u-1', 's-1', 'Click', '{"Link_label":"77 Like","GPN":"123","Extra":{"a":1}}']]
  };

  const expanded = expandCustomDimensions(table);
  assert.deepEqual(expanded.headers, ['timestamp', 'user_Id', 'session_Id', 'name', 'CP_Link_label', 'CP_GPN', 'CP_Extra']);

  const { events, report } = normalizeFile(table, { sourceFile: 'custom.csv' });
  assert.equal(events[0]?.linkLabel, '77 Like');
  assert.equal(events[0]?.orgId, '00000123');
  assert.deepEqual(report.droppedColumns, ['CP_Extra']);
});

test('sub-microsecond digits are truncated with a warning', () => {
  const { events, report } = normalizeFile(
    csvTable([
      ['05/03/2024 10:00:00.1234567', 'u-1', 's-1', 'Click', 'a', null, null, null, null],
      ['05/03/2024 10:00:00.1234578', 'u-1', 's-1', 'Click', 'b', null, null, null, null],
      ['05/03/2024 10:00:01.5000000', 'u-1', 's-1', 'Click', 'c', null, null, null, null]
    ]),
    { sourceFile: 'fine.csv' }
  );

  assert.deepEqual(
    events.map((event) => event.timestamp),
    ['2024-03-05T10:00:00.123456Z', '2024-03-05T10:00:00.123457Z', '2024-03-05T10:00:01.500000Z']
  );
  assert.equal(report.truncatedTimestamps, 2);
  assert.equal(report.collisions, 0);
  assert.deepEqual(report.warnings, ['2 timestamp(s) carried sub-microsecond digits that were truncated']);
});
