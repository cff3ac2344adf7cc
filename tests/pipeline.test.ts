import assert from 'node:assert/strict';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test, type TestContext } from 'node:test';

import type { PipelineConfig } from '../src/config/pipelineConfig';
import { createSilentLogger } from '../src/logger';
import { ARTIFACT_FILENAMES, runPipeline } from '../src/pipeline';
import { MemoryEventStore } from '../src/store/memoryStore';
import { SqliteEventStore } from '../src/store/sqliteStore';
import type { ProcessedFileRecord } from '../src/types';
import { readParquetRows } from './helpers/parquet';

const HEADER = 'timestamp [UTC],user_Id,session_Id,name,CP_Link_label,CP_GPN';
const logger = createSilentLogger();
const fixedNow = () => new Date('2024-04-01T00:00:00.000Z');

async function makeWorkspace(t: TestContext): Promise<PipelineConfig> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'pipeline-run-'));
  t.after(() => rm(root, { recursive: true, force: true }));
  const config: PipelineConfig = {
    inputDir: path.join(root, 'input'),
    dataDir: path.join(root, 'data'),
    outputDir: path.join(root, 'output'),
    databaseFile: path.join(root, 'data', 'events.db'),
    snapshotFile: path.join(root, 'data', 'org_snapshots.csv'),
    contentCatalogFile: path.join(root, 'output', 'content_catalog.csv'),
    timeZone: 'Europe/Berlin',
    aggregateDimensions: ['orgDivision', 'orgRegion'],
    anonymizedExport: true,
    logLevel: 'silent'
  };
  await mkdir(config.inputDir, { recursive: true });
  await mkdir(config.dataDir, { recursive: true });
  return config;
}

/** One event per id at 10:00:<id>.5 on 5 March 2024, all in session s-1 of actor u-1. */
function exportCsv(first: number, last: number, label: string): string {
  const lines = [HEADER];
  for (let id = first; id <= last; id += 1) {
    const second = String(id).padStart(2, '0');
    lines.push(`05/03/2024 10:00:${second}.5,u-1,s-1,Link Click,${id} - ${label},1234567`);
  }
  return `${lines.join('\n')}\n`;
}

async function writeInput(config: PipelineConfig, filename: string, content: string): Promise<void> {
  await writeFile(path.join(config.inputDir, filename), content);
}

async function writeSnapshots(config: PipelineConfig): Promise<void> {
  await writeFile(config.snapshotFile, 'gpn,snapshot_date,division,region\n1234567,2024-01-01,Markets,EMEA\n');
}

const eventsPath = (config: PipelineConfig) => path.join(config.outputDir, ARTIFACT_FILENAMES.events);

test('overlapping exports merge in date order regardless of scan order', async (t) => {
  const config = await makeWorkspace(t);
  await writeSnapshots(config);
  // Written later-first so directory order disagrees with date order.
  await writeInput(config, 'export_2024_03_08.csv', exportCsv(6, 15, 'Like'));
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 10, 'Read'));
  const store = new MemoryEventStore();

  const summary = await runPipeline({ config, store, logger, now: fixedNow });

  assert.deepEqual(
    summary.files.map((file) => [file.filename, file.action, file.status, file.loadedRows, file.replacedRows]),
    [
      ['export_2024_03_01.csv', 'NEW', 'processed', 10, 0],
      ['export_2024_03_08.csv', 'NEW', 'processed', 10, 5]
    ]
  );
  const stored = store.listEvents();
  assert.equal(stored.length, 15);
  assert.deepEqual(
    stored.map((event) => event.linkLabel),
    [
      '1 - Read',
      '2 - Read',
      '3 - Read',
      '4 - Read',
      '5 - Read',
      '6 - Like',
      '7 - Like',
      '8 - Like',
      '9 - Like',
      '10 - Like',
      '11 - Like',
      '12 - Like',
      '13 - Like',
      '14 - Like',
      '15 - Like'
    ]
  );

  assert.equal(summary.totals.rowsLoaded, 20);
  assert.equal(summary.store.events, 15);
  assert.equal(summary.coverage.eventsMatched, 15);
  assert.equal(summary.degraded, false);
  assert.deepEqual(summary.actionTypes, [
    { value: 'Like', count: 10 },
    { value: 'Read', count: 5 }
  ]);

  const rows = await readParquetRows(eventsPath(config));
  assert.equal(rows.length, 15);
  assert.equal(rows[0]?.timestamp_utc, '2024-03-05T10:00:01.500000Z');
  assert.equal(rows[0]?.org_division, 'Markets');
  assert.equal(rows[0]?.event_order, 1);
  assert.equal(rows[1]?.time_since_prev_bucket, '0.5-1s');

  const anonymized = await readParquetRows(path.join(config.outputDir, ARTIFACT_FILENAMES.anonymizedEvents));
  assert.equal(anonymized.length, 15);
  assert.equal(anonymized[0]?.email, undefined);
  assert.match(String(anonymized[0]?.person_hash), /^[0-9a-f]{64}$/);

  const aggregate = await readParquetRows(path.join(config.outputDir, ARTIFACT_FILENAMES.contentEngagement));
  assert.equal(aggregate.length, 15);
});

test('re-running on unchanged inputs is a no-op with identical outputs', async (t) => {
  const config = await makeWorkspace(t);
  await writeSnapshots(config);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 10, 'Read'));
  await writeInput(config, 'export_2024_03_08.csv', exportCsv(6, 15, 'Like'));
  const store = new MemoryEventStore();

  await runPipeline({ config, store, logger, now: fixedNow });
  const eventsBefore = store.listEvents();
  const manifestBefore = store.listManifest();
  const artifactBefore = await readParquetRows(eventsPath(config));

  const second = await runPipeline({ config, store, logger, now: () => new Date('2024-05-01T00:00:00.000Z') });

  assert.deepEqual(
    second.files.map((file) => [file.action, file.status, file.loadedRows]),
    [
      ['UNCHANGED', 'skipped', 0],
      ['UNCHANGED', 'skipped', 0]
    ]
  );
  assert.deepEqual(store.listEvents(), eventsBefore);
  assert.deepEqual(store.listManifest(), manifestBefore);
  assert.deepEqual(await readParquetRows(eventsPath(config)), artifactBefore);
});

test('modified files are fully re-merged and the manifest hash is replaced', async (t) => {
  const config = await makeWorkspace(t);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 3, 'Read'));
  const store = new MemoryEventStore();

  await runPipeline({ config, store, logger, now: fixedNow });
  const before = store.lookup('export_2024_03_01.csv');

  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 3, 'Submit'));
  const summary = await runPipeline({ config, store, logger, now: fixedNow });

  assert.equal(summary.files[0]?.action, 'MODIFIED');
  assert.equal(summary.files[0]?.replacedRows, 3);
  const after = store.lookup('export_2024_03_01.csv');
  assert.ok(before && after);
  assert.notEqual(after.contentHash, before.contentHash);
  assert.equal(store.listEvents()[0]?.linkLabel, '1 - Submit');
});

test('a broken file fails alone and stays out of the manifest', async (t) => {
  const config = await makeWorkspace(t);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 3, 'Read'));
  await writeInput(config, 'broken_2024_03_02.csv', 'timestamp [UTC],user_Id\n05/03/2024 10:00:00,u-1\n');
  const store = new MemoryEventStore();

  const summary = await runPipeline({ config, store, logger, now: fixedNow });

  const broken = summary.files.find((file) => file.filename === 'broken_2024_03_02.csv');
  assert.equal(broken?.status, 'failed');
  assert.equal(broken?.error?.code, 'INPUT_INVALID');
  assert.equal(
    broken?.error?.message,
    'broken_2024_03_02.csv: missing required column(s): session_id, name'
  );
  assert.equal(summary.totals.processed, 1);
  assert.equal(summary.totals.failed, 1);
  assert.equal(store.lookup('broken_2024_03_02.csv'), null);
  assert.equal(store.countEvents(), 3);
});

test('a missing snapshot feed degrades the run without failing it', async (t) => {
  const config = await makeWorkspace(t);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 2, 'Read'));
  const store = new MemoryEventStore();

  const summary = await runPipeline({ config, store, logger, now: fixedNow });

  assert.equal(summary.degraded, true);
  assert.equal(summary.reference.snapshotFeed, 'missing');
  assert.equal(summary.coverage.eventsMatched, 0);
  assert.equal(summary.coverage.eventsUnknownOrganization, 2);
  assert.deepEqual(summary.coverage.unmatchedOrgIds, [{ value: '01234567', count: 2 }]);
  const rows = await readParquetRows(eventsPath(config));
  assert.equal(rows[0]?.org_match, 'unknown_organization');
});

test('force mode reprocesses one file even when unchanged', async (t) => {
  const config = await makeWorkspace(t);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 3, 'Read'));
  await writeInput(config, 'export_2024_03_08.csv', exportCsv(2, 4, 'Like'));
  const store = new MemoryEventStore();
  await runPipeline({ config, store, logger, now: fixedNow });

  const summary = await runPipeline({
    config,
    store,
    logger,
    forceFile: 'export_2024_03_01.csv',
    now: () => new Date('2024-04-02T00:00:00.000Z')
  });

  assert.deepEqual(
    summary.files.map((file) => [file.filename, file.action, file.status, file.replacedRows]),
    [['export_2024_03_01.csv', 'FORCED', 'processed', 3]]
  );
  assert.equal(store.lookup('export_2024_03_01.csv')?.processedAt, '2024-04-02T00:00:00.000Z');
  assert.equal(store.lookup('export_2024_03_08.csv')?.processedAt, '2024-04-01T00:00:00.000Z');
  // The forced older file overlays the overlap again.
  assert.equal(store.listEvents()[1]?.linkLabel, '2 - Read');

  const missing = await runPipeline({ config, store, logger, forceFile: 'nope_2024_01_01.csv', now: fixedNow });
  assert.equal(missing.files[0]?.status, 'failed');
  assert.equal(missing.files[0]?.action, 'FORCED');
  assert.deepEqual(missing.files[0]?.error, {
    code: 'INPUT_INVALID',
    message: `nope_2024_01_01.csv: not found at ${path.join(config.inputDir, 'nope_2024_01_01.csv')}`
  });
});

test('a forced file may live outside the input directory', async (t) => {
  const config = await makeWorkspace(t);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 3, 'Read'));
  const store = new MemoryEventStore();
  await runPipeline({ config, store, logger, now: fixedNow });

  const outside = path.join(config.dataDir, 'resend_2024_03_02.csv');
  await writeFile(outside, exportCsv(3, 4, 'Submit'));
  const summary = await runPipeline({ config, store, logger, forceFile: outside, now: fixedNow });

  assert.equal(summary.forceFile, 'resend_2024_03_02.csv');
  assert.deepEqual(
    summary.files.map((file) => [file.filename, file.action, file.status, file.replacedRows, file.addedRows]),
    [['resend_2024_03_02.csv', 'FORCED', 'processed', 1, 1]]
  );
  assert.deepEqual(
    store.listEvents().map((event) => event.linkLabel),
    ['1 - Read', '2 - Read', '3 - Submit', '4 - Submit']
  );
});

test('full reset reproduces a from-scratch run', async (t) => {
  const config = await makeWorkspace(t);
  await writeSnapshots(config);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 10, 'Read'));
  await writeInput(config, 'export_2024_03_08.csv', exportCsv(6, 15, 'Like'));
  const store = new SqliteEventStore({ databaseFile: config.databaseFile });
  t.after(() => store.close());

  await runPipeline({ config, store, logger, now: fixedNow });
  const eventsBefore = store.listEvents();
  const manifestBefore: ProcessedFileRecord[] = store.listManifest();
  const artifactBefore = await readParquetRows(eventsPath(config));

  const summary = await runPipeline({ config, store, logger, fullReset: true, now: fixedNow });

  assert.equal(summary.fullReset, true);
  assert.deepEqual(
    summary.files.map((file) => file.action),
    ['NEW', 'NEW']
  );
  assert.deepEqual(store.listEvents(), eventsBefore);
  assert.deepEqual(store.listManifest(), manifestBefore);
  assert.deepEqual(await readParquetRows(eventsPath(config)), artifactBefore);
});

test('full reset takes precedence over a forced file', async (t) => {
  const config = await makeWorkspace(t);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 10, 'Read'));
  await writeInput(config, 'export_2024_03_08.csv', exportCsv(6, 15, 'Like'));
  const store = new MemoryEventStore();
  await runPipeline({ config, store, logger, now: fixedNow });

  const summary = await runPipeline({
    config,
    store,
    logger,
    fullReset: true,
    forceFile: 'export_2024_03_08.csv',
    now: fixedNow
  });

  assert.equal(summary.forceFile, null);
  assert.deepEqual(
    summary.files.map((file) => [file.filename, file.action]),
    [
      ['export_2024_03_01.csv', 'NEW'],
      ['export_2024_03_08.csv', 'NEW']
    ]
  );
  assert.equal(store.countEvents(), 15);
  assert.deepEqual(
    store.listManifest().map((entry) => entry.filename),
    ['export_2024_03_01.csv', 'export_2024_03_08.csv']
  );
});

test('a file that cannot be read fails alone while the rest of the batch merges', async (t) => {
  const config = await makeWorkspace(t);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 10, 'Read'));
  await writeInput(config, 'export_2024_03_08.csv', exportCsv(6, 15, 'Like'));
  const store = new MemoryEventStore();

  const summary = await runPipeline({
    config,
    store,
    logger,
    now: fixedNow,
    hashFile: async (filePath) => {
      if (path.basename(filePath) === 'export_2024_03_08.csv') {
        throw new Error('EIO: read failed');
      }
      return `hash:${path.basename(filePath)}`;
    }
  });

  assert.deepEqual(
    summary.files.map((file) => [file.filename, file.action, file.status, file.error]),
    [
      [
        'export_2024_03_08.csv',
        null,
        'failed',
        { code: 'INPUT_INVALID', message: 'export_2024_03_08.csv: EIO: read failed' }
      ],
      ['export_2024_03_01.csv', 'NEW', 'processed', null]
    ]
  );
  assert.equal(summary.totals.failed, 1);
  assert.equal(store.countEvents(), 10);
  assert.equal(store.lookup('export_2024_03_08.csv'), null);
});

class FailingManifestStore extends MemoryEventStore {
  override record(entry: ProcessedFileRecord): void {
    if (entry.filename.startsWith('poison')) {
      throw new Error('manifest write failed');
    }
    super.record(entry);
  }
}

test('a manifest failure rolls back the merge and leaves the file reprocessable', async (t) => {
  const config = await makeWorkspace(t);
  await writeInput(config, 'export_2024_03_01.csv', exportCsv(1, 3, 'Read'));
  await writeInput(config, 'poison_2024_03_02.csv', exportCsv(3, 5, 'Like'));
  const store = new FailingManifestStore();

  const summary = await runPipeline({ config, store, logger, now: fixedNow });

  const poison = summary.files.find((file) => file.filename === 'poison_2024_03_02.csv');
  assert.equal(poison?.status, 'failed');
  assert.equal(poison?.error?.code, 'STATE_INCONSISTENT');
  assert.equal(store.lookup('poison_2024_03_02.csv'), null);
  assert.equal(store.countEvents(), 3);
  assert.equal(store.listEvents()[2]?.linkLabel, '3 - Read');
});
