import path from 'node:path';

import type { PipelineConfig } from './config/pipelineConfig';
import { planBatch, type PlanBatchOptions, type PlannedAction, type PlannedFile } from './delta';
import { SnapshotIndex } from './enrichment/asOfJoin';
import { loadContentCatalog } from './enrichment/contentCatalog';
import { enrichEvents } from './enrichment/enrichEvents';
import { loadSnapshotFeed } from './enrichment/snapshots';
import { InputFileError, PipelineError, StateConsistencyError, describeError } from './errors';
import { aggregateColumns, aggregateContentEngagement } from './export/aggregate';
import { ANONYMIZED_EVENT_COLUMNS, EVENT_COLUMNS } from './export/eventColumns';
import { writeArtifact } from './export/parquetArtifacts';
import { createLocalizer } from './features/timezone';
import {
  discoverInputFiles,
  extractDateFromFilename,
  locateInputFile,
  type UnreadableInputFile
} from './ingest/inputFiles';
import { normalizeFile, type NormalizedFile } from './ingest/normalizer';
import { readTabularFile } from './ingest/readers';
import type { PipelineLogger } from './logger';
import type { EventStore } from './store/eventStore';
import { buildRunSummary, logRunSummary, type FileOutcome, type RunSummary } from './summary';
import type { ProcessedFileRecord } from './types';
import { mergeEvents, type MergeResult } from './upsert';

export const ARTIFACT_FILENAMES = {
  events: 'events.parquet',
  contentEngagement: 'content_engagement.parquet',
  anonymizedEvents: 'events_anon.parquet'
} as const;

export interface RunPipelineOptions {
  config: PipelineConfig;
  store: EventStore;
  logger: PipelineLogger;
  /**
   * Reprocess only this file, ignoring its manifest entry. A bare filename is
   * looked up in the input directory. Ignored under `fullReset`.
   */
  forceFile?: string;
  /** Discard the store and manifest before ingesting. */
  fullReset?: boolean;
  now?: () => Date;
  hashFile?: PlanBatchOptions['hashFile'];
}

function emptyOutcome(planned: PlannedFile): FileOutcome {
  return {
    filename: planned.file.filename,
    action: planned.action,
    status: 'skipped',
    reason: null,
    extractedDate: planned.file.extractedDate,
    orderingSource: planned.file.orderingSource,
    sourceRows: 0,
    loadedRows: 0,
    replacedRows: 0,
    addedRows: 0,
    droppedColumns: [],
    warnings: [],
    error: null
  };
}

function toFileError(filename: string, error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  return new InputFileError(filename, describeError(error), { cause: error });
}

async function readAndNormalize(planned: PlannedFile): Promise<NormalizedFile> {
  const table = await readTabularFile(planned.file.path);
  return normalizeFile(table, { sourceFile: planned.file.filename });
}

function commitFile(store: EventStore, normalized: NormalizedFile, entry: ProcessedFileRecord): MergeResult {
  try {
    return store.withTransaction(() => {
      const result = mergeEvents(store, normalized.events);
      store.record(entry);
      return result;
    });
  } catch (error) {
    throw new StateConsistencyError(entry.filename, `merge was rolled back: ${describeError(error)}`, {
      cause: error
    });
  }
}

async function ingestFile(
  planned: PlannedFile,
  store: EventStore,
  logger: PipelineLogger,
  now: () => Date
): Promise<FileOutcome> {
  const outcome = emptyOutcome(planned);
  const { filename } = planned.file;

  if (planned.action === 'UNCHANGED') {
    outcome.reason = 'content hash matches manifest';
    logger.debug({ filename }, 'Skipping unchanged file');
    return outcome;
  }

  try {
    const normalized = await readAndNormalize(planned);
    const { report } = normalized;
    for (const warning of report.warnings) {
      logger.warn({ filename, precision: report.precision }, warning);
    }
    if (report.droppedColumns.length > 0) {
      logger.debug({ filename, droppedColumns: report.droppedColumns }, 'Dropped unmapped columns');
    }

    const result = commitFile(store, normalized, {
      filename,
      contentHash: planned.contentHash,
      rowCount: normalized.events.length,
      processedAt: now().toISOString(),
      extractedDate: planned.file.extractedDate
    });

    logger.info(
      { filename, action: planned.action, rows: result.inserted, replaced: result.replaced },
      'Merged file into event store'
    );
    return {
      ...outcome,
      status: 'processed',
      reason: planned.previous ? `replaces manifest entry from ${planned.previous.processedAt}` : null,
      sourceRows: report.sourceRows,
      loadedRows: result.inserted,
      replacedRows: result.replaced,
      addedRows: result.added,
      droppedColumns: report.droppedColumns,
      warnings: report.warnings
    };
  } catch (error) {
    const failure = toFileError(filename, error);
    return {
      ...outcome,
      status: 'failed',
      reason: failure.message,
      error: { code: failure.code, message: failure.message }
    };
  }
}

function unreadableOutcome(entry: UnreadableInputFile, action: PlannedAction | null): FileOutcome {
  const failure = toFileError(entry.filename, entry.error);
  return {
    filename: entry.filename,
    action,
    status: 'failed',
    reason: failure.message,
    extractedDate: extractDateFromFilename(entry.filename),
    orderingSource: null,
    sourceRows: 0,
    loadedRows: 0,
    replacedRows: 0,
    addedRows: 0,
    droppedColumns: [],
    warnings: [],
    error: { code: failure.code, message: failure.message }
  };
}

type BatchSelection = {
  plan: PlannedFile[];
  failures: FileOutcome[];
  forceFile: string | null;
};

async function planFiles(
  options: RunPipelineOptions,
  fullReset: boolean,
  logger: PipelineLogger
): Promise<BatchSelection> {
  const { config, store } = options;
  if (options.forceFile && fullReset) {
    logger.warn({ forceFile: options.forceFile }, 'Full reset re-ingests every file; ignoring the forced file');
  }
  const forceArg = fullReset ? undefined : options.forceFile;

  const discovery = forceArg
    ? await locateInputFile(config.inputDir, forceArg)
    : await discoverInputFiles(config.inputDir);
  const forceFile = forceArg ? (discovery.files[0]?.filename ?? path.basename(forceArg)) : null;
  const batch = await planBatch(store, discovery.files, {
    forceFile: forceFile ?? undefined,
    hashFile: options.hashFile
  });

  const failedAction: PlannedAction | null = forceFile ? 'FORCED' : null;
  const failures = [...discovery.unreadable, ...batch.unreadable].map((entry) => {
    logger.error({ filename: entry.filename, err: entry.error }, 'Input file could not be read');
    return unreadableOutcome(entry, failedAction);
  });
  logger.info(
    {
      discovered: discovery.files.length + discovery.unreadable.length,
      planned: batch.files.map((entry) => `${entry.file.filename}:${entry.action}`),
      unreadable: failures.length
    },
    'Planned batch'
  );
  return { plan: batch.files, failures, forceFile };
}

/**
 * One batch run: plan, merge each file in chronological order, then rebuild and
 * publish every artifact from the full store contents.
 */
export async function runPipeline(options: RunPipelineOptions): Promise<RunSummary> {
  const { config, store } = options;
  const logger = options.logger;
  const now = options.now ?? (() => new Date());
  const fullReset = options.fullReset ?? false;

  await store.init();
  if (fullReset) {
    logger.warn({ component: 'store' }, 'Full reset requested; discarding event store and manifest');
    await store.reset();
  }

  const deltaLogger = logger.child({ component: 'delta' });
  const { plan, failures, forceFile } = await planFiles(options, fullReset, deltaLogger);

  const ingestLogger = logger.child({ component: 'ingest' });
  const outcomes: FileOutcome[] = [...failures];
  for (const planned of plan) {
    outcomes.push(await ingestFile(planned, store, ingestLogger, now));
  }

  const enrichLogger = logger.child({ component: 'enrichment' });
  const warnings = outcomes.flatMap((outcome) => outcome.warnings.map((warning) => `${outcome.filename}: ${warning}`));

  const feed = await loadSnapshotFeed(config.snapshotFile);
  let snapshots: SnapshotIndex | null = null;
  let snapshotCount = 0;
  if (feed.status === 'loaded') {
    snapshots = new SnapshotIndex(feed.snapshots);
    snapshotCount = feed.snapshots.length;
    enrichLogger.info(
      { source: feed.source, snapshots: snapshotCount, identifiers: snapshots.size, skippedRows: feed.skippedRows },
      'Loaded organizational snapshots'
    );
  } else {
    const message =
      feed.status === 'missing'
        ? `organizational snapshot feed ${feed.source} not found; enrichment skipped`
        : `organizational snapshot feed unreadable: ${feed.error.message}`;
    enrichLogger.warn({ source: feed.source, status: feed.status }, message);
    warnings.push(message);
  }

  const catalog = await loadContentCatalog(config.contentCatalogFile);
  if (catalog.status === 'unreadable') {
    enrichLogger.warn({ source: catalog.source }, catalog.error.message);
    warnings.push(catalog.error.message);
  } else if (catalog.status === 'missing') {
    enrichLogger.info({ source: catalog.source }, 'No content catalog; content titles are absent');
  }

  const enriched = enrichEvents(store.listEvents(), {
    snapshots,
    catalog: catalog.catalog,
    localize: createLocalizer(config.timeZone)
  });
  const aggregates = aggregateContentEngagement(enriched, config.aggregateDimensions);

  const exportLogger = logger.child({ component: 'export' });
  const artifacts: RunSummary['artifacts'] = {};
  const eventsPath = path.join(config.outputDir, ARTIFACT_FILENAMES.events);
  artifacts.events = { path: eventsPath, rows: await writeArtifact(eventsPath, EVENT_COLUMNS, enriched) };
  const aggregatePath = path.join(config.outputDir, ARTIFACT_FILENAMES.contentEngagement);
  artifacts.contentEngagement = {
    path: aggregatePath,
    rows: await writeArtifact(aggregatePath, aggregateColumns(config.aggregateDimensions), aggregates)
  };
  if (config.anonymizedExport) {
    const anonymizedPath = path.join(config.outputDir, ARTIFACT_FILENAMES.anonymizedEvents);
    artifacts.anonymizedEvents = {
      path: anonymizedPath,
      rows: await writeArtifact(anonymizedPath, ANONYMIZED_EVENT_COLUMNS, enriched)
    };
  }
  exportLogger.info({ artifacts }, 'Published artifacts');

  const summary = buildRunSummary({
    fullReset,
    forceFile,
    files: outcomes,
    manifest: store.listManifest(),
    events: enriched,
    reference: {
      snapshotFeed: feed.status,
      snapshots: snapshotCount,
      contentCatalog: catalog.status,
      catalogEntries: catalog.catalog.size
    },
    warnings,
    artifacts
  });
  logRunSummary(logger, summary);
  return summary;
}
