import type { PlannedAction } from './delta';
import type { OrderingSource } from './ingest/inputFiles';
import type { PipelineLogger } from './logger';
import { isReportedCategory } from './features/classification';
import { compareText, type EnrichedEvent, type ProcessedFileRecord } from './types';

const TOP_LIST_LIMIT = 10;

export type FileStatus = 'processed' | 'skipped' | 'failed';

export interface FileOutcome {
  filename: string;
  action: PlannedAction | null;
  status: FileStatus;
  reason: string | null;
  extractedDate: string | null;
  orderingSource: OrderingSource | null;
  sourceRows: number;
  loadedRows: number;
  replacedRows: number;
  addedRows: number;
  droppedColumns: string[];
  warnings: string[];
  error: { code: string; message: string } | null;
}

export type ReferenceStatus = 'loaded' | 'missing' | 'unreadable';

export interface CountEntry {
  value: string;
  count: number;
}

export interface RunSummary {
  fullReset: boolean;
  forceFile: string | null;
  files: FileOutcome[];
  totals: { processed: number; skipped: number; failed: number; rowsLoaded: number };
  store: { events: number; manifestEntries: number };
  dateRange: { first: string; last: string } | null;
  distinct: { actors: number; sessions: number; orgIds: number };
  coverage: {
    eventsWithOrgId: number;
    eventsMatched: number;
    eventsUnknownOrganization: number;
    eventsUnknownActor: number;
    unmatchedOrgIds: CountEntry[];
  };
  reference: {
    snapshotFeed: ReferenceStatus;
    snapshots: number;
    contentCatalog: ReferenceStatus;
    catalogEntries: number;
  };
  degraded: boolean;
  warnings: string[];
  eventNames: CountEntry[];
  actionTypes: CountEntry[];
  topContent: CountEntry[];
  artifacts: Record<string, { path: string; rows: number }>;
}

function countBy(values: Iterable<string>): CountEntry[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Array.from(counts, ([value, count]) => ({ value, count })).sort(
    (left, right) => right.count - left.count || compareText(left.value, right.value)
  );
}

export type BuildSummaryInput = {
  fullReset: boolean;
  forceFile: string | null;
  files: FileOutcome[];
  manifest: ProcessedFileRecord[];
  events: readonly EnrichedEvent[];
  reference: RunSummary['reference'];
  warnings: string[];
  artifacts: RunSummary['artifacts'];
};

export function buildRunSummary(input: BuildSummaryInput): RunSummary {
  const { events } = input;
  const first = events[0];
  const last = events[events.length - 1];

  const unmatched = events.flatMap((event) =>
    event.orgMatch === 'unknown_organization' && event.orgId ? [event.orgId] : []
  );
  const reported = events.filter((event) => isReportedCategory(event.actionType));

  return {
    fullReset: input.fullReset,
    forceFile: input.forceFile,
    files: input.files,
    totals: {
      processed: input.files.filter((file) => file.status === 'processed').length,
      skipped: input.files.filter((file) => file.status === 'skipped').length,
      failed: input.files.filter((file) => file.status === 'failed').length,
      rowsLoaded: input.files.reduce((total, file) => total + file.loadedRows, 0)
    },
    store: { events: events.length, manifestEntries: input.manifest.length },
    dateRange: first && last ? { first: first.timestamp, last: last.timestamp } : null,
    distinct: {
      actors: new Set(events.map((event) => event.actorId)).size,
      sessions: new Set(events.map((event) => event.sessionKey)).size,
      orgIds: new Set(events.flatMap((event) => (event.orgId ? [event.orgId] : []))).size
    },
    coverage: {
      eventsWithOrgId: events.filter((event) => event.orgId !== null).length,
      eventsMatched: events.filter((event) => event.orgMatch === 'matched').length,
      eventsUnknownOrganization: unmatched.length,
      eventsUnknownActor: events.filter((event) => event.orgMatch === 'unknown_actor').length,
      unmatchedOrgIds: countBy(unmatched).slice(0, TOP_LIST_LIMIT)
    },
    reference: input.reference,
    degraded: input.reference.snapshotFeed !== 'loaded',
    warnings: input.warnings,
    eventNames: countBy(events.map((event) => event.eventName)),
    actionTypes: countBy(reported.map((event) => event.actionType)),
    topContent: countBy(reported.flatMap((event) => (event.contentId ? [event.contentId] : []))).slice(
      0,
      TOP_LIST_LIMIT
    ),
    artifacts: input.artifacts
  };
}

export function logRunSummary(logger: PipelineLogger, summary: RunSummary): void {
  for (const file of summary.files) {
    const fields = {
      filename: file.filename,
      action: file.action,
      status: file.status,
      reason: file.reason,
      loadedRows: file.loadedRows,
      replacedRows: file.replacedRows
    };
    if (file.status === 'failed') {
      logger.error({ ...fields, error: file.error }, 'File failed');
    } else {
      logger.info(fields, 'File outcome');
    }
  }
  if (summary.degraded) {
    logger.warn(
      { snapshotFeed: summary.reference.snapshotFeed },
      'Organizational snapshot feed unavailable; organizational attributes are absent for this run'
    );
  }
  logger.info(
    {
      totals: summary.totals,
      store: summary.store,
      dateRange: summary.dateRange,
      distinct: summary.distinct,
      coverage: summary.coverage,
      actionTypes: summary.actionTypes,
      topContent: summary.topContent,
      warnings: summary.warnings.length
    },
    'Pipeline run complete'
  );
}
