export * from './types';
export * from './errors';
export { loadPipelineConfig, type PipelineConfig, type LoadPipelineConfigOptions } from './config/pipelineConfig';
export { EnvConfigError } from './config/envConfig';
export { createLogger, createSilentLogger, type PipelineLogger } from './logger';
export type { EventStore } from './store/eventStore';
export { SqliteEventStore, type SqliteEventStoreOptions } from './store/sqliteStore';
export { MemoryEventStore } from './store/memoryStore';
export { classify, computeFileHash, planBatch, type BatchPlan, type FileClassification, type PlannedFile } from './delta';
export { mergeEvents, type MergeResult } from './upsert';
export { normalizeFile, type NormalizedFile, type NormalizationReport } from './ingest/normalizer';
export {
  discoverInputFiles,
  extractDateFromFilename,
  locateInputFile,
  orderInputFiles,
  type InputFile,
  type UnreadableInputFile
} from './ingest/inputFiles';
export { SnapshotIndex, resolveAsOf } from './enrichment/asOfJoin';
export { loadSnapshotFeed, type SnapshotFeed } from './enrichment/snapshots';
export { loadContentCatalog } from './enrichment/contentCatalog';
export { enrichEvents } from './enrichment/enrichEvents';
export { normalizeOrgIdentifier } from './enrichment/orgIdentifiers';
export { ACTION_RULES, classifyAction, extractContentId } from './features/classification';
export { bucketGap, GAP_BUCKETS } from './features/gapBuckets';
export { deriveFeatures } from './features/deriver';
export { createLocalizer } from './features/timezone';
export { aggregateContentEngagement } from './export/aggregate';
export { ARTIFACT_FILENAMES, runPipeline, type RunPipelineOptions } from './pipeline';
export type { RunSummary, FileOutcome } from './summary';
