import type { CanonicalEvent, EventIdentity, ProcessedFileRecord } from '../types';

/**
 * Persistent state owned by the pipeline: the merged event table and the
 * manifest of processed files. Both implementations are passed into
 * `runPipeline` by handle; nothing reaches for a process-wide instance.
 */
export interface EventStore {
  init(): Promise<void>;
  close(): void;
  /** Drops every event and manifest entry. The store is usable afterwards. */
  reset(): Promise<void>;

  lookup(filename: string): ProcessedFileRecord | null;
  record(entry: ProcessedFileRecord): void;
  listManifest(): ProcessedFileRecord[];

  deleteByIdentity(identities: EventIdentity[]): number;
  insertEvents(events: CanonicalEvent[]): number;
  listEvents(): CanonicalEvent[];
  countEvents(): number;

  /**
   * Runs `operation` atomically. Any throw rolls back every write made inside it
   * and propagates.
   */
  withTransaction<T>(operation: () => T): T;
}
