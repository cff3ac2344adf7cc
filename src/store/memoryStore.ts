import { compareEvents, identityKey, type CanonicalEvent, type EventIdentity, type ProcessedFileRecord } from '../types';
import type { EventStore } from './eventStore';

/** In-process EventStore for tests and dry runs. Transactions snapshot and restore. */
export class MemoryEventStore implements EventStore {
  private events = new Map<string, CanonicalEvent>();
  private manifest = new Map<string, ProcessedFileRecord>();

  async init(): Promise<void> {}

  close(): void {}

  async reset(): Promise<void> {
    this.events = new Map();
    this.manifest = new Map();
  }

  lookup(filename: string): ProcessedFileRecord | null {
    const entry = this.manifest.get(filename);
    return entry ? { ...entry } : null;
  }

  record(entry: ProcessedFileRecord): void {
    this.manifest.set(entry.filename, { ...entry });
  }

  listManifest(): ProcessedFileRecord[] {
    return Array.from(this.manifest.values())
      .map((entry) => ({ ...entry }))
      .sort((left, right) => (left.filename < right.filename ? -1 : left.filename > right.filename ? 1 : 0));
  }

  deleteByIdentity(identities: EventIdentity[]): number {
    let deleted = 0;
    for (const identity of identities) {
      if (this.events.delete(identityKey(identity))) {
        deleted += 1;
      }
    }
    return deleted;
  }

  insertEvents(events: CanonicalEvent[]): number {
    for (const event of events) {
      const key = identityKey(event);
      if (this.events.has(key)) {
        throw new Error(`Duplicate identity ${key.split('\u0000').join(' / ')}`);
      }
      this.events.set(key, { ...event });
    }
    return events.length;
  }

  listEvents(): CanonicalEvent[] {
    return Array.from(this.events.values())
      .map((event) => ({ ...event }))
      .sort(compareEvents);
  }

  countEvents(): number {
    return this.events.size;
  }

  withTransaction<T>(operation: () => T): T {
    const events = new Map(this.events);
    const manifest = new Map(this.manifest);
    try {
      return operation();
    } catch (error) {
      this.events = events;
      this.manifest = manifest;
      throw error;
    }
  }
}
