import type { EventStore } from './store/eventStore';
import type { CanonicalEvent } from './types';

export interface MergeResult {
  /** Rows written, equal to the incoming row count. */
  inserted: number;
  /** Stored rows that shared an identity with an incoming row and were superseded. */
  replaced: number;
  /** Identities that were not in the store before. */
  added: number;
}

/**
 * Delete-then-insert on the identity tuple. The incoming rows fully supersede
 * any stored row that shares their identity; nothing is patched field by field.
 * Callers run this inside `store.withTransaction`.
 */
export function mergeEvents(store: EventStore, events: CanonicalEvent[]): MergeResult {
  const replaced = store.deleteByIdentity(events);
  const inserted = store.insertEvents(events);
  return { inserted, replaced, added: inserted - replaced };
}
