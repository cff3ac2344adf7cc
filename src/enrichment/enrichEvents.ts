import { deriveFeatures, type DeriveOptions } from '../features/deriver';
import { toUtcDate } from '../ingest/timestamps';
import { compareEvents, emptyOrgAttributes, type CanonicalEvent, type EnrichedEvent, type OrgMatchStatus } from '../types';
import type { SnapshotIndex } from './asOfJoin';
import type { ContentCatalog } from './contentCatalog';

export type EnrichOptions = DeriveOptions & {
  /** Null when the snapshot feed is unavailable for this run. */
  snapshots: SnapshotIndex | null;
  catalog: ContentCatalog;
};

/**
 * Builds the event-grain output from the full store contents. Recomputed from
 * scratch on every run, sorted by identity.
 */
export function enrichEvents(events: readonly CanonicalEvent[], options: EnrichOptions): EnrichedEvent[] {
  const sorted = [...events].sort(compareEvents);
  const features = deriveFeatures(sorted, options);

  return sorted.map((event, index) => {
    const derived = features[index];
    if (!derived) {
      throw new Error(`Missing derived features for event at position ${index}`);
    }

    let orgMatch: OrgMatchStatus = 'unknown_actor';
    let orgSnapshotDate: string | null = null;
    let attributes = emptyOrgAttributes();
    if (event.orgId) {
      const match = options.snapshots ? options.snapshots.resolve(event.orgId, toUtcDate(event.timestamp)) : null;
      if (match) {
        orgMatch = 'matched';
        orgSnapshotDate = match.snapshot.snapshotDate;
        attributes = { ...match.snapshot.attributes };
      } else {
        orgMatch = 'unknown_organization';
      }
    }

    const content = derived.contentId ? options.catalog.get(derived.contentId) : undefined;
    return {
      ...event,
      ...derived,
      ...attributes,
      orgMatch,
      orgSnapshotDate,
      contentTitle: content?.title ?? null,
      contentKeys: content?.keys ?? null
    } satisfies EnrichedEvent;
  });
}
