import { isReportedCategory } from '../features/classification';
import {
  compareText,
  type ActionCategory,
  type ContentEngagementAggregate,
  type EnrichedEvent,
  type OrgAttributeField
} from '../types';
import { toSnakeCase, type ColumnDefinition } from './parquetArtifacts';

type Accumulator = {
  aggregate: ContentEngagementAggregate;
  actors: Set<string>;
  orgIds: Set<string>;
  sessions: Set<string>;
};

const CATEGORY_COUNTERS: Record<
  Exclude<ActionCategory, 'Other'>,
  'openForms' | 'submits' | 'cancels' | 'reads' | 'likes'
> = {
  'Open Form': 'openForms',
  Submit: 'submits',
  Cancel: 'cancels',
  Read: 'reads',
  Like: 'likes'
};

/**
 * Groups events by (content id, local date, dimensions). Events without a
 * content id and events in the catch-all category are left out.
 */
export function aggregateContentEngagement(
  events: readonly EnrichedEvent[],
  dimensions: readonly OrgAttributeField[]
): ContentEngagementAggregate[] {
  const groups = new Map<string, Accumulator>();

  for (const event of events) {
    const { contentId, actionType } = event;
    if (!contentId || !isReportedCategory(actionType)) {
      continue;
    }
    const dimensionValues: Partial<Record<OrgAttributeField, string | null>> = {};
    for (const dimension of dimensions) {
      dimensionValues[dimension] = event[dimension];
    }
    const key = JSON.stringify([contentId, event.localDate, ...dimensions.map((dimension) => event[dimension])]);

    let group = groups.get(key);
    if (!group) {
      group = {
        aggregate: {
          contentId,
          day: event.localDate,
          dimensions: dimensionValues,
          contentTitle: event.contentTitle,
          contentKeys: event.contentKeys,
          totalEvents: 0,
          uniqueActors: 0,
          uniqueOrgIds: 0,
          uniqueSessions: 0,
          openForms: 0,
          submits: 0,
          cancels: 0,
          reads: 0,
          likes: 0
        },
        actors: new Set(),
        orgIds: new Set(),
        sessions: new Set()
      };
      groups.set(key, group);
    }

    const { aggregate } = group;
    aggregate.totalEvents += 1;
    aggregate[CATEGORY_COUNTERS[actionType]] += 1;
    group.actors.add(event.actorId);
    group.sessions.add(event.sessionKey);
    if (event.orgId) {
      group.orgIds.add(event.orgId);
    }
  }

  return Array.from(groups.entries())
    .sort(([left], [right]) => compareText(left, right))
    .map(([, group]) => ({
      ...group.aggregate,
      uniqueActors: group.actors.size,
      uniqueOrgIds: group.orgIds.size,
      uniqueSessions: group.sessions.size
    }));
}

export function aggregateColumns(
  dimensions: readonly OrgAttributeField[]
): ColumnDefinition<ContentEngagementAggregate>[] {
  const count = (
    name: string,
    value: (row: ContentEngagementAggregate) => number
  ): ColumnDefinition<ContentEngagementAggregate> => ({ name, type: 'INT64', value });

  return [
    { name: 'content_id', type: 'UTF8', value: (row) => row.contentId },
    { name: 'day', type: 'UTF8', value: (row) => row.day },
    ...dimensions.map(
      (dimension): ColumnDefinition<ContentEngagementAggregate> => ({
        name: toSnakeCase(dimension),
        type: 'UTF8',
        optional: true,
        value: (row) => row.dimensions[dimension] ?? null
      })
    ),
    { name: 'content_title', type: 'UTF8', optional: true, value: (row) => row.contentTitle },
    { name: 'content_keys', type: 'UTF8', optional: true, value: (row) => row.contentKeys },
    count('total_events', (row) => row.totalEvents),
    count('unique_actors', (row) => row.uniqueActors),
    count('unique_org_ids', (row) => row.uniqueOrgIds),
    count('unique_sessions', (row) => row.uniqueSessions),
    count('open_forms', (row) => row.openForms),
    count('submits', (row) => row.submits),
    count('cancels', (row) => row.cancels),
    count('reads', (row) => row.reads),
    count('likes', (row) => row.likes)
  ];
}
