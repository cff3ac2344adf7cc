export const ORG_ATTRIBUTE_FIELDS = [
  'orgDivision',
  'orgUnit',
  'orgArea',
  'orgSector',
  'orgSegment',
  'orgFunction',
  'orgOuCode',
  'orgCountry',
  'orgRegion',
  'orgJobTitle',
  'orgJobFamily',
  'orgManagementLevel',
  'orgCostCenter'
] as const;

export type OrgAttributeField = (typeof ORG_ATTRIBUTE_FIELDS)[number];

export type OrgAttributes = Record<OrgAttributeField, string | null>;

/**
 * One telemetry record after schema normalization. `timestamp` is the canonical
 * UTC form `YYYY-MM-DDTHH:MM:SS.ffffffZ`, so lexical order is chronological.
 */
export interface CanonicalEvent {
  timestamp: string;
  actorId: string;
  sessionId: string;
  eventName: string;
  orgId: string | null;
  email: string | null;
  linkLabel: string | null;
  linkType: string | null;
  pageTitle: string | null;
  pageUrl: string | null;
  sourceFile: string;
}

export type EventIdentity = Pick<CanonicalEvent, 'timestamp' | 'actorId' | 'sessionId' | 'eventName'>;

export interface ProcessedFileRecord {
  filename: string;
  contentHash: string;
  rowCount: number;
  processedAt: string;
  extractedDate: string | null;
}

export interface OrganizationalSnapshot {
  orgId: string;
  snapshotDate: string;
  attributes: OrgAttributes;
}

export type ActionCategory = 'Open Form' | 'Submit' | 'Cancel' | 'Read' | 'Like' | 'Other';

export const CATCH_ALL_CATEGORY: ActionCategory = 'Other';

export type GapBucket =
  | 'First Event'
  | '< 0.5s'
  | '0.5-1s'
  | '1-2s'
  | '2-5s'
  | '5-10s'
  | '10-30s'
  | '30-60s'
  | '> 60s';

/**
 * `unknown_actor`: the event carries no usable organizational identifier.
 * `unknown_organization`: it does, but no snapshot exists for it.
 */
export type OrgMatchStatus = 'matched' | 'unknown_organization' | 'unknown_actor';

export interface DerivedFeatures {
  timestampLocal: string;
  localDate: string;
  eventHour: number;
  eventWeekday: string;
  eventWeekdayNumber: number;
  sessionKey: string;
  eventOrder: number;
  prevEvent: string | null;
  prevTimestamp: string | null;
  msSincePrevEvent: number | null;
  secSincePrevEvent: number | null;
  timeSincePrevBucket: GapBucket;
  contentId: string | null;
  actionType: ActionCategory;
}

export interface EnrichedEvent extends CanonicalEvent, DerivedFeatures, OrgAttributes {
  orgMatch: OrgMatchStatus;
  orgSnapshotDate: string | null;
  contentTitle: string | null;
  contentKeys: string | null;
}

export interface ContentEngagementAggregate {
  contentId: string;
  day: string;
  dimensions: Partial<Record<OrgAttributeField, string | null>>;
  contentTitle: string | null;
  contentKeys: string | null;
  totalEvents: number;
  uniqueActors: number;
  uniqueOrgIds: number;
  uniqueSessions: number;
  openForms: number;
  submits: number;
  cancels: number;
  reads: number;
  likes: number;
}

export function identityKey(identity: EventIdentity): string {
  return [identity.timestamp, identity.actorId, identity.sessionId, identity.eventName].join('\u0000');
}

export function compareEvents(left: EventIdentity, right: EventIdentity): number {
  return (
    compareText(left.timestamp, right.timestamp) ||
    compareText(left.actorId, right.actorId) ||
    compareText(left.sessionId, right.sessionId) ||
    compareText(left.eventName, right.eventName)
  );
}

export function compareText(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export function emptyOrgAttributes(): OrgAttributes {
  return {
    orgDivision: null,
    orgUnit: null,
    orgArea: null,
    orgSector: null,
    orgSegment: null,
    orgFunction: null,
    orgOuCode: null,
    orgCountry: null,
    orgRegion: null,
    orgJobTitle: null,
    orgJobFamily: null,
    orgManagementLevel: null,
    orgCostCenter: null
  };
}
