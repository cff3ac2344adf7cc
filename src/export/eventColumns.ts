import { ORG_ATTRIBUTE_FIELDS, type EnrichedEvent } from '../types';
import { personHash } from './anonymize';
import { toSnakeCase, type ColumnDefinition } from './parquetArtifacts';

type EventColumn = ColumnDefinition<EnrichedEvent>;

const text = (name: string, value: (event: EnrichedEvent) => string): EventColumn => ({ name, type: 'UTF8', value });

const optionalText = (name: string, value: (event: EnrichedEvent) => string | null): EventColumn => ({
  name,
  type: 'UTF8',
  optional: true,
  value
});

const ORG_COLUMNS: EventColumn[] = ORG_ATTRIBUTE_FIELDS.map((field) =>
  optionalText(toSnakeCase(field), (event) => event[field])
);

const LEADING_COLUMNS: EventColumn[] = [
  text('timestamp_utc', (event) => event.timestamp),
  text('timestamp_local', (event) => event.timestampLocal),
  text('local_date', (event) => event.localDate),
  { name: 'event_hour', type: 'INT32', value: (event) => event.eventHour },
  text('event_weekday', (event) => event.eventWeekday),
  { name: 'event_weekday_number', type: 'INT32', value: (event) => event.eventWeekdayNumber },
  text('actor_id', (event) => event.actorId),
  text('session_id', (event) => event.sessionId),
  text('session_key', (event) => event.sessionKey),
  text('event_name', (event) => event.eventName),
  { name: 'event_order', type: 'INT32', value: (event) => event.eventOrder },
  optionalText('prev_event', (event) => event.prevEvent),
  optionalText('prev_timestamp', (event) => event.prevTimestamp),
  { name: 'ms_since_prev_event', type: 'INT64', optional: true, value: (event) => event.msSincePrevEvent },
  { name: 'sec_since_prev_event', type: 'DOUBLE', optional: true, value: (event) => event.secSincePrevEvent },
  text('time_since_prev_bucket', (event) => event.timeSincePrevBucket),
  optionalText('link_label', (event) => event.linkLabel),
  optionalText('link_type', (event) => event.linkType),
  optionalText('page_title', (event) => event.pageTitle),
  optionalText('page_url', (event) => event.pageUrl),
  optionalText('content_id', (event) => event.contentId),
  optionalText('content_title', (event) => event.contentTitle),
  optionalText('content_keys', (event) => event.contentKeys),
  text('action_type', (event) => event.actionType)
];

const TRAILING_COLUMNS: EventColumn[] = [
  text('org_match', (event) => event.orgMatch),
  optionalText('org_snapshot_date', (event) => event.orgSnapshotDate),
  ...ORG_COLUMNS,
  text('source_file', (event) => event.sourceFile)
];

export const EVENT_COLUMNS: readonly EventColumn[] = [
  ...LEADING_COLUMNS,
  optionalText('org_id', (event) => event.orgId),
  optionalText('email', (event) => event.email),
  ...TRAILING_COLUMNS
];

/** Same rows with the identifier hashed and the e-mail address left out. */
export const ANONYMIZED_EVENT_COLUMNS: readonly EventColumn[] = [
  ...LEADING_COLUMNS,
  optionalText('person_hash', (event) => personHash(event.orgId)),
  ...TRAILING_COLUMNS
];
