import { canonicalToEpochMicros } from '../ingest/timestamps';
import { compareEvents, type CanonicalEvent, type DerivedFeatures } from '../types';
import { classifyAction, extractContentId, type ActionRule, ACTION_RULES } from './classification';
import { bucketGap } from './gapBuckets';
import type { Localizer } from './timezone';

const MICROS_PER_MILLISECOND = 1_000;

export type DeriveOptions = {
  localize: Localizer;
  rules?: readonly ActionRule[];
};

export function sessionKeyFor(localDate: string, actorId: string, sessionId: string): string {
  return `${localDate}_${actorId}_${sessionId}`;
}

type SequenceField =
  | 'eventOrder'
  | 'prevEvent'
  | 'prevTimestamp'
  | 'msSincePrevEvent'
  | 'secSincePrevEvent'
  | 'timeSincePrevBucket';

type Pending = {
  index: number;
  event: CanonicalEvent;
  epochMicros: number;
  partial: Omit<DerivedFeatures, SequenceField>;
};

/**
 * Derives per-event features. The result is index-aligned with `events`; the
 * input order does not influence any derived value.
 */
export function deriveFeatures(events: readonly CanonicalEvent[], options: DeriveOptions): DerivedFeatures[] {
  const rules = options.rules ?? ACTION_RULES;
  const sessions = new Map<string, Pending[]>();

  events.forEach((event, index) => {
    const epochMicros = canonicalToEpochMicros(event.timestamp);
    const local = options.localize(epochMicros);
    const sessionKey = sessionKeyFor(local.localDate, event.actorId, event.sessionId);
    const pending: Pending = {
      index,
      event,
      epochMicros,
      partial: {
        timestampLocal: local.timestampLocal,
        localDate: local.localDate,
        eventHour: local.hour,
        eventWeekday: local.weekday,
        eventWeekdayNumber: local.weekdayNumber,
        sessionKey,
        contentId: extractContentId(event.linkLabel),
        actionType: classifyAction(event.linkLabel, rules)
      }
    };
    const members = sessions.get(sessionKey);
    if (members) {
      members.push(pending);
    } else {
      sessions.set(sessionKey, [pending]);
    }
  });

  const derived: DerivedFeatures[] = new Array<DerivedFeatures>(events.length);
  for (const members of sessions.values()) {
    members.sort((left, right) => compareEvents(left.event, right.event));
    let previous: Pending | null = null;
    members.forEach((member, position) => {
      const gapMs = previous
        ? Math.floor(member.epochMicros / MICROS_PER_MILLISECOND) -
          Math.floor(previous.epochMicros / MICROS_PER_MILLISECOND)
        : null;
      derived[member.index] = {
        ...member.partial,
        eventOrder: position + 1,
        prevEvent: previous ? previous.event.eventName : null,
        prevTimestamp: previous ? previous.event.timestamp : null,
        msSincePrevEvent: gapMs,
        secSincePrevEvent: gapMs === null ? null : gapMs / 1000,
        timeSincePrevBucket: bucketGap(gapMs)
      };
      previous = member;
    });
  }
  return derived;
}
