import type { CanonicalEvent } from '../../src/types';

export function makeEvent(overrides: Partial<CanonicalEvent> = {}): CanonicalEvent {
  return {
    timestamp: '2024-03-05T10:00:00.000000Z',
    actorId: 'u-1',
    sessionId: 's-1',
    eventName: 'Link Click',
    orgId: null,
    email: null,
    linkLabel: null,
    linkType: null,
    pageTitle: null,
    pageUrl: null,
    sourceFile: 'export_2024_03_05.csv',
    ...overrides
  };
}

/** Events `first..last` for one actor, one second apart, tagged with `sourceFile`. */
export function eventRange(first: number, last: number, sourceFile: string): CanonicalEvent[] {
  const events: CanonicalEvent[] = [];
  for (let id = first; id <= last; id += 1) {
    const second = String(id).padStart(2, '0');
    events.push(
      makeEvent({
        timestamp: `2024-03-05T10:00:${second}.000000Z`,
        linkLabel: `${id} - Read`,
        sourceFile
      })
    );
  }
  return events;
}
