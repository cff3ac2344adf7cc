import { compareText, type OrganizationalSnapshot } from '../types';

export type AsOfMatch = {
  snapshot: OrganizationalSnapshot;
  rule: 'at-or-before' | 'after';
};

/**
 * Resolves the snapshot valid for `eventDate` in a list sorted by snapshotDate:
 * the latest one on or before the date, otherwise the earliest one after it.
 */
export function resolveAsOf(sorted: OrganizationalSnapshot[], eventDate: string): AsOfMatch | null {
  if (sorted.length === 0) {
    return null;
  }
  // First index whose snapshotDate is strictly after eventDate.
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const candidate = sorted[mid];
    if (candidate && candidate.snapshotDate <= eventDate) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  const atOrBefore = sorted[low - 1];
  if (atOrBefore) {
    return { snapshot: atOrBefore, rule: 'at-or-before' };
  }
  const after = sorted[low];
  return after ? { snapshot: after, rule: 'after' } : null;
}

export class SnapshotIndex {
  private readonly byOrgId = new Map<string, OrganizationalSnapshot[]>();

  constructor(snapshots: Iterable<OrganizationalSnapshot>) {
    for (const snapshot of snapshots) {
      const list = this.byOrgId.get(snapshot.orgId);
      if (list) {
        list.push(snapshot);
      } else {
        this.byOrgId.set(snapshot.orgId, [snapshot]);
      }
    }
    for (const list of this.byOrgId.values()) {
      // Later rows for the same date win, so keep insertion order as tiebreak.
      list.sort((left, right) => compareText(left.snapshotDate, right.snapshotDate));
      dedupeSameDate(list);
    }
  }

  get size(): number {
    return this.byOrgId.size;
  }

  has(orgId: string): boolean {
    return this.byOrgId.has(orgId);
  }

  snapshotsFor(orgId: string): OrganizationalSnapshot[] {
    return this.byOrgId.get(orgId) ?? [];
  }

  resolve(orgId: string, eventDate: string): AsOfMatch | null {
    return resolveAsOf(this.snapshotsFor(orgId), eventDate);
  }
}

function dedupeSameDate(list: OrganizationalSnapshot[]): void {
  for (let index = list.length - 1; index > 0; index -= 1) {
    const current = list[index];
    const previous = list[index - 1];
    if (current && previous && current.snapshotDate === previous.snapshotDate) {
      list.splice(index - 1, 1);
    }
  }
}
