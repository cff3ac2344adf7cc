import type { GapBucket } from '../types';

type BucketBound = {
  bucket: GapBucket;
  /** Upper bound in milliseconds. */
  upTo: number;
  inclusive: boolean;
};

// Contiguous ranges: [0,500) [500,1000] (1000,2000] ... (60000,inf).
const BOUNDS: readonly BucketBound[] = [
  { bucket: '< 0.5s', upTo: 500, inclusive: false },
  { bucket: '0.5-1s', upTo: 1_000, inclusive: true },
  { bucket: '1-2s', upTo: 2_000, inclusive: true },
  { bucket: '2-5s', upTo: 5_000, inclusive: true },
  { bucket: '5-10s', upTo: 10_000, inclusive: true },
  { bucket: '10-30s', upTo: 30_000, inclusive: true },
  { bucket: '30-60s', upTo: 60_000, inclusive: true }
];

export const GAP_BUCKETS: readonly GapBucket[] = ['First Event', ...BOUNDS.map((bound) => bound.bucket), '> 60s'];

export function bucketGap(gapMs: number | null): GapBucket {
  if (gapMs === null) {
    return 'First Event';
  }
  for (const { bucket, upTo, inclusive } of BOUNDS) {
    if (inclusive ? gapMs <= upTo : gapMs < upTo) {
      return bucket;
    }
  }
  return '> 60s';
}
