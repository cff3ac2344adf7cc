import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  canonicalToEpochMicros,
  formatCanonicalTimestamp,
  hasSubSecondPrecision,
  parseTimestampText,
  parseTimestampValue
} from '../src/ingest/timestamps';

function canonical(value: unknown): string | null {
  const parsed = parseTimestampValue(value);
  return parsed ? formatCanonicalTimestamp(parsed.epochMicros) : null;
}

test('parses day-first export timestamps as UTC', () => {
  assert.equal(canonical('05/03/2024 14:07:09.1234567'), '2024-03-05T14:07:09.123456Z');
  assert.equal(canonical('05/03/2024 14:07'), '2024-03-05T14:07:00.000000Z');
  assert.equal(canonical('05/03/2024'), '2024-03-05T00:00:00.000000Z');
  assert.equal(canonical('05.03.2024 14:07:09'), '2024-03-05T14:07:09.000000Z');
});

test('parses ISO timestamps with offsets', () => {
  assert.equal(canonical('2024-03-05 14:07:09.5'), '2024-03-05T14:07:09.500000Z');
  assert.equal(canonical('2024-03-05T14:07:09Z'), '2024-03-05T14:07:09.000000Z');
  assert.equal(canonical('2024-03-05T16:07:09+02:00'), '2024-03-05T14:07:09.000000Z');
});

test('flags truncation beyond microseconds', () => {
  assert.equal(parseTimestampText('2024-03-05 14:07:09.1234567')?.truncated, true);
  assert.equal(parseTimestampText('2024-03-05 14:07:09.123456')?.truncated, false);
  assert.equal(parseTimestampText('2024-03-05 14:07:09.1234560')?.truncated, false);
});

test('rejects impossible or unrecognized values', () => {
  assert.equal(parseTimestampText('31/02/2024 10:00:00'), null);
  assert.equal(parseTimestampText('2024-03-05 25:00:00'), null);
  assert.equal(parseTimestampText('yesterday'), null);
  assert.equal(parseTimestampValue(null), null);
  assert.equal(parseTimestampValue(''), null);
});

test('accepts spreadsheet dates and serial numbers', () => {
  assert.equal(canonical(new Date(Date.UTC(2024, 2, 5, 14, 7, 9))), '2024-03-05T14:07:09.000000Z');
  assert.equal(canonical(45356.5), '2024-03-05T12:00:00.000000Z');
});

test('canonical form round-trips and sorts chronologically', () => {
  const micros = canonicalToEpochMicros('2024-03-05T14:07:09.000250Z');
  assert.equal(formatCanonicalTimestamp(micros), '2024-03-05T14:07:09.000250Z');
  assert.equal(hasSubSecondPrecision(micros), true);
  assert.equal(hasSubSecondPrecision(canonicalToEpochMicros('2024-03-05T14:07:09.000000Z')), false);
  assert.ok('2024-03-05T09:59:59.999999Z' < '2024-03-05T10:00:00.000000Z');
});
