import assert from 'node:assert/strict';
import { test } from 'node:test';

import { normalizeOrgIdentifier } from '../src/enrichment/orgIdentifiers';

test('pads numeric identifiers to eight digits', () => {
  assert.equal(normalizeOrgIdentifier('1234567'), '01234567');
  assert.equal(normalizeOrgIdentifier(' 1234567 '), '01234567');
  assert.equal(normalizeOrgIdentifier(1234567), '01234567');
  assert.equal(normalizeOrgIdentifier('01234567'), '01234567');
  assert.equal(normalizeOrgIdentifier('123456789'), '123456789');
});

test('strips trailing decimal markers from spreadsheet exports', () => {
  assert.equal(normalizeOrgIdentifier('1234567.0'), '01234567');
  assert.equal(normalizeOrgIdentifier('1234567.00'), '01234567');
  assert.equal(normalizeOrgIdentifier('1234567.5'), null);
});

test('non-numeric and blank values are missing', () => {
  assert.equal(normalizeOrgIdentifier(''), null);
  assert.equal(normalizeOrgIdentifier('n/a'), null);
  assert.equal(normalizeOrgIdentifier('12-34'), null);
  assert.equal(normalizeOrgIdentifier(null), null);
  assert.equal(normalizeOrgIdentifier(-5), null);
  assert.equal(normalizeOrgIdentifier(12.5), null);
});
