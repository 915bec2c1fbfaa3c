import test from 'node:test';
import assert from 'node:assert/strict';

import { InvalidDateError } from '../../api/errors';
import { resolveDateSelection } from '../dateResolver';

const now = new Date('2026-10-18T12:00:00Z');

test('a manual date inside the archive resolves to itself', () => {
  assert.deepEqual(resolveDateSelection('2020-01-05', null, now), { kind: 'date', date: '2020-01-05' });
  assert.deepEqual(resolveDateSelection('1995-06-16', null, now), { kind: 'date', date: '1995-06-16' });
});

test('a preset overrides the manual date', () => {
  assert.deepEqual(resolveDateSelection('2020-01-05', 'pons-brooks-ion-tail', now), {
    kind: 'date',
    date: '2024-04-08',
  });
  assert.deepEqual(resolveDateSelection(null, "Saturn's Rings Appear to Disappear", now), {
    kind: 'date',
    date: '2025-04-29',
  });
});

test('a preset wins even when the manual date is unusable', () => {
  assert.deepEqual(resolveDateSelection('not-a-date', 'deimos-before-sunrise', now), {
    kind: 'date',
    date: '2025-05-24',
  });
});

test('an unknown preset key falls back to the manual date', () => {
  assert.deepEqual(resolveDateSelection('2021-03-03', 'Select a Solar Event Date', now), {
    kind: 'date',
    date: '2021-03-03',
  });
});

test("today's date and an empty picker resolve to latest", () => {
  assert.deepEqual(resolveDateSelection('2026-10-18', null, now), { kind: 'latest' });
  assert.deepEqual(resolveDateSelection(undefined, undefined, now), { kind: 'latest' });
  assert.deepEqual(resolveDateSelection('  ', '', now), { kind: 'latest' });
});

test('a preset falling on today also resolves to latest', () => {
  const onPresetDay = new Date('2024-04-08T05:00:00Z');
  assert.deepEqual(resolveDateSelection(null, 'pons-brooks-ion-tail', onPresetDay), { kind: 'latest' });
});

test('a preset later than the caller\'s today is rejected', () => {
  const beforePreset = new Date('2024-04-08T05:00:00Z');
  assert.throws(
    () => resolveDateSelection('2020-01-05', 'deimos-before-sunrise', beforePreset),
    (err: unknown) => err instanceof InvalidDateError && err.value === '2025-05-24',
  );
});

test('dates outside the archive are rejected', () => {
  for (const bad of ['1995-06-15', '2026-10-19', '2031-01-01']) {
    assert.throws(
      () => resolveDateSelection(bad, null, now),
      (err: unknown) => err instanceof InvalidDateError && err.value === bad,
    );
  }
});

test('malformed and impossible dates are rejected', () => {
  for (const bad of ['2023-02-30', '18/10/2026', '2024-4-8']) {
    assert.throws(() => resolveDateSelection(bad, null, now), InvalidDateError);
  }
});
