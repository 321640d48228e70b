import assert from 'node:assert/strict';
import test from 'node:test';
import { DataIntegrityError } from '../src/errors.ts';
import { computePhaseProportions, expandProportions } from '../src/phases.ts';

test('computePhaseProportions gives fractions that sum to one', () => {
  const proportions = computePhaseProportions([
    { runId: 'r1', phase: 'Load packages', duration: 1.25 },
    { runId: 'r1', phase: 'Analyze dependencies', duration: 2.5 },
    { runId: 'r1', phase: 'Build artifacts', duration: 7.75 },
  ]);

  const shares = proportions.get('r1');
  assert.ok(shares);
  let sum = 0;
  for (const share of shares.values()) sum += share;
  assert.ok(Math.abs(sum - 1) < 1e-12, `expected 1, got ${sum}`);
  assert.equal(shares.get('Analyze dependencies'), 2.5 / 11.5);
});

test('computePhaseProportions groups interleaved samples by run', () => {
  const proportions = computePhaseProportions([
    { runId: 'a', phase: 'p1', duration: 3 },
    { runId: 'b', phase: 'p1', duration: 4 },
    { runId: 'a', phase: 'p2', duration: 1 },
  ]);

  assert.deepEqual([...proportions.keys()], ['a', 'b']);
  assert.deepEqual(proportions.get('a'), new Map([['p1', 0.75], ['p2', 0.25]]));
  assert.deepEqual(proportions.get('b'), new Map([['p1', 1]]));
});

test('computePhaseProportions sums repeated samples of one phase', () => {
  const proportions = computePhaseProportions([
    { runId: 'r1', phase: 'p1', duration: 1 },
    { runId: 'r1', phase: 'p1', duration: 1 },
    { runId: 'r1', phase: 'p2', duration: 2 },
  ]);

  assert.deepEqual(proportions.get('r1'), new Map([['p1', 0.5], ['p2', 0.5]]));
});

test('computePhaseProportions rejects a run whose durations are all zero', () => {
  assert.throws(
    () => computePhaseProportions([
      { runId: 'ok', phase: 'p1', duration: 2 },
      { runId: 'empty', phase: 'p1', duration: 0 },
      { runId: 'empty', phase: 'p2', duration: 0 },
    ]),
    (err: unknown) => err instanceof DataIntegrityError && err.runId === 'empty',
  );
});

test('computePhaseProportions rejects negative durations', () => {
  assert.throws(
    () => computePhaseProportions([{ runId: 'r1', phase: 'p1', duration: -1 }]),
    DataIntegrityError,
  );
});

test('computePhaseProportions returns an empty map for no samples', () => {
  assert.equal(computePhaseProportions([]).size, 0);
});

test('expandProportions fills phases a run did not report with zero', () => {
  const shares = new Map([['p3', 0.4], ['p1', 0.6], ['extra', 0]]);
  assert.deepEqual(expandProportions(shares, ['p1', 'p2', 'p3']), [0.6, 0, 0.4]);
});
