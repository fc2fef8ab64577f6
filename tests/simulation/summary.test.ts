/**
 * Run Summary Tests
 */

import { describe, it, expect } from 'vitest';
import { buildSummary, formatSummary } from '../../src/simulation/summary.js';
import { createActorId } from '../../src/types.js';
import { dayReport, result, slotReport } from '../helpers/reports.js';

describe('buildSummary', () => {
  const slots = [
    slotReport(0, 0, [result('a', 'post', 'succeeded'), result('b', 'read', 'failed')]),
    slotReport(1, 0, [result('a', 'post', 'skipped', { slot: 1 })]),
    slotReport(4, 1, [result('c', 'comment', 'succeeded', { slot: 4, day: 1 })]),
  ];
  const days = [
    dayReport(0, {
      populationBefore: 10,
      populationAfter: 9,
      churned: [createActorId('x'), createActorId('y')],
      recruited: [createActorId('z')],
      followEvaluations: [result('a', 'follow', 'succeeded', { slot: 3 })],
    }),
    dayReport(1, { populationBefore: 9, populationAfter: 9 }),
  ];

  it('counts outcomes overall, per kind and per day', () => {
    const summary = buildSummary(slots, days);

    expect(summary.days).toBe(2);
    expect(summary.slots).toBe(3);
    expect(summary.totals).toEqual({ succeeded: 3, failed: 1, skipped: 1 });
    expect(summary.byKind.post).toEqual({ succeeded: 1, failed: 0, skipped: 1 });
    expect(summary.byKind.follow).toEqual({ succeeded: 1, failed: 0, skipped: 0 });
    expect(summary.byDay.map((d) => [d.day, d.counts])).toEqual([
      [0, { succeeded: 2, failed: 1, skipped: 1 }],
      [1, { succeeded: 1, failed: 0, skipped: 0 }],
    ]);
    expect(summary.population).toEqual([
      { day: 0, before: 10, churned: 2, recruited: 1, after: 9 },
      { day: 1, before: 9, churned: 0, recruited: 0, after: 9 },
    ]);
  });

  it('formats only the kinds that ran', () => {
    expect(formatSummary(buildSummary(slots, days)).split('\n')).toEqual([
      '=== Simulation Summary ===',
      'Days: 2, slots: 3',
      'Actions: 3 ok / 1 failed / 1 skipped',
      '',
      'By action:',
      '  post     1 ok / 0 failed / 1 skipped',
      '  comment  1 ok / 0 failed / 0 skipped',
      '  read     0 ok / 1 failed / 0 skipped',
      '  follow   1 ok / 0 failed / 0 skipped',
      '',
      'Population:',
      '  day 0: 10 → 9 (-2 +1)',
      '  day 1: 9 → 9 (-0 +0)',
    ]);
  });

  it('handles an empty run', () => {
    const summary = buildSummary([], []);
    expect(summary.totals).toEqual({ succeeded: 0, failed: 0, skipped: 0 });
    expect(summary.byDay).toEqual([]);
    expect(formatSummary(summary).split('\n')).toEqual([
      '=== Simulation Summary ===',
      'Days: 0, slots: 0',
      'Actions: 0 ok / 0 failed / 0 skipped',
      '',
      'By action:',
      '',
      'Population:',
    ]);
  });
});
