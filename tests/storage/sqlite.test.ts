/**
 * SQLite Storage Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SQLiteStorage } from '../../src/storage/sqlite.js';
import { buildSummary } from '../../src/simulation/summary.js';
import { createActorId, createRunId, type RunId } from '../../src/types.js';
import { makeActor, testConfig } from '../helpers/fakes.js';
import { dayReport, result, slotReport } from '../helpers/reports.js';

describe('SQLiteStorage', () => {
  let storage: SQLiteStorage;
  let runId: RunId;

  beforeEach(async () => {
    storage = new SQLiteStorage(':memory:');
    const config = testConfig();
    runId = await storage.createRun({
      ...config,
      servers: { ...config.servers, llmApiKey: 'test-secret', anthropicApiKey: 'test-secret' },
    });
  });

  afterEach(() => {
    storage.close();
  });

  describe('runs', () => {
    it('creates a running run with keys redacted', async () => {
      const run = await storage.getRun(runId);

      expect(run).toMatchObject({ id: runId, name: 'test', seed: 7, days: 1, slotsPerDay: 4, status: 'running' });
      expect(run?.finishedAt).toBeNull();
      expect(run?.summary).toBeNull();
      expect(run?.config).toMatchObject({ servers: { llmApiKey: '', anthropicApiKey: '' } });
    });

    it('returns null for an unknown run', async () => {
      expect(await storage.getRun(createRunId('missing'))).toBeNull();
    });

    it('finishes a run with its summary', async () => {
      const summary = buildSummary([], [dayReport(0)]);
      await storage.finishRun(runId, 'completed', summary);

      const run = await storage.getRun(runId);
      expect(run?.status).toBe('completed');
      expect(run?.finishedAt).toBeInstanceOf(Date);
      expect(run?.summary).toEqual(summary);
      expect(run?.error).toBeNull();
    });

    it('records the error of a failed run', async () => {
      await storage.finishRun(runId, 'failed', undefined, 'service unreachable');
      expect(await storage.getRun(runId)).toMatchObject({ status: 'failed', summary: null, error: 'service unreachable' });
    });

    it('lists every run', async () => {
      const second = await storage.createRun(testConfig());
      const ids = (await storage.listRuns()).map((r) => r.id);
      expect([...ids].sort()).toEqual([runId, second].sort());
    });
  });

  describe('action log', () => {
    beforeEach(async () => {
      await storage.recordSlot(
        runId,
        slotReport(0, 0, [
          result('a', 'post', 'succeeded', {}, { detail: 'p1' }),
          result('b', 'read', 'failed', {}, { error: 'Content service error (503) on read: busy', attempts: 3 }),
        ])
      );
      await storage.recordSlot(runId, slotReport(4, 1, [result('c', 'post', 'skipped', { slot: 4, day: 1 })]));
    });

    it('stores results in execution order', async () => {
      const actions = await storage.getActions(runId);

      expect(actions).toHaveLength(3);
      expect(actions[0]).toEqual({
        slot: 0,
        day: 0,
        hour: 0,
        phase: 'slot',
        actorId: 'a',
        kind: 'post',
        resource: 'heavy',
        status: 'succeeded',
        error: null,
        durationMs: 1,
        attempts: 1,
        detail: 'p1',
      });
      expect(actions[1]).toMatchObject({ actorId: 'b', status: 'failed', attempts: 3 });
    });

    it('filters by day, kind and status', async () => {
      expect((await storage.getActions(runId, { day: 1 })).map((a) => a.actorId)).toEqual(['c']);
      expect((await storage.getActions(runId, { kind: 'post' })).map((a) => a.actorId)).toEqual(['a', 'c']);
      expect((await storage.getActions(runId, { status: 'failed' })).map((a) => a.actorId)).toEqual(['b']);
    });

    it('pages with limit and offset', async () => {
      expect((await storage.getActions(runId, { limit: 1, offset: 1 })).map((a) => a.actorId)).toEqual(['b']);
    });

    it('logs follow evaluations with the day report', async () => {
      await storage.recordDay(
        runId,
        dayReport(0, {
          populationAfter: 9,
          churned: [createActorId('x')],
          followEvaluations: [result('a', 'follow', 'succeeded', { slot: 3 }, { phase: 'day-boundary' })],
          phaseFailures: [{ phase: 'churn', actorId: createActorId('x'), error: 'gone' }],
          dailyActive: 2,
        })
      );

      expect(await storage.getDayReports(runId)).toEqual([
        {
          day: 0,
          populationBefore: 10,
          populationAfter: 9,
          churned: 1,
          recruited: 0,
          followEvaluations: 1,
          dailyActive: 2,
          phaseFailures: [{ phase: 'churn', actorId: 'x', error: 'gone' }],
        },
      ]);
      expect((await storage.getActions(runId, { kind: 'follow' })).map((a) => a.slot)).toEqual([3]);
      expect((await storage.getActions(runId, { phase: 'day-boundary' })).map((a) => [a.actorId, a.kind])).toEqual([
        ['a', 'follow'],
      ]);
    });
  });

  describe('population', () => {
    it('saves actors and filters by lifecycle', async () => {
      const active = makeActor('a');
      const churned = makeActor('b', { lifecycle: 'churned', churnedDay: 0 });
      await storage.saveActors(runId, [active, churned]);

      expect(await storage.getActors(runId)).toEqual([active, churned]);
      expect(await storage.getActors(runId, { lifecycle: 'churned' })).toEqual([churned]);
    });

    it('replaces the edge set', async () => {
      const a = createActorId('a');
      const b = createActorId('b');
      await storage.saveEdges(runId, [
        { follower: a, followee: b },
        { follower: b, followee: a },
      ]);
      expect(await storage.countEdges(runId)).toBe(2);

      await storage.saveEdges(runId, [{ follower: a, followee: b }]);
      expect(await storage.countEdges(runId)).toBe(1);
    });
  });

  it('reset drops every run', async () => {
    await storage.recordSlot(runId, slotReport(0, 0, [result('a', 'post', 'succeeded')]));
    await storage.reset();

    expect(await storage.listRuns()).toEqual([]);
    expect(await storage.getActions(runId)).toEqual([]);
  });
});
