/**
 * Monitoring API Server
 *
 * Hono-based read-only API over the run database: runs, per-day population
 * reports, the action log and actor records.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ActionKind, ActionPhase, ActionStatus, ActorRecord } from '../types.js';
import { ACTION_KINDS, createRunId } from '../types.js';
import type { ActionQuery, RunRecord, Storage } from '../storage/sqlite.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('API');

const MAX_PAGE_SIZE = 1000;

// =============================================================================
// APP SETUP
// =============================================================================

export interface AppContext {
  storage: Storage;
}

function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some((k) => k === value);
}

function isActionStatus(value: string): value is ActionStatus {
  return value === 'succeeded' || value === 'failed' || value === 'skipped';
}

function isActionPhase(value: string): value is ActionPhase {
  return value === 'slot' || value === 'day-boundary';
}

function isLifecycle(value: string): value is ActorRecord['lifecycle'] {
  return value === 'active' || value === 'churned';
}

function parseNonNegativeInt(value: string | undefined): number | undefined | null {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) return null;
  return parseInt(value, 10);
}

function runView(run: RunRecord): Omit<RunRecord, 'config'> {
  const { config: _config, ...rest } = run;
  return rest;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // =============================================================================
  // RUN ROUTES
  // =============================================================================

  app.get('/api/runs', async (c) => {
    const runs = await ctx.storage.listRuns();
    return c.json({ runs: runs.map(runView) });
  });

  app.get('/api/runs/:id', async (c) => {
    const id = createRunId(c.req.param('id'));
    const run = await ctx.storage.getRun(id);
    if (!run) return c.json({ error: 'Run not found' }, 404);
    const edges = await ctx.storage.countEdges(id);
    return c.json({ run, followEdges: edges });
  });

  app.get('/api/runs/:id/days', async (c) => {
    const id = createRunId(c.req.param('id'));
    if (!(await ctx.storage.getRun(id))) return c.json({ error: 'Run not found' }, 404);
    return c.json({ days: await ctx.storage.getDayReports(id) });
  });

  app.get('/api/runs/:id/actions', async (c) => {
    const id = createRunId(c.req.param('id'));
    if (!(await ctx.storage.getRun(id))) return c.json({ error: 'Run not found' }, 404);

    const query: ActionQuery = {};
    const day = parseNonNegativeInt(c.req.query('day'));
    const limit = parseNonNegativeInt(c.req.query('limit'));
    const offset = parseNonNegativeInt(c.req.query('offset'));
    if (day === null || limit === null || offset === null) {
      return c.json({ error: 'day, limit and offset must be non-negative integers' }, 400);
    }
    query.day = day;
    query.limit = Math.min(limit ?? 100, MAX_PAGE_SIZE);
    query.offset = offset ?? 0;

    const kind = c.req.query('kind');
    if (kind !== undefined) {
      if (!isActionKind(kind)) return c.json({ error: `Unknown action kind: ${kind}` }, 400);
      query.kind = kind;
    }
    const status = c.req.query('status');
    if (status !== undefined) {
      if (!isActionStatus(status)) return c.json({ error: `Unknown status: ${status}` }, 400);
      query.status = status;
    }
    const phase = c.req.query('phase');
    if (phase !== undefined) {
      if (!isActionPhase(phase)) return c.json({ error: `Unknown phase: ${phase}` }, 400);
      query.phase = phase;
    }

    return c.json({ actions: await ctx.storage.getActions(id, query) });
  });

  app.get('/api/runs/:id/actors', async (c) => {
    const id = createRunId(c.req.param('id'));
    if (!(await ctx.storage.getRun(id))) return c.json({ error: 'Run not found' }, 404);

    const lifecycle = c.req.query('lifecycle');
    if (lifecycle !== undefined && !isLifecycle(lifecycle)) {
      return c.json({ error: `Unknown lifecycle: ${lifecycle}` }, 400);
    }
    return c.json({ actors: await ctx.storage.getActors(id, { lifecycle }) });
  });

  app.onError((error, c) => {
    log.error(`${c.req.method} ${c.req.path} failed: ${error.message}`);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

// =============================================================================
// SERVER START
// =============================================================================

export function startServer(ctx: AppContext, port: number): ReturnType<typeof serve> {
  const app = createApp(ctx);
  return serve(
    {
      fetch: app.fetch,
      port,
    },
    (info) => {
      log.info(`Monitoring API running at http://localhost:${info.port}`);
    }
  );
}
