/**
 * SQLite Storage Implementation
 *
 * Keeps a local record of every run: its config, the actors, the follow
 * graph, one row per executed action and one row per day report. The
 * monitoring API reads from here.
 */

import Database from 'better-sqlite3';
import { v4 as uuid } from 'uuid';
import type {
  ActionKind,
  ActionPhase,
  ActionResult,
  ActionStatus,
  ActorRecord,
  DayReport,
  RunId,
  RunSummary,
  SlotReport,
} from '../types.js';
import { createRunId } from '../types.js';
import type { SimulationConfig } from '../config/schema.js';
import type { FollowEdge } from '../simulation/graph.js';

export type RunStatus = 'running' | 'completed' | 'failed';

export interface RunRecord {
  id: RunId;
  name: string;
  seed: number;
  days: number;
  slotsPerDay: number;
  status: RunStatus;
  startedAt: Date;
  finishedAt: Date | null;
  config: unknown;
  summary: unknown;
  error: string | null;
}

export interface DayReportRecord {
  day: number;
  populationBefore: number;
  populationAfter: number;
  churned: number;
  recruited: number;
  followEvaluations: number;
  dailyActive: number;
  phaseFailures: unknown;
}

export interface ActionRecord {
  slot: number;
  day: number;
  hour: number;
  phase: string;
  actorId: string;
  kind: string;
  resource: string;
  status: string;
  error: string | null;
  durationMs: number;
  attempts: number;
  detail: string | null;
}

export interface ActionQuery {
  day?: number;
  kind?: ActionKind;
  status?: ActionStatus;
  phase?: ActionPhase;
  limit?: number;
  offset?: number;
}

export interface ActorQuery {
  lifecycle?: ActorRecord['lifecycle'];
}

export interface Storage {
  // Run operations
  createRun(config: SimulationConfig): Promise<RunId>;
  finishRun(id: RunId, status: Exclude<RunStatus, 'running'>, summary?: RunSummary, error?: string): Promise<void>;
  getRun(id: RunId): Promise<RunRecord | null>;
  listRuns(): Promise<RunRecord[]>;

  // Population operations
  saveActors(runId: RunId, actors: readonly ActorRecord[]): Promise<void>;
  getActors(runId: RunId, query?: ActorQuery): Promise<unknown[]>;
  saveEdges(runId: RunId, edges: Iterable<FollowEdge>): Promise<void>;
  countEdges(runId: RunId): Promise<number>;

  // Telemetry
  recordSlot(runId: RunId, report: SlotReport): Promise<void>;
  recordDay(runId: RunId, report: DayReport): Promise<void>;
  getActions(runId: RunId, query?: ActionQuery): Promise<ActionRecord[]>;
  getDayReports(runId: RunId): Promise<DayReportRecord[]>;

  reset(): Promise<void>;
  close(): void;
}

interface RunRow {
  id: string;
  name: string;
  seed: number;
  days: number;
  slots_per_day: number;
  status: string;
  started_at: string;
  finished_at: string | null;
  config: string;
  summary: string | null;
  error: string | null;
}

interface DayRow {
  day: number;
  population_before: number;
  population_after: number;
  churned: number;
  recruited: number;
  follow_evaluations: number;
  daily_active: number;
  phase_failures: string;
}

interface ActionRow {
  slot: number;
  day: number;
  hour: number;
  phase: string;
  actor_id: string;
  kind: string;
  resource: string;
  status: string;
  error: string | null;
  duration_ms: number;
  attempts: number;
  detail: string | null;
}

function isRunStatus(value: string): value is RunStatus {
  return value === 'running' || value === 'completed' || value === 'failed';
}

// Keys never reach the database
function redact(config: SimulationConfig): SimulationConfig {
  return { ...config, servers: { ...config.servers, llmApiKey: '', anthropicApiKey: '' } };
}

function parseJson(text: string | null): unknown {
  return text === null ? null : JSON.parse(text);
}

export class SQLiteStorage implements Storage {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      -- Runs table
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        seed INTEGER NOT NULL,
        days INTEGER NOT NULL,
        slots_per_day INTEGER NOT NULL,
        status TEXT NOT NULL DEFAULT 'running',
        started_at TEXT NOT NULL,
        finished_at TEXT,
        config TEXT NOT NULL,
        summary TEXT,
        error TEXT
      );

      -- Actors table (latest known state per run)
      CREATE TABLE IF NOT EXISTS actors (
        run_id TEXT NOT NULL,
        id TEXT NOT NULL,
        name TEXT NOT NULL,
        kind TEXT NOT NULL,
        lifecycle TEXT NOT NULL,
        joined_day INTEGER NOT NULL,
        churned_day INTEGER,
        record TEXT NOT NULL,
        PRIMARY KEY (run_id, id),
        FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
      );

      -- Follow edges table
      CREATE TABLE IF NOT EXISTS follow_edges (
        run_id TEXT NOT NULL,
        follower TEXT NOT NULL,
        followee TEXT NOT NULL,
        PRIMARY KEY (run_id, follower, followee),
        FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
      );

      -- One row per executed action
      CREATE TABLE IF NOT EXISTS action_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        slot INTEGER NOT NULL,
        day INTEGER NOT NULL,
        hour INTEGER NOT NULL,
        phase TEXT NOT NULL DEFAULT 'slot',
        actor_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        resource TEXT NOT NULL,
        status TEXT NOT NULL,
        error TEXT,
        duration_ms INTEGER NOT NULL,
        attempts INTEGER NOT NULL,
        detail TEXT,
        FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
      );

      -- End-of-day reports
      CREATE TABLE IF NOT EXISTS day_reports (
        run_id TEXT NOT NULL,
        day INTEGER NOT NULL,
        population_before INTEGER NOT NULL,
        population_after INTEGER NOT NULL,
        churned INTEGER NOT NULL,
        recruited INTEGER NOT NULL,
        follow_evaluations INTEGER NOT NULL,
        daily_active INTEGER NOT NULL,
        phase_failures TEXT NOT NULL,
        PRIMARY KEY (run_id, day),
        FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_action_log_run_day ON action_log(run_id, day);
      CREATE INDEX IF NOT EXISTS idx_actors_run ON actors(run_id, lifecycle);
    `);
  }

  // Run operations
  async createRun(config: SimulationConfig): Promise<RunId> {
    const id = createRunId(uuid());
    this.db
      .prepare(
        `INSERT INTO runs (id, name, seed, days, slots_per_day, status, started_at, config)
         VALUES (?, ?, ?, ?, ?, 'running', ?, ?)`
      )
      .run(id, config.name, config.seed, config.days, config.slotsPerDay, new Date().toISOString(), JSON.stringify(redact(config)));
    return id;
  }

  async finishRun(
    id: RunId,
    status: Exclude<RunStatus, 'running'>,
    summary?: RunSummary,
    error?: string
  ): Promise<void> {
    this.db
      .prepare('UPDATE runs SET status = ?, finished_at = ?, summary = ?, error = ? WHERE id = ?')
      .run(status, new Date().toISOString(), summary ? JSON.stringify(summary) : null, error ?? null, id);
  }

  async getRun(id: RunId): Promise<RunRecord | null> {
    const row = this.db.prepare<[string], RunRow>('SELECT * FROM runs WHERE id = ?').get(id);
    return row ? this.toRunRecord(row) : null;
  }

  async listRuns(): Promise<RunRecord[]> {
    const rows = this.db.prepare<[], RunRow>('SELECT * FROM runs ORDER BY started_at DESC').all();
    return rows.map((row) => this.toRunRecord(row));
  }

  // Population operations
  async saveActors(runId: RunId, actors: readonly ActorRecord[]): Promise<void> {
    const upsert = this.db.prepare(
      `INSERT OR REPLACE INTO actors (run_id, id, name, kind, lifecycle, joined_day, churned_day, record)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const saveAll = this.db.transaction((list: readonly ActorRecord[]) => {
      for (const a of list) {
        upsert.run(runId, a.id, a.name, a.kind, a.lifecycle, a.joinedDay, a.churnedDay ?? null, JSON.stringify(a));
      }
    });
    saveAll(actors);
  }

  async getActors(runId: RunId, query: ActorQuery = {}): Promise<unknown[]> {
    const rows = query.lifecycle
      ? this.db
          .prepare<[string, string], { record: string }>(
            'SELECT record FROM actors WHERE run_id = ? AND lifecycle = ? ORDER BY rowid'
          )
          .all(runId, query.lifecycle)
      : this.db
          .prepare<[string], { record: string }>('SELECT record FROM actors WHERE run_id = ? ORDER BY rowid')
          .all(runId);
    return rows.map((row) => parseJson(row.record));
  }

  async saveEdges(runId: RunId, edges: Iterable<FollowEdge>): Promise<void> {
    const clear = this.db.prepare('DELETE FROM follow_edges WHERE run_id = ?');
    const insert = this.db.prepare('INSERT OR IGNORE INTO follow_edges (run_id, follower, followee) VALUES (?, ?, ?)');
    const replaceAll = this.db.transaction((list: FollowEdge[]) => {
      clear.run(runId);
      for (const e of list) insert.run(runId, e.follower, e.followee);
    });
    replaceAll([...edges]);
  }

  async countEdges(runId: RunId): Promise<number> {
    const row = this.db
      .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM follow_edges WHERE run_id = ?')
      .get(runId);
    return row?.n ?? 0;
  }

  // Telemetry
  async recordSlot(runId: RunId, report: SlotReport): Promise<void> {
    this.insertResults(runId, report.results);
  }

  async recordDay(runId: RunId, report: DayReport): Promise<void> {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO day_reports
         (run_id, day, population_before, population_after, churned, recruited, follow_evaluations, daily_active, phase_failures)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        runId,
        report.day,
        report.populationBefore,
        report.populationAfter,
        report.churned.length,
        report.recruited.length,
        report.followEvaluations.length,
        report.dailyActive,
        JSON.stringify(report.phaseFailures)
      );
    // Follow evaluations carry the 'day-boundary' phase
    this.insertResults(runId, report.followEvaluations);
  }

  async getActions(runId: RunId, query: ActionQuery = {}): Promise<ActionRecord[]> {
    const clauses = ['run_id = ?'];
    const params: Array<string | number> = [runId];
    if (query.day !== undefined) {
      clauses.push('day = ?');
      params.push(query.day);
    }
    if (query.kind) {
      clauses.push('kind = ?');
      params.push(query.kind);
    }
    if (query.status) {
      clauses.push('status = ?');
      params.push(query.status);
    }
    if (query.phase) {
      clauses.push('phase = ?');
      params.push(query.phase);
    }
    params.push(query.limit ?? 100, query.offset ?? 0);

    const rows = this.db
      .prepare<Array<string | number>, ActionRow>(
        `SELECT slot, day, hour, phase, actor_id, kind, resource, status, error, duration_ms, attempts, detail
         FROM action_log WHERE ${clauses.join(' AND ')} ORDER BY id LIMIT ? OFFSET ?`
      )
      .all(...params);

    return rows.map((row) => ({
      slot: row.slot,
      day: row.day,
      hour: row.hour,
      phase: row.phase,
      actorId: row.actor_id,
      kind: row.kind,
      resource: row.resource,
      status: row.status,
      error: row.error,
      durationMs: row.duration_ms,
      attempts: row.attempts,
      detail: row.detail,
    }));
  }

  async getDayReports(runId: RunId): Promise<DayReportRecord[]> {
    const rows = this.db
      .prepare<[string], DayRow>('SELECT * FROM day_reports WHERE run_id = ? ORDER BY day')
      .all(runId);
    return rows.map((row) => ({
      day: row.day,
      populationBefore: row.population_before,
      populationAfter: row.population_after,
      churned: row.churned,
      recruited: row.recruited,
      followEvaluations: row.follow_evaluations,
      dailyActive: row.daily_active,
      phaseFailures: parseJson(row.phase_failures),
    }));
  }

  /** Drop every run and everything recorded for it. */
  async reset(): Promise<void> {
    this.db.exec(`
      DELETE FROM action_log;
      DELETE FROM day_reports;
      DELETE FROM follow_edges;
      DELETE FROM actors;
      DELETE FROM runs;
    `);
  }

  close(): void {
    this.db.close();
  }

  private insertResults(runId: RunId, results: readonly ActionResult[]): void {
    const insert = this.db.prepare(
      `INSERT INTO action_log
       (run_id, slot, day, hour, phase, actor_id, kind, resource, status, error, duration_ms, attempts, detail)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertAll = this.db.transaction((list: readonly ActionResult[]) => {
      for (const r of list) {
        insert.run(
          runId,
          r.slot,
          r.day,
          r.hour,
          r.phase,
          r.actorId,
          r.kind,
          r.resource,
          r.status,
          r.error ?? null,
          r.durationMs,
          r.attempts,
          r.detail ?? null
        );
      }
    });
    insertAll(results);
  }

  private toRunRecord(row: RunRow): RunRecord {
    return {
      id: createRunId(row.id),
      name: row.name,
      seed: row.seed,
      days: row.days,
      slotsPerDay: row.slots_per_day,
      status: isRunStatus(row.status) ? row.status : 'failed',
      startedAt: new Date(row.started_at),
      finishedAt: row.finished_at ? new Date(row.finished_at) : null,
      config: parseJson(row.config),
      summary: parseJson(row.summary),
      error: row.error,
    };
  }
}

// Factory function
export function createStorage(dbPath?: string): SQLiteStorage {
  return new SQLiteStorage(dbPath);
}
