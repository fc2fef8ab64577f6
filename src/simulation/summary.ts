/**
 * Run summary: action outcomes per kind and per day, and the population
 * trajectory.
 */

import type { ActionCounts, ActionKind, ActionResult, DayReport, RunSummary, SlotReport } from '../types.js';
import { ACTION_KINDS } from '../types.js';

export function emptyCounts(): ActionCounts {
  return { succeeded: 0, failed: 0, skipped: 0 };
}

function emptyByKind(): Record<ActionKind, ActionCounts> {
  return {
    post: emptyCounts(),
    comment: emptyCounts(),
    read: emptyCounts(),
    share: emptyCounts(),
    reply: emptyCounts(),
    search: emptyCounts(),
    follow: emptyCounts(),
    cast: emptyCounts(),
    react: emptyCounts(),
  };
}

export class SummaryBuilder {
  private slots = 0;
  private readonly totals = emptyCounts();
  private readonly byKind = emptyByKind();
  private readonly byDay = new Map<number, { counts: ActionCounts; byKind: Record<ActionKind, ActionCounts> }>();
  private readonly population: RunSummary['population'] = [];

  addSlot(report: SlotReport): void {
    this.slots++;
    this.addResults(report.slot.day, report.results);
  }

  addDay(report: DayReport): void {
    this.addResults(report.day, report.followEvaluations);
    this.population.push({
      day: report.day,
      before: report.populationBefore,
      churned: report.churned.length,
      recruited: report.recruited.length,
      after: report.populationAfter,
    });
  }

  build(): RunSummary {
    const byDay = [...this.byDay.entries()]
      .sort(([a], [b]) => a - b)
      .map(([day, entry]) => ({ day, counts: { ...entry.counts }, byKind: entry.byKind }));
    return {
      days: this.population.length,
      slots: this.slots,
      totals: { ...this.totals },
      byKind: this.byKind,
      byDay,
      population: [...this.population],
    };
  }

  private addResults(day: number, results: readonly ActionResult[]): void {
    let entry = this.byDay.get(day);
    if (!entry) {
      entry = { counts: emptyCounts(), byKind: emptyByKind() };
      this.byDay.set(day, entry);
    }
    for (const r of results) {
      this.totals[r.status]++;
      this.byKind[r.kind][r.status]++;
      entry.counts[r.status]++;
      entry.byKind[r.kind][r.status]++;
    }
  }
}

export function buildSummary(slots: readonly SlotReport[], days: readonly DayReport[]): RunSummary {
  const builder = new SummaryBuilder();
  for (const s of slots) builder.addSlot(s);
  for (const d of days) builder.addDay(d);
  return builder.build();
}

function formatCounts(c: ActionCounts): string {
  return `${c.succeeded} ok / ${c.failed} failed / ${c.skipped} skipped`;
}

export function formatSummary(summary: RunSummary): string {
  const lines = [
    `=== Simulation Summary ===`,
    `Days: ${summary.days}, slots: ${summary.slots}`,
    `Actions: ${formatCounts(summary.totals)}`,
    ``,
    `By action:`,
  ];
  for (const kind of ACTION_KINDS) {
    const c = summary.byKind[kind];
    if (c.succeeded + c.failed + c.skipped > 0) {
      lines.push(`  ${kind.padEnd(8)} ${formatCounts(c)}`);
    }
  }
  lines.push(``, `Population:`);
  for (const p of summary.population) {
    lines.push(`  day ${p.day}: ${p.before} → ${p.after} (-${p.churned} +${p.recruited})`);
  }
  return lines.join('\n');
}
