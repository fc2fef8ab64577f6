/**
 * Activity sampling
 *
 * One independent Bernoulli trial per live actor per slot. The expected
 * number of active actors at an hour is `live × table[hour]`, shifted per
 * actor by its activity variance.
 *
 * Actors with a daily action bound stop being sampled once they have used
 * it. Only dispatched actions count: a slot where the actor selected nothing
 * or was turned away by the heavy queue does not.
 */

import type { ActionResult, ActorRecord, HourlyActivityTable, SlotInfo } from '../types.js';
import { bernoulli, clamp01, type Rng } from '../utils/random.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Activity');

export interface ActivitySample {
  /** Users active this slot */
  active: ActorRecord[];
  /** Pages eligible to publish this slot */
  publishers: ActorRecord[];
  /** False when the hour has no entry in the user table (fraction treated as 0) */
  hourConfigured: boolean;
}

export interface ActivitySamplerOptions {
  hourlyActivity: HourlyActivityTable;
  /** Defaults to the user table */
  pageHourlyActivity?: HourlyActivityTable;
}

export function activationProbability(fraction: number, variance: number): number {
  return clamp01(fraction * (1 + variance));
}

export class ActivitySampler {
  private readonly userTable: HourlyActivityTable;
  private readonly pageTable: HourlyActivityTable;
  private readonly warnedHours = new Set<number>();

  // Daily action bound bookkeeping; only used by actors with maxDailyActions
  private countersDay: number | null = null;
  private readonly dailyCounts = new Map<string, number>();

  constructor(options: ActivitySamplerOptions) {
    this.userTable = options.hourlyActivity;
    this.pageTable = options.pageHourlyActivity ?? options.hourlyActivity;
  }

  fractionFor(hour: number, table: HourlyActivityTable = this.userTable): number | undefined {
    return table[hour];
  }

  /**
   * Sample the active subset of `population` for a slot. Churned actors are
   * ignored even if the caller passes them in.
   */
  sample(population: readonly ActorRecord[], slot: SlotInfo, rng: Rng): ActivitySample {
    this.resetCountersFor(slot.day);

    const userFraction = this.fractionFor(slot.hour, this.userTable);
    const pageFraction = this.fractionFor(slot.hour, this.pageTable);
    const hourConfigured = userFraction !== undefined;
    if (!hourConfigured && !this.warnedHours.has(slot.hour)) {
      this.warnedHours.add(slot.hour);
      log.warn(`Hour ${slot.hour} has no activity fraction configured; treating it as 0`);
    }

    const active: ActorRecord[] = [];
    const publishers: ActorRecord[] = [];

    for (const actor of population) {
      if (actor.lifecycle !== 'active') continue;
      if (this.reachedDailyBound(actor)) continue;

      const fraction = actor.kind === 'page' ? pageFraction ?? 0 : userFraction ?? 0;
      if (!bernoulli(rng, activationProbability(fraction, actor.activityVariance))) continue;

      if (actor.kind === 'page') publishers.push(actor);
      else active.push(actor);
    }

    return { active, publishers, hourConfigured };
  }

  /**
   * Count a slot's dispatched actions against the daily bounds. Skipped
   * results are not counted; failed ones are, since they were attempted.
   */
  recordActions(results: readonly ActionResult[]): void {
    for (const result of results) {
      if (result.status === 'skipped') continue;
      this.resetCountersFor(result.day);
      this.dailyCounts.set(result.actorId, (this.dailyCounts.get(result.actorId) ?? 0) + 1);
    }
  }

  private resetCountersFor(day: number): void {
    if (this.countersDay !== day) {
      this.countersDay = day;
      this.dailyCounts.clear();
    }
  }

  private reachedDailyBound(actor: ActorRecord): boolean {
    if (actor.maxDailyActions === undefined) return false;
    return (this.dailyCounts.get(actor.id) ?? 0) >= actor.maxDailyActions;
  }
}
