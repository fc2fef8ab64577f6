/**
 * Population
 *
 * `ActorRegistry` holds every actor of the run, live or churned.
 * `PopulationManager` evolves it once per day boundary, in a fixed order:
 * follow evaluation, churn, recruitment. A failing phase is recorded in the
 * day report and the remaining phases still run.
 */

import type {
  ActionIntent,
  ActionResult,
  ActorId,
  ActorRecord,
  DayReport,
  PhaseFailure,
  SlotInfo,
} from '../types.js';
import type { GrowthRate } from '../config/schema.js';
import type { ContentService } from '../service/client.js';
import type { ActorFactory } from '../actors/factory.js';
import type { Dispatcher } from './dispatcher.js';
import type { FollowGraph } from './graph.js';
import { errorMessage } from '../errors.js';
import { bernoulli, deriveSeed, mulberry32, sampleWithoutReplacement } from '../utils/random.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Population');

// =============================================================================
// REGISTRY
// =============================================================================

export class ActorRegistry {
  private readonly actors = new Map<ActorId, ActorRecord>();

  constructor(actors: Iterable<ActorRecord> = []) {
    for (const a of actors) this.add(a);
  }

  add(actor: ActorRecord): void {
    if (this.actors.has(actor.id)) {
      throw new Error(`Actor ${actor.id} is already registered`);
    }
    this.actors.set(actor.id, actor);
  }

  get(id: ActorId): ActorRecord | undefined {
    return this.actors.get(id);
  }

  isLive(id: ActorId): boolean {
    return this.actors.get(id)?.lifecycle === 'active';
  }

  /** Live actors in registration order. */
  live(): ActorRecord[] {
    return [...this.actors.values()].filter((a) => a.lifecycle === 'active');
  }

  liveUsers(): ActorRecord[] {
    return this.live().filter((a) => a.kind === 'user');
  }

  all(): ActorRecord[] {
    return [...this.actors.values()];
  }

  get size(): number {
    return this.actors.size;
  }
}

// =============================================================================
// COUNTS
// =============================================================================

/**
 * Number of actors a growth rule yields for `base` actors. Percentages are
 * floored, with a minimum of one whenever the rate and the base are positive.
 */
export function growthCount(rate: GrowthRate, base: number): number {
  switch (rate.mode) {
    case 'none':
      return 0;
    case 'fixed':
      return rate.count;
    case 'percentage':
      if (base <= 0 || rate.rate <= 0) return 0;
      return Math.max(1, Math.floor(base * rate.rate));
  }
}

// =============================================================================
// MANAGER
// =============================================================================

export interface PopulationManagerOptions {
  seed: number;
  dailyFollowProbability: number;
  churn: GrowthRate;
  recruitment: GrowthRate;
}

export interface PopulationManagerDeps {
  registry: ActorRegistry;
  graph: FollowGraph;
  service: ContentService;
  factory: ActorFactory;
  dispatcher: Dispatcher;
}

export class PopulationManager {
  constructor(
    private readonly deps: PopulationManagerDeps,
    private readonly options: PopulationManagerOptions
  ) {}

  /**
   * Run the end-of-day phases for the day `boundary` belongs to.
   * `dailyActive` is the number of distinct actors active during that day.
   */
  async endOfDay(boundary: SlotInfo, dailyActive = 0): Promise<DayReport> {
    const { registry } = this.deps;
    const rng = mulberry32(deriveSeed(this.options.seed, 'population', boundary.day));
    const populationBefore = registry.live().length;
    const usersAtBoundary = registry.liveUsers().length;
    const phaseFailures: PhaseFailure[] = [];

    // 1. Follow evaluation
    let followEvaluations: ActionResult[] = [];
    try {
      followEvaluations = await this.evaluateFollows(boundary, rng);
      for (const r of followEvaluations) {
        if (r.status === 'failed') {
          phaseFailures.push({ phase: 'follow', actorId: r.actorId, error: r.error ?? 'unknown error' });
        }
      }
    } catch (error) {
      log.error(`Follow evaluation failed on day ${boundary.day}: ${errorMessage(error)}`);
      phaseFailures.push({ phase: 'follow', error: errorMessage(error) });
    }

    // 2. Churn
    const churned: ActorId[] = [];
    try {
      await this.churn(boundary, rng, churned, phaseFailures);
    } catch (error) {
      log.error(`Churn failed on day ${boundary.day}: ${errorMessage(error)}`);
      phaseFailures.push({ phase: 'churn', error: errorMessage(error) });
    }

    // 3. Recruitment, based on the population at the boundary
    const recruited: ActorId[] = [];
    try {
      await this.recruit(boundary, usersAtBoundary, recruited, phaseFailures);
    } catch (error) {
      log.error(`Recruitment failed on day ${boundary.day}: ${errorMessage(error)}`);
      phaseFailures.push({ phase: 'recruit', error: errorMessage(error) });
    }

    const populationAfter = registry.live().length;
    log.info(
      `Day ${boundary.day}: ${populationBefore} → ${populationAfter} actors ` +
        `(-${churned.length} churned, +${recruited.length} recruited, ${followEvaluations.length} follow evaluations)`
    );

    return {
      day: boundary.day,
      populationBefore,
      populationAfter,
      churned,
      recruited,
      followEvaluations,
      phaseFailures,
      dailyActive,
    };
  }

  private async evaluateFollows(boundary: SlotInfo, rng: () => number): Promise<ActionResult[]> {
    const p = this.options.dailyFollowProbability;
    const intents: ActionIntent[] = this.deps.registry
      .liveUsers()
      .filter(() => bernoulli(rng, p))
      .map(
        (actor): ActionIntent => ({ actorId: actor.id, slot: boundary.slot, kind: 'follow', phase: 'day-boundary' })
      );
    if (intents.length === 0) return [];
    return this.deps.dispatcher.dispatch(intents, boundary);
  }

  private async churn(
    boundary: SlotInfo,
    rng: () => number,
    churned: ActorId[],
    failures: PhaseFailure[]
  ): Promise<void> {
    const candidates = this.deps.registry.liveUsers();
    const count = Math.min(growthCount(this.options.churn, candidates.length), candidates.length);
    if (count === 0) return;

    for (const actor of sampleWithoutReplacement(rng, candidates, count)) {
      actor.lifecycle = 'churned';
      actor.churnedDay = boundary.day;
      this.deps.graph.removeActor(actor.id);
      churned.push(actor.id);
      try {
        await this.deps.service.churnActor(actor.id, boundary.slot);
      } catch (error) {
        log.warn(`Could not report churn of ${actor.id}: ${errorMessage(error)}`);
        failures.push({ phase: 'churn', actorId: actor.id, error: errorMessage(error) });
      }
    }
  }

  private async recruit(
    boundary: SlotInfo,
    base: number,
    recruited: ActorId[],
    failures: PhaseFailure[]
  ): Promise<void> {
    const count = growthCount(this.options.recruitment, base);
    const joinDay = boundary.day + 1;

    for (let i = 0; i < count; i++) {
      const actor = this.deps.factory.createUser(joinDay);
      try {
        await this.deps.service.registerActor(actor, joinDay);
      } catch (error) {
        log.warn(`Could not register recruit ${actor.id}: ${errorMessage(error)}`);
        failures.push({ phase: 'recruit', actorId: actor.id, error: errorMessage(error) });
        continue;
      }
      this.deps.registry.add(actor);
      recruited.push(actor.id);
    }
  }
}
