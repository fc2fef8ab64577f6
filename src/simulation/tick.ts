/**
 * Simulation Tick Loop
 *
 * One tick per slot: snapshot the live population, sample who is active,
 * select one action per active actor, dispatch the batch and wait for it to
 * drain, then advance the clock. After the last slot of each day the
 * population manager runs the end-of-day phases.
 *
 * A restored population carries the slot its previous run stopped at, and
 * the clock continues from there for `days` more days.
 */

import type {
  ActionIntent,
  ActorId,
  ActorRecord,
  DayReport,
  RunSummary,
  SlotInfo,
  SlotReport,
} from '../types.js';
import type { SimulationConfig } from '../config/schema.js';
import type { ContentService } from '../service/client.js';
import type { LanguageBackend } from '../models/router.js';
import { ServiceRecommenderGateway, type RecommenderGateway } from '../recsys/gateway.js';
import { createPools, type PoolSet } from '../queue/pool.js';
import { ActorFactory } from '../actors/factory.js';
import { performAction, type BehaviorSettings } from '../actors/behaviors.js';
import { RssFeedReader, type NewsSource } from '../news/feeds.js';
import { SimulationClock } from './clock.js';
import { ActivitySampler } from './activity.js';
import { selectAction } from './actions.js';
import { Dispatcher, type IntentHandler } from './dispatcher.js';
import { FollowGraph, type FollowEdge } from './graph.js';
import { ActorRegistry, PopulationManager } from './population.js';
import { SummaryBuilder } from './summary.js';
import { frozenOpinions, type OpinionView } from './opinions.js';
import { deriveSeed, mulberry32 } from '../utils/random.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Simulation');

// =============================================================================
// TYPES
// =============================================================================

export interface SimulationDeps {
  config: SimulationConfig;
  service: ContentService;
  backend: LanguageBackend;
  /** Defaults to the service-backed gateway using the configured strategies */
  recommender?: RecommenderGateway;
  /** Defaults to pools sized from `config.resources` */
  pools?: PoolSet;
  /** Defaults to an RSS reader over the global fetch */
  news?: NewsSource;
}

export interface RestoredPopulation {
  actors: ActorRecord[];
  edges: FollowEdge[];
  /** Ids already handed out, so new ids continue after them */
  issuedIds: number;
  /** First slot to run; defaults to 0 */
  nextSlot?: number;
}

export interface SimulationOptions {
  /** Start from a saved population instead of generating one */
  population?: RestoredPopulation;
  /** Wipe the service before starting and (re-)register every actor */
  resetService?: boolean;
  onSlot?: (report: SlotReport) => void | Promise<void>;
  onDay?: (report: DayReport) => void | Promise<void>;
}

export interface SimulationResult {
  slots: SlotReport[];
  days: DayReport[];
  registry: ActorRegistry;
  graph: FollowGraph;
  summary: RunSummary;
  issuedIds: number;
  /** Slot a continuing run starts from */
  nextSlot: number;
}

// =============================================================================
// SETUP
// =============================================================================

async function bootstrapPopulation(
  config: SimulationConfig,
  factory: ActorFactory,
  service: ContentService
): Promise<ActorRecord[]> {
  const actors: ActorRecord[] = [];
  for (let i = 0; i < config.startingAgents; i++) {
    actors.push(factory.createUser(0));
  }
  if (config.pages.feeds.length > 0) {
    for (const feed of config.pages.feeds) actors.push(factory.createPage(0, feed.topic, feed));
  } else {
    for (let i = 0; i < config.pages.count; i++) {
      const topic = config.pages.topics[i % config.pages.topics.length];
      actors.push(factory.createPage(0, topic));
    }
  }
  for (const actor of actors) {
    await service.registerActor(actor, 0);
  }
  log.info(`Registered ${config.startingAgents} users and ${config.pages.count} pages`);
  return actors;
}

// =============================================================================
// MAIN SIMULATION LOOP
// =============================================================================

/**
 * Run the configured number of days and return every slot and day report.
 */
export async function runSimulation(deps: SimulationDeps, options: SimulationOptions = {}): Promise<SimulationResult> {
  const { config, service, backend } = deps;
  const seed = config.seed;

  if (options.resetService) {
    await service.reset();
  }

  const factory = new ActorFactory({
    seed,
    agents: config.agents,
    pages: config.pages,
    actionWeights: config.actionWeights,
    pageActionWeights: config.pageActionWeights,
    opinions: config.opinions,
    startCounter: options.population?.issuedIds,
  });

  let actors: ActorRecord[];
  if (options.population) {
    actors = options.population.actors;
    if (options.resetService) {
      for (const actor of actors.filter((a) => a.lifecycle === 'active')) {
        await service.registerActor(actor, actor.joinedDay);
      }
    }
    log.info(`Restored ${actors.length} actors and ${options.population.edges.length} follow edges`);
  } else {
    actors = await bootstrapPopulation(config, factory, service);
  }

  const registry = new ActorRegistry(actors);
  const graph = new FollowGraph(options.population?.edges ?? []);
  const recommender =
    deps.recommender ??
    new ServiceRecommenderGateway(
      service,
      {
        content: config.recsys.content,
        follow: config.recsys.follow,
        feedSize: config.posts.feedSize,
        visibilityRounds: config.posts.visibilityRounds,
        neighbors: config.recsys.neighbors,
        leaningBias: config.recsys.leaningBias,
        followersRatio: config.agents.followerReadingRatio,
      },
      (id) => registry.isLive(id)
    );

  const settings: BehaviorSettings = {
    maxThreadLength: config.agents.maxThreadLength,
    emotions: config.posts.emotions,
    attentionWindow: config.agents.attentionWindow,
  };
  const news = deps.news ?? new RssFeedReader();
  // Authors' opinions as they stood when the current slot started
  let opinions: OpinionView | undefined;

  const handler: IntentHandler = async (intent, exec) => {
    const actor = registry.get(intent.actorId);
    if (!actor) throw new Error(`Unknown actor ${intent.actorId}`);
    // End-of-day follows get their own stream, apart from the slot's action
    const atBoundary = intent.phase === 'day-boundary';
    if (!atBoundary) actor.state.lastActiveSlot = exec.slot.slot;
    const stream = atBoundary
      ? deriveSeed(seed, 'follow', exec.slot.day, intent.actorId)
      : deriveSeed(seed, 'action', intent.slot, intent.actorId);
    return performAction(intent.kind, actor, {
      slot: exec.slot,
      signal: exec.signal,
      rng: mulberry32(stream),
      service,
      recommender,
      backend,
      graph,
      news,
      opinions,
      settings,
    });
  };

  const res = config.resources;
  const dispatcher = new Dispatcher(
    {
      pools: deps.pools ?? createPools({ parallel: res.parallel, cpuWorkers: res.cpuWorkers, heavySlots: res.heavySlots }),
      heavySlots: res.heavySlots,
      heavyQueueDepth: res.heavyQueueDepth,
      actionTimeoutMs: res.actionTimeoutMs,
      lightRetries: res.lightRetries,
    },
    handler
  );

  const manager = new PopulationManager(
    { registry, graph, service, factory, dispatcher },
    {
      seed,
      dailyFollowProbability: config.agents.dailyFollowProbability,
      churn: config.churn,
      recruitment: config.recruitment,
    }
  );

  const sampler = new ActivitySampler({
    hourlyActivity: config.hourlyActivity,
    pageHourlyActivity: config.pageHourlyActivity,
  });

  const startSlot = options.population?.nextSlot ?? 0;
  const startDay = Math.floor(startSlot / config.slotsPerDay);
  const clock = new SimulationClock(config.slotsPerDay, startDay + config.days, startSlot);
  let nextSlot = startSlot;
  const slots: SlotReport[] = [];
  const days: DayReport[] = [];
  const summary = new SummaryBuilder();
  const activeToday = new Set<ActorId>();

  log.info(
    `Starting "${config.name}" at day ${startDay}: ${config.days} day(s) × ${config.slotsPerDay} slots, ` +
      `${res.parallel ? `${res.cpuWorkers} light workers, ${res.heavySlots} heavy slots` : 'sequential'}`
  );

  if (clock.isTerminal()) {
    return { slots, days, registry, graph, summary: summary.build(), issuedIds: factory.issued, nextSlot };
  }

  do {
    const slot = clock.current();
    const report = await runSlot(slot);
    nextSlot = slot.slot + 1;
    slots.push(report);
    summary.addSlot(report);
    await options.onSlot?.(report);

    if (clock.isLastSlotOfDay()) {
      const dayReport = await manager.endOfDay(slot, activeToday.size);
      activeToday.clear();
      days.push(dayReport);
      summary.addDay(dayReport);
      await options.onDay?.(dayReport);
    }
  } while (clock.advance());

  return { slots, days, registry, graph, summary: summary.build(), issuedIds: factory.issued, nextSlot };

  async function runSlot(slot: SlotInfo): Promise<SlotReport> {
    const started = Date.now();
    const live = registry.live();
    opinions = config.opinions ? frozenOpinions(live, config.opinions) : undefined;
    const sample = sampler.sample(live, slot, mulberry32(deriveSeed(seed, 'activity', slot.slot)));

    const intents: ActionIntent[] = [];
    let noOps = 0;
    for (const actor of [...sample.active, ...sample.publishers]) {
      activeToday.add(actor.id);
      const intent = selectAction(actor, slot, mulberry32(deriveSeed(seed, 'select', slot.slot, actor.id)));
      if (intent) intents.push(intent);
      else noOps++;
    }

    const results = await dispatcher.dispatch(intents, slot);
    sampler.recordActions(results);
    const report: SlotReport = {
      slot,
      livePopulation: live.length,
      activeActors: sample.active.length,
      publishers: sample.publishers.length,
      noOps,
      results,
      durationMs: Date.now() - started,
    };

    log.debug(
      `Day ${slot.day} hour ${slot.hour}: ${report.activeActors}/${live.length} active, ` +
        `${intents.length} intents, ${noOps} no-ops`
    );
    return report;
  }
}
