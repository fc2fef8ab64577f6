/**
 * Simulation configuration
 *
 * The config file mirrors the sections of a simulation document (servers,
 * simulation, agents, pages, posts, resources, recsys) in snake_case. It is
 * validated with zod and normalised into the camelCase `SimulationConfig`
 * the rest of the code consumes. Invalid documents are fatal: the
 * simulation never starts on a `ConfigError`.
 */

import { readFileSync } from 'node:fs';
import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import { ACTION_KINDS, type ActionKind, type ActionWeights, type HourlyActivityTable } from '../types.js';
import {
  CONTENT_STRATEGIES,
  FOLLOW_STRATEGIES,
  type ContentStrategy,
  type FollowStrategy,
} from '../recsys/strategies.js';

const fraction = z.number().min(0).max(1);
const range = z
  .object({ min: z.number().int(), max: z.number().int() })
  .refine((r) => r.min <= r.max, { message: 'min must be <= max' });

const OPINION_GROUPS_DEFAULT: Record<string, [number, number]> = {
  'strongly against': [0, 0.2],
  against: [0.2, 0.4],
  neutral: [0.4, 0.6],
  'in favour': [0.6, 0.8],
  'strongly in favour': [0.8, 1],
};

const BIG_FIVE_DEFAULT = {
  oe: ['curious and open to new experiences', 'practical and conventional'],
  co: ['organised and dependable', 'easy-going and spontaneous'],
  ex: ['outgoing and energetic', 'reserved and solitary'],
  ag: ['friendly and compassionate', 'critical and challenging'],
  ne: ['sensitive and nervous', 'resilient and confident'],
};

export const RawConfigSchema = z.object({
  servers: z
    .object({
      api: z.string().url().default('http://127.0.0.1:5010/'),
      llm: z.string().url().default('http://127.0.0.1:11434/v1'),
      llm_api_key: z.string().default(''),
      llm_temperature: z.number().min(0).max(2).default(0.7),
      llm_max_tokens: z.number().int().positive().default(256),
    })
    .default({}),
  simulation: z.object({
    name: z.string().default('simulation'),
    days: z.number().int().min(0),
    slots: z.number().int().positive().default(24),
    starting_agents: z.number().int().min(0),
    seed: z.number().int().default(42),
    hourly_activity: z.record(z.string(), fraction),
    page_hourly_activity: z.record(z.string(), fraction).optional(),
    actions_likelihood: z.record(z.string(), z.number().min(0)).default({}),
    percentage_new_agents_iteration: fraction.optional(),
    new_agents_iteration: z.number().int().min(0).optional(),
    percentage_removed_agents_iteration: fraction.optional(),
    removed_agents_iteration: z.number().int().min(0).optional(),
    opinion_dynamics: z
      .object({
        epsilon: fraction.default(0.25),
        mu: fraction.default(0.5),
        theta: fraction.default(0),
        cold_start: z.enum(['neutral', 'inherited']).default('neutral'),
        opinion_groups: z.record(z.string(), z.tuple([fraction, fraction])).default(OPINION_GROUPS_DEFAULT),
      })
      .optional(),
  }),
  agents: z
    .object({
      probability_of_daily_follow: fraction.default(0),
      max_length_thread_reading: z.number().int().positive().default(5),
      // Slots of history the service looks at when reporting an actor's recent interests
      attention_window: z.number().int().positive().default(336),
      reading_from_follower_ratio: fraction.default(0.6),
      // Each actor draws its variance uniformly from [-activity_variance, activity_variance]
      activity_variance: z.number().min(0).max(1).default(0),
      age: range.default({ min: 18, max: 70 }),
      interests: z.array(z.string()).default(['news', 'sports', 'technology', 'music', 'politics']),
      n_interests: range.default({ min: 1, max: 3 }),
      political_leanings: z.array(z.string()).default(['left', 'center', 'right']),
      toxicity_levels: z.array(z.string()).default(['no', 'low']),
      languages: z.array(z.string()).default(['English']),
      education_levels: z.array(z.string()).default(['high school', 'bachelor', 'master']),
      genders: z.array(z.string()).default(['female', 'male', 'non-binary']),
      llm_agents: z.array(z.string()).min(1).default(['llama3']),
      round_actions: range.optional(),
      big_five: z
        .object({
          oe: z.array(z.string()).min(1),
          co: z.array(z.string()).min(1),
          ex: z.array(z.string()).min(1),
          ag: z.array(z.string()).min(1),
          ne: z.array(z.string()).min(1),
        })
        .default(BIG_FIVE_DEFAULT),
    })
    .default({}),
  pages: z
    .object({
      count: z.number().int().min(0).default(0),
      topics: z.array(z.string()).default(['world news']),
      actions_likelihood: z.record(z.string(), z.number().min(0)).default({ post: 1 }),
      model: z.string().optional(),
      feeds: z
        .array(
          z.object({
            name: z.string().min(1).optional(),
            topic: z.string().min(1),
            feed_url: z.string().url(),
          })
        )
        .default([]),
    })
    .default({}),
  posts: z
    .object({
      visibility_rounds: z.number().int().positive().default(36),
      feed_size: z.number().int().positive().default(10),
      emotions: z.array(z.string()).default([]),
    })
    .default({}),
  resources: z
    .object({
      parallel: z.boolean().default(true),
      cpu_workers: z.number().int().positive().optional(),
      accelerators: z.number().positive().default(1),
      heavy_unit: z.number().positive().default(0.1),
      heavy_queue_depth: z.number().int().min(0).default(256),
      action_timeout_ms: z.number().int().positive().default(60_000),
      light_retries: z.number().int().min(0).max(5).default(2),
    })
    .default({}),
  recsys: z
    .object({
      content: z.enum(CONTENT_STRATEGIES).default('reverse_chrono'),
      follow: z.enum(FOLLOW_STRATEGIES).default('preferential_attachment'),
      n_neighbors: z.number().int().positive().default(10),
      leaning_bias: z.number().min(0).default(1),
    })
    .default({}),
});

export type RawConfig = z.infer<typeof RawConfigSchema>;

/** Either a fixed count or a fraction of the population, per iteration. */
export type GrowthRate = { mode: 'none' } | { mode: 'fixed'; count: number } | { mode: 'percentage'; rate: number };

export interface PageFeed {
  name?: string;
  topic: string;
  feedUrl: string;
}

export interface OpinionDynamics {
  /** Confidence bound: opinions further apart than this do not attract */
  epsilon: number;
  /** Convergence rate toward an accepted opinion */
  mu: number;
  /** Repulsion step for opinions outside the bound; 0 disables it */
  theta: number;
  /** Opinion a reader takes on a topic it has none for */
  coldStart: 'neutral' | 'inherited';
  /** Label → [min, max) range, used to describe opinions in prompts */
  groups: Record<string, [number, number]>;
}

export interface ResourceBudget {
  parallel: boolean;
  cpuWorkers: number;
  accelerators: number;
  heavyUnit: number;
  /** floor(accelerators / heavyUnit): concurrent heavy tasks admitted */
  heavySlots: number;
  heavyQueueDepth: number;
  actionTimeoutMs: number;
  lightRetries: number;
}

export interface SimulationConfig {
  name: string;
  seed: number;
  days: number;
  slotsPerDay: number;
  startingAgents: number;
  hourlyActivity: HourlyActivityTable;
  pageHourlyActivity: HourlyActivityTable;
  actionWeights: ActionWeights;
  pageActionWeights: ActionWeights;
  recruitment: GrowthRate;
  churn: GrowthRate;
  /** Absent when opinion dynamics are off */
  opinions?: OpinionDynamics;
  servers: {
    api: string;
    llm: string;
    llmApiKey: string;
    anthropicApiKey: string;
    temperature: number;
    maxTokens: number;
  };
  agents: {
    dailyFollowProbability: number;
    maxThreadLength: number;
    attentionWindow: number;
    followerReadingRatio: number;
    activityVariance: number;
    age: { min: number; max: number };
    interests: string[];
    interestCount: { min: number; max: number };
    leanings: string[];
    toxicityLevels: string[];
    languages: string[];
    educationLevels: string[];
    genders: string[];
    models: string[];
    dailyActions?: { min: number; max: number };
    bigFive: RawConfig['agents']['big_five'];
  };
  /** With feeds configured, `count` equals `feeds.length` */
  pages: { count: number; topics: string[]; model?: string; feeds: PageFeed[] };
  posts: { visibilityRounds: number; feedSize: number; emotions: string[] };
  resources: ResourceBudget;
  recsys: {
    content: ContentStrategy;
    follow: FollowStrategy;
    neighbors: number;
    leaningBias: number;
  };
}

function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some((k) => k === value);
}

function parseActionWeights(raw: Record<string, number>, path: string, issues: string[]): ActionWeights {
  const weights: ActionWeights = {};
  for (const [key, value] of Object.entries(raw)) {
    const kind = key.toLowerCase();
    if (!isActionKind(kind)) {
      issues.push(`${path}: unknown action "${key}" (expected one of ${ACTION_KINDS.join(', ')})`);
      continue;
    }
    weights[kind] = value;
  }
  return weights;
}

function parseHourlyTable(raw: Record<string, number>, slots: number, path: string, issues: string[]): HourlyActivityTable {
  const table: Record<number, number> = {};
  for (const [key, value] of Object.entries(raw)) {
    const hour = Number(key);
    if (!Number.isInteger(hour) || hour < 0 || hour >= slots) {
      issues.push(`${path}: hour "${key}" is outside 0..${slots - 1}`);
      continue;
    }
    table[hour] = value;
  }
  return table;
}

function parseGrowthRate(
  fixed: number | undefined,
  percentage: number | undefined,
  label: string,
  issues: string[]
): GrowthRate {
  if (fixed !== undefined && percentage !== undefined && fixed > 0 && percentage > 0) {
    issues.push(`simulation: ${label} sets both a fixed count and a percentage`);
    return { mode: 'none' };
  }
  if (fixed !== undefined && fixed > 0) return { mode: 'fixed', count: fixed };
  if (percentage !== undefined && percentage > 0) return { mode: 'percentage', rate: percentage };
  return { mode: 'none' };
}

/** Number of heavy tasks that fit the accelerator budget; the epsilon absorbs float error (1/0.1). */
export function heavySlotsFor(accelerators: number, unit: number): number {
  return Math.floor(accelerators / unit + 1e-9);
}

/**
 * Validate and normalise a config document. Environment variables override
 * server endpoints and keys.
 */
export function parseConfig(input: unknown, env: NodeJS.ProcessEnv = process.env): SimulationConfig {
  const parsed = RawConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  const raw = parsed.data;
  const issues: string[] = [];
  const sim = raw.simulation;

  const hourlyActivity = parseHourlyTable(sim.hourly_activity, sim.slots, 'simulation.hourly_activity', issues);
  if (Object.keys(hourlyActivity).length === 0 && Object.keys(sim.hourly_activity).length === 0) {
    issues.push('simulation.hourly_activity: table is empty');
  }
  const pageHourlyActivity = sim.page_hourly_activity
    ? parseHourlyTable(sim.page_hourly_activity, sim.slots, 'simulation.page_hourly_activity', issues)
    : hourlyActivity;

  const actionWeights = parseActionWeights(sim.actions_likelihood, 'simulation.actions_likelihood', issues);
  const pageActionWeights = parseActionWeights(raw.pages.actions_likelihood, 'pages.actions_likelihood', issues);

  const recruitment = parseGrowthRate(
    sim.new_agents_iteration,
    sim.percentage_new_agents_iteration,
    'recruitment',
    issues
  );
  const churn = parseGrowthRate(
    sim.removed_agents_iteration,
    sim.percentage_removed_agents_iteration,
    'churn',
    issues
  );

  const res = raw.resources;
  if (res.heavy_unit > res.accelerators) {
    issues.push(`resources.heavy_unit (${res.heavy_unit}) exceeds resources.accelerators (${res.accelerators})`);
  }

  const pages = raw.pages;
  if (pages.feeds.length > 0 && pages.count > 0 && pages.count !== pages.feeds.length) {
    issues.push(`pages: count (${pages.count}) disagrees with the ${pages.feeds.length} configured feeds`);
  }

  const dynamics = sim.opinion_dynamics;
  if (dynamics) {
    for (const [label, [min, max]] of Object.entries(dynamics.opinion_groups)) {
      if (min > max) issues.push(`simulation.opinion_dynamics.opinion_groups.${label}: min must be <= max`);
    }
  }

  if (issues.length > 0) throw new ConfigError(issues);

  return {
    name: sim.name,
    seed: sim.seed,
    days: sim.days,
    slotsPerDay: sim.slots,
    startingAgents: sim.starting_agents,
    hourlyActivity,
    pageHourlyActivity,
    actionWeights,
    pageActionWeights,
    recruitment,
    churn,
    opinions: dynamics
      ? {
          epsilon: dynamics.epsilon,
          mu: dynamics.mu,
          theta: dynamics.theta,
          coldStart: dynamics.cold_start,
          groups: dynamics.opinion_groups,
        }
      : undefined,
    servers: {
      api: env.FEEDSIM_API_URL ?? raw.servers.api,
      llm: env.FEEDSIM_LLM_URL ?? raw.servers.llm,
      llmApiKey: env.LLM_API_KEY ?? raw.servers.llm_api_key,
      anthropicApiKey: env.ANTHROPIC_API_KEY ?? '',
      temperature: raw.servers.llm_temperature,
      maxTokens: raw.servers.llm_max_tokens,
    },
    agents: {
      dailyFollowProbability: raw.agents.probability_of_daily_follow,
      maxThreadLength: raw.agents.max_length_thread_reading,
      attentionWindow: raw.agents.attention_window,
      followerReadingRatio: raw.agents.reading_from_follower_ratio,
      activityVariance: raw.agents.activity_variance,
      age: raw.agents.age,
      interests: raw.agents.interests,
      interestCount: raw.agents.n_interests,
      leanings: raw.agents.political_leanings,
      toxicityLevels: raw.agents.toxicity_levels,
      languages: raw.agents.languages,
      educationLevels: raw.agents.education_levels,
      genders: raw.agents.genders,
      models: raw.agents.llm_agents,
      dailyActions: raw.agents.round_actions,
      bigFive: raw.agents.big_five,
    },
    pages: {
      count: pages.feeds.length > 0 ? pages.feeds.length : pages.count,
      topics: pages.feeds.length > 0 ? pages.feeds.map((f) => f.topic) : pages.topics,
      model: pages.model,
      feeds: pages.feeds.map((f) => ({ name: f.name, topic: f.topic, feedUrl: f.feed_url })),
    },
    posts: {
      visibilityRounds: raw.posts.visibility_rounds,
      feedSize: raw.posts.feed_size,
      emotions: raw.posts.emotions,
    },
    resources: {
      parallel: res.parallel,
      cpuWorkers: res.cpu_workers ?? availableParallelism(),
      accelerators: res.accelerators,
      heavyUnit: res.heavy_unit,
      heavySlots: heavySlotsFor(res.accelerators, res.heavy_unit),
      heavyQueueDepth: res.heavy_queue_depth,
      actionTimeoutMs: res.action_timeout_ms,
      lightRetries: res.light_retries,
    },
    recsys: {
      content: raw.recsys.content,
      follow: raw.recsys.follow,
      neighbors: raw.recsys.n_neighbors,
      leaningBias: raw.recsys.leaning_bias,
    },
  };
}

export function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): SimulationConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError([`cannot read ${path}: ${errorMessage(error)}`]);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError([`${path} is not valid JSON: ${errorMessage(error)}`]);
  }
  return parseConfig(json, env);
}
