/**
 * Actor factory
 *
 * Builds user and page records from the configured attribute pools. All draws
 * come from a stream seeded by the run seed, and ids are UUID v5 over
 * (seed, counter), so the same seed produces the same population. The
 * counter only grows: ids are never reused within a run.
 */

import { readFileSync } from 'node:fs';
import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import type { ActionWeights, ActorRecord, ActorState, BigFive } from '../types.js';
import { createActorId } from '../types.js';
import type { OpinionDynamics, PageFeed, SimulationConfig } from '../config/schema.js';
import { requiresInference } from '../simulation/actions.js';
import { seedOpinions } from '../simulation/opinions.js';
import { deriveSeed, mulberry32, pick, randomInt, sampleWithoutReplacement, type Rng } from '../utils/random.js';

// UUID v5 namespace for actor ids
const ACTOR_NAMESPACE = '6f1c2a8e-3d4b-5e6f-8a9b-0c1d2e3f4a5b';

const NamesSchema = z.object({
  female: z.array(z.string()).min(1),
  male: z.array(z.string()).min(1),
  neutral: z.array(z.string()).min(1),
  last: z.array(z.string()).min(1),
  domains: z.array(z.string()).min(1),
});

export type NamePools = z.infer<typeof NamesSchema>;

let cachedNames: NamePools | null = null;

export function loadNamePools(): NamePools {
  if (!cachedNames) {
    const path = new URL('../../data/names.json', import.meta.url);
    cachedNames = NamesSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  }
  return cachedNames;
}

export function initialState(): ActorState {
  return {
    lastActiveSlot: null,
    pendingMentions: [],
    recentlySeen: [],
    lastCastDay: null,
    postsPublished: 0,
    opinions: {},
  };
}

export interface ActorFactoryOptions {
  seed: number;
  agents: SimulationConfig['agents'];
  pages: SimulationConfig['pages'];
  actionWeights: ActionWeights;
  pageActionWeights: ActionWeights;
  /** When set, every actor starts with a random opinion on each of its interests */
  opinions?: OpinionDynamics;
  /** Continue numbering after a restored population */
  startCounter?: number;
  names?: NamePools;
}

export class ActorFactory {
  private counter: number;
  private readonly rng: Rng;
  private readonly names: NamePools;

  constructor(private readonly options: ActorFactoryOptions) {
    this.counter = options.startCounter ?? 0;
    this.rng = mulberry32(deriveSeed(options.seed, 'actors', this.counter));
    this.names = options.names ?? loadNamePools();
  }

  /** Number of ids handed out so far. */
  get issued(): number {
    return this.counter;
  }

  createUser(day: number): ActorRecord {
    const agents = this.options.agents;
    const rng = this.rng;
    const gender = pick(rng, agents.genders) ?? 'unspecified';
    const firstPool =
      gender === 'female' ? this.names.female : gender === 'male' ? this.names.male : this.names.neutral;
    const first = pick(rng, firstPool) ?? 'Anon';
    const last = pick(rng, this.names.last) ?? 'User';
    const interestCount = randomInt(rng, agents.interestCount.min, agents.interestCount.max);

    const personality: BigFive = {
      openness: pick(rng, agents.bigFive.oe) ?? '',
      conscientiousness: pick(rng, agents.bigFive.co) ?? '',
      extraversion: pick(rng, agents.bigFive.ex) ?? '',
      agreeableness: pick(rng, agents.bigFive.ag) ?? '',
      neuroticism: pick(rng, agents.bigFive.ne) ?? '',
    };

    return this.build({
      kind: 'user',
      name: `${first}${last}`,
      day,
      weights: this.options.actionWeights,
      profile: {
        age: randomInt(rng, agents.age.min, agents.age.max),
        gender,
        leaning: pick(rng, agents.leanings),
        interests: sampleWithoutReplacement(rng, agents.interests, interestCount),
        toxicity: pick(rng, agents.toxicityLevels),
        language: pick(rng, agents.languages),
        education: pick(rng, agents.educationLevels),
        personality,
        model: pick(rng, agents.models) ?? 'llama3',
      },
    });
  }

  /** A page on `topic`, or on its feed's topic when given a feed. */
  createPage(day: number, topic?: string, feed?: PageFeed): ActorRecord {
    const rng = this.rng;
    const chosen = feed?.topic ?? topic ?? pick(rng, this.options.pages.topics) ?? 'news';
    const name = chosen
      .split(/\s+/)
      .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
      .join('');
    return this.build({
      kind: 'page',
      name: feed?.name ?? `${name}Daily`,
      day,
      weights: this.options.pageActionWeights,
      profile: {
        interests: [chosen],
        topic: chosen,
        feedUrl: feed?.feedUrl,
        language: pick(rng, this.options.agents.languages),
        model: this.options.pages.model ?? pick(rng, this.options.agents.models) ?? 'llama3',
      },
    });
  }

  private build(input: {
    kind: ActorRecord['kind'];
    name: string;
    day: number;
    weights: ActionWeights;
    profile: ActorRecord['profile'];
  }): ActorRecord {
    const index = this.counter++;
    const id = createActorId(uuidv5(`${this.options.seed}:${index}`, ACTOR_NAMESPACE));
    const spread = this.options.agents.activityVariance;
    const bound = this.options.agents.dailyActions;
    const domain = pick(this.rng, this.names.domains) ?? 'example.com';
    const activityVariance = spread > 0 ? (this.rng() * 2 - 1) * spread : 0;
    const maxDailyActions = bound ? randomInt(this.rng, bound.min, bound.max) : undefined;
    const state = initialState();
    if (this.options.opinions) {
      state.opinions = seedOpinions(input.profile.interests, this.rng);
    }

    return {
      id,
      name: input.name,
      email: `${input.name.toLowerCase()}.${index}@${domain}`,
      kind: input.kind,
      joinedDay: input.day,
      lifecycle: 'active',
      profile: input.profile,
      activityVariance,
      actionWeights: { ...input.weights },
      maxDailyActions,
      requiresInference: requiresInference(input.weights),
      state,
    };
  }
}
