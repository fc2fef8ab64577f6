/**
 * Population snapshots
 *
 * A snapshot is a JSON file holding the actors, the follow graph, the id
 * counter and the next slot of a run, so a later run can continue with the
 * same population where the clock stopped.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import type { ActorRecord } from '../types.js';
import { ACTION_KINDS, createActorId, createPostId } from '../types.js';
import type { RestoredPopulation } from '../simulation/tick.js';
import type { FollowEdge } from '../simulation/graph.js';

const SNAPSHOT_VERSION = 1;

const actorId = z.string().min(1).transform(createActorId);
const postId = z.string().min(1).transform(createPostId);

const ActorSchema = z.object({
  id: actorId,
  name: z.string(),
  email: z.string(),
  kind: z.enum(['user', 'page']),
  joinedDay: z.number().int().min(0),
  lifecycle: z.enum(['active', 'churned']),
  churnedDay: z.number().int().min(0).optional(),
  profile: z.object({
    age: z.number().int().optional(),
    gender: z.string().optional(),
    leaning: z.string().optional(),
    interests: z.array(z.string()),
    toxicity: z.string().optional(),
    language: z.string().optional(),
    education: z.string().optional(),
    personality: z
      .object({
        openness: z.string(),
        conscientiousness: z.string(),
        extraversion: z.string(),
        agreeableness: z.string(),
        neuroticism: z.string(),
      })
      .optional(),
    model: z.string(),
    topic: z.string().optional(),
    feedUrl: z.string().optional(),
  }),
  activityVariance: z.number(),
  actionWeights: z.record(z.enum(ACTION_KINDS), z.number().min(0)),
  maxDailyActions: z.number().int().positive().optional(),
  requiresInference: z.boolean(),
  state: z.object({
    lastActiveSlot: z.number().int().nullable(),
    pendingMentions: z.array(postId),
    recentlySeen: z.array(postId),
    lastCastDay: z.number().int().nullable(),
    postsPublished: z.number().int().min(0),
    opinions: z.record(z.string(), z.number()),
  }),
});

const SnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  seed: z.number().int(),
  issuedIds: z.number().int().min(0),
  // Absent in snapshots written before the clock was saved
  nextSlot: z.number().int().min(0).default(0),
  actors: z.array(ActorSchema),
  edges: z.array(z.object({ follower: actorId, followee: actorId })),
});

export interface PopulationSnapshot extends RestoredPopulation {
  seed: number;
  nextSlot: number;
}

export function toSnapshot(
  seed: number,
  actors: readonly ActorRecord[],
  edges: Iterable<FollowEdge>,
  issuedIds: number,
  nextSlot: number
): PopulationSnapshot {
  return { seed, issuedIds, nextSlot, actors: [...actors], edges: [...edges] };
}

export function savePopulationSnapshot(path: string, snapshot: PopulationSnapshot): void {
  writeFileSync(path, JSON.stringify({ version: SNAPSHOT_VERSION, ...snapshot }, null, 2));
}

export function parsePopulationSnapshot(input: unknown): PopulationSnapshot {
  const parsed = SnapshotSchema.parse(input);
  const ids = new Set(parsed.actors.map((a) => a.id));
  if (ids.size !== parsed.actors.length) {
    throw new Error('Population snapshot contains duplicate actor ids');
  }
  if (parsed.issuedIds < parsed.actors.length) {
    throw new Error(`Population snapshot issuedIds (${parsed.issuedIds}) is below its actor count`);
  }
  return {
    seed: parsed.seed,
    issuedIds: parsed.issuedIds,
    nextSlot: parsed.nextSlot,
    actors: parsed.actors,
    edges: parsed.edges.filter((e) => ids.has(e.follower) && ids.has(e.followee)),
  };
}

export function loadPopulationSnapshot(path: string): PopulationSnapshot {
  return parsePopulationSnapshot(JSON.parse(readFileSync(path, 'utf-8')));
}
