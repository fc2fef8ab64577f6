/**
 * Opinion dynamics
 *
 * Bounded-confidence updates: a reader moves toward an author's opinion on a
 * topic when the two are within `epsilon`, and (with `theta` > 0) away from
 * it otherwise. Opinions are numbers in [0, 1].
 *
 * Authors' opinions are read from a copy taken at the start of the slot, so
 * the result of a slot does not depend on the order its actions finish in.
 */

import type { ActorId, ActorRecord, PostRef } from '../types.js';
import type { OpinionDynamics } from '../config/schema.js';
import { clamp01, type Rng } from '../utils/random.js';

export interface OpinionView {
  dynamics: OpinionDynamics;
  opinionOf(actorId: ActorId, topic: string): number | undefined;
}

export function boundedConfidence(
  x: number,
  y: number,
  params: Pick<OpinionDynamics, 'epsilon' | 'mu' | 'theta'>
): number {
  const distance = Math.abs(y - x);
  if (distance > params.epsilon) {
    if (params.theta === 0) return x;
    return clamp01(y > x ? x - params.theta : x + params.theta);
  }
  return clamp01(x + params.mu * (y - x));
}

/** Label of the first group whose [min, max) range holds `value`; a max of 1 is inclusive. */
export function opinionGroup(value: number, groups: OpinionDynamics['groups']): string | undefined {
  for (const [label, [min, max]] of Object.entries(groups)) {
    if (value >= min && (value < max || (max === 1 && value === 1))) return label;
  }
  return undefined;
}

export function describeOpinions(opinions: Readonly<Record<string, number>>, groups: OpinionDynamics['groups']): string {
  const parts: string[] = [];
  for (const [topic, value] of Object.entries(opinions)) {
    const label = opinionGroup(value, groups);
    if (label) parts.push(`${topic}: ${label}`);
  }
  return parts.length > 0 ? `Your opinions are: ${parts.join(', ')}.` : '';
}

/** One uniform draw per interest, in interest order. */
export function seedOpinions(interests: readonly string[], rng: Rng): Record<string, number> {
  const opinions: Record<string, number> = {};
  for (const topic of interests) opinions[topic] = rng();
  return opinions;
}

export function frozenOpinions(actors: readonly ActorRecord[], dynamics: OpinionDynamics): OpinionView {
  const table = new Map<ActorId, Readonly<Record<string, number>>>(
    actors.map((a) => [a.id, { ...a.state.opinions }])
  );
  return {
    dynamics,
    opinionOf: (actorId, topic) => {
      const opinions = table.get(actorId);
      return opinions && topic in opinions ? opinions[topic] : undefined;
    },
  };
}

/**
 * Update `reader`'s opinions from the posts it has just read. Posts by the
 * reader, posts without topics and authors with no opinion on a topic leave
 * it unchanged. Returns the number of topics updated.
 */
export function adoptOpinions(reader: ActorRecord, posts: readonly PostRef[], view: OpinionView): number {
  const { dynamics } = view;
  const opinions = reader.state.opinions;
  let updated = 0;
  for (const post of posts) {
    if (post.authorId === reader.id) continue;
    for (const topic of post.topics ?? []) {
      const theirs = view.opinionOf(post.authorId, topic);
      if (theirs === undefined) continue;
      const mine = topic in opinions ? opinions[topic] : dynamics.coldStart === 'inherited' ? theirs : 0.5;
      opinions[topic] = boundedConfidence(mine, theirs, dynamics);
      updated++;
    }
  }
  return updated;
}
