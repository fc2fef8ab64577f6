/**
 * Action catalogue and selection
 *
 * `ACTION_TABLE` is the single place that says what each action kind costs,
 * whether it may be retried, and when an actor may take it.
 */

import type {
  ActionIntent,
  ActionKind,
  ActionWeights,
  ActorRecord,
  ResourceClass,
  SlotInfo,
} from '../types.js';
import { ACTION_KINDS } from '../types.js';
import { weightedChoice, type Rng } from '../utils/random.js';

export interface ActionSpec {
  resource: ResourceClass;
  /** Safe to repeat after a transient failure */
  idempotent: boolean;
  isEligible: (actor: ActorRecord, slot: SlotInfo) => boolean;
}

const always = (): boolean => true;

export const ACTION_TABLE: Record<ActionKind, ActionSpec> = {
  post: { resource: 'heavy', idempotent: false, isEligible: always },
  comment: { resource: 'heavy', idempotent: false, isEligible: always },
  share: { resource: 'heavy', idempotent: false, isEligible: always },
  react: { resource: 'heavy', idempotent: false, isEligible: always },
  reply: {
    resource: 'heavy',
    idempotent: false,
    isEligible: (actor) => actor.state.pendingMentions.length > 0,
  },
  cast: {
    resource: 'heavy',
    idempotent: false,
    isEligible: (actor, slot) => actor.state.lastCastDay !== slot.day,
  },
  read: { resource: 'light', idempotent: true, isEligible: always },
  search: { resource: 'light', idempotent: true, isEligible: always },
  follow: { resource: 'light', idempotent: true, isEligible: always },
};

/** Pages only ever publish. */
export const PAGE_ACTIONS: readonly ActionKind[] = ['post', 'share'];

export function resourceClassOf(kind: ActionKind): ResourceClass {
  return ACTION_TABLE[kind].resource;
}

/** Whether any action the weights can select runs on the heavy pool. */
export function requiresInference(weights: ActionWeights): boolean {
  return ACTION_KINDS.some((kind) => (weights[kind] ?? 0) > 0 && ACTION_TABLE[kind].resource === 'heavy');
}

export function eligibleKinds(actor: ActorRecord, slot: SlotInfo): ActionKind[] {
  const candidates: readonly ActionKind[] = actor.kind === 'page' ? PAGE_ACTIONS : ACTION_KINDS;
  return candidates.filter((kind) => ACTION_TABLE[kind].isEligible(actor, slot));
}

/**
 * Pick one action for an active actor, or null when nothing is eligible.
 * Weights are renormalised over the eligible kinds; a kind with a missing or
 * zero weight is never selected.
 */
export function selectAction(actor: ActorRecord, slot: SlotInfo, rng: Rng): ActionIntent | null {
  const entries = eligibleKinds(actor, slot).map(
    (kind): readonly [ActionKind, number] => [kind, actor.actionWeights[kind] ?? 0]
  );
  const kind = weightedChoice(rng, entries);
  if (kind === undefined) return null;
  return { actorId: actor.id, slot: slot.slot, kind };
}
