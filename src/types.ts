/**
 * FeedSim Core Types
 *
 * Foundational types shared by the orchestration core, the actor behaviours
 * and the collaborator clients.
 */

// ============================================================================
// IDENTIFIERS (branded types for type safety)
// ============================================================================

export type ActorId = string & { readonly __brand: 'ActorId' };
export type PostId = string & { readonly __brand: 'PostId' };
export type RunId = string & { readonly __brand: 'RunId' };

// ID factories
export const createActorId = (id: string): ActorId => id as ActorId;
export const createPostId = (id: string): PostId => id as PostId;
export const createRunId = (id: string): RunId => id as RunId;

// ============================================================================
// TIME
// ============================================================================

export interface SlotInfo {
  /** Monotonic slot index since the start of the simulation */
  slot: number;
  day: number;
  /** Slot within the day, 0..slotsPerDay-1 */
  hour: number;
}

/** Hour-of-day → expected fraction of the live population active that hour. */
export type HourlyActivityTable = Readonly<Record<number, number>>;

// ============================================================================
// ACTIONS
// ============================================================================

export const ACTION_KINDS = [
  'post',
  'comment',
  'read',
  'share',
  'reply',
  'search',
  'follow',
  'cast',
  'react',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type ResourceClass = 'light' | 'heavy';

/** Action kind → weight; weights need not sum to 1. */
export type ActionWeights = Partial<Record<ActionKind, number>>;

/**
 * When an action runs: inside an hour slot, or in the end-of-day phases that
 * follow the day's last slot.
 */
export type ActionPhase = 'slot' | 'day-boundary';

export interface ActionIntent {
  actorId: ActorId;
  slot: number;
  kind: ActionKind;
  /** Defaults to 'slot' */
  phase?: ActionPhase;
  /** Post or actor the action is aimed at, when known ahead of execution */
  targetRef?: string;
}

export type ActionStatus = 'succeeded' | 'failed' | 'skipped';

export interface ActionResult {
  actorId: ActorId;
  kind: ActionKind;
  slot: number;
  day: number;
  hour: number;
  phase: ActionPhase;
  resource: ResourceClass;
  status: ActionStatus;
  error?: string;
  durationMs: number;
  attempts: number;
  /** Short description of what the action produced (post id, followed actor, ...) */
  detail?: string;
}

// ============================================================================
// ACTORS
// ============================================================================

export type ActorKind = 'user' | 'page';
export type LifecycleState = 'active' | 'churned';

export interface BigFive {
  openness: string;
  conscientiousness: string;
  extraversion: string;
  agreeableness: string;
  neuroticism: string;
}

export interface ActorProfile {
  age?: number;
  gender?: string;
  leaning?: string;
  interests: string[];
  toxicity?: string;
  language?: string;
  education?: string;
  personality?: BigFive;
  /** Model the actor's language work is routed to */
  model: string;
  /** Pages only: the topic or outlet the page publishes about */
  topic?: string;
  /** Pages only: RSS feed the page publishes articles from */
  feedUrl?: string;
}

/**
 * Mutable per-actor fields. Written only while that actor's own action executes;
 * the selector guarantees at most one action per actor per slot.
 */
export interface ActorState {
  lastActiveSlot: number | null;
  pendingMentions: PostId[];
  recentlySeen: PostId[];
  lastCastDay: number | null;
  postsPublished: number;
  /** Topic → opinion in [0, 1]; only maintained when opinion dynamics are configured */
  opinions: Record<string, number>;
}

export interface ActorRecord {
  readonly id: ActorId;
  readonly name: string;
  readonly email: string;
  readonly kind: ActorKind;
  readonly joinedDay: number;
  lifecycle: LifecycleState;
  churnedDay?: number;
  profile: ActorProfile;
  /** Multiplier offset on the hourly fraction: p = fraction × (1 + variance) */
  activityVariance: number;
  actionWeights: ActionWeights;
  /** Upper bound on actions per day; undefined means unbounded */
  maxDailyActions?: number;
  /** True when the actor's enabled action set contains heavy actions */
  requiresInference: boolean;
  state: ActorState;
}

// ============================================================================
// CONTENT
// ============================================================================

export interface PostRef {
  id: PostId;
  authorId: ActorId;
  text: string;
  isArticle?: boolean;
  topics?: string[];
}

export interface FollowCandidate {
  actorId: ActorId;
  score: number;
}

export type Reaction = 'like' | 'dislike';

// ============================================================================
// REPORTS
// ============================================================================

export interface SlotReport {
  slot: SlotInfo;
  livePopulation: number;
  activeActors: number;
  publishers: number;
  noOps: number;
  results: ActionResult[];
  durationMs: number;
}

export interface PhaseFailure {
  phase: 'follow' | 'churn' | 'recruit';
  actorId?: ActorId;
  error: string;
}

export interface DayReport {
  day: number;
  populationBefore: number;
  populationAfter: number;
  churned: ActorId[];
  recruited: ActorId[];
  followEvaluations: ActionResult[];
  phaseFailures: PhaseFailure[];
  dailyActive: number;
}

export interface ActionCounts {
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface RunSummary {
  days: number;
  slots: number;
  totals: ActionCounts;
  byKind: Record<ActionKind, ActionCounts>;
  byDay: Array<{ day: number; counts: ActionCounts; byKind: Record<ActionKind, ActionCounts> }>;
  population: Array<{ day: number; before: number; churned: number; recruited: number; after: number }>;
}
