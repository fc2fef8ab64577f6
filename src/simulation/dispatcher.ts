/**
 * Dispatcher
 *
 * Executes one slot's batch of intents. Light intents go to the light pool,
 * heavy intents to the heavy pool; both pools run at the same time. Heavy
 * admission is decided up front from batch order and the budget, so a
 * sequential run skips exactly the intents a parallel run skips.
 *
 * The dispatcher never throws for a failed action. Every intent comes back
 * as an ActionResult, in batch order.
 */

import type { ActionIntent, ActionKind, ActionResult, ActorId, SlotInfo } from '../types.js';
import { ActionTimeoutError, errorMessage, isTransient } from '../errors.js';
import type { Executor, PoolSet } from '../queue/pool.js';
import { ACTION_TABLE } from './actions.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Dispatcher');

export interface ExecutionContext {
  slot: SlotInfo;
  /** Fires when the action timed out; handlers pass it to their I/O */
  signal: AbortSignal;
  /** 1-based */
  attempt: number;
}

/** What an action reports back on success, e.g. the id of a created post. */
export interface ActionOutcome {
  detail?: string;
}

export type IntentHandler = (intent: ActionIntent, context: ExecutionContext) => Promise<ActionOutcome>;

export interface DispatcherOptions {
  pools: PoolSet;
  heavySlots: number;
  /** Heavy intents allowed to wait beyond the running slots */
  heavyQueueDepth: number;
  actionTimeoutMs: number;
  lightRetries: number;
}

/**
 * Reject after `ms`, aborting `controller` so the underlying call can stop.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string, controller?: AbortController): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const id = setTimeout(() => {
      const error = new ActionTimeoutError(label, ms);
      controller?.abort(error);
      reject(error);
    }, ms);
    promise.then(
      (v) => {
        clearTimeout(id);
        resolve(v);
      },
      (e: unknown) => {
        clearTimeout(id);
        reject(e);
      }
    );
  });
}

export function intentLabel(intent: ActionIntent): string {
  return `${intent.kind} by ${intent.actorId} @${intent.slot}`;
}

export class Dispatcher {
  constructor(
    private readonly options: DispatcherOptions,
    private readonly handler: IntentHandler
  ) {}

  get pools(): PoolSet {
    return this.options.pools;
  }

  /**
   * Split a batch into admitted intents and heavy intents over budget.
   * Pure function of batch order and the budget.
   */
  admit(batch: readonly ActionIntent[]): { admitted: Set<number>; skipped: Set<number> } {
    const limit = this.options.heavySlots + this.options.heavyQueueDepth;
    const admitted = new Set<number>();
    const skipped = new Set<number>();
    let heavySeen = 0;

    batch.forEach((intent, index) => {
      if (ACTION_TABLE[intent.kind].resource === 'heavy') {
        heavySeen++;
        if (heavySeen > limit) {
          skipped.add(index);
          return;
        }
      }
      admitted.add(index);
    });
    return { admitted, skipped };
  }

  async dispatch(batch: readonly ActionIntent[], slot: SlotInfo): Promise<ActionResult[]> {
    assertOneIntentPerActor(batch);

    const { skipped } = this.admit(batch);
    if (skipped.size > 0) {
      log.warn(`Slot ${slot.slot}: heavy budget exceeded, skipping ${skipped.size} intent(s)`);
    }

    const pending = batch.map((intent, index): Promise<ActionResult> => {
      if (skipped.has(index)) {
        return Promise.resolve(skippedResult(intent, slot, 'heavy queue full'));
      }
      const pool: Executor =
        ACTION_TABLE[intent.kind].resource === 'heavy' ? this.options.pools.heavy : this.options.pools.light;
      return pool.submit(intentLabel(intent), () => this.instrument(intent, slot));
    });

    const results = await Promise.all(pending);
    const failed = results.filter((r) => r.status === 'failed').length;
    log.debug(`Slot ${slot.slot} drained`, { intents: batch.length, failed, skipped: skipped.size });
    return results;
  }

  /**
   * Run one intent with timeout and retries and describe the outcome.
   * Never rejects.
   */
  async instrument(intent: ActionIntent, slot: SlotInfo): Promise<ActionResult> {
    const entry = ACTION_TABLE[intent.kind];
    const maxAttempts = entry.resource === 'light' && entry.idempotent ? 1 + this.options.lightRetries : 1;
    const label = intentLabel(intent);
    const started = Date.now();
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const controller = new AbortController();
      try {
        const outcome = await withTimeout(
          this.handler(intent, { slot, signal: controller.signal, attempt }),
          this.options.actionTimeoutMs,
          label,
          controller
        );
        return {
          ...baseResult(intent, slot),
          status: 'succeeded',
          durationMs: Date.now() - started,
          attempts: attempt,
          detail: outcome.detail,
        };
      } catch (error) {
        lastError = error;
        if (attempt < maxAttempts && isTransient(error)) {
          log.debug(`Retrying ${label} after transient error`, { attempt, error: errorMessage(error) });
          continue;
        }
        log.warn(`${label} failed: ${errorMessage(error)}`);
        return {
          ...baseResult(intent, slot),
          status: 'failed',
          error: errorMessage(error),
          durationMs: Date.now() - started,
          attempts: attempt,
        };
      }
    }

    // Only reachable with maxAttempts < 1
    return {
      ...baseResult(intent, slot),
      status: 'failed',
      error: errorMessage(lastError),
      durationMs: Date.now() - started,
      attempts: 0,
    };
  }
}

function baseResult(intent: ActionIntent, slot: SlotInfo): Pick<ActionResult, 'actorId' | 'kind' | 'slot' | 'day' | 'hour' | 'phase' | 'resource'> {
  return {
    actorId: intent.actorId,
    kind: intent.kind,
    slot: slot.slot,
    day: slot.day,
    hour: slot.hour,
    phase: intent.phase ?? 'slot',
    resource: ACTION_TABLE[intent.kind].resource,
  };
}

function skippedResult(intent: ActionIntent, slot: SlotInfo, reason: string): ActionResult {
  return { ...baseResult(intent, slot), status: 'skipped', error: reason, durationMs: 0, attempts: 0 };
}

function assertOneIntentPerActor(batch: readonly ActionIntent[]): void {
  const seen = new Map<ActorId, ActionKind>();
  for (const intent of batch) {
    const previous = seen.get(intent.actorId);
    if (previous !== undefined) {
      throw new Error(
        `Actor ${intent.actorId} has two intents in slot ${intent.slot} (${previous}, ${intent.kind})`
      );
    }
    seen.set(intent.actorId, intent.kind);
  }
}
