/**
 * Executors - bounded in-process worker pools
 *
 * The dispatcher talks to an `Executor`, not to a concrete pool. The local
 * implementations below run tasks in this process; a distributed worker
 * implementation can satisfy the same interface.
 */

import { EventEmitter } from 'node:events';

// =============================================================================
// TYPES
// =============================================================================

export type PoolTask<T> = (context: PoolTaskContext) => Promise<T>;

export interface PoolTaskContext {
  label: string;
  /** Tasks running in this pool when this one started, itself included */
  concurrency: number;
}

export interface PoolStats {
  name: string;
  capacity: number;
  running: number;
  pending: number;
  completed: number;
  failed: number;
  /** Highest number of tasks observed running at once */
  peakRunning: number;
  averageProcessingTimeMs: number;
}

export interface Executor {
  /** Schedule a task; the returned promise settles with the task's outcome. */
  submit<T>(label: string, task: PoolTask<T>): Promise<T>;
  /** Resolves once nothing is running or waiting. */
  drain(): Promise<void>;
  stats(): PoolStats;
}

interface QueuedTask {
  label: string;
  run: (context: PoolTaskContext) => Promise<void>;
}

// =============================================================================
// LOCAL POOL
// =============================================================================

/**
 * Concurrency-limited FIFO pool. Emits `task:started`, `task:completed`,
 * `task:failed` and `pool:idle`.
 */
export class LocalPool extends EventEmitter implements Executor {
  private readonly queue: QueuedTask[] = [];
  private running = 0;
  private metrics = { completed: 0, failed: 0, peakRunning: 0, totalProcessingTimeMs: 0 };

  constructor(
    readonly name: string,
    private readonly capacity: number
  ) {
    super();
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Pool ${name} needs a positive integer capacity, got ${capacity}`);
    }
  }

  submit<T>(label: string, task: PoolTask<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        run: async (context) => {
          const started = Date.now();
          try {
            const result = await task(context);
            this.metrics.completed++;
            this.metrics.totalProcessingTimeMs += Date.now() - started;
            this.emit('task:completed', { pool: this.name, label, processingTimeMs: Date.now() - started });
            resolve(result);
          } catch (error) {
            this.metrics.failed++;
            this.emit('task:failed', { pool: this.name, label, error });
            reject(error);
          }
        },
      });
      this.processNext();
    });
  }

  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.once('pool:idle', resolve));
  }

  stats(): PoolStats {
    const finished = this.metrics.completed;
    return {
      name: this.name,
      capacity: this.capacity,
      running: this.running,
      pending: this.queue.length,
      completed: this.metrics.completed,
      failed: this.metrics.failed,
      peakRunning: this.metrics.peakRunning,
      averageProcessingTimeMs: finished > 0 ? this.metrics.totalProcessingTimeMs / finished : 0,
    };
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  private processNext(): void {
    while (this.running < this.capacity) {
      const next = this.queue.shift();
      if (!next) break;

      this.running++;
      this.metrics.peakRunning = Math.max(this.metrics.peakRunning, this.running);
      this.emit('task:started', { pool: this.name, label: next.label });

      // run() settles the caller's promise itself and never rejects
      void next.run({ label: next.label, concurrency: this.running }).then(() => {
        this.running--;
        this.processNext();
        if (this.isIdle()) this.emit('pool:idle');
      });
    }
  }
}

// =============================================================================
// SEQUENTIAL EXECUTOR
// =============================================================================

/**
 * Runs one task at a time in submission order. Used for sequential mode and
 * debugging, where every pool shares this single executor.
 */
export class SequentialExecutor extends LocalPool {
  constructor(name = 'sequential') {
    super(name, 1);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export interface PoolSet {
  light: Executor;
  heavy: Executor;
}

export function createPools(options: { parallel: boolean; cpuWorkers: number; heavySlots: number }): PoolSet {
  if (!options.parallel) {
    const shared = new SequentialExecutor();
    return { light: shared, heavy: shared };
  }
  return {
    light: new LocalPool('light', Math.max(1, options.cpuWorkers)),
    heavy: new LocalPool('heavy', Math.max(1, options.heavySlots)),
  };
}
