/**
 * Bounded task pool for calls into blocking store drivers
 * @module @capbench/core/probes/task-pool
 */

import { TaskTimeoutError } from '@capbench/shared';

/**
 * Pool configuration
 */
export interface TaskPoolConfig {
  /** Maximum tasks running at once (default: 4) */
  maxConcurrency?: number;
  /** Default per-task timeout in milliseconds, 0 for none (default: 0) */
  taskTimeout?: number;
}

/**
 * Per-task options
 */
export interface TaskOptions {
  /** Overrides the pool's task timeout */
  timeout?: number;
}

/**
 * Pool statistics
 */
export interface PoolStats {
  maxConcurrency: number;
  activeTasks: number;
  pendingTasks: number;
  completedTasks: number;
}

interface QueuedTask {
  run: () => void;
}

/**
 * Runs at most `maxConcurrency` tasks at a time; the rest wait in FIFO
 * order. The timeout covers queueing and running. A task that times out
 * while queued never starts; one that times out while running keeps its slot
 * until it settles and its result is discarded.
 */
export class TaskPool {
  private readonly maxConcurrency: number;
  private readonly taskTimeout: number;
  private readonly queue: QueuedTask[] = [];
  private active = 0;
  private completed = 0;

  constructor(config: TaskPoolConfig = {}) {
    this.maxConcurrency = Math.max(1, config.maxConcurrency ?? 4);
    this.taskTimeout = config.taskTimeout ?? 0;
  }

  /**
   * Queue a task and resolve with its result
   */
  exec<T>(task: () => Promise<T>, options: TaskOptions = {}): Promise<T> {
    const timeout = options.timeout ?? this.taskTimeout;

    return new Promise<T>((resolve, reject) => {
      let answered = false;
      let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

      const answer = (deliver: () => void): void => {
        if (answered) return;
        answered = true;
        if (timeoutHandle) clearTimeout(timeoutHandle);
        deliver();
      };

      const queued: QueuedTask = {
        run: () => {
          void new Promise<T>((started) => {
            started(task());
          })
            .then(
              (value) => answer(() => resolve(value)),
              (error: unknown) => answer(() => reject(error)),
            )
            .finally(() => {
              this.active -= 1;
              this.completed += 1;
              this.drain();
            });
        },
      };

      if (timeout > 0 && Number.isFinite(timeout)) {
        timeoutHandle = setTimeout(() => {
          const waiting = this.queue.indexOf(queued);
          if (waiting >= 0) this.queue.splice(waiting, 1);
          answer(() => reject(new TaskTimeoutError(timeout)));
        }, timeout);
      }

      this.queue.push(queued);
      this.drain();
    });
  }

  getStats(): PoolStats {
    return {
      maxConcurrency: this.maxConcurrency,
      activeTasks: this.active,
      pendingTasks: this.queue.length,
      completedTasks: this.completed,
    };
  }

  private drain(): void {
    while (this.active < this.maxConcurrency) {
      const next = this.queue.shift();
      if (!next) return;
      this.active += 1;
      next.run();
    }
  }
}
