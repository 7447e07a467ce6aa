import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueueTask {
  /** Unique identifier for this task */
  id: string;
  /** Function that performs the actual work */
  execute: () => Promise<void>;
}

export interface QueueOptions {
  /** Maximum number of concurrent tasks */
  concurrency: number;
  /** Logger instance for queue operations */
  logger: Logger;
}

export interface TaskQueue {
  /** Add a task to the queue */
  enqueue(task: QueueTask): void;
  /** Wait for all pending and active tasks to complete */
  drain(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a bounded-concurrency task queue.
 * Tasks start in enqueue order. A task that throws is logged;
 * it is never retried and never stops the other tasks.
 */
export function createQueue(options: QueueOptions): TaskQueue {
  const { logger } = options;
  const concurrency = Math.max(1, Math.floor(options.concurrency));

  const pending: QueueTask[] = [];
  const active = new Set<string>();
  const drainWaiters: Array<() => void> = [];

  function checkDrainComplete(): void {
    if (pending.length === 0 && active.size === 0) {
      for (const resolve of drainWaiters.splice(0)) {
        resolve();
      }
    }
  }

  function processNext(): void {
    while (active.size < concurrency && pending.length > 0) {
      const task = pending.shift();
      if (task) {
        void processTask(task);
      }
    }
    checkDrainComplete();
  }

  async function processTask(task: QueueTask): Promise<void> {
    active.add(task.id);
    logger.debug("Processing task", { taskId: task.id });

    try {
      await task.execute();
    } catch (error) {
      logger.error("Task failed", {
        taskId: task.id,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      active.delete(task.id);
      processNext();
    }
  }

  function enqueue(task: QueueTask): void {
    pending.push(task);
    processNext();
  }

  function drain(): Promise<void> {
    if (pending.length === 0 && active.size === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      drainWaiters.push(resolve);
    });
  }

  return {
    enqueue,
    drain,
  };
}
