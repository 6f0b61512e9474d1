/**
 * Task channel between the pipeline driver and the worker pool, and the
 * collector that gathers what the workers produce.
 */

import type { TranslationResult, TranslationTask } from '../types/pipeline.js';

/** Returned by `pull` once the queue is closed and empty */
export const QUEUE_CLOSED = Symbol('queue-closed');
/** Returned by `pull` when nothing arrived before the timeout */
export const PULL_TIMEOUT = Symbol('pull-timeout');

export type PullResult = TranslationTask | typeof QUEUE_CLOSED | typeof PULL_TIMEOUT;

interface Waiter {
  resolve: (value: PullResult) => void;
  timer: NodeJS.Timeout;
}

export class TaskQueue {
  private readonly items: TranslationTask[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;
  private pushedCount = 0;

  constructor(tasks: Iterable<TranslationTask> = []) {
    for (const task of tasks) {
      this.push(task);
    }
  }

  push(task: TranslationTask): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed task queue');
    }
    this.pushedCount++;

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(task);
      return;
    }
    this.items.push(task);
  }

  /**
   * No more tasks will be pushed. Idle waiters are woken with QUEUE_CLOSED.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(QUEUE_CLOSED);
    }
  }

  /**
   * Take the next task, waiting at most `timeoutMs` for one to arrive.
   */
  pull(timeoutMs: number): Promise<PullResult> {
    const next = this.items.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(QUEUE_CLOSED);

    return new Promise<PullResult>(resolve => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(PULL_TIMEOUT);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Remove and return every task nobody picked up
   */
  drainRemaining(): TranslationTask[] {
    return this.items.splice(0);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.items.length;
  }

  get pushed(): number {
    return this.pushedCount;
  }
}

export class ResultCollector {
  private readonly results: TranslationResult[] = [];
  private readonly seen = new Set<number>();

  /**
   * Record a result. A second result for the same task is rejected.
   */
  emit(result: TranslationResult): void {
    if (this.seen.has(result.taskId)) {
      throw new Error(`Duplicate result for task ${result.taskId}`);
    }
    this.seen.add(result.taskId);
    this.results.push(result);
  }

  has(taskId: number): boolean {
    return this.seen.has(taskId);
  }

  get size(): number {
    return this.results.length;
  }

  /** Hand over everything collected so far and reset */
  take(): TranslationResult[] {
    this.seen.clear();
    return this.results.splice(0);
  }
}
