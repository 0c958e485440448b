/**
 * DocFusion Worker Pool
 *
 * Concurrency-limited task runner shared across a document. Slots are
 * released when a task settles or when its timeout fires; a timed-out task
 * is abandoned, not interrupted, and its late result is ignored.
 */

import { RecognitionTimeoutError } from '../errors/docfusion-error.js';

export interface RunOptions {
  /** Reject with RecognitionTimeoutError after this many ms (clock starts when the task starts) */
  timeoutMs?: number;
  /** Included in the timeout error context */
  label?: string;
}

export class WorkerPool {
  private readonly concurrency: number;
  private running = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`WorkerPool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  /** Tasks currently holding a slot. */
  get active(): number {
    return this.running;
  }

  /** Tasks queued for a slot. */
  get pending(): number {
    return this.waiting.length;
  }

  get size(): number {
    return this.concurrency;
  }

  /**
   * Run a task once a slot is free.
   */
  async run<T>(task: () => Promise<T>, options: RunOptions = {}): Promise<T> {
    await this.acquire();
    let released = false;
    const release = (): void => {
      if (released) return;
      released = true;
      this.release();
    };

    try {
      return await this.runWithTimeout(task, options, release);
    } finally {
      release();
    }
  }

  /**
   * Apply handler to every item with the pool's concurrency limit.
   * Results are stored by index, so output order matches input order
   * whatever the completion order.
   */
  async map<TInput, TOutput>(
    items: readonly TInput[],
    handler: (item: TInput, index: number) => Promise<TOutput>
  ): Promise<TOutput[]> {
    const results: TOutput[] = new Array<TOutput>(items.length);
    await Promise.all(
      items.map((item, index) =>
        this.run(async () => {
          results[index] = await handler(item, index);
        })
      )
    );
    return results;
  }

  private runWithTimeout<T>(task: () => Promise<T>, options: RunOptions, release: () => void): Promise<T> {
    const { timeoutMs, label } = options;
    if (timeoutMs === undefined) return task();

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        // Abandon: free the slot now, ignore whatever the task does later
        release();
        reject(
          new RecognitionTimeoutError(`Task timed out after ${timeoutMs}ms`, timeoutMs, label ? { label } : undefined)
        );
      }, timeoutMs);

      let started: Promise<T>;
      try {
        started = task();
      } catch (err) {
        clearTimeout(timer);
        reject(err);
        return;
      }

      started.then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        }
      );
    });
  }

  private acquire(): Promise<void> {
    if (this.running < this.concurrency) {
      this.running++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(() => {
        this.running++;
        resolve();
      });
    });
  }

  private release(): void {
    this.running--;
    const next = this.waiting.shift();
    if (next) next();
  }
}
