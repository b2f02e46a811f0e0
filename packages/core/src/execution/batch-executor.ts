import type { RetryPolicy } from '@ideaweaver/schemas/src/ideation.schema.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { DeadlineExceededError, OracleError } from '@ideaweaver/shared/src/utils/errors.js';
import { computeBackoffMs, sleep } from './backoff.js';
import { RunDeadline } from './run-deadline.js';
import { Semaphore } from './semaphore.js';
import { settleAll, type TaskOutcome } from './task-group.js';

const log = createChildLogger('execution:batch-executor');

export interface BatchExecutorOptions {
  readonly name: string;
  readonly concurrency: number;
  readonly retry: RetryPolicy;
  readonly callTimeoutMs: number;
  readonly deadline?: RunDeadline;
}

export interface CallContext {
  readonly label: string;
}

/**
 * Bounds outstanding external calls and retries transient oracle failures.
 * Each attempt holds one slot until its call settles, even past a timeout;
 * the slot is free while backing off.
 */
export class BatchExecutor {
  readonly name: string;
  private readonly semaphore: Semaphore;
  private readonly retry: RetryPolicy;
  private readonly callTimeoutMs: number;
  private readonly deadline: RunDeadline;
  private peak = 0;

  constructor(options: BatchExecutorOptions) {
    this.name = options.name;
    this.semaphore = new Semaphore(options.concurrency);
    this.retry = options.retry;
    this.callTimeoutMs = options.callTimeoutMs;
    this.deadline = options.deadline ?? RunDeadline.none();
  }

  get inFlight(): number {
    return this.semaphore.inUse;
  }

  get peakInFlight(): number {
    return this.peak;
  }

  /** Runs one external call under the concurrency bound and the retry policy. */
  async call<T>(fn: () => Promise<T>, context: CallContext): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      this.deadline.throwIfExpired();

      try {
        return await this.attempt(fn);
      } catch (error) {
        if (!(error instanceof OracleError) || !error.transient) {
          throw error;
        }
        if (attempt + 1 >= this.retry.maxAttempts) {
          log.warn(
            { executor: this.name, label: context.label, attempts: attempt + 1, kind: error.kind },
            'Giving up after transient failures',
          );
          throw error;
        }

        const delayMs = computeBackoffMs(this.retry, attempt);
        log.warn(
          {
            executor: this.name,
            label: context.label,
            attempt: attempt + 1,
            maxAttempts: this.retry.maxAttempts,
            delayMs,
            kind: error.kind,
          },
          'Transient oracle failure, retrying',
        );
        await sleep(delayMs);
      }
    }
  }

  /** Submits every item and joins on one outcome per item. */
  async run<I, R>(
    items: readonly I[],
    task: (item: I, index: number) => Promise<R>,
  ): Promise<TaskOutcome<R>[]> {
    return settleAll(items.map((item, index) => () => task(item, index)));
  }

  private async attempt<T>(fn: () => Promise<T>): Promise<T> {
    await this.semaphore.acquire();
    if (this.deadline.expired) {
      this.semaphore.release();
      throw new DeadlineExceededError();
    }
    this.peak = Math.max(this.peak, this.semaphore.inUse);

    // The slot follows the underlying call, not the caller's timeout.
    const pending = (async () => {
      try {
        return await fn();
      } finally {
        this.semaphore.release();
      }
    })();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new OracleError(`Call exceeded ${String(this.callTimeoutMs)}ms`, 'timeout'));
      }, this.callTimeoutMs);
    });

    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
