/**
 * Azure Log Analytics Retry Queue
 *
 * Holds batches the service rejected and re-posts them on a bounded
 * exponential backoff. Callers never wait on a retry; outcomes are only
 * reported through the logger and `getStats()`.
 */

import type { RetryConfig } from "../config/index.js";
import { LogAnalyticsError } from "../errors.js";
import {
  type Logger,
  NoOpLogger,
  logBatchRefused,
  logDelivered,
  logRetriesDiscarded,
  logRetryOutcome,
  logRetryScheduled,
} from "../observability/logging.js";

/**
 * A serialized batch waiting to be re-posted.
 */
export interface RetryTask {
  readonly body: string;
  readonly contentLength: number;
  readonly recordCount: number;
}

/**
 * Posts a task once; rejects when the attempt fails.
 */
export type DeliverFunction = (task: RetryTask) => Promise<void>;

/**
 * Retry queue statistics.
 */
export interface RetryStats {
  /** Batches waiting for their next attempt. */
  pending: number;
  /** Attempts currently running. */
  inFlight: number;
  /** Batches delivered by a retry. */
  delivered: number;
  /** Batches given up on or refused. */
  dropped: number;
  /** Whether new batches are accepted. */
  accepting: boolean;
}

/**
 * Shutdown options.
 */
export interface ShutdownOptions {
  /** Make one immediate final attempt for every pending batch. */
  flush?: boolean;
}

interface PendingRetry {
  task: RetryTask;
  attempt: number;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Bounded retry worker.
 */
export class RetryQueue {
  private readonly deliver: DeliverFunction;
  private readonly config: RetryConfig;
  private readonly logger: Logger;
  private readonly pending = new Map<number, PendingRetry>();
  private readonly inFlight = new Set<Promise<void>>();
  private nextId = 1;
  private delivered = 0;
  private dropped = 0;
  private accepting = true;

  constructor(deliver: DeliverFunction, config: RetryConfig, logger: Logger = new NoOpLogger()) {
    this.deliver = deliver;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Queue a batch for its first retry.
   *
   * @param retryAfterMs - server hint; the delay is at least this long, capped at maxDelayMs
   * @returns false when the batch was refused
   */
  enqueue(task: RetryTask, retryAfterMs?: number): boolean {
    const refusal = !this.accepting
      ? "shutdown"
      : this.config.maxAttempts === 0
        ? "disabled"
        : this.pending.size >= this.config.maxPending
          ? "full"
          : undefined;

    if (refusal !== undefined) {
      this.dropped++;
      logBatchRefused(this.logger, refusal, task.recordCount, this.config.maxPending);
      return false;
    }

    this.schedule(task, 1, retryAfterMs);
    return true;
  }

  /**
   * Delay before the given retry attempt (1-based).
   */
  computeDelay(attempt: number, retryAfterMs?: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.multiplier, attempt - 1);
    let delay = Math.min(exponentialDelay, this.config.maxDelayMs);

    if (retryAfterMs !== undefined) {
      delay = Math.max(delay, Math.min(retryAfterMs, this.config.maxDelayMs));
    }

    if (this.config.jitter) {
      delay += delay * 0.25 * Math.random();
    }

    return Math.floor(delay);
  }

  /**
   * Stop accepting batches, cancel pending timers and wait for running attempts.
   */
  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    this.accepting = false;

    const waiting = [...this.pending.values()];
    for (const entry of waiting) {
      clearTimeout(entry.timer);
    }
    this.pending.clear();

    if (options.flush) {
      for (const entry of waiting) {
        this.run(entry.task, entry.attempt);
      }
    } else {
      this.dropped += waiting.length;
      logRetriesDiscarded(this.logger, waiting.length);
    }

    await Promise.all([...this.inFlight]);
  }

  getStats(): RetryStats {
    return {
      pending: this.pending.size,
      inFlight: this.inFlight.size,
      delivered: this.delivered,
      dropped: this.dropped,
      accepting: this.accepting,
    };
  }

  private schedule(task: RetryTask, attempt: number, retryAfterMs?: number): void {
    const id = this.nextId++;
    const delay = this.computeDelay(attempt, retryAfterMs);

    const timer = setTimeout(() => {
      this.pending.delete(id);
      this.run(task, attempt);
    }, delay);

    this.pending.set(id, { task, attempt, timer });
    logRetryScheduled(this.logger, attempt, delay, task.recordCount);
  }

  private run(task: RetryTask, attempt: number): void {
    const running: Promise<void> = this.attempt(task, attempt).finally(() => {
      this.inFlight.delete(running);
    });
    this.inFlight.add(running);
  }

  /**
   * Never rejects: failures are rescheduled or logged.
   */
  private async attempt(task: RetryTask, attempt: number): Promise<void> {
    try {
      await this.deliver(task);
      this.delivered++;
      logDelivered(this.logger, task.recordCount, attempt);
    } catch (error) {
      const rescheduled = logRetryOutcome(
        this.logger,
        attempt,
        this.config.maxAttempts,
        task.recordCount,
        error,
        this.accepting && attempt < this.config.maxAttempts
      );

      if (rescheduled) {
        const retryAfter = error instanceof LogAnalyticsError ? error.retryAfter : undefined;
        this.schedule(task, attempt + 1, retryAfter);
      } else {
        this.dropped++;
      }
    }
  }
}

/**
 * Create a retry queue.
 */
export function createRetryQueue(
  deliver: DeliverFunction,
  config: RetryConfig,
  logger?: Logger
): RetryQueue {
  return new RetryQueue(deliver, config, logger);
}
