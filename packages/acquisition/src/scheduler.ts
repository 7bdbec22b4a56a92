/**
 * Download Scheduler
 * 
 * Runs transfers on a bounded pool. All tasks are submitted up front and
 * settle in completion order. A failure is reported as soon as it is
 * observed, but nothing already queued or in flight is cancelled: runAll
 * waits for every task to finish before it rejects with the first failure.
 */

import pLimit from 'p-limit';
import {
  CancelledError,
  ConfigurationError,
  TransferError,
  type TransferSpec,
} from '@modelfetch/core';
import { createLogger } from '@modelfetch/utils';
import { ProgressReporter } from './progress.js';

const log = createLogger({ component: 'scheduler' });

export const DEFAULT_POOL_SIZE = 4;

export type TransferRunner = (spec: TransferSpec, signal?: AbortSignal) => Promise<string>;

export type TransferOutcome =
  | { ok: true; spec: TransferSpec; path: string }
  | { ok: false; spec: TransferSpec; error: Error };

export type FailedTransfer = Extract<TransferOutcome, { ok: false }>;

export interface SchedulerOptions {
  reporter?: ProgressReporter;
  signal?: AbortSignal;
}

/**
 * Worker count: the explicit job count, else 1 for a single task, else 4
 */
export function resolvePoolSize(taskCount: number, jobCount?: number): number {
  if (jobCount !== undefined) {
    if (!Number.isInteger(jobCount) || jobCount < 1) {
      throw new ConfigurationError(`job count must be a positive integer, got ${jobCount}`, { jobCount });
    }
    return jobCount;
  }
  return taskCount === 1 ? 1 : DEFAULT_POOL_SIZE;
}

export class DownloadScheduler {
  private reporter: ProgressReporter;
  private signal?: AbortSignal;

  constructor(
    private readonly runner: TransferRunner,
    options: SchedulerOptions = {}
  ) {
    this.reporter = options.reporter ?? new ProgressReporter();
    this.signal = options.signal;
  }

  /**
   * Run every task and return all outcomes, in completion order
   */
  async settleAll(tasks: readonly TransferSpec[], jobCount?: number): Promise<TransferOutcome[]> {
    const poolSize = resolvePoolSize(tasks.length, jobCount);
    const limit = pLimit(poolSize);
    const outcomes: TransferOutcome[] = [];

    log.debug({ tasks: tasks.length, poolSize }, 'Scheduling transfers');

    await Promise.all(
      tasks.map((spec) =>
        limit(async () => {
          const outcome = await this.runOne(spec);
          outcomes.push(outcome);
          if (!outcome.ok) {
            this.reporter.report({
              type: 'failure',
              task: spec.name,
              message: failureReason(outcome.error),
            });
          }
        })
      )
    );

    log.debug(
      { completed: outcomes.filter((o) => o.ok).length, failed: outcomes.filter((o) => !o.ok).length },
      'Scheduler drained'
    );
    return outcomes;
  }

  /**
   * Run every task; once all have finished, reject with the first failure observed
   */
  async runAll(tasks: readonly TransferSpec[], jobCount?: number): Promise<TransferOutcome[]> {
    const outcomes = await this.settleAll(tasks, jobCount);
    const failure = outcomes.find((o): o is FailedTransfer => !o.ok);
    if (failure) {
      throw failure.error;
    }
    return outcomes;
  }

  private async runOne(spec: TransferSpec): Promise<TransferOutcome> {
    try {
      if (this.signal?.aborted) {
        throw new CancelledError(spec.name);
      }
      const path = await this.runner(spec, this.signal);
      return { ok: true, spec, path };
    } catch (error) {
      return {
        ok: false,
        spec,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }
}

function failureReason(error: Error): string {
  if (error instanceof TransferError) {
    return error.reason;
  }
  if (error instanceof CancelledError) {
    return 'cancelled';
  }
  return error.message;
}
