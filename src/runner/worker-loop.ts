/**
 * Worker polling loop: claim, process, sleep when the queue is empty.
 *
 * The abort signal is only checked between cycles, so an in-flight job always
 * reaches release before the loop returns.
 */
import type { Logger } from 'pino';
import type { ClaimQueue } from '../queue/claim-queue';
import type { JobRunner } from './job-runner';
import { createLogger } from '../shared/logger';

export interface WorkerLoopOptions {
  pollIntervalMs: number;
  signal?: AbortSignal;
  /** Stop after this many jobs. */
  maxJobs?: number;
  /** Return as soon as a claim attempt finds nothing instead of polling. */
  exitWhenEmpty?: boolean;
  logger?: Logger;
}

export interface WorkerStats {
  jobsCompleted: number;
  jobsFailed: number;
  totalDurationMs: number;
}

/** Consecutive loop errors tolerated before a draining loop gives up. */
const MAX_CONSECUTIVE_ERRORS = 5;

export async function runWorkerLoop(
  runner: Pick<JobRunner, 'runOnce'>,
  queue: Pick<ClaimQueue, 'pendingCount'>,
  options: WorkerLoopOptions,
): Promise<WorkerStats> {
  const log = options.logger ?? createLogger({ module: 'worker-loop' });
  const stats: WorkerStats = { jobsCompleted: 0, jobsFailed: 0, totalDurationMs: 0 };
  const startTime = performance.now();
  let consecutiveErrors = 0;

  while (!options.signal?.aborted) {
    if (options.maxJobs !== undefined && stats.jobsCompleted + stats.jobsFailed >= options.maxJobs) {
      break;
    }

    try {
      const depth = await queue.pendingCount();
      if (depth > 0) {
        log.debug({ depth }, 'Queue depth');
      }

      const report = await runner.runOnce();
      consecutiveErrors = 0;

      if (!report) {
        if (options.exitWhenEmpty) break;
        await sleep(options.pollIntervalMs, options.signal);
        continue;
      }

      if (report.outcome.status === 'completed') {
        stats.jobsCompleted++;
      } else {
        stats.jobsFailed++;
      }
    } catch (err) {
      consecutiveErrors++;
      log.error({ err, consecutiveErrors }, 'Worker loop error');
      if (options.exitWhenEmpty && consecutiveErrors >= MAX_CONSECUTIVE_ERRORS) {
        log.error('Too many consecutive errors while draining. Exiting.');
        break;
      }
      await sleep(options.pollIntervalMs, options.signal);
    }
  }

  stats.totalDurationMs = performance.now() - startTime;
  return stats;
}

/** Resolves after `ms`, or as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
