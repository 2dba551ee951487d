/**
 * `transcript-digest run` and `transcript-digest drain`.
 */
import type { WorkerConfig } from '../../config';
import { createWorker, type CreateWorkerOptions } from '../../app';
import { ensureRuntimeDirs } from '../../bootstrap';
import { setupGracefulShutdown } from '../../shutdown';
import { runWorkerLoop, type WorkerStats } from '../../runner/worker-loop';
import { createLogger } from '../../shared/logger';

export interface RunOptions extends CreateWorkerOptions {
  /** Exit once the queue is empty. */
  drain: boolean;
  maxJobs?: number;
  /** Supplied by tests; otherwise SIGINT/SIGTERM drive shutdown. */
  signal?: AbortSignal;
}

export async function runWorker(
  config: WorkerConfig,
  options: RunOptions,
  write: (msg: string) => void = console.log,
): Promise<number> {
  const log = createLogger({ module: 'cli' });
  await ensureRuntimeDirs(config);

  const worker = createWorker(config, options);

  let signal = options.signal;
  let disposeShutdown: (() => void) | undefined;
  if (!signal) {
    const controller = new AbortController();
    disposeShutdown = setupGracefulShutdown(controller, log);
    signal = controller.signal;
  }

  log.info(
    { inputDir: config.inputDir, outputDir: config.outputDir, ledgerPath: config.ledgerPath, drain: options.drain },
    options.drain ? 'Draining transcript queue' : 'Watching transcript queue',
  );

  let stats: WorkerStats;
  try {
    stats = await runWorkerLoop(worker.runner, worker.queue, {
      pollIntervalMs: config.pollIntervalMs,
      signal,
      maxJobs: options.maxJobs,
      exitWhenEmpty: options.drain,
      logger: log,
    });
  } finally {
    disposeShutdown?.();
  }

  write(`Completed: ${stats.jobsCompleted}`);
  write(`Failed:    ${stats.jobsFailed}`);
  write(`Duration:  ${stats.totalDurationMs}ms`);

  return options.drain && stats.jobsFailed > 0 ? 1 : 0;
}
