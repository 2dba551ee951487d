import type { WorkerConfig } from './config';
import { FsClaimQueue } from './queue/claim-queue';
import { createAnthropicClient, type LLMClient } from './llm/llm-client';
import { JobRunner } from './runner/job-runner';
import { MetricsLedger } from './runner/metrics-ledger';
import { createLogger } from './shared/logger';

export interface Worker {
  queue: FsClaimQueue;
  ledger: MetricsLedger;
  runner: JobRunner;
}

export interface CreateWorkerOptions {
  /** Overrides the client built from the configured API key; null forces offline mode. */
  llm?: LLMClient | null;
}

export function createWorker(config: WorkerConfig, options: CreateWorkerOptions = {}): Worker {
  const queue = new FsClaimQueue({
    inputDir: config.inputDir,
    itemExtension: config.itemExtension,
    claimExtension: config.claimExtension,
  });
  const ledger = new MetricsLedger(config.ledgerPath);

  let llm = options.llm;
  if (llm === undefined) {
    llm = config.llm.apiKey ? createAnthropicClient(config.llm.apiKey) : null;
    if (!llm) {
      createLogger({ module: 'app' }).warn('ANTHROPIC_API_KEY not set, analyzing transcripts offline');
    }
  }

  const runner = new JobRunner({ queue, llm, ledger, config });
  return { queue, ledger, runner };
}
