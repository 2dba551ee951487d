/**
 * One claim-to-release cycle per call.
 *
 *   Claimed → Analyzing → Succeeded | DegradedFallback → Persisted → Released
 *
 * Analysis failures (empty transcript, service error or timeout, unparseable
 * response) switch to the offline analyzer, so every claimed item gets an
 * output artifact; the outcome is still recorded as `failed`. The claim is
 * released on every exit path.
 */
import fs from 'fs';
import type { Logger } from 'pino';
import type { WorkerConfig } from '../config';
import type { ClaimQueue } from '../queue/claim-queue';
import type { LLMClient } from '../llm/llm-client';
import type {
  AnalysisRecord,
  ErrorContext,
  JobOutcome,
  JobStatus,
  OutputArtifact,
  QueueItem,
} from '../shared/types';
import { describeError, isDigestError, serviceError, serviceTimeout, toError } from '../shared/errors';
import { generateJobId } from '../shared/job-id';
import { createLogger } from '../shared/logger';
import { assertUsableInput, normalizeResponse } from '../analysis/normalizer';
import { analyzeOffline } from '../analysis/offline';
import { buildAnalysisPrompt } from '../llm/prompts/analyze';
import type { OutcomeLedger } from './metrics-ledger';
import { writeOutputArtifact } from './output-writer';

/** How the record was produced. */
export type AnalysisMode = 'generated' | 'offline' | 'fallback';

export interface JobReport {
  item: QueueItem;
  outcome: JobOutcome;
  mode: AnalysisMode;
  /** Parsing strategy that produced the candidate, for generated records. */
  strategy?: string;
  /** Written artifact, or null when persisting it failed. */
  artifact: OutputArtifact | null;
  outputPath: string | null;
}

export interface JobRunnerDeps {
  queue: ClaimQueue;
  /** null runs every job through the offline analyzer. */
  llm: LLMClient | null;
  ledger: OutcomeLedger;
  config: Pick<WorkerConfig, 'outputDir' | 'serviceTimeoutMs' | 'llm'>;
  logger?: Logger;
}

interface Analysis {
  record: AnalysisRecord;
  strategy?: string;
}

export class JobRunner {
  private readonly queue: ClaimQueue;
  private readonly llm: LLMClient | null;
  private readonly ledger: OutcomeLedger;
  private readonly config: JobRunnerDeps['config'];
  private readonly log: Logger;

  constructor(deps: JobRunnerDeps) {
    this.queue = deps.queue;
    this.llm = deps.llm;
    this.ledger = deps.ledger;
    this.config = deps.config;
    this.log = deps.logger ?? createLogger({ module: 'job-runner' });
  }

  /** Claim and process the next item. Resolves null when nothing could be claimed. */
  async runOnce(): Promise<JobReport | null> {
    const item = await this.queue.claimNext();
    if (!item) return null;
    return this.processItem(item);
  }

  async processItem(item: QueueItem): Promise<JobReport> {
    const startedAt = performance.now();
    const jobId = generateJobId();
    const context: ErrorContext = { jobId, identity: item.identity };
    const log = this.log.child({ jobId, identity: item.identity });

    try {
      let status: JobStatus = 'completed';
      let error: string | undefined;
      let mode: AnalysisMode = this.llm ? 'generated' : 'offline';
      let analysis: Analysis;
      let text = '';

      try {
        text = await readTranscript(item.path);
        analysis = await this.analyze(text, context);
      } catch (err) {
        status = 'failed';
        error = describeError(err);
        mode = 'fallback';
        log.warn({ err, code: isDigestError(err) ? err.code : undefined }, 'Analysis failed, using offline fallback');
        analysis = { record: analyzeOffline(text) };
      }

      let artifact: OutputArtifact | null = { job_id: jobId, ...analysis.record };
      let outputPath: string | null = null;
      try {
        outputPath = await writeOutputArtifact(this.config.outputDir, item.identity, artifact, context);
      } catch (err) {
        status = 'failed';
        error = describeError(err);
        artifact = null;
        log.error({ err }, 'Failed to persist output artifact');
      }

      const outcome: JobOutcome = {
        job_id: jobId,
        status,
        duration_seconds: (performance.now() - startedAt) / 1000,
        ...(error !== undefined ? { error } : {}),
      };

      try {
        await this.ledger.append(outcome);
      } catch (err) {
        log.error({ err, outcome }, 'Failed to record job outcome in metrics ledger');
      }

      log.info(
        { status, mode, strategy: analysis.strategy, durationSec: outcome.duration_seconds, outputPath },
        status === 'completed' ? 'Job completed' : 'Job failed',
      );

      return { item, outcome, mode, strategy: analysis.strategy, artifact, outputPath };
    } finally {
      await this.queue.release(item);
    }
  }

  private async analyze(text: string, context: ErrorContext): Promise<Analysis> {
    assertUsableInput(text, context);

    if (!this.llm) {
      return { record: analyzeOffline(text), strategy: 'offline' };
    }

    const { system, user } = buildAnalysisPrompt(text);
    const raw = await this.generate(this.llm, system, user, context);
    return normalizeResponse(raw, undefined, context);
  }

  /**
   * Call the generation service, bounded by the service timeout. The client also
   * receives an AbortSignal so it can drop the request.
   */
  private async generate(llm: LLMClient, system: string, user: string, context: ErrorContext): Promise<string> {
    const timeoutMs = this.config.serviceTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(serviceTimeout(timeoutMs, context));
      }, timeoutMs);
    });

    try {
      const response = await Promise.race([
        llm.complete(system, user, {
          model: this.config.llm.model,
          temperature: this.config.llm.temperature,
          maxTokens: this.config.llm.maxTokens,
          signal: controller.signal,
        }),
        timeout,
      ]);
      return response.content;
    } catch (err) {
      if (isDigestError(err)) throw err;
      const cause = toError(err);
      throw serviceError(`Generation failed: ${cause.message}`, { context, cause });
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Decode as UTF-8; undecodable bytes become U+FFFD instead of failing the job. */
export async function readTranscript(filePath: string): Promise<string> {
  const bytes = await fs.promises.readFile(filePath);
  return bytes.toString('utf-8').replace(/^\uFEFF/, '');
}
