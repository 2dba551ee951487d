/**
 * Append-only CSV ledger of job outcomes.
 *
 * Each row goes out in a single append, so rows from concurrent workers never
 * interleave. The header is published with link(2), which fails if the file
 * already exists, so exactly one worker creates it and nobody can append
 * before it is there.
 */
import fs from 'fs';
import crypto from 'crypto';
import type { JobOutcome } from '../shared/types';
import { persistenceError, toError } from '../shared/errors';

export const LEDGER_HEADER = 'job_id,status,duration_sec,error';

export interface OutcomeLedger {
  append(outcome: JobOutcome): Promise<void>;
}

/** Commas and line breaks would break naive line/field splitting. */
export function sanitizeLedgerField(value: string): string {
  return value.replace(/\r\n|\r|\n/g, ' ').replace(/,/g, ';');
}

export function formatLedgerRow(outcome: JobOutcome): string {
  return [
    outcome.job_id,
    outcome.status,
    outcome.duration_seconds.toFixed(3),
    sanitizeLedgerField(outcome.error ?? ''),
  ].join(',');
}

export class MetricsLedger implements OutcomeLedger {
  private headerReady = false;

  constructor(readonly filePath: string) {}

  async append(outcome: JobOutcome): Promise<void> {
    try {
      await this.ensureHeader();
      await fs.promises.appendFile(this.filePath, formatLedgerRow(outcome) + '\n', 'utf-8');
    } catch (err) {
      const cause = toError(err);
      throw persistenceError('ledger', `Cannot append to metrics ledger ${this.filePath}: ${cause.message}`, {
        context: { jobId: outcome.job_id },
        cause,
      });
    }
  }

  private async ensureHeader(): Promise<void> {
    if (this.headerReady) return;

    const tmpPath = `${this.filePath}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
    await fs.promises.writeFile(tmpPath, LEDGER_HEADER + '\n', 'utf-8');
    try {
      await fs.promises.link(tmpPath, this.filePath);
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) {
        throw err;
      }
    } finally {
      await fs.promises.rm(tmpPath, { force: true });
    }

    this.headerReady = true;
  }
}
