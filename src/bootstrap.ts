import fs from 'fs';
import path from 'path';
import type { WorkerConfig } from './config';

/**
 * Create the input queue, output and ledger directories. Idempotent.
 */
export async function ensureRuntimeDirs(config: Pick<WorkerConfig, 'inputDir' | 'outputDir' | 'ledgerPath'>): Promise<void> {
  for (const dir of [config.inputDir, config.outputDir, path.dirname(config.ledgerPath)]) {
    await fs.promises.mkdir(dir, { recursive: true });
  }
}
