/**
 * `transcript-digest status`: pending and claimed counts.
 */
import type { WorkerConfig } from '../../config';
import { FsClaimQueue } from '../../queue/claim-queue';

export interface StatusData {
  input_dir: string;
  pending: number;
  claimed: number;
}

export async function getStatusData(config: WorkerConfig): Promise<StatusData> {
  const queue = new FsClaimQueue({
    inputDir: config.inputDir,
    itemExtension: config.itemExtension,
    claimExtension: config.claimExtension,
  });
  return {
    input_dir: config.inputDir,
    pending: await queue.pendingCount(),
    claimed: await queue.claimedCount(),
  };
}

export async function runStatus(
  config: WorkerConfig,
  options: { json?: boolean },
  write: (msg: string) => void = console.log,
): Promise<number> {
  const data = await getStatusData(config);

  if (options.json) {
    write(JSON.stringify(data, null, 2));
    return 0;
  }

  write(`Queue:    ${data.input_dir}`);
  write(`Pending:  ${data.pending}`);
  write(`Claimed:  ${data.claimed}`);
  return 0;
}
