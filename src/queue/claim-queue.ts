/**
 * Directory-backed work queue.
 *
 * Claiming an item hard-links `<stem><extension>` to `<stem><claimExtension>`
 * and then unlinks the pending name. Link creation is exclusive: it succeeds
 * for exactly one caller and fails with EEXIST or ENOENT for everyone else, so
 * no lock or coordinator is needed. An identity dropped again while its marker
 * is live stays pending until that marker is released.
 * The filesystem must support hard links within one directory.
 */
import fs, { type Dirent } from 'fs';
import path from 'path';
import type { QueueItem } from '../shared/types';
import { createLogger } from '../shared/logger';

const log = createLogger({ module: 'claim-queue' });

/** Link failures that mean "someone else got there first" or "not ready yet". */
const LOST_RACE_CODES = new Set(['EEXIST', 'ENOENT', 'EACCES', 'EPERM', 'EBUSY']);

export interface ClaimQueue {
  /** Eligible identities in lexicographic order. */
  listPending(): Promise<string[]>;
  /** Claim the first pending item this caller can win, or null when none. */
  claimNext(): Promise<QueueItem | null>;
  /** Delete the claim marker. Deleting an absent marker is not an error. */
  release(item: QueueItem): Promise<void>;
  /** Racy snapshot of pending items. Observability only. */
  pendingCount(): Promise<number>;
  /** Racy snapshot of claim markers present. Observability only. */
  claimedCount(): Promise<number>;
}

export interface FsClaimQueueOptions {
  inputDir: string;
  itemExtension: string;
  claimExtension: string;
}

export class FsClaimQueue implements ClaimQueue {
  private readonly inputDir: string;
  private readonly itemExtension: string;
  private readonly claimExtension: string;

  constructor(options: FsClaimQueueOptions) {
    if (options.itemExtension === options.claimExtension) {
      throw new Error('Item extension and claim extension must differ');
    }
    this.inputDir = options.inputDir;
    this.itemExtension = options.itemExtension;
    this.claimExtension = options.claimExtension;
  }

  async listPending(): Promise<string[]> {
    return this.listWithExtension(this.itemExtension);
  }

  async claimNext(): Promise<QueueItem | null> {
    const pending = await this.listPending();

    for (const identity of pending) {
      const claimMarker = this.claimMarkerFor(identity);
      const source = path.join(this.inputDir, identity);
      const target = path.join(this.inputDir, claimMarker);

      try {
        await fs.promises.link(source, target);
      } catch (err) {
        if (isErrnoException(err) && err.code && LOST_RACE_CODES.has(err.code)) {
          log.debug({ identity, code: err.code }, 'Claim lost, trying next candidate');
          continue;
        }
        throw err;
      }

      try {
        await fs.promises.unlink(source);
      } catch (err) {
        if (!isErrnoException(err) || err.code !== 'ENOENT') {
          await fs.promises.rm(target, { force: true });
          throw err;
        }
      }

      return { identity, claimMarker, path: target };
    }

    return null;
  }

  async release(item: QueueItem): Promise<void> {
    try {
      await fs.promises.unlink(item.path);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return;
      }
      throw err;
    }
  }

  async pendingCount(): Promise<number> {
    return (await this.listPending()).length;
  }

  async claimedCount(): Promise<number> {
    return (await this.listWithExtension(this.claimExtension)).length;
  }

  /** `standup.txt` → `standup.processing` */
  claimMarkerFor(identity: string): string {
    return identity.slice(0, identity.length - this.itemExtension.length) + this.claimExtension;
  }

  private async listWithExtension(extension: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.promises.readdir(this.inputDir, { withFileTypes: true });
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(extension) && entry.name.length > extension.length)
      .map((entry) => entry.name)
      .sort(compareNames);
  }
}

/** Code-unit order, independent of locale. */
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
