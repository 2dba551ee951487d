import fs from 'fs';
import path from 'path';
import type { ErrorContext, OutputArtifact } from '../shared/types';
import { persistenceError, toError } from '../shared/errors';

/** `standup.txt` → `standup.json` */
export function outputFileName(identity: string): string {
  return path.parse(identity).name + '.json';
}

/**
 * Write the artifact for an identity. Atomic write via rename, so readers never
 * see a partial file. Returns the artifact path.
 */
export async function writeOutputArtifact(
  outputDir: string,
  identity: string,
  artifact: OutputArtifact,
  context?: ErrorContext,
): Promise<string> {
  const filePath = path.join(outputDir, outputFileName(identity));
  const tmpPath = `${filePath}.${process.pid}.tmp`;

  try {
    await fs.promises.writeFile(tmpPath, JSON.stringify(artifact, null, 2) + '\n', 'utf-8');
    await fs.promises.rename(tmpPath, filePath);
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true });
    const cause = toError(err);
    throw persistenceError('output', `Cannot write output artifact ${filePath}: ${cause.message}`, {
      context,
      cause,
    });
  }

  return filePath;
}
