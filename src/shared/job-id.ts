import crypto from 'crypto';

/**
 * Generate a job id: `job-` prefix + 8 lowercase hex chars.
 * A fresh id is minted for every processing attempt.
 */
export function generateJobId(): string {
  return 'job-' + crypto.randomBytes(4).toString('hex');
}
