import fs from 'fs';
import os from 'os';
import path from 'path';
import pino, { type Logger } from 'pino';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `digest-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export const STANDUP_TRANSCRIPT =
  "John: Good morning. Alice: The frontend is done. Bob: I'll deploy tomorrow.";

export const STANDUP_RESPONSE =
  '{"summary":"...", "attendees":["John","Alice","Bob"],"action_items":["Deploy tomorrow"]}';
