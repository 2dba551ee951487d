/**
 * Deterministic transcript analysis with no external call.
 * Serves as the degraded fallback and as the analyzer in offline mode.
 */
import type { AnalysisRecord } from '../shared/types';
import { coerceRecord } from './normalizer';

const SPEAKER_PATTERNS: RegExp[] = [
  /^\[[0-9:]+\]\s*([A-Za-zÀ-ſ]+)\s*:/g, // "[10:30] John:"
  /^([A-Za-zÀ-ſ]+)\s*:/g, // "John:"
  /([A-Za-zÀ-ſ]+):\s*/g, // "... Alice: "
  /([A-Za-zÀ-ſ]+)\s+said/g,
  /([A-Za-zÀ-ſ]+)\s+mentioned/g,
  /([A-Za-zÀ-ſ]+)\s+asked/g,
  /([A-Za-zÀ-ſ]+)\s+explaining/g,
  /([A-Za-zÀ-ſ]+)\s+agreed/g,
];

const LETTERS_ONLY = /^\p{L}+$/u;
const TIMESTAMP_PREFIX = /^\[[0-9:]+\]\s*/;

const ACTION_CUES = ['will', 'should', 'need to', 'plan to', 'going to', 'must', 'have to'];
const ACTION_VERBS = ['review', 'prepare', 'send', 'call', 'meet', 'create', 'draft', 'schedule'];
const MIN_ACTION_LENGTH = 10;
const SPEAKER_PREFIX_WINDOW = 30;

export function analyzeOffline(text: string): AnalysisRecord {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');

  return coerceRecord({
    summary: summarize(text),
    attendees: findSpeakers(lines),
    action_items: findActionItems(lines),
  });
}

/** Speaker names in first-seen order, title-cased. */
export function findSpeakers(lines: string[]): string[] {
  const speakers = new Set<string>();
  for (const line of lines) {
    for (const pattern of SPEAKER_PATTERNS) {
      for (const match of line.matchAll(pattern)) {
        const name = match[1];
        if (name.length > 1 && LETTERS_ONLY.test(name)) {
          speakers.add(titleCase(name));
        }
      }
    }
  }
  return [...speakers];
}

/** The first two sentences. */
export function summarize(text: string): string {
  const sentences = text
    .split(/[.!?]/)
    .map((sentence) => sentence.replace(/\s+/g, ' ').trim())
    .filter((sentence) => sentence !== '');
  if (sentences.length === 0) return '';
  return sentences.slice(0, 2).join('. ') + '.';
}

export function findActionItems(lines: string[]): string[] {
  const items: string[] = [];
  for (const line of lines) {
    const lower = line.toLowerCase();
    if (!ACTION_CUES.some((cue) => lower.includes(cue))) continue;

    let clean = line.replace(/^[-•*\s]+|[-•*\s]+$/g, '').replace(TIMESTAMP_PREFIX, '');
    const colon = clean.indexOf(':');
    if (colon !== -1 && colon < SPEAKER_PREFIX_WINDOW) {
      clean = clean.slice(colon + 1).trim();
    }
    if (clean.length <= MIN_ACTION_LENGTH) continue;

    const cleanLower = clean.toLowerCase();
    items.push(ACTION_VERBS.some((verb) => cleanLower.startsWith(verb)) ? clean : `Follow up on ${cleanLower}`);
  }
  return items;
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}
