/**
 * Response normalization: raw generation text → AnalysisRecord.
 *
 * Whatever strategy produced the candidate, the same coercion applies, so a
 * returned record always has a non-empty summary, 1–5 distinct attendees and
 * exactly three action items.
 */
import { z } from 'zod';
import type { AnalysisRecord, CandidateObject, ErrorContext } from '../shared/types';
import { invalidInput, parseFailure } from '../shared/errors';
import { runParserChain, type ParseStrategy } from './parser-chain';
import { directDecode, extractEmbeddedObject, extractFieldPatterns, isPlainObject } from './strategies';

export const SUMMARY_PLACEHOLDER = 'Meeting discussion completed';
export const ATTENDEES_UNDETERMINED = 'Meeting participants';
export const MAX_ATTENDEES = 5;
export const ACTION_ITEM_COUNT = 3;
/** Responses shorter than this (trimmed) are not worth parsing. */
export const MIN_RESPONSE_LENGTH = 10;

const ATTENDEE_OBJECT_KEYS = ['name'];
const ACTION_ITEM_OBJECT_KEYS = ['text', 'task', 'title', 'description'];

export const analysisRecordSchema = z.object({
  summary: z.string().min(1),
  attendees: z.array(z.string().min(1)).min(1).max(MAX_ATTENDEES),
  action_items: z.array(z.string().min(1)).length(ACTION_ITEM_COUNT),
});

export const DEFAULT_STRATEGIES: readonly ParseStrategy[] = [
  { name: 'direct-decode', parse: directDecode },
  { name: 'embedded-object', parse: extractEmbeddedObject },
  { name: 'field-patterns', parse: extractFieldPatterns },
];

export interface NormalizeResult {
  record: AnalysisRecord;
  strategy: string;
}

/** Generic follow-up used to pad action items; `position` is 1-based. */
export function followUpPlaceholder(position: number): string {
  return `Review meeting notes and follow up on item ${position}`;
}

/**
 * Reject source text that has nothing to analyze. Called before any external call.
 */
export function assertUsableInput(text: string, context?: ErrorContext): void {
  if (text.trim() === '') {
    throw invalidInput('Transcript is empty', context);
  }
}

export function normalizeResponse(
  raw: string,
  strategies: readonly ParseStrategy[] = DEFAULT_STRATEGIES,
  context?: ErrorContext,
): NormalizeResult {
  const trimmedLength = raw.trim().length;
  if (trimmedLength < MIN_RESPONSE_LENGTH) {
    throw parseFailure(`Response too short to parse (${trimmedLength} chars)`, context);
  }

  const hit = runParserChain(strategies, raw);
  if (!hit) {
    throw parseFailure('No parsing strategy produced a usable object', context);
  }

  return { record: coerceRecord(hit.candidate), strategy: hit.strategy };
}

/**
 * Coerce a loosely-shaped candidate into a valid AnalysisRecord.
 */
export function coerceRecord(candidate: CandidateObject): AnalysisRecord {
  const summary = toText(candidate.summary);

  const attendees: string[] = [];
  const seen = new Set<string>();
  for (const name of toTextList(candidate.attendees, ATTENDEE_OBJECT_KEYS, /[,;\n]/)) {
    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    attendees.push(name);
    if (attendees.length === MAX_ATTENDEES) break;
  }
  if (attendees.length === 0) {
    attendees.push(ATTENDEES_UNDETERMINED);
  }

  const actionItems = toTextList(
    candidate.action_items ?? candidate.actionItems,
    ACTION_ITEM_OBJECT_KEYS,
    /[;\n]/,
  ).slice(0, ACTION_ITEM_COUNT);
  while (actionItems.length < ACTION_ITEM_COUNT) {
    actionItems.push(followUpPlaceholder(actionItems.length + 1));
  }

  return analysisRecordSchema.parse({
    summary: summary || SUMMARY_PLACEHOLDER,
    attendees,
    action_items: actionItems,
  });
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/** Trimmed, non-empty entries of an array (or a delimited string). */
function toTextList(value: unknown, objectKeys: string[], separator: RegExp): string[] {
  let entries: unknown[];
  if (Array.isArray(value)) {
    entries = value;
  } else if (typeof value === 'string') {
    entries = value.split(separator);
  } else {
    return [];
  }

  const result: string[] = [];
  for (const entry of entries) {
    const text = isPlainObject(entry) ? firstText(entry, objectKeys) : toText(entry);
    if (text !== '') {
      result.push(text);
    }
  }
  return result;
}

function firstText(entry: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const text = toText(entry[key]);
    if (text !== '') return text;
  }
  return '';
}
