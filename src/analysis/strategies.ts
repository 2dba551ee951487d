/**
 * Parsing strategies for free-form generation responses.
 *
 * 1. directDecode: the whole response (code fences stripped) is the object
 * 2. extractEmbeddedObject: first balanced {...} region that decodes and carries a known field
 * 3. extractFieldPatterns: per-field patterns over the raw text, JSON-ish first, then prose labels
 */
import type { CandidateObject } from '../shared/types';

const RECORD_FIELDS = ['summary', 'attendees', 'action_items', 'actionItems'];

const QUOTED_STRING = /"((?:[^"\\]|\\.)*)"/g;

const JSON_SUMMARY = /"summary"\s*:\s*"((?:[^"\\]|\\.)*)"/i;
const JSON_ATTENDEES = /"attendees"\s*:\s*\[([^\]]*)/i;
const JSON_ACTION_ITEMS = /"action[_ ]?items"\s*:\s*\[([^\]]*)/i;

const LABEL_PREFIX = String.raw`^[ \t#*>_-]*`;
const LABEL_SUFFIX = String.raw`[*_ \t]*:[*_ \t]*`;
const PROSE_SUMMARY_INLINE = new RegExp(`${LABEL_PREFIX}summary${LABEL_SUFFIX}(\\S.*)$`, 'im');
const PROSE_SUMMARY_NEXT_LINE = new RegExp(`${LABEL_PREFIX}summary${LABEL_SUFFIX}\\r?\\n[ \\t]*(\\S.*)$`, 'im');
const PROSE_ATTENDEES = new RegExp(`${LABEL_PREFIX}(?:attendees|participants)${LABEL_SUFFIX}(\\S.*)$`, 'im');
const PROSE_ACTION_ITEMS = new RegExp(`${LABEL_PREFIX}action[ _-]?items${LABEL_SUFFIX}(.*)$`, 'im');

const BULLET_LINE = /^\s*(?:[-*•]|\d+[.)])\s+(.+)$/;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** True when the object carries at least one analysis field. */
export function looksLikeRecord(value: unknown): value is CandidateObject {
  return isPlainObject(value) && RECORD_FIELDS.some((field) => field in value);
}

/**
 * Remove a surrounding markdown code fence (```json ... ``` or ``` ... ```).
 */
export function stripCodeFence(text: string): string {
  let content = text.trim();
  if (content.startsWith('```')) {
    const firstNewline = content.indexOf('\n');
    const lastFence = content.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence > firstNewline) {
      content = content.slice(firstNewline + 1, lastFence).trim();
    }
  }
  return content;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function directDecode(raw: string): CandidateObject | null {
  const parsed = tryParseJson(stripCodeFence(raw));
  return looksLikeRecord(parsed) ? parsed : null;
}

/**
 * Index of the `}` closing the object opened at `start`, or -1 when the
 * region never balances. Braces inside JSON strings are ignored.
 */
export function findBalancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

export function extractEmbeddedObject(raw: string): CandidateObject | null {
  let start = raw.indexOf('{');
  while (start !== -1) {
    const end = findBalancedEnd(raw, start);
    if (end !== -1) {
      const parsed = tryParseJson(raw.slice(start, end + 1));
      if (looksLikeRecord(parsed)) {
        return parsed;
      }
    }
    start = raw.indexOf('{', start + 1);
  }
  return null;
}

export function extractFieldPatterns(raw: string): CandidateObject | null {
  const candidate: CandidateObject = {};

  const summary = matchJsonString(raw, JSON_SUMMARY) ?? matchLine(raw, PROSE_SUMMARY_INLINE) ?? matchLine(raw, PROSE_SUMMARY_NEXT_LINE);
  if (summary !== null) {
    candidate.summary = summary;
  }

  const attendees = matchJsonArray(raw, JSON_ATTENDEES) ?? matchProseList(raw);
  if (attendees !== null) {
    candidate.attendees = attendees;
  }

  const actionItems = matchJsonArray(raw, JSON_ACTION_ITEMS) ?? matchProseActionItems(raw);
  if (actionItems !== null) {
    candidate.action_items = actionItems;
  }

  return Object.keys(candidate).length > 0 ? candidate : null;
}

function unescapeJsonString(body: string): string {
  const decoded = tryParseJson(`"${body}"`);
  return typeof decoded === 'string' ? decoded : body;
}

function matchJsonString(raw: string, pattern: RegExp): string | null {
  const match = pattern.exec(raw);
  return match ? unescapeJsonString(match[1]) : null;
}

/** Quoted strings inside `"field": [ ... ]`; the closing bracket may be missing. */
function matchJsonArray(raw: string, pattern: RegExp): string[] | null {
  const match = pattern.exec(raw);
  if (!match) return null;
  return Array.from(match[1].matchAll(QUOTED_STRING), (m) => unescapeJsonString(m[1]));
}

function matchLine(raw: string, pattern: RegExp): string | null {
  const match = pattern.exec(raw);
  if (!match) return null;
  const value = stripEmphasis(match[1]);
  return value === '' ? null : value;
}

function matchProseList(raw: string): string[] | null {
  const line = matchLine(raw, PROSE_ATTENDEES);
  if (line === null) return null;
  return line
    .split(/,|;|\band\b/)
    .map((name) => stripEmphasis(name))
    .filter((name) => name !== '');
}

/**
 * `Action items: a; b` on one line, or a bullet / numbered list under the label.
 */
function matchProseActionItems(raw: string): string[] | null {
  const match = PROSE_ACTION_ITEMS.exec(raw);
  if (!match) return null;

  const items: string[] = [];
  const inline = stripEmphasis(match[1]);
  if (inline !== '') {
    items.push(...inline.split(';').map((item) => item.trim()).filter((item) => item !== ''));
  }

  const rest = raw.slice(match.index + match[0].length).split(/\r?\n/);
  for (const line of rest) {
    if (line.trim() === '') {
      if (items.length > 0) break;
      continue;
    }
    const bullet = BULLET_LINE.exec(line);
    if (!bullet) break;
    items.push(stripEmphasis(bullet[1]));
  }

  return items.length > 0 ? items : null;
}

function stripEmphasis(text: string): string {
  return text.replace(/^[\s*_]+|[\s*_]+$/g, '');
}
