import { describe, it, expect } from 'vitest';
import {
  normalizeResponse,
  coerceRecord,
  assertUsableInput,
  followUpPlaceholder,
  SUMMARY_PLACEHOLDER,
  ATTENDEES_UNDETERMINED,
  MAX_ATTENDEES,
  ACTION_ITEM_COUNT,
} from '../../src/analysis/normalizer';
import { DigestError, type AnalysisRecord } from '../../src/shared/types';
import { STANDUP_RESPONSE } from '../helpers/fixtures';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('assertUsableInput', () => {
  it('rejects whitespace-only text as invalid input', () => {
    const err = catchError(() => assertUsableInput('   \n\t', { identity: 'empty.txt' }));
    expect(err).toBeInstanceOf(DigestError);
    expect(err).toMatchObject({
      code: 'DIGEST_E101',
      kind: 'invalid_input',
      message: 'Transcript is empty',
      context: { identity: 'empty.txt' },
    });
  });

  it('accepts text with content', () => {
    expect(() => assertUsableInput('Ana: hello')).not.toThrow();
  });
});

describe('normalizeResponse', () => {
  it('pads a single action item with numbered follow-ups', () => {
    const { record, strategy } = normalizeResponse(STANDUP_RESPONSE);

    expect(strategy).toBe('direct-decode');
    expect(record).toEqual({
      summary: '...',
      attendees: ['John', 'Alice', 'Bob'],
      action_items: [
        'Deploy tomorrow',
        'Review meeting notes and follow up on item 2',
        'Review meeting notes and follow up on item 3',
      ],
    });
  });

  it('keeps the first three of seven action items', () => {
    const raw = JSON.stringify({
      summary: 'Planning',
      attendees: ['Ana'],
      action_items: ['a1', 'a2', 'a3', 'a4', 'a5', 'a6', 'a7'],
    });
    expect(normalizeResponse(raw).record.action_items).toEqual(['a1', 'a2', 'a3']);
  });

  it('deduplicates attendees case-insensitively and caps them', () => {
    const raw = JSON.stringify({
      summary: 'Planning',
      attendees: ['Ana', ' ana ', 'ANA', 'Ben', 'Cy', 'Dee', 'Eve', 'Fay'],
      action_items: [],
    });
    expect(normalizeResponse(raw).record.attendees).toEqual(['Ana', 'Ben', 'Cy', 'Dee', 'Eve']);
  });

  it('substitutes the sentinel for an empty attendee list', () => {
    const raw = '{"summary": "Retro", "attendees": [], "action_items": ["x"]}';
    expect(normalizeResponse(raw).record.attendees).toEqual([ATTENDEES_UNDETERMINED]);
  });

  it('uses the placeholder when the summary is missing or blank', () => {
    expect(normalizeResponse('{"attendees": ["Ana"], "summary": "  "}').record.summary).toBe(SUMMARY_PLACEHOLDER);
    expect(normalizeResponse('{"attendees": ["Ana", "Ben"]}').record.summary).toBe(SUMMARY_PLACEHOLDER);
  });

  it('reports which strategy produced the record', () => {
    expect(normalizeResponse('```json\n{"summary": "Fenced"}\n```').strategy).toBe('direct-decode');
    expect(normalizeResponse('Here it is: {"summary": "Wrapped"} hope that helps').strategy).toBe('embedded-object');
    expect(normalizeResponse('{"summary": "Truncated", "attendees": ["Ana", "Be').strategy).toBe('field-patterns');
  });

  it('normalizes a prose response', () => {
    const raw = 'Summary: Sprint review.\nParticipants: Ana; Ben\nAction items:\n1. Fix login\n2) Update docs';
    const { record, strategy } = normalizeResponse(raw);

    expect(strategy).toBe('field-patterns');
    expect(record).toEqual({
      summary: 'Sprint review.',
      attendees: ['Ana', 'Ben'],
      action_items: ['Fix login', 'Update docs', followUpPlaceholder(3)],
    });
  });

  it('fails with a parse failure on an empty response', () => {
    const err = catchError(() => normalizeResponse(''));
    expect(err).toMatchObject({ code: 'DIGEST_E301', kind: 'parse_failure' });
  });

  it('fails on a response too short to parse', () => {
    const err = catchError(() => normalizeResponse('  ok  '));
    expect(err).toMatchObject({ code: 'DIGEST_E301', message: 'Response too short to parse (2 chars)' });
  });

  it('treats valid JSON without any record field as a parse failure', () => {
    const err = catchError(() => normalizeResponse('{"note":"ok"}'));
    expect(err).toMatchObject({
      code: 'DIGEST_E301',
      message: 'No parsing strategy produced a usable object',
    });
  });

  it('fails when no strategy finds anything', () => {
    const err = catchError(() => normalizeResponse('I could not find anything useful in this transcript.'));
    expect(err).toMatchObject({
      code: 'DIGEST_E301',
      message: 'No parsing strategy produced a usable object',
    });
  });

  it('either fails with a parse failure or returns a well-formed record', () => {
    const inputs = [
      '',
      '   ',
      'pure prose without any structure at all',
      '```json\n{}\n```',
      '{"summary": "x", "attendees": ["a"',
      STANDUP_RESPONSE,
      '{"summary": 7, "attendees": "Ana, Ben, ana", "action_items": "one; two; three; four"}',
      'Attendees: A, B, C, D, E, F, G',
    ];

    for (const input of inputs) {
      let record: AnalysisRecord;
      try {
        record = normalizeResponse(input).record;
      } catch (err) {
        expect(err).toBeInstanceOf(DigestError);
        expect(err).toMatchObject({ kind: 'parse_failure' });
        continue;
      }
      expect(record.summary.length).toBeGreaterThan(0);
      expect(record.attendees.length).toBeGreaterThanOrEqual(1);
      expect(record.attendees.length).toBeLessThanOrEqual(MAX_ATTENDEES);
      expect(new Set(record.attendees.map((a) => a.toLowerCase())).size).toBe(record.attendees.length);
      expect(record.action_items).toHaveLength(ACTION_ITEM_COUNT);
    }
  });
});

describe('coerceRecord', () => {
  it('drops blank action items before padding', () => {
    expect(coerceRecord({ summary: 'x', attendees: ['Ana'], action_items: ['  ', 'Ship it ', ''] }).action_items).toEqual([
      'Ship it',
      followUpPlaceholder(2),
      followUpPlaceholder(3),
    ]);
  });

  it('reads names and tasks out of object entries', () => {
    const record = coerceRecord({
      summary: 'x',
      attendees: [{ name: 'Ana' }, { role: 'scribe' }],
      action_items: [{ task: 'File report' }, { owner: 'Ben' }],
    });
    expect(record.attendees).toEqual(['Ana']);
    expect(record.action_items).toEqual(['File report', followUpPlaceholder(2), followUpPlaceholder(3)]);
  });

  it('splits delimited strings', () => {
    const record = coerceRecord({ summary: 42, attendees: 'Ana, Ben', actionItems: 'Book room; Send agenda' });
    expect(record).toEqual({
      summary: '42',
      attendees: ['Ana', 'Ben'],
      action_items: ['Book room', 'Send agenda', followUpPlaceholder(3)],
    });
  });

  it('prefers action_items over actionItems', () => {
    const record = coerceRecord({ action_items: ['snake'], actionItems: ['camel'] });
    expect(record.action_items[0]).toBe('snake');
  });

  it('fills every field for an empty candidate', () => {
    expect(coerceRecord({})).toEqual({
      summary: SUMMARY_PLACEHOLDER,
      attendees: [ATTENDEES_UNDETERMINED],
      action_items: [followUpPlaceholder(1), followUpPlaceholder(2), followUpPlaceholder(3)],
    });
  });
});
