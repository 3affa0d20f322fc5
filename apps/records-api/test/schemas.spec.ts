import { describe, expect, it } from 'vitest';
import {
  createRecordSchema,
  findJsonProblem,
  formatIssues,
  isCalendarDate,
  jsonObjectSchema,
  MAX_JSON_DEPTH,
} from '../src/schemas';

// [[[ ... 1 ... ]]] with `levels` arrays around the 1
function nested(levels: number): unknown {
  let value: unknown = 1;
  for (let i = 0; i < levels; i++) value = [value];
  return value;
}

function issuesOf(body: unknown): string {
  const parsed = createRecordSchema.safeParse(body);
  if (parsed.success) throw new Error('expected the body to be rejected');
  return formatIssues(parsed.error);
}

describe('isCalendarDate', () => {
  it('accepts real days in YYYY-MM-DD', () => {
    expect(isCalendarDate('2024-03-01')).toBe(true);
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('1999-12-31')).toBe(true);
  });

  it('rejects impossible days and other layouts', () => {
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-13-01')).toBe(false);
    expect(isCalendarDate('2024-04-31')).toBe(false);
    expect(isCalendarDate('2024-3-1')).toBe(false);
    expect(isCalendarDate('01/03/2024')).toBe(false);
    expect(isCalendarDate('2024-03-01T00:00:00Z')).toBe(false);
    expect(isCalendarDate('0000-01-01')).toBe(false);
    expect(isCalendarDate('')).toBe(false);
  });
});

describe('createRecordSchema', () => {
  it('accepts a date and an object payload', () => {
    const body = { date: '2024-03-01', data: { temp: 21.5, tags: ['a', 'b'], meta: { ok: true, note: null } } };
    const parsed = createRecordSchema.safeParse(body);

    expect(parsed.success).toBe(true);
    expect(parsed.data).toEqual(body);
  });

  it('accepts an empty payload object', () => {
    expect(createRecordSchema.safeParse({ date: '2024-03-01', data: {} }).success).toBe(true);
  });

  it('reports a malformed date', () => {
    expect(issuesOf({ date: '2024-02-30', data: {} })).toBe('date: must be a calendar date in YYYY-MM-DD format');
  });

  it('reports missing fields', () => {
    expect(issuesOf({})).toBe('date: Required; data: Required');
  });

  it('requires data to be an object', () => {
    expect(issuesOf({ date: '2024-03-01', data: [1, 2] })).toBe('data: Expected object, received array');
    expect(issuesOf({ date: '2024-03-01', data: null })).toBe('data: Expected object, received null');
  });

  it('reports a body that is not an object without a path', () => {
    expect(issuesOf([])).toBe('Expected object, received array');
  });
});

describe('jsonObjectSchema', () => {
  it('keeps nested JSON intact', () => {
    const value = { a: [1, 'two', false, null, { b: [[]] }], c: { d: { e: -0.5 } } };
    expect(jsonObjectSchema.parse(value)).toEqual(value);
  });
});

describe('storable payloads', () => {
  it('allows nesting up to the depth limit', () => {
    expect(MAX_JSON_DEPTH).toBe(256);
    expect(jsonObjectSchema.safeParse({ x: nested(255) }).success).toBe(true);
  });

  it('rejects nesting past the depth limit', () => {
    expect(issuesOf({ date: '2024-03-01', data: { x: nested(256) } })).toBe('data: nested deeper than 256 levels');
  });

  it('walks very deep values without exhausting the stack', () => {
    expect(findJsonProblem({ x: nested(100_000) })).toBe('nested deeper than 256 levels');
  });

  it('rejects NUL characters in values and keys', () => {
    expect(issuesOf({ date: '2024-03-01', data: { note: 'a\u0000b' } })).toBe('data: strings cannot contain \\u0000');
    expect(issuesOf({ date: '2024-03-01', data: { 'k\u0000': 1 } })).toBe('data: strings cannot contain \\u0000');
  });

  it('rejects unpaired surrogates but keeps real astral characters', () => {
    expect(issuesOf({ date: '2024-03-01', data: { s: ['ok', '\ud800'] } })).toBe(
      'data: strings cannot contain unpaired surrogates',
    );
    expect(issuesOf({ date: '2024-03-01', data: { s: 'x\udc00' } })).toBe(
      'data: strings cannot contain unpaired surrogates',
    );
    expect(jsonObjectSchema.safeParse({ face: '\ud83d\ude00' }).success).toBe(true);
  });
});
