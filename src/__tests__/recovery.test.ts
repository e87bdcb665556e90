import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { RecoveryFailedError } from '../errors.js';
import {
  cleanResponseText,
  extractFencedBlocks,
  findBalancedSpans,
  isRecord,
  matchesSchema,
  recoverJSON,
  recoverJSONOrThrow,
  repairJsonMinimal,
  safeRecoverJSON,
  truncationCandidates,
} from '../recovery.js';

const hasSections = (value: unknown): value is { sections: unknown[] } =>
  isRecord(value) && Array.isArray(value.sections) && value.sections.length > 0;

describe('recoverJSON', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  // ==================== STRATEGY ORDER ====================

  it('parses well-formed text directly', () => {
    const result = recoverJSON('{"a": 1}', isRecord);
    expect(result).toEqual({ value: { a: 1 }, strategy: 'direct' });
  });

  it('returns the object embedded in a fenced block after a preamble', () => {
    const content = 'Demand grew steadily across every region. '.repeat(72);
    const embedded = { sections: [{ title: 'A', content, chart_type: 'bar' }] };
    const raw = `Here is the blueprint you asked for:\n\`\`\`json\n${JSON.stringify(embedded)}\n\`\`\``;

    const result = recoverJSON(raw, hasSections);

    expect(result?.strategy).toBe('fenced');
    expect(result?.value).toEqual(embedded);
  });

  it('finds an object surrounded by prose', () => {
    const result = recoverJSON('Sure! {"a": 1} Hope this helps.', isRecord);
    expect(result).toEqual({ value: { a: 1 }, strategy: 'outer-span' });
  });

  it('drops trailing commas with aggressive repair', () => {
    const result = recoverJSON('{"a": 1, "b": [1, 2,],}', isRecord);
    expect(result).toEqual({ value: { a: 1, b: [1, 2] }, strategy: 'aggressive-repair' });
  });

  it('escapes an unescaped quote inside a string value', () => {
    const result = recoverJSON('{"note": "5" screen", "size": 2}', isRecord);
    expect(result?.strategy).toBe('aggressive-repair');
    expect(result?.value).toEqual({ note: '5" screen', size: 2 });
  });

  it('escapes raw newlines inside string values', () => {
    const result = recoverJSON('{"text": "line one\nline two"}', isRecord);
    expect(result?.value).toEqual({ text: 'line one\nline two' });
  });

  it('skips fragments the predicate rejects and takes a matching span', () => {
    const result = recoverJSON('{"kind": "note"} then {"sections": [1]}', hasSections);
    expect(result).toEqual({ value: { sections: [1] }, strategy: 'largest-span' });
  });

  it('salvages the complete items of a truncated array', () => {
    const body = 'x'.repeat(100);
    const raw =
      `{"sections": [{"title": "A", "content": "${body}", "chart_type": "bar"}, ` +
      `{"title": "B", "content": "${body}", "chart_type": "line"}, ` +
      '{"title": "C", "content": "cut off mid';

    const result = recoverJSON(raw, hasSections);

    expect(result?.strategy).toBe('truncation');
    expect(result?.value).toEqual({
      sections: [
        { title: 'A', content: body, chart_type: 'bar' },
        { title: 'B', content: body, chart_type: 'line' },
      ],
    });
  });

  it('does not complete a truncated item from an object nested inside it', () => {
    const body = 'x'.repeat(100);
    const raw =
      `{"sections": [{"title": "A", "content": "${body}", "chart_type": "bar"}, ` +
      `{"title": "B", "content": "${body}", "chart_type": "line"}, ` +
      '{"title": "C", "content": "cut", "chart_type": "stackedBar", ' +
      '"chart_data": {"labels": ["a"], "series": [{"name": "s", "values": [1]}';

    const result = recoverJSON(raw, hasSections);

    expect(result?.strategy).toBe('truncation');
    expect(result?.value).toEqual({
      sections: [
        { title: 'A', content: body, chart_type: 'bar' },
        { title: 'B', content: body, chart_type: 'line' },
      ],
    });
  });

  it('returns null when nothing parses', () => {
    expect(recoverJSON('no structured data here', isRecord)).toBeNull();
    expect(recoverJSON('', isRecord)).toBeNull();
  });

  it('gives the same result for the same input', () => {
    const raw = 'Result: {"a": [1, 2,], "b": "x"} done';
    expect(recoverJSON(raw, isRecord)).toEqual(recoverJSON(raw, isRecord));
  });
});

// ==================== HELPERS ====================

describe('recovery helpers', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('strips a leading preamble and control characters', () => {
    expect(cleanResponseText('Here is the JSON you asked for:\n{"a":1}')).toBe('{"a":1}');
    expect(cleanResponseText('\u0007{"a":1}\u0000')).toBe('{"a":1}');
  });

  it('extracts every fenced block', () => {
    const text = '```json\n{"a":1}\n```\ntext\n```\n[2]\n```';
    expect(extractFencedBlocks(text)).toEqual(['{"a":1}', '[2]']);
  });

  it('minimal repair strips trailing commas and keeps newlines in strings', () => {
    expect(repairJsonMinimal('junk {"a": [1,], } trailing')).toBe('{"a": [1]}');
    expect(repairJsonMinimal('{"t": "a\nb",}')).toBe('{"t": "a\nb"}');
  });

  it('finds balanced spans and ignores braces inside strings', () => {
    expect(findBalancedSpans('{"a": {"b": "}"}}')).toEqual([
      { start: 6, end: 16, depth: 1 },
      { start: 0, end: 17, depth: 0 },
    ]);
  });

  it('builds truncation candidates latest first', () => {
    expect(truncationCandidates('{"items": [{"a": 1}, {"b": 2}, {"c": ')).toEqual([
      '{"items": [{"a": 1}, {"b": 2}]}',
      '{"items": [{"a": 1}]}',
    ]);
  });

  it('orders truncation cuts in the outermost array before nested ones', () => {
    expect(truncationCandidates('{"items": [{"a": 1}, {"b": [{"c": 2}')).toEqual([
      '{"items": [{"a": 1}]}',
      '{"items": [{"a": 1}, {"b": [{"c": 2}]}]}',
    ]);
  });

  it('safeRecoverJSON returns the fallback when recovery fails', () => {
    expect(safeRecoverJSON('nothing', isRecord, { fallback: true })).toEqual({ fallback: true });
  });

  it('recoverJSONOrThrow throws RecoveryFailedError', () => {
    expect(() => recoverJSONOrThrow('nothing', isRecord, 'plan')).toThrow(RecoveryFailedError);
    expect(() => recoverJSONOrThrow('nothing', isRecord, 'plan')).toThrow('Could not recover structured plan (7 chars)');
  });

  it('matchesSchema builds a predicate from a zod schema', () => {
    const isCount = matchesSchema(z.object({ n: z.number() }));
    expect(isCount({ n: 3 })).toBe(true);
    expect(isCount({ n: '3' })).toBe(false);
    expect(recoverJSON('value: {"n": 3}', isCount)?.value).toEqual({ n: 3 });
  });
});
