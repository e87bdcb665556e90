/**
 * Structured output recovery
 *
 * Text generators are not bound to return well-formed JSON. Output gets wrapped
 * in prose or markdown fences, carries trailing commas or unescaped quotes, or is
 * cut off at the output-token ceiling. recoverJSON runs an ordered list of
 * strategies, cheapest and least destructive first, and returns the first result
 * that parses and satisfies the caller's predicate.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { RecoveryFailedError } from './errors.js';

export type Predicate<T> = (value: unknown) => value is T;

export interface RecoveryResult<T> {
  value: T;
  strategy: string;
}

export interface RecoveryStrategy {
  name: string;
  /** Returns a parsed candidate, or undefined when the strategy has nothing */
  recover: (text: string, accept: (value: unknown) => boolean) => unknown;
}

export interface BalancedSpan {
  start: number;
  end: number;      // exclusive
  depth: number;    // 0 for top-level objects
}

const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;
const PREAMBLE = /^\s*here (?:is|are) (?:the|your)[^\n:]*:\s*/i;
const FENCED_BLOCK = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/g;
const VALID_ESCAPES = '"\\/bfnrtu';
const MAX_SPAN_CANDIDATES = 100;
const MAX_TRUNCATION_CANDIDATES = 50;

// ==================== HELPERS ====================

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseFirstAccepted(candidates: string[], accept: (value: unknown) => boolean): unknown {
  for (const candidate of candidates) {
    const value = tryParse(candidate);
    if (value !== undefined && accept(value)) return value;
  }
  return undefined;
}

function nextNonWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && /\s/.test(text.charAt(i))) i++;
  return i;
}

/**
 * Decide whether a quote inside a string ends it, judging by what follows.
 * A quote followed by a structural character ends the string; anything else
 * is treated as an unescaped quote belonging to the value.
 */
function quoteClosesString(text: string, afterQuote: number): boolean {
  const i = nextNonWhitespace(text, afterQuote);
  if (i >= text.length) return true;
  const ch = text.charAt(i);
  if (ch === ':' || ch === '}' || ch === ']') return true;
  if (ch !== ',') return false;

  const j = nextNonWhitespace(text, i + 1);
  if (j >= text.length) return true;
  const next = text.charAt(j);
  if ('"{[}]-'.includes(next) || /\d/.test(next)) return true;
  const rest = text.slice(j, j + 6);
  return /^(true|false|null)\b/.test(rest);
}

export function cleanResponseText(text: string): string {
  return text.replace(CONTROL_CHARS, '').replace(PREAMBLE, '').trim();
}

export function extractFencedBlocks(text: string): string[] {
  const blocks: string[] = [];
  for (const match of text.matchAll(FENCED_BLOCK)) {
    const body = match[1].trim();
    if (body) blocks.push(body);
  }
  return blocks;
}

/** First `{` to last `}`, or null when the text has no such span */
export function outerBraceSpan(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

function trimToBraces(text: string): string {
  return outerBraceSpan(text) ?? text.trim();
}

// ==================== REPAIR ====================

/**
 * Rewrites the common generator mistakes: leading and trailing prose, raw
 * newlines and tabs inside strings, unescaped inner quotes, invalid escapes,
 * and trailing commas. Whitespace runs between tokens collapse to one space.
 */
export function repairJsonAggressive(text: string): string {
  const span = trimToBraces(text);
  let out = '';
  let inString = false;

  for (let i = 0; i < span.length; i++) {
    const ch = span.charAt(i);

    if (inString) {
      if (ch === '\\') {
        const escaped = span.charAt(i + 1);
        out += VALID_ESCAPES.includes(escaped) && escaped !== '' ? `\\${escaped}` : `\\\\${escaped}`;
        i++;
      } else if (ch === '"') {
        if (quoteClosesString(span, i + 1)) {
          inString = false;
          out += ch;
        } else {
          out += '\\"';
        }
      } else if (ch === '\n') {
        out += '\\n';
      } else if (ch === '\r') {
        out += '\\r';
      } else if (ch === '\t') {
        out += '\\t';
      } else {
        out += ch;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
    } else if (ch === ',') {
      const next = span.charAt(nextNonWhitespace(span, i + 1));
      if (next !== '}' && next !== ']') out += ch;
    } else if (/\s/.test(ch)) {
      if (!out.endsWith(' ')) out += ' ';
    } else {
      out += ch;
    }
  }

  return out;
}

/** Trims leading/trailing junk and strips trailing commas; string contents are left alone */
export function repairJsonMinimal(text: string): string {
  return trimToBraces(text).replace(/,\s*([}\]])/g, '$1');
}

// ==================== STRUCTURAL SCANS ====================

/**
 * Every balanced `{...}` span in the text. Braces inside string literals are
 * ignored; quotes only count once the scan is inside a structure, so prose
 * before the payload cannot flip the string state.
 */
export function findBalancedSpans(text: string): BalancedSpan[] {
  const spans: BalancedSpan[] = [];
  const stack: Array<{ char: string; index: number }> = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"' && stack.length > 0) {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      stack.push({ char: ch, index: i });
    } else if (ch === '}' || ch === ']') {
      const open = stack.pop();
      if (open && open.char === '{' && ch === '}') {
        spans.push({ start: open.index, end: i + 1, depth: stack.length });
      }
    }
  }

  return spans;
}

/**
 * Candidate texts for a payload cut off mid-generation. Each candidate ends
 * right after an object that closed directly inside an array, with the
 * brackets still open at that point closed in order. Cuts in the shallowest
 * array come first, latest first, so a partial item is never completed from
 * an object nested inside it.
 */
export function truncationCandidates(text: string): string[] {
  const begin = text.indexOf('{');
  if (begin === -1) return [];

  const cuts: Array<{ end: number; depth: number; closers: string }> = [];
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = begin; i < text.length; i++) {
    const ch = text.charAt(i);

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      stack.push(ch);
    } else if (ch === '}' || ch === ']') {
      const open = stack.pop();
      if (open === '{' && stack[stack.length - 1] === '[') {
        const closers = [...stack].reverse().map(c => (c === '{' ? '}' : ']')).join('');
        cuts.push({ end: i + 1, depth: stack.length, closers });
      }
      if (stack.length === 0) break;
    }
  }

  return cuts
    .sort((a, b) => a.depth - b.depth || b.end - a.end)
    .slice(0, MAX_TRUNCATION_CANDIDATES)
    .map(cut => text.slice(begin, cut.end) + cut.closers);
}

// ==================== STRATEGIES ====================

export const RECOVERY_STRATEGIES: readonly RecoveryStrategy[] = [
  {
    name: 'direct',
    recover: text => tryParse(text),
  },
  {
    name: 'fenced',
    recover: (text, accept) => parseFirstAccepted(extractFencedBlocks(text), accept),
  },
  {
    name: 'outer-span',
    recover: text => {
      const span = outerBraceSpan(text);
      return span ? tryParse(span) : undefined;
    },
  },
  {
    name: 'aggressive-repair',
    recover: text => {
      const span = outerBraceSpan(text);
      return span ? tryParse(repairJsonAggressive(span)) : undefined;
    },
  },
  {
    name: 'balanced-object',
    recover: text => {
      const first = findBalancedSpans(text).find(span => span.depth === 0);
      return first ? tryParse(repairJsonAggressive(text.slice(first.start, first.end))) : undefined;
    },
  },
  {
    name: 'largest-span',
    recover: (text, accept) => {
      const spans = findBalancedSpans(text)
        .sort((a, b) => (b.end - b.start) - (a.end - a.start))
        .slice(0, MAX_SPAN_CANDIDATES);
      for (const span of spans) {
        const raw = text.slice(span.start, span.end);
        const value = parseFirstAccepted([raw, repairJsonAggressive(raw), repairJsonMinimal(raw)], accept);
        if (value !== undefined) return value;
      }
      return undefined;
    },
  },
  {
    name: 'truncation',
    recover: (text, accept) => {
      for (const candidate of truncationCandidates(text)) {
        const first = findBalancedSpans(candidate).find(span => span.depth === 0);
        if (!first) continue;
        const raw = candidate.slice(first.start, first.end);
        const value = parseFirstAccepted([raw, repairJsonAggressive(raw), repairJsonMinimal(raw)], accept);
        if (value !== undefined) return value;
      }
      return undefined;
    },
  },
];

// ==================== DISPATCH ====================

/**
 * Recover a structured value from free-form text.
 * Returns null when no strategy produced a value the predicate accepts.
 */
export function recoverJSON<T>(
  text: string,
  predicate: Predicate<T>,
  strategies: readonly RecoveryStrategy[] = RECOVERY_STRATEGIES
): RecoveryResult<T> | null {
  const cleaned = cleanResponseText(text);
  if (!cleaned) return null;

  for (let i = 0; i < strategies.length; i++) {
    const strategy = strategies[i];
    const value = strategy.recover(cleaned, predicate);
    if (value !== undefined && predicate(value)) {
      if (i > 0) {
        console.error(`[Recovery] Salvaged structured output with strategy "${strategy.name}"`);
      }
      return { value, strategy: strategy.name };
    }
  }

  return null;
}

export function recoverJSONOrThrow<T>(text: string, predicate: Predicate<T>, label = 'response'): RecoveryResult<T> {
  const result = recoverJSON(text, predicate);
  if (!result) {
    throw new RecoveryFailedError(
      `Could not recover structured ${label} (${text.length} chars)`,
      RECOVERY_STRATEGIES.map(s => s.name)
    );
  }
  return result;
}

/**
 * Like recoverJSON but never fails: the fallback is returned when nothing matches.
 */
export function safeRecoverJSON<T>(text: string, predicate: Predicate<T>, fallback: T): T {
  const result = recoverJSON(text, predicate);
  if (result) return result.value;
  console.error('[Recovery] All strategies exhausted, using fallback value');
  return fallback;
}

/** Build a predicate from a zod schema. Schemas must not transform or default. */
export function matchesSchema<T>(schema: ZodType<T, ZodTypeDef, T>): Predicate<T> {
  return (value: unknown): value is T => schema.safeParse(value).success;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
