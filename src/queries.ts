/**
 * Query generation and prioritization for the breadth and depth phases.
 */

import { z } from 'zod';
import { errorMessage } from './errors.js';
import { matchesSchema, recoverJSON } from './recovery.js';
import { DEFAULT_RETRY, type RetryOptions, withRetry } from './retry.js';
import type { Learning, ResearchQuery, SourceMetadata, TextGenerator } from './types/index.js';

export interface PriorityWeights {
  reliability: number;
  specificity: number;
  novelty: number;
  goalClarity: number;
}

export interface QualityWeights {
  learningCount: number;
  reliability: number;
  contentVolume: number;
  domainDiversity: number;
}

export const DEFAULT_PRIORITY_WEIGHTS: PriorityWeights = {
  reliability: 0.3,
  specificity: 0.2,
  novelty: 0.3,
  goalClarity: 0.2,
};

export const DEFAULT_QUALITY_WEIGHTS: QualityWeights = {
  learningCount: 0.3,
  reliability: 0.4,
  contentVolume: 0.2,
  domainDiversity: 0.1,
};

// Novelty only looks at the most recent learnings
export const NOVELTY_WINDOW = 10;
const NOVELTY_OVERLAP_CAP = 50;
const DEPTH_SOURCE_LEARNINGS = 8;
const EXCERPT_LENGTH = 120;

const ENTITY_STOPWORDS = new Set([
  'A', 'An', 'The', 'This', 'That', 'These', 'Those', 'In', 'On', 'At', 'By', 'For', 'From',
  'Of', 'To', 'With', 'As', 'It', 'Its', 'Their', 'Our', 'According', 'However', 'While',
  'During', 'After', 'Before', 'Since', 'Between', 'Over', 'Under', 'About', 'Both', 'Each',
  'Most', 'Many', 'Some', 'Several',
]);

const NUMBER_PATTERN = /[$€£]?\d[\d,]*(?:\.\d+)?\s?(?:%|percent\b|million\b|billion\b|trillion\b)?/gi;
const ENTITY_PATTERN = /\b[A-Z][\w&-]*(?:\s+[A-Z][\w&-]*)*/g;

// ==================== SCORING ====================

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(w => w.length > 0));
}

export function scoreQueryPriority(
  query: Pick<ResearchQuery, 'query' | 'researchGoal' | 'reliabilityThreshold'>,
  learnings: Learning[],
  weights: PriorityWeights = DEFAULT_PRIORITY_WEIGHTS
): number {
  const specificity = Math.min(query.query.length / 100, 1);
  const queryWords = wordSet(query.query);

  let overlap = 0;
  for (const learning of learnings.slice(-NOVELTY_WINDOW)) {
    for (const word of wordSet(learning.content)) {
      if (queryWords.has(word)) overlap++;
    }
  }
  const novelty = Math.max(0, 1 - overlap / NOVELTY_OVERLAP_CAP);
  const goalClarity = Math.min(query.researchGoal.length / 100, 1);

  return (
    weights.reliability * query.reliabilityThreshold +
    weights.specificity * specificity +
    weights.novelty * novelty +
    weights.goalClarity * goalClarity
  );
}

/**
 * Score, sort descending and cap. Ties keep their generated order.
 */
export function prioritizeQueries(
  queries: ResearchQuery[],
  learnings: Learning[],
  cap: number,
  weights: PriorityWeights = DEFAULT_PRIORITY_WEIGHTS
): ResearchQuery[] {
  return queries
    .map(query => ({ ...query, priorityScore: scoreQueryPriority(query, learnings, weights) }))
    .sort((a, b) => b.priorityScore - a.priorityScore)
    .slice(0, Math.max(0, cap));
}

/**
 * Quality of a completed query, 0 when it produced no learnings or sources.
 */
export function calculateQueryQuality(
  learnings: Learning[],
  sources: SourceMetadata[],
  weights: QualityWeights = DEFAULT_QUALITY_WEIGHTS
): number {
  if (learnings.length === 0 || sources.length === 0) return 0;

  const avgReliability = sources.reduce((sum, s) => sum + s.reliabilityScore, 0) / sources.length;
  const totalChars = sources.reduce((sum, s) => sum + s.contentLength, 0);
  const uniqueDomains = new Set(sources.map(s => s.domain)).size;

  return (
    weights.learningCount * Math.min(learnings.length / 10, 1) +
    weights.reliability * avgReliability +
    weights.contentVolume * Math.min(totalChars / 50000, 1) +
    weights.domainDiversity * Math.min(uniqueDomains / 5, 1)
  );
}

// ==================== BREADTH ====================

export interface BreadthOptions {
  maxQueries: number;
  defaultThreshold: number;
  generator?: TextGenerator;
  retry?: RetryOptions;
  sleep?: (ms: number) => Promise<void>;
}

const GeneratedQueriesSchema = z.object({
  queries: z.array(z.object({
    query: z.string().min(1),
    researchGoal: z.string().optional(),
    reliabilityThreshold: z.number().optional(),
  })).min(1),
});

type GeneratedQueries = z.infer<typeof GeneratedQueriesSchema>;

const isGeneratedQueries = matchesSchema<GeneratedQueries>(GeneratedQueriesSchema);

const BREADTH_TEMPLATES: Array<{ build: (topic: string) => string; goal: string }> = [
  { build: topic => `${topic} market size and growth`, goal: 'Quantify current size, growth rates and forecasts' },
  { build: topic => `${topic} key players and competitive landscape`, goal: 'Identify the leading organisations and how they compare' },
  { build: topic => `${topic} latest statistics and data`, goal: 'Collect recent figures from authoritative sources' },
  { build: topic => `${topic} trends and challenges`, goal: 'Identify drivers, risks and emerging trends' },
  { build: topic => `${topic} regional breakdown`, goal: 'Understand geographic and segment differences' },
  { build: topic => `${topic} future outlook and forecast`, goal: 'Gather expert projections for the coming years' },
];

function clampThreshold(value: number | undefined, fallback: number): number {
  const threshold = value ?? fallback;
  return Math.max(0, Math.min(1, threshold));
}

function dedupeQueries(queries: ResearchQuery[]): ResearchQuery[] {
  const seen = new Set<string>();
  return queries.filter(q => {
    const key = q.query.trim().toLowerCase();
    if (!key || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function buildBreadthPrompt(topic: string, keywords: string[], maxQueries: number): string {
  const keywordLine = keywords.length > 0 ? `\nSeed keywords to cover: ${keywords.join(', ')}\n` : '';
  return `
Generate search queries to thoroughly research the following topic: "${topic}"
${keywordLine}
Create specific, targeted search queries. Each query should uncover a different aspect or angle of the topic
(market size, key players, statistics, trends, regional differences, outlook).

Generate up to ${maxQueries} queries.

Respond with JSON only:
{
  "queries": [
    {
      "query": "<the search engine query>",
      "researchGoal": "<what this query should establish and which directions to follow next>",
      "reliabilityThreshold": <minimum source reliability between 0 and 1>
    }
  ]
}
`.trim();
}

export function templateBreadthQueries(topic: string, keywords: string[], defaultThreshold: number): ResearchQuery[] {
  const base = (query: string, researchGoal: string, queryKeywords: string[]): ResearchQuery => ({
    query,
    keywords: queryKeywords,
    researchGoal,
    reliabilityThreshold: defaultThreshold,
    priorityScore: 0,
    phase: 'breadth',
  });

  return dedupeQueries([
    base(topic, `Establish an overview of ${topic}`, keywords),
    ...keywords.map(keyword => base(`${topic} ${keyword}`, `Investigate ${keyword} in the context of ${topic}`, [keyword])),
    ...BREADTH_TEMPLATES.map(t => base(t.build(topic), t.goal, keywords)),
  ]);
}

/**
 * Breadth-phase queries from the topic and seed keywords. Uses the text
 * generator when one is available and falls back to template expansion.
 */
export async function generateBreadthQueries(
  topic: string,
  keywords: string[],
  options: BreadthOptions
): Promise<ResearchQuery[]> {
  const { maxQueries, defaultThreshold, generator } = options;
  if (maxQueries <= 0) return [];

  if (generator) {
    try {
      const prompt = buildBreadthPrompt(topic, keywords, maxQueries);
      const response = await withRetry(
        'breadth query generation',
        () => generator.generate(prompt, { temperature: 0.7 }),
        options.retry ?? DEFAULT_RETRY,
        options.sleep
      );
      const recovered = recoverJSON(response, isGeneratedQueries);
      if (recovered) {
        const generated = dedupeQueries(recovered.value.queries.map(item => ({
          query: item.query.trim(),
          keywords,
          researchGoal: item.researchGoal?.trim() || `Research ${item.query.trim()}`,
          reliabilityThreshold: clampThreshold(item.reliabilityThreshold, defaultThreshold),
          priorityScore: 0,
          phase: 'breadth' as const,
        })));
        if (generated.length > 0) {
          console.error(`[Queries] Generated ${generated.length} breadth queries via ${generator.name}`);
          return generated.slice(0, maxQueries);
        }
      }
      console.error('[Queries] Could not parse generated queries, using templates');
    } catch (error) {
      console.error(`[Queries] Query generation failed, using templates: ${errorMessage(error)}`);
    }
  }

  return templateBreadthQueries(topic, keywords, defaultThreshold).slice(0, maxQueries);
}

// ==================== DEPTH ====================

export interface DepthOptions {
  reliabilityFloor: number;
}

function cleanNumber(token: string): string {
  return token.trim().replace(/[,.]+$/, '');
}

/**
 * Numeric tokens and capitalised entity phrases in a piece of text, in order
 * of appearance.
 */
export function extractAnchors(text: string): { entities: string[]; numbers: string[] } {
  const numbers = [...new Set(
    [...text.matchAll(NUMBER_PATTERN)].map(m => cleanNumber(m[0])).filter(n => /\d/.test(n))
  )];

  const entities: string[] = [];
  for (const match of text.matchAll(ENTITY_PATTERN)) {
    const words = match[0].split(/\s+/);
    while (words.length > 0 && ENTITY_STOPWORDS.has(words[0])) words.shift();
    const entity = words.join(' ').replace(/[.,]+$/, '');
    if (entity.length >= 2 && !entities.includes(entity)) entities.push(entity);
  }

  return { entities, numbers };
}

function excerpt(text: string): string {
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}...` : text;
}

/**
 * Depth-phase follow-ups anchored on entities and figures from the most
 * reliable learnings, plus a "latest data" and a "comparison" query.
 * Returns nothing without learnings: depth queries only follow a breadth phase.
 */
export function generateDepthQueries(
  learnings: Learning[],
  topic: string,
  levels: number,
  options: DepthOptions
): ResearchQuery[] {
  if (learnings.length === 0 || levels < 1) return [];

  const threshold = options.reliabilityFloor;
  const maxAnchored = levels * 2;
  const ranked = [...learnings]
    .sort((a, b) => b.reliability - a.reliability)
    .slice(0, DEPTH_SOURCE_LEARNINGS);

  const make = (query: string, researchGoal: string, keywords: string[], parentGoal?: string): ResearchQuery => ({
    query,
    keywords,
    researchGoal,
    reliabilityThreshold: threshold,
    priorityScore: 0,
    parentGoal,
    phase: 'depth',
  });

  const anchored: ResearchQuery[] = [];
  for (const learning of ranked) {
    if (anchored.length >= maxAnchored) break;
    const { entities, numbers } = extractAnchors(learning.content);
    const entity = entities[0];
    const number = numbers[0];
    const parent = excerpt(learning.content);

    if (entity && number) {
      anchored.push(make(`${entity} ${number} ${topic} verification`, `Verify the figure: ${parent}`, [entity, number], parent));
    } else if (entity) {
      anchored.push(make(`${entity} ${topic} in-depth analysis`, `Expand on ${entity}: ${parent}`, [entity], parent));
    } else if (number) {
      anchored.push(make(`${topic} ${number} source data`, `Find the primary source for ${number}: ${parent}`, [number], parent));
    }
  }

  return dedupeQueries([
    ...anchored,
    make(`${topic} latest data and statistics`, 'Find the most recent data points and updates', []),
    make(`${topic} comparison with alternatives`, 'Compare against alternatives, competitors and benchmarks', []),
  ]);
}
