/**
 * Search result processing: source reliability, learning extraction and the
 * run-wide learning set.
 */

import { z } from 'zod';
import { errorMessage } from './errors.js';
import { matchesSchema, recoverJSON } from './recovery.js';
import { DEFAULT_RETRY, type RetryOptions, withRetry } from './retry.js';
import type { Learning, ResearchQuery, SearchResult, SourceMetadata, TextGenerator } from './types/index.js';

export interface ReliabilityAssessment {
  score: number;
  reasoning: string;
}

export interface SourceReliabilityEvaluator {
  evaluate(domain: string, topic: string): Promise<ReliabilityAssessment>;
}

export interface ProcessingOptions {
  reliability: SourceReliabilityEvaluator;
  generator?: TextGenerator;
  maxSourcesPerBatch: number;   // Sources fed to one extraction call
  maxSourceChars: number;       // Per-source content cap
  maxBatchChars: number;        // Combined prompt content cap
  defaultConfidence: number;    // Generated learnings without a confidence
  fallbackConfidence: number;   // Line-based learnings
  maxLearnings: number;
  retry?: RetryOptions;
  sleep?: (ms: number) => Promise<void>;
}

export interface ProcessedResults {
  learnings: Learning[];
  sources: SourceMetadata[];
}

export const DEFAULT_PROCESSING: Omit<ProcessingOptions, 'reliability' | 'generator'> = {
  maxSourcesPerBatch: 5,
  maxSourceChars: 25000,
  maxBatchChars: 15000,
  defaultConfidence: 0.7,
  fallbackConfidence: 0.6,
  maxLearnings: 20,
};

// ==================== SOURCE RELIABILITY ====================

const KNOWN_DOMAINS: Record<string, ReliabilityAssessment> = {
  'nature.com': { score: 0.95, reasoning: 'Peer-reviewed scientific journal' },
  'sciencedirect.com': { score: 0.9, reasoning: 'Peer-reviewed research publisher' },
  'reuters.com': { score: 0.9, reasoning: 'International news agency with editorial standards' },
  'apnews.com': { score: 0.9, reasoning: 'International news agency with editorial standards' },
  'worldbank.org': { score: 0.9, reasoning: 'Intergovernmental statistics provider' },
  'oecd.org': { score: 0.9, reasoning: 'Intergovernmental statistics provider' },
  'imf.org': { score: 0.9, reasoning: 'Intergovernmental statistics provider' },
  'bloomberg.com': { score: 0.85, reasoning: 'Established financial news organisation' },
  'ft.com': { score: 0.85, reasoning: 'Established financial news organisation' },
  'wsj.com': { score: 0.85, reasoning: 'Established financial news organisation' },
  'economist.com': { score: 0.85, reasoning: 'Established news magazine' },
  'bbc.com': { score: 0.85, reasoning: 'Public broadcaster with editorial standards' },
  'arxiv.org': { score: 0.8, reasoning: 'Preprint server, not peer reviewed' },
  'statista.com': { score: 0.8, reasoning: 'Statistics aggregator citing primary sources' },
  'mckinsey.com': { score: 0.8, reasoning: 'Consultancy research' },
  'gartner.com': { score: 0.8, reasoning: 'Industry analyst firm' },
  'forbes.com': { score: 0.7, reasoning: 'Business media with mixed contributor content' },
  'techcrunch.com': { score: 0.7, reasoning: 'Technology trade press' },
  'wikipedia.org': { score: 0.65, reasoning: 'Community-edited encyclopedia' },
  'medium.com': { score: 0.4, reasoning: 'Self-published blog platform' },
  'reddit.com': { score: 0.3, reasoning: 'User-generated discussion forum' },
  'quora.com': { score: 0.3, reasoning: 'User-generated Q&A site' },
};

const SUFFIX_RULES: Array<{ suffix: string; assessment: ReliabilityAssessment }> = [
  { suffix: '.gov', assessment: { score: 0.9, reasoning: 'Government domain' } },
  { suffix: '.mil', assessment: { score: 0.85, reasoning: 'Government domain' } },
  { suffix: '.edu', assessment: { score: 0.85, reasoning: 'Academic institution' } },
  { suffix: '.int', assessment: { score: 0.85, reasoning: 'International organisation' } },
  { suffix: '.ac.uk', assessment: { score: 0.85, reasoning: 'Academic institution' } },
];

export function extractDomain(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return null;
  }
}

/**
 * Static reliability for well-known domains, matching parent domains too
 * (en.wikipedia.org resolves to wikipedia.org). Null when unknown.
 */
export function lookupDomainReliability(domain: string): ReliabilityAssessment | null {
  const parts = domain.toLowerCase().split('.');
  for (let i = 0; i < parts.length - 1; i++) {
    const candidate = parts.slice(i).join('.');
    const known = KNOWN_DOMAINS[candidate];
    if (known) return known;
  }
  const rule = SUFFIX_RULES.find(r => domain.endsWith(r.suffix));
  return rule ? rule.assessment : null;
}

const ReliabilityResponseSchema = z.object({
  score: z.number(),
  reasoning: z.string().optional(),
});

type ReliabilityResponse = z.infer<typeof ReliabilityResponseSchema>;

const isReliabilityResponse = matchesSchema<ReliabilityResponse>(ReliabilityResponseSchema);

function buildReliabilityPrompt(domain: string, topic: string): string {
  return `
Evaluate the reliability of the source domain "${domain}" for research about: "${topic}"

Scale:
- 0.9-1.0: peer-reviewed journals, primary sources, official statistics
- 0.7-0.89: respected news organisations and analyst firms
- 0.5-0.69: industry blogs with editorial oversight
- 0.3-0.49: personal blogs, commercial landing pages
- 0-0.29: known misinformation sources

Respond with JSON only: {"score": <0-1>, "reasoning": "<one sentence>"}
`.trim();
}

/**
 * Looks domains up in the static table first. Unknown domains are scored by
 * the text generator when one is configured, else get the default score.
 * Results are cached per evaluator instance.
 */
export class DomainReliabilityEvaluator implements SourceReliabilityEvaluator {
  private cache = new Map<string, ReliabilityAssessment>();

  constructor(
    private readonly generator?: TextGenerator,
    private readonly defaultScore = 0.5
  ) {}

  async evaluate(domain: string, topic: string): Promise<ReliabilityAssessment> {
    const known = lookupDomainReliability(domain);
    if (known) return known;

    const cached = this.cache.get(domain);
    if (cached) return cached;

    let assessment: ReliabilityAssessment = { score: this.defaultScore, reasoning: 'No reliability data for this domain' };
    if (this.generator) {
      try {
        const response = await this.generator.generate(buildReliabilityPrompt(domain, topic), { temperature: 0.2 });
        const recovered = recoverJSON(response, isReliabilityResponse);
        if (recovered) {
          assessment = {
            score: Math.max(0, Math.min(1, recovered.value.score)),
            reasoning: recovered.value.reasoning ?? 'Scored by text generator',
          };
        }
      } catch (error) {
        console.error(`[Sources] Reliability evaluation failed for ${domain}: ${errorMessage(error)}`);
      }
    }

    this.cache.set(domain, assessment);
    return assessment;
  }
}

// ==================== LEARNING EXTRACTION ====================

const GeneratedLearningsSchema = z.object({
  learnings: z.array(z.object({
    content: z.string(),
    confidence: z.number().optional(),
    sources: z.array(z.string()).optional(),
  })),
});

type GeneratedLearnings = z.infer<typeof GeneratedLearningsSchema>;

export const isGeneratedLearnings = matchesSchema<GeneratedLearnings>(GeneratedLearningsSchema);

const LIST_MARKER = /^(?:[-•*]+|\d+[.)])\s*/;
const JSON_KEY_LINE = /^"[\w ]+"\s*:/;
const MIN_LINE_LENGTH = 20;
const MAX_LINE_LENGTH = 500;

/**
 * Line-based fallback: bullet and number markers and wrapping quotes are
 * stripped, lines of 21-499 chars kept, up to `limit`.
 */
export function extractLineLearnings(text: string, sources: string[], confidence: number, limit = 20): Learning[] {
  const learnings: Learning[] = [];
  for (const raw of text.split('\n')) {
    const trimmed = raw.trim();
    if (!trimmed || JSON_KEY_LINE.test(trimmed) || /^[#{}[\]|]/.test(trimmed)) continue;

    const line = trimmed.replace(LIST_MARKER, '').replace(/^["']+|["']+$/g, '').trim();
    if (line.length <= MIN_LINE_LENGTH || line.length >= MAX_LINE_LENGTH) continue;

    learnings.push({ content: line, reliability: confidence, sources: [...sources] });
    if (learnings.length >= limit) break;
  }
  return learnings;
}

export function buildContentBatch(items: Array<{ domain: string; score: number; content: string }>, maxChars: number): string {
  const combined = items
    .map((item, i) => `Source ${i + 1} (${item.domain}, reliability ${item.score.toFixed(2)}):\n${item.content}`)
    .join('\n\n---\n\n');
  return combined.length > maxChars ? `${combined.slice(0, maxChars)}...` : combined;
}

export function buildLearningsPrompt(query: ResearchQuery, batch: string, maxLearnings: number): string {
  return `
Given the following contents from a web search for the query "${query.query}", extract a list of learnings.
Return at most ${maxLearnings} learnings, fewer if the contents are thin. Each learning must be unique,
concise and information dense. Include entities (people, companies, products, places) and exact
metrics, numbers and dates.

Research goal: ${query.researchGoal}

Contents:
${batch}

Respond with JSON only:
{
  "learnings": [
    { "content": "<learning>", "confidence": <0-1>, "sources": ["<source domain>"] }
  ]
}
`.trim();
}

function dedupeByContent(learnings: Learning[]): Learning[] {
  const seen = new Set<string>();
  return learnings.filter(l => {
    if (seen.has(l.content)) return false;
    seen.add(l.content);
    return true;
  });
}

/**
 * Map the domains or URLs a generator cites back to the batch URLs.
 * Uncited or unmatched learnings are attributed to the whole batch.
 */
function citesSource(citation: string, source: SourceMetadata): boolean {
  const ref = citation.trim().toLowerCase().replace(/^www\./, '');
  return (
    ref === source.url.toLowerCase() ||
    ref === source.domain ||
    ref.endsWith(`.${source.domain}`) ||
    extractDomain(ref) === source.domain
  );
}

function resolveSources(cited: string[] | undefined, batch: SourceMetadata[]): string[] {
  const matched = batch
    .filter(source => (cited ?? []).some(c => citesSource(c, source)))
    .map(source => source.url);
  return matched.length > 0 ? matched : batch.map(source => source.url);
}

/**
 * Turn raw search results into reliability-filtered learnings.
 * Sources below the query's threshold are dropped before extraction and
 * learnings below it are dropped after.
 */
export async function processSearchResults(
  query: ResearchQuery,
  results: SearchResult[],
  options: ProcessingOptions
): Promise<ProcessedResults> {
  const scored: Array<{ metadata: SourceMetadata; content: string }> = [];

  for (const result of results) {
    const content = result.content.trim();
    const domain = extractDomain(result.url);
    if (!content || !domain) continue;

    const assessment = await options.reliability.evaluate(domain, query.query);
    scored.push({
      metadata: {
        url: result.url,
        domain,
        reliabilityScore: assessment.score,
        contentLength: content.length,
        reliabilityReasoning: assessment.reasoning,
      },
      content: content.slice(0, options.maxSourceChars),
    });
  }

  const kept = scored
    .filter(item => item.metadata.reliabilityScore >= query.reliabilityThreshold)
    .sort((a, b) => b.metadata.reliabilityScore - a.metadata.reliabilityScore);

  console.error(`[Sources] "${query.query}": ${results.length} results, ${kept.length} above reliability ${query.reliabilityThreshold}`);
  if (kept.length === 0) return { learnings: [], sources: [] };

  const batch = kept.slice(0, options.maxSourcesPerBatch);
  const batchSources = batch.map(item => item.metadata);
  let learnings: Learning[] | null = null;

  if (options.generator) {
    const generator = options.generator;
    const text = buildContentBatch(
      batch.map(item => ({ domain: item.metadata.domain, score: item.metadata.reliabilityScore, content: item.content })),
      options.maxBatchChars
    );
    try {
      const prompt = buildLearningsPrompt(query, text, options.maxLearnings);
      const response = await withRetry(
        `learning extraction for "${query.query}"`,
        () => generator.generate(prompt, { temperature: 0.3 }),
        options.retry ?? DEFAULT_RETRY,
        options.sleep
      );
      const recovered = recoverJSON(response, isGeneratedLearnings);
      learnings = recovered
        ? recovered.value.learnings
            .filter(item => item.content.trim().length > 0)
            .map(item => ({
              content: item.content.trim(),
              reliability: Math.max(0, Math.min(1, item.confidence ?? options.defaultConfidence)),
              sources: resolveSources(item.sources, batchSources),
            }))
        : extractLineLearnings(response, batchSources.map(s => s.url), options.fallbackConfidence, options.maxLearnings);
    } catch (error) {
      console.error(`[Sources] Learning extraction failed, using line fallback: ${errorMessage(error)}`);
    }
  }

  if (learnings === null) {
    learnings = [];
    for (const item of batch) {
      const remaining = options.maxLearnings - learnings.length;
      if (remaining <= 0) break;
      learnings.push(...extractLineLearnings(item.content, [item.metadata.url], options.fallbackConfidence, remaining));
    }
  }

  const retained = dedupeByContent(learnings)
    .filter(l => l.reliability >= query.reliabilityThreshold)
    .slice(0, options.maxLearnings);

  return { learnings: retained, sources: kept.map(item => item.metadata) };
}

// ==================== RUN-WIDE SET ====================

/**
 * Learnings for one run, keyed by exact content. Only grows; a repeated
 * learning adds its source URLs to the existing entry.
 */
export class LearningSet {
  private byContent = new Map<string, Learning>();

  get size(): number {
    return this.byContent.size;
  }

  add(learning: Learning): boolean {
    const existing = this.byContent.get(learning.content);
    if (existing) {
      for (const url of learning.sources) {
        if (!existing.sources.includes(url)) existing.sources.push(url);
      }
      return false;
    }
    this.byContent.set(learning.content, { ...learning, sources: [...learning.sources] });
    return true;
  }

  addAll(learnings: Learning[]): number {
    let added = 0;
    for (const learning of learnings) {
      if (this.add(learning)) added++;
    }
    return added;
  }

  toArray(): Learning[] {
    return [...this.byContent.values()].map(l => ({ ...l, sources: [...l.sources] }));
  }
}
