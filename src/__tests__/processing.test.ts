import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  DEFAULT_PROCESSING,
  DomainReliabilityEvaluator,
  LearningSet,
  extractDomain,
  extractLineLearnings,
  lookupDomainReliability,
  processSearchResults,
  type ProcessingOptions,
} from '../processing.js';
import type { ResearchQuery, SearchResult } from '../types/index.js';

const REUTERS_CONTENT = 'Global EV sales reached 14 million units in 2023.\nChina accounted for roughly 60 percent of sales.';
const BLOG_CONTENT = 'Battery prices fell sharply over the last decade.';

const RESULTS: SearchResult[] = [
  { url: 'https://www.reuters.com/a', title: 'EV sales', content: REUTERS_CONTENT },
  { url: 'https://reddit.com/r/ev', title: 'Thread', content: 'Everyone I know is buying an EV this year, trust me.' },
  { url: 'https://example.com/post', title: 'Blog', content: BLOG_CONTENT },
];

function query(reliabilityThreshold: number): ResearchQuery {
  return {
    query: 'EV sales 2023',
    keywords: [],
    researchGoal: 'Quantify EV sales',
    reliabilityThreshold,
    priorityScore: 0,
    phase: 'breadth',
  };
}

function fakeGenerator(respond: (prompt: string) => Promise<string>) {
  return { name: 'fake', generate: vi.fn(respond) };
}

function options(overrides: Partial<ProcessingOptions> = {}): ProcessingOptions {
  return {
    ...DEFAULT_PROCESSING,
    reliability: new DomainReliabilityEvaluator(),
    retry: { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1 },
    sleep: async () => {},
    ...overrides,
  };
}

describe('processSearchResults', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('drops sources below the threshold and extracts line learnings without a generator', async () => {
    const result = await processSearchResults(query(0.5), RESULTS, options());

    expect(result.sources).toEqual([
      {
        url: 'https://www.reuters.com/a',
        domain: 'reuters.com',
        reliabilityScore: 0.9,
        contentLength: REUTERS_CONTENT.length,
        reliabilityReasoning: 'International news agency with editorial standards',
      },
      {
        url: 'https://example.com/post',
        domain: 'example.com',
        reliabilityScore: 0.5,
        contentLength: BLOG_CONTENT.length,
        reliabilityReasoning: 'No reliability data for this domain',
      },
    ]);
    expect(result.learnings).toEqual([
      { content: 'Global EV sales reached 14 million units in 2023.', reliability: 0.6, sources: ['https://www.reuters.com/a'] },
      { content: 'China accounted for roughly 60 percent of sales.', reliability: 0.6, sources: ['https://www.reuters.com/a'] },
      { content: BLOG_CONTENT, reliability: 0.6, sources: ['https://example.com/post'] },
    ]);
  });

  it('keeps generated learnings above the threshold and resolves cited sources', async () => {
    const generator = fakeGenerator(async () => JSON.stringify({
      learnings: [
        { content: 'Global EV sales reached 14 million units in 2023.', confidence: 0.9, sources: ['reuters.com'] },
        { content: 'A new budget model is rumoured.', confidence: 0.2 },
        { content: 'Global EV sales reached 14 million units in 2023.', confidence: 0.8 },
      ],
    }));

    const result = await processSearchResults(query(0.5), RESULTS, options({ generator }));

    expect(result.learnings).toEqual([
      { content: 'Global EV sales reached 14 million units in 2023.', reliability: 0.9, sources: ['https://www.reuters.com/a'] },
    ]);
    expect(result.sources).toHaveLength(2);
    expect(generator.generate).toHaveBeenCalledTimes(1);
    expect(generator.generate.mock.calls[0][0]).toContain('Source 1 (reuters.com, reliability 0.90)');
  });

  it('matches cited domains exactly rather than by substring', async () => {
    const results: SearchResult[] = [
      { url: 'https://www.ft.com/a', title: 'FT', content: 'Fleet electrification budgets rose in 2024.' },
      { url: 'https://www.microsoft.com/b', title: 'Microsoft', content: 'Cloud demand from automakers doubled.' },
    ];
    const generator = fakeGenerator(async () => JSON.stringify({
      learnings: [
        { content: 'Cloud demand from automakers doubled.', confidence: 0.9, sources: ['microsoft.com'] },
        { content: 'Fleet electrification budgets rose in 2024.', confidence: 0.9, sources: ['https://www.ft.com/a'] },
        { content: 'Automaker cloud contracts grew.', confidence: 0.9, sources: ['blog.microsoft.com'] },
      ],
    }));

    const result = await processSearchResults(query(0.5), results, options({ generator }));

    expect(result.learnings.map(l => l.sources)).toEqual([
      ['https://www.microsoft.com/b'],
      ['https://www.ft.com/a'],
      ['https://www.microsoft.com/b'],
    ]);
  });

  it('attributes uncited learnings to the whole batch', async () => {
    const generator = fakeGenerator(async () => '{"learnings": [{"content": "EV sales grew strongly in every region."}]}');

    const result = await processSearchResults(query(0.5), RESULTS, options({ generator }));

    expect(result.learnings).toEqual([
      {
        content: 'EV sales grew strongly in every region.',
        reliability: 0.7,
        sources: ['https://www.reuters.com/a', 'https://example.com/post'],
      },
    ]);
  });

  it('falls back to line extraction on a prose response', async () => {
    const generator = fakeGenerator(async () => 'Key findings:\n- Charging stations doubled across Europe in 2023.\n- ok');

    const result = await processSearchResults(query(0.5), RESULTS, options({ generator }));

    expect(result.learnings).toEqual([
      {
        content: 'Charging stations doubled across Europe in 2023.',
        reliability: 0.6,
        sources: ['https://www.reuters.com/a', 'https://example.com/post'],
      },
    ]);
  });

  it('falls back to per-source lines when the generator fails', async () => {
    const generator = fakeGenerator(async () => {
      throw new Error('provider down');
    });

    const result = await processSearchResults(query(0.5), RESULTS, options({ generator }));

    expect(result.learnings.map(l => l.content)).toEqual([
      'Global EV sales reached 14 million units in 2023.',
      'China accounted for roughly 60 percent of sales.',
      BLOG_CONTENT,
    ]);
  });

  it('returns nothing and skips extraction when every source is below the threshold', async () => {
    const generator = fakeGenerator(async () => '{"learnings": []}');

    const result = await processSearchResults(query(0.95), RESULTS, options({ generator }));

    expect(result).toEqual({ learnings: [], sources: [] });
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('skips results without content or a parseable URL', async () => {
    const result = await processSearchResults(query(0), [
      { url: 'not a url', title: '', content: 'Some content that is long enough to keep.' },
      { url: 'https://reuters.com/b', title: '', content: '   ' },
    ], options());

    expect(result).toEqual({ learnings: [], sources: [] });
  });
});

// ==================== SOURCE RELIABILITY ====================

describe('source reliability', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('normalises domains from URLs', () => {
    expect(extractDomain('https://www.Example.com/x')).toBe('example.com');
    expect(extractDomain('not a url')).toBeNull();
  });

  it('matches parent domains and institutional suffixes', () => {
    expect(lookupDomainReliability('en.wikipedia.org')?.score).toBe(0.65);
    expect(lookupDomainReliability('data.census.gov')?.score).toBe(0.9);
    expect(lookupDomainReliability('unknown.io')).toBeNull();
  });

  it('scores unknown domains with the generator, clamps and caches', async () => {
    const generator = fakeGenerator(async () => '{"score": 1.3, "reasoning": "Trade association"}');
    const evaluator = new DomainReliabilityEvaluator(generator);

    expect(await evaluator.evaluate('evtrade.org', 'EV sales')).toEqual({ score: 1, reasoning: 'Trade association' });
    expect(await evaluator.evaluate('evtrade.org', 'EV sales')).toEqual({ score: 1, reasoning: 'Trade association' });
    expect(generator.generate).toHaveBeenCalledTimes(1);
  });

  it('does not ask the generator about known domains', async () => {
    const generator = fakeGenerator(async () => '{"score": 0.1}');
    const evaluator = new DomainReliabilityEvaluator(generator);

    expect((await evaluator.evaluate('reuters.com', 'EV sales')).score).toBe(0.9);
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('uses the default score when the generator fails', async () => {
    const generator = fakeGenerator(async () => {
      throw new Error('timeout');
    });
    const evaluator = new DomainReliabilityEvaluator(generator, 0.4);

    expect((await evaluator.evaluate('evtrade.org', 'EV sales')).score).toBe(0.4);
  });
});

// ==================== LINE FALLBACK AND LEARNING SET ====================

describe('learning helpers', () => {
  it('strips list markers and quotes and skips structural lines', () => {
    const text = [
      '# Findings',
      '1. Solar capacity grew 30 percent last year.',
      '"key": "value that should not become a learning"',
      '"quoted line that is long enough"',
      '* short',
      '{',
    ].join('\n');

    expect(extractLineLearnings(text, ['https://example.com'], 0.6).map(l => l.content)).toEqual([
      'Solar capacity grew 30 percent last year.',
      'quoted line that is long enough',
    ]);
  });

  it('stops at the limit', () => {
    const text = Array.from({ length: 5 }, (_, i) => `This is learning number ${i} from the text`).join('\n');
    expect(extractLineLearnings(text, [], 0.6, 2)).toHaveLength(2);
  });

  it('merges sources of repeated learnings', () => {
    const set = new LearningSet();

    expect(set.add({ content: 'A', reliability: 0.8, sources: ['u1'] })).toBe(true);
    expect(set.add({ content: 'A', reliability: 0.5, sources: ['u1', 'u2'] })).toBe(false);
    expect(set.addAll([{ content: 'B', reliability: 0.7, sources: [] }])).toBe(1);

    expect(set.size).toBe(2);
    expect(set.toArray()).toEqual([
      { content: 'A', reliability: 0.8, sources: ['u1', 'u2'] },
      { content: 'B', reliability: 0.7, sources: [] },
    ]);
  });
});
