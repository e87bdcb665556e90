import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  calculateQueryQuality,
  extractAnchors,
  generateBreadthQueries,
  generateDepthQueries,
  prioritizeQueries,
  scoreQueryPriority,
  templateBreadthQueries,
} from '../queries.js';
import type { Learning, ResearchQuery, SourceMetadata } from '../types/index.js';

function learning(content: string, reliability = 0.8): Learning {
  return { content, reliability, sources: ['https://example.com/a'] };
}

function query(text: string, overrides: Partial<ResearchQuery> = {}): ResearchQuery {
  return {
    query: text,
    keywords: [],
    researchGoal: '',
    reliabilityThreshold: 0.5,
    priorityScore: 0,
    phase: 'breadth',
    ...overrides,
  };
}

function source(domain: string, reliabilityScore: number, contentLength: number): SourceMetadata {
  return { url: `https://${domain}/page`, domain, reliabilityScore, contentLength, reliabilityReasoning: '' };
}

function fakeGenerator(respond: (prompt: string) => Promise<string>) {
  return { name: 'fake', generate: vi.fn(respond) };
}

describe('query scoring', () => {
  // ==================== PRIORITY ====================

  it('combines threshold, specificity, novelty and goal clarity', () => {
    expect(scoreQueryPriority(query('abc'), [])).toBeCloseTo(0.456, 10);
  });

  it('lowers novelty when the query repeats recent learnings', () => {
    const fresh = scoreQueryPriority(query('solar panel prices'), []);
    const repeated = scoreQueryPriority(query('solar panel prices'), [learning('Solar panel prices fell in 2023')]);

    // 3 overlapping words: novelty 1 - 3/50
    expect(fresh - repeated).toBeCloseTo(0.3 * (3 / 50), 10);
  });

  it('only compares against the 10 most recent learnings', () => {
    const older = [learning('solar panel prices'), ...Array.from({ length: 10 }, (_, i) => learning(`unrelated item ${i}`))];
    expect(scoreQueryPriority(query('solar panel prices'), older)).toBeCloseTo(scoreQueryPriority(query('solar panel prices'), []), 10);
  });

  it('sorts by score, caps and keeps generated order for ties', () => {
    const queries = [
      query('first', { reliabilityThreshold: 0.3 }),
      query('second', { reliabilityThreshold: 0.9 }),
      query('third', { reliabilityThreshold: 0.3 }),
      query('fourth', { reliabilityThreshold: 0.1 }),
    ];

    const ranked = prioritizeQueries(queries, [], 3);

    expect(ranked.map(q => q.query)).toEqual(['second', 'first', 'third']);
    expect(ranked[0].priorityScore).toBeGreaterThan(ranked[1].priorityScore);
  });

  it('returns nothing for a zero cap', () => {
    expect(prioritizeQueries([query('a')], [], 0)).toEqual([]);
  });

  // ==================== QUALITY ====================

  it('scores query quality from learnings, reliability, volume and diversity', () => {
    const learnings = Array.from({ length: 5 }, (_, i) => learning(`finding ${i}`));
    const sources = [source('reuters.com', 0.8, 10000), source('ft.com', 0.6, 10000)];

    expect(calculateQueryQuality(learnings, sources)).toBeCloseTo(0.55, 10);
  });

  it('scores zero without learnings or sources', () => {
    expect(calculateQueryQuality([], [source('ft.com', 0.9, 100)])).toBe(0);
    expect(calculateQueryQuality([learning('x')], [])).toBe(0);
  });
});

describe('generateBreadthQueries', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('expands templates from the topic and keywords', () => {
    const queries = templateBreadthQueries('solar', ['rooftop'], 0.4);

    expect(queries).toHaveLength(8);
    expect(queries[0]).toMatchObject({ query: 'solar', keywords: ['rooftop'], reliabilityThreshold: 0.4, phase: 'breadth' });
    expect(queries[1]).toMatchObject({ query: 'solar rooftop', keywords: ['rooftop'], researchGoal: 'Investigate rooftop in the context of solar' });
    expect(queries[2].query).toBe('solar market size and growth');
  });

  it('uses templates when no generator is configured', async () => {
    const queries = await generateBreadthQueries('solar', [], { maxQueries: 3, defaultThreshold: 0.3 });
    expect(queries.map(q => q.query)).toEqual([
      'solar',
      'solar market size and growth',
      'solar key players and competitive landscape',
    ]);
  });

  it('parses generated queries, dedupes and clamps thresholds', async () => {
    const generator = fakeGenerator(async () => [
      '```json',
      JSON.stringify({
        queries: [
          { query: 'Charging networks', reliabilityThreshold: 1.4 },
          { query: 'charging networks ' },
          { query: 'Battery costs', researchGoal: 'Track pack prices' },
        ],
      }),
      '```',
    ].join('\n'));

    const queries = await generateBreadthQueries('EV market', ['charging'], { maxQueries: 5, defaultThreshold: 0.3, generator });

    expect(queries).toEqual([
      { query: 'Charging networks', keywords: ['charging'], researchGoal: 'Research Charging networks', reliabilityThreshold: 1, priorityScore: 0, phase: 'breadth' },
      { query: 'Battery costs', keywords: ['charging'], researchGoal: 'Track pack prices', reliabilityThreshold: 0.3, priorityScore: 0, phase: 'breadth' },
    ]);
    expect(generator.generate).toHaveBeenCalledTimes(1);
  });

  it('falls back to templates when the generator fails', async () => {
    const generator = fakeGenerator(async () => {
      throw new Error('provider down');
    });

    const queries = await generateBreadthQueries('solar', [], { maxQueries: 2, defaultThreshold: 0.3, generator });

    expect(queries.map(q => q.query)).toEqual(['solar', 'solar market size and growth']);
  });

  it('falls back to templates when the response has no queries', async () => {
    const generator = fakeGenerator(async () => 'I could not think of any queries.');
    const queries = await generateBreadthQueries('solar', [], { maxQueries: 1, defaultThreshold: 0.3, generator });
    expect(queries.map(q => q.query)).toEqual(['solar']);
  });

  it('returns nothing for a zero query budget', async () => {
    expect(await generateBreadthQueries('solar', [], { maxQueries: 0, defaultThreshold: 0.3 })).toEqual([]);
  });
});

describe('generateDepthQueries', () => {
  it('extracts entities and figures', () => {
    expect(extractAnchors('Tesla delivered 1.8 million vehicles in 2023.')).toEqual({
      entities: ['Tesla'],
      numbers: ['1.8 million', '2023'],
    });
  });

  it('anchors follow-ups on learnings and adds latest-data and comparison queries', () => {
    const content = 'Tesla delivered 1.8 million vehicles in 2023.';
    const queries = generateDepthQueries([learning(content, 0.9)], 'EV market', 1, { reliabilityFloor: 0.5 });

    expect(queries.map(q => q.query)).toEqual([
      'Tesla 1.8 million EV market verification',
      'EV market latest data and statistics',
      'EV market comparison with alternatives',
    ]);
    expect(queries[0]).toMatchObject({
      keywords: ['Tesla', '1.8 million'],
      researchGoal: `Verify the figure: ${content}`,
      parentGoal: content,
      reliabilityThreshold: 0.5,
      phase: 'depth',
    });
  });

  it('prefers the most reliable learnings and caps anchored queries at two per level', () => {
    const queries = generateDepthQueries(
      [
        learning('Ionity operates hundreds of stations.', 0.6),
        learning('Fastned expanded in Germany.', 0.9),
        learning('Allego reported losses.', 0.8),
      ],
      'EV market',
      1,
      { reliabilityFloor: 0.5 }
    );

    expect(queries.map(q => q.query)).toEqual([
      'Fastned EV market in-depth analysis',
      'Allego EV market in-depth analysis',
      'EV market latest data and statistics',
      'EV market comparison with alternatives',
    ]);
  });

  it('returns nothing without learnings', () => {
    expect(generateDepthQueries([], 'EV market', 2, { reliabilityFloor: 0.5 })).toEqual([]);
  });
});
