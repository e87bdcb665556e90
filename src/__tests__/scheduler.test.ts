import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BudgetTracker, DEFAULT_BUDGET_LIMITS, type BudgetLimits, type Clock } from '../budget.js';
import { PermanentServiceError, TransientServiceError } from '../errors.js';
import { DomainReliabilityEvaluator } from '../processing.js';
import { DEFAULT_RESEARCH_SETTINGS, ResearchScheduler, type SchedulerProgress } from '../scheduler.js';
import type { SearchResult } from '../types/index.js';

const FINDING = 'Tesla delivered 1.8 million vehicles in 2023.';

function fakeClock(): Clock {
  let now = 0;
  return {
    now: () => now,
    sleep: vi.fn(async (ms: number) => {
      now += ms;
    }),
  };
}

/** Search stand-in returning one reuters.com result per call, each with its own URL */
function fakeSearch(respond?: (query: string, call: number) => Promise<SearchResult[]>) {
  let calls = 0;
  return {
    name: 'fake-search',
    search: vi.fn(async (query: string) => {
      calls++;
      if (respond) return respond(query, calls);
      return [{ url: `https://reuters.com/story-${calls}`, title: query, content: FINDING }];
    }),
  };
}

function scheduler(search: ReturnType<typeof fakeSearch>, limits: Partial<BudgetLimits> = {}, clock: Clock = fakeClock()) {
  const budget = new BudgetTracker({ ...DEFAULT_BUDGET_LIMITS, ...limits }, clock);
  const sleep = vi.fn(async (_ms: number) => {});
  const instance = new ResearchScheduler({
    search,
    budget,
    reliability: new DomainReliabilityEvaluator(),
    settings: { ...DEFAULT_RESEARCH_SETTINGS, retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 } },
    sleep,
  });
  return { instance, budget, sleep };
}

describe('ResearchScheduler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  // ==================== PHASES ====================

  it('runs breadth queries, then depth queries from the merged learnings', async () => {
    const search = fakeSearch();
    const { instance } = scheduler(search);

    const outcome = await instance.run({ topic: 'EV market', breadth: 2, depth: 2 });

    expect(outcome.queryResults.map(r => r.query.phase)).toEqual(['breadth', 'breadth', 'depth', 'depth', 'depth']);
    expect(outcome.queryResults.every(r => r.status === 'completed')).toBe(true);
    expect(outcome.creditsUsed).toBe(5);
    expect(outcome.stoppedReason).toBeUndefined();
    expect(outcome.learnings).toEqual([
      {
        content: FINDING,
        reliability: 0.6,
        sources: [1, 2, 3, 4, 5].map(n => `https://reuters.com/story-${n}`),
      },
    ]);
    expect(outcome.metrics).toMatchObject({ breadthQueries: 2, depthQueries: 3, totalSources: 5, highReliabilitySources: 5 });
    expect(outcome.metrics.averageReliability).toBeCloseTo(0.9, 10);
  });

  it('orders breadth queries by priority', async () => {
    const search = fakeSearch();
    const { instance } = scheduler(search);

    await instance.run({ topic: 'EV market', breadth: 2, depth: 1 });

    expect(search.search.mock.calls.map(call => call[0])).toEqual(['EV market market size and growth', 'EV market']);
  });

  it('anchors depth queries on the breadth learnings', async () => {
    const search = fakeSearch();
    const { instance } = scheduler(search);

    const outcome = await instance.run({ topic: 'EV market', breadth: 1, depth: 2 });

    const depthQueries = outcome.queryResults.filter(r => r.query.phase === 'depth').map(r => r.query.query);
    expect(depthQueries).toContain('Tesla 1.8 million EV market verification');
    expect(depthQueries).toHaveLength(3);
  });

  it('skips the depth phase when breadth found nothing', async () => {
    const search = fakeSearch(async () => []);
    const { instance } = scheduler(search);

    const outcome = await instance.run({ topic: 'EV market', breadth: 2, depth: 3 });

    expect(outcome.queryResults.map(r => r.query.phase)).toEqual(['breadth', 'breadth']);
    expect(outcome.learnings).toEqual([]);
    expect(outcome.metrics.averageReliability).toBe(0);
  });

  it('clamps breadth to the configured maximum', async () => {
    const search = fakeSearch();
    const { instance } = scheduler(search);

    const outcome = await instance.run({ topic: 'EV market', breadth: 50, depth: 1 });

    expect(search.search).toHaveBeenCalledTimes(DEFAULT_RESEARCH_SETTINGS.maxBreadth);
    expect(outcome.creditsUsed).toBe(6);
  });

  it('reports progress before each query', async () => {
    const search = fakeSearch();
    const { instance } = scheduler(search);
    const progress: SchedulerProgress[] = [];

    await instance.run({ topic: 'EV market', breadth: 2, depth: 1, onProgress: p => progress.push(p) });

    expect(progress).toEqual([
      { phase: 'breadth', completed: 0, total: 2, query: 'EV market market size and growth' },
      { phase: 'breadth', completed: 1, total: 2, query: 'EV market' },
    ]);
  });

  // ==================== BUDGET ====================

  it('stops with partial results when the budget runs out', async () => {
    const search = fakeSearch();
    const { instance } = scheduler(search, { maxCredits: 3 });

    const outcome = await instance.run({ topic: 'EV market', breadth: 4, depth: 2 });

    expect(outcome.queryResults.map(r => r.status)).toEqual(['completed', 'completed', 'completed', 'skipped']);
    expect(outcome.queryResults[3].error).toBe('Budget exhausted');
    expect(outcome.creditsUsed).toBe(3);
    expect(outcome.creditsUsed).toBeLessThanOrEqual(outcome.budget.maxCredits);
    expect(outcome.stoppedReason).toBe('budget_exhausted');
    expect(search.search).toHaveBeenCalledTimes(3);
  });

  it('waits for the rate window instead of exceeding it', async () => {
    const clock = fakeClock();
    const search = fakeSearch();
    const { instance } = scheduler(
      search,
      { rateLimits: { ...DEFAULT_BUDGET_LIMITS.rateLimits, search: { limit: 1, windowMs: 1000 } } },
      clock
    );

    await instance.run({ topic: 'EV market', breadth: 2, depth: 1 });

    expect(clock.sleep).toHaveBeenCalledTimes(1);
    expect(clock.sleep).toHaveBeenCalledWith(1000);
  });

  it('resets the budget at the start of every run', async () => {
    const search = fakeSearch();
    const { instance } = scheduler(search);

    const first = await instance.run({ topic: 'EV market', breadth: 2, depth: 1 });
    const second = await instance.run({ topic: 'EV market', breadth: 2, depth: 1 });

    expect(first.creditsUsed).toBe(2);
    expect(second.creditsUsed).toBe(2);
  });

  // ==================== FAILURES ====================

  it('marks a query failed on a permanent search error without charging it', async () => {
    const search = fakeSearch(async () => {
      throw new PermanentServiceError('unauthorized', 'search', 401);
    });
    const { instance, sleep } = scheduler(search);

    const outcome = await instance.run({ topic: 'EV market', breadth: 1, depth: 1 });

    expect(outcome.queryResults).toHaveLength(1);
    expect(outcome.queryResults[0]).toMatchObject({ status: 'failed', error: 'unauthorized' });
    expect(outcome.creditsUsed).toBe(0);
    expect(search.search).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transient search errors', async () => {
    const search = fakeSearch(async (query, call) => {
      if (call === 1) throw new TransientServiceError('rate limited', 'search', 429);
      return [{ url: 'https://reuters.com/retry', title: query, content: FINDING }];
    });
    const { instance, sleep } = scheduler(search);

    const outcome = await instance.run({ topic: 'EV market', breadth: 1, depth: 1 });

    expect(outcome.queryResults[0].status).toBe('completed');
    expect(outcome.creditsUsed).toBe(1);
    expect(sleep).toHaveBeenCalledWith(1);
  });

  it('keeps going after a failed query', async () => {
    const search = fakeSearch(async (query, call) => {
      if (call === 1) throw new PermanentServiceError('bad request', 'search', 400);
      return [{ url: `https://reuters.com/story-${call}`, title: query, content: FINDING }];
    });
    const { instance } = scheduler(search);

    const outcome = await instance.run({ topic: 'EV market', breadth: 2, depth: 1 });

    expect(outcome.queryResults.map(r => r.status)).toEqual(['failed', 'completed']);
    expect(outcome.learnings).toHaveLength(1);
  });
});
