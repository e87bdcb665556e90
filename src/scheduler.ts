/**
 * Research scheduler: breadth then depth, strictly sequential.
 *
 * Every query runs one at a time against a single BudgetTracker, so budget and
 * rate state need no locking. Depth queries are only generated once every
 * breadth query has finished and its learnings are merged.
 */

import { BudgetTracker } from './budget.js';
import { BudgetExceededError, errorMessage } from './errors.js';
import {
  DEFAULT_PROCESSING,
  LearningSet,
  processSearchResults,
  type ProcessingOptions,
  type SourceReliabilityEvaluator,
} from './processing.js';
import {
  calculateQueryQuality,
  DEFAULT_PRIORITY_WEIGHTS,
  DEFAULT_QUALITY_WEIGHTS,
  generateBreadthQueries,
  generateDepthQueries,
  prioritizeQueries,
  type PriorityWeights,
  type QualityWeights,
} from './queries.js';
import { DEFAULT_RETRY, type RetryOptions, withRetry } from './retry.js';
import type {
  QueryResult,
  ResearchMetrics,
  ResearchOutcome,
  ResearchPhase,
  ResearchQuery,
  SearchProvider,
  SearchResult,
  SourceMetadata,
  TextGenerator,
} from './types/index.js';

export interface ResearchSettings {
  breadth: number;                 // Default breadth when a run does not set one
  depth: number;
  maxBreadth: number;
  maxDepth: number;
  maxDepthQueries: number;         // Hard cap on depth queries per run
  reliabilityThreshold: number;    // Default threshold for breadth queries
  depthReliabilityFloor: number;
  priorityWeights: PriorityWeights;
  qualityWeights: QualityWeights;
  retry: RetryOptions;
  processing: Omit<ProcessingOptions, 'reliability' | 'generator' | 'retry' | 'sleep'>;
}

export const DEFAULT_RESEARCH_SETTINGS: ResearchSettings = {
  breadth: 4,
  depth: 2,
  maxBreadth: 6,
  maxDepth: 5,
  maxDepthQueries: 6,
  reliabilityThreshold: 0.3,
  depthReliabilityFloor: 0.5,
  priorityWeights: DEFAULT_PRIORITY_WEIGHTS,
  qualityWeights: DEFAULT_QUALITY_WEIGHTS,
  retry: DEFAULT_RETRY,
  processing: DEFAULT_PROCESSING,
};

export interface SchedulerDeps {
  search: SearchProvider;
  budget: BudgetTracker;
  reliability: SourceReliabilityEvaluator;
  generator?: TextGenerator;
  settings?: ResearchSettings;
  sleep?: (ms: number) => Promise<void>;
}

export interface SchedulerProgress {
  phase: ResearchPhase;
  completed: number;
  total: number;
  query: string;
}

export interface ResearchRequest {
  topic: string;
  keywords?: string[];
  breadth?: number;
  depth?: number;
  onProgress?: (progress: SchedulerProgress) => void;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.floor(value)));
}

/**
 * Mutable state of one run. Created fresh by run(), never shared.
 */
interface RunState {
  learnings: LearningSet;
  sources: Map<string, SourceMetadata>;
  results: QueryResult[];
  stopped: boolean;
}

export class ResearchScheduler {
  private readonly settings: ResearchSettings;

  constructor(private readonly deps: SchedulerDeps) {
    this.settings = deps.settings ?? DEFAULT_RESEARCH_SETTINGS;
  }

  async run(request: ResearchRequest): Promise<ResearchOutcome> {
    const { settings, deps } = this;
    const { topic } = request;
    const keywords = request.keywords ?? [];
    const breadth = clamp(request.breadth ?? settings.breadth, 1, settings.maxBreadth);
    const depth = clamp(request.depth ?? settings.depth, 1, settings.maxDepth);

    deps.budget.reset();
    const state: RunState = { learnings: new LearningSet(), sources: new Map(), results: [], stopped: false };
    console.error(`[Scheduler] Researching "${topic}" (breadth ${breadth}, depth ${depth}, ${deps.budget.maxCredits} credits)`);

    // Phase 1: breadth
    const breadthCandidates = await generateBreadthQueries(topic, keywords, {
      maxQueries: breadth,
      defaultThreshold: settings.reliabilityThreshold,
      generator: deps.generator,
      retry: settings.retry,
      sleep: deps.sleep,
    });
    await this.runPhase('breadth', prioritizeQueries(breadthCandidates, [], breadth, settings.priorityWeights), state, request);

    // Phase 2: depth, only from merged breadth learnings
    if (!state.stopped && depth > 1 && state.learnings.size > 0) {
      const current = state.learnings.toArray();
      const depthCandidates = generateDepthQueries(current, topic, depth - 1, {
        reliabilityFloor: settings.depthReliabilityFloor,
      });
      const ranked = prioritizeQueries(depthCandidates, current, settings.maxDepthQueries, settings.priorityWeights);
      await this.runPhase('depth', ranked, state, request);
    } else if (depth > 1 && !state.stopped) {
      console.error('[Scheduler] No breadth learnings, skipping depth phase');
    }

    const sourceMetadata = [...state.sources.values()];
    const outcome: ResearchOutcome = {
      topic,
      learnings: state.learnings.toArray(),
      sourceMetadata,
      creditsUsed: deps.budget.used,
      budget: deps.budget.snapshot(),
      queryResults: state.results,
      metrics: this.computeMetrics(state.results, sourceMetadata),
      ...(state.stopped ? { stoppedReason: 'budget_exhausted' as const } : {}),
    };

    console.error(
      `[Scheduler] Done: ${outcome.learnings.length} learnings, ${sourceMetadata.length} sources, ` +
      `${outcome.creditsUsed}/${deps.budget.maxCredits} credits${state.stopped ? ' (budget exhausted)' : ''}`
    );
    return outcome;
  }

  /**
   * Run one phase's queries in order. Queries the budget can no longer afford
   * are recorded as skipped and the run is marked stopped.
   */
  private async runPhase(
    phase: ResearchPhase,
    ranked: ResearchQuery[],
    state: RunState,
    request: ResearchRequest
  ): Promise<void> {
    const affordable = this.deps.budget.affordable('search');
    const scheduled = ranked.slice(0, affordable);
    console.error(`[Scheduler] ${phase} phase: ${scheduled.length}/${ranked.length} queries scheduled`);

    let completed = 0;
    for (let i = 0; i < ranked.length; i++) {
      const query = ranked[i];
      if (state.stopped || i >= scheduled.length) {
        state.stopped = true;
        state.results.push({ query, status: 'skipped', learningsAdded: 0, sourcesKept: 0, quality: 0, error: 'Budget exhausted' });
        continue;
      }

      request.onProgress?.({ phase, completed, total: scheduled.length, query: query.query });
      try {
        state.results.push(await this.executeQuery(query, state));
      } catch (error) {
        if (!(error instanceof BudgetExceededError)) throw error;
        console.error(`[Scheduler] ${error.message}, stopping with partial results`);
        state.stopped = true;
        state.results.push({ query, status: 'skipped', learningsAdded: 0, sourcesKept: 0, quality: 0, error: error.message });
      }
      completed++;
    }
  }

  /**
   * Search, process and merge one query. BudgetExceededError propagates to the
   * phase loop; every other failure marks only this query as failed.
   */
  private async executeQuery(query: ResearchQuery, state: RunState): Promise<QueryResult> {
    const { budget, search, generator, reliability, sleep } = this.deps;
    const { settings } = this;

    let results: SearchResult[];
    try {
      results = await withRetry(
        `search "${query.query}"`,
        async () => {
          if (!budget.checkLimit('search')) {
            throw new BudgetExceededError(`No budget left for "${query.query}"`, 'search', budget.used, budget.maxCredits);
          }
          await budget.acquireSlot('search');
          const found = await search.search(query.query);
          budget.record('search');
          return found;
        },
        settings.retry,
        sleep
      );
    } catch (error) {
      if (error instanceof BudgetExceededError) throw error;
      console.error(`[Scheduler] Query "${query.query}" failed: ${errorMessage(error)}`);
      return { query, status: 'failed', learningsAdded: 0, sourcesKept: 0, quality: 0, error: errorMessage(error) };
    }

    try {
      const processed = await processSearchResults(query, results, {
        ...settings.processing,
        reliability,
        generator,
        retry: settings.retry,
        sleep,
      });
      const learningsAdded = state.learnings.addAll(processed.learnings);
      for (const source of processed.sources) {
        if (!state.sources.has(source.url)) state.sources.set(source.url, source);
      }
      const quality = calculateQueryQuality(processed.learnings, processed.sources, settings.qualityWeights);
      console.error(`[Scheduler] "${query.query}": +${learningsAdded} learnings, ${processed.sources.length} sources, quality ${quality.toFixed(2)}`);
      return { query, status: 'completed', learningsAdded, sourcesKept: processed.sources.length, quality };
    } catch (error) {
      console.error(`[Scheduler] Processing "${query.query}" failed: ${errorMessage(error)}`);
      return { query, status: 'failed', learningsAdded: 0, sourcesKept: 0, quality: 0, error: errorMessage(error) };
    }
  }

  private computeMetrics(results: QueryResult[], sources: SourceMetadata[]): ResearchMetrics {
    const completedIn = (phase: ResearchPhase) =>
      results.filter(r => r.status === 'completed' && r.query.phase === phase).length;
    const total = sources.reduce((sum, s) => sum + s.reliabilityScore, 0);
    return {
      breadthQueries: completedIn('breadth'),
      depthQueries: completedIn('depth'),
      totalSources: sources.length,
      highReliabilitySources: sources.filter(s => s.reliabilityScore >= 0.7).length,
      averageReliability: sources.length > 0 ? total / sources.length : 0,
    };
  }
}
