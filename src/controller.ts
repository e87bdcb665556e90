/**
 * Report Controller - Orchestrates one report run
 * Flow: Breadth research → Depth research → Blueprint synthesis → Chart assignment → [Render] → Output
 */

import { generateBlueprint } from './blueprint.js';
import { BudgetTracker, systemClock, type Clock } from './budget.js';
import { CHART_CATALOG, selectCatalog } from './charts/catalog.js';
import { createTextGenerator } from './clients/llm.js';
import { loadConfig, type AppConfig, type Env } from './config.js';
import { errorMessage } from './errors.js';
import { formatMarkdown, type ReportResult } from './formatting.js';
import type { ProgressInfo } from './jobs.js';
import { DomainReliabilityEvaluator } from './processing.js';
import { ResearchScheduler } from './scheduler.js';
import { createSearchProvider } from './services/search.js';
import type {
  ChartCatalogEntry,
  ReportRenderer,
  ReportType,
  SearchProvider,
  TextGenerator,
} from './types/index.js';

// Progress callback type for real-time step updates
export type OnProgressCallback = (progress: ProgressInfo) => void;

export interface ControllerDeps {
  generator?: TextGenerator | null;   // null runs without a text generator
  search?: SearchProvider;
  renderer?: ReportRenderer;
  clock?: Clock;
}

export interface ReportRequest {
  topic: string;
  pageCount?: number;
  reportType?: ReportType;
  breadth?: number;
  depth?: number;
  keywords?: string[];
  chartKinds?: string[];   // Restrict assignment to these catalog ids
  onProgress?: OnProgressCallback;
}

export interface ReportOutput extends ReportResult {
  markdown: string;
}

const TOTAL_STEPS = 4;

export class ReportController {
  private readonly config: AppConfig;
  private readonly generator?: TextGenerator;
  private readonly search: SearchProvider;
  private readonly renderer?: ReportRenderer;
  private readonly clock: Clock;

  constructor(env: Env = {}, deps: ControllerDeps = {}) {
    this.config = loadConfig(env);
    if (deps.generator === undefined) {
      this.generator = this.config.llm ? createTextGenerator(this.config.llm) : undefined;
    } else {
      this.generator = deps.generator ?? undefined;
    }
    this.search = deps.search ?? createSearchProvider(this.config.search);
    this.renderer = deps.renderer;
    this.clock = deps.clock ?? systemClock;

    console.error(`[Controller] Text generator: ${this.generator?.name ?? 'none (template queries, line extraction, fallback blueprint)'}`);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  /**
   * Run research and plan the report. Only invalid input throws; service,
   * budget, recovery and rendering failures degrade into partial results or
   * the fallback blueprint.
   */
  async execute(request: ReportRequest): Promise<ReportOutput> {
    const topic = request.topic.trim();
    if (!topic) throw new Error('Topic must not be empty');
    const pageCount = request.pageCount ?? this.config.blueprint.defaultPageCount;
    if (!Number.isInteger(pageCount) || pageCount < 1) {
      throw new Error(`Page count must be a positive integer, got ${pageCount}`);
    }
    const reportType = request.reportType ?? 'market_research';
    const catalog = this.resolveCatalog(request.chartKinds);

    const emitProgress = (step: string, stepNumber: number, estSecondsRemaining: number, note?: string) => {
      request.onProgress?.({
        currentStep: step,
        stepNumber,
        totalSteps: TOTAL_STEPS,
        estimatedSecondsRemaining: estSecondsRemaining,
        note,
      });
    };

    // Fresh budget per run: concurrent jobs never share counters
    const budget = new BudgetTracker(this.config.budget, this.clock);
    const scheduler = new ResearchScheduler({
      search: this.search,
      budget,
      reliability: new DomainReliabilityEvaluator(this.generator),
      generator: this.generator,
      settings: this.config.research,
      sleep: ms => this.clock.sleep(ms),
    });

    // Steps 1-2: research
    emitProgress('Breadth research', 1, 90);
    const research = await scheduler.run({
      topic,
      keywords: request.keywords,
      breadth: request.breadth,
      depth: request.depth,
      onProgress: ({ phase, completed, total, query }) => {
        const stepNumber = phase === 'breadth' ? 1 : 2;
        emitProgress(
          `${phase === 'breadth' ? 'Breadth' : 'Depth'} research (${completed + 1}/${total})`,
          stepNumber,
          stepNumber === 1 ? 90 : 50,
          query
        );
      },
    });

    // Step 3: blueprint and charts
    emitProgress('Planning blueprint', 3, 30, research.stoppedReason === 'budget_exhausted' ? 'Budget exhausted, planning from partial research' : undefined);
    const planned = await generateBlueprint(
      { topic, pageCount, reportType },
      { learnings: research.learnings, sources: research.sourceMetadata },
      {
        generator: this.generator,
        catalog,
        chartInclusion: this.config.blueprint.chartInclusion,
        minContentRatio: this.config.blueprint.minContentRatio,
        retry: this.config.research.retry,
        sleep: ms => this.clock.sleep(ms),
      }
    );

    // Step 4: optional rendering
    let renderOutput: string | undefined;
    let renderError: string | undefined;
    if (this.renderer) {
      emitProgress('Rendering', 4, 10);
      try {
        renderOutput = await this.renderer.render(planned.blueprint);
        console.error(`[Controller] Rendered report to ${renderOutput}`);
      } catch (error) {
        renderError = errorMessage(error);
        console.error(`[Controller] Rendering failed: ${renderError}`);
      }
    }

    const result: ReportResult = {
      blueprint: planned.blueprint,
      research,
      usedFallback: planned.usedFallback,
      blueprintErrors: planned.errors,
      recoveryStrategy: planned.strategy,
      renderOutput,
      renderError,
    };
    return { ...result, markdown: formatMarkdown(result) };
  }

  private resolveCatalog(kinds: string[] | undefined): readonly ChartCatalogEntry[] {
    if (!kinds || kinds.length === 0) return CHART_CATALOG;
    const selected = selectCatalog(kinds);
    if (selected.length === 0) {
      console.error(`[Controller] None of [${kinds.join(', ')}] are catalog chart types, using the full catalog`);
      return CHART_CATALOG;
    }
    return selected;
  }
}
