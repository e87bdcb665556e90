export type OperationKind = 'search' | 'scrape' | 'map' | 'crawl';

export type ResearchPhase = 'breadth' | 'depth';

export type ReportType = 'market_research' | 'company_analysis' | 'industry_report' | 'technical_analysis';

/**
 * One query scheduled for a research round.
 * Created per round and discarded once executed.
 */
export interface ResearchQuery {
  query: string;
  keywords: string[];
  researchGoal: string;
  reliabilityThreshold: number;          // 0-1, minimum source reliability kept for this query
  priorityScore: number;                 // Set by prioritizeQueries
  parentGoal?: string;                   // Learning or goal a depth query expands on
  phase: ResearchPhase;
}

export interface SourceMetadata {
  url: string;
  domain: string;
  reliabilityScore: number;              // 0-1
  contentLength: number;
  reliabilityReasoning: string;
}

export interface Learning {
  content: string;
  reliability: number;                   // 0-1
  sources: string[];                     // Source URLs
}

export interface RateLimitWindow {
  limit: number;
  windowMs: number;
  count: number;
  resetAt: number;                       // Epoch ms when the window restarts
}

export interface BudgetState {
  creditsUsed: number;
  maxCredits: number;
  creditsByOperation: Record<OperationKind, number>;
  requestsByOperation: Record<OperationKind, number>;
  rateLimits: Record<OperationKind, RateLimitWindow>;
}

// ==================== CHARTS ====================

export type ChartGoal = 'trend' | 'comparison' | 'composition' | 'correlation' | 'distribution' | 'flow';
export type ChartDimensionality = '1D' | '2D' | '3D' | 'nD';
export type ChartComplexity = 'simple' | 'medium' | 'advanced';

export type ChartKind =
  | 'bar'
  | 'horizontalBar'
  | 'line'
  | 'pie'
  | 'donut'
  | 'scatter'
  | 'area'
  | 'stackedBar'
  | 'multiLine'
  | 'radar'
  | 'bubble'
  | 'heatmap'
  | 'waterfall'
  | 'funnel'
  | 'gauge'
  | 'treeMap'
  | 'sunburst'
  | 'candlestick'
  | 'boxPlot'
  | 'violinPlot'
  | 'histogram'
  | 'pareto'
  | 'flowchart';

export interface ChartCatalogEntry {
  id: ChartKind;
  goal: ChartGoal;
  dimensionality: ChartDimensionality;
  complexity: ChartComplexity;
  description: string;
}

export interface CategoricalPayload { labels: string[]; values: number[] }
export interface SeriesPayload { labels: string[]; series: Array<{ name: string; values: number[] }> }
export interface PointPayload { x_values: number[]; y_values: number[] }
export interface BubblePayload { x_values: number[]; y_values: number[]; sizes: number[] }
export interface MatrixPayload { labels: string[]; categories: string[]; values: number[][] }
export interface OhlcPayload { labels: string[]; open: number[]; high: number[]; low: number[]; close: number[] }
export interface DistributionPayload { labels: string[]; data: number[][] }
export interface GaugePayload { value: number; max: number }
export interface ParetoPayload { labels: string[]; values: number[]; cumulative: number[] }
export interface FlowPayload { nodes: Array<{ id: string; label: string }>; edges: Array<{ from: string; to: string }> }

export type ChartPayload =
  | CategoricalPayload
  | SeriesPayload
  | PointPayload
  | BubblePayload
  | MatrixPayload
  | OhlcPayload
  | DistributionPayload
  | GaugePayload
  | ParetoPayload
  | FlowPayload;

export type EmptyPayload = Record<string, never>;

// ==================== BLUEPRINT ====================

/**
 * Report section as handed to the rendering collaborator.
 * Field names follow the wire shape the text generator is asked to produce.
 */
export interface ReportSection {
  title: string;
  content: string;
  chart_type: ChartKind | 'none';
  chart_data: ChartPayload | EmptyPayload;
}

export interface ReportBlueprint {
  topic: string;
  reportType: ReportType;
  sections: ReportSection[];
}

/**
 * Section shape accepted from the text generator before chart assignment.
 * chart_type is free text here; assignment replaces it with a catalog id or "none".
 */
export interface DraftSection {
  title: string;
  content: string;
  chart_type: string;
  chart_data?: unknown;
}

export interface DraftBlueprint {
  sections: DraftSection[];
}

// ==================== COLLABORATORS ====================

export interface GenerateOptions {
  temperature?: number;
  maxOutputTokens?: number;
}

export interface TextGenerator {
  readonly name: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface SearchResult {
  url: string;
  title: string;
  content: string;
}

export interface SearchProvider {
  readonly name: string;
  search(query: string): Promise<SearchResult[]>;
}

export interface ReportRenderer {
  render(blueprint: ReportBlueprint): Promise<string>;  // Returns a location or identifier of the output
}

// ==================== RESULTS ====================

export interface QueryResult {
  query: ResearchQuery;
  status: 'completed' | 'failed' | 'skipped';
  learningsAdded: number;
  sourcesKept: number;
  quality: number;                       // 0-1, see calculateQueryQuality
  error?: string;
}

export interface ResearchMetrics {
  breadthQueries: number;
  depthQueries: number;
  totalSources: number;
  highReliabilitySources: number;        // reliability >= 0.7
  averageReliability: number;
}

export interface ResearchOutcome {
  topic: string;
  learnings: Learning[];
  sourceMetadata: SourceMetadata[];
  creditsUsed: number;
  budget: BudgetState;
  queryResults: QueryResult[];
  metrics: ResearchMetrics;
  stoppedReason?: 'budget_exhausted';
}
