import { z } from 'zod';
import { DEFAULT_BUDGET_LIMITS, type BudgetLimits } from './budget.js';
import { DEFAULT_CHART_INCLUSION, type ChartInclusionOptions } from './charts/assignment.js';
import { DEFAULT_MODELS, type LLMConfig, type LLMProvider } from './clients/llm.js';
import { DEFAULT_RESEARCH_SETTINGS, type ResearchSettings } from './scheduler.js';
import type { SearchConfig } from './services/search.js';

export type Env = Record<string, string | undefined>;

export interface BlueprintSettings {
  defaultPageCount: number;
  minContentRatio: number;          // Share of target section length a section must reach
  chartInclusion: ChartInclusionOptions;
}

export interface AppConfig {
  llm: LLMConfig | null;            // Null when no provider key is set
  search: SearchConfig;
  budget: BudgetLimits;
  research: ResearchSettings;
  blueprint: BlueprintSettings;
}

export const DEFAULT_SEARCH_API_URL = 'https://api.firecrawl.dev/v1/search';

const PROVIDERS: readonly LLMProvider[] = ['gemini', 'openai', 'anthropic'];

// Empty strings from mcp.json count as unset
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const count = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));
const ratio = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(fallback));

const EnvSchema = z.object({
  LLM_PROVIDER: z.preprocess(blankToUndefined, z.enum(['gemini', 'openai', 'anthropic']).optional()),
  LLM_MODEL: optionalString,
  GEMINI_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  LLM_TIMEOUT_MS: count(60_000),

  SEARCH_API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_SEARCH_API_URL)),
  SEARCH_API_KEY: optionalString,
  SEARCH_RESULT_LIMIT: count(5),
  SEARCH_TIMEOUT_MS: count(30_000),

  MAX_CREDITS_PER_QUERY: count(20),
  MAX_SEARCH_REQUESTS: count(20),
  RATE_LIMIT_WINDOW_MS: count(60_000),

  RESEARCH_BREADTH: count(4),
  RESEARCH_DEPTH: count(2),
  MAX_RESEARCH_BREADTH: count(6),
  MAX_RESEARCH_DEPTH: count(5),
  MAX_DEPTH_QUERIES: count(6),
  RELIABILITY_THRESHOLD: ratio(0.3),
  DEPTH_RELIABILITY_FLOOR: ratio(0.5),

  MAX_RETRIES: count(3),
  RETRY_BASE_DELAY_MS: count(1000),
  RETRY_MAX_DELAY_MS: count(3000),

  DEFAULT_PAGE_COUNT: count(12),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

function apiKeyFor(provider: LLMProvider, env: ParsedEnv): string | undefined {
  switch (provider) {
    case 'gemini': return env.GEMINI_API_KEY;
    case 'openai': return env.OPENAI_API_KEY;
    case 'anthropic': return env.ANTHROPIC_API_KEY;
  }
}

/**
 * Pick the text-generation provider: LLM_PROVIDER when set, otherwise the
 * first provider with an API key, in gemini, openai, anthropic order.
 */
function resolveLLM(env: ParsedEnv): LLMConfig | null {
  const provider = env.LLM_PROVIDER ?? PROVIDERS.find(p => apiKeyFor(p, env) !== undefined);
  if (!provider) return null;

  const apiKey = apiKeyFor(provider, env);
  if (!apiKey) {
    console.error(`[Config] LLM_PROVIDER is ${provider} but no API key is set; running without a text generator`);
    return null;
  }
  return {
    provider,
    model: env.LLM_MODEL ?? DEFAULT_MODELS[provider],
    apiKey,
    timeout: env.LLM_TIMEOUT_MS,
  };
}

/**
 * Parse an environment record into the application config. Throws with every
 * offending variable listed when a value does not parse.
 */
export function loadConfig(source: Env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const env = parsed.data;

  const windowMs = env.RATE_LIMIT_WINDOW_MS;
  const defaults = DEFAULT_BUDGET_LIMITS.rateLimits;
  const budget: BudgetLimits = {
    maxCredits: env.MAX_CREDITS_PER_QUERY,
    creditCosts: { ...DEFAULT_BUDGET_LIMITS.creditCosts },
    // Search requests scrape their hits inline and are billed as search
    maxRequests: { ...DEFAULT_BUDGET_LIMITS.maxRequests, search: env.MAX_SEARCH_REQUESTS },
    rateLimits: {
      search: { limit: defaults.search.limit, windowMs },
      scrape: { limit: defaults.scrape.limit, windowMs },
      map: { limit: defaults.map.limit, windowMs },
      crawl: { limit: defaults.crawl.limit, windowMs },
    },
  };

  const maxBreadth = Math.max(1, env.MAX_RESEARCH_BREADTH);
  const maxDepth = Math.max(1, env.MAX_RESEARCH_DEPTH);
  const research: ResearchSettings = {
    ...DEFAULT_RESEARCH_SETTINGS,
    breadth: Math.min(Math.max(1, env.RESEARCH_BREADTH), maxBreadth),
    depth: Math.min(Math.max(1, env.RESEARCH_DEPTH), maxDepth),
    maxBreadth,
    maxDepth,
    maxDepthQueries: env.MAX_DEPTH_QUERIES,
    reliabilityThreshold: env.RELIABILITY_THRESHOLD,
    depthReliabilityFloor: env.DEPTH_RELIABILITY_FLOOR,
    retry: {
      maxAttempts: Math.max(1, env.MAX_RETRIES),
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
    },
  };

  return {
    llm: resolveLLM(env),
    search: {
      apiUrl: env.SEARCH_API_URL,
      apiKey: env.SEARCH_API_KEY,
      resultLimit: Math.max(1, env.SEARCH_RESULT_LIMIT),
      timeout: env.SEARCH_TIMEOUT_MS,
    },
    budget,
    research,
    blueprint: {
      defaultPageCount: Math.max(1, env.DEFAULT_PAGE_COUNT),
      minContentRatio: 0.5,
      chartInclusion: DEFAULT_CHART_INCLUSION,
    },
  };
}
