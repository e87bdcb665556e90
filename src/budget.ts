import { BudgetExceededError } from './errors.js';
import type { BudgetState, OperationKind, RateLimitWindow } from './types/index.js';

export interface BudgetLimits {
  maxCredits: number;
  creditCosts: Record<OperationKind, number>;
  maxRequests: Partial<Record<OperationKind, number>>;  // No entry means no per-op ceiling
  rateLimits: Record<OperationKind, { limit: number; windowMs: number }>;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms)),
};

export const DEFAULT_BUDGET_LIMITS: BudgetLimits = {
  maxCredits: 20,
  creditCosts: { search: 1, scrape: 1, map: 1, crawl: 10 },
  maxRequests: { search: 20, scrape: 10 },
  rateLimits: {
    search: { limit: 50, windowMs: 60_000 },
    scrape: { limit: 100, windowMs: 60_000 },
    map: { limit: 100, windowMs: 60_000 },
    crawl: { limit: 15, windowMs: 60_000 },
  },
};

const WARNING_RATIO = 0.8;

function zeroCounts(): Record<OperationKind, number> {
  return { search: 0, scrape: 0, map: 0, crawl: 0 };
}

/**
 * Credit and rate accounting for one research run.
 *
 * Owned by a single scheduler. Call reset() at the start of every top-level
 * run; the tracker is never shared between concurrent runs.
 */
export class BudgetTracker {
  private creditsUsed = 0;
  private creditsByOperation = zeroCounts();
  private requestsByOperation = zeroCounts();
  private windows: Record<OperationKind, RateLimitWindow>;
  private warned = false;

  constructor(
    private readonly limits: BudgetLimits = DEFAULT_BUDGET_LIMITS,
    private readonly clock: Clock = systemClock
  ) {
    this.windows = this.freshWindows();
  }

  get maxCredits(): number {
    return this.limits.maxCredits;
  }

  get used(): number {
    return this.creditsUsed;
  }

  remainingCredits(): number {
    return Math.max(0, this.limits.maxCredits - this.creditsUsed);
  }

  /**
   * How many more `op` operations fit under both the credit and request ceilings.
   */
  affordable(op: OperationKind): number {
    const cost = this.limits.creditCosts[op];
    const byCredits = cost > 0 ? Math.floor(this.remainingCredits() / cost) : Number.POSITIVE_INFINITY;
    const ceiling = this.limits.maxRequests[op];
    const byRequests = ceiling === undefined
      ? Number.POSITIVE_INFINITY
      : Math.max(0, ceiling - this.requestsByOperation[op]);
    return Math.min(byCredits, byRequests);
  }

  /** True iff recording `op` now would stay within every ceiling */
  checkLimit(op: OperationKind): boolean {
    const cost = this.limits.creditCosts[op];
    if (this.creditsUsed + cost > this.limits.maxCredits) {
      console.error(`[Budget] Credit limit reached: ${this.creditsUsed}/${this.limits.maxCredits} (next ${op} costs ${cost})`);
      return false;
    }
    const ceiling = this.limits.maxRequests[op];
    if (ceiling !== undefined && this.requestsByOperation[op] >= ceiling) {
      console.error(`[Budget] ${op} request limit reached: ${this.requestsByOperation[op]}/${ceiling}`);
      return false;
    }
    return true;
  }

  record(op: OperationKind): void {
    if (!this.checkLimit(op)) {
      throw new BudgetExceededError(
        `Recording ${op} would exceed the research budget`,
        op,
        this.creditsUsed,
        this.limits.maxCredits
      );
    }

    const cost = this.limits.creditCosts[op];
    this.creditsUsed += cost;
    this.creditsByOperation[op] += cost;
    this.requestsByOperation[op] += 1;

    const ratio = this.creditsUsed / this.limits.maxCredits;
    if (!this.warned && ratio > WARNING_RATIO) {
      this.warned = true;
      console.error(`[Budget] Warning: ${Math.round(ratio * 100)}% of credits used (${this.creditsUsed}/${this.limits.maxCredits})`);
    }
  }

  reset(): void {
    this.creditsUsed = 0;
    this.creditsByOperation = zeroCounts();
    this.requestsByOperation = zeroCounts();
    this.windows = this.freshWindows();
    this.warned = false;
  }

  /**
   * Fixed-window rate limiting. Suspends the caller until the window resets
   * when the in-window count has reached the limit. Returns the ms waited.
   */
  async acquireSlot(op: OperationKind): Promise<number> {
    const window = this.windows[op];
    let now = this.clock.now();
    let waited = 0;

    if (now >= window.resetAt) {
      window.count = 0;
      window.resetAt = now + window.windowMs;
    }

    if (window.count >= window.limit) {
      waited = Math.max(0, window.resetAt - now);
      console.error(`[Budget] ${op} rate limit reached (${window.count}/${window.limit}), waiting ${waited}ms`);
      await this.clock.sleep(waited);
      now = this.clock.now();
      window.count = 0;
      window.resetAt = now + window.windowMs;
    }

    window.count += 1;
    return waited;
  }

  snapshot(): BudgetState {
    const { search, scrape, map, crawl } = this.windows;
    return {
      creditsUsed: this.creditsUsed,
      maxCredits: this.limits.maxCredits,
      creditsByOperation: { ...this.creditsByOperation },
      requestsByOperation: { ...this.requestsByOperation },
      rateLimits: { search: { ...search }, scrape: { ...scrape }, map: { ...map }, crawl: { ...crawl } },
    };
  }

  private freshWindows(): Record<OperationKind, RateLimitWindow> {
    const { search, scrape, map, crawl } = this.limits.rateLimits;
    const window = (limits: { limit: number; windowMs: number }): RateLimitWindow => ({
      limit: limits.limit,
      windowMs: limits.windowMs,
      count: 0,
      resetAt: 0,
    });
    return { search: window(search), scrape: window(scrape), map: window(map), crawl: window(crawl) };
  }
}
