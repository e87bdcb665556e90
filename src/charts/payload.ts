/**
 * Chart payloads: shape checks for data supplied with a section, and seeded
 * synthetic data when a section has none.
 */

import { z } from 'zod';
import type { ChartKind, ChartPayload } from '../types/index.js';

export type PayloadShape =
  | 'categorical'
  | 'series'
  | 'points'
  | 'bubble'
  | 'matrix'
  | 'ohlc'
  | 'distribution'
  | 'gauge'
  | 'pareto'
  | 'flow';

export const PAYLOAD_SHAPES: Record<ChartKind, PayloadShape> = {
  bar: 'categorical',
  horizontalBar: 'categorical',
  line: 'categorical',
  area: 'categorical',
  pie: 'categorical',
  donut: 'categorical',
  radar: 'categorical',
  histogram: 'categorical',
  treeMap: 'categorical',
  sunburst: 'categorical',
  waterfall: 'categorical',
  funnel: 'categorical',
  stackedBar: 'series',
  multiLine: 'series',
  scatter: 'points',
  bubble: 'bubble',
  heatmap: 'matrix',
  candlestick: 'ohlc',
  boxPlot: 'distribution',
  violinPlot: 'distribution',
  gauge: 'gauge',
  pareto: 'pareto',
  flowchart: 'flow',
};

// ==================== SHAPE CHECKS ====================

const numbers = z.array(z.number());
const labels = z.array(z.string()).min(1);

const CategoricalSchema = z.object({ labels, values: numbers })
  .refine(d => d.values.length === d.labels.length);
const SeriesSchema = z.object({ labels, series: z.array(z.object({ name: z.string(), values: numbers })).min(1) })
  .refine(d => d.series.every(s => s.values.length === d.labels.length));
const PointsSchema = z.object({ x_values: numbers.min(1), y_values: numbers })
  .refine(d => d.x_values.length === d.y_values.length);
const BubbleSchema = z.object({ x_values: numbers.min(1), y_values: numbers, sizes: numbers })
  .refine(d => d.x_values.length === d.y_values.length && d.sizes.length === d.x_values.length);
const MatrixSchema = z.object({ labels, categories: z.array(z.string()).min(1), values: z.array(numbers) })
  .refine(d => d.values.length === d.categories.length && d.values.every(row => row.length === d.labels.length));
const OhlcSchema = z.object({ labels, open: numbers, high: numbers, low: numbers, close: numbers })
  .refine(d => [d.open, d.high, d.low, d.close].every(series => series.length === d.labels.length));
const DistributionSchema = z.object({ labels, data: z.array(numbers.min(1)) })
  .refine(d => d.data.length === d.labels.length);
const GaugeSchema = z.object({ value: z.number(), max: z.number().positive() });
const ParetoSchema = z.object({ labels, values: numbers, cumulative: numbers })
  .refine(d => d.values.length === d.labels.length && d.cumulative.length === d.labels.length);
const FlowSchema = z.object({
  nodes: z.array(z.object({ id: z.string(), label: z.string() })).min(1),
  edges: z.array(z.object({ from: z.string(), to: z.string() })),
});

const SHAPE_SCHEMAS: Record<PayloadShape, z.ZodTypeAny> = {
  categorical: CategoricalSchema,
  series: SeriesSchema,
  points: PointsSchema,
  bubble: BubbleSchema,
  matrix: MatrixSchema,
  ohlc: OhlcSchema,
  distribution: DistributionSchema,
  gauge: GaugeSchema,
  pareto: ParetoSchema,
  flow: FlowSchema,
};

/**
 * True when `data` has the shape the renderer expects for `kind`.
 */
export function isWellFormedPayload(kind: ChartKind, data: unknown): data is ChartPayload {
  return SHAPE_SCHEMAS[PAYLOAD_SHAPES[kind]].safeParse(data).success;
}

// ==================== SEEDED RANDOMNESS ====================

/** 32-bit FNV-1a hash, stable across runs and platforms */
export function hashTitle(title: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < title.length; i++) {
    h ^= title.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export type RandomSource = () => number;

/** mulberry32: small seeded PRNG returning floats in [0, 1) */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ==================== SYNTHETIC PAYLOADS ====================

const CATEGORIES = ['Segment A', 'Segment B', 'Segment C', 'Segment D', 'Segment E'];
const PERIODS = ['2020', '2021', '2022', '2023', '2024'];
const QUARTERS = ['Q1', 'Q2', 'Q3', 'Q4'];
const REGIONS = ['North', 'South', 'East', 'West'];
const FUNNEL_STAGES = ['Awareness', 'Interest', 'Consideration', 'Intent', 'Purchase'];
const WATERFALL_STEPS = ['Starting value', 'New business', 'Expansion', 'Churn', 'Ending value'];
const PROCESS_STEPS = ['Research', 'Analysis', 'Planning', 'Execution', 'Review'];

function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function round(value: number, digits = 0): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function randomWalk(random: RandomSource, length: number): number[] {
  const values = [randomInt(random, 80, 120)];
  while (values.length < length) {
    const previous = values[values.length - 1];
    values.push(Math.round(previous * (0.95 + random() * 0.25)));
  }
  return values;
}

/** Integer shares summing to exactly 100 */
function shares(random: RandomSource, count: number): number[] {
  const weights = Array.from({ length: count }, () => randomInt(random, 10, 40));
  const total = weights.reduce((sum, w) => sum + w, 0);
  const rounded = weights.map(w => Math.round((w / total) * 100));
  const drift = 100 - rounded.reduce((sum, v) => sum + v, 0);
  rounded[rounded.length - 1] += drift;
  return rounded;
}

/**
 * Placeholder data shaped for `kind`. With no explicit random source the
 * generator is seeded from the title, so a title always yields the same payload.
 */
export function generateChartPayload(
  kind: ChartKind,
  title: string,
  random: RandomSource = createSeededRandom(hashTitle(title))
): ChartPayload {
  switch (kind) {
    case 'line':
    case 'area':
      return { labels: [...PERIODS], values: randomWalk(random, PERIODS.length) };

    case 'pie':
    case 'donut':
    case 'treeMap':
    case 'sunburst':
      return { labels: CATEGORIES.slice(0, 4), values: shares(random, 4) };

    case 'bar':
    case 'horizontalBar':
    case 'radar':
    case 'histogram':
      return { labels: [...CATEGORIES], values: CATEGORIES.map(() => randomInt(random, 10, 100)) };

    case 'waterfall': {
      const start = randomInt(random, 80, 120);
      const gains = [randomInt(random, 5, 30), randomInt(random, 5, 20)];
      const loss = -randomInt(random, 5, 25);
      return { labels: [...WATERFALL_STEPS], values: [start, ...gains, loss, start + gains[0] + gains[1] + loss] };
    }

    case 'funnel': {
      const values = [randomInt(random, 800, 1200)];
      while (values.length < FUNNEL_STAGES.length) {
        values.push(Math.round(values[values.length - 1] * (0.4 + random() * 0.4)));
      }
      return { labels: [...FUNNEL_STAGES], values };
    }

    case 'stackedBar':
      return {
        labels: CATEGORIES.slice(0, 4),
        series: ['Series 1', 'Series 2', 'Series 3'].map(name => ({
          name,
          values: CATEGORIES.slice(0, 4).map(() => randomInt(random, 10, 60)),
        })),
      };

    case 'multiLine':
      return {
        labels: [...PERIODS],
        series: ['Series 1', 'Series 2', 'Series 3'].map(name => ({ name, values: randomWalk(random, PERIODS.length) })),
      };

    case 'scatter': {
      const x_values = Array.from({ length: 8 }, () => randomInt(random, 1, 100));
      const slope = 0.5 + random();
      return { x_values, y_values: x_values.map(x => round(x * slope + randomInt(random, -10, 10), 1)) };
    }

    case 'bubble': {
      const x_values = Array.from({ length: 6 }, () => randomInt(random, 1, 100));
      return {
        x_values,
        y_values: x_values.map(() => randomInt(random, 1, 100)),
        sizes: x_values.map(() => randomInt(random, 10, 60)),
      };
    }

    case 'heatmap':
      return {
        labels: [...QUARTERS],
        categories: [...REGIONS],
        values: REGIONS.map(() => QUARTERS.map(() => randomInt(random, 0, 100))),
      };

    case 'candlestick': {
      const open: number[] = [];
      const high: number[] = [];
      const low: number[] = [];
      const close: number[] = [];
      let previous = randomInt(random, 80, 120);
      for (let i = 0; i < PERIODS.length; i++) {
        const o = previous;
        const c = round(o * (0.95 + random() * 0.1), 2);
        open.push(o);
        close.push(c);
        high.push(round(Math.max(o, c) + random() * 5, 2));
        low.push(round(Math.min(o, c) - random() * 5, 2));
        previous = c;
      }
      return { labels: [...PERIODS], open, high, low, close };
    }

    case 'boxPlot':
    case 'violinPlot': {
      const groups = CATEGORIES.slice(0, 3);
      return {
        labels: groups,
        data: groups.map(() => {
          const center = randomInt(random, 30, 70);
          return Array.from({ length: 12 }, () => randomInt(random, center - 20, center + 20));
        }),
      };
    }

    case 'gauge':
      return { value: randomInt(random, 40, 95), max: 100 };

    case 'pareto': {
      const values = CATEGORIES.map(() => randomInt(random, 5, 60)).sort((a, b) => b - a);
      const total = values.reduce((sum, v) => sum + v, 0);
      let running = 0;
      const cumulative = values.map(v => {
        running += v;
        return round((running / total) * 100, 1);
      });
      return { labels: [...CATEGORIES], values, cumulative };
    }

    case 'flowchart':
      return {
        nodes: PROCESS_STEPS.map((label, i) => ({ id: `step${i + 1}`, label })),
        edges: PROCESS_STEPS.slice(1).map((_, i) => ({ from: `step${i + 1}`, to: `step${i + 2}` })),
      };
  }
}
