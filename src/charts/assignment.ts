/**
 * Chart type assignment for report sections.
 *
 * Narrative sections get no chart. Analytical sections get a kind chosen from
 * an ordered keyword table, under a diversity rule: no kind repeats within a
 * blueprint until every catalog kind has been used once.
 */

import type { ChartCatalogEntry, ChartKind, DraftSection, ReportSection } from '../types/index.js';
import { CHART_CATALOG, findCatalogEntry, isChartKind } from './catalog.js';
import { generateChartPayload, isWellFormedPayload } from './payload.js';

export interface ChartInclusionOptions {
  minContentChars: number;   // Below this no section gets a chart
  richContentChars: number;  // Sections without analytical titles need this much content
}

export const DEFAULT_CHART_INCLUSION: ChartInclusionOptions = {
  minContentChars: 200,
  richContentChars: 1500,
};

const NARRATIVE_KEYWORDS = [
  'summary', 'conclusion', 'methodolog', 'introduction', 'recommendation', 'appendix',
  'reference', 'bibliograph', 'glossary', 'disclaimer', 'acknowledg', 'next steps', 'about this',
];

const ANALYTICAL_KEYWORDS = [
  'analysis', 'comparison', 'compare', 'trend', 'competitive', 'competition', 'financial', 'growth',
  'segmentation', 'segment', 'market size', 'market share', 'forecast', 'performance', 'metrics',
  'statistics', 'breakdown', 'distribution', 'revenue', 'pricing', 'landscape', 'benchmark',
  'ranking', 'regional', 'geographic', 'funnel', 'pipeline', 'adoption', 'outlook',
];

/**
 * Scanned top to bottom; every row whose keywords hit the title contributes
 * its kind, in table order.
 */
export const CHART_KEYWORD_TABLE: ReadonlyArray<{ keywords: readonly string[]; kind: ChartKind }> = [
  { keywords: ['growth', 'trend', 'forecast'], kind: 'line' },
  { keywords: ['segmentation', 'breakdown', 'composition'], kind: 'pie' },
  { keywords: ['competitive', 'ranking', 'benchmark'], kind: 'bar' },
  { keywords: ['financial', 'cumulative'], kind: 'waterfall' },
  { keywords: ['funnel', 'pipeline', 'leads'], kind: 'funnel' },
  { keywords: ['geographic', 'regional'], kind: 'heatmap' },
  { keywords: ['multi-dimensional', 'complex'], kind: 'bubble' },
  { keywords: ['statistics', 'variance'], kind: 'boxPlot' },
];

function matches(title: string, keywords: readonly string[]): boolean {
  const lowered = title.toLowerCase();
  return keywords.some(keyword => lowered.includes(keyword));
}

export function isNarrativeTitle(title: string): boolean {
  return matches(title, NARRATIVE_KEYWORDS);
}

export function shouldIncludeChart(
  title: string,
  contentLength: number,
  options: ChartInclusionOptions = DEFAULT_CHART_INCLUSION
): boolean {
  if (isNarrativeTitle(title)) return false;
  if (contentLength < options.minContentChars) return false;
  if (matches(title, ANALYTICAL_KEYWORDS)) return true;
  return contentLength >= options.richContentChars;
}

export function keywordCandidates(title: string, catalog: readonly ChartCatalogEntry[] = CHART_CATALOG): ChartKind[] {
  const kinds: ChartKind[] = [];
  for (const row of CHART_KEYWORD_TABLE) {
    if (matches(title, row.keywords) && !kinds.includes(row.kind) && findCatalogEntry(catalog, row.kind)) {
      kinds.push(row.kind);
    }
  }
  return kinds;
}

function leastUsed(pool: readonly ChartKind[], usage: Map<ChartKind, number>): ChartKind {
  let best = pool[0];
  for (const kind of pool) {
    if ((usage.get(kind) ?? 0) < (usage.get(best) ?? 0)) best = kind;
  }
  return best;
}

/**
 * Pick a chart kind for a section title given the kinds already used in this
 * blueprint. While unused kinds remain the result is always unused: a fresh
 * keyword match first, then an unused kind sharing a matched kind's analytic
 * goal, then the first unused kind in catalog order. Once every kind has been
 * used, the least-used candidate wins, ties going to table or catalog order.
 * Null only for an empty catalog.
 */
export function suggestChartType(
  title: string,
  usedKinds: readonly ChartKind[],
  catalog: readonly ChartCatalogEntry[] = CHART_CATALOG
): ChartKind | null {
  if (catalog.length === 0) return null;

  const usage = new Map<ChartKind, number>();
  for (const kind of usedKinds) usage.set(kind, (usage.get(kind) ?? 0) + 1);

  const matched = keywordCandidates(title, catalog);
  const unused = catalog.filter(entry => !usage.has(entry.id));

  if (unused.length > 0) {
    const fresh = matched.find(kind => !usage.has(kind));
    if (fresh) return fresh;

    for (const kind of matched) {
      const goal = findCatalogEntry(catalog, kind)?.goal;
      const sameGoal = unused.find(entry => entry.goal === goal);
      if (sameGoal) return sameGoal.id;
    }
    return unused[0].id;
  }

  return leastUsed(matched.length > 0 ? matched : catalog.map(entry => entry.id), usage);
}

/**
 * Final chart assignment for a blueprint's sections, in order.
 *
 * A chart type the generator proposed is kept, with its data, when it is a
 * catalog kind the diversity rule still allows and its data is well-formed.
 * Otherwise the suggested kind gets a seeded synthetic payload.
 */
export function assignCharts(
  sections: DraftSection[],
  catalog: readonly ChartCatalogEntry[] = CHART_CATALOG,
  options: ChartInclusionOptions = DEFAULT_CHART_INCLUSION
): ReportSection[] {
  const used: ChartKind[] = [];
  const allUsed = (): boolean => catalog.every(entry => used.includes(entry.id));

  const assigned = sections.map((section): ReportSection => {
    const base = { title: section.title, content: section.content };
    if (!shouldIncludeChart(section.title, section.content.length, options)) {
      return { ...base, chart_type: 'none', chart_data: {} };
    }

    const proposed = section.chart_type;
    if (
      isChartKind(catalog, proposed) &&
      (!used.includes(proposed) || allUsed()) &&
      isWellFormedPayload(proposed, section.chart_data)
    ) {
      used.push(proposed);
      return { ...base, chart_type: proposed, chart_data: section.chart_data };
    }

    const kind = suggestChartType(section.title, used, catalog);
    if (!kind) return { ...base, chart_type: 'none', chart_data: {} };
    used.push(kind);
    return { ...base, chart_type: kind, chart_data: generateChartPayload(kind, section.title) };
  });

  console.error(`[Charts] Assigned ${used.length} charts (${new Set(used).size} distinct kinds) across ${sections.length} sections`);
  return assigned;
}
