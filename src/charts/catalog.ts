import type { ChartCatalogEntry, ChartKind } from '../types/index.js';

/**
 * Chart kinds the rendering side knows how to draw, tagged with the analytic
 * goal each serves. Order matters: assignment falls back to catalog order.
 */
export const CHART_CATALOG: readonly ChartCatalogEntry[] = [
  { id: 'bar', goal: 'comparison', dimensionality: '1D', complexity: 'simple', description: 'Vertical bars comparing categories' },
  { id: 'line', goal: 'trend', dimensionality: '1D', complexity: 'simple', description: 'Values over time' },
  { id: 'pie', goal: 'composition', dimensionality: '1D', complexity: 'simple', description: 'Shares of a whole' },
  { id: 'horizontalBar', goal: 'comparison', dimensionality: '1D', complexity: 'simple', description: 'Ranked categories with long labels' },
  { id: 'donut', goal: 'composition', dimensionality: '1D', complexity: 'simple', description: 'Shares of a whole with a central total' },
  { id: 'scatter', goal: 'correlation', dimensionality: '2D', complexity: 'medium', description: 'Relationship between two variables' },
  { id: 'area', goal: 'trend', dimensionality: '1D', complexity: 'medium', description: 'Volume over time' },
  { id: 'stackedBar', goal: 'composition', dimensionality: '1D', complexity: 'medium', description: 'Category totals split by series' },
  { id: 'multiLine', goal: 'trend', dimensionality: '1D', complexity: 'medium', description: 'Several series over time' },
  { id: 'radar', goal: 'comparison', dimensionality: 'nD', complexity: 'advanced', description: 'Scores across several dimensions' },
  { id: 'bubble', goal: 'correlation', dimensionality: '3D', complexity: 'advanced', description: 'Two variables plus a size dimension' },
  { id: 'heatmap', goal: 'correlation', dimensionality: '2D', complexity: 'advanced', description: 'Intensity matrix across two categories' },
  { id: 'waterfall', goal: 'flow', dimensionality: '1D', complexity: 'advanced', description: 'Cumulative effect of sequential changes' },
  { id: 'funnel', goal: 'flow', dimensionality: '1D', complexity: 'medium', description: 'Conversion through pipeline stages' },
  { id: 'gauge', goal: 'comparison', dimensionality: '1D', complexity: 'simple', description: 'Single metric against a maximum' },
  { id: 'treeMap', goal: 'composition', dimensionality: '2D', complexity: 'advanced', description: 'Hierarchical shares as nested areas' },
  { id: 'sunburst', goal: 'composition', dimensionality: 'nD', complexity: 'advanced', description: 'Hierarchical shares as rings' },
  { id: 'candlestick', goal: 'trend', dimensionality: '1D', complexity: 'advanced', description: 'Open/high/low/close per period' },
  { id: 'boxPlot', goal: 'distribution', dimensionality: '1D', complexity: 'medium', description: 'Quartiles and outliers per group' },
  { id: 'violinPlot', goal: 'distribution', dimensionality: '1D', complexity: 'advanced', description: 'Density of values per group' },
  { id: 'histogram', goal: 'distribution', dimensionality: '1D', complexity: 'simple', description: 'Frequency per value bucket' },
  { id: 'pareto', goal: 'distribution', dimensionality: '1D', complexity: 'advanced', description: 'Sorted contributions with cumulative share' },
  { id: 'flowchart', goal: 'flow', dimensionality: '2D', complexity: 'advanced', description: 'Process steps and transitions' },
];

export function findCatalogEntry(catalog: readonly ChartCatalogEntry[], kind: string): ChartCatalogEntry | undefined {
  return catalog.find(entry => entry.id === kind);
}

export function isChartKind(catalog: readonly ChartCatalogEntry[], kind: string): kind is ChartKind {
  return findCatalogEntry(catalog, kind) !== undefined;
}

/**
 * Subset of the catalog, keeping catalog order. Unknown ids are ignored.
 */
export function selectCatalog(kinds: readonly string[], catalog: readonly ChartCatalogEntry[] = CHART_CATALOG): ChartCatalogEntry[] {
  return catalog.filter(entry => kinds.includes(entry.id));
}
