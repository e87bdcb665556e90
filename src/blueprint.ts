/**
 * Blueprint synthesis
 *
 * Flow: build prompt from learnings → text generator → recover JSON →
 * validate → assign charts. Any failure along the way yields the fixed
 * fallback blueprint instead of an error.
 */

import { assignCharts, DEFAULT_CHART_INCLUSION, type ChartInclusionOptions } from './charts/assignment.js';
import { CHART_CATALOG } from './charts/catalog.js';
import {
  blueprintPredicate,
  blueprintRules,
  calculateSectionCount,
  createFallbackBlueprint,
  hasSectionsArray,
  targetWordsPerSection,
  validateBlueprint,
  type BlueprintRules,
} from './blueprint-validation.js';
import { RecoveryFailedError, ValidationFailedError, errorMessage } from './errors.js';
import { recoverJSON, recoverJSONOrThrow, type RecoveryResult } from './recovery.js';
import { DEFAULT_RETRY, type RetryOptions, withRetry } from './retry.js';
import type {
  ChartCatalogEntry,
  DraftBlueprint,
  DraftSection,
  Learning,
  ReportBlueprint,
  ReportType,
  SourceMetadata,
  TextGenerator,
} from './types/index.js';

export interface BlueprintRequest {
  topic: string;
  pageCount: number;
  reportType: ReportType;
}

export interface BlueprintOptions {
  generator?: TextGenerator;
  catalog?: readonly ChartCatalogEntry[];
  chartInclusion?: ChartInclusionOptions;
  minContentRatio?: number;
  maxOutputTokens?: number;
  retry?: RetryOptions;
  sleep?: (ms: number) => Promise<void>;
}

export interface BlueprintResult {
  blueprint: ReportBlueprint;
  usedFallback: boolean;
  strategy?: string;          // Recovery strategy that produced the blueprint
  errors: string[];
}

const MAX_PROMPT_LEARNINGS = 40;

export const SECTION_TEMPLATES: Record<ReportType, Array<{ title: string; chart_type: string }>> = {
  market_research: [
    { title: 'Executive Summary', chart_type: 'none' },
    { title: 'Market Overview', chart_type: 'none' },
    { title: 'Market Size & Growth', chart_type: 'line' },
    { title: 'Market Segmentation', chart_type: 'pie' },
    { title: 'Competitive Analysis', chart_type: 'bar' },
    { title: 'Customer Analysis', chart_type: 'bar' },
    { title: 'Trend Analysis', chart_type: 'line' },
    { title: 'Market Opportunities', chart_type: 'scatter' },
    { title: 'Strategic Recommendations', chart_type: 'none' },
  ],
  company_analysis: [
    { title: 'Executive Summary', chart_type: 'none' },
    { title: 'Company Overview & History', chart_type: 'none' },
    { title: 'Financial Performance & Growth', chart_type: 'line' },
    { title: 'Market Position & Share', chart_type: 'bar' },
    { title: 'Product Portfolio Analysis', chart_type: 'pie' },
    { title: 'Competitive Landscape', chart_type: 'bar' },
    { title: 'Innovation & Future Outlook', chart_type: 'line' },
    { title: 'Risk Assessment', chart_type: 'none' },
    { title: 'Strategic Recommendations', chart_type: 'none' },
  ],
  industry_report: [
    { title: 'Executive Summary', chart_type: 'none' },
    { title: 'Industry Structure & Value Chain', chart_type: 'flowchart' },
    { title: 'Industry Size & Growth', chart_type: 'line' },
    { title: 'Regional Analysis', chart_type: 'heatmap' },
    { title: 'Competitive Landscape', chart_type: 'bar' },
    { title: 'Regulatory Environment', chart_type: 'none' },
    { title: 'Technology & Innovation Trends', chart_type: 'area' },
    { title: 'Industry Outlook', chart_type: 'line' },
    { title: 'Strategic Recommendations', chart_type: 'none' },
  ],
  technical_analysis: [
    { title: 'Executive Summary', chart_type: 'none' },
    { title: 'Background & Context', chart_type: 'none' },
    { title: 'Key Findings', chart_type: 'bar' },
    { title: 'Performance Benchmark Analysis', chart_type: 'bar' },
    { title: 'Adoption Trend Analysis', chart_type: 'line' },
    { title: 'Comparative Analysis', chart_type: 'radar' },
    { title: 'Impact Assessment', chart_type: 'pie' },
    { title: 'Future Projections', chart_type: 'line' },
    { title: 'Conclusion', chart_type: 'none' },
  ],
};

function formatSourceTiers(sources: SourceMetadata[]): string {
  const tier = (label: string, items: SourceMetadata[]) =>
    [`${label}: ${items.length} sources`, ...items.map(s => `- ${s.domain}: ${Math.round(s.reliabilityScore * 100)}% - ${s.reliabilityReasoning}`)].join('\n');

  return [
    tier('HIGH RELIABILITY (>=80%)', sources.filter(s => s.reliabilityScore >= 0.8)),
    tier('MEDIUM RELIABILITY (60-79%)', sources.filter(s => s.reliabilityScore >= 0.6 && s.reliabilityScore < 0.8)),
    tier('LOW RELIABILITY (30-59%)', sources.filter(s => s.reliabilityScore >= 0.3 && s.reliabilityScore < 0.6)),
  ].join('\n\n');
}

export function buildBlueprintPrompt(
  request: BlueprintRequest,
  research: { learnings: Learning[]; sources: SourceMetadata[] },
  catalog: readonly ChartCatalogEntry[] = CHART_CATALOG
): string {
  const sectionCount = calculateSectionCount(request.pageCount);
  const targetWords = targetWordsPerSection(request.pageCount, sectionCount);
  const learnings = [...research.learnings]
    .sort((a, b) => b.reliability - a.reliability)
    .slice(0, MAX_PROMPT_LEARNINGS)
    .map(l => `<learning reliability="${l.reliability.toFixed(2)}">${l.content}</learning>`)
    .join('\n');

  return `
You are an expert report writer and analyst. Plan a ${request.pageCount}-page ${request.reportType.replace(/_/g, ' ')} report on: "${request.topic}"

CRITICAL: Output ONLY valid JSON. No explanations, no markdown.

REQUIREMENTS:
- Total sections: ${sectionCount}
- Target content per section: ${targetWords} words
- Use the research learnings below; prefer higher-reliability learnings and cite figures exactly

SECTION TEMPLATE (adapt titles to the topic, keep the order):
${JSON.stringify(SECTION_TEMPLATES[request.reportType], null, 2)}

RESEARCH LEARNINGS:
${learnings || '(no research learnings available; rely on general knowledge and say so)'}

SOURCE RELIABILITY:
${formatSourceTiers(research.sources)}

AVAILABLE CHART TYPES: ${catalog.map(entry => `${entry.id} (${entry.goal})`).join(', ')}, none

REQUIRED JSON FORMAT:
{
  "sections": [
    {
      "title": "Section Title",
      "content": "Detailed analytical content with **bold** headings and - bullet points",
      "chart_type": "<one of the chart types above>",
      "chart_data": { "labels": ["A", "B"], "values": [10, 20] }
    }
  ]
}

JSON RULES:
1. Double quotes around every property name and string value
2. Escape quotes inside content with a backslash and use \\n for line breaks
3. No trailing commas
4. Only include chart_data built from figures in the learnings; otherwise use {}
`.trim();
}

/**
 * Recover a blueprint that passes validation.
 * Throws ValidationFailedError when the response parses into a blueprint-like
 * object that breaks the rules, RecoveryFailedError when nothing parses.
 */
export function recoverBlueprint(text: string, rules: BlueprintRules): RecoveryResult<DraftBlueprint> {
  const recovered = recoverJSON(text, blueprintPredicate(rules));
  if (recovered) return recovered;

  const loose = recoverJSONOrThrow(text, hasSectionsArray, 'blueprint');
  const { errors } = validateBlueprint(loose.value, rules);
  throw new ValidationFailedError(`Blueprint failed validation: ${errors.slice(0, 3).join('; ')}`, errors);
}

function normalizeSections(sections: DraftSection[]): DraftSection[] {
  return sections.map(section => ({
    title: section.title.trim(),
    content: section.content.trim(),
    chart_type: section.chart_type.trim(),
    chart_data: section.chart_data,
  }));
}

export async function generateBlueprint(
  request: BlueprintRequest,
  research: { learnings: Learning[]; sources: SourceMetadata[] },
  options: BlueprintOptions = {}
): Promise<BlueprintResult> {
  const catalog = options.catalog ?? CHART_CATALOG;
  const rules = blueprintRules(request.pageCount, options.minContentRatio);
  const fallback = (errors: string[]): BlueprintResult => ({
    blueprint: createFallbackBlueprint(request.topic, request.reportType, catalog),
    usedFallback: true,
    errors,
  });

  const generator = options.generator;
  if (!generator) {
    console.error('[Blueprint] No text generator configured, using fallback blueprint');
    return fallback(['No text generator configured']);
  }

  const prompt = buildBlueprintPrompt(request, research, catalog);
  let response: string;
  try {
    response = await withRetry(
      'blueprint generation',
      () => generator.generate(prompt, { temperature: 0.7, maxOutputTokens: options.maxOutputTokens }),
      options.retry ?? DEFAULT_RETRY,
      options.sleep
    );
  } catch (error) {
    console.error(`[Blueprint] Generation failed, using fallback blueprint: ${errorMessage(error)}`);
    return fallback([errorMessage(error)]);
  }

  try {
    const { value, strategy } = recoverBlueprint(response, rules);
    const sections = assignCharts(normalizeSections(value.sections), catalog, options.chartInclusion ?? DEFAULT_CHART_INCLUSION);
    console.error(`[Blueprint] ${sections.length} sections recovered via "${strategy}"`);
    return {
      blueprint: { topic: request.topic, reportType: request.reportType, sections },
      usedFallback: false,
      strategy,
      errors: [],
    };
  } catch (error) {
    if (error instanceof ValidationFailedError) {
      console.error(`[Blueprint] ${error.message}, using fallback blueprint`);
      return fallback(error.errors);
    }
    if (error instanceof RecoveryFailedError) {
      console.error(`[Blueprint] ${error.message}, using fallback blueprint`);
      return fallback([error.message]);
    }
    throw error;
  }
}
