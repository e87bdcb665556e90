import { findCatalogEntry, CHART_CATALOG } from './charts/catalog.js';
import { isRecord, type Predicate } from './recovery.js';
import type { ChartCatalogEntry, DraftBlueprint, ReportBlueprint, ReportSection, ReportType } from './types/index.js';

export interface BlueprintRules {
  minSections: number;
  minContentChars: number;
}

export interface BlueprintValidation {
  valid: boolean;
  errors: string[];
}

const CHARS_PER_WORD = 5;
const MAX_REQUIRED_CONTENT_CHARS = 2000;

/** 1.5 pages per section, between 8 and 12 sections */
export function calculateSectionCount(pageCount: number): number {
  return Math.max(8, Math.min(12, Math.floor(pageCount / 1.5)));
}

export function targetWordsPerSection(pageCount: number, sectionCount: number = calculateSectionCount(pageCount)): number {
  return Math.max(600, Math.round((pageCount * 800) / sectionCount));
}

/**
 * Validation rules for a report of `pageCount` pages. The section minimum
 * grows with page count (3 for short reports, 8 from 12 pages); the content
 * minimum is a fraction of the target section length.
 */
export function blueprintRules(pageCount: number, minContentRatio = 0.5): BlueprintRules {
  const minSections = Math.max(3, Math.min(8, Math.floor(pageCount / 1.5)));
  const targetChars = targetWordsPerSection(pageCount) * CHARS_PER_WORD;
  return {
    minSections,
    minContentChars: Math.min(MAX_REQUIRED_CONTENT_CHARS, Math.round(targetChars * minContentRatio)),
  };
}

export function validateBlueprint(value: unknown, rules: BlueprintRules): BlueprintValidation {
  if (!isRecord(value)) {
    return { valid: false, errors: ['Blueprint is not an object'] };
  }
  const sections = value.sections;
  if (!Array.isArray(sections)) {
    return { valid: false, errors: ['Blueprint has no sections array'] };
  }

  const errors: string[] = [];
  if (sections.length < rules.minSections) {
    errors.push(`Expected at least ${rules.minSections} sections, got ${sections.length}`);
  }

  sections.forEach((section: unknown, i) => {
    const label = `Section ${i + 1}`;
    if (!isRecord(section)) {
      errors.push(`${label} is not an object`);
      return;
    }
    for (const field of ['title', 'content', 'chart_type'] as const) {
      if (typeof section[field] !== 'string') errors.push(`${label} is missing ${field}`);
    }
    const content = section.content;
    if (typeof content === 'string' && content.length < rules.minContentChars) {
      errors.push(`${label} content is ${content.length} chars, minimum ${rules.minContentChars}`);
    }
  });

  return { valid: errors.length === 0, errors };
}

/** Predicate form of validateBlueprint, for use with recoverJSON */
export function blueprintPredicate(rules: BlueprintRules): Predicate<DraftBlueprint> {
  return (value: unknown): value is DraftBlueprint => validateBlueprint(value, rules).valid;
}

/** Any object with a sections array; separates schema failures from parse failures */
export function hasSectionsArray(value: unknown): value is { sections: unknown[] } {
  return isRecord(value) && Array.isArray(value.sections);
}

// ==================== FALLBACK ====================

function fallbackSection(section: ReportSection, catalog: readonly ChartCatalogEntry[]): ReportSection {
  if (section.chart_type === 'none' || findCatalogEntry(catalog, section.chart_type)) return section;
  return { ...section, chart_type: 'none', chart_data: {} };
}

/**
 * Fixed generic blueprint used whenever generation, recovery or validation
 * fails. Chart kinds missing from the catalog are dropped to "none".
 */
export function createFallbackBlueprint(
  topic: string,
  reportType: ReportType,
  catalog: readonly ChartCatalogEntry[] = CHART_CATALOG
): ReportBlueprint {
  const sections: ReportSection[] = [
    {
      title: 'Executive Summary',
      content: `**Overview:** This report provides an analysis of ${topic}. It examines key trends, market dynamics and strategic implications for stakeholders.`,
      chart_type: 'none',
      chart_data: {},
    },
    {
      title: 'Market Analysis',
      content: '**Market Overview:** The market shows significant growth potential with diverse competitive dynamics. Understanding these factors is central to strategic decision-making.',
      chart_type: 'bar',
      chart_data: { labels: ['Segment A', 'Segment B', 'Segment C', 'Segment D'], values: [30, 25, 20, 25] },
    },
    {
      title: 'Trend Analysis',
      content: '**Growth Trends:** Recent years show consistent growth with some seasonal variation. Projections indicate continued expansion.',
      chart_type: 'line',
      chart_data: { labels: ['2020', '2021', '2022', '2023', '2024'], values: [100, 115, 130, 145, 160] },
    },
    {
      title: 'Strategic Recommendations',
      content: '**Action Items:** Key recommendations include market expansion, technology investment and strategic partnerships.',
      chart_type: 'none',
      chart_data: {},
    },
  ];

  return { topic, reportType, sections: sections.map(section => fallbackSection(section, catalog)) };
}
