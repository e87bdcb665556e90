/**
 * Format report results as clean markdown
 */

import { extractDomain } from './processing.js';
import type { ReportBlueprint, ResearchOutcome, SourceMetadata } from './types/index.js';

export interface ReportResult {
  blueprint: ReportBlueprint;
  research: ResearchOutcome;
  usedFallback: boolean;
  blueprintErrors: string[];
  recoveryStrategy?: string;   // Recovery strategy that produced the blueprint
  renderOutput?: string;       // Location returned by the renderer
  renderError?: string;
}

export type ReliabilityTier = 'high' | 'medium' | 'low' | 'unreliable';

const EXCERPT_LENGTH = 160;
const TOP_LEARNINGS = 10;

export function reliabilityTier(score: number): ReliabilityTier {
  if (score >= 0.8) return 'high';
  if (score >= 0.6) return 'medium';
  if (score >= 0.3) return 'low';
  return 'unreliable';
}

/** Markdown link labelled with the domain, or the bare URL when it does not parse */
export function formatSourceLink(url: string): string {
  const domain = extractDomain(url);
  return domain ? `[${domain}](${url})` : url;
}

function excerpt(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > EXCERPT_LENGTH ? `${flat.slice(0, EXCERPT_LENGTH)}...` : flat;
}

function formatSources(sources: SourceMetadata[]): string[] {
  const lines: string[] = [];
  const tiers: Array<{ tier: ReliabilityTier; heading: string }> = [
    { tier: 'high', heading: 'High reliability (0.8+)' },
    { tier: 'medium', heading: 'Medium reliability (0.6-0.8)' },
    { tier: 'low', heading: 'Low reliability (0.3-0.6)' },
    { tier: 'unreliable', heading: 'Unreliable (below 0.3)' },
  ];

  for (const { tier, heading } of tiers) {
    const inTier = sources
      .filter(s => reliabilityTier(s.reliabilityScore) === tier)
      .sort((a, b) => b.reliabilityScore - a.reliabilityScore);
    if (inTier.length === 0) continue;
    lines.push(`### ${heading}\n`);
    inTier.forEach((source, i) => {
      lines.push(`${i + 1}. ${formatSourceLink(source.url)} - ${source.reliabilityScore.toFixed(2)} - ${source.reliabilityReasoning}`);
    });
    lines.push('');
  }
  return lines;
}

/**
 * Format a report result as markdown: the planned sections, research totals,
 * the strongest learnings and the sources grouped by reliability.
 */
export function formatMarkdown(result: ReportResult): string {
  const { blueprint, research } = result;
  const charted = blueprint.sections.filter(s => s.chart_type !== 'none');
  const distinctKinds = new Set(charted.map(s => s.chart_type)).size;
  const lines: string[] = [];

  lines.push(`# Report Blueprint: ${blueprint.topic}\n`);
  lines.push(`**Report type:** ${blueprint.reportType.replace(/_/g, ' ')}`);
  lines.push(`**Sections:** ${blueprint.sections.length} | **Charts:** ${charted.length} (${distinctKinds} distinct kinds)`);
  lines.push(`**Credits used:** ${research.creditsUsed}/${research.budget.maxCredits}${research.stoppedReason === 'budget_exhausted' ? ' (stopped early: budget exhausted)' : ''}`);
  if (result.renderOutput) lines.push(`**Rendered to:** ${result.renderOutput}`);
  lines.push('');

  if (result.usedFallback) {
    lines.push(`> Generic fallback blueprint used: ${result.blueprintErrors.slice(0, 3).join('; ') || 'no details'}\n`);
  }
  if (result.renderError) {
    lines.push(`> Rendering failed: ${result.renderError}\n`);
  }

  lines.push('## Sections\n');
  blueprint.sections.forEach((section, i) => {
    lines.push(`${i + 1}. **${section.title}** (chart: ${section.chart_type})`);
    lines.push(`   ${excerpt(section.content)}`);
  });
  lines.push('');

  const { metrics, queryResults } = research;
  const failed = queryResults.filter(r => r.status === 'failed').length;
  const skipped = queryResults.filter(r => r.status === 'skipped').length;
  lines.push('## Research\n');
  lines.push(`- Learnings: ${research.learnings.length}`);
  lines.push(`- Sources: ${metrics.totalSources} (${metrics.highReliabilitySources} high reliability), average reliability ${metrics.averageReliability.toFixed(2)}`);
  lines.push(`- Queries: ${metrics.breadthQueries} breadth, ${metrics.depthQueries} depth, ${failed} failed, ${skipped} skipped`);
  lines.push('');

  if (research.learnings.length > 0) {
    lines.push('## Top Learnings\n');
    [...research.learnings]
      .sort((a, b) => b.reliability - a.reliability)
      .slice(0, TOP_LEARNINGS)
      .forEach((learning, i) => {
        lines.push(`${i + 1}. ${learning.content} (reliability ${learning.reliability.toFixed(2)})`);
      });
    lines.push('');
  }

  if (research.sourceMetadata.length > 0) {
    lines.push('## Sources\n');
    lines.push(...formatSources(research.sourceMetadata));
  }

  return lines.join('\n').trimEnd();
}
