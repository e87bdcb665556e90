import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import type { OnProgressCallback, ReportController } from './controller.js';
import { errorMessage } from './errors.js';
import { JOBS_DIR, saveJob, type ProgressInfo, type ReportJob } from './jobs.js';
import type { ReportType } from './types/index.js';

export const BLUEPRINTS_DIR = join(homedir(), 'report-blueprints');

export interface StartReportParams {
  topic: string;
  page_count?: number;
  report_type?: ReportType;
  breadth?: number;
  depth?: number;
  keywords?: string[];
  chart_types?: string[];
}

export interface JobStartResult {
  jobId: string;
  estimatedSeconds: number;
}

export interface JobDirectories {
  jobsDir: string;
  blueprintsDir: string;
}

const DEFAULT_DIRECTORIES: JobDirectories = { jobsDir: JOBS_DIR, blueprintsDir: BLUEPRINTS_DIR };

/**
 * Rough wait estimate: ~10s per breadth query, ~10s per depth query
 * (two per extra level), plus blueprint synthesis.
 */
export function estimateWaitTime(breadth: number, depth: number): number {
  const depthQueries = depth > 1 ? Math.min(6, (depth - 1) * 2 + 2) : 0;
  return 30 + (breadth + depthQueries) * 10;
}

/**
 * File name for a saved blueprint: date, time and a slug of the topic.
 */
export function generateBlueprintFilename(
  topic: string,
  now: Date = new Date(),
  suffix: string = Math.random().toString(36).slice(2, 8)
): string {
  const iso = now.toISOString(); // e.g. 2025-12-11T21:03:16.480Z
  const date = iso.slice(0, 10);
  const time = iso.slice(11, 19).replaceAll(':', '');

  let slug = '';
  let lastDash = false;
  for (const ch of topic.toLowerCase().slice(0, 80)) {
    const isAlphaNum = (ch >= 'a' && ch <= 'z') || (ch >= '0' && ch <= '9');
    if (isAlphaNum) {
      slug += ch;
      lastDash = false;
    } else if (!lastDash) {
      slug += '-';
      lastDash = true;
    }
  }
  if (slug.startsWith('-')) slug = slug.slice(1);
  if (slug.endsWith('-')) slug = slug.slice(0, -1);

  return `blueprint-${date}-${time}-${slug || 'report'}-${suffix}.json`;
}

/**
 * Start a report job and return immediately; the run continues in the background.
 */
export function startReportJob(
  job: ReportJob,
  params: StartReportParams,
  controller: ReportController,
  directories: JobDirectories = DEFAULT_DIRECTORIES
): JobStartResult {
  const research = controller.getConfig().research;
  const breadth = params.breadth ?? research.breadth;
  const depth = params.depth ?? research.depth;

  runReportJob(job, params, controller, directories).catch(error =>
    console.error(`[Jobs] Job ${job.id} crashed:`, error)
  );

  return { jobId: job.id, estimatedSeconds: estimateWaitTime(breadth, depth) };
}

/**
 * Execute a report job, mirroring progress into the job and persisting it.
 * Never rejects for run failures: those mark the job failed.
 */
export async function runReportJob(
  job: ReportJob,
  params: StartReportParams,
  controller: ReportController,
  directories: JobDirectories = DEFAULT_DIRECTORIES
): Promise<void> {
  const { jobsDir, blueprintsDir } = directories;
  let progressSaved: Promise<void> = Promise.resolve();
  try {
    job.status = 'running';
    job.progress = { currentStep: 'Initializing', stepNumber: 1, totalSteps: 4, estimatedSecondsRemaining: 90 };
    await saveJob(job, jobsDir);

    // Progress saves are chained so a late write never lands after the final one
    const onProgress: OnProgressCallback = (progress: ProgressInfo) => {
      job.progress = progress;
      progressSaved = progressSaved.then(() => saveJob(job, jobsDir));
    };

    const output = await controller.execute({
      topic: params.topic,
      pageCount: params.page_count,
      reportType: params.report_type,
      breadth: params.breadth,
      depth: params.depth,
      keywords: params.keywords,
      chartKinds: params.chart_types,
      onProgress,
    });

    job.status = 'completed';
    job.completedAt = Date.now();
    job.result = output.markdown;
    job.blueprint = output.blueprint;
    job.summary = {
      learnings: output.research.learnings.length,
      sources: output.research.sourceMetadata.length,
      creditsUsed: output.research.creditsUsed,
      maxCredits: output.research.budget.maxCredits,
      usedFallback: output.usedFallback,
      stoppedReason: output.research.stoppedReason,
    };
    job.progress = 'Complete';
    await progressSaved;

    // Save blueprint file
    try {
      const filepath = join(blueprintsDir, generateBlueprintFilename(params.topic));
      await mkdir(blueprintsDir, { recursive: true });
      await writeFile(filepath, JSON.stringify(output.blueprint, null, 2), 'utf-8');
      job.blueprintPath = filepath;
      console.error(`[Jobs] Blueprint saved to: ${filepath}`);
    } catch (err) {
      console.error('[Jobs] Failed to save blueprint:', err);
    }

    await saveJob(job, jobsDir);
    console.error(`[Jobs] Job ${job.id} completed successfully`);
  } catch (error) {
    job.status = 'failed';
    job.completedAt = Date.now();
    job.error = errorMessage(error);
    job.progress = 'Failed';
    await progressSaved;
    await saveJob(job, jobsDir);
    console.error(`[Jobs] Job ${job.id} failed:`, job.error);
  }
}
