import { writeFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import type { ReportBlueprint, ReportType } from './types/index.js';

// Jobs directory for file-based persistence
export const JOBS_DIR = join(homedir(), '.report-jobs');

// Structured progress info for agents to make informed polling decisions
export interface ProgressInfo {
  currentStep: string;
  stepNumber: number;
  totalSteps: number;
  estimatedSecondsRemaining: number;
  checkCount?: number;       // How many times check_status called
  maxChecks?: number;        // Limit before suggesting user exit
  note?: string;             // e.g. the query currently running
}

// Run summary stored with a finished job
export interface JobSummary {
  learnings: number;
  sources: number;
  creditsUsed: number;
  maxCredits: number;
  usedFallback: boolean;
  stoppedReason?: 'budget_exhausted';
}

export interface ReportJob {
  id: string;
  status: 'pending' | 'running' | 'completed' | 'failed';
  topic: string;
  reportType: ReportType;
  pageCount: number;
  createdAt: number;
  completedAt?: number;
  result?: string;              // Markdown summary
  blueprint?: ReportBlueprint;
  summary?: JobSummary;
  error?: string;
  progress?: string | ProgressInfo;
  blueprintPath?: string;       // Path to saved blueprint JSON
}

// Shape check for job files; the blueprint is trusted as written by saveJob
const StoredJobSchema = z.object({
  id: z.string(),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  topic: z.string(),
  createdAt: z.number(),
}).passthrough();

// In-memory job storage
export const jobs = new Map<string, ReportJob>();

/**
 * Generate unique job ID
 */
export function generateJobId(): string {
  return `report-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Save job to file system
 */
export async function saveJob(job: ReportJob, dir: string = JOBS_DIR): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, `${job.id}.json`), JSON.stringify(job, null, 2), 'utf-8');
  } catch (error) {
    console.error(`[Jobs] Failed to save job ${job.id}:`, error);
  }
}

function isReportJob(value: unknown): value is ReportJob {
  return StoredJobSchema.safeParse(value).success;
}

/**
 * Load job from file system
 */
export async function loadJob(jobId: string, dir: string = JOBS_DIR): Promise<ReportJob | null> {
  let data: string;
  try {
    data = await readFile(join(dir, `${jobId}.json`), 'utf-8');
  } catch {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(data);
    return isReportJob(parsed) ? parsed : null;
  } catch (error) {
    console.error(`[Jobs] Job file for ${jobId} is corrupt:`, error);
    return null;
  }
}
