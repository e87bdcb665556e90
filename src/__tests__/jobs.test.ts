import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Clock } from '../budget.js';
import { ReportController } from '../controller.js';
import {
  estimateWaitTime,
  generateBlueprintFilename,
  runReportJob,
  type JobDirectories,
} from '../job-orchestrator.js';
import { generateJobId, loadJob, saveJob, type ReportJob } from '../jobs.js';

const instantClock: Clock = { now: () => 0, sleep: async () => {} };

function newJob(id = 'report-test-1'): ReportJob {
  return {
    id,
    status: 'pending',
    topic: 'EV market',
    reportType: 'market_research',
    pageCount: 4,
    createdAt: 1_700_000_000_000,
    progress: 'Initializing...',
  };
}

function fakeSearch() {
  return {
    name: 'fake-search',
    search: vi.fn(async (query: string) => [
      { url: 'https://reuters.com/a', title: query, content: 'Global EV sales reached 14 million units in 2023.' },
    ]),
  };
}

let root: string;
let dirs: JobDirectories;

beforeEach(async () => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  root = await mkdtemp(join(tmpdir(), 'report-jobs-'));
  dirs = { jobsDir: join(root, 'jobs'), blueprintsDir: join(root, 'blueprints') };
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

// ==================== PERSISTENCE ====================

describe('job files', () => {
  it('round-trips a job through its file', async () => {
    const job = newJob();
    await saveJob(job, dirs.jobsDir);

    expect(await loadJob(job.id, dirs.jobsDir)).toEqual(job);
  });

  it('returns null for a missing job', async () => {
    expect(await loadJob('report-missing', dirs.jobsDir)).toBeNull();
  });

  it('returns null for a corrupt or foreign file', async () => {
    await saveJob(newJob('report-a'), dirs.jobsDir);
    await writeFile(join(dirs.jobsDir, 'report-a.json'), '{not json', 'utf-8');
    await writeFile(join(dirs.jobsDir, 'report-b.json'), JSON.stringify({ id: 'report-b' }), 'utf-8');

    expect(await loadJob('report-a', dirs.jobsDir)).toBeNull();
    expect(await loadJob('report-b', dirs.jobsDir)).toBeNull();
  });

  it('generates distinct report ids', () => {
    const id = generateJobId();
    expect(id.startsWith('report-')).toBe(true);
    expect(generateJobId()).not.toBe(id);
  });
});

// ==================== ORCHESTRATION ====================

describe('report job orchestration', () => {
  it('estimates wait time from breadth and depth', () => {
    expect(estimateWaitTime(4, 1)).toBe(70);
    expect(estimateWaitTime(4, 2)).toBe(110);
    expect(estimateWaitTime(4, 5)).toBe(130);
  });

  it('names blueprint files by date, time and topic slug', () => {
    const now = new Date('2025-01-02T03:04:05.000Z');

    expect(generateBlueprintFilename('EV Market: 2024 Outlook!', now, 'abc123')).toBe(
      'blueprint-2025-01-02-030405-ev-market-2024-outlook-abc123.json'
    );
    expect(generateBlueprintFilename('???', now, 'abc123')).toBe('blueprint-2025-01-02-030405-report-abc123.json');
  });

  it('completes a job, saves the blueprint and persists the summary', async () => {
    const controller = new ReportController({}, { generator: null, search: fakeSearch(), clock: instantClock });
    const job = newJob();

    await runReportJob(job, { topic: 'EV market', page_count: 4, breadth: 1, depth: 1 }, controller, dirs);

    expect(job.status).toBe('completed');
    expect(job.progress).toBe('Complete');
    expect(job.result?.startsWith('# Report Blueprint: EV market')).toBe(true);
    expect(job.summary).toEqual({
      learnings: 1,
      sources: 1,
      creditsUsed: 1,
      maxCredits: 20,
      usedFallback: true,
      stoppedReason: undefined,
    });

    const saved = await readdir(dirs.blueprintsDir);
    expect(saved).toHaveLength(1);
    expect(job.blueprintPath).toBe(join(dirs.blueprintsDir, saved[0]));
    const blueprint: unknown = JSON.parse(await readFile(join(dirs.blueprintsDir, saved[0]), 'utf-8'));
    expect(blueprint).toEqual(job.blueprint);

    const stored = await loadJob(job.id, dirs.jobsDir);
    expect(stored?.status).toBe('completed');
    expect(stored?.summary?.creditsUsed).toBe(1);
  });

  it('marks the job failed when the run throws', async () => {
    const controller = new ReportController({}, { generator: null, search: fakeSearch(), clock: instantClock });
    const job = newJob();

    await runReportJob(job, { topic: '  ' }, controller, dirs);

    expect(job.status).toBe('failed');
    expect(job.error).toBe('Topic must not be empty');
    expect(job.progress).toBe('Failed');
    expect((await loadJob(job.id, dirs.jobsDir))?.status).toBe('failed');
  });
});
