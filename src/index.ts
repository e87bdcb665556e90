import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { CHART_CATALOG } from './charts/catalog.js';
import { ReportController } from './controller.js';
import { startReportJob } from './job-orchestrator.js';
import { jobs, generateJobId, saveJob, loadJob, type ReportJob } from './jobs.js';

// In-memory check count tracking, only used for the "Still running (X/5 checks)" message
const jobCheckCounts = new Map<string, number>();
const MAX_CHECKS = 5;

// Create the MCP server
const server = new McpServer({
  name: 'report-planner-mcp',
  version: '1.0.0',
});

// Created on first use so env from mcp.json is in place
let controller: ReportController | null = null;

function getController(): ReportController {
  if (!controller) {
    controller = new ReportController(process.env);
  }
  return controller;
}

function textResult(value: unknown, isError = false) {
  return {
    content: [{ type: 'text' as const, text: typeof value === 'string' ? value : JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

server.registerTool(
  'start_report_research',
  {
    title: 'Start Report Research',
    description: `Researches a topic under a credit budget and plans a report: ordered sections with content, a chart type per section and chart data.

**Flow:** breadth queries → source reliability filtering → learning extraction → depth queries anchored on the strongest learnings → blueprint synthesis → chart assignment.

Runs in the background. Returns a job_id; poll check_report_status until the job is completed or failed.

**Guarantees:**
- Credits used never exceed the configured budget; when it runs out the report is planned from partial research
- A structurally valid blueprint is always produced (a generic one when synthesis fails)
- Chart types do not repeat until every available kind has been used`,
    inputSchema: {
      topic: z.string().min(1).describe('Report topic. Example: "European electric vehicle charging market"'),
      page_count: z.number().int().min(1).max(100).optional().describe('Target report length in pages (default 12). Scales section count and length.'),
      report_type: z
        .enum(['market_research', 'company_analysis', 'industry_report', 'technical_analysis'])
        .optional()
        .describe('Section template to plan against (default market_research)'),
      breadth: z.number().int().min(1).max(10).optional().describe('Breadth queries to run (capped by MAX_RESEARCH_BREADTH)'),
      depth: z.number().int().min(1).max(10).optional().describe('Research depth; 1 skips follow-up queries (capped by MAX_RESEARCH_DEPTH)'),
      keywords: z.array(z.string()).optional().describe('Seed keywords. Example: ["fast charging", "Germany", "Ionity"]'),
      chart_types: z.array(z.string()).optional().describe('Restrict charts to these catalog ids (see get_chart_catalog)'),
    },
  },
  async (params) => {
    const jobId = generateJobId();
    const ctrl = getController();
    const job: ReportJob = {
      id: jobId,
      status: 'pending',
      topic: params.topic,
      reportType: params.report_type ?? 'market_research',
      pageCount: params.page_count ?? ctrl.getConfig().blueprint.defaultPageCount,
      createdAt: Date.now(),
      progress: 'Initializing...',
    };
    jobs.set(jobId, job);
    await saveJob(job);

    console.error(`[Jobs] Created job ${jobId} for: "${params.topic}"`);

    const { estimatedSeconds } = startReportJob(job, params, ctrl);

    return textResult({
      job_id: jobId,
      status: 'pending',
      message: `Report job started. Wait at least ${estimatedSeconds} seconds before calling check_report_status.`,
      estimated_duration_seconds: estimatedSeconds,
      topic: params.topic,
    });
  }
);

server.registerTool(
  'check_report_status',
  {
    title: 'Check Report Job Status',
    description: `Check the status of a job started with start_report_research.

**Status values:**
- pending / running: in progress, with the current step
- completed: markdown summary of the plan (sections, chart types, research totals, sources by reliability)
- failed: the error

Set full=true to also get the blueprint JSON.`,
    inputSchema: {
      job_id: z.string().describe('The job_id returned from start_report_research'),
      full: z.boolean().optional().describe('Include the full blueprint JSON'),
    },
  },
  async ({ job_id, full }) => {
    // First check in-memory cache, then the job file (handles server restart)
    let job = jobs.get(job_id);
    if (!job) {
      const fileJob = await loadJob(job_id);
      if (fileJob) {
        job = fileJob;
        jobs.set(job_id, job);
        console.error(`[Jobs] Loaded job ${job_id} from file`);
      }
    }

    if (!job) {
      return textResult({ error: 'Job not found', message: `No job with ID "${job_id}".` }, true);
    }

    const response: Record<string, unknown> = {
      job_id: job.id,
      status: job.status,
      topic: job.topic,
      created_at: new Date(job.createdAt).toISOString(),
    };

    if (job.status === 'running' && typeof job.progress === 'object') {
      const checkCount = (jobCheckCounts.get(job_id) ?? 0) + 1;
      jobCheckCounts.set(job_id, checkCount);
      response.progress = {
        ...job.progress,
        checkCount,
        maxChecks: MAX_CHECKS,
        ...(checkCount >= 3 ? { message: `Still running (${checkCount}/${MAX_CHECKS} checks). If unresponsive after ${MAX_CHECKS} checks, inform user and exit.` } : {}),
      };
    } else if (job.status === 'running' || job.status === 'pending') {
      response.progress = job.progress;
    }

    if (job.completedAt) {
      response.completed_at = new Date(job.completedAt).toISOString();
      response.duration_seconds = Math.round((job.completedAt - job.createdAt) / 1000);
      jobCheckCounts.delete(job_id);
    }

    if (job.status === 'failed') {
      response.error = job.error;
      return textResult(response);
    }

    if (job.status === 'completed' && job.result) {
      const saved = job.blueprintPath ? `\n\n---\n**Blueprint saved to**: \`${job.blueprintPath}\`` : '';
      const blueprint = full && job.blueprint ? `\n\n## Blueprint JSON\n\n\`\`\`json\n${JSON.stringify(job.blueprint, null, 2)}\n\`\`\`` : '';
      return textResult(job.result + saved + blueprint);
    }

    return textResult(response);
  }
);

server.registerTool(
  'get_chart_catalog',
  {
    title: 'Get Chart Catalog',
    description: 'Lists the chart types blueprints can use, with the analytic goal, dimensionality and complexity of each. Pass ids to start_report_research chart_types to restrict assignment.',
    inputSchema: {
      goal: z
        .enum(['trend', 'comparison', 'composition', 'correlation', 'distribution', 'flow'])
        .optional()
        .describe('Only list chart types serving this goal'),
    },
  },
  async ({ goal }) => {
    const entries = goal ? CHART_CATALOG.filter(entry => entry.goal === goal) : CHART_CATALOG;
    return textResult({ count: entries.length, chart_types: entries });
  }
);

// Start the server
async function main() {
  console.error('[Report MCP] Starting server...');

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('[Report MCP] Server ready on stdio');
  console.error('[Report MCP] Available tools: start_report_research, check_report_status, get_chart_catalog');

  const shutdown = () => {
    console.error('\n[Report MCP] Shutting down...');
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[Report MCP] Fatal error:', error);
  process.exit(1);
});
