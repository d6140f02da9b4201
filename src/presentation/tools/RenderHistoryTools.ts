import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { RENDER_JOB_STATUSES, type RenderJobRecord } from '../../core/entities/RenderJob.js';
import type { FrameRecord } from '../../core/entities/FrameRecord.js';
import type { IRenderJobRepository } from '../../core/interfaces/IRenderJobRepository.js';
import { formatDuration, formatSeconds } from '../../utils/timeFormat.js';

export function formatJobList(jobs: RenderJobRecord[]): string {
  if (jobs.length === 0) return 'No renders recorded yet.';

  const rows = jobs.map((job) => {
    const frames = `${job.framesCompleted + job.framesSkipped}/${job.totalFrames}`;
    return `| ${job.id} | ${job.createdAt.toISOString()} | ${job.outNode} | ${job.status} | ${frames} | ${formatDuration(job.elapsedSeconds)} |`;
  });

  return [
    `# Render History (${jobs.length})`,
    '',
    '| Job | Started | ROP | Status | Frames | Elapsed |',
    '| --- | --- | --- | --- | --- | --- |',
    ...rows,
  ].join('\n');
}

export function formatJobDetails(job: RenderJobRecord, frames: FrameRecord[] | null): string {
  const lines = [
    `# Render ${job.id}`,
    '',
    `- **Status**: ${job.status}`,
    `- **Scene**: ${job.hipPath}`,
    `- **ROP**: ${job.outNode}`,
    `- **Created**: ${job.createdAt.toISOString()}`,
    `- **Finished**: ${job.finishedAt ? job.finishedAt.toISOString() : 'not yet'}`,
    `- **Frames**: ${job.framesCompleted} rendered, ${job.framesSkipped} skipped, ${job.totalFrames} total`,
    `- **Elapsed**: ${formatSeconds(job.elapsedSeconds)}`,
    `- **Average per frame**: ${formatSeconds(job.averageFrameSeconds)}`,
  ];

  if (job.lastImage) lines.push(`- **Last image**: ${job.lastImage}`);
  if (job.error) lines.push('', '## Error', '```', job.error, '```');

  if (frames && frames.length > 0) {
    lines.push('', '## Frames');
    for (const frame of frames) {
      const duration = frame.durationSeconds !== null ? ` ${formatDuration(frame.durationSeconds)}` : '';
      lines.push(`- Frame ${frame.frameNumber}: ${frame.status}${duration}`);
    }
  }

  return lines.join('\n');
}

/**
 * Register tools that read the render history
 */
export function registerRenderHistoryTools(server: McpServer, repository: IRenderJobRepository) {
  server.tool(
    'list-renders',
    'List recorded renders, newest first',
    {
      limit: z.number().int().min(1).max(500).optional().describe('Maximum number of renders (default 20)'),
      status: z.enum(RENDER_JOB_STATUSES).optional().describe('Filter renders by status (optional)'),
    },
    async ({ limit, status }) => {
      try {
        const max = limit ?? 20;
        // status filter runs over a wider window so a filtered list still fills up
        const jobs = repository.getAllJobs(status ? max * 10 : max);
        const filtered = (status ? jobs.filter((job) => job.status === status) : jobs).slice(0, max);
        return { content: [{ type: 'text', text: formatJobList(filtered) }] };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error listing renders: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );

  server.tool(
    'get-render',
    'Details of one recorded render',
    {
      job_id: z.string().describe('The ID of the render job'),
      include_frames: z.boolean().optional().describe('List every frame (default true)'),
    },
    async ({ job_id, include_frames }) => {
      try {
        const job = repository.getJob(job_id);
        if (!job) {
          return { isError: true, content: [{ type: 'text', text: `Render not found: ${job_id}` }] };
        }
        const frames = include_frames === false ? null : repository.getFrames(job_id);
        return { content: [{ type: 'text', text: formatJobDetails(job, frames) }] };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error reading render: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
