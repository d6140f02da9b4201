import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RenderService, RenderStatus } from '../../application/services/RenderService.js';
import type { RenderJob, RenderRequest } from '../../core/entities/RenderJob.js';
import type { InterruptOutcome } from '../../infrastructure/process/ProcessSupervisor.js';
import { formatClockTime, formatSeconds } from '../../utils/timeFormat.js';

export const StartRenderInput = {
  hip_path: z.string().describe('Absolute path of the .hip file to render'),
  out_node: z.string().describe('Path of the ROP node to render, e.g. /out/Redshift_ROP1'),
  start_frame: z.number().int().optional().describe('First frame (optional, defaults to the ROP range)'),
  end_frame: z.number().int().optional().describe('Last frame (optional, defaults to the ROP range)'),
  step: z.number().int().min(1).optional().describe('Frame step (optional, default 1)'),
  skip_existing: z
    .boolean()
    .optional()
    .describe('Skip frames whose output files already exist (optional, defaults to the ROP setting)'),
};

type StartRenderArgs = {
  hip_path: string;
  out_node: string;
  start_frame?: number;
  end_frame?: number;
  step?: number;
  skip_existing?: boolean;
};

/**
 * Tool arguments to a render request. Start and end must come together.
 */
export function toRenderRequest(args: StartRenderArgs): RenderRequest {
  const hasStart = args.start_frame !== undefined;
  const hasEnd = args.end_frame !== undefined;
  if (hasStart !== hasEnd) {
    throw new Error('start_frame and end_frame must be given together');
  }

  const request: RenderRequest = {
    hipPath: args.hip_path,
    outNode: args.out_node,
    skipExisting: args.skip_existing,
  };
  if (args.start_frame !== undefined && args.end_frame !== undefined) {
    request.frameRange = { start: args.start_frame, end: args.end_frame, step: args.step ?? 1 };
  }
  return request;
}

export function formatJobStarted(job: RenderJob): string {
  const range = job.frameRange
    ? `${job.frameRange.start}-${job.frameRange.end}${job.frameRange.step > 1 ? ` step ${job.frameRange.step}` : ''}`
    : 'ROP settings';

  return `# Render Started

- **Job ID**: ${job.id}
- **Scene**: ${job.hipPath}
- **ROP**: ${job.outNode}
- **Frames**: ${range}
- **Skip existing**: ${job.skipExisting ? 'yes' : 'no'}

## Command
\`\`\`
${job.commandLine}
\`\`\`

Use \`render-status\` to follow progress, \`interrupt-render\` to stop after the current frame.`;
}

const INTERRUPT_MESSAGES: Record<InterruptOutcome, string> = {
  signalled: 'Interrupt requested. The current frame will finish before the render stops.',
  fallback: 'The render process was asked to terminate. The current frame may not finish.',
  escalated: 'A stop was already requested, so the render was killed.',
  'not-running': 'The render process had already exited.',
  failed: 'The interrupt signal could not be delivered. It will be retried once the log goes quiet; use kill-render to stop immediately.',
};

export function formatInterruptOutcome(outcome: InterruptOutcome): string {
  return INTERRUPT_MESSAGES[outcome];
}

export function formatRenderStatus(status: RenderStatus, includeFrames: boolean): string {
  const { job } = status;
  if (!job) {
    return 'No render has been started since the server came up.';
  }

  const lines = [
    `# Render ${status.rendering ? 'In Progress' : 'Finished'}: ${job.id}`,
    '',
    `- **Status**: ${job.status}${status.monitorState ? ` (${status.monitorState})` : ''}`,
    `- **Scene**: ${job.hipPath}`,
    `- **ROP**: ${job.outNode}`,
    `- **Frames**: ${status.framesSeen} / ${status.discovery.totalFrames} (total from ${status.discovery.source})`,
    `- **Completed**: ${status.framesCompleted}`,
    `- **Skipped**: ${status.framesSkipped}`,
  ];

  if (status.currentFrame !== null) {
    lines.push(`- **Current frame**: ${status.currentFrame} (${status.currentFrameProgress}%)`);
  }

  const timing = status.timing;
  if (timing) {
    lines.push('', '## Timing');
    lines.push(`- **Elapsed**: ${formatSeconds(timing.elapsedSeconds)}`);
    if (timing.averageSeconds > 0) {
      lines.push(`- **Average per frame**: ${formatSeconds(timing.averageSeconds)}`);
    }
    if (timing.showEta) {
      lines.push(`- **Remaining**: ${formatSeconds(timing.remainingSeconds)} (${timing.confidence})`);
      lines.push(`- **ETA**: ${formatClockTime(timing.eta)}`);
    }
  }

  if (status.lastImage) {
    lines.push('', `**Last image**: ${status.lastImage}`);
  }
  if (job.error) {
    lines.push('', '## Error', '```', job.error, '```');
  }

  if (includeFrames && status.frames.length > 0) {
    lines.push('', '## Frames', '```json', JSON.stringify(status.frames, null, 2), '```');
  }

  return lines.join('\n');
}

function errorResult(prefix: string, error: unknown) {
  return {
    isError: true,
    content: [
      {
        type: 'text' as const,
        text: `${prefix}: ${error instanceof Error ? error.message : String(error)}`,
      },
    ],
  };
}

/**
 * Register start, interrupt, kill and status tools
 */
export function registerRenderControlTools(
  server: McpServer,
  renderService: RenderService,
  debugLog: (message: string) => void
) {
  server.tool(
    'start-render',
    'Start rendering a ROP node from a Houdini .hip file. Only one render runs at a time.',
    StartRenderInput,
    async (args) => {
      try {
        const job = await renderService.startRender(toRenderRequest(args));
        debugLog(`[Tools] start-render started job ${job.id}`);
        return { content: [{ type: 'text', text: formatJobStarted(job) }] };
      } catch (error) {
        return errorResult('Error starting render', error);
      }
    }
  );

  server.tool(
    'interrupt-render',
    'Stop the running render after its current frame. Calling it a second time kills the render.',
    {},
    async () => {
      try {
        const outcome = await renderService.interrupt();
        return { content: [{ type: 'text', text: formatInterruptOutcome(outcome) }] };
      } catch (error) {
        return errorResult('Error interrupting render', error);
      }
    }
  );

  server.tool(
    'kill-render',
    'Kill the running render immediately, including every process it started',
    {},
    async () => {
      try {
        const job = await renderService.kill();
        return {
          content: [{ type: 'text', text: `Render ${job.id} killed (status: ${job.status}).` }],
        };
      } catch (error) {
        return errorResult('Error killing render', error);
      }
    }
  );

  server.tool(
    'render-status',
    'Progress, timing and ETA of the current or most recent render',
    {
      include_frames: z.boolean().optional().describe('Include the per-frame table (default false)'),
    },
    async ({ include_frames }) => {
      try {
        return {
          content: [{ type: 'text', text: formatRenderStatus(renderService.getStatus(), include_frames ?? false) }],
        };
      } catch (error) {
        return errorResult('Error reading render status', error);
      }
    }
  );
}
