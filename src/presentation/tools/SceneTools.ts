import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { IRopMetadataProvider, RopNodeInfo } from '../../core/interfaces/IRopMetadataProvider.js';
import type { HipHistoryReader, RecentHipFile } from '../../infrastructure/houdini/HipHistoryReader.js';

export function formatRopList(hipPath: string, rops: RopNodeInfo[]): string {
  if (rops.length === 0) return `No render nodes found under /out in ${hipPath}.`;

  const rows = rops.map((rop) => {
    const step = rop.step > 1 ? ` step ${rop.step}` : '';
    return `| ${rop.path} | ${rop.nodeType ?? 'unknown'} | ${rop.startFrame}-${rop.endFrame}${step} | ${rop.skipRendered ? 'yes' : 'no'} |`;
  });

  return [
    `# Render Nodes in ${hipPath} (${rops.length})`,
    '',
    '| ROP | Type | Frames | Skip rendered |',
    '| --- | --- | --- | --- |',
    ...rows,
  ].join('\n');
}

export function formatRecentHipFiles(files: RecentHipFile[]): string {
  if (files.length === 0) return 'No recent scenes found in the Houdini file history.';

  return [
    `# Recent Scenes (${files.length})`,
    '',
    ...files.map((file) => `- ${file.path}${file.exists ? '' : ' (missing)'}`),
  ].join('\n');
}

/**
 * Register tools that look into scenes before a render is started
 */
export function registerSceneTools(server: McpServer, ropProvider: IRopMetadataProvider, hipHistory: HipHistoryReader) {
  server.tool(
    'list-rops',
    'List the render nodes under /out in a hip file with their frame range and skip setting',
    {
      hip_path: z.string().min(1).describe('Path to the .hip file'),
    },
    async ({ hip_path }) => {
      try {
        const rops = await ropProvider.listRops(hip_path);
        return { content: [{ type: 'text', text: formatRopList(hip_path, rops) }] };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error listing render nodes: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );

  server.tool(
    'recent-hip-files',
    'Scenes recently opened in Houdini, newest first',
    {
      limit: z.number().int().min(1).max(200).optional().describe('Maximum number of scenes (default 20)'),
    },
    async ({ limit }) => {
      const files = hipHistory.getRecentHipFiles(limit ?? 20);
      return { content: [{ type: 'text', text: formatRecentHipFiles(files) }] };
    }
  );
}
