import { access } from 'fs/promises';
import { constants } from 'fs';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RenderService } from '../../application/services/RenderService.js';
import type { DatabaseConnection, HistoryStatistics } from '../../infrastructure/database/DatabaseConnection.js';

type ComponentStatus = 'healthy' | 'disabled' | 'error';

interface ComponentHealth {
  status: ComponentStatus;
  message: string;
}

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    renderScript: ComponentHealth;
    database: ComponentHealth & { statistics?: HistoryStatistics };
    renderer: ComponentHealth & { rendering: boolean; activeJobId: string | null; subscribers: number };
  };
}

export interface HealthCheckDependencies {
  renderService: RenderService;
  dbConnection: DatabaseConnection | null;
  renderScriptPath: string;
}

export async function checkHealth(deps: HealthCheckDependencies): Promise<HealthReport> {
  const status = deps.renderService.getStatus();
  const report: HealthReport = {
    timestamp: new Date().toISOString(),
    status: 'healthy',
    components: {
      renderScript: { status: 'healthy', message: deps.renderScriptPath },
      database: { status: 'disabled', message: 'Render history is disabled' },
      renderer: {
        status: 'healthy',
        message: status.rendering ? 'Render in progress' : 'Idle',
        rendering: status.rendering,
        activeJobId: status.rendering && status.job ? status.job.id : null,
        subscribers: deps.renderService.events.subscriberCount,
      },
    },
  };

  try {
    await access(deps.renderScriptPath, constants.R_OK);
  } catch (error) {
    report.components.renderScript = {
      status: 'error',
      message: `Render script not readable: ${error instanceof Error ? error.message : String(error)}`,
    };
    report.status = 'degraded';
  }

  if (deps.dbConnection) {
    try {
      const statistics = deps.dbConnection.getStatistics();
      report.components.database = {
        status: 'healthy',
        message: `Database connected - ${statistics.totalJobs} renders recorded`,
        statistics,
      };
    } catch (error) {
      report.components.database = {
        status: 'error',
        message: error instanceof Error ? error.message : String(error),
      };
      report.status = 'degraded';
    }
  }

  return report;
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, deps: HealthCheckDependencies) {
  server.tool(
    'health-check',
    'Check the health of the render monitor (render script, history database, renderer state)',
    {},
    async () => {
      try {
        const health = await checkHealth(deps);
        return {
          content: [
            {
              type: 'text',
              text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Health check error: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
