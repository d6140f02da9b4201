import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { RenderJobRepository } from '../infrastructure/database/repositories/RenderJobRepository.js';
import { HythonCommandBuilder } from '../infrastructure/houdini/HythonCommandBuilder.js';
import { HipHistoryReader } from '../infrastructure/houdini/HipHistoryReader.js';
import { HythonRopMetadataProvider } from '../infrastructure/houdini/HythonRopMetadataProvider.js';
import { ProcessSupervisor } from '../infrastructure/process/ProcessSupervisor.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { RenderService } from '../application/services/RenderService.js';
import { RenderHistoryRecorder } from '../application/services/RenderHistoryRecorder.js';
import { DEFAULT_RETRY_CONFIG } from '../utils/retry.js';
import { registerRenderControlTools } from './tools/RenderControlTools.js';
import { registerRenderHistoryTools } from './tools/RenderHistoryTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';
import { registerSceneTools } from './tools/SceneTools.js';
import { StreamableHTTPTransportManager, SessionFactory } from '../infrastructure/transport/StreamableHTTPTransportManager.js';

/**
 * Wires the render service, history and transports together
 */
export class McpServer implements SessionFactory {
  private server: BaseMcpServer | null = null; // null in streamable mode (per-session servers)
  private renderService: RenderService;
  private ropProvider: HythonRopMetadataProvider;
  private hipHistory: HipHistoryReader;
  private dbConnection: DatabaseConnection | null = null;
  private renderRepo: RenderJobRepository | null = null;
  private historyRecorder: RenderHistoryRecorder | null = null;
  private webServer: WebServer | null = null;
  private streamableTransportManager: StreamableHTTPTransportManager | null = null;
  private debugLog: (message: string) => void;

  constructor(private config: Config) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    if (config.history.enabled) {
      this.dbConnection = new DatabaseConnection(config.history.databasePath);
      this.renderRepo = new RenderJobRepository(this.dbConnection.getDatabase());
    }

    this.ropProvider = new HythonRopMetadataProvider(
      config.houdini.hythonPath,
      config.houdini.inspectScriptPath,
      {
        ...DEFAULT_RETRY_CONFIG,
        maxAttempts: config.houdini.inspectAttempts,
        timeoutMs: config.houdini.inspectTimeoutMs,
      },
      undefined,
      this.debugLog
    );
    this.hipHistory = new HipHistoryReader(config.houdini.historyFile);

    // with inspection off, renders without a range rely on the log alone
    this.renderService = new RenderService(
      new ProcessSupervisor({ debugLog: this.debugLog }),
      new HythonCommandBuilder(config.houdini.hythonPath, config.houdini.renderScriptPath),
      config.houdini.inspectEnabled ? this.ropProvider : null,
      config.monitor,
      this.debugLog
    );

    if (this.renderRepo) {
      this.historyRecorder = new RenderHistoryRecorder(this.renderService.events, this.renderRepo, undefined, this.debugLog);
    }

    if (config.web.enabled) {
      this.webServer = new WebServer(
        this.renderService,
        this.renderRepo,
        this.dbConnection,
        this.ropProvider,
        this.hipHistory,
        config.web.port
      );
    }

    if (config.mcp.transport === 'stdio') {
      this.server = new BaseMcpServer({
        name: config.server.name,
        version: config.server.version,
      });
      this.registerToolsForServer(this.server);
    } else {
      this.streamableTransportManager = new StreamableHTTPTransportManager(this, config.mcp.sessionTimeoutMinutes);
    }
  }

  /**
   * Create a new MCP server instance for a session (SessionFactory implementation)
   */
  createServerForSession(sessionId: string): BaseMcpServer {
    this.debugLog(`Creating MCP server for session: ${sessionId}`);

    const server = new BaseMcpServer({
      name: this.config.server.name,
      version: this.config.server.version,
    });
    this.registerToolsForServer(server);
    return server;
  }

  private registerToolsForServer(server: BaseMcpServer) {
    registerRenderControlTools(server, this.renderService, this.debugLog);

    if (this.renderRepo) {
      registerRenderHistoryTools(server, this.renderRepo);
    }

    registerSceneTools(server, this.ropProvider, this.hipHistory);

    registerHealthCheckTool(server, {
      renderService: this.renderService,
      dbConnection: this.dbConnection,
      renderScriptPath: this.config.houdini.renderScriptPath,
    });
  }

  /**
   * Close out jobs a crashed process left running and prune old history
   */
  private prepareHistory() {
    if (!this.renderRepo) return;
    try {
      const failed = this.renderRepo.failUnfinishedJobs('Server stopped while the render was running', new Date());
      if (failed > 0) {
        console.error(`[History] Marked ${failed} unfinished render(s) as failed`);
      }
      const removed = this.renderRepo.deleteJobsByAge(this.config.history.retentionHours);
      if (removed > 0) {
        this.debugLog(`[History] Removed ${removed} render(s) older than ${this.config.history.retentionHours}h`);
      }
    } catch (error) {
      console.error('[History] Error preparing render history:', error);
    }
  }

  printStats() {
    if (!this.dbConnection) return;
    const stats = this.dbConnection.getStatistics();
    console.error(
      `History: ${stats.totalJobs} renders (${stats.jobsByStatus.completed} completed, ${stats.jobsByStatus.canceled} canceled, ${stats.jobsByStatus.killed} killed, ${stats.jobsByStatus.failed} failed), ${stats.framesRendered} frames, ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
  }

  async start() {
    if (this.dbConnection) {
      this.debugLog(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);
    }
    this.prepareHistory();
    this.historyRecorder?.start();

    if (this.webServer) {
      await this.webServer.start();
      if (this.streamableTransportManager) {
        this.webServer.enableStreamableTransport(this.streamableTransportManager);
      }
    }

    if (this.server) {
      const transport = new StdioServerTransport();

      process.stdin.on('error', (error) => {
        console.error('stdin error (non-fatal):', error.message);
      });
      process.stdout.on('error', (error) => {
        console.error('stdout error (non-fatal):', error.message);
      });
      process.stdin.on('end', () => {
        console.error('stdin ended - client may have disconnected');
      });

      await this.server.connect(transport);
      console.error('\nROP Render Monitor MCP Server running on stdio');
    } else {
      console.error('\nROP Render Monitor MCP Server running on Streamable HTTP mode');
      console.error(`MCP Endpoint: http://localhost:${this.config.web.port}/mcp`);
      console.error(`Session Info: http://localhost:${this.config.web.port}/mcp/sessions`);
    }
  }

  /**
   * Kills any running render, then closes transports and history
   */
  async shutdown() {
    console.error('\nShutting down gracefully...');

    await this.renderService.shutdown();
    this.historyRecorder?.stop();

    if (this.streamableTransportManager) {
      await this.streamableTransportManager.closeAll();
    }
    if (this.webServer) {
      await this.webServer.stop();
    }
    if (this.server) {
      await this.server.close();
    }

    this.dbConnection?.close();
  }
}
