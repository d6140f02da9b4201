import express, { Express, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import type { RenderService } from '../../application/services/RenderService.js';
import type { MonitorEvent } from '../../core/entities/MonitorEvent.js';
import {
  InvalidRenderRequestError,
  NoActiveRenderError,
  RenderError,
  RenderInProgressError,
  RopMetadataError,
} from '../../core/errors/RenderErrors.js';
import type { IRenderJobRepository } from '../../core/interfaces/IRenderJobRepository.js';
import type { IRopMetadataProvider } from '../../core/interfaces/IRopMetadataProvider.js';
import type { DatabaseConnection } from '../database/DatabaseConnection.js';
import type { HipHistoryReader } from '../houdini/HipHistoryReader.js';
import type { ChannelSubscription } from '../queue/MonitorChannel.js';
import type { StreamableHTTPTransportManager } from '../transport/StreamableHTTPTransportManager.js';

export const BROADCAST_INTERVAL_MS = 100;

/**
 * HTTP status for an error raised by the render service
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof InvalidRenderRequestError) return 400;
  if (error instanceof RenderInProgressError || error instanceof NoActiveRenderError) return 409;
  if (error instanceof RopMetadataError) return 502;
  return 500;
}

function errorBody(error: unknown) {
  return {
    success: false,
    error: error instanceof Error ? error.message : 'Unknown error',
    code: error instanceof RenderError ? error.code : undefined,
  };
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private subscription: ChannelSubscription<MonitorEvent> | null = null;
  private broadcastTimer: NodeJS.Timeout | null = null;
  private streamableTransportManager: StreamableHTTPTransportManager | null = null;

  constructor(
    private renderService: RenderService,
    private renderRepo: IRenderJobRepository | null,
    private dbConnection: DatabaseConnection | null,
    private ropProvider: IRopMetadataProvider,
    private hipHistory: HipHistoryReader,
    private port: number = 3001
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Mount the Streamable HTTP MCP endpoint at /mcp
   */
  public enableStreamableTransport(manager: StreamableHTTPTransportManager): void {
    this.streamableTransportManager = manager;

    this.app.post('/mcp', async (req: Request, res: Response) => {
      await manager.handlePostRequest(req, res);
    });

    this.app.get('/mcp', async (req: Request, res: Response) => {
      await manager.handleGetRequest(req, res);
    });

    this.app.get('/mcp/sessions', (_req: Request, res: Response) => {
      res.json({
        success: true,
        activeSessionCount: manager.getActiveSessionCount(),
        sessions: manager.getSessionInfo(),
      });
    });

    console.error('[WebServer] MCP Streamable HTTP routes registered: POST /mcp, GET /mcp/sessions');
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    this.app.get('/api/status', (_req: Request, res: Response) => {
      try {
        res.json({ success: true, data: this.renderService.getStatus() });
      } catch (error) {
        res.status(500).json(errorBody(error));
      }
    });

    this.app.post('/api/render', async (req: Request, res: Response) => {
      try {
        const job = await this.renderService.startRender(req.body);
        res.status(201).json({ success: true, data: job });
      } catch (error) {
        res.status(httpStatusFor(error)).json(errorBody(error));
      }
    });

    this.app.post('/api/render/interrupt', async (_req: Request, res: Response) => {
      try {
        const outcome = await this.renderService.interrupt();
        res.json({ success: true, data: { outcome } });
      } catch (error) {
        res.status(httpStatusFor(error)).json(errorBody(error));
      }
    });

    this.app.post('/api/render/kill', async (_req: Request, res: Response) => {
      try {
        const job = await this.renderService.kill();
        res.json({ success: true, data: job });
      } catch (error) {
        res.status(httpStatusFor(error)).json(errorBody(error));
      }
    });

    this.app.get('/api/renders', (req: Request, res: Response) => {
      const repo = this.renderRepo;
      if (!repo) {
        res.status(404).json({ success: false, error: 'Render history is disabled' });
        return;
      }
      try {
        const limit = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : 50;
        res.json({ success: true, data: repo.getAllJobs(Number.isFinite(limit) && limit > 0 ? limit : 50) });
      } catch (error) {
        res.status(500).json(errorBody(error));
      }
    });

    this.app.get('/api/renders/:id', (req: Request, res: Response) => {
      const repo = this.renderRepo;
      if (!repo) {
        res.status(404).json({ success: false, error: 'Render history is disabled' });
        return;
      }
      try {
        const job = repo.getJob(req.params.id);
        if (!job) {
          res.status(404).json({ success: false, error: 'Render not found' });
          return;
        }
        res.json({ success: true, data: { ...job, frames: repo.getFrames(job.id) } });
      } catch (error) {
        res.status(500).json(errorBody(error));
      }
    });

    this.app.get('/api/rops', async (req: Request, res: Response) => {
      const hipPath = typeof req.query.hip === 'string' ? req.query.hip.trim() : '';
      if (!hipPath) {
        res.status(400).json({ success: false, error: 'hip query parameter is required' });
        return;
      }
      try {
        res.json({ success: true, data: await this.ropProvider.listRops(hipPath) });
      } catch (error) {
        res.status(httpStatusFor(error)).json(errorBody(error));
      }
    });

    this.app.get('/api/scenes/recent', (req: Request, res: Response) => {
      try {
        const limit = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : 20;
        res.json({ success: true, data: this.hipHistory.getRecentHipFiles(Number.isFinite(limit) && limit > 0 ? limit : 20) });
      } catch (error) {
        res.status(500).json(errorBody(error));
      }
    });

    this.app.get('/api/stats', (_req: Request, res: Response) => {
      try {
        res.json({
          success: true,
          data: {
            history: this.dbConnection ? this.dbConnection.getStatistics() : null,
            rendering: this.renderService.isRendering,
            websocketClients: this.clients.size,
            mcpSessions: this.streamableTransportManager?.getActiveSessionCount() ?? 0,
          },
        });
      } catch (error) {
        res.status(500).json(errorBody(error));
      }
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });

    this.subscription = this.renderService.events.subscribe();
    this.broadcastTimer = setInterval(() => this.broadcastPending(), BROADCAST_INTERVAL_MS);
  }

  /**
   * Send every event drained since the last tick, in publish order
   */
  private broadcastPending(): void {
    if (!this.subscription) return;
    for (const event of this.subscription.drain()) {
      this.broadcast(event);
    }
  }

  public broadcast(message: MonitorEvent | { type: string; timestamp: string }): void {
    if (this.clients.size === 0) return;
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.httpServer = this.app.listen(this.port, () => {
          console.error(`[WebServer] Backend API available at http://localhost:${this.port}`);
          this.setupWebSocket();
          resolve();
        });

        this.httpServer.on('error', (error) => {
          console.error('[WebServer] Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.broadcastTimer) {
        clearInterval(this.broadcastTimer);
        this.broadcastTimer = null;
      }
      this.subscription?.unsubscribe();
      this.subscription = null;

      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close(() => {
          console.error('[WebServer] WebSocket server closed');
        });
      }

      if (this.httpServer) {
        this.httpServer.close(() => {
          console.error('[WebServer] HTTP server closed');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
