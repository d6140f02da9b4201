/**
 * Streamable HTTP Transport Manager
 *
 * Each MCP client gets its own session with an isolated transport and server
 * instance; every session's tools drive the same render service.
 */

import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { Request, Response } from 'express';
import { randomUUID } from 'crypto';

export interface McpSession {
  sessionId: string;
  transport: StreamableHTTPServerTransport;
  server: BaseMcpServer;
  createdAt: Date;
  lastActivity: Date;
}

export interface SessionFactory {
  createServerForSession(sessionId: string): BaseMcpServer;
}

const SESSION_ID_HEADER_NAME = 'mcp-session-id';
const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

export class StreamableHTTPTransportManager {
  private sessions = new Map<string, McpSession>();
  private sessionTimeout: number; // milliseconds
  private cleanupTimer: NodeJS.Timeout;

  constructor(
    private sessionFactory: SessionFactory,
    sessionTimeoutMinutes = 60
  ) {
    this.sessionTimeout = sessionTimeoutMinutes * 60 * 1000;
    this.cleanupTimer = setInterval(() => this.cleanupStaleSessions(), CLEANUP_INTERVAL_MS);
    this.cleanupTimer.unref();
  }

  /**
   * No SSE stream is offered, so GET is always 405
   */
  async handleGetRequest(_req: Request, res: Response): Promise<void> {
    res.status(405).set('Allow', 'POST').json({
      error: 'Method Not Allowed',
      message: 'This server does not offer SSE streams. Use POST for all requests.',
    });
  }

  /**
   * Creates a session on the first request, then reuses it
   */
  async handlePostRequest(req: Request, res: Response): Promise<void> {
    const header = req.headers[SESSION_ID_HEADER_NAME];
    const sessionId = typeof header === 'string' && header.length > 0 ? header : undefined;

    try {
      const existing = sessionId ? this.sessions.get(sessionId) : undefined;
      if (existing) {
        existing.lastActivity = new Date();
        await existing.transport.handleRequest(req, res, req.body);
        return;
      }

      const newSessionId = sessionId ?? randomUUID();
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => newSessionId,
      });
      const server = this.sessionFactory.createServerForSession(newSessionId);

      // Stored before connecting so a concurrent request finds it
      this.sessions.set(newSessionId, {
        sessionId: newSessionId,
        transport,
        server,
        createdAt: new Date(),
        lastActivity: new Date(),
      });

      await server.connect(transport);
      console.error(`[StreamableHTTP] New session created: ${newSessionId} (${req.ip ?? req.socket.remoteAddress ?? 'unknown'})`);

      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('[StreamableHTTP] Error handling request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          error: 'Internal server error',
          details: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private async removeSession(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    this.sessions.delete(sessionId);

    try {
      await session.server.close();
      console.error(`[StreamableHTTP] Session removed: ${sessionId}`);
    } catch (error) {
      console.error(`[StreamableHTTP] Error removing session ${sessionId}:`, error);
    }
  }

  private cleanupStaleSessions(): void {
    const now = Date.now();
    const staleSessionIds: string[] = [];

    for (const [sessionId, session] of this.sessions) {
      if (now - session.lastActivity.getTime() > this.sessionTimeout) {
        staleSessionIds.push(sessionId);
      }
    }

    if (staleSessionIds.length > 0) {
      console.error(`[StreamableHTTP] Cleaning up ${staleSessionIds.length} stale sessions`);
      void Promise.all(staleSessionIds.map((id) => this.removeSession(id)));
    }
  }

  getSessionInfo(): Array<{
    sessionId: string;
    createdAt: Date;
    lastActivity: Date;
    ageMinutes: number;
    inactiveMinutes: number;
  }> {
    const now = Date.now();
    return Array.from(this.sessions.values()).map((session) => ({
      sessionId: session.sessionId,
      createdAt: session.createdAt,
      lastActivity: session.lastActivity,
      ageMinutes: Math.floor((now - session.createdAt.getTime()) / 60000),
      inactiveMinutes: Math.floor((now - session.lastActivity.getTime()) / 60000),
    }));
  }

  getActiveSessionCount(): number {
    return this.sessions.size;
  }

  async closeAll(): Promise<void> {
    clearInterval(this.cleanupTimer);
    const sessionIds = Array.from(this.sessions.keys());
    await Promise.all(sessionIds.map((id) => this.removeSession(id)));
  }
}
