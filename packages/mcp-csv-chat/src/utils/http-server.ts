/**
 * HTTP server utilities for the MCP endpoint
 *
 * Session handling, JSON-RPC error responses and the standard endpoint set for
 * an Express server using the streamable-http transport.
 */

import express, { type Request, type Response } from 'express';
import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

type Logger = {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
};

/**
 * Extracts the MCP session ID from request headers
 */
export function getSessionId(headers: Request['headers']): string | undefined {
  const header = headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

function requestIdOf(body: unknown): unknown {
  return typeof body === 'object' && body !== null && 'id' in body ? body.id : null;
}

function isInitializeRequest(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'method' in body && body.method === 'initialize';
}

/** Client hung up mid-request; not worth an error log. */
function isConnectionClosed(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('aborted') || message.includes('closed') || message.includes('ECONNRESET') || message.includes('EPIPE');
}

/**
 * Sends a JSON-RPC error response unless the response is already gone
 */
export function sendErrorResponse(
  res: Response,
  status: number,
  code: number,
  message: string,
  id: unknown = null,
): void {
  if (res.headersSent || res.destroyed) return;
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id,
  });
}

export interface HttpServerConfig {
  /** Server name for the health check endpoint */
  serverName: string;
  version: string;
  /** Session transport map */
  transports: Map<string, StreamableHTTPServerTransport>;
  /** Creates a new MCP server instance with its transport for an initialize request */
  createServer: () => {
    server: { connect: (transport: StreamableHTTPServerTransport) => Promise<void> };
    transport: StreamableHTTPServerTransport;
  };
  /** Called after a client terminates its session with DELETE /mcp */
  onSessionClosed?: (sessionId: string) => void;
  logger: Logger;
}

/**
 * Registers:
 * - GET /health - Health check
 * - GET /mcp - SSE stream for an existing session
 * - DELETE /mcp - Session termination
 * - POST /mcp - JSON-RPC requests; initialize creates a session
 */
export function setupMcpEndpoints(app: express.Application, config: HttpServerConfig): void {
  const { serverName, version, transports, createServer, onSessionClosed, logger } = config;

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      server: serverName,
      version,
      activeSessions: transports.size,
    });
  });

  app.get('/mcp', async (req: Request, res: Response) => {
    const sessionId = getSessionId(req.headers);
    if (!sessionId) {
      sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided');
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      sendErrorResponse(res, 404, -32000, 'Session not found');
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      if (isConnectionClosed(error)) {
        logger.warn({ sessionId, error: errorMessage }, 'Client connection closed during SSE stream');
      } else {
        logger.error({ sessionId, error: errorMessage }, 'Error handling SSE stream request');
        sendErrorResponse(res, 500, -32603, 'Internal server error');
      }
    }
  });

  app.delete('/mcp', async (req: Request, res: Response) => {
    const sessionId = getSessionId(req.headers);
    if (!sessionId) {
      sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided');
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      sendErrorResponse(res, 404, -32000, 'Session not found');
      return;
    }

    try {
      await transport.handleRequest(req, res, req.body);
      logger.info({ sessionId, totalSessions: transports.size - 1 }, 'Session deleted');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      if (isConnectionClosed(error)) {
        logger.warn({ sessionId, error: errorMessage }, 'Connection closed during session termination');
      } else {
        logger.error({ sessionId, error: errorMessage }, 'Error handling session termination');
        sendErrorResponse(res, 500, -32603, 'Error handling session termination');
      }
    } finally {
      // Always clean up, even when the termination request itself failed
      transports.delete(sessionId);
      onSessionClosed?.(sessionId);
    }
  });

  app.post('/mcp', async (req: Request, res: Response) => {
    const requestId = requestIdOf(req.body);
    try {
      const sessionId = getSessionId(req.headers);

      if (sessionId) {
        const transport = transports.get(sessionId);
        if (!transport) {
          sendErrorResponse(res, 404, -32000, 'Session not found', requestId);
          return;
        }
        await transport.handleRequest(req, res, req.body);
        return;
      }

      // Without a session ID only initialize may open a new session
      if (!isInitializeRequest(req.body)) {
        sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided', requestId);
        return;
      }

      const { server, transport } = createServer();
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      if (isConnectionClosed(error)) {
        logger.warn({ requestId, error: errorMessage }, 'Client connection closed during request');
      } else {
        logger.error({ requestId, error: errorMessage }, 'Error handling MCP request');
        sendErrorResponse(res, 500, -32603, 'Internal server error', requestId);
      }
    }
  });
}

/**
 * Closes every transport and the HTTP server on SIGTERM/SIGINT
 */
export function setupGracefulShutdown(
  server: ReturnType<express.Application['listen']>,
  transports: Map<string, StreamableHTTPServerTransport>,
  logger: Logger,
): void {
  const shutdown = async () => {
    logger.info({}, 'Shutting down...');
    for (const [sessionId, transport] of transports.entries()) {
      try {
        await transport.close();
      } catch (error) {
        logger.error(
          { error: error instanceof Error ? error.message : String(error), sessionId },
          'Error closing transport',
        );
      }
    }
    transports.clear();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}
