import { randomUUID } from 'node:crypto';
import type { HttpBindings } from '@hono/node-server';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { toFetchResponse, toReqRes } from 'fetch-to-node';
import { type Context, Hono } from 'hono';
import { errorMessage } from '../../core/errors.ts';
import { buildServer } from '../../core/mcp.ts';
import type { Services } from '../../core/services.ts';
import { logger } from '../../utils/logger.ts';

const MCP_SESSION_HEADER = 'Mcp-Session-Id';

export type Session = { server: McpServer; transport: StreamableHTTPServerTransport };

function rpcError(c: Context, status: 400 | 404 | 405 | 500, code: number, message: string) {
  return c.json({ jsonrpc: '2.0', error: { code, message }, id: null }, status);
}

/**
 * Streamable HTTP endpoint. An `initialize` request without a session header opens a
 * session with its own MCP server; later requests carry the session header.
 */
export function buildMcpRoutes(params: {
  services: Services;
  sessions?: Map<string, Session>;
}) {
  const { services } = params;
  const sessions = params.sessions ?? new Map<string, Session>();
  const app = new Hono<{ Bindings: HttpBindings }>();

  const closeSession = async (sessionId: string) => {
    const session = sessions.get(sessionId);
    if (!session) {
      return;
    }
    sessions.delete(sessionId);
    logger.detachServer(session.server);
    await session.server.close();
    void logger.info('mcp', { message: 'Session closed', sessionId, remaining: sessions.size });
  };

  app.post('/', async (c) => {
    const { req, res } = toReqRes(c.req.raw);
    const sessionIdHeader = c.req.header(MCP_SESSION_HEADER);

    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      void logger.warning('mcp_request', {
        message: 'Request body is not JSON',
        error: errorMessage(error),
      });
      return rpcError(c, 400, -32700, 'Parse error');
    }

    try {
      let session = sessionIdHeader ? sessions.get(sessionIdHeader) : undefined;
      let opened = false;

      if (!session) {
        if (sessionIdHeader || !isInitializeRequest(body)) {
          return rpcError(c, 400, -32000, 'Bad Request: no valid session ID provided');
        }
        const server = buildServer(services);
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid) => {
            sessions.set(sid, { server, transport });
            logger.attachServer(server);
            void logger.info('mcp', { message: 'Session initialized', sessionId: sid });
          },
        });
        transport.onclose = () => {
          if (transport.sessionId) {
            void closeSession(transport.sessionId);
          }
        };
        transport.onerror = (error) => {
          void logger.error('transport', { message: 'Transport error', error: error.message });
        };
        await server.connect(transport);
        session = { server, transport };
        opened = true;
      }

      await session.transport.handleRequest(req, res, body);
      // An initialize that was refused never gets a session; drop its server.
      if (opened && !(session.transport.sessionId && sessions.has(session.transport.sessionId))) {
        await session.server.close();
      }
      return toFetchResponse(res);
    } catch (error) {
      void logger.error('mcp_request', {
        message: 'POST /mcp failed',
        sessionId: sessionIdHeader,
        error: errorMessage(error),
      });
      return rpcError(c, 500, -32603, 'Internal server error');
    }
  });

  app.get('/', async (c) => {
    const { req, res } = toReqRes(c.req.raw);
    const sessionIdHeader = c.req.header(MCP_SESSION_HEADER);
    if (!sessionIdHeader) {
      return rpcError(c, 405, -32000, 'Method not allowed - no session');
    }
    const session = sessions.get(sessionIdHeader);
    if (!session) {
      return c.text('Invalid session', 404);
    }
    try {
      await session.transport.handleRequest(req, res);
      return toFetchResponse(res);
    } catch (error) {
      void logger.error('mcp_request', {
        message: 'GET /mcp failed',
        sessionId: sessionIdHeader,
        error: errorMessage(error),
      });
      return rpcError(c, 500, -32603, 'Internal server error');
    }
  });

  app.delete('/', async (c) => {
    const { req, res } = toReqRes(c.req.raw);
    const sessionIdHeader = c.req.header(MCP_SESSION_HEADER);
    if (!sessionIdHeader) {
      return rpcError(c, 405, -32000, 'Method not allowed - no session');
    }
    const session = sessions.get(sessionIdHeader);
    if (!session) {
      return c.text('Invalid session', 404);
    }
    try {
      await session.transport.handleRequest(req, res);
      await closeSession(sessionIdHeader);
      return toFetchResponse(res);
    } catch (error) {
      void logger.error('mcp_request', {
        message: 'DELETE /mcp failed',
        sessionId: sessionIdHeader,
        error: errorMessage(error),
      });
      return rpcError(c, 500, -32603, 'Internal server error');
    }
  });

  return app;
}
