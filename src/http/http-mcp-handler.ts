import crypto from 'node:crypto';
import type express from 'express';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { logger } from '../utils/logger.js';
import { LOG_LEVEL } from '../config.js';

interface McpSession {
    transport: StreamableHTTPServerTransport;
    server: McpServer;
    createdAt: number;
}

export type McpServerFactory = () => McpServer;

const REQUEST_TIMEOUT_WARNING_MS = 25000;

const rpcEnvelopeSchema = z.object({
    id: z.union([z.string(), z.number()]).optional(),
    method: z.string().optional(),
    params: z.object({ name: z.string().optional() }).passthrough().optional()
}).passthrough();

interface RpcSummary {
    id: string | number | null;
    method: string;
    toolName: string | null;
}

function summarize(body: unknown): RpcSummary {
    const parsed = rpcEnvelopeSchema.safeParse(body);
    if (!parsed.success) return { id: null, method: 'unknown', toolName: null };
    return {
        id: parsed.data.id ?? null,
        method: parsed.data.method ?? 'unknown',
        toolName: parsed.data.params?.name ?? null
    };
}

function sessionIdOf(req: express.Request): string | undefined {
    const header = req.headers['mcp-session-id'];
    return typeof header === 'string' ? header : undefined;
}

/**
 * Set up MCP endpoint handling using stateful sessions.
 *
 * Each MCP client session gets its own McpServer + Transport pair.
 * The SDK enforces one-transport-per-server; stateful sessions let
 * multiple clients coexist without "already connected" errors.
 */
export function setupMcpRoutes(app: express.Express, serverFactory: McpServerFactory) {
    const sessions = new Map<string, McpSession>();

    async function createSession(): Promise<McpSession> {
        const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
            sessionIdGenerator: () => crypto.randomUUID(),
            enableJsonResponse: true,
            onsessioninitialized: (sessionId: string) => {
                sessions.set(sessionId, session);
                logger.info(`MCP session registered: ${sessionId} (active: ${sessions.size})`);
            }
        });

        transport.onclose = () => {
            const sid = transport.sessionId;
            if (sid && sessions.delete(sid)) {
                logger.info(`MCP session removed: ${sid} (active: ${sessions.size})`);
            }
        };

        const server = serverFactory();
        // One server per transport, never reconnected
        await server.connect(transport);

        const session: McpSession = { transport, server, createdAt: Date.now() };
        return session;
    }

    app.post('/mcp', async (req, res) => {
        const requestStart = Date.now();
        const { id, method, toolName } = summarize(req.body);
        const label = `${method}${toolName ? ` (${toolName})` : ''} [id: ${id ?? 'none'}]`;

        if (LOG_LEVEL === 'debug' || method !== 'notifications/cancelled') {
            logger.info(`→ MCP ${label}`);
        }

        try {
            const sessionId = sessionIdOf(req);
            const existing = sessionId ? sessions.get(sessionId) : undefined;

            let session: McpSession;
            if (method === 'initialize') {
                session = await createSession();
            } else if (existing) {
                session = existing;
            } else {
                res.status(sessionId ? 404 : 400).json({
                    jsonrpc: '2.0',
                    error: {
                        code: -32000,
                        message: sessionId ? 'Session not found' : 'Bad Request: Mcp-Session-Id header is required'
                    },
                    id
                });
                return;
            }

            let requestCompleted = false;
            const timeoutHandler = setTimeout(() => {
                if (!requestCompleted) logger.requestTimeout(label, Date.now() - requestStart);
            }, REQUEST_TIMEOUT_WARNING_MS);

            res.on('close', () => {
                requestCompleted = true;
                clearTimeout(timeoutHandler);
                if (method === 'notifications/cancelled') {
                    logger.warn(`Client cancelled request [id: ${id ?? 'none'}]; the operation may continue in background`);
                } else if (LOG_LEVEL === 'debug') {
                    logger.debug(`← Request closed ${Date.now() - requestStart}ms: ${label}`);
                }
            });

            await session.transport.handleRequest(req, res, req.body);
        } catch (error) {
            logger.error(`✗ MCP error: ${label} after ${Date.now() - requestStart}ms`, error);
            if (!res.headersSent) {
                res.status(500).json({
                    jsonrpc: '2.0',
                    error: { code: -32603, message: 'Internal server error' },
                    id
                });
            }
        }
    });

    app.get('/mcp', async (req, res) => {
        const sessionId = sessionIdOf(req);
        const session = sessionId ? sessions.get(sessionId) : undefined;
        if (!session) {
            res.status(400).json({
                jsonrpc: '2.0',
                error: { code: -32000, message: 'Bad Request: valid Mcp-Session-Id header is required for GET SSE' },
                id: null
            });
            return;
        }
        await session.transport.handleRequest(req, res);
    });

    app.delete('/mcp', async (req, res) => {
        const sessionId = sessionIdOf(req);
        const session = sessionId ? sessions.get(sessionId) : undefined;
        if (!sessionId || !session) {
            res.status(404).json({
                jsonrpc: '2.0',
                error: { code: -32001, message: 'Session not found' },
                id: null
            });
            return;
        }
        await session.transport.close();
        await session.server.close();
        sessions.delete(sessionId);
        logger.info(`MCP session closed: ${sessionId}`);
        res.status(200).end();
    });

    return sessions;
}
