import type http from 'node:http';
import express from 'express';
import { logger } from '../utils/logger.js';
import { enableProcessMetrics } from '../services/metrics/registry.js';
import { configureMiddleware } from './http-server-config.js';
import { setupHealthRoutes, type HealthDependencies } from './http-health-routes.js';
import { setupMcpRoutes, type McpServerFactory } from './http-mcp-handler.js';
import { setupErrorHandlers } from './http-error-handlers.js';

export function createHttpApp(serverFactory: McpServerFactory, deps: HealthDependencies): express.Express {
    const app = express();
    configureMiddleware(app);
    setupHealthRoutes(app, deps);
    setupMcpRoutes(app, serverFactory);
    setupErrorHandlers(app);
    return app;
}

/**
 * Start the HTTP transport. Resolves once listening; rejects if the port
 * cannot be bound.
 */
export function startHttpServer(port: number, serverFactory: McpServerFactory, deps: HealthDependencies): Promise<http.Server> {
    const app = createHttpApp(serverFactory, deps);
    enableProcessMetrics();
    return new Promise((resolve, reject) => {
        const httpServer = app.listen(port, '0.0.0.0', () => {
            logger.success('HTTP server', `listening on port ${port}`);
            logger.info(`Health check: http://localhost:${port}/health`);
            logger.info(`MCP endpoint: http://localhost:${port}/mcp`);
            resolve(httpServer);
        });
        httpServer.on('error', (error: NodeJS.ErrnoException) => {
            if (error.code === 'EADDRINUSE') {
                logger.error(`Port ${port} is already in use. Please choose a different port.`);
            } else {
                logger.error('HTTP server error', error);
            }
            reject(error);
        });
    });
}
