import type express from 'express';
import { logger } from '../utils/logger.js';

/**
 * Set up the catch-all 404 and the error handler. Registered last.
 * @param app Express application instance
 */
export function setupErrorHandlers(app: express.Express) {
    app.use((req: express.Request, res: express.Response) => {
        res.status(404).json({ error: 'Not found' });
    });

    // Express recognises error handlers by their four parameters.
    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        const rid = req.headers['x-request-id'] ?? 'unknown';
        logger.error(`HTTP error on ${req.method} ${req.originalUrl} [id: ${String(rid)}]`, err);

        if (!res.headersSent) {
            res.status(500).json({ error: 'Internal server error' });
        } else {
            res.end();
        }
    });
}
