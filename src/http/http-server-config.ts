import express from 'express';
import { httpLogger } from '../utils/logger.js';

/**
 * Configure Express application with middleware
 * @param app Express application instance
 */
export function configureMiddleware(app: express.Express) {
    // HTTP access logging
    app.use(httpLogger);
    app.use(express.json({ limit: '4mb' }));
}
