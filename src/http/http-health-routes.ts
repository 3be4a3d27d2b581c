import type express from 'express';
import type { KnowledgeStore } from '../services/knowledge-store.js';
import type { EmbeddingService } from '../services/embedding/service.js';
import type { EmbeddingHealth } from '../services/embedding/types.js';
import { register } from '../services/metrics/registry.js';
import { getBuildVersion } from '../utils/build-version.js';
import { logger } from '../utils/logger.js';
import { MCP_SERVER_NAME } from '../config.js';

export interface HealthDependencies {
    store: KnowledgeStore;
    embeddings: EmbeddingService;
}

const EMBEDDING_HEALTH_TIMEOUT_MS = 2000;

/** Embedding health bounded by a short timeout so /health stays responsive. */
async function embeddingHealth(embeddings: EmbeddingService): Promise<EmbeddingHealth> {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<EmbeddingHealth>((resolve) => {
        timeoutId = setTimeout(
            () => resolve({ healthy: false, message: 'Embedding health check timed out' }),
            EMBEDDING_HEALTH_TIMEOUT_MS
        );
    });
    try {
        return await Promise.race([
            embeddings.healthCheck().catch((): EmbeddingHealth => ({ healthy: false, message: 'Embedding health check failed' })),
            timeout
        ]);
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * Set up health, metrics and info routes
 * @param app Express application instance
 */
export function setupHealthRoutes(app: express.Express, deps: HealthDependencies) {
    app.get('/health', async (req, res) => {
        // Qdrant is critical; the embedding model is not, since search falls back.
        const qdrantHealthy = await deps.store.checkHealth().catch(() => false);
        const embedding = await embeddingHealth(deps.embeddings);
        const embeddingCfg = deps.embeddings.getConfig();

        const healthStatus = qdrantHealthy ? (embedding.healthy ? 'healthy' : 'degraded') : 'unhealthy';

        res.status(qdrantHealthy ? 200 : 503).json({
            status: healthStatus,
            service: MCP_SERVER_NAME,
            version: getBuildVersion(),
            transport: 'http',
            uptime: Math.floor(process.uptime()),
            dependencies: {
                qdrant: qdrantHealthy ? 'healthy' : 'unhealthy',
                embedding: embedding.healthy ? 'healthy' : 'unhealthy'
            },
            details: {
                embedding: embedding.message,
                provider: embeddingCfg.provider,
                model: embeddingCfg.model,
                dimension: embeddingCfg.dimension
            }
        });
    });

    app.get('/metrics', async (req, res) => {
        try {
            res.set('Content-Type', register.contentType);
            res.end(await register.metrics());
        } catch (error) {
            logger.error('Error generating metrics', error);
            res.status(500).end('Error generating metrics');
        }
    });

    app.get('/', (req, res) => {
        res.json({
            service: MCP_SERVER_NAME,
            version: getBuildVersion(),
            transports: ['http'],
            endpoints: {
                health: '/health',
                metrics: '/metrics',
                mcp: '/mcp'
            },
            note: 'Use POST /mcp for MCP protocol communication'
        });
    });
}
