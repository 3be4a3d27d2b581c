import { QdrantKnowledgeStore } from './services/qdrant/store.js';
import { EmbeddingService } from './services/embedding/service.js';
import { embeddingOptionsFromEnv } from './services/embedding/config.js';
import { createKnowledgeBase, type KnowledgeBase } from './services/knowledge/index.js';
import type { KnowledgeStore } from './services/knowledge-store.js';
import { errorMessage } from './types/index.js';
import { logger } from './utils/logger.js';
import { getEmbeddingDimension } from './config.js';

/**
 * Builds the store, the embedding service and the services over them from
 * the environment. Nothing is contacted until `initializeKnowledgeBase`.
 */
export function createKnowledgeBaseFromEnv(): KnowledgeBase {
    const store = new QdrantKnowledgeStore(getEmbeddingDimension());
    const embeddings = new EmbeddingService(embeddingOptionsFromEnv());
    return createKnowledgeBase(store, embeddings);
}

/**
 * Wait for Qdrant to be available with retries
 */
export async function waitForQdrant(store: KnowledgeStore, maxRetries = 30, intervalMs = 1000): Promise<void> {
    logger.info('Waiting for Qdrant to be available...');

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
        try {
            if (await store.checkHealth()) {
                logger.info(`Qdrant is available after ${attempt} attempt(s)`);
                return;
            }
        } catch (err) {
            logger.debug(`Qdrant health check error on attempt ${attempt}: ${errorMessage(err)}`);
        }

        if (attempt < maxRetries) {
            logger.info(`Qdrant not ready yet (attempt ${attempt}/${maxRetries}), retrying in ${intervalMs}ms...`);
            await new Promise((resolve) => setTimeout(resolve, intervalMs));
        }
    }

    throw new Error(`Qdrant did not become available after ${maxRetries} attempts (${(maxRetries * intervalMs) / 1000}s)`);
}

/** Waits for the store, creates missing collections, then loads the embedding model. */
export async function initializeKnowledgeBase(kb: KnowledgeBase): Promise<void> {
    await waitForQdrant(kb.store);
    logger.info('Initializing knowledge store...');
    await kb.store.init();
    await kb.embeddings.init();
    logger.info('Knowledge store ready');
}
