/**
 * Semantic search over document embeddings.
 *
 * Ranking is delegated to an ordered list of similarity strategies: the
 * store-native one first, the in-process one second. A strategy that rejects
 * hands over to the next; when all of them reject, or the query cannot be
 * embedded, the result is empty.
 */

import type { KnowledgeStore } from '../knowledge-store.js';
import type { EmbeddingService } from '../embedding/service.js';
import type { Document, ScoredDocument } from '../../types/index.js';
import { errorMessage } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { searchRequests, searchResultCount, searchStrategyOutcomes } from '../metrics/search-metrics.js';
import { ApplicationSimilarityStrategy, NativeSimilarityStrategy } from './similarity-strategies.js';
import type { EmbeddingCoverage, SimilarityStrategy } from './types.js';

/** Text a document is embedded from. */
export function embeddingSourceText(doc: Pick<Document, 'title' | 'summary' | 'content'>): string {
    return `${doc.title} ${doc.summary ?? ''} ${doc.content}`;
}

export class VectorSearch {
    private readonly strategies: SimilarityStrategy[];

    constructor(
        private readonly store: KnowledgeStore,
        private readonly embeddings: EmbeddingService,
        strategies?: SimilarityStrategy[]
    ) {
        this.strategies = strategies ?? [
            new NativeSimilarityStrategy(store),
            new ApplicationSimilarityStrategy(store, embeddings)
        ];
    }

    async search(query: string, limit = 10, minScore = 0.5): Promise<ScoredDocument[]> {
        try {
            const queryVector = await this.embeddings.embed(query);
            logger.debug(`[VectorSearch] query '${query}' -> ${this.embeddings.truncateForDisplay(queryVector)}`);

            for (const strategy of this.strategies) {
                try {
                    const results = await strategy.rank(queryVector, limit, minScore);
                    searchStrategyOutcomes.inc({ strategy: strategy.name, outcome: 'success' });
                    searchRequests.inc({ mode: 'vector', status: 'success' });
                    searchResultCount.observe({ mode: 'vector' }, results.length);
                    logger.debug(`[VectorSearch] ${strategy.name} strategy returned ${results.length} result(s)`);
                    return results;
                } catch (err) {
                    searchStrategyOutcomes.inc({ strategy: strategy.name, outcome: 'failure' });
                    logger.info(`[VectorSearch] ${strategy.name} similarity unavailable, trying next strategy: ${errorMessage(err)}`);
                }
            }
            logger.warn('[VectorSearch] every similarity strategy failed; returning no results');
        } catch (err) {
            logger.error('[VectorSearch] search failed', err);
        }
        searchRequests.inc({ mode: 'vector', status: 'error' });
        return [];
    }

    /**
     * Re-embeds one document, or every document when no key (or an empty key)
     * is given.
     * Missing documents and per-document failures are skipped; returns how many
     * embeddings were written. Concurrent updates of one document race and the
     * last write wins.
     */
    async updateDocumentEmbeddings(key?: string): Promise<number> {
        if (key) {
            const doc = await this.store.getDocument(key).catch((err: unknown) => {
                logger.error(`[VectorSearch] could not load document ${key}`, err);
                return null;
            });
            if (!doc) {
                logger.warn(`[VectorSearch] document ${key} not found; nothing to embed`);
                return 0;
            }
            return (await this.embedDocument(doc)) ? 1 : 0;
        }

        const docs = await this.store.listDocuments();
        let updated = 0;
        for (const doc of docs) {
            if (await this.embedDocument(doc)) updated++;
        }
        logger.info(`[VectorSearch] updated embeddings for ${updated}/${docs.length} document(s)`);
        return updated;
    }

    async countEmbeddingCoverage(): Promise<EmbeddingCoverage> {
        const [total, embedded] = await Promise.all([
            this.store.countDocuments(),
            this.store.listEmbeddedDocuments()
        ]);
        return { total, withEmbedding: embedded.length };
    }

    private async embedDocument(doc: Document): Promise<boolean> {
        try {
            const vector = await this.embeddings.embed(embeddingSourceText(doc));
            await this.store.setEmbedding(doc.key, vector);
            return true;
        } catch (err) {
            logger.error(`[VectorSearch] failed to update embedding for ${doc.key}`, err);
            return false;
        }
    }
}
