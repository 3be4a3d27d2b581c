import type { KnowledgeStore } from '../knowledge-store.js';
import type { EmbeddingService } from '../embedding/service.js';
import type { ScoredDocument } from '../../types/index.js';
import type { SimilarityStrategy } from './types.js';

/**
 * Ranking done by the store itself, so only the winning documents cross the
 * boundary.
 */
export class NativeSimilarityStrategy implements SimilarityStrategy {
    readonly name = 'native';

    constructor(private readonly store: KnowledgeStore) {}

    async rank(queryVector: number[], limit: number, minScore: number): Promise<ScoredDocument[]> {
        return this.store.nativeSimilarity(queryVector, limit, minScore);
    }
}

/**
 * Ranking computed in process over every embedded document. Equal scores keep
 * the store's listing order.
 */
export class ApplicationSimilarityStrategy implements SimilarityStrategy {
    readonly name = 'application';

    constructor(
        private readonly store: KnowledgeStore,
        private readonly embeddings: EmbeddingService
    ) {}

    async rank(queryVector: number[], limit: number, minScore: number): Promise<ScoredDocument[]> {
        const docs = await this.store.listEmbeddedDocuments();
        const scored: ScoredDocument[] = [];
        for (const document of docs) {
            const embedding = document.embedding;
            if (!embedding || embedding.length !== queryVector.length) continue;
            const score = this.embeddings.cosineSimilarity(queryVector, embedding);
            if (score >= minScore) scored.push({ document, score });
        }
        return scored.sort((a, b) => b.score - a.score).slice(0, Math.max(0, limit));
    }
}
