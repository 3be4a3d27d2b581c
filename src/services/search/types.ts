import type { ScoredDocument } from '../../types/index.js';

export type SearchMode = 'vector' | 'smart' | 'fuzzy' | 'suggest' | 'similar' | 'tags';

/**
 * One way of ranking the corpus against a query vector. Rejects when the
 * underlying capability is missing so the next strategy can be tried.
 */
export interface SimilarityStrategy {
    readonly name: string;
    rank(queryVector: number[], limit: number, minScore: number): Promise<ScoredDocument[]>;
}

export interface EmbeddingCoverage {
    total: number;
    withEmbedding: number;
}
