import type { Document } from '../../src/types/index.js';
import { EmbeddingService } from '../../src/services/embedding/service.js';

export const DIMENSION = 384;

let counter = 0;

/** A stored document with test defaults; `created` increases per call. */
export function makeDocument(fields: Partial<Document> & Pick<Document, 'title'>): Document {
    counter++;
    const created = new Date(Date.UTC(2024, 0, 1, 0, 0, counter)).toISOString();
    return {
        key: `doc-${counter}`,
        content: '',
        summary: null,
        tags: [],
        confidence: 0.9,
        status: 'active',
        embedding: null,
        metadata: { source: 'test', creator: 'tester', created, updated: created, version: 1 },
        ...fields
    };
}

/** Embedding service on the deterministic fallback path. */
export function fallbackEmbeddings(dimension = DIMENSION): EmbeddingService {
    return new EmbeddingService({ providers: [], model: 'test-model', dimension });
}
