import type { KnowledgeStore, RelationshipFilter } from '../../src/services/knowledge-store.js';
import type { Document, Relationship, ScoredDocument, Topic } from '../../src/types/index.js';
import { KnowledgeBaseError } from '../../src/types/index.js';
import { cosineSimilarity } from '../../src/services/embedding/vector-math.js';

/**
 * In-process KnowledgeStore for unit tests. Values are copied on the way in
 * and out so callers cannot mutate stored state.
 */
export class InMemoryKnowledgeStore implements KnowledgeStore {
    readonly documents = new Map<string, Document>();
    readonly topics = new Map<string, Topic>();
    readonly relationships = new Map<string, Relationship>();
    /** When set, nativeSimilarity rejects, as a store without vector support would. */
    failNativeSimilarity = false;
    /** When set, every document read rejects. */
    failReads = false;
    nativeSimilarityCalls = 0;

    constructor(readonly dimension = 384) {}

    async init(): Promise<void> {}

    async checkHealth(): Promise<boolean> {
        return true;
    }

    private readable(): void {
        if (this.failReads) throw new KnowledgeBaseError('store offline', 'STORE_UNAVAILABLE', 503);
    }

    async getDocument(key: string): Promise<Document | null> {
        this.readable();
        const doc = this.documents.get(key);
        return doc ? structuredClone(doc) : null;
    }

    async listDocuments(): Promise<Document[]> {
        this.readable();
        return [...this.documents.values()].map((d) => structuredClone(d));
    }

    async listEmbeddedDocuments(): Promise<Document[]> {
        return (await this.listDocuments()).filter((d) => d.embedding !== null);
    }

    async findDocumentsByTag(tag: string): Promise<Document[]> {
        return (await this.listDocuments()).filter((d) => d.tags.includes(tag));
    }

    async countDocuments(): Promise<number> {
        this.readable();
        return this.documents.size;
    }

    async insertDocument(doc: Document): Promise<void> {
        this.documents.set(doc.key, structuredClone(doc));
    }

    async replaceDocument(doc: Document): Promise<void> {
        this.documents.set(doc.key, structuredClone(doc));
    }

    async deleteDocument(key: string): Promise<boolean> {
        return this.documents.delete(key);
    }

    async setEmbedding(key: string, vector: number[]): Promise<void> {
        const doc = this.documents.get(key);
        if (!doc) throw new KnowledgeBaseError(`no document ${key}`, 'DOCUMENT_NOT_FOUND', 404);
        if (vector.length !== this.dimension) {
            throw new KnowledgeBaseError('wrong dimension', 'INVALID_EMBEDDING_DIMENSION', 400);
        }
        doc.embedding = [...vector];
    }

    async nativeSimilarity(vector: number[], limit: number, minScore: number): Promise<ScoredDocument[]> {
        this.nativeSimilarityCalls++;
        if (this.failNativeSimilarity) throw new Error('native vector search unavailable');
        const scored: ScoredDocument[] = [];
        for (const document of await this.listEmbeddedDocuments()) {
            if (document.embedding?.length !== vector.length) continue;
            const score = cosineSimilarity(vector, document.embedding);
            if (score >= minScore) scored.push({ document, score });
        }
        return scored.sort((a, b) => b.score - a.score).slice(0, limit);
    }

    async getTopic(key: string): Promise<Topic | null> {
        const topic = this.topics.get(key);
        return topic ? structuredClone(topic) : null;
    }

    async listTopics(): Promise<Topic[]> {
        return [...this.topics.values()].map((t) => structuredClone(t));
    }

    async insertTopic(topic: Topic): Promise<void> {
        this.topics.set(topic.key, structuredClone(topic));
    }

    async replaceTopic(topic: Topic): Promise<void> {
        this.topics.set(topic.key, structuredClone(topic));
    }

    async deleteTopic(key: string): Promise<boolean> {
        return this.topics.delete(key);
    }

    async insertRelationship(rel: Relationship): Promise<void> {
        this.relationships.set(rel.key, structuredClone(rel));
    }

    async listRelationships(filter: RelationshipFilter): Promise<Relationship[]> {
        return [...this.relationships.values()]
            .filter((r) => filter.from === undefined || r.from === filter.from)
            .filter((r) => filter.to === undefined || r.to === filter.to)
            .filter((r) => filter.type === undefined || r.type === filter.type)
            .filter((r) => filter.touching === undefined || r.from === filter.touching || r.to === filter.touching)
            .map((r) => structuredClone(r));
    }

    async deleteRelationshipsTouching(ref: string): Promise<number> {
        let removed = 0;
        for (const [key, rel] of this.relationships) {
            if (rel.from === ref || rel.to === ref) {
                this.relationships.delete(key);
                removed++;
            }
        }
        return removed;
    }
}
