import type { Document, Relationship, ScoredDocument, Topic } from '../types/index.js';

export interface RelationshipFilter {
    /** Matches relationships whose `from` or `to` equals this reference. */
    touching?: string;
    from?: string;
    to?: string;
    type?: string;
}

/**
 * Persistence boundary for documents, topics and relationships.
 *
 * Reads of an unknown or malformed key resolve to null. Writes to a malformed
 * key reject with `INVALID_KEY`.
 */
export interface KnowledgeStore {
    init(): Promise<void>;
    checkHealth(): Promise<boolean>;

    getDocument(key: string): Promise<Document | null>;
    listDocuments(): Promise<Document[]>;
    /** Documents whose embedding is present. */
    listEmbeddedDocuments(): Promise<Document[]>;
    findDocumentsByTag(tag: string): Promise<Document[]>;
    countDocuments(): Promise<number>;
    insertDocument(doc: Document): Promise<void>;
    replaceDocument(doc: Document): Promise<void>;
    deleteDocument(key: string): Promise<boolean>;
    /** Writes only the embedding of an existing document. */
    setEmbedding(key: string, vector: number[]): Promise<void>;
    /**
     * Store-side cosine ranking over embedded documents: scores >= minScore,
     * descending, at most `limit`. Rejects when the store cannot do it.
     */
    nativeSimilarity(vector: number[], limit: number, minScore: number): Promise<ScoredDocument[]>;

    getTopic(key: string): Promise<Topic | null>;
    listTopics(): Promise<Topic[]>;
    insertTopic(topic: Topic): Promise<void>;
    replaceTopic(topic: Topic): Promise<void>;
    deleteTopic(key: string): Promise<boolean>;

    insertRelationship(rel: Relationship): Promise<void>;
    listRelationships(filter: RelationshipFilter): Promise<Relationship[]>;
    /** Removes every relationship with `ref` at either end; returns how many. */
    deleteRelationshipsTouching(ref: string): Promise<number>;
}
