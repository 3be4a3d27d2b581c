/**
 * Shared error type for the knowledge base.
 */

export type KnowledgeBaseErrorCode =
    | 'DOCUMENT_NOT_FOUND'
    | 'TOPIC_NOT_FOUND'
    | 'TOPIC_NOT_EMPTY'
    | 'INVALID_KEY'
    | 'INVALID_EMBEDDING_DIMENSION'
    | 'INVALID_PAYLOAD'
    | 'STORE_UNAVAILABLE'
    | 'STORE_OPERATION_ERROR';

export class KnowledgeBaseError extends Error {
    constructor(
        message: string,
        public readonly code: KnowledgeBaseErrorCode,
        public readonly statusCode: number = 500,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'KnowledgeBaseError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export type {
    Document,
    DocumentMetadata,
    Topic,
    TopicMetadata,
    Relationship,
    RelationshipMetadata,
    ScoredDocument,
    TopicNode,
    TagCount
} from './document.js';
