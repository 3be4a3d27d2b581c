/**
 * Knowledge-base entities.
 *
 * Keys are UUIDs. Relationship endpoints are written as `documents/{key}` or
 * `topics/{key}` so one relationship type can join either kind.
 */

export interface DocumentMetadata {
    source: string;
    creator: string;
    created: string;
    updated: string;
    version: number;
}

export interface Document {
    key: string;
    title: string;
    content: string;
    summary: string | null;
    tags: string[];
    confidence: number;
    status: string;
    /** Present only once the document has been embedded; length equals the configured dimension. */
    embedding: number[] | null;
    metadata: DocumentMetadata;
}

export interface TopicMetadata {
    created: string;
    creator: string;
    importance: number;
}

export interface Topic {
    key: string;
    name: string;
    description: string;
    parentTopic: string | null;
    metadata: TopicMetadata;
}

export interface RelationshipMetadata {
    created: string;
    creator: string;
}

export interface Relationship {
    key: string;
    from: string;
    to: string;
    type: string;
    strength: number;
    bidirectional: boolean;
    metadata: RelationshipMetadata;
}

export interface ScoredDocument {
    document: Document;
    score: number;
}

export interface TopicNode {
    topic: Topic;
    children: TopicNode[];
}

export interface TagCount {
    tag: string;
    count: number;
}

export function documentRef(key: string): string {
    return `documents/${key}`;
}

export function topicRef(key: string): string {
    return `topics/${key}`;
}
