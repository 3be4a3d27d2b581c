import { v4 as uuidv4 } from 'uuid';
import type { KnowledgeStore } from '../knowledge-store.js';
import type { EmbeddingService } from '../embedding/service.js';
import { embeddingSourceText } from '../search/vector-search.js';
import { KnowledgeBaseError } from '../../types/index.js';
import type { Document, Relationship } from '../../types/index.js';
import { documentRef, topicRef } from '../../types/document.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_SOURCE = 'mcp_conversation';
export const DEFAULT_CREATOR = 'mcp_user';
export const BELONGS_TO = 'belongs_to';

export interface StoreKnowledgeInput {
    title: string;
    content: string;
    tags?: string[];
    summary?: string | null;
    topicKey?: string;
}

export interface StoreKnowledgeResult {
    document: Document;
    /** Set when a topic was requested. */
    topic?: { key: string; name: string | null };
}

export interface DocumentUpdate {
    title?: string;
    content?: string;
    /** An empty string clears the summary. */
    summary?: string;
    addTags?: string[];
    removeTags?: string[];
}

export type KeywordField = 'content' | 'title' | 'summary' | 'tags';

export interface LinkResult {
    relationship: Relationship;
    from: Document;
    to: Document;
}

export interface RelatedDocument {
    document: Document;
    relationship: Relationship;
}

/**
 * Splits a comma-separated tag list, trimming entries and dropping empty ones.
 */
export function parseTagList(raw: string | undefined): string[] {
    if (!raw) return [];
    return raw.split(',').map((t) => t.trim()).filter((t) => t.length > 0);
}

function mergeTags(current: string[], add: string[], remove: string[]): string[] {
    const tags = [...current];
    for (const tag of add) {
        if (!tags.includes(tag)) tags.push(tag);
    }
    return tags.filter((tag) => !remove.includes(tag));
}

export class DocumentService {
    constructor(
        private readonly store: KnowledgeStore,
        private readonly embeddings: EmbeddingService,
        private readonly now: () => Date = () => new Date()
    ) {}

    private async embed(doc: Document): Promise<number[]> {
        return this.embeddings.embed(embeddingSourceText(doc));
    }

    async getDocument(key: string): Promise<Document | null> {
        return this.store.getDocument(key);
    }

    async requireDocument(key: string): Promise<Document> {
        const doc = await this.store.getDocument(key);
        if (!doc) throw new KnowledgeBaseError(`Document with key '${key}' not found`, 'DOCUMENT_NOT_FOUND', 404, { key });
        return doc;
    }

    async storeKnowledge(input: StoreKnowledgeInput): Promise<StoreKnowledgeResult> {
        const timestamp = this.now().toISOString();
        const document: Document = {
            key: uuidv4(),
            title: input.title,
            content: input.content,
            summary: input.summary ? input.summary : null,
            tags: mergeTags([], input.tags ?? [], []),
            confidence: 0.9,
            status: 'active',
            embedding: null,
            metadata: {
                source: DEFAULT_SOURCE,
                creator: DEFAULT_CREATOR,
                created: timestamp,
                updated: timestamp,
                version: 1
            }
        };
        document.embedding = await this.embed(document);
        await this.store.insertDocument(document);
        logger.success('store_knowledge', `document ${document.key} "${document.title}"`);

        if (!input.topicKey) return { document };

        const topic = await this.store.getTopic(input.topicKey);
        if (!topic) {
            logger.warn(`Document ${document.key} created but topic '${input.topicKey}' not found`);
            return { document, topic: { key: input.topicKey, name: null } };
        }
        await this.store.insertRelationship({
            key: uuidv4(),
            from: documentRef(document.key),
            to: topicRef(topic.key),
            type: BELONGS_TO,
            strength: 0.9,
            bidirectional: false,
            metadata: { created: timestamp, creator: DEFAULT_CREATOR }
        });
        return { document, topic: { key: topic.key, name: topic.name } };
    }

    async updateDocument(key: string, update: DocumentUpdate): Promise<Document> {
        const existing = await this.requireDocument(key);
        const updated: Document = {
            ...existing,
            title: update.title ? update.title : existing.title,
            content: update.content ? update.content : existing.content,
            summary: update.summary === undefined ? existing.summary : update.summary || null,
            tags: mergeTags(existing.tags, update.addTags ?? [], update.removeTags ?? []),
            metadata: {
                ...existing.metadata,
                updated: this.now().toISOString(),
                version: existing.metadata.version + 1
            }
        };
        updated.embedding = await this.embed(updated);
        await this.store.replaceDocument(updated);
        logger.success('update_document', `document ${key} -> v${updated.metadata.version}`);
        return updated;
    }

    /**
     * Deletes the document and every relationship touching it.
     */
    async deleteDocument(key: string): Promise<Document> {
        const existing = await this.requireDocument(key);
        await this.store.deleteDocument(key);
        const removed = await this.store.deleteRelationshipsTouching(documentRef(key));
        logger.success('delete_document', `document ${key} (${removed} relationship(s))`);
        return existing;
    }

    async linkDocuments(fromKey: string, toKey: string, type = 'related', bidirectional = true): Promise<LinkResult> {
        const from = await this.requireDocument(fromKey);
        const to = await this.requireDocument(toKey);
        const relationship: Relationship = {
            key: uuidv4(),
            from: documentRef(fromKey),
            to: documentRef(toKey),
            type,
            strength: 0.5,
            bidirectional,
            metadata: { created: this.now().toISOString(), creator: DEFAULT_CREATOR }
        };
        await this.store.insertRelationship(relationship);
        logger.success('link_documents', `${fromKey} ${type} ${toKey}${bidirectional ? ' (bidirectional)' : ''}`);
        return { relationship, from, to };
    }

    /**
     * Documents reachable from `key`: outgoing links, plus incoming links that
     * are bidirectional.
     */
    async getRelatedDocuments(key: string, type?: string): Promise<RelatedDocument[]> {
        const ref = documentRef(key);
        const relationships = await this.store.listRelationships({ touching: ref, ...(type !== undefined ? { type } : {}) });
        const related: RelatedDocument[] = [];
        for (const relationship of relationships) {
            const other = relationship.from === ref ? relationship.to : relationship.bidirectional ? relationship.from : null;
            if (!other?.startsWith('documents/')) continue;
            const document = await this.store.getDocument(other.slice('documents/'.length));
            if (document) related.push({ document, relationship });
        }
        return related;
    }

    /**
     * Exact tag lookup (newest first) or case-insensitive containment on one
     * text field.
     */
    async keywordSearch(query: string, limit = 10, searchIn: KeywordField = 'content'): Promise<Document[]> {
        if (searchIn === 'tags') {
            const docs = await this.store.findDocumentsByTag(query);
            return docs
                .sort((a, b) => b.metadata.created.localeCompare(a.metadata.created))
                .slice(0, limit);
        }
        const needle = query.toLowerCase();
        const docs = await this.store.listDocuments();
        return docs
            .filter((doc) => (doc[searchIn] ?? '').toLowerCase().includes(needle))
            .slice(0, limit);
    }
}
