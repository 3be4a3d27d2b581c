import type { KnowledgeStore } from '../knowledge-store.js';
import type { EmbeddingService } from '../embedding/service.js';
import { SmartSearch } from '../search/smart-search.js';
import { VectorSearch } from '../search/vector-search.js';
import { DocumentService } from './documents.js';
import { TagService } from './tags.js';
import { TopicService } from './topics.js';

export { DocumentService, parseTagList } from './documents.js';
export type { DocumentUpdate, KeywordField, LinkResult, RelatedDocument, StoreKnowledgeInput, StoreKnowledgeResult } from './documents.js';
export { TopicService } from './topics.js';
export type { CreateTopicInput, TopicUpdate } from './topics.js';
export { TagService } from './tags.js';

/** Everything the MCP surface and the CLI operate on. */
export interface KnowledgeBase {
    store: KnowledgeStore;
    embeddings: EmbeddingService;
    documents: DocumentService;
    topics: TopicService;
    tags: TagService;
    vectorSearch: VectorSearch;
    smartSearch: SmartSearch;
}

export function createKnowledgeBase(store: KnowledgeStore, embeddings: EmbeddingService): KnowledgeBase {
    return {
        store,
        embeddings,
        documents: new DocumentService(store, embeddings),
        topics: new TopicService(store),
        tags: new TagService(store),
        vectorSearch: new VectorSearch(store, embeddings),
        smartSearch: new SmartSearch(store)
    };
}
