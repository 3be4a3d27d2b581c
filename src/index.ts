/**
 * Knowledge-base MCP server.
 *
 * Documents, tags and topics in Qdrant, exposed over MCP with semantic,
 * weighted keyword and fuzzy search.
 */

import { logger } from './utils/logger.js';
import { createServer } from './server.js';
import { startHttpServer } from './http/http-server.js';
import { startStdioServer } from './stdio-server.js';
import { createKnowledgeBaseFromEnv, initializeKnowledgeBase } from './runtime.js';
import { PORT, getTransportType, type TransportType } from './config.js';

export { createServer } from './server.js';
export { createHttpApp, startHttpServer } from './http/http-server.js';
export { createKnowledgeBaseFromEnv, initializeKnowledgeBase, waitForQdrant } from './runtime.js';
export { createKnowledgeBase, DocumentService, TopicService, TagService } from './services/knowledge/index.js';
export type { KnowledgeBase } from './services/knowledge/index.js';
export type { KnowledgeStore, RelationshipFilter } from './services/knowledge-store.js';
export { QdrantKnowledgeStore } from './services/qdrant/store.js';
export { EmbeddingService } from './services/embedding/service.js';
export { VectorSearch } from './services/search/vector-search.js';
export { SmartSearch } from './services/search/smart-search.js';
export { KnowledgeBaseError } from './types/index.js';
export type * from './types/document.js';

export interface ServeOptions {
    transport?: TransportType;
    port?: number;
}

export async function serve(options: ServeOptions = {}): Promise<void> {
    const transport = options.transport ?? getTransportType();
    const kb = createKnowledgeBaseFromEnv();
    await initializeKnowledgeBase(kb);

    if (transport === 'http') {
        const port = options.port ?? PORT;
        logger.success('Knowledge-base MCP server starting', `HTTP transport on port ${port}`);
        await startHttpServer(port, () => createServer(kb), kb);
    } else {
        await startStdioServer(createServer(kb));
    }
}
