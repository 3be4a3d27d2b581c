import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from './utils/logger.js';
import { getBuildVersion } from './utils/build-version.js';
import type { KnowledgeBase } from './services/knowledge/index.js';
import { registerDocumentTools } from './tools/document-tools.js';
import { registerSearchTools } from './tools/search-tools.js';
import { registerTopicTools } from './tools/topic-tools.js';
import { registerKnowledgeResources } from './resources/knowledge-resources.js';
import { registerPrompts } from './resources/prompts.js';
import {
    EMBEDDING_PROVIDER,
    KB_COLLECTION_PREFIX,
    LOG_FORMAT,
    LOG_LEVEL,
    MCP_SERVER_NAME,
    QDRANT_API_KEY,
    SEARCH_DEFAULT_LIMIT,
    TEI_BASE_URL,
    getQdrantUrl,
    getTransportType
} from './config.js';

const mask = (v?: string) => (v ? `${v.slice(0, 2)}***${v.slice(-2)}` : undefined);

// Create and configure the MCP server
export function createServer(kb: KnowledgeBase): McpServer {
    const server = new McpServer(
        {
            name: MCP_SERVER_NAME,
            version: getBuildVersion()
        },
        {
            capabilities: {
                tools: {},
                resources: {},
                prompts: {}
            }
        }
    );

    registerDocumentTools(server, kb);
    registerSearchTools(server, kb);
    registerTopicTools(server, kb);
    registerKnowledgeResources(server, kb);
    registerPrompts(server);

    const config = {
        log: { level: LOG_LEVEL, format: LOG_FORMAT },
        transport: getTransportType(),
        qdrant: {
            url: getQdrantUrl(),
            prefix: KB_COLLECTION_PREFIX,
            apiKey: mask(QDRANT_API_KEY)
        },
        embedding: {
            preference: EMBEDDING_PROVIDER,
            tei: TEI_BASE_URL || undefined,
            ...kb.embeddings.getConfig()
        },
        search: { defaultLimit: SEARCH_DEFAULT_LIMIT }
    };
    logger.debug(`runtime config ${JSON.stringify(config)}`);

    logger.info('MCP server created and configured');
    return server;
}
