import { ResourceTemplate, type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import type { KnowledgeBase } from '../services/knowledge/index.js';
import { KnowledgeBaseError, errorMessage } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { SEARCH_DEFAULT_LIMIT } from '../config.js';
import { formatDocument, formatDocumentResults, formatScoredResults, formatTopicContents, formatTopicList } from '../templates/markdown.js';

type TemplateVariables = Record<string, string | string[]>;

function md(uri: URL, text: string): ReadResourceResult {
    return { contents: [{ uri: uri.href, mimeType: 'text/markdown', text }] };
}

/** First value of a template variable, percent-decoded. */
function variable(variables: TemplateVariables, name: string): string {
    const raw = variables[name];
    const value = Array.isArray(raw) ? raw[0] ?? '' : raw ?? '';
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}

async function render(uri: URL, producer: () => Promise<string>): Promise<ReadResourceResult> {
    try {
        return md(uri, await producer());
    } catch (error) {
        if (error instanceof KnowledgeBaseError) return md(uri, error.message);
        logger.error(`Resource ${uri.href} failed`, error);
        return md(uri, `Error reading ${uri.href}: ${errorMessage(error)}`);
    }
}

export function registerKnowledgeResources(server: McpServer, kb: KnowledgeBase): void {
    server.registerResource(
        'topics-list',
        'topics://list',
        { title: 'Knowledge topics', description: 'List all available knowledge topics', mimeType: 'text/markdown' },
        async (uri) => render(uri, async () => formatTopicList(await kb.topics.listTopics()))
    );

    server.registerResource(
        'topic-contents',
        new ResourceTemplate('topics://{topic_key}', { list: undefined }),
        { title: 'Topic contents', description: 'Get all documents in a specific topic', mimeType: 'text/markdown' },
        async (uri, variables) => render(uri, async () => {
            const { topic, documents } = await kb.topics.getTopicContents(variable(variables, 'topic_key'));
            return formatTopicContents(topic, documents);
        })
    );

    server.registerResource(
        'document',
        new ResourceTemplate('document://{doc_key}', { list: undefined }),
        { title: 'Document', description: "Get a specific document's contents", mimeType: 'text/markdown' },
        async (uri, variables) => render(uri, async () => formatDocument(await kb.documents.requireDocument(variable(variables, 'doc_key'))))
    );

    server.registerResource(
        'search',
        new ResourceTemplate('search://{query}', { list: undefined }),
        { title: 'Search', description: 'Search for documents matching the query', mimeType: 'text/markdown' },
        async (uri, variables) => render(uri, async () => {
            const query = variable(variables, 'query');
            const results = await kb.smartSearch.search(query, SEARCH_DEFAULT_LIMIT);
            return formatScoredResults('Search Results', query, results, 'Relevance', 'No documents matched your search.');
        })
    );

    server.registerResource(
        'tag',
        new ResourceTemplate('tag://{tag}', { list: undefined }),
        { title: 'Documents by tag', description: 'Get all documents with a specific tag', mimeType: 'text/markdown' },
        async (uri, variables) => render(uri, async () => {
            const tag = variable(variables, 'tag');
            const docs = await kb.tags.getDocumentsByTag(tag);
            return formatDocumentResults('Documents Tagged', tag, docs, `No documents tagged '${tag}'.`);
        })
    );
}
