import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { parseTagList, type KnowledgeBase } from '../services/knowledge/index.js';
import { formatRetrievedKnowledge } from '../templates/markdown.js';
import { clampMaxResults, runTool } from './tool-runner.js';

export function registerDocumentTools(server: McpServer, kb: KnowledgeBase): void {
    server.registerTool(
        'store_knowledge',
        {
            title: 'Store knowledge',
            description: 'Store a new knowledge document, optionally filed under a topic.',
            inputSchema: {
                title: z.string().min(1).describe('Document title'),
                content: z.string().min(1).describe('Document content'),
                topic_key: z.string().optional().describe('Topic to file the document under'),
                tags: z.string().optional().describe('Comma-separated tags'),
                summary: z.string().optional().describe('Short summary of the content')
            }
        },
        async ({ title, content, topic_key, tags, summary }) =>
            runTool('store_knowledge', 'store', `"${title}"`, async () => {
                const result = await kb.documents.storeKnowledge({
                    title,
                    content,
                    tags: parseTagList(tags),
                    summary: summary ?? null,
                    ...(topic_key ? { topicKey: topic_key } : {})
                });
                const key = result.document.key;
                const topic = result.topic;
                let text = `Document created with ID: ${key}`;
                if (topic && topic.name === null) {
                    text = `Document created with ID: ${key}, but topic '${topic.key}' not found.`;
                } else if (topic) {
                    text = `Document created with ID: ${key} and linked to topic '${topic.name}'.`;
                }
                return { text, structured: { key, topic: topic ?? null } };
            })
    );

    server.registerTool(
        'update_document',
        {
            title: 'Update document',
            description: 'Update fields of an existing document. Tags are added or removed from comma-separated lists.',
            inputSchema: {
                doc_key: z.string().min(1),
                title: z.string().optional(),
                content: z.string().optional(),
                summary: z.string().optional().describe('New summary; an empty string clears it'),
                add_tags: z.string().optional().describe('Comma-separated tags to add'),
                remove_tags: z.string().optional().describe('Comma-separated tags to remove')
            }
        },
        async ({ doc_key, title, content, summary, add_tags, remove_tags }) =>
            runTool('update_document', 'update', doc_key, async () => {
                const updated = await kb.documents.updateDocument(doc_key, {
                    ...(title !== undefined ? { title } : {}),
                    ...(content !== undefined ? { content } : {}),
                    ...(summary !== undefined ? { summary } : {}),
                    addTags: parseTagList(add_tags),
                    removeTags: parseTagList(remove_tags)
                });
                return {
                    text: `Document '${doc_key}' updated successfully`,
                    structured: { key: updated.key, version: updated.metadata.version, tags: updated.tags }
                };
            })
    );

    server.registerTool(
        'delete_document',
        {
            title: 'Delete document',
            description: 'Delete a document and its relationships.',
            inputSchema: { doc_key: z.string().min(1) }
        },
        async ({ doc_key }) =>
            runTool('delete_document', 'delete', doc_key, async () => {
                const deleted = await kb.documents.deleteDocument(doc_key);
                return { text: `Document '${deleted.title}' (ID: ${doc_key}) deleted successfully` };
            })
    );

    server.registerTool(
        'link_documents',
        {
            title: 'Link documents',
            description: 'Create a typed relationship between two documents.',
            inputSchema: {
                doc1_key: z.string().min(1),
                doc2_key: z.string().min(1),
                relationship_type: z.string().min(1).default('related'),
                bidirectional: z.boolean().default(true)
            }
        },
        async ({ doc1_key, doc2_key, relationship_type, bidirectional }) =>
            runTool('link_documents', 'link', `${doc1_key} -> ${doc2_key}`, async () => {
                const { relationship, from, to } = await kb.documents.linkDocuments(doc1_key, doc2_key, relationship_type, bidirectional);
                return {
                    text: `Documents linked successfully: '${from.title}' ${relationship.type} '${to.title}'`,
                    structured: { key: relationship.key, from: relationship.from, to: relationship.to, type: relationship.type }
                };
            })
    );

    server.registerTool(
        'retrieve_knowledge',
        {
            title: 'Retrieve knowledge',
            description: 'Retrieve the full content of the documents most relevant to a query.',
            inputSchema: {
                query: z.string().min(1),
                max_results: z.number().int().default(3)
            }
        },
        async ({ query, max_results }) =>
            runTool('retrieve_knowledge', 'retrieve', `"${query}"`, async () => {
                const results = await kb.smartSearch.search(query, clampMaxResults(max_results));
                return { text: formatRetrievedKnowledge(results.map((r) => r.document)) };
            })
    );
}
