import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { KnowledgeBase } from '../services/knowledge/index.js';
import type { ScoredDocument } from '../types/index.js';
import { formatDocumentResults, formatScoredResults, formatTermList } from '../templates/markdown.js';
import { LEXICAL_MIN_SCORE, SEARCH_DEFAULT_LIMIT, VECTOR_MIN_SCORE } from '../config.js';
import { clamp, clampMaxResults, clampMinSimilarity, runTool } from './tool-runner.js';

function scoredSummary(results: ScoredDocument[]): Record<string, unknown> {
    return {
        results: results.map(({ document, score }) => ({ key: document.key, title: document.title, score }))
    };
}

export function registerSearchTools(server: McpServer, kb: KnowledgeBase): void {
    server.registerTool(
        'semantic_search',
        {
            title: 'Semantic search',
            description: 'Search the knowledge base by meaning using vector embeddings, even without shared keywords.',
            inputSchema: {
                query: z.string().min(1).describe("What you're looking for"),
                max_results: z.number().int().default(5).describe('Maximum number of results (1-20)'),
                min_similarity: z.number().default(VECTOR_MIN_SCORE).describe('Minimum similarity score (0.1-0.9)')
            }
        },
        async ({ query, max_results, min_similarity }) =>
            runTool('semantic_search', 'search', `"${query}"`, async () => {
                const results = await kb.vectorSearch.search(query, clampMaxResults(max_results), clampMinSimilarity(min_similarity));
                return {
                    text: formatScoredResults('Semantic Search Results', query, results, 'Similarity', 'No semantically similar documents found.'),
                    structured: scoredSummary(results)
                };
            })
    );

    server.registerTool(
        'smart_search',
        {
            title: 'Smart search',
            description: 'Keyword search with stop-word removal and simple stemming, weighted across title, summary, tags and content.',
            inputSchema: {
                query: z.string().min(1),
                max_results: z.number().int().default(SEARCH_DEFAULT_LIMIT),
                min_score: z.number().default(LEXICAL_MIN_SCORE).describe('Minimum relevance score (0-1)')
            }
        },
        async ({ query, max_results, min_score }) =>
            runTool('smart_search', 'search', `"${query}"`, async () => {
                const results = await kb.smartSearch.search(query, clampMaxResults(max_results), clamp(min_score, 0, 1));
                return {
                    text: formatScoredResults('Smart Search Results', query, results, 'Relevance', 'No documents matched your search.'),
                    structured: scoredSummary(results)
                };
            })
    );

    server.registerTool(
        'fuzzy_search',
        {
            title: 'Fuzzy search',
            description: 'Search tolerant of typos and partial words, ranked by character-sequence similarity.',
            inputSchema: {
                query: z.string().min(1),
                max_results: z.number().int().default(SEARCH_DEFAULT_LIMIT),
                min_score: z.number().default(LEXICAL_MIN_SCORE),
                max_distance: z.number().int().min(0).default(2).describe('Edit-distance hint; accepted but not applied')
            }
        },
        async ({ query, max_results, min_score, max_distance }) =>
            runTool('fuzzy_search', 'search', `"${query}"`, async () => {
                const results = await kb.smartSearch.fuzzySearch(query, clampMaxResults(max_results), clamp(min_score, 0, 1), max_distance);
                return {
                    text: formatScoredResults('Fuzzy Search Results', query, results, 'Relevance', 'No documents matched your search.'),
                    structured: scoredSummary(results)
                };
            })
    );

    server.registerTool(
        'suggest_terms',
        {
            title: 'Suggest search terms',
            description: 'Complete a partial query from title words and tags. An empty prefix returns the most used tags.',
            inputSchema: {
                partial_query: z.string().default(''),
                max_suggestions: z.number().int().default(5)
            }
        },
        async ({ partial_query, max_suggestions }) =>
            runTool('suggest_terms', 'search', `"${partial_query}"`, async () => {
                const suggestions = await kb.smartSearch.getSuggestions(partial_query, clampMaxResults(max_suggestions));
                return {
                    text: formatTermList('Suggestions', suggestions, 'No suggestions found.'),
                    structured: { suggestions }
                };
            })
    );

    server.registerTool(
        'similar_queries',
        {
            title: 'Similar queries',
            description: 'Propose related queries built from terms that co-occur with the query terms.',
            inputSchema: {
                query: z.string().min(1),
                max_suggestions: z.number().int().default(3)
            }
        },
        async ({ query, max_suggestions }) =>
            runTool('similar_queries', 'search', `"${query}"`, async () => {
                const queries = await kb.smartSearch.similarQueries(query, clampMaxResults(max_suggestions));
                return {
                    text: formatTermList('Related Queries', queries, 'No related queries found.'),
                    structured: { queries }
                };
            })
    );

    server.registerTool(
        'keyword_search',
        {
            title: 'Keyword search',
            description: 'Case-insensitive keyword match on one field, or exact tag match.',
            inputSchema: {
                query: z.string().min(1),
                max_results: z.number().int().default(SEARCH_DEFAULT_LIMIT),
                search_in: z.enum(['content', 'title', 'summary', 'tags']).default('content')
            }
        },
        async ({ query, max_results, search_in }) =>
            runTool('keyword_search', 'search', `"${query}" in ${search_in}`, async () => {
                const docs = await kb.documents.keywordSearch(query, clampMaxResults(max_results), search_in);
                const kind = search_in === 'tags' ? 'Tag' : 'Keyword';
                return {
                    text: formatDocumentResults(`${kind} Search Results`, query, docs, `No documents found matching your ${kind.toLowerCase()} search.`),
                    structured: { results: docs.map((d) => ({ key: d.key, title: d.title })) }
                };
            })
    );

    server.registerTool(
        'update_embeddings',
        {
            title: 'Update embeddings',
            description: 'Regenerate the embedding of one document, or of every document when no key is given.',
            inputSchema: {
                doc_key: z.string().optional().describe('Document to update; all documents when omitted or empty')
            }
        },
        async ({ doc_key }) =>
            runTool('update_embeddings', 'embed', doc_key || 'all documents', async () => {
                const count = await kb.vectorSearch.updateDocumentEmbeddings(doc_key);
                if (doc_key) {
                    return {
                        text: count > 0
                            ? `Successfully updated embeddings for document ${doc_key}.`
                            : `Failed to update embeddings for document ${doc_key}.`,
                        structured: { updated: count }
                    };
                }
                return { text: `Successfully updated embeddings for ${count} documents.`, structured: { updated: count } };
            })
    );
}
