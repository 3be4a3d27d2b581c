import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { GetPromptResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

function userPrompt(description: string, text: string): GetPromptResult {
    return {
        description,
        messages: [{ role: 'user', content: { type: 'text', text } }]
    };
}

export function storeNewKnowledgePrompt(topic: string, title: string): string {
    return [
        'I want to store new information in the knowledge base.',
        '',
        `Topic: ${topic}`,
        `Title: ${title}`,
        '',
        'Please provide the information to store below, being as detailed and clear as possible:',
        ''
    ].join('\n');
}

export function searchKnowledgePrompt(query: string): string {
    return [
        'Please search the knowledge base for information about:',
        '',
        query,
        '',
        'Please provide a comprehensive answer based on all relevant knowledge you can find.',
        ''
    ].join('\n');
}

export function registerPrompts(server: McpServer): void {
    server.registerPrompt(
        'store_new_knowledge',
        {
            title: 'Store new knowledge',
            description: 'Create a new knowledge document in the system',
            argsSchema: { topic: z.string(), title: z.string() }
        },
        ({ topic, title }) => userPrompt('Create a new knowledge document in the system', storeNewKnowledgePrompt(topic, title))
    );

    server.registerPrompt(
        'search_knowledge',
        {
            title: 'Search knowledge',
            description: 'Search for information in the knowledge base',
            argsSchema: { query: z.string() }
        },
        ({ query }) => userPrompt('Search for information in the knowledge base', searchKnowledgePrompt(query))
    );
}
