import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { KnowledgeBase } from '../services/knowledge/index.js';
import { formatTagList, formatTopicHierarchy } from '../templates/markdown.js';
import { runTool } from './tool-runner.js';

export function registerTopicTools(server: McpServer, kb: KnowledgeBase): void {
    server.registerTool(
        'create_topic',
        {
            title: 'Create topic',
            description: 'Create a topic, optionally nested under a parent topic.',
            inputSchema: {
                name: z.string().min(1),
                description: z.string().default(''),
                parent_topic_key: z.string().optional()
            }
        },
        async ({ name, description, parent_topic_key }) =>
            runTool('create_topic', 'store', `"${name}"`, async () => {
                const topic = await kb.topics.createTopic({
                    name,
                    description,
                    ...(parent_topic_key ? { parentTopic: parent_topic_key } : {})
                });
                return { text: `Topic created with ID: ${topic.key}`, structured: { key: topic.key } };
            })
    );

    server.registerTool(
        'update_topic',
        {
            title: 'Update topic',
            description: 'Rename, describe or move a topic. An empty parent_topic_key makes it a root topic.',
            inputSchema: {
                topic_key: z.string().min(1),
                name: z.string().optional(),
                description: z.string().optional(),
                parent_topic_key: z.string().optional()
            }
        },
        async ({ topic_key, name, description, parent_topic_key }) =>
            runTool('update_topic', 'update', topic_key, async () => {
                await kb.topics.updateTopic(topic_key, {
                    ...(name !== undefined ? { name } : {}),
                    ...(description ? { description } : {}),
                    ...(parent_topic_key !== undefined ? { parentTopic: parent_topic_key } : {})
                });
                return { text: `Topic '${topic_key}' updated successfully` };
            })
    );

    server.registerTool(
        'delete_topic',
        {
            title: 'Delete topic',
            description: 'Delete a topic that has no documents.',
            inputSchema: { topic_key: z.string().min(1) }
        },
        async ({ topic_key }) =>
            runTool('delete_topic', 'delete', topic_key, async () => {
                await kb.topics.deleteTopic(topic_key);
                return { text: `Topic '${topic_key}' deleted successfully` };
            })
    );

    server.registerTool(
        'list_topic_hierarchy',
        {
            title: 'List topic hierarchy',
            description: 'List all topics as a nested tree.',
            inputSchema: {}
        },
        async () =>
            runTool('list_topic_hierarchy', 'list', 'all topics', async () => ({
                text: formatTopicHierarchy(await kb.topics.getTopicHierarchy())
            }))
    );

    server.registerTool(
        'list_tags',
        {
            title: 'List tags',
            description: 'List every tag in use, most used first.',
            inputSchema: {
                include_count: z.boolean().default(true)
            }
        },
        async ({ include_count }) =>
            runTool('list_tags', 'list', 'all tags', async () => {
                const tags = await kb.tags.listTags();
                return { text: formatTagList(tags, include_count), structured: { tags } };
            })
    );
}
