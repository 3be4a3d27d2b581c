import { v4 as uuidv4 } from 'uuid';
import type { KnowledgeStore } from '../knowledge-store.js';
import { KnowledgeBaseError } from '../../types/index.js';
import type { Document, Topic, TopicNode } from '../../types/index.js';
import { topicRef } from '../../types/document.js';
import { logger } from '../../utils/logger.js';
import { BELONGS_TO, DEFAULT_CREATOR } from './documents.js';

export interface CreateTopicInput {
    name: string;
    description?: string;
    parentTopic?: string;
    importance?: number;
}

export interface TopicUpdate {
    name?: string;
    description?: string;
    /** An empty string detaches the topic from its parent. */
    parentTopic?: string;
    importance?: number;
}

function byName(a: Topic, b: Topic): number {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export class TopicService {
    constructor(
        private readonly store: KnowledgeStore,
        private readonly now: () => Date = () => new Date()
    ) {}

    async getTopic(key: string): Promise<Topic | null> {
        return this.store.getTopic(key);
    }

    async requireTopic(key: string): Promise<Topic> {
        const topic = await this.store.getTopic(key);
        if (!topic) throw new KnowledgeBaseError(`Topic with key '${key}' not found`, 'TOPIC_NOT_FOUND', 404, { key });
        return topic;
    }

    async createTopic(input: CreateTopicInput): Promise<Topic> {
        if (input.parentTopic) await this.requireTopic(input.parentTopic);
        const topic: Topic = {
            key: uuidv4(),
            name: input.name,
            description: input.description ?? '',
            parentTopic: input.parentTopic ? input.parentTopic : null,
            metadata: {
                created: this.now().toISOString(),
                creator: DEFAULT_CREATOR,
                importance: input.importance ?? 0.5
            }
        };
        await this.store.insertTopic(topic);
        logger.success('create_topic', `topic ${topic.key} "${topic.name}"`);
        return topic;
    }

    async updateTopic(key: string, update: TopicUpdate): Promise<Topic> {
        const existing = await this.requireTopic(key);
        let parentTopic = existing.parentTopic;
        if (update.parentTopic !== undefined) {
            parentTopic = update.parentTopic ? update.parentTopic : null;
            if (parentTopic !== null) await this.assertNoCycle(key, parentTopic);
        }
        const updated: Topic = {
            ...existing,
            name: update.name ? update.name : existing.name,
            description: update.description ?? existing.description,
            parentTopic,
            metadata: {
                ...existing.metadata,
                importance: update.importance ?? existing.metadata.importance
            }
        };
        await this.store.replaceTopic(updated);
        logger.success('update_topic', `topic ${key}`);
        return updated;
    }

    /** Walks up from the proposed parent; reaching `key` means a cycle. */
    private async assertNoCycle(key: string, parentKey: string): Promise<void> {
        const seen = new Set<string>();
        let current: string | null = parentKey;
        while (current !== null) {
            if (current === key) {
                throw new KnowledgeBaseError(`Topic '${key}' cannot be its own ancestor`, 'INVALID_PAYLOAD', 400, { key, parentKey });
            }
            if (seen.has(current)) break;
            seen.add(current);
            const topic: Topic = await this.requireTopic(current);
            current = topic.parentTopic;
        }
    }

    /**
     * Refuses while documents still belong to the topic. Child topics are
     * detached rather than removed.
     */
    async deleteTopic(key: string): Promise<Topic> {
        const topic = await this.requireTopic(key);
        const members = await this.store.listRelationships({ to: topicRef(key), type: BELONGS_TO });
        if (members.length > 0) {
            throw new KnowledgeBaseError(
                `Topic '${topic.name}' still has ${members.length} document(s)`,
                'TOPIC_NOT_EMPTY',
                409,
                { key, documents: members.length }
            );
        }
        for (const child of (await this.store.listTopics()).filter((t) => t.parentTopic === key)) {
            await this.store.replaceTopic({ ...child, parentTopic: null });
        }
        await this.store.deleteTopic(key);
        await this.store.deleteRelationshipsTouching(topicRef(key));
        logger.success('delete_topic', `topic ${key} "${topic.name}"`);
        return topic;
    }

    async listTopics(): Promise<Topic[]> {
        return (await this.store.listTopics()).sort(byName);
    }

    /**
     * Topic forest ordered by name at every level. Topics whose parent is
     * missing are treated as roots.
     */
    async getTopicHierarchy(): Promise<TopicNode[]> {
        const topics = await this.listTopics();
        const keys = new Set(topics.map((t) => t.key));
        const children = new Map<string, Topic[]>();
        const roots: Topic[] = [];
        for (const topic of topics) {
            if (topic.parentTopic !== null && keys.has(topic.parentTopic) && topic.parentTopic !== topic.key) {
                const list = children.get(topic.parentTopic) ?? [];
                list.push(topic);
                children.set(topic.parentTopic, list);
            } else {
                roots.push(topic);
            }
        }
        const visited = new Set<string>();
        const build = (topic: Topic): TopicNode => {
            visited.add(topic.key);
            const kids = (children.get(topic.key) ?? []).filter((c) => !visited.has(c.key));
            return { topic, children: kids.map(build) };
        };
        return roots.map(build);
    }

    /** The topic and the documents that belong to it, newest first. */
    async getTopicContents(key: string): Promise<{ topic: Topic; documents: Document[] }> {
        const topic = await this.requireTopic(key);
        const members = await this.store.listRelationships({ to: topicRef(key), type: BELONGS_TO });
        const documents: Document[] = [];
        for (const rel of members) {
            if (!rel.from.startsWith('documents/')) continue;
            const doc = await this.store.getDocument(rel.from.slice('documents/'.length));
            if (doc) documents.push(doc);
        }
        documents.sort((a, b) => b.metadata.created.localeCompare(a.metadata.created));
        return { topic, documents };
    }
}
