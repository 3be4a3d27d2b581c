import type { KnowledgeStore } from '../knowledge-store.js';
import type { Document, TagCount } from '../../types/index.js';

export class TagService {
    constructor(private readonly store: KnowledgeStore) {}

    /** Every tag with its document count, most used first, ties alphabetical. */
    async listTags(): Promise<TagCount[]> {
        const counts = new Map<string, number>();
        for (const doc of await this.store.listDocuments()) {
            for (const tag of new Set(doc.tags)) counts.set(tag, (counts.get(tag) ?? 0) + 1);
        }
        return [...counts]
            .map(([tag, count]) => ({ tag, count }))
            .sort((a, b) => b.count - a.count || (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0));
    }

    /** Documents carrying `tag`, newest first. */
    async getDocumentsByTag(tag: string, limit = 20): Promise<Document[]> {
        const docs = await this.store.findDocumentsByTag(tag);
        return docs
            .sort((a, b) => b.metadata.created.localeCompare(a.metadata.created))
            .slice(0, limit);
    }
}
