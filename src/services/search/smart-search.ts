/**
 * Lexical search over the document corpus: weighted multi-field matching,
 * fuzzy whole-text matching, prefix suggestions and related-query generation.
 *
 * Every call reads one corpus snapshot from the store and computes in
 * process. Store failures are logged and turn into empty results.
 */

import type { KnowledgeStore } from '../knowledge-store.js';
import type { Document, ScoredDocument } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { searchRequests, searchResultCount } from '../metrics/search-metrics.js';
import { expandTerms, extractTerms, normalizeQuery } from './query-terms.js';
import { similarityRatio } from './sequence-matcher.js';
import type { SearchMode } from './types.js';

export const FIELD_WEIGHTS = {
    title: 1.0,
    content: 0.5,
    summary: 0.8,
    tags: 0.7
} as const;

const RELATED_WORD_SEPARATORS = /[.,;:!?()[\]{}]/g;

interface Counted {
    term: string;
    count: number;
}

function countOccurrences(values: Iterable<string>): Counted[] {
    const counts = new Map<string, number>();
    for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
    return [...counts].map(([term, count]) => ({ term, count }));
}

/** Count descending, ties alphabetical. */
function byCountThenTerm(a: Counted, b: Counted): number {
    return b.count - a.count || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0);
}

function rankAndLimit(results: ScoredDocument[], minScore: number, limit: number): ScoredDocument[] {
    return results
        .filter((r) => r.score >= minScore)
        .sort((x, y) => y.score - x.score)
        .slice(0, Math.max(0, limit));
}

/**
 * Flattened per-term field scores, grouped title, content, summary, tags.
 * The document score is their mean.
 */
export function fieldScores(doc: Document, terms: string[]): number[] {
    const title = doc.title.toLowerCase();
    const content = doc.content.toLowerCase();
    const summary = doc.summary?.toLowerCase() ?? null;
    const tags = doc.tags.map((t) => t.toLowerCase());

    return [
        ...terms.map((term) => (title.includes(term) ? FIELD_WEIGHTS.title : 0)),
        ...terms.map((term) => (content.includes(term) ? FIELD_WEIGHTS.content : 0)),
        ...terms.map((term) => (summary !== null && summary.includes(term) ? FIELD_WEIGHTS.summary : 0)),
        ...terms.map((term) => (tags.some((tag) => tag.includes(term)) ? FIELD_WEIGHTS.tags : 0))
    ];
}

function wordsOf(text: string, exclude: string): Set<string> {
    const words = new Set<string>();
    for (const word of text.replace(RELATED_WORD_SEPARATORS, ' ').toLowerCase().split(/\s+/)) {
        if (word.length > 3 && word !== exclude) words.add(word);
    }
    return words;
}

export class SmartSearch {
    constructor(private readonly store: KnowledgeStore) {}

    private async guarded<T>(mode: SearchMode, empty: T, run: () => Promise<T>): Promise<T> {
        try {
            const result = await run();
            searchRequests.inc({ mode, status: 'success' });
            if (Array.isArray(result)) searchResultCount.observe({ mode }, result.length);
            return result;
        } catch (err) {
            searchRequests.inc({ mode, status: 'error' });
            logger.error(`[SmartSearch] ${mode} failed`, err);
            return empty;
        }
    }

    async search(query: string, limit = 10, minScore = 0.3): Promise<ScoredDocument[]> {
        return this.guarded('smart', [], async () => {
            const terms = [...expandTerms(extractTerms(normalizeQuery(query)))];
            logger.info(`[SmartSearch] query '${query}' -> [${terms.join(', ')}]`);
            if (terms.length === 0) return [];

            const docs = await this.store.listDocuments();
            const scored = docs.map((document) => {
                const scores = fieldScores(document, terms);
                const score = scores.reduce((sum, s) => sum + s, 0) / scores.length;
                return { document, score };
            });
            return rankAndLimit(scored, minScore, limit);
        });
    }

    /**
     * Candidates share at least one expanded query term with title+content; they are
     * scored by `similarityRatio` against the whole normalized query.
     * `maxDistance` is accepted for callers that pass an edit-distance bound
     * but is not applied by the ratio scorer.
     */
    async fuzzySearch(query: string, limit = 10, minScore = 0.3, maxDistance = 2): Promise<ScoredDocument[]> {
        return this.guarded('fuzzy', [], async () => {
            const normalized = normalizeQuery(query);
            const terms = [...expandTerms(extractTerms(normalized))];
            logger.info(`[SmartSearch] fuzzy query '${query}' -> [${terms.join(', ')}] (maxDistance=${maxDistance}, advisory)`);
            if (terms.length === 0) return [];

            const docs = await this.store.listDocuments();
            const scored: ScoredDocument[] = [];
            for (const document of docs) {
                const text = `${document.title} ${document.content}`.toLowerCase();
                if (!terms.some((term) => text.includes(term))) continue;
                scored.push({ document, score: similarityRatio(text, normalized) });
            }
            return rankAndLimit(scored, minScore, limit);
        });
    }

    async getSuggestions(partialQuery: string, maxSuggestions = 5): Promise<string[]> {
        return this.guarded('suggest', [], async () => {
            const prefix = normalizeQuery(partialQuery);
            if (!prefix) return this.topTags(await this.store.listDocuments(), maxSuggestions);

            const docs = await this.store.listDocuments();
            const titleWords = countOccurrences(
                docs.flatMap((d) => d.title.toLowerCase().split(/\s+/).filter((w) => w.startsWith(prefix)))
            ).sort(byCountThenTerm).slice(0, maxSuggestions);
            const tagTerms = countOccurrences(
                docs.flatMap((d) => d.tags.filter((t) => t.toLowerCase().startsWith(prefix)))
            ).sort(byCountThenTerm).slice(0, maxSuggestions);

            const merged = [...titleWords, ...tagTerms].sort((a, b) => b.count - a.count);
            // Tags keep their spelling; a tag equal to a title word up to case is a duplicate.
            const suggestions: string[] = [];
            const seen = new Set<string>();
            for (const { term } of merged) {
                if (suggestions.length >= maxSuggestions) break;
                const folded = term.toLowerCase();
                if (seen.has(folded)) continue;
                seen.add(folded);
                suggestions.push(term);
            }
            return suggestions;
        });
    }

    async similarQueries(query: string, maxSuggestions = 3): Promise<string[]> {
        return this.guarded('similar', [], async () => {
            const normalized = normalizeQuery(query);
            const terms = extractTerms(normalized);
            if (terms.size === 0) return [];

            const docs = await this.store.listDocuments();
            const related = new Set<string>();
            for (const term of terms) {
                for (const word of this.relatedTerms(docs, term)) related.add(word);
            }
            return [...related]
                .filter((word) => !terms.has(word))
                .slice(0, Math.max(0, maxSuggestions))
                .map((word) => `${normalized} ${word}`);
        });
    }

    async getTopTags(limit = 5): Promise<string[]> {
        return this.guarded('tags', [], async () => this.topTags(await this.store.listDocuments(), limit));
    }

    async findRelatedTerms(term: string, limit = 5): Promise<string[]> {
        return this.guarded('similar', [], async () => this.relatedTerms(await this.store.listDocuments(), term, limit));
    }

    /**
     * Co-occurrence: each document mentioning `term` votes once for every
     * distinct word (longer than 3 characters) of its title and content and
     * for each of its tags. Ties keep first-seen order.
     */
    private relatedTerms(docs: Document[], term: string, limit = 5): string[] {
        const counts = new Map<string, number>();
        for (const doc of docs) {
            const mentions = doc.content.toLowerCase().includes(term)
                || doc.title.toLowerCase().includes(term)
                || doc.tags.includes(term);
            if (!mentions) continue;

            const words = new Set([...wordsOf(doc.content, term), ...wordsOf(doc.title, term), ...doc.tags]);
            for (const word of words) counts.set(word, (counts.get(word) ?? 0) + 1);
        }
        return [...counts]
            .sort((a, b) => b[1] - a[1])
            .slice(0, limit)
            .map(([word]) => word);
    }

    private topTags(docs: Document[], limit: number): string[] {
        return countOccurrences(docs.flatMap((d) => d.tags))
            .sort(byCountThenTerm)
            .slice(0, Math.max(0, limit))
            .map((c) => c.term);
    }
}
