/**
 * Markdown rendering of knowledge-base results for MCP clients.
 *
 * Pure functions: no store access, no logging.
 */

import type { Document, ScoredDocument, TagCount, Topic, TopicNode } from '../types/index.js';

export const SNIPPET_LENGTH = 200;
export const INLINE_CONTENT_LIMIT = 1000;

export type ScoreLabel = 'Relevance' | 'Similarity';

/** Summary when present, otherwise the first 200 characters of the content. */
export function documentSnippet(doc: Document): string {
    if (doc.summary) return doc.summary;
    return doc.content.length > SNIPPET_LENGTH ? `${doc.content.slice(0, SNIPPET_LENGTH)}...` : doc.content;
}

function documentEntry(index: number, doc: Document, score?: { label: ScoreLabel; value: number }): string {
    const heading = score
        ? `## ${index}. ${doc.title} (${score.label}: ${score.value.toFixed(2)})`
        : `## ${index}. ${doc.title}`;
    return [
        heading,
        '',
        documentSnippet(doc),
        '',
        `**Tags**: ${doc.tags.join(', ')}`,
        `**Document ID**: ${doc.key}`,
        `**Created**: ${doc.metadata.created}`,
        '',
        ''
    ].join('\n');
}

export function formatScoredResults(title: string, query: string, results: ScoredDocument[], label: ScoreLabel, emptyMessage: string): string {
    let output = `# ${title} for: '${query}'\n\n`;
    if (results.length === 0) return `${output}${emptyMessage}\n`;
    output += `Found ${results.length} matching document${results.length === 1 ? '' : 's'}:\n\n`;
    results.forEach(({ document, score }, i) => {
        output += documentEntry(i + 1, document, { label, value: score });
    });
    return output;
}

export function formatDocumentResults(title: string, query: string, docs: Document[], emptyMessage: string): string {
    let output = `# ${title} for: '${query}'\n\n`;
    if (docs.length === 0) return `${output}${emptyMessage}\n`;
    output += `Found ${docs.length} matching document${docs.length === 1 ? '' : 's'}:\n\n`;
    docs.forEach((doc, i) => {
        output += documentEntry(i + 1, doc);
    });
    return output;
}

/** Full-content listing used to answer a question from stored knowledge. */
export function formatRetrievedKnowledge(docs: Document[]): string {
    if (docs.length === 0) return 'No relevant knowledge found. You may need to store this information.';
    let output = `Retrieved ${docs.length} relevant knowledge documents:\n\n`;
    docs.forEach((doc, i) => {
        output += `## ${i + 1}. ${doc.title}\n`;
        output += `**Tags**: ${doc.tags.join(', ')}\n`;
        output += `**Last updated**: ${doc.metadata.updated}\n`;
        output += `**Confidence**: ${doc.confidence}\n\n`;
        output += `${doc.content}\n\n---\n\n`;
    });
    return output;
}

export function formatDocument(doc: Document): string {
    const lines = [`# ${doc.title}`, ''];
    if (doc.summary) lines.push(`*${doc.summary}*`, '');
    lines.push(
        `**Tags**: ${doc.tags.join(', ')}`,
        `**Document ID**: ${doc.key}`,
        `**Created**: ${doc.metadata.created}`,
        `**Last updated**: ${doc.metadata.updated} (version ${doc.metadata.version})`,
        '',
        doc.content,
        ''
    );
    return lines.join('\n');
}

export function formatTopicList(topics: Topic[]): string {
    let output = '# Available Knowledge Topics\n\n';
    if (topics.length === 0) return `${output}No topics found.\n`;
    for (const topic of topics) {
        output += `- **${topic.name}** (${topic.key}): ${topic.description}\n`;
    }
    return output;
}

export function formatTopicHierarchy(nodes: TopicNode[]): string {
    if (nodes.length === 0) return 'No topics found in the knowledge base.';
    const render = (node: TopicNode, depth: number): string =>
        `${'  '.repeat(depth)}- **${node.topic.name}** (${node.topic.key})\n`
        + node.children.map((child) => render(child, depth + 1)).join('');
    return `# Topic Hierarchy\n\n${nodes.map((node) => render(node, 0)).join('')}`;
}

export function formatTopicContents(topic: Topic, docs: Document[]): string {
    let output = `# ${topic.name}\n\n${topic.description}\n\n`;
    output += `## Documents in this topic (${docs.length})\n\n`;
    for (const doc of docs) {
        output += `### ${doc.title}\n`;
        if (doc.summary) output += `${doc.summary}\n\n`;
        output += `**Tags**: ${doc.tags.join(', ')}\n`;
        output += `**Document ID**: ${doc.key}\n\n`;
        output += doc.content.length < INLINE_CONTENT_LIMIT
            ? `**Content**:\n${doc.content}\n\n`
            : '*Document content too large to display. Use the document:// resource to view full content.*\n\n';
        output += '---\n\n';
    }
    return output;
}

export function formatTagList(tags: TagCount[], includeCount = true): string {
    if (tags.length === 0) return 'No tags found in the knowledge base.';
    let output = `# Available Tags (${tags.length})\n\n`;
    for (const { tag, count } of tags) {
        output += includeCount
            ? `- **${tag}** (${count} document${count === 1 ? '' : 's'})\n`
            : `- **${tag}**\n`;
    }
    return `${output}\n\nYou can view documents with a specific tag using: \`tag://{tag_name}\``;
}

export function formatTermList(title: string, terms: string[], emptyMessage: string): string {
    if (terms.length === 0) return emptyMessage;
    return `# ${title}\n\n${terms.map((term) => `- ${term}`).join('\n')}\n`;
}
