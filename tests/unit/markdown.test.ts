import {
  documentSnippet,
  formatDocument,
  formatDocumentResults,
  formatRetrievedKnowledge,
  formatScoredResults,
  formatTagList,
  formatTermList,
  formatTopicContents,
  formatTopicHierarchy,
  formatTopicList
} from '../../src/templates/markdown.js';
import type { Topic } from '../../src/types/index.js';
import { makeDocument } from '../utils/fixtures.js';

const CREATED = '2024-02-03T04:05:06.000Z';

function doc(fields: Parameters<typeof makeDocument>[0]) {
  return makeDocument({
    metadata: { source: 'test', creator: 'tester', created: CREATED, updated: CREATED, version: 3 },
    ...fields
  });
}

function topic(key: string, name: string, description = ''): Topic {
  return { key, name, description, parentTopic: null, metadata: { created: CREATED, creator: 'tester', importance: 0.5 } };
}

describe('documentSnippet', () => {
  test('prefers the summary', () => {
    expect(documentSnippet(doc({ title: 't', summary: 'Short', content: 'Long body' }))).toBe('Short');
  });

  test('truncates long content to 200 characters', () => {
    const snippet = documentSnippet(doc({ title: 't', content: 'x'.repeat(250) }));
    expect(snippet).toBe(`${'x'.repeat(200)}...`);
  });
});

describe('result lists', () => {
  test('scored results carry a two-decimal score', () => {
    const d = doc({ key: 'k1', title: 'Caching', content: 'Body', tags: ['a', 'b'] });
    expect(formatScoredResults('Smart Search Results', 'cache', [{ document: d, score: 0.5 }], 'Relevance', 'none')).toBe(
      "# Smart Search Results for: 'cache'\n\n"
      + 'Found 1 matching document:\n\n'
      + '## 1. Caching (Relevance: 0.50)\n\n'
      + 'Body\n\n'
      + '**Tags**: a, b\n'
      + '**Document ID**: k1\n'
      + `**Created**: ${CREATED}\n\n`
    );
  });

  test('empty results print the empty message', () => {
    expect(formatScoredResults('Semantic Search Results', 'q', [], 'Similarity', 'Nothing here.')).toBe(
      "# Semantic Search Results for: 'q'\n\nNothing here.\n"
    );
  });

  test('unscored results pluralize the count', () => {
    const docs = [doc({ key: 'k1', title: 'One' }), doc({ key: 'k2', title: 'Two' })];
    const output = formatDocumentResults('Keyword Search Results', 'x', docs, 'none');
    expect(output.startsWith("# Keyword Search Results for: 'x'\n\nFound 2 matching documents:\n\n## 1. One\n\n")).toBe(true);
    expect(output).toContain('## 2. Two\n\n');
  });

  test('retrieved knowledge shows full content', () => {
    const d = doc({ title: 'Caching', content: 'Body', tags: ['a'] });
    expect(formatRetrievedKnowledge([d])).toBe(
      'Retrieved 1 relevant knowledge documents:\n\n'
      + '## 1. Caching\n'
      + '**Tags**: a\n'
      + `**Last updated**: ${CREATED}\n`
      + '**Confidence**: 0.9\n\n'
      + 'Body\n\n---\n\n'
    );
    expect(formatRetrievedKnowledge([])).toBe('No relevant knowledge found. You may need to store this information.');
  });
});

describe('single documents and topics', () => {
  test('document view', () => {
    const d = doc({ key: 'k9', title: 'Caching', summary: 'Short', content: 'Body', tags: ['a'] });
    expect(formatDocument(d)).toBe(
      '# Caching\n\n*Short*\n\n'
      + '**Tags**: a\n'
      + '**Document ID**: k9\n'
      + `**Created**: ${CREATED}\n`
      + `**Last updated**: ${CREATED} (version 3)\n\n`
      + 'Body\n'
    );
  });

  test('topic list', () => {
    expect(formatTopicList([topic('t1', 'Systems', 'Infra')])).toBe(
      '# Available Knowledge Topics\n\n- **Systems** (t1): Infra\n'
    );
    expect(formatTopicList([])).toBe('# Available Knowledge Topics\n\nNo topics found.\n');
  });

  test('topic hierarchy indents two spaces per level', () => {
    const tree = [{ topic: topic('t1', 'Systems'), children: [{ topic: topic('t2', 'Storage'), children: [] }] }];
    expect(formatTopicHierarchy(tree)).toBe('# Topic Hierarchy\n\n- **Systems** (t1)\n  - **Storage** (t2)\n');
    expect(formatTopicHierarchy([])).toBe('No topics found in the knowledge base.');
  });

  test('topic contents inline short documents only', () => {
    const short = doc({ key: 's', title: 'Short', content: 'tiny', tags: ['x'] });
    const long = doc({ key: 'l', title: 'Long', content: 'y'.repeat(1000) });
    expect(formatTopicContents(topic('t1', 'Systems', 'Infra'), [short, long])).toBe(
      '# Systems\n\nInfra\n\n'
      + '## Documents in this topic (2)\n\n'
      + '### Short\n**Tags**: x\n**Document ID**: s\n\n**Content**:\ntiny\n\n---\n\n'
      + '### Long\n**Tags**: \n**Document ID**: l\n\n'
      + '*Document content too large to display. Use the document:// resource to view full content.*\n\n---\n\n'
    );
  });
});

describe('tags and terms', () => {
  test('tag list with and without counts', () => {
    const tags = [{ tag: 'db', count: 2 }, { tag: 'x', count: 1 }];
    const footer = '\n\nYou can view documents with a specific tag using: `tag://{tag_name}`';
    expect(formatTagList(tags)).toBe(`# Available Tags (2)\n\n- **db** (2 documents)\n- **x** (1 document)\n${footer}`);
    expect(formatTagList(tags, false)).toBe(`# Available Tags (2)\n\n- **db**\n- **x**\n${footer}`);
    expect(formatTagList([])).toBe('No tags found in the knowledge base.');
  });

  test('term list', () => {
    expect(formatTermList('Suggestions', ['alpha', 'beta'], 'none')).toBe('# Suggestions\n\n- alpha\n- beta\n');
    expect(formatTermList('Suggestions', [], 'No suggestions found.')).toBe('No suggestions found.');
  });
});
