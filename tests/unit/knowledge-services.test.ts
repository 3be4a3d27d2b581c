import { DocumentService, TagService, TopicService, parseTagList } from '../../src/services/knowledge/index.js';
import { fallbackEmbedding } from '../../src/services/embedding/fallback.js';
import { KnowledgeBaseError } from '../../src/types/index.js';
import { InMemoryKnowledgeStore } from '../utils/in-memory-store.js';
import { DIMENSION, fallbackEmbeddings, makeDocument } from '../utils/fixtures.js';

const FIXED_NOW = new Date('2024-05-01T10:00:00.000Z');
const clock = () => FIXED_NOW;

function services(store = new InMemoryKnowledgeStore()) {
  return {
    store,
    documents: new DocumentService(store, fallbackEmbeddings(), clock),
    topics: new TopicService(store, clock),
    tags: new TagService(store)
  };
}

async function rejectionCode(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof KnowledgeBaseError) return err.code;
    throw err;
  }
  throw new Error('expected a rejection');
}

describe('parseTagList', () => {
  test('trims entries and drops empty ones', () => {
    expect(parseTagList(' db, search ,,  ')).toEqual(['db', 'search']);
    expect(parseTagList(undefined)).toEqual([]);
    expect(parseTagList('')).toEqual([]);
  });
});

describe('DocumentService', () => {
  test('stores an embedded document with defaults', async () => {
    const { store, documents } = services();
    const { document, topic } = await documents.storeKnowledge({
      title: 'Caching',
      content: 'Cache invalidation rules.',
      tags: ['cache', 'cache', 'rules']
    });

    expect(topic).toBeUndefined();
    expect(document.tags).toEqual(['cache', 'rules']);
    expect(document.summary).toBeNull();
    expect(document.confidence).toBe(0.9);
    expect(document.status).toBe('active');
    expect(document.metadata).toEqual({
      source: 'mcp_conversation',
      creator: 'mcp_user',
      created: '2024-05-01T10:00:00.000Z',
      updated: '2024-05-01T10:00:00.000Z',
      version: 1
    });
    expect(store.documents.get(document.key)?.embedding)
      .toEqual(fallbackEmbedding('Caching  Cache invalidation rules.', DIMENSION));
  });

  test('links a new document to an existing topic', async () => {
    const { store, documents, topics } = services();
    const created = await topics.createTopic({ name: 'Infrastructure' });
    const { document, topic } = await documents.storeKnowledge({ title: 'T', content: 'C', topicKey: created.key });

    expect(topic).toEqual({ key: created.key, name: 'Infrastructure' });
    const links = [...store.relationships.values()];
    expect(links).toHaveLength(1);
    expect(links[0]).toMatchObject({
      from: `documents/${document.key}`,
      to: `topics/${created.key}`,
      type: 'belongs_to',
      strength: 0.9
    });
  });

  test('keeps the document when the requested topic is missing', async () => {
    const { store, documents } = services();
    const { document, topic } = await documents.storeKnowledge({ title: 'T', content: 'C', topicKey: 'nope' });
    expect(topic).toEqual({ key: 'nope', name: null });
    expect(store.documents.has(document.key)).toBe(true);
    expect(store.relationships.size).toBe(0);
  });

  test('updates fields, merges tags and bumps the version', async () => {
    const { documents } = services();
    const { document } = await documents.storeKnowledge({
      title: 'Old', content: 'Body', summary: 'Short', tags: ['a', 'b']
    });
    const updated = await documents.updateDocument(document.key, {
      title: '',
      content: 'New body',
      summary: '',
      addTags: ['c', 'a'],
      removeTags: ['b']
    });
    expect(updated.title).toBe('Old');
    expect(updated.content).toBe('New body');
    expect(updated.summary).toBeNull();
    expect(updated.tags).toEqual(['a', 'c']);
    expect(updated.metadata.version).toBe(2);
    expect(updated.embedding).toEqual(fallbackEmbedding('Old  New body', DIMENSION));
  });

  test('updating a missing document is a not-found error', async () => {
    const { documents } = services();
    await expect(rejectionCode(documents.updateDocument('missing', { title: 'x' }))).resolves.toBe('DOCUMENT_NOT_FOUND');
  });

  test('deleting a document removes its relationships', async () => {
    const { store, documents } = services();
    const a = (await documents.storeKnowledge({ title: 'A', content: 'a' })).document;
    const b = (await documents.storeKnowledge({ title: 'B', content: 'b' })).document;
    await documents.linkDocuments(a.key, b.key);

    const deleted = await documents.deleteDocument(a.key);
    expect(deleted.title).toBe('A');
    expect(store.documents.has(a.key)).toBe(false);
    expect(store.relationships.size).toBe(0);
  });

  test('bidirectional links are visible from both ends', async () => {
    const { documents } = services();
    const a = (await documents.storeKnowledge({ title: 'A', content: 'a' })).document;
    const b = (await documents.storeKnowledge({ title: 'B', content: 'b' })).document;
    const c = (await documents.storeKnowledge({ title: 'C', content: 'c' })).document;
    const link = await documents.linkDocuments(a.key, b.key, 'extends');
    await documents.linkDocuments(a.key, c.key, 'cites', false);

    expect(link.relationship).toMatchObject({ type: 'extends', strength: 0.5, bidirectional: true });
    expect(link.from.title).toBe('A');
    expect(link.to.title).toBe('B');

    expect((await documents.getRelatedDocuments(b.key)).map((r) => r.document.title)).toEqual(['A']);
    expect(await documents.getRelatedDocuments(c.key)).toEqual([]);
    expect((await documents.getRelatedDocuments(a.key, 'cites')).map((r) => r.document.title)).toEqual(['C']);
  });

  test('linking to a missing document fails', async () => {
    const { documents } = services();
    const a = (await documents.storeKnowledge({ title: 'A', content: 'a' })).document;
    await expect(rejectionCode(documents.linkDocuments(a.key, 'ghost'))).resolves.toBe('DOCUMENT_NOT_FOUND');
  });

  test('keyword search matches one field case-insensitively or tags exactly', async () => {
    const { store, documents } = services();
    const older = makeDocument({ title: 'Redis Notes', content: 'Eviction policy', tags: ['cache'] });
    const newer = makeDocument({ title: 'CDN', content: 'edge cache headers', summary: 'Redis in front', tags: ['cache', 'cdn'] });
    store.documents.set(older.key, older);
    store.documents.set(newer.key, newer);

    expect((await documents.keywordSearch('REDIS', 10, 'title')).map((d) => d.title)).toEqual(['Redis Notes']);
    expect((await documents.keywordSearch('redis', 10, 'summary')).map((d) => d.title)).toEqual(['CDN']);
    expect((await documents.keywordSearch('cache', 10, 'content')).map((d) => d.title)).toEqual(['CDN']);
    expect((await documents.keywordSearch('cache', 10, 'tags')).map((d) => d.title)).toEqual(['CDN', 'Redis Notes']);
    expect(await documents.keywordSearch('cach', 10, 'tags')).toEqual([]);
  });
});

describe('TopicService', () => {
  test('creates nested topics and renders them as a name-ordered forest', async () => {
    const { topics } = services();
    const root = await topics.createTopic({ name: 'Systems', description: 'Infra' });
    await topics.createTopic({ name: 'Storage', parentTopic: root.key });
    await topics.createTopic({ name: 'Networking', parentTopic: root.key });
    await topics.createTopic({ name: 'Algorithms' });

    const tree = await topics.getTopicHierarchy();
    expect(tree.map((n) => n.topic.name)).toEqual(['Algorithms', 'Systems']);
    expect(tree[1]?.children.map((n) => n.topic.name)).toEqual(['Networking', 'Storage']);
    expect(root.metadata.importance).toBe(0.5);
  });

  test('creating under a missing parent fails', async () => {
    const { topics } = services();
    await expect(rejectionCode(topics.createTopic({ name: 'x', parentTopic: 'ghost' }))).resolves.toBe('TOPIC_NOT_FOUND');
  });

  test('refuses a parent that would create a cycle', async () => {
    const { topics } = services();
    const a = await topics.createTopic({ name: 'A' });
    const b = await topics.createTopic({ name: 'B', parentTopic: a.key });
    await expect(rejectionCode(topics.updateTopic(a.key, { parentTopic: b.key }))).resolves.toBe('INVALID_PAYLOAD');
    await expect(rejectionCode(topics.updateTopic(a.key, { parentTopic: a.key }))).resolves.toBe('INVALID_PAYLOAD');
  });

  test('an empty parent makes the topic a root', async () => {
    const { topics } = services();
    const a = await topics.createTopic({ name: 'A' });
    const b = await topics.createTopic({ name: 'B', parentTopic: a.key });
    const updated = await topics.updateTopic(b.key, { parentTopic: '', name: 'B2' });
    expect(updated.parentTopic).toBeNull();
    expect(updated.name).toBe('B2');
    expect((await topics.getTopicHierarchy()).map((n) => n.topic.name)).toEqual(['A', 'B2']);
  });

  test('deleting a topic with documents is refused', async () => {
    const { documents, topics } = services();
    const topic = await topics.createTopic({ name: 'Full' });
    await documents.storeKnowledge({ title: 'T', content: 'C', topicKey: topic.key });
    await expect(rejectionCode(topics.deleteTopic(topic.key))).resolves.toBe('TOPIC_NOT_EMPTY');
  });

  test('deleting an empty topic detaches its children', async () => {
    const { store, topics } = services();
    const parent = await topics.createTopic({ name: 'Parent' });
    const child = await topics.createTopic({ name: 'Child', parentTopic: parent.key });
    await topics.deleteTopic(parent.key);
    expect(store.topics.has(parent.key)).toBe(false);
    expect(store.topics.get(child.key)?.parentTopic).toBeNull();
  });

  test('topic contents list member documents newest first', async () => {
    const { store, topics } = services();
    const topic = await topics.createTopic({ name: 'Notes' });
    const first = makeDocument({ title: 'First' });
    const second = makeDocument({ title: 'Second' });
    for (const doc of [first, second]) {
      store.documents.set(doc.key, doc);
      await store.insertRelationship({
        key: `rel-${doc.key}`,
        from: `documents/${doc.key}`,
        to: `topics/${topic.key}`,
        type: 'belongs_to',
        strength: 0.9,
        bidirectional: false,
        metadata: { created: doc.metadata.created, creator: 'tester' }
      });
    }
    const contents = await topics.getTopicContents(topic.key);
    expect(contents.topic.name).toBe('Notes');
    expect(contents.documents.map((d) => d.title)).toEqual(['Second', 'First']);
  });
});

describe('TagService', () => {
  test('counts each document once per tag, most used first then alphabetical', async () => {
    const { store, tags } = services();
    for (const doc of [
      makeDocument({ title: '1', tags: ['zeta', 'alpha', 'alpha'] }),
      makeDocument({ title: '2', tags: ['zeta', 'beta'] }),
      makeDocument({ title: '3', tags: ['beta', 'alpha'] })
    ]) {
      store.documents.set(doc.key, doc);
    }
    expect(await tags.listTags()).toEqual([
      { tag: 'alpha', count: 2 },
      { tag: 'beta', count: 2 },
      { tag: 'zeta', count: 2 }
    ]);
  });

  test('documents by tag are newest first and limited', async () => {
    const { store, tags } = services();
    const docs = [makeDocument({ title: 'old', tags: ['x'] }), makeDocument({ title: 'new', tags: ['x'] })];
    for (const doc of docs) store.documents.set(doc.key, doc);
    expect((await tags.getDocumentsByTag('x')).map((d) => d.title)).toEqual(['new', 'old']);
    expect((await tags.getDocumentsByTag('x', 1)).map((d) => d.title)).toEqual(['new']);
  });
});
