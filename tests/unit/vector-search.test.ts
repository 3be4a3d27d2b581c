import { jest } from '@jest/globals';
import { VectorSearch, embeddingSourceText } from '../../src/services/search/vector-search.js';
import type { SimilarityStrategy } from '../../src/services/search/types.js';
import { fallbackEmbedding } from '../../src/services/embedding/fallback.js';
import { InMemoryKnowledgeStore } from '../utils/in-memory-store.js';
import { DIMENSION, fallbackEmbeddings, makeDocument } from '../utils/fixtures.js';

const QUERY = 'vector search';

function seededStore(): InMemoryKnowledgeStore {
  const store = new InMemoryKnowledgeStore(DIMENSION);
  const match = makeDocument({ key: 'match', title: 'Match', embedding: fallbackEmbedding(QUERY, DIMENSION) });
  const other = makeDocument({ key: 'other', title: 'Other', embedding: fallbackEmbedding('XYZ', DIMENSION) });
  const bare = makeDocument({ key: 'bare', title: 'No embedding' });
  for (const doc of [match, other, bare]) store.documents.set(doc.key, doc);
  return store;
}

function failing(name: string): SimilarityStrategy {
  return { name, rank: async () => { throw new Error(`${name} down`); } };
}

describe('embeddingSourceText', () => {
  test('joins title, summary and content', () => {
    expect(embeddingSourceText({ title: 'T', summary: null, content: 'C' })).toBe('T  C');
    expect(embeddingSourceText({ title: 'T', summary: 'S', content: 'C' })).toBe('T S C');
  });
});

describe('VectorSearch.search', () => {
  test('finds the document embedded from the same text', async () => {
    const store = seededStore();
    const search = new VectorSearch(store, fallbackEmbeddings());
    const results = await search.search(QUERY, 10, 0.99);
    expect(results.map((r) => r.document.key)).toEqual(['match']);
    expect(results[0]?.score).toBeCloseTo(1, 10);
    expect(store.nativeSimilarityCalls).toBe(1);
  });

  test('falls back to in-process ranking when native similarity rejects', async () => {
    const store = seededStore();
    store.failNativeSimilarity = true;
    const search = new VectorSearch(store, fallbackEmbeddings());
    const results = await search.search(QUERY, 10, 0.99);
    expect(results.map((r) => r.document.key)).toEqual(['match']);
    expect(store.nativeSimilarityCalls).toBe(1);
  });

  test('returns nothing when every strategy rejects', async () => {
    const search = new VectorSearch(seededStore(), fallbackEmbeddings(), [failing('first'), failing('second')]);
    await expect(search.search(QUERY)).resolves.toEqual([]);
  });

  test('tries strategies in order and stops at the first success', async () => {
    const second = jest.fn<SimilarityStrategy['rank']>().mockResolvedValue([]);
    const third = jest.fn<SimilarityStrategy['rank']>().mockResolvedValue([]);
    const search = new VectorSearch(seededStore(), fallbackEmbeddings(), [
      failing('first'),
      { name: 'second', rank: second },
      { name: 'third', rank: third }
    ]);
    await search.search(QUERY, 4, 0.7);
    expect(second).toHaveBeenCalledWith(fallbackEmbedding(QUERY, DIMENSION), 4, 0.7);
    expect(third).not.toHaveBeenCalled();
  });
});

describe('VectorSearch.updateDocumentEmbeddings', () => {
  test('re-embeds one document from its source text', async () => {
    const store = seededStore();
    const search = new VectorSearch(store, fallbackEmbeddings());
    await expect(search.updateDocumentEmbeddings('bare')).resolves.toBe(1);
    const bare = store.documents.get('bare');
    expect(bare?.embedding).toEqual(fallbackEmbedding('No embedding  ', DIMENSION));
  });

  test('a missing key updates nothing', async () => {
    const search = new VectorSearch(seededStore(), fallbackEmbeddings());
    await expect(search.updateDocumentEmbeddings('missing-key')).resolves.toBe(0);
  });

  test('an empty key re-embeds every document', async () => {
    const store = seededStore();
    const search = new VectorSearch(store, fallbackEmbeddings());
    await expect(search.updateDocumentEmbeddings('')).resolves.toBe(3);
    expect(store.documents.get('bare')?.embedding).toEqual(fallbackEmbedding('No embedding  ', DIMENSION));
  });

  test('skips documents whose write fails', async () => {
    const store = seededStore();
    const write = store.setEmbedding.bind(store);
    jest.spyOn(store, 'setEmbedding')
      .mockRejectedValueOnce(new Error('write failed'))
      .mockImplementation(write);
    const search = new VectorSearch(store, fallbackEmbeddings());
    await expect(search.updateDocumentEmbeddings()).resolves.toBe(2);
  });

  test('reports embedding coverage', async () => {
    const store = seededStore();
    const search = new VectorSearch(store, fallbackEmbeddings());
    await expect(search.countEmbeddingCoverage()).resolves.toEqual({ total: 3, withEmbedding: 2 });
    await search.updateDocumentEmbeddings();
    await expect(search.countEmbeddingCoverage()).resolves.toEqual({ total: 3, withEmbedding: 3 });
  });
});

describe('VectorSearch ranking', () => {
  // Scores against QUERY: twins 1, 'vector searches' ~0.998, 'vector' ~0.979,
  // 'search engine' ~0.429, 'XYZ' 0.
  function rankedStore(): InMemoryKnowledgeStore {
    const store = new InMemoryKnowledgeStore(DIMENSION);
    const corpus: Array<[string, string]> = [
      ['engine', 'search engine'],
      ['twin-a', QUERY],
      ['unrelated', 'XYZ'],
      ['prefix', 'vector'],
      ['twin-b', QUERY],
      ['plural', 'vector searches']
    ];
    for (const [key, text] of corpus) {
      store.documents.set(key, makeDocument({ key, title: key, embedding: fallbackEmbedding(text, DIMENSION) }));
    }
    return store;
  }

  function expectRanked(results: { score: number }[], minScore: number, limit: number): void {
    expect(results.length).toBeLessThanOrEqual(limit);
    for (const [i, { score }] of results.entries()) {
      expect(score).toBeGreaterThanOrEqual(minScore);
      const previous = results[i - 1];
      if (previous) expect(score).toBeLessThanOrEqual(previous.score);
    }
  }

  test('native ranking is descending, floored and truncated', async () => {
    const search = new VectorSearch(rankedStore(), fallbackEmbeddings());
    const results = await search.search(QUERY, 3, 0.5);
    expectRanked(results, 0.5, 3);
    expect(results.map((r) => r.document.key)).toEqual(['twin-a', 'twin-b', 'plural']);

    const all = await search.search(QUERY, 10, 0.5);
    expect(all.map((r) => r.document.key)).toEqual(['twin-a', 'twin-b', 'plural', 'prefix']);
  });

  test('in-process ranking matches and keeps fetch order for equal scores', async () => {
    const store = rankedStore();
    store.failNativeSimilarity = true;
    const search = new VectorSearch(store, fallbackEmbeddings());
    const results = await search.search(QUERY, 3, 0.5);
    expectRanked(results, 0.5, 3);
    expect(results.map((r) => r.document.key)).toEqual(['twin-a', 'twin-b', 'plural']);
    expect(results[0]?.score).toBe(results[1]?.score);
  });

  test('a low floor admits weaker matches but never zero scores', async () => {
    const search = new VectorSearch(rankedStore(), fallbackEmbeddings());
    const results = await search.search(QUERY, 10, 0.1);
    expectRanked(results, 0.1, 10);
    expect(results.map((r) => r.document.key)).toEqual(['twin-a', 'twin-b', 'plural', 'prefix', 'engine']);
  });
});
