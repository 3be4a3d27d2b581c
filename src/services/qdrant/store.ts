import type { KnowledgeStore, RelationshipFilter } from '../knowledge-store.js';
import type { Document, Relationship, ScoredDocument, Topic } from '../../types/index.js';
import { KnowledgeBaseError } from '../../types/index.js';
import { qdrantOperationDuration, qdrantOperations } from '../metrics/qdrant-metrics.js';
import { QdrantConnection, type QdrantConnectionOptions } from './connection.js';
import { initializeCollections } from './initialization.js';
import {
  documentFromPoint,
  documentToPayload,
  relationshipFromPoint,
  relationshipToPayload,
  topicFromPoint,
  topicToPayload
} from './payload.js';
import { extractNamedVector, isValidUUID, scrollAll, vectorName, type QdrantCondition, type QdrantFilter, type RawPoint } from './utils.js';

function requireKey(key: string, kind: string): string {
  if (!isValidUUID(key)) {
    throw new KnowledgeBaseError(`Invalid ${kind} key: ${key}`, 'INVALID_KEY', 400, { key });
  }
  return key;
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

/**
 * Knowledge store on Qdrant.
 *
 * Documents are points whose payload holds every field but the embedding,
 * which lives in the optional named vector `vs{dimension}`. Topics and
 * relationships live in vector-less collections.
 */
export class QdrantKnowledgeStore implements KnowledgeStore {
  readonly conn: QdrantConnection;
  private readonly vector: string;

  constructor(readonly dimension: number, options: QdrantConnectionOptions = {}) {
    this.conn = new QdrantConnection(options);
    this.vector = vectorName(dimension);
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const timer = qdrantOperationDuration.startTimer({ operation });
    try {
      const result = await this.conn.executeWithReconnect(fn, operation);
      qdrantOperations.inc({ operation, status: 'success' });
      return result;
    } catch (err) {
      qdrantOperations.inc({ operation, status: 'error' });
      throw err;
    } finally {
      timer();
    }
  }

  private toDocument(point: RawPoint): Document | null {
    return documentFromPoint(point, extractNamedVector(point.vector, this.vector));
  }

  async init(): Promise<void> {
    await initializeCollections(this.conn, this.dimension);
  }

  async checkHealth(): Promise<boolean> {
    return this.conn.checkHealth();
  }

  // Documents

  async getDocument(key: string): Promise<Document | null> {
    if (!isValidUUID(key)) return null;
    return this.run('get_document', async () => {
      const [point] = await this.conn.client.retrieve(this.conn.collections.documents, {
        ids: [key],
        with_payload: true,
        with_vector: [this.vector]
      });
      return point ? this.toDocument(point) : null;
    });
  }

  async listDocuments(): Promise<Document[]> {
    return this.run('list_documents', async () => {
      const points = await scrollAll(this.conn, this.conn.collections.documents, { withVector: true });
      return points.map((p) => this.toDocument(p)).filter(isPresent);
    });
  }

  async listEmbeddedDocuments(): Promise<Document[]> {
    return this.run('list_embedded_documents', async () => {
      const filter: QdrantFilter = { must: [{ has_vector: this.vector }] };
      const points = await scrollAll(this.conn, this.conn.collections.documents, { filter, withVector: true });
      return points.map((p) => this.toDocument(p)).filter(isPresent);
    });
  }

  async findDocumentsByTag(tag: string): Promise<Document[]> {
    return this.run('find_by_tag', async () => {
      const filter: QdrantFilter = { must: [{ key: 'tags', match: { value: tag } }] };
      const points = await scrollAll(this.conn, this.conn.collections.documents, { filter, withVector: true });
      return points.map((p) => this.toDocument(p)).filter(isPresent);
    });
  }

  async countDocuments(): Promise<number> {
    return this.run('count_documents', async () => {
      const result = await this.conn.client.count(this.conn.collections.documents, { exact: true });
      return result.count;
    });
  }

  async insertDocument(doc: Document): Promise<void> {
    await this.writeDocument(doc, 'insert_document');
  }

  async replaceDocument(doc: Document): Promise<void> {
    await this.writeDocument(doc, 'replace_document');
  }

  private async writeDocument(doc: Document, operation: string): Promise<void> {
    const id = requireKey(doc.key, 'document');
    if (doc.embedding) this.assertDimension(doc.embedding);
    await this.run(operation, async () => {
      await this.conn.client.upsert(this.conn.collections.documents, {
        wait: true,
        points: [{
          id,
          vector: doc.embedding ? { [this.vector]: doc.embedding } : {},
          payload: { ...documentToPayload(doc) }
        }]
      });
    });
  }

  async deleteDocument(key: string): Promise<boolean> {
    const existing = await this.getDocument(key);
    if (!existing) return false;
    await this.run('delete_document', async () => {
      await this.conn.client.delete(this.conn.collections.documents, { wait: true, points: [key] });
    });
    return true;
  }

  async setEmbedding(key: string, vector: number[]): Promise<void> {
    const id = requireKey(key, 'document');
    this.assertDimension(vector);
    await this.run('set_embedding', async () => {
      await this.conn.client.updateVectors(this.conn.collections.documents, {
        wait: true,
        points: [{ id, vector: { [this.vector]: vector } }]
      });
    });
  }

  async nativeSimilarity(vector: number[], limit: number, minScore: number): Promise<ScoredDocument[]> {
    this.assertDimension(vector);
    // No reconnect loop here: a failure should hand over to the next strategy promptly.
    const result = await this.conn.client.query(this.conn.collections.documents, {
      query: vector,
      using: this.vector,
      limit,
      score_threshold: minScore,
      with_payload: true,
      with_vector: [this.vector]
    });
    qdrantOperations.inc({ operation: 'native_similarity', status: 'success' });
    const scored: ScoredDocument[] = [];
    for (const point of result.points) {
      const document = this.toDocument(point);
      if (document) scored.push({ document, score: point.score });
    }
    return scored;
  }

  private assertDimension(vector: number[]): void {
    if (vector.length !== this.dimension) {
      throw new KnowledgeBaseError(
        `Embedding has dimension ${vector.length}, expected ${this.dimension}`,
        'INVALID_EMBEDDING_DIMENSION',
        400
      );
    }
  }

  // Topics

  async getTopic(key: string): Promise<Topic | null> {
    if (!isValidUUID(key)) return null;
    return this.run('get_topic', async () => {
      const [point] = await this.conn.client.retrieve(this.conn.collections.topics, { ids: [key], with_payload: true });
      return point ? topicFromPoint(point) : null;
    });
  }

  async listTopics(): Promise<Topic[]> {
    return this.run('list_topics', async () => {
      const points = await scrollAll(this.conn, this.conn.collections.topics);
      return points.map(topicFromPoint).filter(isPresent);
    });
  }

  async insertTopic(topic: Topic): Promise<void> {
    await this.writeTopic(topic, 'insert_topic');
  }

  async replaceTopic(topic: Topic): Promise<void> {
    await this.writeTopic(topic, 'replace_topic');
  }

  private async writeTopic(topic: Topic, operation: string): Promise<void> {
    const id = requireKey(topic.key, 'topic');
    await this.run(operation, async () => {
      await this.conn.client.upsert(this.conn.collections.topics, {
        wait: true,
        points: [{ id, vector: {}, payload: { ...topicToPayload(topic) } }]
      });
    });
  }

  async deleteTopic(key: string): Promise<boolean> {
    const existing = await this.getTopic(key);
    if (!existing) return false;
    await this.run('delete_topic', async () => {
      await this.conn.client.delete(this.conn.collections.topics, { wait: true, points: [key] });
    });
    return true;
  }

  // Relationships

  async insertRelationship(rel: Relationship): Promise<void> {
    const id = requireKey(rel.key, 'relationship');
    await this.run('insert_relationship', async () => {
      await this.conn.client.upsert(this.conn.collections.relationships, {
        wait: true,
        points: [{ id, vector: {}, payload: { ...relationshipToPayload(rel) } }]
      });
    });
  }

  async listRelationships(filter: RelationshipFilter): Promise<Relationship[]> {
    const must: QdrantCondition[] = [];
    if (filter.from !== undefined) must.push({ key: 'from', match: { value: filter.from } });
    if (filter.to !== undefined) must.push({ key: 'to', match: { value: filter.to } });
    if (filter.type !== undefined) must.push({ key: 'type', match: { value: filter.type } });
    const qdrantFilter: QdrantFilter = { must };
    if (filter.touching !== undefined) {
      qdrantFilter.should = [
        { key: 'from', match: { value: filter.touching } },
        { key: 'to', match: { value: filter.touching } }
      ];
    }
    return this.run('list_relationships', async () => {
      const points = await scrollAll(this.conn, this.conn.collections.relationships, { filter: qdrantFilter });
      return points.map(relationshipFromPoint).filter(isPresent);
    });
  }

  async deleteRelationshipsTouching(ref: string): Promise<number> {
    const touching = await this.listRelationships({ touching: ref });
    if (touching.length === 0) return 0;
    await this.run('delete_relationships', async () => {
      await this.conn.client.delete(this.conn.collections.relationships, {
        wait: true,
        points: touching.map((r) => r.key)
      });
    });
    return touching.length;
  }
}
