import { z } from 'zod';
import type { QdrantConnection } from './connection.js';
import { logger } from '../../utils/logger.js';
import { KnowledgeBaseError, errorMessage } from '../../types/index.js';
import { vectorName } from './utils.js';

/**
 * Collection and index setup. Idempotent: existing collections are kept and
 * index creation failures are treated as "already exists".
 */

type PayloadIndex = { collection: string; field: string };

const namedVectorConfigSchema = z.record(z.string(), z.object({ size: z.number() }).passthrough());

async function existingCollections(conn: QdrantConnection): Promise<Set<string>> {
  const result = await conn.client.getCollections();
  return new Set(result.collections.map((c) => c.name));
}

async function assertDocumentVector(conn: QdrantConnection, dimension: number): Promise<void> {
  const name = vectorName(dimension);
  const info = await conn.client.getCollection(conn.collections.documents);
  const vectors = namedVectorConfigSchema.safeParse(info.config.params.vectors);
  const size = vectors.success ? vectors.data[name]?.size : undefined;
  if (size !== dimension) {
    throw new KnowledgeBaseError(
      `Collection ${conn.collections.documents} has no ${name} vector of size ${dimension}; migrate it or choose another KB_COLLECTION_PREFIX`,
      'STORE_OPERATION_ERROR',
      500,
      { collection: conn.collections.documents, vector: name }
    );
  }
}

export async function initializeCollections(conn: QdrantConnection, dimension: number): Promise<void> {
  return conn.executeWithReconnect(async () => {
    const existing = await existingCollections(conn);
    const { documents, topics, relationships } = conn.collections;

    if (!existing.has(documents)) {
      logger.info(`Creating collection ${documents} with vector ${vectorName(dimension)} (size ${dimension})`);
      await conn.client.createCollection(documents, {
        vectors: { [vectorName(dimension)]: { size: dimension, distance: 'Cosine', on_disk: true } }
      });
    } else {
      await assertDocumentVector(conn, dimension);
      logger.info(`Collection ${documents} already exists with vector ${vectorName(dimension)}`);
    }

    for (const name of [topics, relationships]) {
      if (existing.has(name)) continue;
      logger.info(`Creating collection ${name}`);
      await conn.client.createCollection(name, { vectors: {} });
    }

    const indexes: PayloadIndex[] = [
      { collection: documents, field: 'tags' },
      { collection: documents, field: 'status' },
      { collection: topics, field: 'parent_topic' },
      { collection: relationships, field: 'from' },
      { collection: relationships, field: 'to' },
      { collection: relationships, field: 'type' }
    ];
    for (const index of indexes) {
      try {
        await conn.client.createPayloadIndex(index.collection, { field_name: index.field, field_schema: 'keyword', wait: true });
        logger.debug(`Created payload index ${index.collection}.${index.field}`);
      } catch (err) {
        logger.debug(`Payload index ${index.collection}.${index.field} may already exist: ${errorMessage(err)}`);
      }
    }
  }, 'initialize');
}
