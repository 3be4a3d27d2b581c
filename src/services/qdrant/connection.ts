import { QdrantClient } from '@qdrant/js-client-rest';
import { logger } from '../../utils/logger.js';
import { KnowledgeBaseError, errorMessage } from '../../types/index.js';
import { qdrantReconnects } from '../metrics/qdrant-metrics.js';
import { KB_COLLECTION_PREFIX, QDRANT_API_KEY, getQdrantUrl } from '../../config.js';

export interface CollectionNames {
  documents: string;
  topics: string;
  relationships: string;
}

export function collectionNamesFor(prefix: string): CollectionNames {
  return {
    documents: `${prefix}_documents`,
    topics: `${prefix}_topics`,
    relationships: `${prefix}_relationships`
  };
}

export interface QdrantConnectionOptions {
  url?: string;
  apiKey?: string;
  collectionPrefix?: string;
}

type QdrantClientParams = NonNullable<ConstructorParameters<typeof QdrantClient>[0]>;

/**
 * QdrantConnection encapsulates client initialization and resilient execution.
 * Store modules receive a QdrantConnection and call executeWithReconnect().
 */
export class QdrantConnection {
  public client: QdrantClient;
  public readonly collections: CollectionNames;
  public readonly qdrantUrl: string;
  private readonly apiKey: string;
  private isHealthy = false;
  private reconnectAttempts = 0;
  private readonly maxReconnectAttempts = 5;
  private readonly reconnectDelay = 1000;

  constructor(options: QdrantConnectionOptions = {}) {
    this.qdrantUrl = options.url ?? getQdrantUrl();
    this.apiKey = options.apiKey ?? QDRANT_API_KEY;
    this.collections = collectionNamesFor(options.collectionPrefix ?? KB_COLLECTION_PREFIX);
    this.client = this.createClient();
  }

  private createClient(): QdrantClient {
    const params: QdrantClientParams = { url: this.qdrantUrl };
    if (this.apiKey) params.apiKey = this.apiKey;
    return new QdrantClient(params);
  }

  async checkHealth(): Promise<boolean> {
    try {
      await this.client.getCollections();
      this.isHealthy = true;
      this.reconnectAttempts = 0;
      return true;
    } catch (error) {
      this.isHealthy = false;
      logger.warn(`Qdrant health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async attemptReconnect(): Promise<boolean> {
    while (this.reconnectAttempts < this.maxReconnectAttempts) {
      this.reconnectAttempts++;
      qdrantReconnects.inc();
      const delay = this.reconnectDelay * Math.pow(2, this.reconnectAttempts - 1);
      logger.info(`Attempting to reconnect to Qdrant (attempt ${this.reconnectAttempts}/${this.maxReconnectAttempts}) in ${delay}ms...`);
      await new Promise((resolve) => setTimeout(resolve, delay));
      this.client = this.createClient();
      if (await this.checkHealth()) {
        logger.info('Successfully reconnected to Qdrant');
        return true;
      }
    }
    logger.error(`Max reconnection attempts (${this.maxReconnectAttempts}) reached. Giving up.`);
    return false;
  }

  async executeWithReconnect<T>(operation: () => Promise<T>, label = 'operation'): Promise<T> {
    try {
      if (!this.isHealthy) await this.checkHealth();
      return await operation();
    } catch (error) {
      if (error instanceof KnowledgeBaseError) throw error;
      logger.error(`Qdrant ${label} failed (url=${this.qdrantUrl})`, error);

      // A reachable Qdrant that rejected the request will not improve on retry.
      if (await this.checkHealth()) {
        throw new KnowledgeBaseError(`Qdrant ${label} failed: ${errorMessage(error)}`, 'STORE_OPERATION_ERROR', 500);
      }
      if (await this.attemptReconnect()) {
        try {
          return await operation();
        } catch (retryError) {
          if (retryError instanceof KnowledgeBaseError) throw retryError;
          throw new KnowledgeBaseError(`Qdrant ${label} failed after reconnection: ${errorMessage(retryError)}`, 'STORE_OPERATION_ERROR', 500);
        }
      }
      throw new KnowledgeBaseError(`Qdrant is unavailable after ${this.maxReconnectAttempts} attempts`, 'STORE_UNAVAILABLE', 503);
    }
  }
}
