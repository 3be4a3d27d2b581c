/**
 * Embedding service.
 *
 * Wraps a remote embedding model (OpenAI or Text Embeddings Inference) and a
 * deterministic fallback. `init()` probes the configured providers in order
 * and keeps the first one that answers with vectors of the configured
 * dimension. When none does, or when a later call fails, vectors come from
 * `fallbackEmbedding` instead; `embed` never rejects.
 *
 * Constructed explicitly and passed to its consumers, so tests can run on the
 * fallback path without a model.
 */

import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../types/index.js';
import { embeddingDuration, embeddingFallbacks, embeddingRequests } from '../metrics/embedding-metrics.js';
import { fallbackEmbedding } from './fallback.js';
import { cosineSimilarity, euclideanDistance, l2Normalize, truncateForDisplay } from './vector-math.js';
import type { EmbeddingConfig, EmbeddingHealth, EmbeddingProvider, EmbeddingServiceOptions } from './types.js';

export type { EmbeddingConfig, EmbeddingHealth, EmbeddingProvider, EmbeddingServiceOptions } from './types.js';

const PROBE_TEXT = 'embedding probe';

export class EmbeddingService {
    private readonly candidates: EmbeddingProvider[];
    private readonly model: string;
    readonly dimension: number;
    private active: EmbeddingProvider | null = null;
    private initialized = false;

    constructor(options: EmbeddingServiceOptions) {
        this.candidates = options.providers;
        this.model = options.model;
        this.dimension = options.dimension;
    }

    /**
     * Loads the model by probing each candidate provider once. Never rejects.
     */
    async init(): Promise<void> {
        this.active = null;
        for (const provider of this.candidates) {
            try {
                const [vector] = await provider.embed([PROBE_TEXT]);
                if (!vector || vector.length !== this.dimension) {
                    throw new Error(`dimension mismatch: got ${vector?.length ?? 0}, expected ${this.dimension}`);
                }
                this.active = provider;
                logger.info(`[EmbeddingService] Using ${provider.name} provider (model=${provider.model}, dim=${this.dimension})`);
                break;
            } catch (err) {
                logger.warn(`[EmbeddingService] ${provider.name} provider unavailable: ${errorMessage(err)}`);
            }
        }
        if (!this.active) {
            embeddingFallbacks.inc({ reason: 'model_unavailable' });
            logger.warn(`[EmbeddingService] No embedding model available; using deterministic fallback vectors (dim=${this.dimension})`);
        }
        this.initialized = true;
    }

    embed(text: string): Promise<number[]>;
    embed(texts: string[]): Promise<number[][]>;
    async embed(input: string | string[]): Promise<number[] | number[][]> {
        if (Array.isArray(input)) return this.embedMany(input);
        const [vector] = await this.embedMany([input]);
        return vector ?? this.fallback(input);
    }

    fallback(text: string): number[] {
        return fallbackEmbedding(text, this.dimension);
    }

    private async embedMany(texts: string[]): Promise<number[][]> {
        const provider = this.active;
        if (!provider) {
            embeddingRequests.inc({ provider: 'fallback', status: 'success' }, texts.length);
            return texts.map((t) => this.fallback(t));
        }

        // Providers reject empty input; those slots get the zero vector.
        const pending = texts.filter((t) => t.length > 0);
        if (pending.length === 0) return texts.map((t) => this.fallback(t));

        const timer = embeddingDuration.startTimer({ provider: provider.name });
        try {
            const vectors = await provider.embed(pending);
            if (vectors.length !== pending.length) {
                throw new Error(`expected ${pending.length} embeddings, got ${vectors.length}`);
            }
            const wrong = vectors.find((v) => v.length !== this.dimension);
            if (wrong) throw new Error(`dimension mismatch: got ${wrong.length}, expected ${this.dimension}`);

            embeddingRequests.inc({ provider: provider.name, status: 'success' });
            let next = 0;
            return texts.map((t) => {
                if (t.length === 0) return this.fallback(t);
                const vector = vectors[next++];
                return vector ? l2Normalize(vector) : this.fallback(t);
            });
        } catch (err) {
            embeddingRequests.inc({ provider: provider.name, status: 'error' });
            embeddingFallbacks.inc({ reason: 'provider_error' });
            logger.error(`[EmbeddingService] ${provider.name} embedding failed, using fallback vectors`, err);
            return texts.map((t) => this.fallback(t));
        } finally {
            timer();
        }
    }

    cosineSimilarity(a: number[], b: number[]): number {
        return cosineSimilarity(a, b);
    }

    euclideanDistance(a: number[], b: number[]): number {
        return euclideanDistance(a, b);
    }

    truncateForDisplay(vector: number[], maxElements = 20): string {
        return truncateForDisplay(vector, maxElements);
    }

    async healthCheck(): Promise<EmbeddingHealth> {
        const provider = this.active;
        if (!provider) {
            return { healthy: false, message: 'No embedding model available; deterministic fallback in use' };
        }
        try {
            const [vector] = await provider.embed(['health check']);
            if (vector?.length === this.dimension) {
                return { healthy: true, message: `${provider.name} embeddings operational` };
            }
            return { healthy: false, message: `${provider.name} returned dimension ${vector?.length ?? 0}, expected ${this.dimension}` };
        } catch (err) {
            const msg = errorMessage(err);
            if (msg.includes('429')) return { healthy: true, message: `${provider.name} is rate-limited (429) - reachable but throttled` };
            return { healthy: false, message: `${provider.name} health check failed: ${msg}` };
        }
    }

    getConfig(): EmbeddingConfig {
        return {
            provider: this.active?.name ?? 'fallback',
            model: this.active?.model ?? this.model,
            dimension: this.dimension,
            initialized: this.initialized
        };
    }
}
