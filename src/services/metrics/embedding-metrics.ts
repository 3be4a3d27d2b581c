import { Counter, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * Embedding metrics: provider calls, latency and fallbacks to the
 * deterministic vector.
 */

export const embeddingRequests = new Counter({
  name: 'kbase_embedding_requests_total',
  help: 'Total number of embedding requests',
  labelNames: ['provider', 'status'],
  registers: [register]
});

export const embeddingDuration = new Histogram({
  name: 'kbase_embedding_duration_seconds',
  help: 'Embedding generation duration in seconds',
  labelNames: ['provider'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register]
});

export const embeddingFallbacks = new Counter({
  name: 'kbase_embedding_fallbacks_total',
  help: 'Embeddings served by the deterministic fallback',
  labelNames: ['reason'],
  registers: [register]
});
