import { Counter, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * Qdrant metrics: operations, latency and reconnects.
 */

export const qdrantOperations = new Counter({
  name: 'kbase_qdrant_operations_total',
  help: 'Total number of Qdrant operations',
  labelNames: ['operation', 'status'],
  registers: [register]
});

export const qdrantOperationDuration = new Histogram({
  name: 'kbase_qdrant_operation_duration_seconds',
  help: 'Qdrant operation duration in seconds',
  labelNames: ['operation'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register]
});

export const qdrantReconnects = new Counter({
  name: 'kbase_qdrant_reconnect_total',
  help: 'Total number of Qdrant reconnection attempts',
  registers: [register]
});
