/**
 * Metrics for the knowledge base.
 *
 * Every collector registers itself on the shared registry:
 * - MCP tool metrics (mcp-metrics.ts)
 * - Embedding metrics (embedding-metrics.ts)
 * - Search metrics (search-metrics.ts)
 * - Qdrant metrics (qdrant-metrics.ts)
 */

export { register } from './registry.js';
export * from './mcp-metrics.js';
export * from './embedding-metrics.js';
export * from './search-metrics.js';
export * from './qdrant-metrics.js';
