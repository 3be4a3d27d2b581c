// Global Jest setup: runs before any test file imports config.
// Unit tests never reach Qdrant or an embedding server, and keep stdout quiet.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
process.env.TRANSPORT_TYPE = 'stdio';
process.env.EMBEDDING_PROVIDER = 'fallback';
if (!process.env.QDRANT_URL) process.env.QDRANT_URL = 'http://127.0.0.1:6333';

export {};
