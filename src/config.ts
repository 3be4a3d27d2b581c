/**
 * Centralized configuration for environment variables.
 * This file contains all environment variable parsing logic.
 */

import os from 'os';

export function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

export function getEnvInt(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function getEnvFloat(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  const parsed = parseFloat(val);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  return val !== 'false' && val !== '0';
}

export type TransportType = 'stdio' | 'http';
export type LogFormat = 'text' | 'json';

// Logging and transport
export const LOG_LEVEL = getEnvString('LOG_LEVEL', 'info');
export const LOG_FORMAT: LogFormat = getEnvString('LOG_FORMAT', 'text') === 'json' ? 'json' : 'text';
export const NODE_ENV = getEnvString('NODE_ENV', '');

export function getTransportType(): TransportType {
  return getEnvString('TRANSPORT_TYPE', 'stdio') === 'http' ? 'http' : 'stdio';
}

export const PORT = getEnvInt('PORT', 3300);
export const MCP_SERVER_NAME = getEnvString('MCP_SERVER_NAME', 'knowledge-base');
export const INSTANCE_ID = getEnvString('INSTANCE_ID', os.hostname() || 'unknown');

// Qdrant
export const QDRANT_API_KEY = getEnvString('QDRANT_API_KEY', '');
export const KB_COLLECTION_PREFIX = getEnvString('KB_COLLECTION_PREFIX', 'kb');

export function getQdrantUrl(defaultValue = 'http://localhost:6333'): string {
  return getEnvString('QDRANT_URL', defaultValue);
}

// Embeddings
export const EMBEDDING_PROVIDER = getEnvString('EMBEDDING_PROVIDER', 'auto');
export const EMBEDDING_MODEL = getEnvString('EMBEDDING_MODEL', 'sentence-transformers/all-MiniLM-L6-v2');
export const TEI_BASE_URL = getEnvString('TEI_BASE_URL', '');
export const TEI_API_KEY = getEnvString('TEI_API_KEY', '');
export const OPENAI_API_KEY = getEnvString('OPENAI_API_KEY', '');
export const OPENAI_EMBEDDING_MODEL = getEnvString('OPENAI_EMBEDDING_MODEL', 'text-embedding-3-small');

export function getEmbeddingDimension(defaultValue = 384): number {
  return getEnvInt('EMBEDDING_DIMENSION', defaultValue);
}

// Search
export const SEARCH_DEFAULT_LIMIT = getEnvInt('SEARCH_DEFAULT_LIMIT', 10);
export const VECTOR_MIN_SCORE = getEnvFloat('VECTOR_MIN_SCORE', 0.5);
export const LEXICAL_MIN_SCORE = getEnvFloat('LEXICAL_MIN_SCORE', 0.3);
