import type http from 'node:http';
import { createHttpApp } from '../../src/http/http-server.js';
import { createServer } from '../../src/server.js';
import { createKnowledgeBase } from '../../src/services/knowledge/index.js';
import { InMemoryKnowledgeStore } from '../utils/in-memory-store.js';
import { fallbackEmbeddings } from '../utils/fixtures.js';

describe('HTTP transport', () => {
  let store: InMemoryKnowledgeStore;
  let server: http.Server;
  let baseUrl: string;

  beforeEach(async () => {
    store = new InMemoryKnowledgeStore();
    const embeddings = fallbackEmbeddings();
    const kb = createKnowledgeBase(store, embeddings);
    const app = createHttpApp(() => createServer(kb), { store, embeddings });
    server = await new Promise<http.Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  test('health is degraded while embeddings run on the fallback', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({
      status: 'degraded',
      transport: 'http',
      dependencies: { qdrant: 'healthy', embedding: 'unhealthy' },
      details: { provider: 'fallback', model: 'test-model', dimension: 384 }
    });
  });

  test('health is unhealthy with 503 when the store is down', async () => {
    store.checkHealth = async () => false;
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: 'unhealthy', dependencies: { qdrant: 'unhealthy' } });
  });

  test('unknown routes are a JSON 404', async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  test('MCP requests outside a session are rejected', async () => {
    const res = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', accept: 'application/json, text/event-stream' },
      body: JSON.stringify({ jsonrpc: '2.0', id: 7, method: 'tools/list' })
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Bad Request: Mcp-Session-Id header is required' },
      id: 7
    });
  });

  test('unknown sessions cannot be deleted', async () => {
    const res = await fetch(`${baseUrl}/mcp`, { method: 'DELETE', headers: { 'mcp-session-id': 'ghost' } });
    expect(res.status).toBe(404);
  });
});
