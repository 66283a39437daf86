import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Logger } from '@toolgate/core';
import { StaticConfigProvider } from '@toolgate/core';
import { ToolRegistry } from '@toolgate/tools';
import { knowledgeTools } from '../src/knowledge-tool.js';

const mockFetch = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function point(id: string, score: number) {
  return { id, score, payload: { page_content: `passage ${id}`, metadata: { source: 'wiki' } } };
}

const SETTINGS = {
  knowledge: { enabled: true, maxLimit: 10 },
  embedding: { provider: 'ollama', ollama: { baseUrl: 'http://ollama.test:11434' } },
  vector: { provider: 'qdrant', qdrant: { url: 'http://qdrant.test:6333', collection: 'runbooks' } },
};

function buildRegistry(settings: Record<string, unknown> = SETTINGS) {
  return ToolRegistry.build([knowledgeTools()], { config: new StaticConfigProvider(settings), logger: createLogger() });
}

/** Route embedding and search requests to canned responses. */
function serve(points: ReturnType<typeof point>[]) {
  mockFetch.mockImplementation(async (input) => {
    const url = String(input);
    if (url.endsWith('/api/embed')) return jsonResponse({ embeddings: [[0.1, 0.2]] });
    if (url.endsWith('/points/search')) return jsonResponse({ result: points });
    return new Response('not found', { status: 404, statusText: 'Not Found' });
  });
}

function searchBody(): unknown {
  const call = mockFetch.mock.calls.find((c) => String(c[0]).endsWith('/points/search'));
  return JSON.parse(String(call?.[1]?.body));
}

describe('knowledge_search', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('is listed when the knowledge category is enabled', () => {
    expect(buildRegistry().getCatalog().map((t) => t.name)).toEqual(['knowledge_search']);
  });

  it('embeds the query and returns passages best match first', async () => {
    serve([point('a', 0.4), point('b', 0.9), point('c', 0.7)]);

    const result = await buildRegistry().invoke('knowledge_search', { query: 'restart the pod', limit: 50 });

    expect(result.status).toBe('succeeded');
    expect(result.payload).toEqual([
      { id: 'b', score: 0.9, content: 'passage b', metadata: { source: 'wiki' } },
      { id: 'c', score: 0.7, content: 'passage c', metadata: { source: 'wiki' } },
      { id: 'a', score: 0.4, content: 'passage a', metadata: { source: 'wiki' } },
    ]);
    expect(searchBody()).toEqual({ vector: [0.1, 0.2], limit: 10, with_payload: true });
  });

  it('truncates to the default limit, keeping the highest scores', async () => {
    serve([0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7].map((score, i) => point(`p${i}`, score)));

    const result = await buildRegistry().invoke('knowledge_search', { query: 'disk pressure' });

    expect(result.status).toBe('truncated');
    if (result.status !== 'truncated') return;
    expect(result.droppedCount).toBe(2);
    expect(result.payload).toMatchObject([{ id: 'p6' }, { id: 'p5' }, { id: 'p4' }, { id: 'p3' }, { id: 'p2' }]);
  });

  it('drops passages under minScore', async () => {
    serve([point('a', 0.4), point('b', 0.9)]);
    const registry = buildRegistry({ ...SETTINGS, knowledge: { enabled: true, minScore: 0.5 } });

    const result = await registry.invoke('knowledge_search', { query: 'deploy' });

    expect(result.payload).toMatchObject([{ id: 'b' }]);
  });

  it('answers a blank query without calling any backend', async () => {
    const result = await buildRegistry().invoke('knowledge_search', { query: '   ' });

    expect(result).toEqual({ status: 'succeeded', payload: 'Provide a non-empty query.', durationMs: expect.any(Number) });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('reports a missing embedding credential as ConfigurationError without network calls', async () => {
    const registry = buildRegistry({ ...SETTINGS, embedding: { provider: 'openai', openai: { apiKey: '' } } });

    const result = await registry.invoke('knowledge_search', { query: 'deploy' });

    expect(result.status === 'failed' && result.error).toEqual({
      kind: 'ConfigurationError',
      message: 'Tool "knowledge_search" is not configured: missing apiKey',
    });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('reports an unknown vector store as ConfigurationError', async () => {
    const registry = buildRegistry({ ...SETTINGS, vector: { provider: 'faiss' } });

    const result = await registry.invoke('knowledge_search', { query: 'deploy' });

    expect(result.status === 'failed' && result.error).toEqual({
      kind: 'ConfigurationError',
      message: 'Tool "knowledge_search" is not configured correctly',
    });
  });

  it('contains an embedding service failure', async () => {
    mockFetch.mockResolvedValue(new Response('overloaded', { status: 503, statusText: 'Service Unavailable' }));

    const result = await buildRegistry().invoke('knowledge_search', { query: 'deploy' });

    expect(result.status === 'failed' && result.error).toEqual({
      kind: 'UpstreamError',
      message: 'Upstream request failed (HTTP 503)',
    });
  });
});
