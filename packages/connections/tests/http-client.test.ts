import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Logger } from '@toolgate/core';
import { StaticConfigProvider, getString } from '@toolgate/core';
import { HttpApiManager, HttpClient, HttpStatusError } from '../src/index.js';

const mockFetch = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function lastRequest(): { url: string; init: RequestInit | undefined } {
  const call = mockFetch.mock.calls.at(-1);
  if (!call) throw new Error('fetch was not called');
  return { url: String(call[0]), init: call[1] };
}

describe('HttpClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds URLs from the base URL, path and query', () => {
    const client = new HttpClient({ baseUrl: 'https://api.example.test/v2/' });
    const url = client.buildUrl('/logs/search', {
      limit: 25,
      tags: ['env:prod', 'team:core'],
      verbose: true,
      cursor: undefined,
    });
    expect(url.toString()).toBe(
      'https://api.example.test/v2/logs/search?limit=25&tags=env%3Aprod%2Cteam%3Acore&verbose=true',
    );
  });

  it('sends GET requests with the configured headers', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ items: [1, 2] }));
    const client = new HttpClient({ baseUrl: 'https://api.example.test', headers: { 'X-Api-Key': 'test-secret' } });

    const body = await client.get<{ items: number[] }>('items', { page: 2 });

    expect(body).toEqual({ items: [1, 2] });
    const { url, init } = lastRequest();
    expect(url).toBe('https://api.example.test/items?page=2');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ Accept: 'application/json', 'X-Api-Key': 'test-secret' });
    expect(init?.body).toBeUndefined();
  });

  it('serializes POST bodies as JSON', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ ok: true }));
    const client = new HttpClient({ baseUrl: 'https://api.example.test' });

    await client.post('search', { query: 'status:error' });

    const { init } = lastRequest();
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"query":"status:error"}');
    expect(init?.headers).toEqual({ Accept: 'application/json', 'Content-Type': 'application/json' });
  });

  it('passes the abort signal through', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}));
    const controller = new AbortController();
    const client = new HttpClient({ baseUrl: 'https://api.example.test' });

    await client.get('ping', undefined, controller.signal);

    expect(lastRequest().init?.signal).toBe(controller.signal);
  });

  it('throws HttpStatusError for non-2xx responses', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('rate limited', { status: 429, statusText: 'Too Many Requests' }),
    );
    const client = new HttpClient({ baseUrl: 'https://api.example.test' });

    const err = await client.get('items').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpStatusError);
    expect(err instanceof HttpStatusError && err.status).toBe(429);
    expect(err instanceof HttpStatusError && err.message).toBe('HTTP 429 Too Many Requests: rate limited');
  });

  it('truncates long error bodies', async () => {
    mockFetch.mockResolvedValueOnce(new Response('x'.repeat(2000), { status: 500, statusText: 'Server Error' }));
    const client = new HttpClient({ baseUrl: 'https://api.example.test' });

    const err = await client.get('items').catch((e: unknown) => e);

    expect(err instanceof HttpStatusError && err.body.length).toBe(500);
  });
});

describe('HttpApiManager', () => {
  function createLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  }

  function createManager(settings: Record<string, unknown>) {
    return new HttpApiManager({
      config: new StaticConfigProvider(settings),
      logger: createLogger(),
      category: 'external.example',
      requiredKeys: ['baseUrl', 'token'],
      buildOptions: (config) => ({
        baseUrl: getString(config, 'baseUrl') ?? '',
        headers: { Authorization: `Bearer ${getString(config, 'token') ?? ''}` },
      }),
    });
  }

  it('builds one client from the category configuration', async () => {
    const manager = createManager({
      external: { example: { baseUrl: 'https://api.example.test/', token: 'test-secret' } },
    });

    const client = await manager.getClient();

    expect(client.baseUrl).toBe('https://api.example.test');
    expect(await manager.getClient()).toBe(client);
  });

  it('names every missing credential', async () => {
    const manager = createManager({ external: { example: { enabled: true } } });
    await expect(manager.getClient()).rejects.toThrow(
      'Missing required configuration for "external.example": baseUrl, token',
    );
  });
});
