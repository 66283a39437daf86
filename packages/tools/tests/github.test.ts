import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Logger } from '@toolgate/core';
import { StaticConfigProvider } from '@toolgate/core';
import { ToolRegistry } from '../src/registry.js';
import { githubTools } from '../src/integrations/github.js';

const mockFetch = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function buildRegistry(github: Record<string, unknown>) {
  return ToolRegistry.build([githubTools()], {
    config: new StaticConfigProvider({ external: { github } }),
    logger: createLogger(),
  });
}

describe('github tools', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('searches issues against the public API by default', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        total_count: 1,
        items: [
          {
            number: 12,
            title: 'Crash on start',
            state: 'open',
            html_url: 'https://github.com/acme/api/issues/12',
            updated_at: '2026-03-01T10:00:00Z',
            user: { login: 'octo' },
            repository_url: 'https://api.github.com/repos/acme/api',
          },
        ],
      }),
    );

    const result = await buildRegistry({ enabled: true, token: 'test-secret' }).invoke('github_search_issues', {
      query: 'repo:acme/api crash',
    });

    const call = mockFetch.mock.calls[0];
    const url = call?.[0];
    const init = call?.[1];
    expect(String(url)).toBe(
      'https://api.github.com/search/issues?q=repo%3Aacme%2Fapi+crash&sort=updated&order=desc&per_page=20',
    );
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret', Accept: 'application/vnd.github+json' });
    expect(result.payload).toEqual([
      {
        number: 12,
        title: 'Crash on start',
        state: 'open',
        kind: 'issue',
        repository: 'acme/api',
        author: 'octo',
        updatedAt: '2026-03-01T10:00:00Z',
        url: 'https://github.com/acme/api/issues/12',
      },
    ]);
  });

  it('lists pull requests of an enterprise host', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([]));

    const result = await buildRegistry({
      enabled: true,
      token: 'test-secret',
      baseUrl: 'https://git.example.test/api/v3',
    }).invoke('github_list_pull_requests', { repository: 'acme/api', state: 'closed', limit: 3 });

    expect(String(mockFetch.mock.calls[0]?.[0])).toBe(
      'https://git.example.test/api/v3/repos/acme/api/pulls?state=closed&sort=updated&direction=desc&per_page=3',
    );
    expect(result).toMatchObject({ status: 'succeeded', payload: [] });
  });

  it('rejects an unknown pull request state', async () => {
    const result = await buildRegistry({ enabled: true, token: 'test-secret' }).invoke('github_list_pull_requests', {
      repository: 'acme/api',
      state: 'merged',
    });

    expect(result.status === 'failed' && result.error.kind).toBe('ValidationError');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('requires a token', async () => {
    const result = await buildRegistry({ enabled: true }).invoke('github_search_issues', { query: 'bug' });

    expect(result.status === 'failed' && result.error.kind).toBe('ConfigurationError');
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
