import type { ResolvedConfig, ToolSpec } from '@toolgate/core';
import { getString } from '@toolgate/core';
import { HttpApiManager, type HttpClient, type HttpClientOptions } from '@toolgate/connections';
import { GuardedTool, descendingBy, listOutput, valueOutput, type ToolOperation } from '../guarded-tool.js';
import type { ToolProviderDescriptor } from '../registry.js';

export const GITHUB_CATEGORY = 'external.github';
const DEFAULT_BASE_URL = 'https://api.github.com';
const CREDENTIALS = ['token'] as const;
const REPOSITORY = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

interface GitHubIssue {
  number: number;
  title: string;
  state: string;
  html_url: string;
  updated_at?: string;
  user?: { login?: string } | null;
  repository_url?: string;
  pull_request?: unknown;
}

interface GitHubSearchResponse {
  total_count?: number;
  items?: GitHubIssue[];
}

interface GitHubPullRequest {
  number: number;
  title: string;
  state: string;
  html_url: string;
  draft?: boolean;
  updated_at?: string;
  user?: { login?: string } | null;
  head?: { ref?: string };
  base?: { ref?: string };
}

export interface IssueItem {
  number: number;
  title: string;
  state: string;
  kind: 'issue' | 'pull_request';
  repository: string | null;
  author: string | null;
  updatedAt: string | null;
  url: string;
}

export const searchIssuesSpec: ToolSpec = {
  name: 'github_search_issues',
  description:
    'Search GitHub issues and pull requests using GitHub search syntax, e.g. "repo:org/api is:open label:bug". ' +
    'Results are most recently updated first.',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'GitHub search query' },
      limit: { type: 'integer', description: 'Maximum number of results' },
    },
    required: ['query'],
  },
  limitParam: 'limit',
};

export const listPullRequestsSpec: ToolSpec = {
  name: 'github_list_pull_requests',
  description: 'List pull requests of one repository ("owner/name"), most recently updated first.',
  inputSchema: {
    type: 'object',
    properties: {
      repository: { type: 'string', description: 'Repository as "owner/name"' },
      state: { type: 'string', enum: ['open', 'closed', 'all'], description: 'Pull request state (default open)' },
      limit: { type: 'integer', description: 'Maximum number of pull requests' },
    },
    required: ['repository'],
  },
  limitParam: 'limit',
};

function repositoryFromUrl(url: string | undefined): string | null {
  const match = url?.match(/\/repos\/([^/]+\/[^/]+)$/);
  return match?.[1] ?? null;
}

const searchIssues: ToolOperation<HttpClient> = {
  spec: searchIssuesSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, args, limit, signal }) {
    const response = await handle.get<GitHubSearchResponse>(
      'search/issues',
      { q: String(args['query']), sort: 'updated', order: 'desc', per_page: limit },
      signal,
    );
    const items = (response.items ?? []).map(
      (item): IssueItem => ({
        number: item.number,
        title: item.title,
        state: item.state,
        kind: item.pull_request === undefined ? 'issue' : 'pull_request',
        repository: repositoryFromUrl(item.repository_url),
        author: item.user?.login ?? null,
        updatedAt: item.updated_at ?? null,
        url: item.html_url,
      }),
    );
    return listOutput(items, descendingBy((i: IssueItem) => i.updatedAt ?? undefined));
  },
};

const listPullRequests: ToolOperation<HttpClient> = {
  spec: listPullRequestsSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, args, limit, signal }) {
    const repository = String(args['repository']).trim();
    if (!REPOSITORY.test(repository)) {
      return valueOutput(`"${repository}" is not a repository name (expected "owner/name")`);
    }
    const state = typeof args['state'] === 'string' ? args['state'] : 'open';
    const pulls = await handle.get<GitHubPullRequest[]>(
      `repos/${repository}/pulls`,
      { state, sort: 'updated', direction: 'desc', per_page: limit },
      signal,
    );
    const items = pulls.map((pr) => ({
      number: pr.number,
      title: pr.title,
      state: pr.state,
      draft: pr.draft ?? false,
      author: pr.user?.login ?? null,
      head: pr.head?.ref ?? null,
      base: pr.base?.ref ?? null,
      updatedAt: pr.updated_at ?? null,
      url: pr.html_url,
    }));
    return listOutput(items, descendingBy((pr: { updatedAt: string | null }) => pr.updatedAt ?? undefined));
  },
};

function clientOptions(config: ResolvedConfig): HttpClientOptions {
  return {
    baseUrl: getString(config, 'baseUrl') ?? DEFAULT_BASE_URL,
    headers: {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${getString(config, 'token') ?? ''}`,
      'X-GitHub-Api-Version': '2022-11-28',
    },
  };
}

/** Issue and pull request search on GitHub (`external.github`). */
export function githubTools(): ToolProviderDescriptor {
  const operations = [searchIssues, listPullRequests];
  return {
    category: GITHUB_CATEGORY,
    definitions: operations.map((op) => op.spec),
    defaultPolicy: { defaultLimit: 20, maxLimit: 100, timeoutMs: 10_000 },
    createTool({ config, logger, policies, resultCache }) {
      const manager = new HttpApiManager({
        config,
        logger,
        category: GITHUB_CATEGORY,
        requiredKeys: CREDENTIALS,
        buildOptions: clientOptions,
      });
      return new GuardedTool({
        category: GITHUB_CATEGORY,
        config,
        logger,
        operations,
        policies,
        resultCache,
        connect: () => manager.getClient(),
        close: () => manager.closeAll(),
      });
    },
  };
}
