import type { ResolvedConfig, ToolSpec } from '@toolgate/core';
import { getString, isRecord } from '@toolgate/core';
import { HttpApiManager, type HttpClient, type HttpClientOptions } from '@toolgate/connections';
import { GuardedTool, descendingBy, listOutput, valueOutput, type ToolOperation } from '../guarded-tool.js';
import type { ToolProviderDescriptor } from '../registry.js';

export const JIRA_CATEGORY = 'external.jira';
const CREDENTIALS = ['baseUrl', 'email', 'apiToken'] as const;
const ISSUE_FIELDS = ['summary', 'status', 'assignee', 'reporter', 'priority', 'issuetype', 'updated', 'created', 'labels'];
const ISSUE_KEY = /^[A-Z][A-Z0-9_]+-\d+$/;

// ── wire types ─────────────────────────────────────────────────────────

interface JiraUser {
  displayName?: string;
}

interface JiraIssue {
  key: string;
  fields?: {
    summary?: string;
    status?: { name?: string };
    assignee?: JiraUser | null;
    reporter?: JiraUser | null;
    priority?: { name?: string } | null;
    issuetype?: { name?: string };
    updated?: string;
    created?: string;
    labels?: string[];
    description?: unknown;
  };
}

interface JiraSearchResponse {
  issues?: JiraIssue[];
}

interface JiraProject {
  key: string;
  name?: string;
  projectTypeKey?: string;
}

interface JiraProjectPage {
  values?: JiraProject[];
}

export interface IssueSummary {
  key: string;
  summary: string;
  status: string | null;
  assignee: string | null;
  priority: string | null;
  type: string | null;
  updated: string | null;
}

// ── tool definitions ───────────────────────────────────────────────────

export const searchIssuesSpec: ToolSpec = {
  name: 'jira_search_issues',
  description:
    'Search Jira issues with JQL, e.g. \'project = OPS AND status != Done\'. Results are most recently updated first.',
  inputSchema: {
    type: 'object',
    properties: {
      jql: { type: 'string', description: 'JQL query' },
      limit: { type: 'integer', description: 'Maximum number of issues' },
    },
    required: ['jql'],
  },
  limitParam: 'limit',
};

export const getIssueSpec: ToolSpec = {
  name: 'jira_get_issue',
  description: 'Fetch one Jira issue by key (e.g. "OPS-123"), including its description.',
  inputSchema: {
    type: 'object',
    properties: {
      issue_key: { type: 'string', description: 'Issue key' },
    },
    required: ['issue_key'],
  },
};

export const listProjectsSpec: ToolSpec = {
  name: 'jira_list_projects',
  description: 'List the Jira projects visible to the configured account.',
  inputSchema: {
    type: 'object',
    properties: {
      limit: { type: 'integer', description: 'Maximum number of projects' },
    },
  },
  limitParam: 'limit',
};

// ── operations ─────────────────────────────────────────────────────────

/** Flatten an Atlassian document (rich-text description) to plain text. */
export function documentToText(node: unknown): string {
  if (typeof node === 'string') return node;
  if (!isRecord(node)) return '';
  if (node['type'] === 'text' && typeof node['text'] === 'string') return node['text'];
  const content = node['content'];
  if (!Array.isArray(content)) return '';
  const separator = node['type'] === 'doc' ? '\n' : '';
  return content.map(documentToText).join(separator);
}

function toIssueSummary(issue: JiraIssue): IssueSummary {
  const fields = issue.fields ?? {};
  return {
    key: issue.key,
    summary: fields.summary ?? '',
    status: fields.status?.name ?? null,
    assignee: fields.assignee?.displayName ?? null,
    priority: fields.priority?.name ?? null,
    type: fields.issuetype?.name ?? null,
    updated: fields.updated ?? null,
  };
}

const searchIssues: ToolOperation<HttpClient> = {
  spec: searchIssuesSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, args, limit, signal }) {
    const response = await handle.get<JiraSearchResponse>(
      'rest/api/3/search/jql',
      { jql: String(args['jql']), maxResults: limit, fields: ISSUE_FIELDS },
      signal,
    );
    const issues = (response.issues ?? []).map(toIssueSummary);
    return listOutput(issues, descendingBy((i: IssueSummary) => i.updated ?? undefined));
  },
};

const getIssue: ToolOperation<HttpClient> = {
  spec: getIssueSpec,
  requiredKeys: CREDENTIALS,
  async run({ handle, args, signal }) {
    const key = String(args['issue_key']).trim().toUpperCase();
    if (!ISSUE_KEY.test(key)) {
      return valueOutput(`"${key}" is not a Jira issue key (expected e.g. OPS-123)`);
    }
    const issue = await handle.get<JiraIssue>(
      `rest/api/3/issue/${encodeURIComponent(key)}`,
      { fields: [...ISSUE_FIELDS, 'description'] },
      signal,
    );
    return valueOutput({
      ...toIssueSummary(issue),
      reporter: issue.fields?.reporter?.displayName ?? null,
      created: issue.fields?.created ?? null,
      labels: issue.fields?.labels ?? [],
      description: documentToText(issue.fields?.description),
    });
  },
};

const listProjects: ToolOperation<HttpClient> = {
  spec: listProjectsSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, limit, signal }) {
    const page = await handle.get<JiraProjectPage>('rest/api/3/project/search', { maxResults: limit }, signal);
    const projects = (page.values ?? []).map((p) => ({
      key: p.key,
      name: p.name ?? p.key,
      type: p.projectTypeKey ?? null,
    }));
    return listOutput(projects);
  },
};

// ── descriptor ─────────────────────────────────────────────────────────

/** Basic auth with an account email and API token, shared by the Atlassian Cloud integrations. */
export function atlassianClientOptions(config: ResolvedConfig): HttpClientOptions {
  const credentials = `${getString(config, 'email') ?? ''}:${getString(config, 'apiToken') ?? ''}`;
  return {
    baseUrl: getString(config, 'baseUrl') ?? '',
    headers: { Authorization: `Basic ${Buffer.from(credentials).toString('base64')}` },
  };
}

/** Issue search and lookup in Jira Cloud (`external.jira`). */
export function jiraTools(): ToolProviderDescriptor {
  const operations = [searchIssues, getIssue, listProjects];
  return {
    category: JIRA_CATEGORY,
    definitions: operations.map((op) => op.spec),
    defaultPolicy: { defaultLimit: 20, maxLimit: 100, timeoutMs: 15_000 },
    createTool({ config, logger, policies, resultCache }) {
      const manager = new HttpApiManager({
        config,
        logger,
        category: JIRA_CATEGORY,
        requiredKeys: CREDENTIALS,
        buildOptions: atlassianClientOptions,
      });
      return new GuardedTool({
        category: JIRA_CATEGORY,
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
