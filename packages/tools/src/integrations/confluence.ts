import type { ToolSpec } from '@toolgate/core';
import { HttpApiManager, type HttpClient } from '@toolgate/connections';
import { GuardedTool, descendingBy, listOutput, valueOutput, type ToolOperation } from '../guarded-tool.js';
import type { ToolProviderDescriptor } from '../registry.js';
import { atlassianClientOptions } from './jira.js';

export const CONFLUENCE_CATEGORY = 'external.confluence';
const CREDENTIALS = ['baseUrl', 'email', 'apiToken'] as const;
const SPACE_KEY = /^~?[A-Za-z0-9_]+$/;
const PAGE_ID = /^\d+$/;

// ── wire types ─────────────────────────────────────────────────────────

interface ConfluenceVersion {
  number?: number;
  when?: string;
}

interface ConfluenceContent {
  id: string;
  title?: string;
  type?: string;
  status?: string;
  space?: { key?: string };
  version?: ConfluenceVersion;
  body?: { storage?: { value?: string } };
  _links?: { webui?: string };
}

interface ConfluenceSpace {
  key: string;
  name?: string;
  type?: string;
  status?: string;
  description?: { plain?: { value?: string } };
  homepage?: { id?: string; title?: string };
  _links?: { webui?: string };
}

interface ResultPage<T> {
  results?: T[];
}

export interface PageSummary {
  id: string;
  title: string;
  space: string | null;
  version: number | null;
  lastModified: string | null;
  url: string | null;
}

export interface SpaceSummary {
  key: string;
  name: string;
  type: string | null;
  status: string | null;
}

// ── tool definitions ───────────────────────────────────────────────────

export const listSpacesSpec: ToolSpec = {
  name: 'confluence_list_spaces',
  description: 'List the Confluence spaces visible to the configured account, optionally only the given keys.',
  inputSchema: {
    type: 'object',
    properties: {
      space_keys: { type: 'array', items: { type: 'string' }, description: 'Space keys to keep; ["*"] for all' },
      limit: { type: 'integer', description: 'Maximum number of spaces' },
    },
  },
  limitParam: 'limit',
};

export const getSpaceSpec: ToolSpec = {
  name: 'confluence_get_space',
  description: 'Fetch one Confluence space by key (e.g. "OPS"), with its description and homepage.',
  inputSchema: {
    type: 'object',
    properties: {
      space_key: { type: 'string', description: 'Space key' },
    },
    required: ['space_key'],
  },
};

export const listPagesSpec: ToolSpec = {
  name: 'confluence_list_pages',
  description: 'List the pages of one Confluence space. Results are most recently modified first.',
  inputSchema: {
    type: 'object',
    properties: {
      space_key: { type: 'string', description: 'Space key' },
      limit: { type: 'integer', description: 'Maximum number of pages' },
    },
    required: ['space_key'],
  },
  limitParam: 'limit',
};

export const searchPagesSpec: ToolSpec = {
  name: 'confluence_search_pages',
  description: 'Search Confluence page titles and bodies for text, optionally within one space.',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'Text to search for' },
      space_key: { type: 'string', description: 'Only search this space' },
      limit: { type: 'integer', description: 'Maximum number of pages' },
    },
    required: ['query'],
  },
  limitParam: 'limit',
};

export const getPageSpec: ToolSpec = {
  name: 'confluence_get_page',
  description: 'Fetch one Confluence page by id, including its body as plain text.',
  inputSchema: {
    type: 'object',
    properties: {
      page_id: { type: 'string', description: 'Numeric page id' },
    },
    required: ['page_id'],
  },
};

// ── operations ─────────────────────────────────────────────────────────

const ENTITIES: Record<string, string> = { amp: '&', lt: '<', gt: '>', quot: '"', apos: "'", nbsp: ' ' };

/** Reduce Confluence storage format (XHTML) to plain text, one block per line. */
export function storageToText(storage: string): string {
  return storage
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|h[1-6]|li|tr|div|pre|blockquote)>/gi, '\n')
    .replace(/<[^>]*>/g, '')
    .replace(/&(amp|lt|gt|quot|apos|nbsp);/g, (_match, name: string) => ENTITIES[name] ?? '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/** Quote a value for a CQL string literal. */
function cqlString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function toPageSummary(page: ConfluenceContent): PageSummary {
  return {
    id: page.id,
    title: page.title ?? '',
    space: page.space?.key ?? null,
    version: page.version?.number ?? null,
    lastModified: page.version?.when ?? null,
    url: page._links?.webui ?? null,
  };
}

function toSpaceSummary(space: ConfluenceSpace): SpaceSummary {
  return {
    key: space.key,
    name: space.name ?? space.key,
    type: space.type ?? null,
    status: space.status ?? null,
  };
}

function readSpaceKeys(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const keys = value.filter((k): k is string => typeof k === 'string');
  return keys.includes('*') ? [] : keys;
}

const byLastModified = descendingBy((p: PageSummary) => p.lastModified ?? undefined);

const listSpaces: ToolOperation<HttpClient> = {
  spec: listSpacesSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, args, limit, signal }) {
    const wanted = readSpaceKeys(args['space_keys']);
    const page = await handle.get<ResultPage<ConfluenceSpace>>(
      'wiki/rest/api/space',
      { limit: wanted.length > 0 ? Math.max(limit, wanted.length) : limit },
      signal,
    );
    const spaces = (page.results ?? []).map(toSpaceSummary);
    return listOutput(wanted.length > 0 ? spaces.filter((s) => wanted.includes(s.key)) : spaces);
  },
};

const getSpace: ToolOperation<HttpClient> = {
  spec: getSpaceSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, args, signal }) {
    const key = String(args['space_key']).trim();
    if (!SPACE_KEY.test(key)) {
      return valueOutput(`"${key}" is not a Confluence space key`);
    }
    const space = await handle.get<ConfluenceSpace>(
      `wiki/rest/api/space/${encodeURIComponent(key)}`,
      { expand: ['description.plain', 'homepage'] },
      signal,
    );
    return valueOutput({
      ...toSpaceSummary(space),
      description: space.description?.plain?.value ?? '',
      homepage: space.homepage?.id ? { id: space.homepage.id, title: space.homepage.title ?? '' } : null,
      url: space._links?.webui ?? null,
    });
  },
};

const listPages: ToolOperation<HttpClient> = {
  spec: listPagesSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, args, limit, signal }) {
    const key = String(args['space_key']).trim();
    if (!SPACE_KEY.test(key)) {
      return valueOutput(`"${key}" is not a Confluence space key`);
    }
    const page = await handle.get<ResultPage<ConfluenceContent>>(
      `wiki/rest/api/space/${encodeURIComponent(key)}/content/page`,
      { limit, expand: ['version', 'space'] },
      signal,
    );
    return listOutput((page.results ?? []).map(toPageSummary), byLastModified);
  },
};

const searchPages: ToolOperation<HttpClient> = {
  spec: searchPagesSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, args, limit, signal }) {
    const clauses = ['type = page', `text ~ ${cqlString(String(args['query']))}`];
    const spaceArg = args['space_key'];
    const space = typeof spaceArg === 'string' ? spaceArg.trim() : '';
    if (space) clauses.push(`space = ${cqlString(space)}`);

    const page = await handle.get<ResultPage<ConfluenceContent>>(
      'wiki/rest/api/content/search',
      { cql: clauses.join(' AND '), limit, expand: ['version', 'space'] },
      signal,
    );
    // Relevance order from the search is kept.
    return listOutput((page.results ?? []).map(toPageSummary));
  },
};

const getPage: ToolOperation<HttpClient> = {
  spec: getPageSpec,
  requiredKeys: CREDENTIALS,
  async run({ handle, args, signal }) {
    const id = String(args['page_id']).trim();
    if (!PAGE_ID.test(id)) {
      return valueOutput(`"${id}" is not a Confluence page id (expected digits, e.g. 123456789)`);
    }
    const page = await handle.get<ConfluenceContent>(
      `wiki/rest/api/content/${id}`,
      { expand: ['body.storage', 'version', 'space'] },
      signal,
    );
    return valueOutput({
      ...toPageSummary(page),
      content: storageToText(page.body?.storage?.value ?? ''),
    });
  },
};

// ── descriptor ─────────────────────────────────────────────────────────

/** Space and page lookup in Confluence Cloud (`external.confluence`). */
export function confluenceTools(): ToolProviderDescriptor {
  const operations = [listSpaces, getSpace, listPages, searchPages, getPage];
  return {
    category: CONFLUENCE_CATEGORY,
    definitions: operations.map((op) => op.spec),
    defaultPolicy: { defaultLimit: 20, maxLimit: 100, timeoutMs: 15_000 },
    createTool({ config, logger, policies, resultCache }) {
      const manager = new HttpApiManager({
        config,
        logger,
        category: CONFLUENCE_CATEGORY,
        requiredKeys: CREDENTIALS,
        buildOptions: atlassianClientOptions,
      });
      return new GuardedTool({
        category: CONFLUENCE_CATEGORY,
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
