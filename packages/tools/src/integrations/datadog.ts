import type { ResolvedConfig, ToolSpec } from '@toolgate/core';
import { getString } from '@toolgate/core';
import { HttpApiManager, type HttpClient, type HttpClientOptions } from '@toolgate/connections';
import {
  GuardedTool,
  descendingBy,
  listOutput,
  type ToolOperation,
} from '../guarded-tool.js';
import { UpstreamError } from '../errors.js';
import type { ToolProviderDescriptor } from '../registry.js';

export const DATADOG_CATEGORY = 'external.datadog';
const DEFAULT_SITE = 'datadoghq.com';
const CREDENTIALS = ['apiKey', 'appKey'] as const;

const ERROR_TERMS = new Set([
  'error',
  'errors',
  'exception',
  'exceptions',
  'failure',
  'failures',
  'failed',
  'fail',
  'crash',
  'crashed',
  'critical',
]);

const STATUS_QUERIES = new Set(['status:error', 'status:warn', 'status:critical']);
const ERROR_EXPANSION =
  '(status:error OR status:warn OR content:*error* OR content:*exception* OR content:*fail*)';

/**
 * Widen plain error searches so they match log content, service, host and
 * status instead of one field. Queries using other Datadog syntax pass
 * through unchanged.
 */
export function expandErrorQuery(query: string): string {
  const normalized = query.trim().toLowerCase();
  const words = normalized.split(/\s+/);
  const hasErrorTerm = words.some((w) => ERROR_TERMS.has(w));

  if (STATUS_QUERIES.has(normalized)) {
    return ERROR_EXPANSION;
  }
  if (hasErrorTerm && !query.includes(':')) {
    return `(content:*${normalized}* OR service:*${normalized}* OR host:*${normalized}* OR status:error OR status:warn)`;
  }
  if (hasErrorTerm && (normalized.includes('service:') || normalized.includes('host:'))) {
    const filters = query.trim().split(/\s+/).filter((part) => part.includes(':'));
    return `${filters.join(' ')} ${ERROR_EXPANSION}`;
  }
  return query;
}

// ── wire types ─────────────────────────────────────────────────────────

interface LogEvent {
  id?: string;
  attributes?: {
    timestamp?: string;
    message?: string;
    service?: string;
    status?: string;
    host?: string;
    tags?: string[];
  };
}

interface LogSearchResponse {
  data?: LogEvent[];
}

interface MetricSeries {
  metric?: string;
  scope?: string;
  display_name?: string;
  unit?: Array<{ name?: string } | null>;
  pointlist?: Array<[number, number | null]>;
}

interface MetricQueryResponse {
  status?: string;
  error?: string;
  series?: MetricSeries[];
}

interface Monitor {
  id?: number;
  name?: string;
  type?: string;
  overall_state?: string;
  query?: string;
  message?: string;
  tags?: string[];
  modified?: string;
}

export interface LogEntry {
  id: string | null;
  timestamp: string | null;
  message: string | null;
  service: string | null;
  status: string | null;
  host: string | null;
  tags: string[];
}

export interface MonitorSummary {
  id: number | null;
  name: string;
  type: string | null;
  overallState: string | null;
  query: string | null;
  tags: string[];
}

// ── tool definitions ───────────────────────────────────────────────────

export const searchLogsSpec: ToolSpec = {
  name: 'datadog_search_logs',
  description:
    'Search Datadog logs for errors, exceptions and application events. ' +
    'Plain terms such as "error" or "exception" are searched across message, service, host and status. ' +
    'Datadog syntax is also accepted, e.g. "service:api status:error". Results are newest first.',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'Log search query' },
      limit: { type: 'integer', description: 'Maximum number of log entries' },
      time_from: { type: 'string', description: 'Start of the window, e.g. "now-1h" or an ISO timestamp' },
      time_to: { type: 'string', description: 'End of the window, e.g. "now" or an ISO timestamp' },
    },
    required: ['query'],
  },
  limitParam: 'limit',
};

export const queryMetricsSpec: ToolSpec = {
  name: 'datadog_query_metrics',
  description:
    'Query Datadog metric time series, e.g. "avg:system.cpu.user{service:api}". ' +
    'Timestamps are UNIX seconds; the window defaults to the last hour.',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'Metric query' },
      from_ts: { type: 'integer', description: 'Start of the window (UNIX seconds)' },
      to_ts: { type: 'integer', description: 'End of the window (UNIX seconds)' },
      limit: { type: 'integer', description: 'Maximum number of series' },
    },
    required: ['query'],
  },
  limitParam: 'limit',
};

export const listMonitorsSpec: ToolSpec = {
  name: 'datadog_list_monitors',
  description: 'List Datadog monitors and their current state, optionally filtered by name or tags.',
  inputSchema: {
    type: 'object',
    properties: {
      name_query: { type: 'string', description: 'Case-insensitive substring of the monitor name' },
      tags: { type: 'array', items: { type: 'string' }, description: 'Monitor tags, e.g. ["team:core"]' },
      limit: { type: 'integer', description: 'Maximum number of monitors' },
    },
  },
  limitParam: 'limit',
};

// ── operations ─────────────────────────────────────────────────────────

function optionalString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function optionalInteger(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

function toLogEntry(event: LogEvent): LogEntry {
  const attrs = event.attributes ?? {};
  return {
    id: event.id ?? null,
    timestamp: attrs.timestamp ?? null,
    message: attrs.message ?? null,
    service: attrs.service ?? null,
    status: attrs.status ?? null,
    host: attrs.host ?? null,
    tags: attrs.tags ?? [],
  };
}

const searchLogs: ToolOperation<HttpClient> = {
  spec: searchLogsSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, args, limit, signal }) {
    const query = expandErrorQuery(optionalString(args, 'query') ?? '*');
    const response = await handle.post<LogSearchResponse>(
      'api/v2/logs/events/search',
      {
        filter: {
          query,
          from: optionalString(args, 'time_from') ?? 'now-15m',
          to: optionalString(args, 'time_to') ?? 'now',
        },
        sort: '-timestamp',
        page: { limit },
      },
      signal,
    );
    const entries = (response.data ?? []).filter((e) => e.attributes).map(toLogEntry);
    return listOutput(entries, descendingBy((e: LogEntry) => e.timestamp ?? undefined));
  },
};

const queryMetrics: ToolOperation<HttpClient> = {
  spec: queryMetricsSpec,
  requiredKeys: CREDENTIALS,
  cacheable: true,
  async run({ handle, args, signal }) {
    const now = Math.floor(Date.now() / 1000);
    const response = await handle.get<MetricQueryResponse>(
      'api/v1/query',
      {
        query: optionalString(args, 'query'),
        from: optionalInteger(args, 'from_ts') ?? now - 3600,
        to: optionalInteger(args, 'to_ts') ?? now,
      },
      signal,
    );
    if (response.status === 'error') {
      throw new UpstreamError(`Metric query rejected: ${response.error ?? 'unknown error'}`);
    }
    const series = (response.series ?? []).map((s) => ({
      metric: s.metric ?? null,
      scope: s.scope ?? null,
      displayName: s.display_name ?? null,
      unit: s.unit?.[0]?.name ?? null,
      points: (s.pointlist ?? []).map(([timestamp, value]) => ({ timestamp, value })),
    }));
    return listOutput(series);
  },
};

const listMonitors: ToolOperation<HttpClient> = {
  spec: listMonitorsSpec,
  requiredKeys: CREDENTIALS,
  async run({ handle, args, signal }) {
    const tags = args['tags'];
    const tagFilter = Array.isArray(tags) ? tags.filter((t): t is string => typeof t === 'string') : [];
    const monitors = await handle.get<Monitor[]>(
      'api/v1/monitor',
      { monitor_tags: tagFilter.length > 0 ? tagFilter : undefined },
      signal,
    );

    const nameQuery = (optionalString(args, 'name_query') ?? '').trim().toLowerCase();
    const matching = monitors
      .filter((m) => !nameQuery || (m.name ?? '').toLowerCase().includes(nameQuery))
      .map(
        (m): MonitorSummary => ({
          id: m.id ?? null,
          name: m.name ?? '',
          type: m.type ?? null,
          overallState: m.overall_state ?? null,
          query: m.query ?? null,
          tags: m.tags ?? [],
        }),
      );
    return listOutput(matching);
  },
};

// ── descriptor ─────────────────────────────────────────────────────────

function clientOptions(config: ResolvedConfig): HttpClientOptions {
  const site = getString(config, 'site') ?? DEFAULT_SITE;
  return {
    baseUrl: getString(config, 'baseUrl') ?? `https://api.${site}`,
    headers: {
      'DD-API-KEY': getString(config, 'apiKey') ?? '',
      'DD-APPLICATION-KEY': getString(config, 'appKey') ?? '',
    },
  };
}

/** Logs, metrics and monitors from Datadog (`external.datadog`). */
export function datadogTools(): ToolProviderDescriptor {
  const operations = [searchLogs, queryMetrics, listMonitors];
  return {
    category: DATADOG_CATEGORY,
    definitions: operations.map((op) => op.spec),
    defaultPolicy: { defaultLimit: 50, maxLimit: 200, timeoutMs: 15_000 },
    createTool({ config, logger, policies, resultCache }) {
      const manager = new HttpApiManager({
        config,
        logger,
        category: DATADOG_CATEGORY,
        requiredKeys: CREDENTIALS,
        buildOptions: clientOptions,
      });
      return new GuardedTool({
        category: DATADOG_CATEGORY,
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
