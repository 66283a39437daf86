const MAX_ERROR_BODY_CHARS = 500;

export type QueryValue = string | number | boolean | readonly string[] | undefined;

export interface HttpClientOptions {
  baseUrl: string;
  /** Sent with every request (authentication, content negotiation). */
  headers?: Record<string, string>;
}

export interface HttpRequest {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

/** Thrown for a non-2xx response. Carries no request headers. */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string,
  ) {
    super(`HTTP ${status} ${statusText}${body ? `: ${body}` : ''}`);
    this.name = 'HttpStatusError';
  }
}

/** Minimal JSON client bound to one external API. Uses the global fetch(). */
export class HttpClient {
  readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = { Accept: 'application/json', ...options.headers };
  }

  /** Build the absolute URL for a request path and query. */
  buildUrl(path: string, query?: Record<string, QueryValue>): URL {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\/+/, '')}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) continue;
      if (Array.isArray(value)) {
        url.searchParams.set(key, value.join(','));
      } else {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  /** Send a request and parse the JSON response. Throws HttpStatusError on non-2xx. */
  async request<T>(req: HttpRequest): Promise<T> {
    const headers: Record<string, string> = { ...this.headers };
    let body: string | undefined;
    if (req.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(req.body);
    }

    const response = await fetch(this.buildUrl(req.path, req.query), {
      method: req.method ?? (body === undefined ? 'GET' : 'POST'),
      headers,
      body,
      signal: req.signal,
    });

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new HttpStatusError(response.status, response.statusText, text.slice(0, MAX_ERROR_BODY_CHARS));
    }

    return (await response.json()) as T;
  }

  get<T>(path: string, query?: Record<string, QueryValue>, signal?: AbortSignal): Promise<T> {
    return this.request<T>({ method: 'GET', path, query, signal });
  }

  post<T>(path: string, body: unknown, signal?: AbortSignal): Promise<T> {
    return this.request<T>({ method: 'POST', path, body, signal });
  }
}
