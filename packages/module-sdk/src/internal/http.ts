import { CapabilityRequestError } from '../errors';

export type FetchLike = typeof fetch;

const REDACTED_KEY = 'redacted';

export type QueryValue = string | number | boolean | undefined | null;

export interface HttpRequestOptions {
  baseUrl: string;
  path: string;
  method: string;
  query?: Record<string, QueryValue>;
  headers?: Record<string, string | undefined>;
  body?: unknown;
  /** Sent as the `key` query parameter, the way both downstream stores authenticate. */
  apiKey?: string | null;
  expectJson?: boolean;
  timeoutMs?: number | null;
  fetchImpl?: FetchLike;
}

export interface HttpResponse<T = unknown> {
  status: number;
  headers: Headers;
  data: T;
}

export function buildUrl(baseUrl: string, path: string, query?: HttpRequestOptions['query']): string {
  const normalizedBase = baseUrl.replace(/\/+$/, '');
  const normalizedPath = path.replace(/^\/+/, '');
  const url = new URL(normalizedPath ? `${normalizedBase}/${normalizedPath}` : normalizedBase);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined || value === null) {
        continue;
      }
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

function isRawBody(value: unknown): value is string | Uint8Array | ArrayBuffer {
  return typeof value === 'string' || value instanceof Uint8Array || value instanceof ArrayBuffer;
}

function buildHeaders(options: HttpRequestOptions): Headers {
  const headers = new Headers();
  if (options.expectJson) {
    headers.set('accept', 'application/json');
  }
  const body = options.body;
  if (body !== undefined && body !== null && !isRawBody(body)) {
    headers.set('content-type', 'application/json');
  }
  if (options.headers) {
    for (const [key, value] of Object.entries(options.headers)) {
      if (value !== undefined) {
        headers.set(key, value);
      }
    }
  }
  return headers;
}

function normalizeBody(body: unknown): RequestInit['body'] {
  if (body === undefined) {
    return undefined;
  }
  if (body === null) {
    return null;
  }
  if (isRawBody(body)) {
    return body;
  }
  return JSON.stringify(body);
}

export async function httpRequest<T = unknown>(options: HttpRequestOptions): Promise<HttpResponse<T | undefined>> {
  const fetchImpl = options.fetchImpl ?? globalThis.fetch;
  const apiKey = options.apiKey?.trim();
  const url = buildUrl(options.baseUrl, options.path, {
    ...options.query,
    key: apiKey ? apiKey : undefined
  });
  // keys never leave through error messages
  const displayUrl = apiKey
    ? buildUrl(options.baseUrl, options.path, { ...options.query, key: REDACTED_KEY })
    : url;
  const init: RequestInit = {
    method: options.method.toUpperCase(),
    headers: buildHeaders(options)
  };
  const normalizedBody = normalizeBody(options.body);
  if (normalizedBody !== undefined) {
    init.body = normalizedBody;
  }
  if (options.timeoutMs && options.timeoutMs > 0) {
    init.signal = AbortSignal.timeout(options.timeoutMs);
  }

  const response = await fetchImpl(url, init);
  if (!response.ok) {
    const text = await response.text().catch(() => undefined);
    throw new CapabilityRequestError({
      method: options.method,
      url: displayUrl,
      status: response.status,
      body: text
    });
  }

  let data: T | undefined;
  if (options.expectJson === false || response.status === 204) {
    data = undefined;
  } else {
    try {
      data = (await response.json()) as T;
    } catch {
      data = undefined;
    }
  }

  return {
    status: response.status,
    headers: response.headers,
    data
  };
}
