import fetch, { RequestInit, Response, FetchError } from 'node-fetch';
import { Logger, createFallbackLogger } from './logger';
import { AuthRejectedError, TransportError } from './error-handler';

type Primitive = string | number | boolean | null | undefined;

export interface HttpClientOptions {
  baseURL: string;
  headers?: Record<string, string>;
  logger?: Logger;
  timeoutMs?: number;
}

export interface RequestOptions {
  params?: Record<string, Primitive>;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs?: number;
}

/**
 * Thin JSON client. It performs exactly one attempt per call and classifies
 * failures; retry policy belongs to the callers.
 */
export interface HttpClient {
  get(path: string, options?: RequestOptions): Promise<unknown>;
  post(path: string, options?: RequestOptions): Promise<unknown>;
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  const {
    baseURL,
    headers = {},
    logger: providedLogger,
    timeoutMs = 10_000
  } = options;

  const logger = providedLogger ?? createFallbackLogger('HTTP');

  const request = (method: string, path: string, requestOptions: RequestOptions = {}): Promise<unknown> => {
    const url = buildUrl(baseURL, path, requestOptions.params);
    return performFetch(url, method, headers, requestOptions, timeoutMs, logger);
  };

  return {
    get: (path, opts) => request('GET', path, opts),
    post: (path, opts) => request('POST', path, opts)
  };
}

async function performFetch(
  url: string,
  method: string,
  defaultHeaders: Record<string, string>,
  options: RequestOptions,
  timeoutMs: number,
  logger: Logger
): Promise<unknown> {
  const headers: Record<string, string> = {
    ...defaultHeaders,
    ...(options.headers ?? {})
  };

  const init: RequestInit = {
    method,
    headers
  };

  if (options.body !== undefined && options.body !== null) {
    headers['Content-Type'] = headers['Content-Type'] ?? 'application/json';
    init.body = typeof options.body === 'string' ? options.body : JSON.stringify(options.body);
  }

  const controller = new AbortController();
  const timeout = options.timeoutMs ?? timeoutMs;
  const timeoutHandle = setTimeout(() => controller.abort(), timeout);
  init.signal = controller.signal;

  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TransportError(`Request timeout after ${timeout}ms`, 'retryable', { originalError: error });
    }
    if (error instanceof FetchError) {
      throw new TransportError(`Network error: ${error.message}`, 'retryable', { originalError: error });
    }
    logger.error('HTTP request failed', error);
    throw new TransportError(
      `Request failed: ${error instanceof Error ? error.message : String(error)}`,
      'retryable',
      { originalError: error }
    );
  } finally {
    clearTimeout(timeoutHandle);
  }

  return parseResponse(response, method, url);
}

async function parseResponse(response: Response, method: string, url: string): Promise<unknown> {
  const text = await response.text();
  const context = { method, url };

  if (response.status === 401 || response.status === 403) {
    throw new AuthRejectedError(`HTTP ${response.status} ${response.statusText}`, response.status);
  }

  if (isRetryableStatus(response.status)) {
    throw new TransportError(`HTTP ${response.status} ${response.statusText}`, 'retryable', {
      status: response.status,
      retryAfterMs: parseRetryAfter(response),
      context
    });
  }

  if (!response.ok) {
    throw new TransportError(`HTTP ${response.status} ${response.statusText}`, 'fatal', {
      status: response.status,
      context: { ...context, body: text.slice(0, 200) }
    });
  }

  if (text.length === 0) {
    return null;
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TransportError('Failed to parse response body as JSON', 'fatal', {
      status: response.status,
      originalError: error,
      context
    });
  }
}

function buildUrl(baseURL: string, path: string, params?: Record<string, Primitive>): string {
  const url = new URL(path, ensureTrailingSlash(baseURL));
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value === null || value === undefined) continue;
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
}

function ensureTrailingSlash(baseURL: string): string {
  return baseURL.endsWith('/') ? baseURL : `${baseURL}/`;
}

function parseRetryAfter(response: Response): number | null {
  const header = response.headers.get('retry-after');
  if (!header) return null;

  const delaySeconds = Number.parseFloat(header);
  if (Number.isFinite(delaySeconds)) {
    return Math.max(0, delaySeconds * 1000);
  }

  const retryDate = new Date(header);
  if (!Number.isNaN(retryDate.getTime())) {
    const diff = retryDate.getTime() - Date.now();
    return diff > 0 ? diff : 0;
  }

  return null;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}
