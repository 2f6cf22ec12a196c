import { HttpRequestError } from '@/errors/research';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface FetchJsonOptions {
  method?: 'GET' | 'POST';
  query?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
  fetchFn?: typeof globalThis.fetch;
}

const DEFAULT_TIMEOUT_MS = 20_000;

export function buildUrl(url: string, query?: QueryParams): string {
  if (!query) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

function parseJsonSafely(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

async function send(
  url: string,
  options: FetchJsonOptions,
  accept: string,
): Promise<{ status: number; text: string }> {
  const fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const headers: Record<string, string> = { Accept: accept, ...options.headers };
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  try {
    const response = await fetchFn(buildUrl(url, options.query), {
      method: options.method ?? 'GET',
      headers,
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      signal: controller.signal,
    });

    const responseText = await response.text();

    if (!response.ok) {
      throw new HttpRequestError(
        `HTTP ${response.status} from ${new URL(url).host}: ${responseText.slice(0, 300)}`,
        response.status,
        'HTTP_ERROR',
      );
    }

    return { status: response.status, text: responseText };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new HttpRequestError(
        timedOut ? `Request timed out after ${timeoutMs}ms` : 'Request was aborted',
        408,
        'TIMEOUT',
      );
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * GET/POST a JSON endpoint with a hard per-request timeout.
 *
 * Throws HttpRequestError on non-2xx, timeout, or a body that is not JSON.
 */
export async function fetchJson<T>(url: string, options: FetchJsonOptions = {}): Promise<T> {
  const { status, text } = await send(url, options, 'application/json');

  const parsed = parseJsonSafely(text);
  if (parsed === undefined) {
    throw new HttpRequestError(`Expected JSON response from ${new URL(url).host}`, status, 'INVALID_RESPONSE');
  }

  return parsed as T;
}

/** Raw body of a text endpoint (RSS, XML). Same timeout and error rules as fetchJson. */
export async function fetchText(url: string, options: FetchJsonOptions = {}): Promise<string> {
  const { text } = await send(url, options, 'application/rss+xml, application/xml, text/xml, */*');
  return text;
}
