import { fetch as undiciFetch } from 'undici';
import { withTimeout } from './resilience.js';
import { createLogger } from './logging.js';
import { ExternalCallError, errorMessage } from '../tools/errors.js';

const log = createLogger();

export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/** The slice of a fetch Response the tools rely on. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type FetchLike = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;

export const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

export interface RequestOptions extends Omit<HttpRequestInit, 'signal'> {
  /** Label used in logs and timeout errors. */
  target: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export interface TextResponse {
  body: string;
  contentType: string;
}

/**
 * Performs one HTTP request under a timeout and returns the body text.
 * Non-2xx statuses, transport failures and timeouts raise ExternalCallError.
 */
export async function requestText(url: string, opts: RequestOptions): Promise<TextResponse> {
  const { target, timeoutMs, fetchImpl = defaultFetch, ...init } = opts;
  const start = Date.now();
  log.debug({ target, url: url.length > 100 ? `${url.slice(0, 100)}...` : url }, '🌐 API request');

  return withTimeout(target, timeoutMs, async (signal) => {
    let res: HttpResponse;
    try {
      res = await fetchImpl(url, { ...init, signal });
    } catch (err) {
      if (signal.aborted) throw new ExternalCallError('timeout', `${target} timed out after ${timeoutMs}ms`);
      throw new ExternalCallError('network', errorMessage(err));
    }

    log.debug({ target, status: res.status, duration: Date.now() - start }, '📡 API response received');

    if (!res.ok) {
      const reason = res.statusText ? `HTTP ${res.status} ${res.statusText}` : `HTTP ${res.status}`;
      throw new ExternalCallError('http', reason, res.status);
    }

    let body: string;
    try {
      body = await res.text();
    } catch (err) {
      throw new ExternalCallError('network', `response_read_error: ${errorMessage(err)}`);
    }
    return { body, contentType: res.headers.get('content-type') ?? '' };
  });
}

/**
 * Same as requestText, then parses the body as JSON.
 */
export async function requestJSON(url: string, opts: RequestOptions): Promise<unknown> {
  const { body } = await requestText(url, opts);
  try {
    return JSON.parse(body);
  } catch {
    log.debug({ target: opts.target, responseText: body.slice(0, 500) }, '❌ JSON parse error');
    throw new ExternalCallError('parse', 'json_parse_error');
  }
}
