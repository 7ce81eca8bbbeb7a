/**
 * HTTP client for catalog backends
 *
 * Thin wrapper over native fetch that:
 * - applies a per-request timeout via AbortController
 * - classifies failures into TransientCatalogError (retryable) and
 *   CatalogRequestError (fatal)
 * - parses JSON bodies
 *
 * It does not retry by itself; catalogs wrap calls in a RetryExecutor so
 * that one attempt bound governs open and search alike.
 */

import { CatalogRequestError, toError, TransientCatalogError } from './errors.js';

export interface HTTPClientConfig {
  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;
}

export interface RequestOptions {
  readonly method?: 'GET' | 'POST';
  readonly headers?: Record<string, string>;
  /** Serialized as JSON when present */
  readonly json?: unknown;
  readonly timeoutMs?: number;
}

/**
 * Retryable status codes: request timeout, throttling, server-side failures
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: 60000,
      userAgent: 'sentinel-ard-scene-search/0.1',
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {TransientCatalogError} on timeout, network failure, 408/429/5xx
   * @throws {CatalogRequestError} on other non-2xx statuses and invalid JSON
   */
  async fetchJSON(url: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.request(url, options);
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new CatalogRequestError(
        `invalid JSON response from ${url}: ${text.slice(0, 200)}`,
        url,
        response.status,
        { cause: error }
      );
    }
  }

  private async request(url: string, options: RequestOptions): Promise<Response> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method ?? (options.json === undefined ? 'GET' : 'POST'),
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
          ...(options.json === undefined ? {} : { 'Content-Type': 'application/json' }),
          ...options.headers,
        },
        body: options.json === undefined ? undefined : JSON.stringify(options.json),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransientCatalogError(`request timeout after ${timeoutMs}ms: ${url}`, url, undefined, {
          cause: error,
        });
      }
      throw new TransientCatalogError(`network error: ${toError(error).message}`, url, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const message = `HTTP ${response.status} ${response.statusText}: ${url}`;
      if (isTransientStatus(response.status)) {
        throw new TransientCatalogError(message, url, response.status);
      }
      throw new CatalogRequestError(message, url, response.status);
    }
    return response;
  }
}
