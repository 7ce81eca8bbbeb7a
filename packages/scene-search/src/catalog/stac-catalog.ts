/**
 * STAC API scene catalog
 *
 * Searches a SpatioTemporal Asset Catalog whose items describe unpacked
 * .SAFE scenes on local storage. Item assets point into the scene folder;
 * the folder itself is the selection result.
 *
 * Search uses the `/search` endpoint with a CQL2-JSON filter (see
 * toCql2Filter) and follows `next` links until the result is exhausted.
 * Opening the catalog and every page request run under the retry policy.
 */

import { z } from 'zod';
import { CatalogRequestError, ConfigurationError } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import { createLogger } from '../core/utils/logger.js';
import { toCql2Filter, type LogicalClause } from '../query/cql2-filter.js';
import { formatIssues, normalizeQuery, type SceneQuery, type SelectOptions } from '../query/scene-query.js';
import { createRetryExecutor, type RetryExecutor } from '../resilience/retry.js';
import type { RetryConfig } from '../resilience/types.js';
import { filterDuplicates, type ProcessingTimeReader } from './duplicates.js';
import { resolveLocalPath, safePathFromHref, type SceneCatalog } from './catalog.js';

const log = createLogger({ module: 'stac-catalog' });

const CollectionsSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)).min(1),
]);

const LandingPageSchema = z
  .object({
    type: z.string().optional(),
    links: z.array(z.object({ rel: z.string(), href: z.string() }).passthrough()).optional(),
  })
  .passthrough();

const LinkSchema = z
  .object({
    rel: z.string(),
    href: z.string(),
    method: z.string().optional(),
    body: z.record(z.unknown()).optional(),
    merge: z.boolean().optional(),
  })
  .passthrough();

const ItemSchema = z
  .object({
    id: z.string(),
    assets: z.record(z.object({ href: z.string() }).passthrough()),
  })
  .passthrough();

const ItemCollectionSchema = z
  .object({
    type: z.literal('FeatureCollection'),
    features: z.array(ItemSchema),
    links: z.array(LinkSchema).optional(),
  })
  .passthrough();

export type StacItem = z.infer<typeof ItemSchema>;
type StacLink = z.infer<typeof LinkSchema>;

export interface StacSearchBody {
  readonly collections: readonly string[];
  readonly filter: LogicalClause;
  readonly 'filter-lang': 'cql2-json';
  readonly limit: number;
  readonly [key: string]: unknown;
}

export interface StacCatalogOptions {
  /** Items per page (default: 100) */
  readonly pageSize?: number;
  /** Retry policy overrides (default: 300 attempts, 1s apart) */
  readonly retry?: Partial<RetryConfig>;
  readonly http?: HTTPClient;
  /** Processing time source for duplicate resolution (default: manifest.safe) */
  readonly readProcessingTime?: ProcessingTimeReader;
}

/**
 * Normalize the collection argument
 *
 * @throws ConfigurationError for anything but a string or a string list
 */
export function parseCollections(collections: unknown): string[] {
  const result = CollectionsSchema.safeParse(collections);
  if (!result.success) {
    throw new ConfigurationError(
      "'collections' must be a string or a list of strings",
      formatIssues(result.error)
    );
  }
  return typeof result.data === 'string' ? [result.data] : result.data;
}

/**
 * Location of the scene an item describes: the .SAFE folder its first asset
 * points into
 */
export function itemLocation(item: StacItem): string {
  const first = Object.values(item.assets)[0];
  const path = first ? safePathFromHref(first.href) : null;
  if (path === null) {
    throw new CatalogRequestError(`item ${item.id} has no asset inside a .SAFE container`, item.id);
  }
  return path;
}

export class StacCatalog implements SceneCatalog {
  readonly kind = 'stac' as const;
  readonly url: string;
  readonly collections: readonly string[];

  private readonly http: HTTPClient;
  private readonly retry: RetryExecutor;
  private readonly pageSize: number;
  private readonly readProcessingTime: ProcessingTimeReader | undefined;
  private searchUrl: string | null = null;

  constructor(url: string, collections: string | readonly string[], options: StacCatalogOptions = {}) {
    this.url = url.replace(/\/+$/, '');
    this.collections = parseCollections(collections);
    this.http = options.http ?? new HTTPClient();
    this.retry = createRetryExecutor({ operation: 'stac', ...options.retry });
    this.pageSize = options.pageSize ?? 100;
    this.readProcessingTime = options.readProcessingTime;
  }

  /**
   * Construct and open in one step
   */
  static async open(
    url: string,
    collections: string | readonly string[],
    options?: StacCatalogOptions
  ): Promise<StacCatalog> {
    const catalog = new StacCatalog(url, collections, options);
    await catalog.open();
    return catalog;
  }

  get isOpen(): boolean {
    return this.searchUrl !== null;
  }

  async open(): Promise<void> {
    const landing = await this.retry.execute(() => this.http.fetchJSON(this.url));
    const parsed = LandingPageSchema.safeParse(landing);
    if (!parsed.success) {
      throw new CatalogRequestError(`not a STAC API landing page: ${this.url}`, this.url);
    }
    const searchLink = parsed.data.links?.find((link) => link.rel === 'search');
    this.searchUrl = searchLink?.href ?? `${this.url}/search`;
    log.debug('catalog opened', { url: this.url, search: this.searchUrl });
  }

  async close(): Promise<void> {
    this.searchUrl = null;
  }

  /**
   * Search body for a query; exposed for inspection and tests
   */
  searchBody(query: SceneQuery): StacSearchBody {
    return {
      collections: this.collections,
      filter: toCql2Filter(normalizeQuery(query)),
      'filter-lang': 'cql2-json',
      limit: this.pageSize,
    };
  }

  async select(query: SceneQuery, options: SelectOptions = {}): Promise<string[]> {
    const checkExist = options.checkExist ?? true;
    const items = await this.search(this.searchBody(query));

    const locations = items.map((item) => resolveLocalPath(itemLocation(item), checkExist));
    const scenes = await filterDuplicates(locations, this.readProcessingTime);
    log.debug('search finished', { items: items.length, scenes: scenes.length });
    return scenes;
  }

  /**
   * All items matching a search body, following `next` links
   */
  async search(body: StacSearchBody): Promise<StacItem[]> {
    const searchUrl = this.requireOpen();
    const items: StacItem[] = [];

    let next: { url: string; method: 'GET' | 'POST'; body?: Record<string, unknown> } | null = {
      url: searchUrl,
      method: 'POST',
      body: { ...body },
    };
    while (next !== null) {
      const request: { url: string; method: 'GET' | 'POST'; body?: Record<string, unknown> } = next;
      const raw = await this.retry.execute(() =>
        this.http.fetchJSON(request.url, { method: request.method, json: request.body })
      );
      const page = ItemCollectionSchema.safeParse(raw);
      if (!page.success) {
        throw new CatalogRequestError(
          `invalid search response: ${formatIssues(page.error).join('; ')}`,
          request.url
        );
      }
      items.push(...page.data.features);
      next = page.data.features.length > 0 ? this.nextRequest(page.data.links, request.body) : null;
    }
    return items;
  }

  private nextRequest(
    links: readonly StacLink[] | undefined,
    previousBody: Record<string, unknown> | undefined
  ): { url: string; method: 'GET' | 'POST'; body?: Record<string, unknown> } | null {
    const link = links?.find((l) => l.rel === 'next');
    if (!link) {
      return null;
    }
    if (link.method?.toUpperCase() === 'POST') {
      const body = link.merge ? { ...previousBody, ...link.body } : link.body ?? previousBody;
      return { url: link.href, method: 'POST', body };
    }
    return { url: link.href, method: 'GET' };
  }

  private requireOpen(): string {
    if (this.searchUrl === null) {
      throw new ConfigurationError(`catalog ${this.url} is not open`);
    }
    return this.searchUrl;
  }
}
