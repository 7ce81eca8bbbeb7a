/**
 * Alaska Satellite Facility (ASF) search catalog
 *
 * Online reference catalog, used to cross-check the primary archive when a
 * data-take neighbour looks missing. One search per call against the ASF
 * search API (`/services/search/param`, GeoJSON output).
 *
 * Return shapes follow the caller's request:
 * - a property name          → sorted list of that property's values
 * - a list of property names → sorted list of value tuples
 * - AsfScene                 → full scene records built from the properties
 */

import type { Polygon } from 'geojson';
import { z } from 'zod';
import { CatalogRequestError, ConfigurationError } from '../core/errors.js';
import {
  ACQUISITION_MODES,
  PRODUCTS,
  STRIPMAP_BEAMS,
  type AcquisitionMode,
  type OrbitDirection,
  type Product,
  type SceneRecord,
  type Sensor,
} from '../core/types.js';
import { HTTPClient } from '../core/http-client.js';
import { createLogger } from '../core/utils/logger.js';
import { formatIso, parseTimestamp } from '../geo/time.js';
import { WGS84 } from '../geo/vector.js';
import { formatIssues, normalizeQuery, type NormalizedQuery, type SceneQuery } from '../query/scene-query.js';
import { createRetryExecutor, type RetryExecutor } from '../resilience/retry.js';
import type { RetryConfig } from '../resilience/types.js';
import { parseSceneName } from '../scenes/scene-name.js';
import type { SceneCatalog } from './catalog.js';

const log = createLogger({ module: 'asf-catalog' });

export const ASF_SEARCH_URL = 'https://api.daac.asf.alaska.edu/services/search/param';

/** ASF processing levels per product type */
export const ASF_PROCESSING_LEVELS: Readonly<Record<Product, readonly string[]>> = {
  GRD: ['GRD_HD', 'GRD_MD', 'GRD_MS', 'GRD_HS', 'GRD_FD'],
  SLC: ['SLC'],
  OCN: ['OCN'],
  RAW: ['RAW'],
};

export type AsfProperty =
  | 'beamModeType'
  | 'fileID'
  | 'flightDirection'
  | 'frameNumber'
  | 'orbit'
  | 'pathNumber'
  | 'platform'
  | 'polarization'
  | 'processingDate'
  | 'processingLevel'
  | 'sceneName'
  | 'startTime'
  | 'stopTime'
  | 'url';

const PropertyValue = z.union([z.string(), z.number(), z.null()]);

const FeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: z.object({
    type: z.literal('Polygon'),
    coordinates: z.array(z.array(z.array(z.number()).min(2)).min(4)).min(1),
  }),
  properties: z.record(PropertyValue),
});

const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(FeatureSchema),
});

export type AsfFeature = z.infer<typeof FeatureSchema>;

function stringProperty(feature: AsfFeature, key: AsfProperty): string {
  const value = feature.properties[key];
  if (value === undefined || value === null) {
    throw new CatalogRequestError(`ASF feature lacks property '${key}'`, ASF_SEARCH_URL);
  }
  return String(value);
}

function numberProperty(feature: AsfFeature, key: AsfProperty): number {
  const value = Number(stringProperty(feature, key));
  if (!Number.isFinite(value)) {
    throw new CatalogRequestError(`ASF feature property '${key}' is not numeric`, ASF_SEARCH_URL);
  }
  return value;
}

function dateProperty(feature: AsfFeature, key: 'startTime' | 'stopTime'): Date {
  const raw = stringProperty(feature, key);
  const date = parseTimestamp(raw);
  if (date === null) {
    throw new CatalogRequestError(`ASF feature property '${key}' is not a date: ${raw}`, ASF_SEARCH_URL);
  }
  return date;
}

/**
 * Scene record built from an ASF search result. Slicing is unknown to ASF,
 * so sliceNumber/totalSlices are -1.
 */
export class AsfScene implements SceneRecord {
  readonly scene: string;
  readonly sensor: Sensor;
  readonly product: Product;
  readonly acquisitionMode: AcquisitionMode;
  readonly start: Date;
  readonly stop: Date;
  readonly orbit: OrbitDirection;
  readonly orbitNumberAbs: number;
  readonly orbitNumberRel: number;
  readonly frameNumber: number | null;
  readonly sliceNumber = -1;
  readonly totalSlices = -1;
  readonly polarizations: readonly string[];
  readonly footprint: Polygon;

  constructor(feature: AsfFeature) {
    const sceneName = stringProperty(feature, 'sceneName');
    const name = parseSceneName(sceneName);
    if (!name) {
      throw new CatalogRequestError(`ASF scene name not recognized: ${sceneName}`, ASF_SEARCH_URL);
    }
    const level = /GRD|SLC|OCN|RAW/.exec(stringProperty(feature, 'processingLevel'));
    const beam = stringProperty(feature, 'beamModeType');
    const product = PRODUCTS.find((p) => p === level?.[0]);
    const mode = ACQUISITION_MODES.find((m) => m === beam);
    if (!product || !mode) {
      throw new CatalogRequestError(`ASF scene ${sceneName} has unknown product or beam mode`, ASF_SEARCH_URL);
    }

    this.scene = stringProperty(feature, 'url');
    this.sensor = name.sensor;
    this.product = product;
    this.acquisitionMode = mode;
    this.start = dateProperty(feature, 'startTime');
    this.stop = dateProperty(feature, 'stopTime');
    this.orbit = stringProperty(feature, 'flightDirection').startsWith('A') ? 'A' : 'D';
    this.orbitNumberAbs = numberProperty(feature, 'orbit');
    this.orbitNumberRel = numberProperty(feature, 'pathNumber');
    this.frameNumber = name.frameNumber;
    this.polarizations = stringProperty(feature, 'polarization').split('+');
    this.footprint = { type: 'Polygon', coordinates: feature.geometry.coordinates };
  }
}

export interface AsfClientOptions {
  readonly url?: string;
  readonly http?: HTTPClient;
  readonly retry?: Partial<RetryConfig>;
}

/**
 * Search parameters for one ASF request
 */
export function asfSearchParams(query: NormalizedQuery): URLSearchParams {
  if (query.frameNumber) {
    throw new ConfigurationError('the ASF catalog cannot filter by data-take id');
  }
  const params = new URLSearchParams({ output: 'geojson' });

  if (query.sensor) {
    params.set('platform', query.sensor.map((s) => s.replace('S1', 'Sentinel-1')).join(','));
  }
  if (query.product) {
    params.set('processingLevel', query.product.flatMap((p) => ASF_PROCESSING_LEVELS[p]).join(','));
  }
  if (query.acquisitionMode) {
    const beams = query.acquisitionMode.flatMap((m) => (m === 'SM' ? STRIPMAP_BEAMS : [m]));
    params.set('beamMode', beams.join(','));
  }
  if (query.mindate) {
    params.set('start', formatIso(query.mindate));
  }
  if (query.maxdate) {
    params.set('end', formatIso(query.maxdate));
  }
  if (query.vectorobject) {
    params.set('intersectsWith', query.vectorobject.reproject(WGS84).toWkt());
  }
  return params;
}

function compareTuples(a: readonly string[], b: readonly string[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length - b.length;
}

/**
 * ASF features for a query; strict date semantics are applied client-side
 * (`mindate <= startTime` and `stopTime <= maxdate`), the API itself
 * returns every overlapping acquisition
 */
export async function asfSearch(query: SceneQuery, options: AsfClientOptions = {}): Promise<AsfFeature[]> {
  const normalized = normalizeQuery(query);
  const http = options.http ?? new HTTPClient();
  const retry = createRetryExecutor({ operation: 'asf', ...options.retry });
  return runAsfSearch(normalized, http, retry, options.url ?? ASF_SEARCH_URL);
}

async function runAsfSearch(
  query: NormalizedQuery,
  http: HTTPClient,
  retry: RetryExecutor,
  baseUrl: string
): Promise<AsfFeature[]> {
  const url = `${baseUrl}?${asfSearchParams(query).toString()}`;
  const raw = await retry.execute(() => http.fetchJSON(url));
  const parsed = FeatureCollectionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogRequestError(`invalid ASF response: ${formatIssues(parsed.error).join('; ')}`, url);
  }

  let features = parsed.data.features;
  const { mindate, maxdate } = query;
  if (query.dateStrict) {
    features = features.filter(
      (f) =>
        (mindate === null || mindate <= dateProperty(f, 'startTime')) &&
        (maxdate === null || dateProperty(f, 'stopTime') <= maxdate)
    );
  }
  log.debug('ASF search finished', { features: features.length });
  return features;
}

/**
 * Search the ASF catalog and shape the results
 *
 * @param returnValue - property name (default `url`), list of names, or AsfScene
 */
export function asfSelect(query: SceneQuery, returnValue: typeof AsfScene, options?: AsfClientOptions): Promise<AsfScene[]>;
export function asfSelect(
  query: SceneQuery,
  returnValue: readonly AsfProperty[],
  options?: AsfClientOptions
): Promise<string[][]>;
export function asfSelect(query: SceneQuery, returnValue?: AsfProperty, options?: AsfClientOptions): Promise<string[]>;
export async function asfSelect(
  query: SceneQuery,
  returnValue: AsfProperty | readonly AsfProperty[] | typeof AsfScene = 'url',
  options: AsfClientOptions = {}
): Promise<string[] | string[][] | AsfScene[]> {
  const features = await asfSearch(query, options);

  if (typeof returnValue === 'string') {
    return features.map((f) => stringProperty(f, returnValue)).sort();
  }
  if (Array.isArray(returnValue)) {
    return features
      .map((f) => returnValue.map((key) => stringProperty(f, key)))
      .sort(compareTuples);
  }
  return features.map((f) => new AsfScene(f));
}

/**
 * ASF search behind the catalog interface. Nothing to open; locations are
 * download URLs, so existence checking does not apply.
 */
export class AsfCatalog implements SceneCatalog {
  readonly kind = 'asf' as const;
  readonly url: string;

  private readonly http: HTTPClient;
  private readonly retry: RetryExecutor;

  constructor(options: AsfClientOptions = {}) {
    this.url = options.url ?? ASF_SEARCH_URL;
    this.http = options.http ?? new HTTPClient();
    this.retry = createRetryExecutor({ operation: 'asf', ...options.retry });
  }

  async open(): Promise<void> {
    log.debug('using ASF search API', { url: this.url });
  }

  async close(): Promise<void> {
    // stateless HTTP; nothing held
  }

  async select(query: SceneQuery): Promise<string[]> {
    const features = await runAsfSearch(normalizeQuery(query), this.http, this.retry, this.url);
    return [...new Set(features.map((f) => stringProperty(f, 'url')))].sort();
  }

  async selectRecords(query: SceneQuery): Promise<SceneRecord[]> {
    const features = await runAsfSearch(normalizeQuery(query), this.http, this.retry, this.url);
    return features.map((f) => new AsfScene(f)).sort((a, b) => (a.scene < b.scene ? -1 : a.scene > b.scene ? 1 : 0));
  }

  /**
   * Sorted values of one property (e.g. `sceneName`) for a query
   */
  async selectProperty(query: SceneQuery, property: AsfProperty): Promise<string[]> {
    const features = await runAsfSearch(normalizeQuery(query), this.http, this.retry, this.url);
    return features.map((f) => stringProperty(f, property)).sort();
  }
}
