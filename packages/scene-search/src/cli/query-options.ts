/**
 * Command-line search options → selection query and AOI
 *
 * @module cli/query-options
 */

import { readFile } from 'node:fs/promises';
import type { MultiPolygon, Position } from 'geojson';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { VectorGeometry, WGS84, type AreaGeometry } from '../geo/vector.js';
import { formatIssues, SceneQuerySchema } from '../query/scene-query.js';
import type { SelectionQuery } from '../selection/scene-select.js';

/**
 * Query flags shared by the search commands; list values are comma-separated
 */
export interface QueryOptions {
  readonly sensor?: string;
  readonly product?: string;
  readonly mode?: string;
  readonly mindate?: string;
  readonly maxdate?: string;
  /** commander sets false for --no-date-strict */
  readonly dateStrict?: boolean;
  /** Data-take id(s), hexadecimal as in product names */
  readonly frame?: string;
}

function splitList(value: string | undefined): string[] | undefined {
  return value
    ?.split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * @throws ConfigurationError for any unknown code or malformed value
 */
export function parseQueryOptions(options: QueryOptions): SelectionQuery {
  const frames = splitList(options.frame)?.map((frame) =>
    /^[0-9A-Fa-f]{1,6}$/.test(frame) ? parseInt(frame, 16) : Number.NaN
  );
  const result = SceneQuerySchema.safeParse({
    sensor: splitList(options.sensor),
    product: splitList(options.product),
    acquisitionMode: splitList(options.mode),
    mindate: options.mindate,
    maxdate: options.maxdate,
    dateStrict: options.dateStrict ?? true,
    frameNumber: frames,
  });
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`invalid search options: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

const RingSchema = z.array(z.array(z.number()).min(2)).min(4);

const AreaGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(RingSchema).min(1) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(RingSchema).min(1)).min(1) }),
]);

const FeatureSchema = z.object({ type: z.literal('Feature'), geometry: AreaGeometrySchema });

const AoiSchema = z.union([
  AreaGeometrySchema,
  FeatureSchema,
  z.object({ type: z.literal('FeatureCollection'), features: z.array(FeatureSchema).min(1) }),
]);

/**
 * Read an AOI from a GeoJSON file (geometry, Feature or FeatureCollection).
 * Several polygons are combined into one MultiPolygon.
 */
export async function loadAoiGeometry(path: string, crs: string = WGS84): Promise<VectorGeometry> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`cannot read AOI file ${path}`, [], { cause: error });
  }
  const result = AoiSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`AOI file ${path} holds no polygon geometry`, issues);
  }

  const aoi = result.data;
  const geometries: AreaGeometry[] =
    aoi.type === 'FeatureCollection'
      ? aoi.features.map((feature) => feature.geometry)
      : aoi.type === 'Feature'
        ? [aoi.geometry]
        : [aoi];

  if (geometries.length === 1) {
    return new VectorGeometry(geometries[0], crs);
  }
  const polygons: Position[][][] = geometries.flatMap((geometry) =>
    geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates
  );
  const combined: MultiPolygon = { type: 'MultiPolygon', coordinates: polygons };
  return new VectorGeometry(combined, crs);
}
