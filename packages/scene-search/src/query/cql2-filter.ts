/**
 * Query → CQL2-JSON filter translation
 *
 * Pure function from a NormalizedQuery to the clause tree a STAC API
 * `/search` endpoint accepts with `filter-lang: cql2-json`.
 *
 * STAC keys used:
 * - platform
 * - start_datetime / end_datetime
 * - sar:instrument_mode
 * - sar:product_type
 * - s1:datatake (custom; 6-digit upper-case hex data-take id)
 */

import type { Polygon } from 'geojson';
import type { Sensor } from '../core/types.js';
import { formatCompact } from '../geo/time.js';
import { WGS84 } from '../geo/vector.js';
import type { NormalizedQuery } from './scene-query.js';

export interface PropertyRef {
  readonly property: string;
}

export type ComparisonOp = '=' | '>=' | '<=';

export interface ComparisonClause {
  readonly op: ComparisonOp;
  readonly args: readonly [PropertyRef, string];
}

export interface IntersectsClause {
  readonly op: 's_intersects';
  readonly args: readonly [PropertyRef, Polygon];
}

export interface LogicalClause {
  readonly op: 'and' | 'or';
  readonly args: readonly Cql2Clause[];
}

export type Cql2Clause = ComparisonClause | IntersectsClause | LogicalClause;

export const STAC_PLATFORMS: Readonly<Record<Sensor, string>> = {
  S1A: 'sentinel-1a',
  S1B: 'sentinel-1b',
  S1C: 'sentinel-1c',
  S1D: 'sentinel-1d',
};

export const STAC_KEYS = {
  sensor: 'platform',
  product: 'sar:product_type',
  acquisitionMode: 'sar:instrument_mode',
  start: 'start_datetime',
  stop: 'end_datetime',
  frameNumber: 's1:datatake',
  geometry: 'geometry',
} as const;

/**
 * Data-take id as the 6-digit upper-case hexadecimal the catalog stores
 */
export function encodeDatatake(frameNumber: number): string {
  return frameNumber.toString(16).toUpperCase().padStart(6, '0');
}

function equalsAny(property: string, values: readonly string[]): Cql2Clause {
  const clauses: ComparisonClause[] = values.map((value) => ({
    op: '=',
    args: [{ property }, value],
  }));
  return clauses.length === 1 ? clauses[0] : { op: 'or', args: clauses };
}

/**
 * Translate a query into a CQL2-JSON filter; all active clauses are
 * AND-combined, multiple values of one field OR-combined.
 */
export function toCql2Filter(query: NormalizedQuery): LogicalClause {
  const args: Cql2Clause[] = [];

  if (query.sensor) {
    args.push(equalsAny(STAC_KEYS.sensor, query.sensor.map((s) => STAC_PLATFORMS[s])));
  }
  if (query.product) {
    args.push(equalsAny(STAC_KEYS.product, query.product));
  }
  if (query.acquisitionMode) {
    args.push(equalsAny(STAC_KEYS.acquisitionMode, query.acquisitionMode));
  }
  if (query.mindate) {
    const property = query.dateStrict ? STAC_KEYS.start : STAC_KEYS.stop;
    args.push({ op: '>=', args: [{ property }, formatCompact(query.mindate)] });
  }
  if (query.maxdate) {
    const property = query.dateStrict ? STAC_KEYS.stop : STAC_KEYS.start;
    args.push({ op: '<=', args: [{ property }, formatCompact(query.maxdate)] });
  }
  if (query.frameNumber) {
    args.push(equalsAny(STAC_KEYS.frameNumber, query.frameNumber.map(encodeDatatake)));
  }
  if (query.vectorobject) {
    const polygon = query.vectorobject.reproject(WGS84).bboxPolygon();
    args.push({ op: 's_intersects', args: [{ property: STAC_KEYS.geometry }, polygon] });
  }

  return { op: 'and', args };
}
