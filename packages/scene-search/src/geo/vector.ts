/**
 * Vector geometry value
 *
 * A GeoJSON polygon geometry tagged with its coordinate reference system.
 * Catalog filters need three things from it: reprojection to EPSG:4326,
 * the bounding extent, and a WKT rendering for the ASF search API.
 *
 * Instances are immutable; reproject() returns a new value.
 */

import type { MultiPolygon, Polygon, Position } from 'geojson';
import { bbox } from '@turf/turf';
import proj4 from 'proj4';
import { ConfigurationError } from '../core/errors.js';

export type AreaGeometry = Polygon | MultiPolygon;

export const WGS84 = 'EPSG:4326';

export interface Extent {
  readonly xmin: number;
  readonly xmax: number;
  readonly ymin: number;
  readonly ymax: number;
}

/**
 * Map an EPSG code or proj string to a proj4 definition.
 *
 * proj4 ships EPSG:4326 and EPSG:3857; WGS84 UTM zones (326xx north,
 * 327xx south) are built on demand since the tile grid is UTM based.
 */
export function resolveProjection(crs: string): string {
  if (crs.startsWith('+proj=')) {
    return crs;
  }
  const code = /^EPSG:(\d+)$/i.exec(crs.trim());
  if (!code) {
    throw new ConfigurationError(`unsupported coordinate reference system: ${crs}`);
  }
  const epsg = Number(code[1]);
  if (epsg === 4326 || epsg === 3857) {
    return `EPSG:${epsg}`;
  }
  if ((epsg > 32600 && epsg <= 32660) || (epsg > 32700 && epsg <= 32760)) {
    const zone = epsg % 100;
    const south = epsg > 32700 ? ' +south' : '';
    return `+proj=utm +zone=${zone}${south} +datum=WGS84 +units=m +no_defs`;
  }
  throw new ConfigurationError(`unsupported coordinate reference system: ${crs}`);
}

function mapRing(ring: Position[], project: (p: Position) => Position): Position[] {
  return ring.map(project);
}

function formatRing(ring: Position[]): string {
  return `(${ring.map((p) => `${p[0]} ${p[1]}`).join(', ')})`;
}

export class VectorGeometry {
  readonly geometry: AreaGeometry;
  readonly crs: string;

  constructor(geometry: AreaGeometry, crs: string = WGS84) {
    const type: string = geometry.type;
    if (type !== 'Polygon' && type !== 'MultiPolygon') {
      throw new ConfigurationError(`unsupported spatial filter geometry type: ${String(type)}`);
    }
    this.geometry = geometry;
    this.crs = crs;
  }

  /**
   * Return this geometry in another reference system. 2D only; a third
   * coordinate is dropped.
   */
  reproject(target: string): VectorGeometry {
    const from = resolveProjection(this.crs);
    const to = resolveProjection(target);
    if (from === to) {
      return new VectorGeometry(this.geometry, target);
    }

    const converter = proj4(from, to);
    const project = (p: Position): Position => converter.forward([p[0], p[1]]);

    const geometry: AreaGeometry =
      this.geometry.type === 'Polygon'
        ? { type: 'Polygon', coordinates: this.geometry.coordinates.map((r) => mapRing(r, project)) }
        : {
            type: 'MultiPolygon',
            coordinates: this.geometry.coordinates.map((poly) => poly.map((r) => mapRing(r, project))),
          };
    return new VectorGeometry(geometry, target);
  }

  get extent(): Extent {
    const [xmin, ymin, xmax, ymax] = bbox(this.geometry);
    return { xmin, xmax, ymin, ymax };
  }

  /**
   * The bounding box as a closed polygon ring, walking
   * (xmin,ymin) → (xmin,ymax) → (xmax,ymax) → (xmax,ymin) → (xmin,ymin)
   */
  bboxPolygon(): Polygon {
    const { xmin, xmax, ymin, ymax } = this.extent;
    return {
      type: 'Polygon',
      coordinates: [
        [
          [xmin, ymin],
          [xmin, ymax],
          [xmax, ymax],
          [xmax, ymin],
          [xmin, ymin],
        ],
      ],
    };
  }

  /**
   * 2D Well-Known Text of the geometry in its current reference system
   */
  toWkt(): string {
    if (this.geometry.type === 'Polygon') {
      return `POLYGON (${this.geometry.coordinates.map(formatRing).join(', ')})`;
    }
    const polygons = this.geometry.coordinates.map(
      (poly) => `(${poly.map(formatRing).join(', ')})`
    );
    return `MULTIPOLYGON (${polygons.join(', ')})`;
  }
}
