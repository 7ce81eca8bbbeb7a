/**
 * Tile geometry service
 *
 * The processing grid is an external partition of the earth into named
 * cells (e.g. MGRS tiles). The selection engine needs two lookups from it:
 * tile ids → geometries, and geometries → overlapping tiles.
 *
 * GeoJsonTileGrid holds the grid as a GeoJSON FeatureCollection in
 * EPSG:4326 (RFC 7946), the tile id taken from a configurable property.
 */

import { readFile } from 'node:fs/promises';
import type { Feature } from 'geojson';
import { booleanIntersects } from '@turf/turf';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import type { Tile } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { AreaGeometry } from '../geo/vector.js';
import { formatIssues } from '../query/scene-query.js';

const log = createLogger({ module: 'tile-grid' });

export interface TileGrid {
  /**
   * Geometries of the named tiles, in the order given
   *
   * @throws ConfigurationError for an id the grid does not contain
   */
  aoiFromTile(ids: readonly string[]): Feature<AreaGeometry, { id: string }>[];

  /**
   * Tiles overlapping any of the geometries (EPSG:4326), sorted by id
   */
  tileFromAoi(geometries: readonly AreaGeometry[]): Tile[];
}

export interface GeoJsonTileGridOptions {
  /** Feature property holding the tile id (default: `tile_id`) */
  readonly idProperty?: string;
}

const RingSchema = z.array(z.array(z.number()).min(2)).min(4);

const TileGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(RingSchema).min(1) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(RingSchema).min(1)).min(1) }),
]);

const TileCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(
    z.object({
      type: z.literal('Feature'),
      geometry: TileGeometrySchema,
      properties: z.record(z.unknown()).nullable(),
    })
  ),
});

export class GeoJsonTileGrid implements TileGrid {
  private readonly tiles: ReadonlyMap<string, Tile>;

  constructor(tiles: readonly Tile[]) {
    const byId = new Map<string, Tile>();
    for (const tile of tiles) {
      if (byId.has(tile.id)) {
        throw new ConfigurationError(`duplicate tile id in grid: ${tile.id}`);
      }
      byId.set(tile.id, tile);
    }
    this.tiles = byId;
  }

  /**
   * Build a grid from parsed GeoJSON
   *
   * @throws ConfigurationError for a malformed collection or a feature without id
   */
  static fromGeoJson(collection: unknown, options: GeoJsonTileGridOptions = {}): GeoJsonTileGrid {
    const idProperty = options.idProperty ?? 'tile_id';
    const parsed = TileCollectionSchema.safeParse(collection);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new ConfigurationError(`invalid tile grid: ${issues.join('; ')}`, issues);
    }

    const tiles = parsed.data.features.map((feature, index): Tile => {
      const id = feature.properties?.[idProperty];
      if (typeof id !== 'string' && typeof id !== 'number') {
        throw new ConfigurationError(`tile grid feature ${index} has no '${idProperty}' property`);
      }
      return { id: String(id), geometry: feature.geometry };
    });
    return new GeoJsonTileGrid(tiles);
  }

  static async fromFile(path: string, options?: GeoJsonTileGridOptions): Promise<GeoJsonTileGrid> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`cannot read tile grid ${path}`, [], { cause: error });
    }
    const grid = GeoJsonTileGrid.fromGeoJson(raw, options);
    log.debug('tile grid loaded', { path, tiles: grid.size });
    return grid;
  }

  get size(): number {
    return this.tiles.size;
  }

  aoiFromTile(ids: readonly string[]): Feature<AreaGeometry, { id: string }>[] {
    return ids.map((id) => {
      const tile = this.tiles.get(id);
      if (!tile) {
        throw new ConfigurationError(`unknown tile id: ${id}`);
      }
      return { type: 'Feature', geometry: tile.geometry, properties: { id } };
    });
  }

  tileFromAoi(geometries: readonly AreaGeometry[]): Tile[] {
    const hits: Tile[] = [];
    for (const tile of this.tiles.values()) {
      if (geometries.some((geometry) => booleanIntersects(tile.geometry, geometry))) {
        hits.push(tile);
      }
    }
    return hits.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }
}
