/**
 * Core domain types
 *
 * Scene records, tiles and selection results shared by the catalog
 * adapters, the selection engine and the completeness verifier.
 */

import type { MultiPolygon, Polygon } from 'geojson';

export const SENSORS = ['S1A', 'S1B', 'S1C', 'S1D'] as const;
export type Sensor = (typeof SENSORS)[number];

export const PRODUCTS = ['GRD', 'SLC', 'OCN', 'RAW'] as const;
export type Product = (typeof PRODUCTS)[number];

/** Beam modes; stripmap acquisitions carry their swath (S1..S6) as mode */
export const ACQUISITION_MODES = ['IW', 'EW', 'WV', 'SM', 'S1', 'S2', 'S3', 'S4', 'S5', 'S6'] as const;
export type AcquisitionMode = (typeof ACQUISITION_MODES)[number];

export const STRIPMAP_BEAMS: readonly AcquisitionMode[] = ['S1', 'S2', 'S3', 'S4', 'S5', 'S6'];

export type OrbitDirection = 'A' | 'D';

/**
 * One Sentinel-1 scene as identified from its name and manifest (or from
 * a reference catalog's properties).
 *
 * `sliceNumber`/`totalSlices` follow the data-take slicing convention:
 * 1..N for sliced products, 0/0 for an unsliced acquisition, -1/-1 when
 * unknown.
 */
export interface SceneRecord {
  /** Absolute local path of the .SAFE directory, or a URL for remote-only records */
  readonly scene: string;
  readonly sensor: Sensor;
  readonly product: Product;
  readonly acquisitionMode: AcquisitionMode;
  readonly start: Date;
  readonly stop: Date;
  readonly orbit: OrbitDirection;
  readonly orbitNumberAbs: number;
  readonly orbitNumberRel: number;
  /** Data-take id in decimal representation */
  readonly frameNumber: number | null;
  readonly sliceNumber: number;
  readonly totalSlices: number;
  readonly polarizations: readonly string[];
  /** Footprint in EPSG:4326 */
  readonly footprint: Polygon;
}

/**
 * Tile grid cell
 */
export interface Tile {
  readonly id: string;
  readonly geometry: Polygon | MultiPolygon;
}

/**
 * Processing work-list: scene locations plus target tile ids
 */
export interface SelectionResult {
  readonly scenes: readonly string[];
  readonly tiles: readonly string[];
}
