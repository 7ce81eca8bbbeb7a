/**
 * manifest.safe reader
 *
 * Pulls the handful of elements this package needs out of a SAFE manifest:
 * processing start time (duplicate resolution), slice number and total
 * slices (completeness checks), footprint, pass and relative orbit.
 *
 * The manifest layout is fixed by the SAFE format, so elements are located
 * by qualified name rather than through a generic XML tree.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Polygon, Position } from 'geojson';
import { ManifestReadError } from '../core/errors.js';
import type { OrbitDirection } from '../core/types.js';

export const MANIFEST_FILE = 'manifest.safe';

export interface ManifestInfo {
  readonly processingStart: Date;
  readonly sliceNumber: number;
  readonly totalSlices: number;
  readonly footprint: Polygon;
  readonly orbit: OrbitDirection;
  readonly orbitNumberRel: number | null;
}

/**
 * Processing timestamps carry microseconds and no zone; they are UTC.
 * Fractions beyond milliseconds are dropped.
 */
export function parseProcessingTime(value: string): Date | null {
  const match = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?Z?$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const millis = (match[2] ?? '').padEnd(3, '0').slice(0, 3);
  const date = new Date(`${match[1]}.${millis}Z`);
  return Number.isNaN(date.getTime()) ? null : date;
}

function elementText(xml: string, localName: string): string | null {
  const pattern = new RegExp(`<(?:[\\w-]+:)?${localName}\\b[^>]*>([^<]*)</(?:[\\w-]+:)?${localName}>`);
  const match = pattern.exec(xml);
  return match ? match[1].trim() : null;
}

/**
 * `lat,lon lat,lon ...` (GML 2 coordinates) → closed GeoJSON ring in lon/lat
 */
export function parseGmlCoordinates(text: string): Polygon | null {
  const ring: Position[] = [];
  for (const pair of text.trim().split(/\s+/)) {
    const [lat, lon] = pair.split(',').map(Number);
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      return null;
    }
    ring.push([lon, lat]);
  }
  if (ring.length < 3) {
    return null;
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first[0] !== last[0] || first[1] !== last[1]) {
    ring.push([first[0], first[1]]);
  }
  return { type: 'Polygon', coordinates: [ring] };
}

export async function readManifest(scene: string): Promise<string> {
  try {
    return await readFile(join(scene, MANIFEST_FILE), 'utf-8');
  } catch (error) {
    throw new ManifestReadError(`cannot read manifest of ${scene}`, scene, { cause: error });
  }
}

/**
 * Declared processing start time of a scene, from
 * `metadataSection/.../xmlData/safe:processing@start`
 */
export async function readProcessingTime(scene: string): Promise<Date> {
  return extractProcessingStart(await readManifest(scene), scene);
}

function extractProcessingStart(xml: string, scene: string): Date {
  const attr = /<(?:[\w-]+:)?processing\b[^>]*\sstart="([^"]+)"/.exec(xml);
  const parsed = attr ? parseProcessingTime(attr[1]) : null;
  if (!parsed) {
    throw new ManifestReadError(`no processing start time in manifest of ${scene}`, scene);
  }
  return parsed;
}

/**
 * Parse the elements identification needs out of manifest text
 *
 * @throws ManifestReadError when the footprint or pass is missing
 */
export function parseManifest(xml: string, scene: string): ManifestInfo {
  const processingStart = extractProcessingStart(xml, scene);

  const coordinates = elementText(xml, 'coordinates');
  const footprint = coordinates ? parseGmlCoordinates(coordinates) : null;
  if (!footprint) {
    throw new ManifestReadError(`no footprint in manifest of ${scene}`, scene);
  }

  const pass = elementText(xml, 'pass');
  if (pass !== 'ASCENDING' && pass !== 'DESCENDING') {
    throw new ManifestReadError(`no orbit pass in manifest of ${scene}`, scene);
  }

  const slice = elementText(xml, 'sliceNumber');
  const total = elementText(xml, 'totalSlices');
  const relative = /<(?:[\w-]+:)?relativeOrbitNumber\b[^>]*type="start"[^>]*>(\d+)</.exec(xml);

  return {
    processingStart,
    // Unsliced products carry no slice elements; they read as 0/0
    sliceNumber: slice !== null ? Number(slice) : 0,
    totalSlices: total !== null ? Number(total) : 0,
    footprint,
    orbit: pass === 'ASCENDING' ? 'A' : 'D',
    orbitNumberRel: relative ? Number(relative[1]) : null,
  };
}
