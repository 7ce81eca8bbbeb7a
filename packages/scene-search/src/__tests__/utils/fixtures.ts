/**
 * Test Fixture Factories
 *
 * Scene names, manifests, on-disk .SAFE directories and scene records with
 * deterministic defaults.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Polygon } from 'geojson';
import type { SceneRecord } from '../../core/types.js';
import { parseTimestamp } from '../../geo/time.js';

// ============================================================================
// Geometry
// ============================================================================

export function createSquarePolygon(minLon: number, minLat: number, size: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [minLon, minLat],
        [minLon + size, minLat],
        [minLon + size, minLat + size],
        [minLon, minLat + size],
        [minLon, minLat],
      ],
    ],
  };
}

// ============================================================================
// Scene names
// ============================================================================

export interface SceneNameParts {
  readonly sensor?: string;
  readonly mode?: string;
  readonly product?: string;
  readonly start: string;
  readonly stop: string;
  readonly orbit?: number;
  readonly datatake?: string;
  readonly unique?: string;
}

/**
 * e.g. S1A_IW_GRDH_1SDV_20210101T052318_20210101T052343_035952_0436B3_A5F2.SAFE
 */
export function sceneName(parts: SceneNameParts): string {
  const sensor = parts.sensor ?? 'S1A';
  const mode = parts.mode ?? 'IW';
  const product = parts.product ?? 'GRD';
  const resolution = product === 'GRD' ? 'H' : '_';
  const orbit = String(parts.orbit ?? 35952).padStart(6, '0');
  return `${sensor}_${mode}_${product}${resolution}_1SDV_${parts.start}_${parts.stop}_${orbit}_${parts.datatake ?? '0436B3'}_${parts.unique ?? 'A5F2'}.SAFE`;
}

// ============================================================================
// Manifests
// ============================================================================

export interface ManifestParts {
  /** e.g. 2021-01-01T07:15:42.123456 */
  readonly processingStart?: string;
  readonly sliceNumber?: number;
  readonly totalSlices?: number;
  /** GML `lat,lon` pairs */
  readonly coordinates?: string;
  readonly pass?: 'ASCENDING' | 'DESCENDING';
  readonly relativeOrbit?: number;
}

export function manifestXml(parts: ManifestParts = {}): string {
  const slices =
    parts.sliceNumber === undefined
      ? ''
      : `<s1sarl1:sliceNumber>${parts.sliceNumber}</s1sarl1:sliceNumber>
              <s1sarl1:totalSlices>${parts.totalSlices ?? parts.sliceNumber}</s1sarl1:totalSlices>`;
  const relative =
    parts.relativeOrbit === undefined
      ? ''
      : `<safe:relativeOrbitNumber type="start">${parts.relativeOrbit}</safe:relativeOrbitNumber>`;

  return `<?xml version="1.0" encoding="UTF-8"?>
<xfdu:XFDU xmlns:xfdu="urn:ccsds:schema:xfdu:1" xmlns:safe="http://www.esa.int/safe/sentinel-1.0" xmlns:s1="http://www.esa.int/safe/sentinel-1.0/sentinel-1" xmlns:s1sarl1="http://www.esa.int/safe/sentinel-1.0/sentinel-1/sar/level-1" xmlns:gml="http://www.opengis.net/gml">
  <metadataSection>
    <metadataObject ID="processing" classification="PROCESSING" category="PDI">
      <metadataWrap mimeType="text/xml" vocabularyName="SAFE" textInfo="Processing">
        <xmlData>
          <safe:processing name="GRD Post Processing" start="${parts.processingStart ?? '2021-01-01T07:15:42.123456'}" stop="2021-01-01T07:20:01.000000">
            <safe:facility country="Germany" name="Copernicus S1 Core Ground Segment" organisation="ESA" site="DLR-Oberpfaffenhofen"/>
          </safe:processing>
        </xmlData>
      </metadataWrap>
    </metadataObject>
    <metadataObject ID="measurementOrbitReference" classification="DESCRIPTION" category="DMD">
      <metadataWrap mimeType="text/xml" vocabularyName="SAFE" textInfo="Orbit Reference">
        <xmlData>
          <safe:orbitReference>
            <safe:orbitNumber type="start">35952</safe:orbitNumber>
            ${relative}
            <safe:extension>
              <s1:orbitProperties>
                <s1:pass>${parts.pass ?? 'ASCENDING'}</s1:pass>
              </s1:orbitProperties>
            </safe:extension>
          </safe:orbitReference>
        </xmlData>
      </metadataWrap>
    </metadataObject>
    <metadataObject ID="generalProductInformation" classification="DESCRIPTION" category="DMD">
      <metadataWrap mimeType="text/xml" vocabularyName="SAFE" textInfo="General Product Information">
        <xmlData>
          <s1sarl1:standAloneProductInformation>
              ${slices}
          </s1sarl1:standAloneProductInformation>
        </xmlData>
      </metadataWrap>
    </metadataObject>
    <metadataObject ID="measurementFrameSet" classification="DESCRIPTION" category="DMD">
      <metadataWrap mimeType="text/xml" vocabularyName="SAFE" textInfo="Frame Set">
        <xmlData>
          <safe:frameSet>
            <safe:frame>
              <safe:footPrint srsName="http://www.opengis.net/gml/srs/epsg.xml#4326">
                <gml:coordinates>${parts.coordinates ?? '48.0,11.0 48.0,12.0 49.0,12.0 49.0,11.0'}</gml:coordinates>
              </safe:footPrint>
            </safe:frame>
          </safe:frameSet>
        </xmlData>
      </metadataWrap>
    </metadataObject>
  </metadataSection>
</xfdu:XFDU>
`;
}

// ============================================================================
// File system
// ============================================================================

export async function createTempDir(): Promise<string> {
  return realpathSync(await mkdtemp(join(tmpdir(), 'scene-search-')));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Create `<dir>/<name>/manifest.safe`
 *
 * @returns absolute path of the scene directory
 */
export async function writeSafeScene(dir: string, name: string, manifest: ManifestParts = {}): Promise<string> {
  const scene = join(dir, name);
  await mkdir(scene, { recursive: true });
  await writeFile(join(scene, 'manifest.safe'), manifestXml(manifest), 'utf-8');
  return scene;
}

// ============================================================================
// Scene records
// ============================================================================

function timestamp(value: string): Date {
  const date = parseTimestamp(value);
  if (date === null) {
    throw new Error(`bad fixture timestamp ${value}`);
  }
  return date;
}

export interface RecordParts extends Partial<Omit<SceneRecord, 'start' | 'stop'>> {
  readonly start: string;
  readonly stop: string;
}

/**
 * Scene record with defaults for everything but the acquisition window
 */
export function createRecord(parts: RecordParts): SceneRecord {
  const { start, stop, ...rest } = parts;
  return {
    scene: `/archive/${sceneName({ start, stop })}`,
    sensor: 'S1A',
    product: 'GRD',
    acquisitionMode: 'IW',
    orbit: 'A',
    orbitNumberAbs: 35952,
    orbitNumberRel: 117,
    frameNumber: 0x0436b3,
    sliceNumber: 2,
    totalSlices: 5,
    polarizations: ['VV', 'VH'],
    footprint: createSquarePolygon(11, 48, 1),
    ...rest,
    start: timestamp(start),
    stop: timestamp(stop),
  };
}
