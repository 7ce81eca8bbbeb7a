/**
 * Sentinel-1 product name parsing
 *
 * S1A_IW_GRDH_1SDV_20210101T052318_20210101T052343_035952_0436B3_A5F2.SAFE
 * └┬┘ └┬┘ └┬┘└┤ ││└┤ └─────┬───────┘ └──────┬──────┘ └─┬──┘ └─┬──┘ └┬─┘
 * sensor beam product res level/class/pols  start   stop   orbit datatake id
 */

import { basename } from 'node:path';
import {
  ACQUISITION_MODES,
  PRODUCTS,
  SENSORS,
  type AcquisitionMode,
  type Product,
  type Sensor,
} from '../core/types.js';
import { parseTimestamp } from '../geo/time.js';

export const SCENE_NAME_PATTERN =
  /^(?<sensor>S1[ABCD])_(?<beam>IW|EW|WV|S[1-6])_(?<product>SLC|GRD|OCN|RAW)(?<resolution>[FHM_])_(?<level>[012])(?<category>[SA])(?<pols>SH|SV|DH|DV|HH|VV|HV|VH)_(?<start>\d{8}T\d{6})_(?<stop>\d{8}T\d{6})_(?<orbit>\d{6})_(?<datatake>[0-9A-F]{6})_(?<unique>[0-9A-F]{4})(?:\.SAFE)?$/;

/**
 * Instrument token (first 16 characters) plus start and stop: the identity
 * shared by reprocessed duplicates of one acquisition
 */
export const DUPLICATE_KEY_PATTERN = /([0-9A-Z_]{16})_([0-9T]{15})_([0-9T]{15})/;

export interface ParsedSceneName {
  readonly name: string;
  readonly sensor: Sensor;
  readonly acquisitionMode: AcquisitionMode;
  readonly product: Product;
  readonly polarizations: readonly string[];
  readonly start: Date;
  readonly stop: Date;
  readonly orbitNumberAbs: number;
  /** Data-take id in decimal representation */
  readonly frameNumber: number;
}

const POLARIZATIONS: Readonly<Record<string, readonly string[]>> = {
  SH: ['HH'],
  SV: ['VV'],
  DH: ['HH', 'HV'],
  DV: ['VV', 'VH'],
  HH: ['HH'],
  VV: ['VV'],
  HV: ['HV'],
  VH: ['VH'],
};

function isSensor(value: string): value is Sensor {
  return SENSORS.some((sensor) => sensor === value);
}

function isProduct(value: string): value is Product {
  return PRODUCTS.some((product) => product === value);
}

function isAcquisitionMode(value: string): value is AcquisitionMode {
  return ACQUISITION_MODES.some((mode) => mode === value);
}

/**
 * Parse a product name or location (basename is used; `.SAFE` optional)
 *
 * @returns null for anything that is not a Sentinel-1 product name
 */
export function parseSceneName(location: string): ParsedSceneName | null {
  const name = basename(location.replace(/\/+$/, ''));
  const groups = SCENE_NAME_PATTERN.exec(name)?.groups;
  if (!groups) {
    return null;
  }
  const { sensor, beam, product } = groups;
  if (!isSensor(sensor) || !isProduct(product) || !isAcquisitionMode(beam)) {
    return null;
  }
  const start = parseTimestamp(groups.start);
  const stop = parseTimestamp(groups.stop);
  if (!start || !stop || start > stop) {
    return null;
  }
  return {
    name,
    sensor,
    acquisitionMode: beam,
    product,
    polarizations: POLARIZATIONS[groups.pols] ?? [],
    start,
    stop,
    orbitNumberAbs: Number(groups.orbit),
    frameNumber: parseInt(groups.datatake, 16),
  };
}

/**
 * Key used to group reprocessing duplicates, or null when the basename
 * carries no instrument token/start/stop triple
 */
export function duplicateKey(location: string): string | null {
  const match = DUPLICATE_KEY_PATTERN.exec(basename(location));
  return match ? `${match[1]}_${match[2]}_${match[3]}` : null;
}

/**
 * Relative orbit from the absolute orbit, known for S1A and S1B only.
 * Repeat cycle is 175 orbits; offsets place orbit 1 at the cycle start.
 */
export function relativeOrbit(sensor: Sensor, orbitNumberAbs: number): number | null {
  switch (sensor) {
    case 'S1A':
      return ((orbitNumberAbs - 73) % 175 + 175) % 175 + 1;
    case 'S1B':
      return ((orbitNumberAbs - 27) % 175 + 175) % 175 + 1;
    default:
      return null;
  }
}
