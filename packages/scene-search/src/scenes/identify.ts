/**
 * Scene identification service
 *
 * Turns scene locations into SceneRecords. The selection engine and the
 * completeness verifier depend on the SceneIdentifier interface only;
 * SafeSceneIdentifier is the implementation for unpacked .SAFE directories.
 */

import { resolve } from 'node:path';
import { SceneIdentificationError } from '../core/errors.js';
import type { SceneRecord } from '../core/types.js';
import { parseManifest, readManifest } from './manifest.js';
import { parseSceneName, relativeOrbit } from './scene-name.js';

export type SceneSortKey = 'start' | 'stop' | 'scene';

export interface SceneIdentifier {
  /**
   * Identify scenes, sorted by `sortKey` (default `start`, ties by location)
   *
   * @throws SceneIdentificationError for an unrecognized location
   */
  identify(scenes: readonly string[], sortKey?: SceneSortKey): Promise<SceneRecord[]>;
}

/**
 * Order records by one key, falling back to the location so the order is total
 */
export function sortScenes(records: readonly SceneRecord[], sortKey: SceneSortKey = 'start'): SceneRecord[] {
  const value = (record: SceneRecord): number | string =>
    sortKey === 'scene' ? record.scene : record[sortKey].getTime();

  return [...records].sort((a, b) => {
    const va = value(a);
    const vb = value(b);
    if (va !== vb) {
      return va < vb ? -1 : 1;
    }
    return a.scene < b.scene ? -1 : a.scene > b.scene ? 1 : 0;
  });
}

export class SafeSceneIdentifier implements SceneIdentifier {
  async identify(scenes: readonly string[], sortKey: SceneSortKey = 'start'): Promise<SceneRecord[]> {
    const records: SceneRecord[] = [];
    for (const scene of scenes) {
      records.push(await this.identifyOne(scene));
    }
    return sortScenes(records, sortKey);
  }

  async identifyOne(location: string): Promise<SceneRecord> {
    const parsed = parseSceneName(location);
    if (!parsed) {
      throw new SceneIdentificationError(location);
    }
    const scene = resolve(location);
    const manifest = parseManifest(await readManifest(scene), scene);

    return {
      scene,
      sensor: parsed.sensor,
      product: parsed.product,
      acquisitionMode: parsed.acquisitionMode,
      start: parsed.start,
      stop: parsed.stop,
      orbit: manifest.orbit,
      orbitNumberAbs: parsed.orbitNumberAbs,
      orbitNumberRel:
        manifest.orbitNumberRel ?? relativeOrbit(parsed.sensor, parsed.orbitNumberAbs) ?? -1,
      frameNumber: parsed.frameNumber,
      sliceNumber: manifest.sliceNumber,
      totalSlices: manifest.totalSlices,
      polarizations: parsed.polarizations,
      footprint: manifest.footprint,
    };
  }
}
