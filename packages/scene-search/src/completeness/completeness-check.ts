/**
 * Data-take completeness verification
 *
 * A data-take is cut into consecutive slices. Processing a tile needs every
 * slice overlapping it, so before processing each scene is checked for its
 * predecessor and successor in the primary catalog. A suspected gap is only
 * reported when the reference catalog (ASF) confirms that the neighbour
 * exists; gaps in the acquisition itself are no error.
 *
 * Boundaries of the data-take:
 * - sliced products know their position: slice 1 has no predecessor,
 *   slice N of N has no successor
 * - unsliced products (slice 0 or 0 slices) and products whose slicing is
 *   unknown (-1, as reported for ASF records) take their boundaries from the
 *   reference group: the earliest reference start has no predecessor, the
 *   latest reference stop no successor
 */

import { basename } from 'node:path';
import type { SceneCatalog } from '../catalog/catalog.js';
import { CompletenessError, type MissingNeighbors } from '../core/errors.js';
import type { SceneRecord } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { bufferTime } from '../geo/time.js';
import type { SceneQuery } from '../query/scene-query.js';
import type { AsfProperty } from '../catalog/asf-catalog.js';
import type { SceneIdentifier } from '../scenes/identify.js';
import { parseSceneName } from '../scenes/scene-name.js';

const log = createLogger({ module: 'completeness' });

/** Time buffer around a scene within which its neighbours overlap it */
export const NEIGHBOR_BUFFER_SECONDS = 2;

/** Scene plus predecessor plus successor */
const FULL_GROUP_SIZE = 3;

/**
 * The part of a reference catalog the verifier needs; AsfCatalog provides it
 */
export interface ReferenceCatalog {
  selectProperty(query: SceneQuery, property: AsfProperty): Promise<string[]>;
}

export interface CompletenessCheckParams {
  readonly primary: SceneCatalog;
  readonly reference: ReferenceCatalog;
  readonly identifier: SceneIdentifier;
  readonly scenes: readonly SceneRecord[];
}

interface TimeRange {
  readonly start: number;
  readonly stop: number;
}

function groupQuery(scene: SceneRecord, window: { start: Date; stop: Date }): SceneQuery {
  return {
    sensor: scene.sensor,
    product: scene.product,
    acquisitionMode: scene.acquisitionMode,
    mindate: window.start,
    maxdate: window.stop,
    dateStrict: false,
  };
}

/**
 * Start/stop span of the reference scenes overlapping the window
 *
 * @returns null when the reference catalog knows no scene there
 */
async function referenceRange(reference: ReferenceCatalog, query: SceneQuery): Promise<TimeRange | null> {
  const names = await reference.selectProperty(query, 'sceneName');
  const parsed = names.flatMap((name) => {
    const scene = parseSceneName(name);
    return scene ? [scene] : [];
  });
  if (parsed.length === 0) {
    return null;
  }
  return {
    start: Math.min(...parsed.map((s) => s.start.getTime())),
    stop: Math.max(...parsed.map((s) => s.stop.getTime())),
  };
}

async function primaryGroup(
  primary: SceneCatalog,
  identifier: SceneIdentifier,
  query: SceneQuery
): Promise<SceneRecord[]> {
  if (primary.selectRecords) {
    return primary.selectRecords(query);
  }
  const locations = await primary.select(query);
  return locations.length > 0 ? identifier.identify(locations) : [];
}

/**
 * Which neighbours of one scene are missing in the primary catalog but
 * present in the reference catalog
 */
export async function findMissingNeighbors(
  scene: SceneRecord,
  primary: SceneCatalog,
  reference: ReferenceCatalog,
  identifier: SceneIdentifier
): Promise<MissingNeighbors | null> {
  const window = bufferTime(scene.start, scene.stop, NEIGHBOR_BUFFER_SECONDS);
  const query = groupQuery(scene, window);

  let expectedSize = FULL_GROUP_SIZE;
  let hasPredecessor = true;
  let hasSuccessor = true;
  let ref: TimeRange | null | undefined;

  if (scene.sliceNumber <= 0 || scene.totalSlices <= 0) {
    ref = await referenceRange(reference, query);
    if (ref !== null && ref.start === scene.start.getTime()) {
      expectedSize--;
      hasPredecessor = false;
    }
    if (ref !== null && ref.stop === scene.stop.getTime()) {
      expectedSize--;
      hasSuccessor = false;
    }
  } else {
    if (scene.sliceNumber === 1) {
      expectedSize--;
      hasPredecessor = false;
    }
    if (scene.sliceNumber === scene.totalSlices) {
      expectedSize--;
      hasSuccessor = false;
    }
  }

  const group = await primaryGroup(primary, identifier, query);
  if (group.length >= expectedSize) {
    return null;
  }

  if (ref === undefined) {
    ref = await referenceRange(reference, query);
  }
  if (ref === null) {
    log.warn('reference catalog has no scenes for the group', { scene: basename(scene.scene) });
    return null;
  }

  // The scene itself counts even if the primary query did not return it
  const members = [...group, scene];
  const groupStart = Math.min(...members.map((r) => r.start.getTime()));
  const groupStop = Math.max(...members.map((r) => r.stop.getTime()));
  const bufferedStart = window.start.getTime();
  const bufferedStop = window.stop.getTime();

  const neighbors: ('predecessor' | 'successor')[] = [];
  if (hasPredecessor && ref.start < bufferedStart && bufferedStart < groupStart) {
    neighbors.push('predecessor');
  }
  if (hasSuccessor && groupStop < bufferedStop && bufferedStop < ref.stop) {
    neighbors.push('successor');
  }
  return neighbors.length > 0 ? { scene: basename(scene.scene), neighbors } : null;
}

/**
 * Verify that every scene's data-take neighbours are present
 *
 * @throws CompletenessError listing every scene with a confirmed missing neighbour
 */
export async function checkAcquisitionCompleteness(params: CompletenessCheckParams): Promise<void> {
  const { primary, reference, identifier, scenes } = params;
  const missing: MissingNeighbors[] = [];

  for (const scene of scenes) {
    const result = await findMissingNeighbors(scene, primary, reference, identifier);
    if (result !== null) {
      missing.push(result);
    }
  }

  if (missing.length > 0) {
    throw new CompletenessError(missing);
  }
  log.info('data-take completeness verified', { scenes: scenes.length });
}

/**
 * A scene's data-take neighbours in a catalog: everything overlapping the
 * scene's buffered acquisition window except the scene itself
 */
export async function collectNeighbors(catalog: SceneCatalog, scene: SceneRecord): Promise<string[]> {
  const window = bufferTime(scene.start, scene.stop, NEIGHBOR_BUFFER_SECONDS);
  const selection = await catalog.select(groupQuery(scene, window));
  return selection.filter((location) => location !== scene.scene);
}
