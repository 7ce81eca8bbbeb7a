/**
 * Tile-driven scene selection
 *
 * Builds the processing work-list: the scenes to process and the tiles to
 * produce. The spatial constraint comes from one of three places:
 *
 * (a) explicit tile ids: one search per tile geometry, tiles returned as given
 * (b) an explicit AOI geometry: one search with the AOI, tiles derived from it
 * (c) neither: a two-phase search
 *     1. search with the remaining parameters only
 *     2. derive the tiles overlapping the phase-1 footprints and the time
 *        window [min start - 60s, max stop + 60s]
 *     3. one search per derived tile within that window
 *
 * Phase 2 widens the selection to the data-take neighbours of the phase-1
 * scenes, since those cover parts of the same tiles.
 *
 * Each step of (c) is exported on its own so it can be run and inspected
 * separately.
 */

import type { SceneCatalog } from '../catalog/catalog.js';
import { STRIPMAP_BEAMS, type AcquisitionMode, type SceneRecord, type SelectionResult, type Tile } from '../core/types.js';
import { mapWithConcurrency } from '../core/utils/concurrency.js';
import { createLogger } from '../core/utils/logger.js';
import { addSeconds } from '../geo/time.js';
import { VectorGeometry, WGS84 } from '../geo/vector.js';
import type { SceneQuery } from '../query/scene-query.js';
import type { SceneIdentifier } from '../scenes/identify.js';
import type { TileGrid } from '../tiles/tile-grid.js';

const log = createLogger({ module: 'scene-select' });

/** Margin added on both sides of the phase-1 acquisition window */
export const WINDOW_MARGIN_SECONDS = 60;

/**
 * Search parameters for a selection; the spatial filter is set per search
 */
export type SelectionQuery = Omit<SceneQuery, 'vectorobject'>;

export interface SceneSelectParams {
  readonly catalog: SceneCatalog;
  readonly tileGrid: TileGrid;
  readonly identifier: SceneIdentifier;
  readonly aoiTiles?: readonly string[];
  readonly aoiGeometry?: VectorGeometry;
  readonly query?: SelectionQuery;
  /** Fail on catalog entries missing on local storage (default: true) */
  readonly checkExist?: boolean;
  /** Searches in flight at once (default: 1) */
  readonly concurrency?: number;
}

export interface PhaseOneDerivation {
  readonly mindate: Date;
  readonly maxdate: Date;
  readonly tiles: readonly Tile[];
}

/**
 * Replace the stripmap mode `SM` by its six beams
 */
export function expandStripmap(query: SelectionQuery): SelectionQuery {
  const mode = query.acquisitionMode;
  if (mode === undefined) {
    return query;
  }
  const modes: readonly AcquisitionMode[] = typeof mode === 'string' ? [mode] : mode;
  if (!modes.includes('SM')) {
    return query;
  }
  return {
    ...query,
    acquisitionMode: modes.flatMap((m) => (m === 'SM' ? STRIPMAP_BEAMS : [m])),
  };
}

/**
 * Phase 1: unconstrained search, identified and sorted by start time.
 * Catalogs that return full records skip identification.
 */
export async function runPhase1(
  catalog: SceneCatalog,
  identifier: SceneIdentifier,
  query: SelectionQuery,
  checkExist = true
): Promise<SceneRecord[]> {
  if (catalog.selectRecords) {
    return catalog.selectRecords(query, { checkExist });
  }
  const scenes = await catalog.select(query, { checkExist });
  return scenes.length > 0 ? identifier.identify(scenes, 'start') : [];
}

/**
 * Phase 1 → phase 2: tiles overlapping the footprints and the widened
 * acquisition window
 *
 * @returns null when there is nothing to derive from
 */
export function deriveWindowAndTiles(
  records: readonly SceneRecord[],
  tileGrid: TileGrid
): PhaseOneDerivation | null {
  if (records.length === 0) {
    return null;
  }
  const start = Math.min(...records.map((r) => r.start.getTime()));
  const stop = Math.max(...records.map((r) => r.stop.getTime()));
  return {
    mindate: addSeconds(new Date(start), -WINDOW_MARGIN_SECONDS),
    maxdate: addSeconds(new Date(stop), WINDOW_MARGIN_SECONDS),
    tiles: tileGrid.tileFromAoi(records.map((r) => r.footprint)),
  };
}

/**
 * Phase 2 queries: one per derived tile, within the derived window
 */
export function buildPhase2Queries(query: SelectionQuery, derivation: PhaseOneDerivation): SceneQuery[] {
  return derivation.tiles.map((tile) => ({
    ...query,
    mindate: derivation.mindate,
    maxdate: derivation.maxdate,
    vectorobject: new VectorGeometry(tile.geometry),
  }));
}

/**
 * Union of several selections, de-duplicated and sorted
 */
export function mergeSelections(selections: readonly (readonly string[])[]): string[] {
  return [...new Set(selections.flat())].sort();
}

export async function sceneSelect(params: SceneSelectParams): Promise<SelectionResult> {
  const { catalog, tileGrid, identifier, aoiTiles, aoiGeometry } = params;
  const checkExist = params.checkExist ?? true;
  const query = expandStripmap(params.query ?? {});

  let searches: SceneQuery[];
  let tiles: string[];

  if (aoiTiles !== undefined) {
    searches = tileGrid
      .aoiFromTile(aoiTiles)
      .map((feature) => ({ ...query, vectorobject: new VectorGeometry(feature.geometry) }));
    tiles = [...aoiTiles];
  } else if (aoiGeometry !== undefined) {
    tiles = tileGrid.tileFromAoi([aoiGeometry.reproject(WGS84).geometry]).map((tile) => tile.id);
    searches = [{ ...query, vectorobject: aoiGeometry }];
  } else {
    const records = await runPhase1(catalog, identifier, query, checkExist);
    const derivation = deriveWindowAndTiles(records, tileGrid);
    if (derivation === null) {
      log.info('initial search returned no scenes');
      return { scenes: [], tiles: [] };
    }
    log.debug('phase 1 finished', {
      scenes: records.length,
      tiles: derivation.tiles.length,
      mindate: derivation.mindate.toISOString(),
      maxdate: derivation.maxdate.toISOString(),
    });
    tiles = derivation.tiles.map((tile) => tile.id);
    searches = buildPhase2Queries(query, derivation);
  }

  const selections = await mapWithConcurrency(searches, params.concurrency ?? 1, (search) =>
    catalog.select(search, { checkExist })
  );
  const scenes = mergeSelections(selections);
  log.info('selection finished', { searches: searches.length, scenes: scenes.length, tiles: tiles.length });
  return { scenes, tiles };
}
