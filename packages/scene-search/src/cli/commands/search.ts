/**
 * Search Command
 *
 * Select the scenes and target tiles of a processing run.
 *
 * Usage:
 *   scene-search search [options]
 *
 * Examples:
 *   scene-search search --sensor S1A --product GRD --mode IW --tiles 32TNS,32TNT
 *   scene-search search --aoi area.geojson --mindate 20210101T000000 --maxdate 20210201T000000
 *   scene-search search --frame 0436B3 --json
 */

import type { Command } from 'commander';
import { withCatalog } from '../../catalog/catalog.js';
import { ConfigurationError } from '../../core/errors.js';
import type { SelectionResult } from '../../core/types.js';
import { SafeSceneIdentifier } from '../../scenes/identify.js';
import { sceneSelect } from '../../selection/scene-select.js';
import { createCatalog, getGlobalContext, loadTileGrid } from '../context.js';
import { loadAoiGeometry, parseQueryOptions, type QueryOptions } from '../query-options.js';

export interface SearchOptions extends QueryOptions {
  readonly tiles?: string;
  readonly aoi?: string;
  readonly aoiCrs: string;
  /** false for --no-check-exist */
  readonly checkExist?: boolean;
  readonly json?: boolean;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Select scenes and target tiles for processing')
    .option('--sensor <codes>', 'Sensor(s): S1A,S1B,S1C,S1D')
    .option('--product <codes>', 'Product type(s): GRD,SLC,OCN,RAW')
    .option('--mode <modes>', 'Acquisition mode(s): IW,EW,WV,SM,S1..S6')
    .option('--mindate <date>', 'Minimum acquisition time (YYYYMMDDTHHMMSS or ISO 8601)')
    .option('--maxdate <date>', 'Maximum acquisition time (YYYYMMDDTHHMMSS or ISO 8601)')
    .option('--no-date-strict', 'Accept acquisitions that merely overlap the date window')
    .option('--frame <ids>', 'Data-take id(s), hexadecimal')
    .option('--tiles <ids>', 'Tile ids to process (comma-separated)')
    .option('--aoi <file>', 'GeoJSON file with the area of interest')
    .option('--aoi-crs <crs>', 'Coordinate reference system of the AOI file', 'EPSG:4326')
    .option('--no-check-exist', 'Keep catalog entries missing on local storage')
    .option('--json', 'Output as JSON')
    .action(async (options: SearchOptions) => {
      const result = await executeSearch(options);
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(`Tiles (${result.tiles.length}): ${result.tiles.join(' ')}`);
        console.log(`Scenes (${result.scenes.length}):`);
        for (const scene of result.scenes) {
          console.log(`  ${scene}`);
        }
      }
    });
}

export async function executeSearch(options: SearchOptions): Promise<SelectionResult> {
  const { config } = getGlobalContext();
  if (options.tiles !== undefined && options.aoi !== undefined) {
    throw new ConfigurationError('--tiles and --aoi are mutually exclusive');
  }

  const query = parseQueryOptions(options);
  const tileGrid = await loadTileGrid(config);
  const aoiTiles = options.tiles
    ?.split(',')
    .map((tile) => tile.trim())
    .filter((tile) => tile.length > 0);
  const aoiGeometry = options.aoi ? await loadAoiGeometry(options.aoi, options.aoiCrs) : undefined;

  return withCatalog(createCatalog(config), (catalog) =>
    sceneSelect({
      catalog,
      tileGrid,
      identifier: new SafeSceneIdentifier(),
      aoiTiles,
      aoiGeometry,
      query,
      checkExist: options.checkExist === false ? false : config.search.checkExist,
      concurrency: config.search.concurrency,
    })
  );
}
