/**
 * Sentinel-1 scene search
 *
 * Catalog adapters (STAC, SQLite, ASF), tile-driven scene selection and
 * data-take completeness verification.
 *
 * @example
 * ```typescript
 * import { StacCatalog, GeoJsonTileGrid, SafeSceneIdentifier, sceneSelect, withCatalog } from '@sentinel-ard/scene-search';
 *
 * const tileGrid = await GeoJsonTileGrid.fromFile('grid.geojson');
 * const { scenes, tiles } = await withCatalog(new StacCatalog(url, 'sentinel-1'), (catalog) =>
 *   sceneSelect({
 *     catalog,
 *     tileGrid,
 *     identifier: new SafeSceneIdentifier(),
 *     aoiTiles: ['32TNS'],
 *     query: { sensor: 'S1A', product: 'GRD', acquisitionMode: 'IW' },
 *   })
 * );
 * ```
 *
 * @packageDocumentation
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export { Logger, logger, createLogger, parseLogLevel, type LogLevel, type LogMetadata } from './core/utils/logger.js';
export { mapWithConcurrency } from './core/utils/concurrency.js';
export { HTTPClient, isTransientStatus, type HTTPClientConfig, type RequestOptions } from './core/http-client.js';
export {
  loadConfig,
  findConfigFile,
  resolveConfigPath,
  ConfigSchema,
  DEFAULT_CONFIG,
  type SceneSearchConfig,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './core/config.js';

// Resilience
export * from './resilience/retry.js';
export type * from './resilience/types.js';

// Geometry and time
export * from './geo/time.js';
export * from './geo/vector.js';

// Queries
export * from './query/scene-query.js';
export * from './query/cql2-filter.js';
export * from './query/sql-filter.js';

// Scenes
export * from './scenes/scene-name.js';
export * from './scenes/manifest.js';
export * from './scenes/identify.js';

// Catalogs
export * from './catalog/catalog.js';
export * from './catalog/duplicates.js';
export * from './catalog/stac-catalog.js';
export * from './catalog/local-catalog.js';
export * from './catalog/asf-catalog.js';

// Tiles, selection, completeness
export * from './tiles/tile-grid.js';
export * from './selection/scene-select.js';
export * from './completeness/completeness-check.js';
