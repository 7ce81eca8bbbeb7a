/**
 * CLI runtime context: configuration plus the services built from it
 *
 * @module cli/context
 */

import { AsfCatalog } from '../catalog/asf-catalog.js';
import type { CatalogKind, SceneCatalog } from '../catalog/catalog.js';
import { LocalCatalog } from '../catalog/local-catalog.js';
import { StacCatalog } from '../catalog/stac-catalog.js';
import { loadConfig, resolveConfigPath, type SceneSearchConfig } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import { logger, type LogLevel } from '../core/utils/logger.js';
import type { RetryConfig } from '../resilience/types.js';
import { GeoJsonTileGrid } from '../tiles/tile-grid.js';

/**
 * Options every command accepts
 */
export type GlobalOptions = {
  readonly config?: string;
  readonly catalog?: CatalogKind;
  readonly url?: string;
  readonly collections?: string;
  readonly database?: string;
  readonly grid?: string;
  readonly concurrency?: number;
  readonly timeout?: number;
  readonly maxAttempts?: number;
  readonly logLevel?: LogLevel;
  readonly verbose?: boolean;
};

export interface GlobalContext {
  readonly config: SceneSearchConfig;
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      catalogKind: options.catalog,
      catalogUrl: options.url,
      collections: options.collections?.split(',').map((c) => c.trim()),
      database: options.database,
      tileGrid: options.grid,
      concurrency: options.concurrency,
      timeoutMs: options.timeout,
      maxAttempts: options.maxAttempts,
      logLevel: options.verbose ? 'debug' : options.logLevel,
    },
  });

  logger.setLevel(config.log.level);
  logger.setPretty(config.log.pretty);

  globalContext = { config, startTime };
  return globalContext;
}

function retryPolicy(config: SceneSearchConfig): Partial<RetryConfig> {
  return { maxAttempts: config.retry.maxAttempts, delayMs: config.retry.delayMs };
}

/**
 * Primary catalog for the configured kind
 *
 * @throws ConfigurationError for a STAC catalog without URL
 */
export function createCatalog(config: SceneSearchConfig): SceneCatalog {
  const retry = retryPolicy(config);
  const http = new HTTPClient({ timeoutMs: config.http.timeoutMs });

  switch (config.catalog.kind) {
    case 'stac':
      if (config.catalog.url === null) {
        throw new ConfigurationError("catalog.url is required for catalog kind 'stac'");
      }
      return new StacCatalog(config.catalog.url, config.catalog.collections, {
        pageSize: config.catalog.pageSize,
        retry,
        http,
      });
    case 'sqlite':
      return new LocalCatalog(resolveConfigPath(config, config.catalog.database), { retry });
    case 'asf':
      return new AsfCatalog({ url: config.catalog.url ?? config.reference.url, retry, http });
  }
}

export function createReferenceCatalog(config: SceneSearchConfig): AsfCatalog {
  return new AsfCatalog({
    url: config.reference.url,
    retry: retryPolicy(config),
    http: new HTTPClient({ timeoutMs: config.http.timeoutMs }),
  });
}

/**
 * The local index regardless of the configured primary catalog
 */
export function createLocalCatalog(config: SceneSearchConfig): LocalCatalog {
  return new LocalCatalog(resolveConfigPath(config, config.catalog.database), {
    retry: retryPolicy(config),
  });
}

/**
 * @throws ConfigurationError when no grid is configured
 */
export async function loadTileGrid(config: SceneSearchConfig): Promise<GeoJsonTileGrid> {
  if (config.tiles.grid === null) {
    throw new ConfigurationError('no tile grid configured (tiles.grid or --grid)');
  }
  return GeoJsonTileGrid.fromFile(resolveConfigPath(config, config.tiles.grid), {
    idProperty: config.tiles.idProperty,
  });
}
