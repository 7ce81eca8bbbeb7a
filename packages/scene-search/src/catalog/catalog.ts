/**
 * Scene catalog interface
 *
 * Uniform surface over the catalog backends:
 * - StacCatalog   (remote STAC API, primary archive)
 * - LocalCatalog  (SQLite scene index on local storage)
 * - AsfCatalog    (ASF search API, reference for completeness checks)
 *
 * The selection engine and the completeness verifier depend on this
 * interface only, never on a concrete backend.
 */

import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { MissingLocalDataError } from '../core/errors.js';
import type { SceneRecord } from '../core/types.js';
import type { SceneQuery, SelectOptions } from '../query/scene-query.js';

export type CatalogKind = 'stac' | 'sqlite' | 'asf';

export interface SceneCatalog {
  readonly kind: CatalogKind;
  /** Endpoint URL or database path */
  readonly url: string;

  /** Acquire the connection; retried on transient failure */
  open(): Promise<void>;

  /**
   * Ordered, de-duplicated scene locations matching the query
   *
   * @throws MissingLocalDataError when checkExist is set and a location is absent
   */
  select(query: SceneQuery, options?: SelectOptions): Promise<string[]>;

  /**
   * Backends whose results already carry full scene metadata expose it here,
   * sparing callers an identification pass
   *
   * @throws MissingLocalDataError when checkExist is set and a location is absent
   */
  selectRecords?(query: SceneQuery, options?: SelectOptions): Promise<SceneRecord[]>;

  /** Release the connection; the catalog is unusable afterwards */
  close(): Promise<void>;
}

/**
 * Scoped acquisition: open, run, close (also on failure)
 *
 * @example
 * ```typescript
 * const result = await withCatalog(new StacCatalog(url, 'sentinel-1'), (catalog) =>
 *   sceneSelect({ catalog, tileGrid, identifier, query })
 * );
 * ```
 */
export async function withCatalog<C extends SceneCatalog, T>(
  catalog: C,
  fn: (catalog: C) => Promise<T>
): Promise<T> {
  await catalog.open();
  try {
    return await fn(catalog);
  } finally {
    await catalog.close();
  }
}

/**
 * Canonical .SAFE container path from an asset href: cut after `.SAFE`,
 * strip a `file://` scheme
 *
 * @returns null when the href points into no .SAFE container
 */
export function safePathFromHref(href: string): string | null {
  const match = /\.SAFE/.exec(href);
  if (!match) {
    return null;
  }
  return href.slice(0, match.index + match[0].length).replace(/^file:\/\//, '');
}

/**
 * Resolve a catalog location on local storage. Existing paths become
 * absolute real paths; missing ones fail under checkExist and are
 * otherwise returned as given.
 */
export function resolveLocalPath(path: string, checkExist: boolean): string {
  try {
    return realpathSync(resolve(path));
  } catch {
    if (checkExist) {
      throw new MissingLocalDataError(path);
    }
    return path;
  }
}
