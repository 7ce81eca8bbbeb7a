/**
 * Local SQLite scene index
 *
 * Archive of identified scenes on local storage, searched with the same
 * query semantics as the STAC catalog (see toSqlFilter). Records carry full
 * scene metadata, so selectRecords() spares callers an identification pass.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3, one connection per instance
 * - Timestamps stored as `YYYYMMDDTHHMMSS` so comparisons are lexical
 * - Footprint stored as GeoJSON text plus its extent for the spatial filter
 */

import Database from 'better-sqlite3';
import { bbox } from '@turf/turf';
import { z } from 'zod';
import { CatalogRequestError, ConfigurationError } from '../core/errors.js';
import {
  ACQUISITION_MODES,
  PRODUCTS,
  SENSORS,
  type SceneRecord,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { formatCompact, parseTimestamp } from '../geo/time.js';
import { normalizeQuery, type SceneQuery, type SelectOptions } from '../query/scene-query.js';
import { toSqlFilter } from '../query/sql-filter.js';
import { createRetryExecutor, type RetryExecutor } from '../resilience/retry.js';
import type { RetryConfig } from '../resilience/types.js';
import type { SceneIdentifier } from '../scenes/identify.js';
import { filterDuplicates, type ProcessingTimeReader } from './duplicates.js';
import { resolveLocalPath, type SceneCatalog } from './catalog.js';

const log = createLogger({ module: 'local-catalog' });

export const SCHEMA = `
CREATE TABLE IF NOT EXISTS scenes (
  scene             TEXT PRIMARY KEY,
  sensor            TEXT NOT NULL,
  product           TEXT NOT NULL,
  acquisition_mode  TEXT NOT NULL,
  start             TEXT NOT NULL,
  stop              TEXT NOT NULL,
  orbit             TEXT NOT NULL,
  orbit_number_abs  INTEGER NOT NULL,
  orbit_number_rel  INTEGER NOT NULL,
  frame_number      INTEGER,
  slice_number      INTEGER NOT NULL,
  total_slices      INTEGER NOT NULL,
  polarizations     TEXT NOT NULL,
  footprint         TEXT NOT NULL,
  xmin              REAL NOT NULL,
  xmax              REAL NOT NULL,
  ymin              REAL NOT NULL,
  ymax              REAL NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_scenes_time ON scenes (start, stop);
CREATE INDEX IF NOT EXISTS idx_scenes_frame ON scenes (frame_number);
`;

const SceneRowSchema = z.object({
  scene: z.string(),
  sensor: z.enum(SENSORS),
  product: z.enum(PRODUCTS),
  acquisition_mode: z.enum(ACQUISITION_MODES),
  start: z.string(),
  stop: z.string(),
  orbit: z.enum(['A', 'D']),
  orbit_number_abs: z.number().int(),
  orbit_number_rel: z.number().int(),
  frame_number: z.number().int().nullable(),
  slice_number: z.number().int(),
  total_slices: z.number().int(),
  polarizations: z.string(),
  footprint: z.string(),
});

type SceneRow = z.infer<typeof SceneRowSchema>;

const PolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(z.array(z.array(z.number()).min(2)).min(4)).min(1),
});

export interface LocalCatalogOptions {
  /** Retry policy for SQLITE_BUSY / SQLITE_LOCKED (default: 300 attempts, 1s apart) */
  readonly retry?: Partial<RetryConfig>;
  readonly readProcessingTime?: ProcessingTimeReader;
}

function isBusyError(error: Error): boolean {
  const code = 'code' in error ? error.code : undefined;
  return code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED';
}

function rowToRecord(row: SceneRow): SceneRecord {
  const start = parseTimestamp(row.start);
  const stop = parseTimestamp(row.stop);
  const footprint = PolygonSchema.safeParse(JSON.parse(row.footprint));
  if (!start || !stop || !footprint.success) {
    throw new CatalogRequestError(`corrupt index row for ${row.scene}`, row.scene);
  }
  return {
    scene: row.scene,
    sensor: row.sensor,
    product: row.product,
    acquisitionMode: row.acquisition_mode,
    start,
    stop,
    orbit: row.orbit,
    orbitNumberAbs: row.orbit_number_abs,
    orbitNumberRel: row.orbit_number_rel,
    frameNumber: row.frame_number,
    sliceNumber: row.slice_number,
    totalSlices: row.total_slices,
    polarizations: row.polarizations.length > 0 ? row.polarizations.split(',') : [],
    footprint: footprint.data,
  };
}

export class LocalCatalog implements SceneCatalog {
  readonly kind = 'sqlite' as const;
  readonly url: string;

  private db: Database.Database | null = null;
  private readonly retry: RetryExecutor;
  private readonly readProcessingTime: ProcessingTimeReader | undefined;

  constructor(dbFile: string, options: LocalCatalogOptions = {}) {
    this.url = dbFile;
    this.retry = createRetryExecutor({ operation: 'sqlite', isTransient: isBusyError, ...options.retry });
    this.readProcessingTime = options.readProcessingTime;
  }

  static async open(dbFile: string, options?: LocalCatalogOptions): Promise<LocalCatalog> {
    const catalog = new LocalCatalog(dbFile, options);
    await catalog.open();
    return catalog;
  }

  async open(): Promise<void> {
    this.db = await this.retry.execute(async () => {
      const db = new Database(this.url);
      try {
        db.exec(SCHEMA);
      } catch (error) {
        db.close();
        throw error;
      }
      return db;
    });
    log.debug('index opened', { path: this.url });
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  /**
   * Insert or replace scene records
   *
   * @returns number of rows written
   */
  async insert(records: readonly SceneRecord[]): Promise<number> {
    const db = this.requireOpen();
    const statement = db.prepare(`
      INSERT OR REPLACE INTO scenes (
        scene, sensor, product, acquisition_mode, start, stop, orbit,
        orbit_number_abs, orbit_number_rel, frame_number, slice_number,
        total_slices, polarizations, footprint, xmin, xmax, ymin, ymax
      ) VALUES (
        @scene, @sensor, @product, @acquisitionMode, @start, @stop, @orbit,
        @orbitNumberAbs, @orbitNumberRel, @frameNumber, @sliceNumber,
        @totalSlices, @polarizations, @footprint, @xmin, @xmax, @ymin, @ymax
      )
    `);

    const insertAll = db.transaction((rows: readonly SceneRecord[]) => {
      for (const record of rows) {
        const [xmin, ymin, xmax, ymax] = bbox(record.footprint);
        statement.run({
          scene: record.scene,
          sensor: record.sensor,
          product: record.product,
          acquisitionMode: record.acquisitionMode,
          start: formatCompact(record.start),
          stop: formatCompact(record.stop),
          orbit: record.orbit,
          orbitNumberAbs: record.orbitNumberAbs,
          orbitNumberRel: record.orbitNumberRel,
          frameNumber: record.frameNumber,
          sliceNumber: record.sliceNumber,
          totalSlices: record.totalSlices,
          polarizations: record.polarizations.join(','),
          footprint: JSON.stringify(record.footprint),
          xmin,
          xmax,
          ymin,
          ymax,
        });
      }
    });

    await this.retry.execute(async () => insertAll(records));
    log.info('scenes indexed', { count: records.length });
    return records.length;
  }

  /**
   * Identify scene folders and add them to the index
   */
  async ingest(scenes: readonly string[], identifier: SceneIdentifier): Promise<number> {
    return this.insert(await identifier.identify(scenes));
  }

  async select(query: SceneQuery, options: SelectOptions = {}): Promise<string[]> {
    const rows = await this.queryRows(query);
    const checkExist = options.checkExist ?? true;
    return filterDuplicates(
      rows.map((row) => resolveLocalPath(row.scene, checkExist)),
      this.readProcessingTime
    );
  }

  async selectRecords(query: SceneQuery, options: SelectOptions = {}): Promise<SceneRecord[]> {
    const rows = await this.queryRows(query);
    const checkExist = options.checkExist ?? true;
    const byLocation = new Map<string, SceneRow>();
    for (const row of rows) {
      byLocation.set(resolveLocalPath(row.scene, checkExist), row);
    }
    const keep = await filterDuplicates([...byLocation.keys()], this.readProcessingTime);
    return keep.flatMap((location) => {
      const row = byLocation.get(location);
      return row ? [{ ...rowToRecord(row), scene: location }] : [];
    });
  }

  /**
   * Number of indexed scenes
   */
  size(): number {
    const row = this.requireOpen().prepare('SELECT COUNT(*) AS n FROM scenes').get();
    const parsed = z.object({ n: z.number() }).safeParse(row);
    return parsed.success ? parsed.data.n : 0;
  }

  private async queryRows(query: SceneQuery): Promise<SceneRow[]> {
    const db = this.requireOpen();
    const { where, params } = toSqlFilter(normalizeQuery(query));
    const sql = `SELECT * FROM scenes WHERE ${where} ORDER BY scene`;

    const raw = await this.retry.execute(async () => db.prepare(sql).all(...params));
    return raw.map((row) => {
      const parsed = SceneRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new CatalogRequestError(`corrupt index row: ${parsed.error.message}`, this.url);
      }
      return parsed.data;
    });
  }

  private requireOpen(): Database.Database {
    if (this.db === null) {
      throw new ConfigurationError(`catalog ${this.url} is not open`);
    }
    return this.db;
  }
}
