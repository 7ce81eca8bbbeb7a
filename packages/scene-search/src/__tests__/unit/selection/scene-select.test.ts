/**
 * Tile-Driven Selection Tests
 *
 * Grid: T1 and T2 side by side around 11°E, T3 far east.
 * Data-take: A → B → C consecutive slices, B overlapping both T1 and T2.
 */

import { describe, it, expect } from 'vitest';
import { LocalCatalog } from '../../../catalog/local-catalog.js';
import { ConfigurationError, MissingLocalDataError } from '../../../core/errors.js';
import { VectorGeometry } from '../../../geo/vector.js';
import {
  buildPhase2Queries,
  deriveWindowAndTiles,
  expandStripmap,
  mergeSelections,
  runPhase1,
  sceneSelect,
} from '../../../selection/scene-select.js';
import { GeoJsonTileGrid } from '../../../tiles/tile-grid.js';
import { createRecord, createSquarePolygon } from '../../utils/fixtures.js';
import { RecordStubCatalog, StubCatalog, StubIdentifier } from '../../utils/mocks.js';

const grid = new GeoJsonTileGrid([
  { id: 'T1', geometry: createSquarePolygon(10, 48, 1) },
  { id: 'T2', geometry: createSquarePolygon(11.5, 48, 1) },
  { id: 'T3', geometry: createSquarePolygon(20, 48, 1) },
]);

const A = createRecord({ start: '20210101T052300', stop: '20210101T052325', footprint: createSquarePolygon(10.2, 48.2, 0.5) });
const B = createRecord({ start: '20210101T052320', stop: '20210101T052345', footprint: createSquarePolygon(10.8, 48.2, 1) });
const C = createRecord({ start: '20210101T052340', stop: '20210101T052405', footprint: createSquarePolygon(11.9, 48.2, 0.3) });
const D = createRecord({ start: '20210105T052300', stop: '20210105T052325', footprint: createSquarePolygon(10.2, 48.2, 0.5) });
const E = createRecord({
  start: '20210101T052330',
  stop: '20210101T052355',
  product: 'SLC',
  scene: '/archive/slc/E.SAFE',
  footprint: createSquarePolygon(10.2, 48.2, 0.5),
});
const RECORDS = [A, B, C, D, E];

const phaseOneQuery = { product: 'GRD', mindate: '20210101T052320', maxdate: '20210101T052345' } as const;

function setup() {
  const catalog = new StubCatalog(RECORDS);
  const identifier = new StubIdentifier(RECORDS);
  return { catalog, identifier };
}

describe('expandStripmap', () => {
  it('should replace SM by the six stripmap beams', () => {
    expect(expandStripmap({ acquisitionMode: 'SM' }).acquisitionMode).toEqual(['S1', 'S2', 'S3', 'S4', 'S5', 'S6']);
    expect(expandStripmap({ acquisitionMode: ['IW', 'SM'] }).acquisitionMode).toEqual([
      'IW',
      'S1',
      'S2',
      'S3',
      'S4',
      'S5',
      'S6',
    ]);
  });

  it('should leave other queries untouched', () => {
    const query = { acquisitionMode: 'IW' } as const;
    expect(expandStripmap(query)).toBe(query);
    expect(expandStripmap({})).toEqual({});
  });
});

describe('two-phase steps', () => {
  it('should run phase 1 and sort by start', async () => {
    const { catalog, identifier } = setup();

    const records = await runPhase1(catalog, identifier, { product: 'GRD', mindate: '20210101T000000', maxdate: '20210102T000000' });

    expect(records).toEqual([A, B, C]);
  });

  it('should derive the widened window and the overlapping tiles', () => {
    const derivation = deriveWindowAndTiles([B], grid);

    expect(derivation?.mindate.toISOString()).toBe('2021-01-01T05:22:20.000Z');
    expect(derivation?.maxdate.toISOString()).toBe('2021-01-01T05:24:45.000Z');
    expect(derivation?.tiles.map((tile) => tile.id)).toEqual(['T1', 'T2']);
  });

  it('should derive nothing from nothing', () => {
    expect(deriveWindowAndTiles([], grid)).toBeNull();
  });

  it('should build one query per tile', () => {
    const derivation = deriveWindowAndTiles([A, C], grid);
    const queries = derivation ? buildPhase2Queries({ product: 'GRD' }, derivation) : [];

    expect(queries).toHaveLength(2);
    expect(queries[0]).toMatchObject({
      product: 'GRD',
      mindate: new Date(Date.UTC(2021, 0, 1, 5, 22, 0)),
      maxdate: new Date(Date.UTC(2021, 0, 1, 5, 25, 5)),
    });
    expect(queries.map((q) => q.vectorobject?.geometry)).toEqual([
      createSquarePolygon(10, 48, 1),
      createSquarePolygon(11.5, 48, 1),
    ]);
  });

  it('should merge selections without duplicates', () => {
    expect(mergeSelections([['/b', '/a'], ['/a', '/c'], []])).toEqual(['/a', '/b', '/c']);
  });
});

describe('sceneSelect', () => {
  it('should widen a phase-1 selection to the data-take neighbours on the derived tiles', async () => {
    const { catalog, identifier } = setup();

    const result = await sceneSelect({ catalog, tileGrid: grid, identifier, query: phaseOneQuery });

    expect(result).toEqual({ scenes: [A.scene, B.scene, C.scene], tiles: ['T1', 'T2'] });
    expect(catalog.queries).toHaveLength(3);
    expect(catalog.queries[1].mindate).toEqual(new Date(Date.UTC(2021, 0, 1, 5, 22, 20)));
    expect(catalog.queries[1].maxdate).toEqual(new Date(Date.UTC(2021, 0, 1, 5, 24, 45)));
  });

  it('should return an empty work-list when phase 1 finds nothing', async () => {
    const { catalog, identifier } = setup();

    const result = await sceneSelect({
      catalog,
      tileGrid: grid,
      identifier,
      query: { mindate: '20220101T000000', maxdate: '20220102T000000' },
    });

    expect(result).toEqual({ scenes: [], tiles: [] });
    expect(catalog.queries).toHaveLength(1);
    expect(identifier.calls).toBe(0);
  });

  it('should search the given tiles only', async () => {
    const { catalog, identifier } = setup();

    const result = await sceneSelect({
      catalog,
      tileGrid: grid,
      identifier,
      aoiTiles: ['T2'],
      query: { product: 'GRD' },
    });

    expect(result).toEqual({ scenes: [B.scene, C.scene], tiles: ['T2'] });
    expect(identifier.calls).toBe(0);
  });

  it('should return explicit tiles even without scenes', async () => {
    const { catalog, identifier } = setup();

    const result = await sceneSelect({ catalog, tileGrid: grid, identifier, aoiTiles: ['T3', 'T1'], query: { product: 'OCN' } });

    expect(result).toEqual({ scenes: [], tiles: ['T3', 'T1'] });
  });

  it('should reject unknown tile ids', async () => {
    const { catalog, identifier } = setup();

    await expect(sceneSelect({ catalog, tileGrid: grid, identifier, aoiTiles: ['T9'] })).rejects.toThrow(
      ConfigurationError
    );
  });

  it('should search an AOI geometry and derive its tiles', async () => {
    const { catalog, identifier } = setup();

    const result = await sceneSelect({
      catalog,
      tileGrid: grid,
      identifier,
      aoiGeometry: new VectorGeometry(createSquarePolygon(11.6, 48.3, 0.2)),
    });

    expect(result).toEqual({ scenes: [B.scene], tiles: ['T2'] });
    expect(catalog.queries).toHaveLength(1);
  });

  it('should give the same result on repeated runs and any concurrency', async () => {
    const { catalog, identifier } = setup();
    const params = { catalog, tileGrid: grid, identifier, query: phaseOneQuery };

    const first = await sceneSelect(params);
    const second = await sceneSelect(params);
    const parallel = await sceneSelect({ ...params, concurrency: 2 });

    expect(second).toEqual(first);
    expect(parallel).toEqual(first);
  });

  it('should use full records when the catalog provides them', async () => {
    const catalog = new RecordStubCatalog(RECORDS);
    const identifier = new StubIdentifier([]);

    const result = await sceneSelect({ catalog, tileGrid: grid, identifier, query: phaseOneQuery });

    expect(result.scenes).toEqual([A.scene, B.scene, C.scene]);
    expect(identifier.calls).toBe(0);
  });

  it('should pass the existence check setting to every search', async () => {
    const { catalog, identifier } = setup();

    await sceneSelect({ catalog, tileGrid: grid, identifier, aoiTiles: ['T1', 'T2'], checkExist: false });

    expect(catalog.selectOptions).toEqual([{ checkExist: false }, { checkExist: false }]);
  });

  it('should pass the existence check setting to the record search of phase 1', async () => {
    const catalog = new RecordStubCatalog(RECORDS);

    await sceneSelect({ catalog, tileGrid: grid, identifier: new StubIdentifier([]), query: phaseOneQuery, checkExist: false });

    expect(catalog.recordOptions).toEqual([{ checkExist: false }]);
    expect(catalog.selectOptions).toEqual([{ checkExist: false }, { checkExist: false }]);
  });
});

describe('sceneSelect over a local index', () => {
  it('should keep scenes missing on local storage through both phases when not checking', async () => {
    const catalog = await LocalCatalog.open(':memory:');
    await catalog.insert([A]);
    const params = { catalog, tileGrid: grid, identifier: new StubIdentifier([]) };

    try {
      await expect(sceneSelect({ ...params, checkExist: false })).resolves.toEqual({ scenes: [A.scene], tiles: ['T1'] });
      await expect(sceneSelect(params)).rejects.toThrow(MissingLocalDataError);
    } finally {
      await catalog.close();
    }
  });
});
