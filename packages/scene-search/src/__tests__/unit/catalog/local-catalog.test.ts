/**
 * Local SQLite Index Tests
 *
 * In-memory databases; one fresh index per test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { LocalCatalog } from '../../../catalog/local-catalog.js';
import { ConfigurationError, MissingLocalDataError } from '../../../core/errors.js';
import { VectorGeometry } from '../../../geo/vector.js';
import { createRecord, createSquarePolygon, createTempDir, removeTempDir, sceneName } from '../../utils/fixtures.js';
import { StubIdentifier } from '../../utils/mocks.js';

const A = createRecord({ start: '20210101T052300', stop: '20210101T052325' });
const B = createRecord({ start: '20210101T052320', stop: '20210101T052345', sliceNumber: 3 });
const C = createRecord({
  start: '20210101T052340',
  stop: '20210101T052405',
  sensor: 'S1B',
  product: 'SLC',
  footprint: createSquarePolygon(20, 10, 1),
});

describe('LocalCatalog', () => {
  let catalog: LocalCatalog;

  beforeEach(async () => {
    catalog = await LocalCatalog.open(':memory:');
    await catalog.insert([A, B, C]);
  });

  afterEach(async () => {
    await catalog.close();
  });

  it('should count inserted scenes and replace on re-insert', async () => {
    expect(catalog.size()).toBe(3);
    await catalog.insert([B]);
    expect(catalog.size()).toBe(3);
  });

  it('should return every scene for an empty query', async () => {
    await expect(catalog.select({}, { checkExist: false })).resolves.toEqual([A.scene, B.scene, C.scene].sort());
  });

  it('should filter attributes', async () => {
    await expect(catalog.select({ sensor: 'S1B' }, { checkExist: false })).resolves.toEqual([C.scene]);
    await expect(catalog.select({ product: ['GRD', 'OCN'] }, { checkExist: false })).resolves.toEqual(
      [A.scene, B.scene].sort()
    );
    await expect(catalog.select({ frameNumber: 1 }, { checkExist: false })).resolves.toEqual([]);
  });

  it('should apply strict and overlapping date semantics', async () => {
    const window = { mindate: '20210101T052320', maxdate: '20210101T052345' };

    const strict = await catalog.select(window, { checkExist: false });
    const overlapping = await catalog.select({ ...window, dateStrict: false }, { checkExist: false });

    expect(strict).toEqual([B.scene]);
    expect(overlapping).toEqual([A.scene, B.scene, C.scene].sort());
  });

  it('should never lose scenes when an overlapping window widens', async () => {
    const search = (widen: number) =>
      catalog.select(
        {
          mindate: new Date(Date.UTC(2021, 0, 1, 5, 23, 26 - widen)),
          maxdate: new Date(Date.UTC(2021, 0, 1, 5, 23, 39 + widen)),
          dateStrict: false,
        },
        { checkExist: false }
      );

    const narrow = await search(0);
    const touching = await search(1);
    const wide = await search(30);

    expect(narrow).toEqual([B.scene]);
    // A ends and C starts exactly on the widened edges
    expect(touching).toEqual([A.scene, B.scene, C.scene].sort());
    expect(touching).toEqual(expect.arrayContaining(narrow));
    expect(wide).toEqual(expect.arrayContaining(touching));
  });

  it('should filter by footprint extent', async () => {
    const query = { vectorobject: new VectorGeometry(createSquarePolygon(20.5, 10.5, 0.1)) };
    await expect(catalog.select(query, { checkExist: false })).resolves.toEqual([C.scene]);
  });

  it('should fail on scenes absent from local storage', async () => {
    await expect(catalog.select({ sensor: 'S1B' })).rejects.toThrow(MissingLocalDataError);
  });

  it('should refuse to work once closed', async () => {
    await catalog.close();
    expect(() => catalog.size()).toThrow(ConfigurationError);
    await expect(catalog.select({})).rejects.toThrow(`catalog :memory: is not open`);
  });
});

describe('LocalCatalog records', () => {
  let dir: string;
  let catalog: LocalCatalog;

  beforeEach(async () => {
    dir = await createTempDir();
    catalog = await LocalCatalog.open(':memory:');
  });

  afterEach(async () => {
    await catalog.close();
    await removeTempDir(dir);
  });

  it('should round-trip full records', async () => {
    const scene = join(dir, sceneName({ start: '20210101T052320', stop: '20210101T052345' }));
    await mkdir(scene);
    const record = createRecord({ start: '20210101T052320', stop: '20210101T052345', scene, frameNumber: null });
    await catalog.insert([record]);

    await expect(catalog.selectRecords({})).resolves.toEqual([record]);
  });

  it('should ingest through an identifier', async () => {
    const scene = join(dir, sceneName({ start: '20210101T052320', stop: '20210101T052345' }));
    await mkdir(scene);
    const identifier = new StubIdentifier([createRecord({ start: '20210101T052320', stop: '20210101T052345', scene })]);

    await expect(catalog.ingest([scene], identifier)).resolves.toBe(1);
    await expect(catalog.select({})).resolves.toEqual([scene]);
  });

  it('should keep the latest reprocessing among duplicates', async () => {
    const older = join(dir, sceneName({ start: '20210101T052320', stop: '20210101T052345', unique: 'AAAA' }));
    const newer = join(dir, sceneName({ start: '20210101T052320', stop: '20210101T052345', unique: 'BBBB' }));
    await mkdir(older);
    await mkdir(newer);
    await catalog.close();

    const times: Record<string, string> = { [older]: '2021-01-01T00:00:00Z', [newer]: '2021-02-01T00:00:00Z' };
    catalog = await LocalCatalog.open(':memory:', { readProcessingTime: async (scene) => new Date(times[scene]) });
    await catalog.insert([
      createRecord({ start: '20210101T052320', stop: '20210101T052345', scene: older }),
      createRecord({ start: '20210101T052320', stop: '20210101T052345', scene: newer }),
    ]);

    await expect(catalog.select({})).resolves.toEqual([newer]);
    const records = await catalog.selectRecords({});
    expect(records.map((r) => r.scene)).toEqual([newer]);
  });
});
