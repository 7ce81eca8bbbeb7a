/**
 * ASF Reference Catalog Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ASF_SEARCH_URL,
  AsfCatalog,
  AsfScene,
  asfSearchParams,
  asfSelect,
} from '../../../catalog/asf-catalog.js';
import { CatalogRequestError, ConfigurationError } from '../../../core/errors.js';
import { VectorGeometry } from '../../../geo/vector.js';
import { normalizeQuery } from '../../../query/scene-query.js';
import { createFetchMock, jsonResponse } from '../../utils/mocks.js';
import { createSquarePolygon, sceneName } from '../../utils/fixtures.js';

function feature(start: string, stop: string, overrides: Record<string, string | number | null> = {}) {
  const name = sceneName({ start, stop }).replace('.SAFE', '');
  const iso = (t: string) => `${t.slice(0, 4)}-${t.slice(4, 6)}-${t.slice(6, 8)}T${t.slice(9, 11)}:${t.slice(11, 13)}:${t.slice(13, 15)}.000000`;
  return {
    type: 'Feature',
    geometry: createSquarePolygon(11, 48, 1),
    properties: {
      sceneName: name,
      fileID: `${name}-GRD_HD`,
      url: `https://datapool.example.org/GRD_HD/SA/${name}.zip`,
      processingLevel: 'GRD_HD',
      beamModeType: 'IW',
      platform: 'Sentinel-1A',
      startTime: iso(start),
      stopTime: iso(stop),
      flightDirection: 'ASCENDING',
      orbit: 35952,
      pathNumber: 117,
      polarization: 'VV+VH',
      ...overrides,
    },
  };
}

const collection = (...features: unknown[]) => ({ type: 'FeatureCollection', features });

const early = feature('20210101T052300', '20210101T052325');
const middle = feature('20210101T052320', '20210101T052345');
const late = feature('20210101T052340', '20210101T052405');

describe('asfSearchParams', () => {
  it('should translate every supported field', () => {
    const params = asfSearchParams(
      normalizeQuery({
        sensor: ['S1A', 'S1B'],
        product: 'GRD',
        acquisitionMode: ['IW', 'SM'],
        mindate: '20210101T052318',
        maxdate: '20210101T052343',
        vectorobject: new VectorGeometry(createSquarePolygon(10, 48, 1)),
      })
    );

    expect(Object.fromEntries(params)).toEqual({
      output: 'geojson',
      platform: 'Sentinel-1A,Sentinel-1B',
      processingLevel: 'GRD_HD,GRD_MD,GRD_MS,GRD_HS,GRD_FD',
      beamMode: 'IW,S1,S2,S3,S4,S5,S6',
      start: '2021-01-01T05:23:18.000Z',
      end: '2021-01-01T05:23:43.000Z',
      intersectsWith: 'POLYGON ((10 48, 11 48, 11 49, 10 49, 10 48))',
    });
  });

  it('should refuse data-take filters', () => {
    expect(() => asfSearchParams(normalizeQuery({ frameNumber: 276147 }))).toThrow(ConfigurationError);
  });
});

describe('asfSelect', () => {
  let fetchMock: ReturnType<typeof createFetchMock>;

  beforeEach(() => {
    fetchMock = createFetchMock();
  });

  it('should return sorted URLs by default', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(collection(middle, early)));

    const urls = await asfSelect({});

    expect(urls).toEqual([early.properties.url, middle.properties.url]);
    expect(fetchMock.mock.calls[0][0]).toBe(`${ASF_SEARCH_URL}?output=geojson`);
  });

  it('should return one property or property tuples', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(collection(middle, early)))
      .mockResolvedValueOnce(jsonResponse(collection(middle, early)));

    await expect(asfSelect({}, 'sceneName')).resolves.toEqual([
      early.properties.sceneName,
      middle.properties.sceneName,
    ]);
    await expect(asfSelect({}, ['sceneName', 'orbit'])).resolves.toEqual([
      [early.properties.sceneName, '35952'],
      [middle.properties.sceneName, '35952'],
    ]);
  });

  it('should build scene records', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(collection(early)));

    const [scene] = await asfSelect({}, AsfScene);

    expect(scene).toBeInstanceOf(AsfScene);
    expect(scene).toMatchObject({
      scene: early.properties.url,
      sensor: 'S1A',
      product: 'GRD',
      acquisitionMode: 'IW',
      start: new Date(Date.UTC(2021, 0, 1, 5, 23, 0)),
      stop: new Date(Date.UTC(2021, 0, 1, 5, 23, 25)),
      orbit: 'A',
      orbitNumberAbs: 35952,
      orbitNumberRel: 117,
      frameNumber: 276147,
      sliceNumber: -1,
      totalSlices: -1,
      polarizations: ['VV', 'VH'],
    });
  });

  it('should apply strict dates client-side', async () => {
    fetchMock.mockImplementation(async () => jsonResponse(collection(early, middle, late)));
    const window = { mindate: '20210101T052320', maxdate: '20210101T052345' };

    const strict = await asfSelect(window, 'sceneName');
    const overlapping = await asfSelect({ ...window, dateStrict: false }, 'sceneName');

    expect(strict).toEqual([middle.properties.sceneName]);
    expect(overlapping).toHaveLength(3);
  });

  it('should reject malformed responses', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ results: [] }));
    await expect(asfSelect({})).rejects.toThrow(CatalogRequestError);
  });

  it('should report features without the requested property', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(collection(feature('20210101T052300', '20210101T052325', { url: null }))));
    await expect(asfSelect({})).rejects.toThrow("ASF feature lacks property 'url'");
  });
});

describe('AsfCatalog', () => {
  let fetchMock: ReturnType<typeof createFetchMock>;

  beforeEach(() => {
    fetchMock = createFetchMock();
  });

  it('should search a configured endpoint', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(collection(early, early)));
    const catalog = new AsfCatalog({ url: 'https://asf.example.org/search' });

    await catalog.open();
    await expect(catalog.select({ sensor: 'S1A' })).resolves.toEqual([early.properties.url]);
    await catalog.close();

    expect(fetchMock.mock.calls[0][0]).toBe('https://asf.example.org/search?output=geojson&platform=Sentinel-1A');
  });

  it('should return sorted records and property values', async () => {
    fetchMock.mockImplementation(async () => jsonResponse(collection(late, early)));
    const catalog = new AsfCatalog();

    const records = await catalog.selectRecords({});
    const names = await catalog.selectProperty({}, 'sceneName');

    expect(records.map((r) => r.scene)).toEqual([early.properties.url, late.properties.url]);
    expect(names).toEqual([early.properties.sceneName, late.properties.sceneName]);
  });

  it('should retry transient failures', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, 429))
      .mockResolvedValueOnce(jsonResponse(collection(early)));
    const catalog = new AsfCatalog({ retry: { delayMs: 0 } });

    await expect(catalog.selectProperty({}, 'fileID')).resolves.toEqual([early.properties.fileID]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
