/**
 * CQL2-JSON Filter Translation Tests
 */

import { describe, it, expect } from 'vitest';
import { encodeDatatake, toCql2Filter } from '../../../query/cql2-filter.js';
import { normalizeQuery, type SceneQuery } from '../../../query/scene-query.js';
import { VectorGeometry } from '../../../geo/vector.js';
import { createSquarePolygon } from '../../utils/fixtures.js';

const filter = (query: SceneQuery) => toCql2Filter(normalizeQuery(query));

describe('toCql2Filter', () => {
  it('should produce an empty conjunction without clauses', () => {
    expect(filter({})).toEqual({ op: 'and', args: [] });
  });

  it('should map sensors to STAC platforms', () => {
    expect(filter({ sensor: 'S1A' })).toEqual({
      op: 'and',
      args: [{ op: '=', args: [{ property: 'platform' }, 'sentinel-1a'] }],
    });
  });

  it('should OR-combine multiple values of one field', () => {
    expect(filter({ sensor: ['S1A', 'S1B'], product: 'GRD' })).toEqual({
      op: 'and',
      args: [
        {
          op: 'or',
          args: [
            { op: '=', args: [{ property: 'platform' }, 'sentinel-1a'] },
            { op: '=', args: [{ property: 'platform' }, 'sentinel-1b'] },
          ],
        },
        { op: '=', args: [{ property: 'sar:product_type' }, 'GRD'] },
      ],
    });
  });

  it('should bind mindate to start and maxdate to end when strict', () => {
    expect(filter({ mindate: '20210101T000000', maxdate: '20210102T120000' }).args).toEqual([
      { op: '>=', args: [{ property: 'start_datetime' }, '20210101T000000'] },
      { op: '<=', args: [{ property: 'end_datetime' }, '20210102T120000'] },
    ]);
  });

  it('should swap the date bindings when not strict', () => {
    const query: SceneQuery = { mindate: '20210101T000000', maxdate: '20210102T120000', dateStrict: false };
    expect(filter(query).args).toEqual([
      { op: '>=', args: [{ property: 'end_datetime' }, '20210101T000000'] },
      { op: '<=', args: [{ property: 'start_datetime' }, '20210102T120000'] },
    ]);
  });

  it('should format Date values compactly', () => {
    const args = filter({ mindate: new Date(Date.UTC(2021, 0, 1, 5, 23, 18)) }).args;
    expect(args).toEqual([{ op: '>=', args: [{ property: 'start_datetime' }, '20210101T052318'] }]);
  });

  it('should encode data-take ids as 6-digit upper-case hex', () => {
    expect(filter({ frameNumber: 276147 }).args).toEqual([
      { op: '=', args: [{ property: 's1:datatake' }, '0436B3'] },
    ]);
  });

  it('should intersect with the bounding box of the geometry', () => {
    const triangle = new VectorGeometry({
      type: 'Polygon',
      coordinates: [
        [
          [10, 48],
          [12, 48],
          [11, 50],
          [10, 48],
        ],
      ],
    });

    expect(filter({ vectorobject: triangle }).args).toEqual([
      {
        op: 's_intersects',
        args: [
          { property: 'geometry' },
          {
            type: 'Polygon',
            coordinates: [
              [
                [10, 48],
                [10, 50],
                [12, 50],
                [12, 48],
                [10, 48],
              ],
            ],
          },
        ],
      },
    ]);
  });

  it('should keep field order: sensor, product, mode, dates, frame, geometry', () => {
    const args = filter({
      vectorobject: new VectorGeometry(createSquarePolygon(10, 48, 1)),
      frameNumber: 1,
      maxdate: '20210102T000000',
      acquisitionMode: 'IW',
      product: 'SLC',
      sensor: 'S1B',
    }).args;

    expect(args.map((clause) => clause.op)).toEqual(['=', '=', '=', '<=', '=', 's_intersects']);
  });
});

describe('encodeDatatake', () => {
  it('should pad and upper-case', () => {
    expect(encodeDatatake(0xabc)).toBe('000ABC');
    expect(encodeDatatake(0xffffff)).toBe('FFFFFF');
  });
});
