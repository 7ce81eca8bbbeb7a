/**
 * Query → SQL where clause translation for the local scene index
 *
 * Same semantics as the CQL2 translation: AND across fields, OR across the
 * values of one field, date strictness swapping the start/stop bindings.
 * Timestamps are stored as `YYYYMMDDTHHMMSS`, which compares lexically.
 * The spatial filter is a bounding-box overlap on the stored extent columns.
 */

import { formatCompact } from '../geo/time.js';
import { WGS84 } from '../geo/vector.js';
import type { NormalizedQuery } from './scene-query.js';

export type SqlParam = string | number;

export interface SqlFilter {
  /** Where clause without the WHERE keyword; `1 = 1` when nothing filters */
  readonly where: string;
  readonly params: readonly SqlParam[];
}

function inList(column: string, values: readonly SqlParam[]): { sql: string; params: SqlParam[] } {
  if (values.length === 1) {
    return { sql: `${column} = ?`, params: [values[0]] };
  }
  return { sql: `${column} IN (${values.map(() => '?').join(', ')})`, params: [...values] };
}

export function toSqlFilter(query: NormalizedQuery): SqlFilter {
  const clauses: string[] = [];
  const params: SqlParam[] = [];

  const add = (sql: string, values: readonly SqlParam[]): void => {
    clauses.push(sql);
    params.push(...values);
  };

  for (const [column, values] of [
    ['sensor', query.sensor],
    ['product', query.product],
    ['acquisition_mode', query.acquisitionMode],
    ['frame_number', query.frameNumber],
  ] as const) {
    if (values) {
      const clause = inList(column, values);
      add(clause.sql, clause.params);
    }
  }

  if (query.mindate) {
    add(query.dateStrict ? 'start >= ?' : 'stop >= ?', [formatCompact(query.mindate)]);
  }
  if (query.maxdate) {
    add(query.dateStrict ? 'stop <= ?' : 'start <= ?', [formatCompact(query.maxdate)]);
  }
  if (query.vectorobject) {
    const { xmin, xmax, ymin, ymax } = query.vectorobject.reproject(WGS84).extent;
    add('xmin <= ? AND xmax >= ? AND ymin <= ? AND ymax >= ?', [xmax, xmin, ymax, ymin]);
  }

  return {
    where: clauses.length > 0 ? clauses.join(' AND ') : '1 = 1',
    params,
  };
}
