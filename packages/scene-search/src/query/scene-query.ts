/**
 * Scene query value
 *
 * Callers build a SceneQuery with named optional fields; adapters never see
 * it raw. normalizeQuery() validates it once with zod and hands back a
 * NormalizedQuery (lists instead of scalars, Dates instead of strings),
 * which is what the filter translators consume.
 */

import { z } from 'zod';
import {
  ACQUISITION_MODES,
  PRODUCTS,
  SENSORS,
  type AcquisitionMode,
  type Product,
  type Sensor,
} from '../core/types.js';
import { ConfigurationError } from '../core/errors.js';
import { parseTimestamp } from '../geo/time.js';
import { VectorGeometry } from '../geo/vector.js';

export interface SceneQuery {
  readonly sensor?: Sensor | readonly Sensor[];
  readonly product?: Product | readonly Product[];
  readonly acquisitionMode?: AcquisitionMode | readonly AcquisitionMode[];
  /** Minimum acquisition date (Date, `YYYYMMDDTHHMMSS` or ISO 8601) */
  readonly mindate?: Date | string;
  /** Maximum acquisition date (Date, `YYYYMMDDTHHMMSS` or ISO 8601) */
  readonly maxdate?: Date | string;
  /**
   * - strict (default): start >= mindate and stop <= maxdate
   * - not strict: stop >= mindate and start <= maxdate, so acquisitions
   *   merely overlapping the window qualify
   */
  readonly dateStrict?: boolean;
  /** Data-take id(s) in decimal representation */
  readonly frameNumber?: number | readonly number[];
  /** Geometry the scenes need to overlap */
  readonly vectorobject?: VectorGeometry;
}

export interface NormalizedQuery {
  readonly sensor: readonly Sensor[] | null;
  readonly product: readonly Product[] | null;
  readonly acquisitionMode: readonly AcquisitionMode[] | null;
  readonly mindate: Date | null;
  readonly maxdate: Date | null;
  readonly dateStrict: boolean;
  readonly frameNumber: readonly number[] | null;
  readonly vectorobject: VectorGeometry | null;
}

/**
 * Options that shape how a catalog resolves its results, not which scenes match
 */
export interface SelectOptions {
  /** Fail when a referenced scene is absent on local storage (default: true) */
  readonly checkExist?: boolean;
}

function toList<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value];
}

function oneOrMany<T extends z.ZodTypeAny>(item: T) {
  return z.union([item, z.array(item).min(1)]).transform((value) => toList<z.output<T>>(value));
}

const dateValue = z.union([z.date(), z.string()]).transform((value, ctx) => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid date' });
      return z.NEVER;
    }
    return value;
  }
  const parsed = parseTimestamp(value);
  if (parsed === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid date '${value}' (expected YYYYMMDDTHHMMSS or ISO 8601)`,
    });
    return z.NEVER;
  }
  return parsed;
});

export const SceneQuerySchema = z
  .object({
    sensor: oneOrMany(z.enum(SENSORS)).optional(),
    product: oneOrMany(z.enum(PRODUCTS)).optional(),
    acquisitionMode: oneOrMany(z.enum(ACQUISITION_MODES)).optional(),
    mindate: dateValue.optional(),
    maxdate: dateValue.optional(),
    dateStrict: z.boolean().default(true),
    frameNumber: oneOrMany(z.number().int().min(0).max(0xffffff)).optional(),
    vectorobject: z
      .instanceof(VectorGeometry, { message: 'unsupported spatial filter type; expected VectorGeometry' })
      .optional(),
  })
  .strict()
  .refine((q) => !q.mindate || !q.maxdate || q.mindate.getTime() <= q.maxdate.getTime(), {
    message: 'mindate is later than maxdate',
    path: ['maxdate'],
  });

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate and normalize a query
 *
 * @throws ConfigurationError for any invalid field or unknown key
 */
export function normalizeQuery(query: SceneQuery | unknown): NormalizedQuery {
  const result = SceneQuerySchema.safeParse(query ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`invalid scene query: ${issues.join('; ')}`, issues);
  }
  const q = result.data;
  return {
    sensor: q.sensor ?? null,
    product: q.product ?? null,
    acquisitionMode: q.acquisitionMode ?? null,
    mindate: q.mindate ?? null,
    maxdate: q.maxdate ?? null,
    dateStrict: q.dateStrict,
    frameNumber: q.frameNumber ?? null,
    vectorobject: q.vectorobject ?? null,
  };
}
