/**
 * Scene Search Error Types
 *
 * Every failure raised by the catalog adapters, the selection engine and the
 * completeness verifier is a SceneSearchError subclass. The `code` field lets
 * the CLI map failures to exit codes without instanceof chains.
 *
 * PROPAGATION:
 * - TransientCatalogError is retried by the catalog adapters and only
 *   surfaces once the retry bound is exhausted
 * - Everything else propagates to the immediate caller unchanged
 */

export type SceneSearchErrorCode =
  | 'TRANSIENT_CATALOG'
  | 'CATALOG_REQUEST'
  | 'CONFIGURATION'
  | 'MISSING_LOCAL_DATA'
  | 'MANIFEST_READ'
  | 'SCENE_IDENTIFICATION'
  | 'COMPLETENESS';

/**
 * Base class for all scene search failures
 */
export abstract class SceneSearchError extends Error {
  abstract readonly code: SceneSearchErrorCode;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Backend API failure on open or search (HTTP 5xx/429, network failure, timeout)
 */
export class TransientCatalogError extends SceneSearchError {
  readonly code = 'TRANSIENT_CATALOG' as const;

  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Non-transient backend failure (HTTP 4xx other than 429, malformed response)
 */
export class CatalogRequestError extends SceneSearchError {
  readonly code = 'CATALOG_REQUEST' as const;

  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Invalid input shape: unsupported collection type, unknown sensor code,
 * malformed query, unknown tile id, invalid config file
 */
export class ConfigurationError extends SceneSearchError {
  readonly code = 'CONFIGURATION' as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A catalog references a scene that is absent on local storage
 */
export class MissingLocalDataError extends SceneSearchError {
  readonly code = 'MISSING_LOCAL_DATA' as const;

  constructor(public readonly path: string) {
    super(`scene does not exist locally: ${path}`);
  }
}

/**
 * A scene manifest could not be read or lacks a required element
 */
export class ManifestReadError extends SceneSearchError {
  readonly code = 'MANIFEST_READ' as const;

  constructor(
    message: string,
    public readonly scene: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A location whose name does not follow the Sentinel-1 product naming convention
 */
export class SceneIdentificationError extends SceneSearchError {
  readonly code = 'SCENE_IDENTIFICATION' as const;

  constructor(public readonly scene: string) {
    super(`unrecognized scene location: ${scene}`);
  }
}

/**
 * One affected scene in a completeness report
 */
export interface MissingNeighbors {
  readonly scene: string;
  readonly neighbors: readonly ('predecessor' | 'successor')[];
}

/**
 * One or more scenes miss a reference-confirmed data-take neighbour.
 * Raised once per check with every affected scene.
 */
export class CompletenessError extends SceneSearchError {
  readonly code = 'COMPLETENESS' as const;

  constructor(public readonly missing: readonly MissingNeighbors[]) {
    super(CompletenessError.formatReport(missing));
  }

  static formatReport(missing: readonly MissingNeighbors[]): string {
    const lines = missing.map(
      (entry) => `${entry.neighbors.join(' and ')} acquisition for scene ${entry.scene}`
    );
    return `missing the following scenes:\n - ${lines.join('\n - ')}`;
  }
}

/**
 * Normalize unknown thrown values
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
