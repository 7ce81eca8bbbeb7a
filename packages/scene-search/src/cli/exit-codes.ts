/**
 * CLI exit codes
 *
 * @module cli/exit-codes
 */

import { SceneSearchError } from '../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for a failed command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (!(error instanceof SceneSearchError)) {
    return EXIT_CODES.ERRORS;
  }
  switch (error.code) {
    case 'CONFIGURATION':
      return EXIT_CODES.CONFIG_ERROR;
    case 'TRANSIENT_CATALOG':
    case 'CATALOG_REQUEST':
      return EXIT_CODES.NETWORK_ERROR;
    case 'MISSING_LOCAL_DATA':
    case 'MANIFEST_READ':
    case 'SCENE_IDENTIFICATION':
    case 'COMPLETENESS':
      return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
}
