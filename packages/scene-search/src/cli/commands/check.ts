/**
 * Check Command
 *
 * Verify that the data-take neighbours of local scenes are present in the
 * primary catalog, cross-checked against the ASF catalog.
 *
 * Usage:
 *   scene-search check <scenes...>
 *
 * Exits with code 5 when a neighbour is missing.
 */

import type { Command } from 'commander';
import { withCatalog } from '../../catalog/catalog.js';
import { checkAcquisitionCompleteness } from '../../completeness/completeness-check.js';
import { SafeSceneIdentifier } from '../../scenes/identify.js';
import { createCatalog, createReferenceCatalog, getGlobalContext } from '../context.js';

export function registerCheckCommand(program: Command): void {
  program
    .command('check <scenes...>')
    .description('Verify data-take completeness of .SAFE scenes')
    .action(async (scenes: string[]) => {
      const count = await executeCheck(scenes);
      console.log(`Data-take neighbours present for ${count} scene(s)`);
    });
}

/**
 * @returns number of scenes checked
 * @throws CompletenessError when a neighbour is confirmed missing
 */
export async function executeCheck(scenes: readonly string[]): Promise<number> {
  const { config } = getGlobalContext();
  const identifier = new SafeSceneIdentifier();
  const records = await identifier.identify(scenes);

  await withCatalog(createCatalog(config), (primary) =>
    checkAcquisitionCompleteness({
      primary,
      reference: createReferenceCatalog(config),
      identifier,
      scenes: records,
    })
  );
  return records.length;
}
