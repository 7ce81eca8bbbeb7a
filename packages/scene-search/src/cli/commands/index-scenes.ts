/**
 * Index Command
 *
 * Identify .SAFE scene directories and add them to the local SQLite index.
 *
 * Usage:
 *   scene-search index <scenes...> [--database scenes.db]
 */

import type { Command } from 'commander';
import { withCatalog } from '../../catalog/catalog.js';
import { SafeSceneIdentifier } from '../../scenes/identify.js';
import { createLocalCatalog, getGlobalContext } from '../context.js';

export function registerIndexCommand(program: Command): void {
  program
    .command('index <scenes...>')
    .description('Add .SAFE scene directories to the local scene index')
    .action(async (scenes: string[]) => {
      const { config } = getGlobalContext();
      const written = await withCatalog(createLocalCatalog(config), (catalog) =>
        catalog.ingest(scenes, new SafeSceneIdentifier())
      );
      console.log(`Indexed ${written} scene(s) into ${config.catalog.database}`);
    });
}
