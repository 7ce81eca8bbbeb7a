/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

export { registerSearchCommand, executeSearch, type SearchOptions } from './search.js';
export { registerCheckCommand, executeCheck } from './check.js';
export { registerIndexCommand } from './index-scenes.js';
