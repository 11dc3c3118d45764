/**
 * Catalog module: match-type mapping and group-size index.
 */

export { buildCatalogIndex, groupSizeOf } from './build-index.js';
export { matchTypeFromCode, matchTypeFromName } from './match-type.js';
export type { CatalogIndex } from './types.js';
