/**
 * Route module: domain list to import_route token.
 */

export { prepareRouteDomains } from './prepare.js';
export { buildRouteDocument, encodeRouteToken } from './token.js';
export type { IdFactory } from './token.js';
