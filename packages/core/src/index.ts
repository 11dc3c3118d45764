// Types (re-exported from shared)
export type {
    MatchType,
    Strategy,
    CatalogRule,
    Category,
    Catalog,
    MatchRecord,
    RouteRule,
    RouteDocument,
} from './types/index.js';

export {
    MatchTypeSchema,
    CatalogRuleSchema,
    CategorySchema,
    CatalogSchema,
    MatchRecordSchema,
    RouteDocumentSchema,
    MATCH_TYPE_CODE,
    SELECTOR,
    ROUTE_TOKEN,
} from './types/index.js';

// Utils
export { normalizeHost, cleanHost, normalizeRuleValue, splitHostPort } from './utils/index.js';
export type { NormalizeHostResult, HostPort } from './utils/index.js';

// Catalog
export { buildCatalogIndex, groupSizeOf, matchTypeFromCode, matchTypeFromName } from './catalog/index.js';
export type { CatalogIndex } from './catalog/index.js';

// Categorizer
export {
    scanHost,
    scanAll,
    matchRule,
    rankMatches,
    compareMatches,
    createPatternCache,
    compilePattern,
    formatSelector,
} from './categorizer/index.js';
export type {
    CompiledPattern,
    PatternCache,
    PatternLookup,
    RuleMatchResult,
    ScanOptions,
    ScanOutput,
    ScanAllOptions,
    ScanAllResult,
    ScanStats,
    LineResult,
} from './categorizer/index.js';

// Route
export { prepareRouteDomains, buildRouteDocument, encodeRouteToken } from './route/index.js';
export type { IdFactory } from './route/index.js';
