/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    MatchType,
    Strategy,
    CatalogRule,
    Category,
    Catalog,
    MatchRecord,
    RouteRule,
    RouteDocument,
} from '@geosite-probe/shared';

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
} from '@geosite-probe/shared';
