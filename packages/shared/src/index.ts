// Schemas
export {
    MatchTypeSchema,
    StrategySchema,
    CatalogRuleSchema,
    CategorySchema,
    CatalogSchema,
    MatchRecordSchema,
    TextCatalogRuleSchema,
    TextCatalogSchema,
    ProbeConfigSchema,
    RouteRuleSchema,
    RouteDocumentSchema,
} from './schemas.js';

// Types
export type {
    MatchType,
    Strategy,
    CatalogRule,
    Category,
    Catalog,
    MatchRecord,
    TextCatalogRule,
    TextCatalog,
    ProbeConfig,
    RouteRule,
    RouteDocument,
} from './schemas.js';

// Constants
export {
    MATCH_TYPE_CODE,
    SELECTOR,
    CLI_DEFAULTS,
    REPORT_FORMAT,
    ROUTE_TOKEN,
} from './constants.js';
