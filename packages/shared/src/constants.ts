/**
 * Constants for Geosite Probe.
 */

/**
 * Integer match-type codes as stored in a compiled geosite.dat
 * (routercommon.Domain.Type).
 */
export const MATCH_TYPE_CODE = {
    PLAIN: 0,
    REGEX: 1,
    DOMAIN: 2,
    FULL: 3,
} as const;

/**
 * Selector formatting.
 * Base: `geosite:<tag>`, attribute-qualified: `geosite:<tag>@<attr>`.
 */
export const SELECTOR = {
    DEFAULT_PREFIX: 'geosite',
    PREFIX_SEPARATOR: ':',
    ATTRIBUTE_SEPARATOR: '@',
} as const;

/**
 * Defaults used by the CLI when neither flags nor geoprobe.yaml say otherwise.
 */
export const CLI_DEFAULTS = {
    CATALOG_PATH: 'dlc.dat',
    DOMAINS_PATH: 'domains.txt',
    SHOW_WHY: true,
    CONFIG_FILENAME: 'geoprobe.yaml',
} as const;

/**
 * Report layout for selector lines.
 */
export const REPORT_FORMAT = {
    SELECTOR_WIDTH: 42,
    SIZE_WIDTH: 6,
    NO_MATCH: '(no geosite match found)',
} as const;

/**
 * Route token packaging.
 */
export const ROUTE_TOKEN = {
    SCHEME: 'v2rayTun://import_route/',
    NAME: 'Default',
    DOMAIN_STRATEGY: 'AsIs',
    DOMAIN_MATCHER: 'hybrid',
    RULE_TYPE: 'field',
    OUTBOUND_TAG: 'direct',
} as const;
