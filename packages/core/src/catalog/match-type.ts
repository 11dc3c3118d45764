/**
 * Mapping between stored match-type codes and the MatchType variant.
 *
 * geosite.dat stores routercommon.Domain.Type as an integer, and enum
 * constant names differ between v2fly releases, so codes are matched by
 * value here, once, at the catalog-load boundary.
 */

import { MATCH_TYPE_CODE } from '../types/index.js';
import type { MatchType, Strategy } from '../types/index.js';

/**
 * Map a stored integer code to its MatchType.
 * Unrecognized codes become `unknown` and keep the code for diagnostics.
 */
export function matchTypeFromCode(code: number): MatchType {
    switch (code) {
        case MATCH_TYPE_CODE.PLAIN:
            return { kind: 'plain' };
        case MATCH_TYPE_CODE.REGEX:
            return { kind: 'regex' };
        case MATCH_TYPE_CODE.DOMAIN:
            return { kind: 'domain' };
        case MATCH_TYPE_CODE.FULL:
            return { kind: 'full' };
        default:
            return { kind: 'unknown', code };
    }
}

/**
 * Map a kind name (as written in text catalogs) to its MatchType.
 */
export function matchTypeFromName(name: Exclude<Strategy, 'unknown'>): MatchType {
    return { kind: name };
}
