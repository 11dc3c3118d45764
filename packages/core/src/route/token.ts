/**
 * Route token packaging: a domain list wrapped in a single "direct"
 * routing rule, serialized to JSON and base64url-encoded behind the
 * import_route scheme.
 *
 * ARCHITECTURAL NOTE: No node:* imports. Id generation is injected so the
 * output is deterministic under test; callers pass crypto.randomUUID.
 */

import { ROUTE_TOKEN } from '../types/index.js';
import type { RouteDocument } from '../types/index.js';

export type IdFactory = () => string;

/**
 * Build the routing document for a domain list.
 *
 * @param domains - Prepared domains (see prepareRouteDomains)
 * @param newId - Generates the route id, then the rule id
 * @throws Error if the list is empty
 */
export function buildRouteDocument(domains: readonly string[], newId: IdFactory): RouteDocument {
    if (domains.length === 0) {
        throw new Error('domain list is empty');
    }

    const routeId = newId();
    const ruleId = newId();

    return {
        name: ROUTE_TOKEN.NAME,
        domainStrategy: ROUTE_TOKEN.DOMAIN_STRATEGY,
        id: routeId,
        domainMatcher: ROUTE_TOKEN.DOMAIN_MATCHER,
        rules: [
            {
                id: ruleId,
                type: ROUTE_TOKEN.RULE_TYPE,
                domain: [...domains],
                outboundTag: ROUTE_TOKEN.OUTBOUND_TAG,
                __name__: ROUTE_TOKEN.NAME,
            },
        ],
        balancers: [],
    };
}

/**
 * Serialize a routing document into an import token.
 * JSON is compact, in document key order, with `<`, `>` and `&` escaped;
 * base64 is URL-safe and keeps `=` padding.
 */
export function encodeRouteToken(document: RouteDocument): string {
    const json = JSON.stringify(document).replace(
        /[<>&\u2028\u2029]/g,
        (c) => `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`
    );
    return `${ROUTE_TOKEN.SCHEME}${toBase64Url(json)}`;
}

function toBase64Url(text: string): string {
    const bytes = new TextEncoder().encode(text);
    let binary = '';
    for (const b of bytes) {
        binary += String.fromCharCode(b);
    }
    return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_');
}
