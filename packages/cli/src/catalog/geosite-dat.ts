/**
 * geosite.dat decoding.
 *
 * The schema is read from assets/geosite.proto at run time; no generated
 * code. Match-type codes are mapped to MatchType here, at the boundary,
 * so the core never sees raw integers.
 */

import protobuf from 'protobufjs';
import type { Type } from 'protobufjs';
import { z } from 'zod';
import { matchTypeFromCode, type Catalog } from '@geosite-probe/core';
import { resolveAssetPath } from '../workspace/paths.js';

const GEOSITE_LIST_TYPE = 'v2ray.core.app.router.routercommon.GeoSiteList';

/**
 * Plain-object shape produced by Type.toObject() with defaults on.
 */
const GeoSiteListObjectSchema = z.object({
    entry: z.array(
        z.object({
            countryCode: z.string(),
            domain: z.array(
                z.object({
                    type: z.number().int(),
                    value: z.string(),
                    attribute: z.array(z.object({ key: z.string() })),
                })
            ),
        })
    ),
});

let geoSiteListType: Type | undefined;

/**
 * Loads (once) the GeoSiteList message type.
 */
export function loadGeoSiteListType(): Type {
    if (!geoSiteListType) {
        const root = protobuf.loadSync(resolveAssetPath('geosite.proto'));
        geoSiteListType = root.lookupType(GEOSITE_LIST_TYPE);
    }
    return geoSiteListType;
}

/**
 * Decode geosite.dat bytes into a Catalog.
 * Throws on malformed protobuf.
 */
export function decodeGeoSiteList(bytes: Uint8Array): Catalog {
    const type = loadGeoSiteListType();
    const message = type.decode(bytes);
    const plain: unknown = type.toObject(message, {
        enums: Number,
        longs: String,
        defaults: true,
        arrays: true,
    });
    const list = GeoSiteListObjectSchema.parse(plain);

    return {
        categories: list.entry.map((site) => ({
            tag: site.countryCode,
            rules: site.domain.map((domain) => ({
                type: matchTypeFromCode(domain.type),
                value: domain.value,
                attributes: domain.attribute.map((a) => a.key),
            })),
        })),
    };
}
