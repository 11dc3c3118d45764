/**
 * Catalog Index: group sizes derived once from the catalog.
 *
 * - base size: tag -> number of rules (duplicates counted)
 * - attribute size: tag -> attribute key -> number of rules carrying the key
 *
 * A rule that repeats an attribute key counts once for that key.
 * A tag that appears in several category records accumulates across them.
 */

import type { Catalog } from '../types/index.js';
import type { CatalogIndex } from './types.js';

/**
 * Build the Catalog Index.
 * Must run before the first scan; the result is never mutated afterwards.
 *
 * @param catalog - Decoded catalog
 * @returns Read-only group size lookup
 */
export function buildCatalogIndex(catalog: Catalog): CatalogIndex {
    const baseSize = new Map<string, number>();
    const attributeSize = new Map<string, Map<string, number>>();

    for (const category of catalog.categories) {
        const { tag, rules } = category;

        baseSize.set(tag, (baseSize.get(tag) ?? 0) + rules.length);

        let byAttribute = attributeSize.get(tag);
        if (!byAttribute) {
            byAttribute = new Map<string, number>();
            attributeSize.set(tag, byAttribute);
        }

        for (const rule of rules) {
            for (const key of new Set(rule.attributes)) {
                if (key === '') continue;
                byAttribute.set(key, (byAttribute.get(key) ?? 0) + 1);
            }
        }
    }

    return { baseSize, attributeSize };
}

/**
 * Look up the group size for a selector's tag and attribute.
 * Pass '' as attribute for the base selector. Unknown entries report 0.
 */
export function groupSizeOf(index: CatalogIndex, tag: string, attribute: string): number {
    if (attribute === '') {
        return index.baseSize.get(tag) ?? 0;
    }
    return index.attributeSize.get(tag)?.get(attribute) ?? 0;
}
