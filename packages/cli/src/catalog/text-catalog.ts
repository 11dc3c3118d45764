import { parse } from 'yaml';
import { TextCatalogSchema, type TextCatalogRule } from '@geosite-probe/shared';
import {
    matchTypeFromCode,
    matchTypeFromName,
    type Catalog,
    type CatalogRule,
} from '@geosite-probe/core';

/**
 * Parses a YAML (or JSON) text catalog:
 *
 *   categories:
 *     - tag: ads
 *       rules:
 *         - { type: domain, value: ads.example.com, attributes: [cn] }
 *         - { type: 0, value: track }
 */
export function parseTextCatalog(content: string): Catalog {
    const data: unknown = parse(content);
    const text = TextCatalogSchema.parse(data);

    return {
        categories: text.categories.map((category) => ({
            tag: category.tag,
            rules: category.rules.map(toCatalogRule),
        })),
    };
}

function toCatalogRule(rule: TextCatalogRule): CatalogRule {
    return {
        type: typeof rule.type === 'number' ? matchTypeFromCode(rule.type) : matchTypeFromName(rule.type),
        value: rule.value,
        attributes: rule.attributes,
    };
}
