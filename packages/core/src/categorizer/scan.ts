/**
 * Category scanning for a single host.
 *
 * Every rule of every category is evaluated; there is no short-circuit per
 * category. Each selector keeps the first rule that justified it
 * (insert-if-absent), so later matches never overwrite an earlier one.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import { groupSizeOf } from '../catalog/build-index.js';
import { matchRule } from './match.js';
import { formatSelector } from './selector.js';
import type { Catalog, MatchRecord, Strategy } from '../types/index.js';
import type { CatalogIndex } from '../catalog/types.js';
import type { PatternCache, ScanOptions, ScanOutput } from './types.js';

interface Justification {
    tag: string;
    attribute: string;
    strategy: Strategy;
    ruleValue: string;
}

/**
 * Find every selector a host belongs to.
 *
 * @param host - Normalized host (via normalizeHost)
 * @param catalog - Decoded catalog
 * @param index - Catalog Index built from the same catalog
 * @param cache - Run-scoped pattern cache
 * @param options - Optional selector prefix
 * @returns One match record per distinct selector, in first-hit order
 */
export function scanHost(
    host: string,
    catalog: Catalog,
    index: CatalogIndex,
    cache: PatternCache,
    options: ScanOptions = {}
): ScanOutput {
    const warnings: string[] = [];
    const justifications = new Map<string, Justification>();

    function recordOnce(selector: string, justification: Justification): void {
        if (!justifications.has(selector)) {
            justifications.set(selector, justification);
        }
    }

    for (const category of catalog.categories) {
        const { tag } = category;

        for (const rule of category.rules) {
            const { matched, strategy, warning } = matchRule(host, rule, cache);
            if (warning) {
                warnings.push(warning);
            }
            if (!matched) continue;

            recordOnce(formatSelector(tag, '', options.selectorPrefix), {
                tag,
                attribute: '',
                strategy,
                ruleValue: rule.value,
            });

            for (const attribute of rule.attributes) {
                if (attribute === '') continue;
                recordOnce(formatSelector(tag, attribute, options.selectorPrefix), {
                    tag,
                    attribute,
                    strategy,
                    ruleValue: rule.value,
                });
            }
        }
    }

    const matches: MatchRecord[] = [];
    for (const [selector, why] of justifications) {
        matches.push({
            selector,
            tag: why.tag,
            attribute: why.attribute,
            groupSize: groupSizeOf(index, why.tag, why.attribute),
            strategy: why.strategy,
            ruleValue: why.ruleValue,
        });
    }

    return { matches, warnings };
}
