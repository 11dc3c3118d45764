/**
 * Batch scanning of raw input lines.
 *
 * One Catalog Index and one Pattern Cache serve the whole batch. Lines are
 * processed in input order; a line that fails normalization is reported
 * and the batch continues.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import { normalizeHost } from '../utils/normalize.js';
import { buildCatalogIndex } from '../catalog/build-index.js';
import { createPatternCache } from './pattern-cache.js';
import { scanHost } from './scan.js';
import { rankMatches } from './rank.js';
import type { Catalog } from '../types/index.js';
import type { LineResult, ScanAllOptions, ScanAllResult, ScanStats } from './types.js';

/**
 * Scan every input line against the catalog.
 *
 * @param lines - Raw input lines (comments and blank lines already removed)
 * @param catalog - Decoded catalog
 * @param options - Optional prebuilt index/cache and selector prefix
 * @returns Per-line results with ranked matches, deduplicated warnings, and stats
 */
export function scanAll(
    lines: readonly string[],
    catalog: Catalog,
    options: ScanAllOptions = {}
): ScanAllResult {
    const index = options.index ?? buildCatalogIndex(catalog);
    const cache = options.cache ?? createPatternCache();

    const results: LineResult[] = [];
    const allWarnings: string[] = [];
    const stats: ScanStats = {
        total: lines.length,
        matched: 0,
        unmatched: 0,
        invalid: 0,
    };

    for (const input of lines) {
        const normalized = normalizeHost(input);
        if (!normalized.ok) {
            results.push({ input, ok: false, error: normalized.error });
            stats.invalid++;
            continue;
        }

        const { matches, warnings } = scanHost(normalized.host, catalog, index, cache, {
            selectorPrefix: options.selectorPrefix,
        });

        // Aggregate warnings (dedupe)
        for (const w of warnings) {
            if (!allWarnings.includes(w)) {
                allWarnings.push(w);
            }
        }

        results.push({ input, ok: true, host: normalized.host, matches: rankMatches(matches) });
        if (matches.length > 0) {
            stats.matched++;
        } else {
            stats.unmatched++;
        }
    }

    return { results, warnings: allWarnings, stats };
}
