/**
 * Run-scoped cache of compiled regex rules.
 *
 * Keyed by the normalized rule value. A failed compile is stored as a
 * failure entry so the pattern is never recompiled and its error is
 * surfaced once. Entries are never evicted.
 */

import type { CompiledPattern, PatternCache, PatternLookup } from './types.js';

export function createPatternCache(): PatternCache {
    return { entries: new Map<string, CompiledPattern>() };
}

/**
 * Get or compile the pattern for `source`.
 *
 * @param cache - Cache shared by every scan in the run
 * @param source - Normalized regex rule value
 * @returns Cached entry, plus `compiled: true` when this call did the compile
 */
export function compilePattern(cache: PatternCache, source: string): PatternLookup {
    const cached = cache.entries.get(source);
    if (cached) {
        return { entry: cached, compiled: false };
    }

    let entry: CompiledPattern;
    try {
        entry = { ok: true, regex: new RegExp(source) };
    } catch (e) {
        const errorMsg = e instanceof Error ? e.message : String(e);
        entry = { ok: false, error: errorMsg };
    }

    cache.entries.set(source, entry);
    return { entry, compiled: true };
}
