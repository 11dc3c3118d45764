/**
 * Result ranking: smallest group first, then selector name.
 */

import type { MatchRecord } from '../types/index.js';

/**
 * Total order over match records.
 * Ascending group size; ties broken by code-unit order of the selector
 * (not locale order, so output is identical on every machine).
 */
export function compareMatches(a: MatchRecord, b: MatchRecord): number {
    if (a.groupSize !== b.groupSize) {
        return a.groupSize - b.groupSize;
    }
    if (a.selector < b.selector) return -1;
    if (a.selector > b.selector) return 1;
    return 0;
}

/**
 * Return ranked copy of matches. Input array is not mutated.
 */
export function rankMatches(matches: readonly MatchRecord[]): MatchRecord[] {
    return [...matches].sort(compareMatches);
}
